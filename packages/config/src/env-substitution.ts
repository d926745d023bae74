// packages/config/src/env-substitution.ts
import { MissingEnvVarError } from './errors.js';

/**
 * 환경변수 치환
 *
 * - `${DISCORD_TOKEN}` 형태, 대문자 이름만
 * - 1회 치환 (치환 결과는 다시 해석하지 않음)
 * - `$${VAR}`는 리터럴 `${VAR}`
 * - 미설정/빈 문자열: MissingEnvVarError
 */

const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)\}/g;
const ESCAPED_PATTERN = /\$\$\{([A-Z_][A-Z0-9_]*)\}/g;
const NUL = '\x00';
const RESTORE_PATTERN = new RegExp(`${NUL}ESC_ENV${NUL}([A-Z_][A-Z0-9_]*)${NUL}`, 'g');

/**
 * @param keyPath 에러 메시지에 넣을 현재 위치 (재귀용)
 */
export function resolveEnvVars(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
  keyPath = '',
): unknown {
  if (typeof value === 'string') {
    return value.includes('$') ? substituteString(value, env, keyPath) : value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => resolveEnvVars(item, env, `${keyPath}[${i}]`));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [
        k,
        resolveEnvVars(v, env, keyPath ? `${keyPath}.${k}` : k),
      ]),
    );
  }
  return value;
}

function substituteString(str: string, env: NodeJS.ProcessEnv, keyPath: string): string {
  // 이스케이프를 먼저 숨겨야 치환 대상에서 빠진다
  const hidden = str.replace(ESCAPED_PATTERN, `${NUL}ESC_ENV${NUL}$1${NUL}`);
  const substituted = hidden.replace(ENV_VAR_PATTERN, (_, varName: string) => {
    const value = env[varName];
    if (value === undefined || value === '') {
      throw new MissingEnvVarError(varName, keyPath || undefined);
    }
    return value;
  });
  return substituted.replace(RESTORE_PATTERN, '${$1}');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}
