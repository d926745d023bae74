// packages/infra/src/env.ts
const GATECORD_PREFIX = 'GATECORD_';

/**
 * 환경 변수 조회
 *
 * GATECORD_ 접두사를 우선 검색하고, 없으면 접두사 없는 키를 검색.
 * 빈 문자열은 설정되지 않은 것으로 본다.
 */
export function getEnv(key: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return nonEmpty(env[`${GATECORD_PREFIX}${key}`]) ?? nonEmpty(env[key]);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}
