// packages/config/src/normalize-paths.ts
import * as os from 'node:os';

/** ~/ 확장 대상 (점 경로). 토큰 등 다른 문자열은 건드리지 않는다. */
export const PATH_KEYS: readonly string[] = ['logging.dir'];

/**
 * 경로 필드의 ~/ 접두사를 homedir()로 치환
 *
 * 원본은 바꾸지 않고, 바뀐 경로의 객체만 새로 만든다.
 */
export function normalizePaths(
  raw: unknown,
  homedir: () => string = os.homedir,
  keys: readonly string[] = PATH_KEYS,
): unknown {
  if (!isPlainObject(raw)) {
    return raw;
  }
  return keys.reduce((acc, key) => expandAt(acc, key.split('.'), homedir), raw);
}

function expandAt(
  obj: Record<string, unknown>,
  segments: string[],
  homedir: () => string,
): Record<string, unknown> {
  const [head, ...rest] = segments;
  if (head === undefined || !Object.hasOwn(obj, head)) {
    return obj;
  }
  const value = obj[head];
  if (rest.length === 0) {
    return typeof value === 'string' ? { ...obj, [head]: expandTilde(value, homedir) } : obj;
  }
  return isPlainObject(value) ? { ...obj, [head]: expandAt(value, rest, homedir) } : obj;
}

function expandTilde(str: string, homedir: () => string): string {
  if (str === '~') {
    return homedir();
  }
  return str.startsWith('~/') ? homedir() + str.slice(1) : str;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}
