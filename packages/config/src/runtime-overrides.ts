// packages/config/src/runtime-overrides.ts

/**
 * 인메모리 런타임 오버라이드
 *
 * 점 경로(`gateway.intents`)로 등록하고, 로드 시 파일 내용 위에 덮어쓴 뒤 검증한다.
 */

const overrides = new Map<string, unknown>();

export function setOverride(path: string, value: unknown): void {
  overrides.set(path, value);
}

export function unsetOverride(path: string): void {
  overrides.delete(path);
}

/** 등록된 오버라이드를 raw 설정에 적용 (원본 불변) */
export function applyOverrides(raw: unknown): unknown {
  if (overrides.size === 0) {
    return raw;
  }

  let result: Record<string, unknown> = isPlainObject(raw) ? { ...raw } : {};
  for (const [dotPath, value] of overrides) {
    result = setNestedValue(result, dotPath.split('.'), value);
  }
  return result;
}

export function resetOverrides(): void {
  overrides.clear();
}

export function getOverrideCount(): number {
  return overrides.size;
}

function setNestedValue(
  obj: Record<string, unknown>,
  keys: string[],
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = keys;
  if (head === undefined) {
    return obj;
  }
  if (rest.length === 0) {
    return { ...obj, [head]: value };
  }

  const child = obj[head];
  return {
    ...obj,
    [head]: setNestedValue(isPlainObject(child) ? { ...child } : {}, rest, value),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}
