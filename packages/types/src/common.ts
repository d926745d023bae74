/** 브랜드 타입 -- 원시 타입에 의미론적 구분 부여 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/** 스노우플레이크 ID (플랫폼이 발급하는 64비트 정수의 문자열 표현) */
export type Snowflake = Brand<string, 'Snowflake'>;

/**
 * 3상태 필드 -- "보내지 않음" / "명시적 null" / "값 있음"을 구분
 *
 * PATCH 계열 요청에서 필드를 생략하는 것과 null로 지우는 것은 다른 의미를 가진다.
 */
export type Field<T> = { kind: 'unset' } | { kind: 'null' } | { kind: 'present'; value: T };

/**
 * 비동기 정리 함수 -- TC39 `Symbol.asyncDispose`와 이름 충돌 방지를 위해
 * `AsyncDisposable` 대신 `CleanupFn`으로 명명.
 */
export type CleanupFn = () => Promise<void>;

/** 로그 레벨 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Field 생성 헬퍼 */
export const unset = <T>(): Field<T> => ({ kind: 'unset' });
export const explicitNull = <T>(): Field<T> => ({ kind: 'null' });
export const present = <T>(value: T): Field<T> => ({ kind: 'present', value });

/** Field 맵을 전송용 객체로 변환 (unset 키는 생략) */
export function serializeFields<T extends Record<string, Field<unknown>>>(
  fields: T,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(fields)) {
    switch (field.kind) {
      case 'unset':
        break;
      case 'null':
        out[key] = null;
        break;
      case 'present':
        out[key] = field.value;
        break;
    }
  }
  return out;
}
