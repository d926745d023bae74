// packages/rest/src/headers.ts
import type { RateLimitBody, RateLimitInfo } from '@gatecord/types';

/** Headers 호환 조회 인터페이스 */
export interface HeaderLookup {
  get(name: string): string | null;
}

/** X-RateLimit-* 헤더 파싱 */
export function parseRateLimitHeaders(headers: HeaderLookup): RateLimitInfo {
  const scope = headers.get('x-ratelimit-scope');
  return {
    limit: parseNumber(headers.get('x-ratelimit-limit')),
    remaining: parseNumber(headers.get('x-ratelimit-remaining')),
    reset: parseNumber(headers.get('x-ratelimit-reset')),
    resetAfter: parseNumber(headers.get('x-ratelimit-reset-after')),
    bucket: headers.get('x-ratelimit-bucket') ?? undefined,
    global: headers.get('x-ratelimit-global') !== null,
    scope: scope === 'user' || scope === 'global' || scope === 'shared' ? scope : undefined,
  };
}

/**
 * 리셋까지 남은 시간 (ms)
 *
 * reset-after(상대값)를 우선하고, 없으면 reset(epoch 초)과 현재 시각의 차이.
 */
export function computeResetDelayMs(
  info: Pick<RateLimitInfo, 'reset' | 'resetAfter'>,
  now: number = Date.now(),
): number {
  if (info.resetAfter !== undefined) {
    return Math.max(0, Math.ceil(info.resetAfter * 1000));
  }
  if (info.reset !== undefined) {
    return Math.max(0, Math.ceil(info.reset * 1000 - now));
  }
  return 0;
}

/** 429 본문 판별 */
export function isRateLimitBody(body: unknown): body is RateLimitBody {
  return (
    typeof body === 'object' &&
    body !== null &&
    'retry_after' in body &&
    typeof body.retry_after === 'number'
  );
}

/**
 * 429 대기 시간 (ms)
 *
 * 본문의 retry_after(초)를 우선하고, 없으면 Retry-After 헤더, 그다음 리셋 헤더.
 */
export function getRetryAfterMs(body: unknown, headers: HeaderLookup, info: RateLimitInfo): number {
  if (isRateLimitBody(body)) {
    return Math.max(0, Math.ceil(body.retry_after * 1000));
  }
  const header = parseNumber(headers.get('retry-after'));
  if (header !== undefined) {
    return Math.max(0, Math.ceil(header * 1000));
  }
  return computeResetDelayMs(info);
}

/** 응답이 전역 레이트 리밋인지 */
export function isGlobalRateLimit(body: unknown, info: RateLimitInfo): boolean {
  if (info.global || info.scope === 'global') {
    return true;
  }
  return isRateLimitBody(body) && body.global === true;
}

function parseNumber(value: string | null): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}
