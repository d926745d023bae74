// packages/infra/src/backoff.ts
import { setTimeout } from 'node:timers/promises';

export interface BackoffOptions {
  minDelay?: number; // 기본: 1000
  maxDelay?: number; // 기본: 30000
  jitter?: boolean; // 기본: true
  /** 테스트용 난수원 (기본: Math.random) */
  random?: () => number;
}

/**
 * 지수 백오프 지연 시간 계산 (순수 함수)
 *
 * delay = min(maxDelay, 2^attempt * minDelay) + jitter
 */
export function computeBackoff(attempt: number, opts: BackoffOptions = {}): number {
  const { minDelay = 1000, maxDelay = 30000, jitter = true, random = Math.random } = opts;
  const exponential = Math.min(maxDelay, Math.pow(2, attempt) * minDelay);
  if (!jitter) {
    return exponential;
  }
  return exponential + Math.floor(random() * exponential * 0.1);
}

/**
 * 선형 백오프: 5xx 재시도용
 *
 * delay = (1 + attempt) * baseDelay
 */
export function computeLinearBackoff(attempt: number, baseDelay = 1000): number {
  return (1 + attempt) * baseDelay;
}

/** [0, intervalMs) 범위의 지터 지연 (첫 하트비트 등) */
export function computeJitter(intervalMs: number, random: () => number = Math.random): number {
  return Math.floor(intervalMs * random());
}

/**
 * AbortSignal 지원 sleep
 *
 * `node:timers/promises` setTimeout은 AbortSignal을 네이티브 지원.
 * signal이 이미 abort된 경우 즉시 reject.
 */
export async function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await setTimeout(ms, undefined, { signal });
}
