// packages/infra/src/retry.ts
import { computeBackoff, sleepWithAbort } from './backoff.js';
import { AbortedError, isTransientNetworkError } from './errors.js';

export interface RetryOptions {
  /** 최대 시도 횟수 (기본: 3) */
  maxAttempts?: number;
  /** 최소 지연 (ms, 기본: 1000) */
  minDelay?: number;
  /** 최대 지연 (ms, 기본: 30000) */
  maxDelay?: number;
  /** jitter 활성화 (기본: true) */
  jitter?: boolean;
  /** 재시도 조건 함수 (기본: 일시적 네트워크 에러) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** 중단 시그널 */
  signal?: AbortSignal;
  /** 재시도 시 콜백 */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** 지터 난수원 (기본: Math.random) */
  random?: () => number;
  /** 대기 함수 (기본: sleepWithAbort) */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Partial config → 완전한 config으로 병합 (기본값 적용) */
export function resolveRetryConfig(
  partial?: Partial<RetryOptions>,
): Required<Pick<RetryOptions, 'maxAttempts' | 'minDelay' | 'maxDelay' | 'jitter'>> {
  return {
    maxAttempts: partial?.maxAttempts ?? 3,
    minDelay: partial?.minDelay ?? 1000,
    maxDelay: partial?.maxDelay ?? 30000,
    jitter: partial?.jitter ?? true,
  };
}

/**
 * 지수 백오프 재시도
 *
 * 게이트웨이 소켓 오픈처럼 네트워크 일시 장애가 흔한 작업에 사용.
 * REST 요청은 상태 코드 기반 정책이 따로 있으므로 RequestExecutor가 직접 루프를 돈다.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const { maxAttempts, minDelay, maxDelay, jitter } = resolveRetryConfig(opts);
  const { shouldRetry = isTransientNetworkError, signal, onRetry, random, sleep = sleepWithAbort } = opts;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new AbortedError('Retry');
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts - 1 || !shouldRetry(error, attempt)) {
        throw error;
      }

      const delay = computeBackoff(attempt, { minDelay, maxDelay, jitter, random });
      onRetry?.(error, attempt, delay);
      await sleep(delay, signal);
    }
  }

  throw lastError;
}
