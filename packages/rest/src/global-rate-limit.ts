// packages/rest/src/global-rate-limit.ts
import { AbortedError } from '@gatecord/infra';

type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * 프로세스 전역 레이트 리밋 게이트
 *
 * 전역 429를 받은 요청이 hold()로 게이트를 닫고 retry_after만큼 잔 뒤 연다.
 * 그 사이 모든 버킷의 요청은 wait()에서 멈춘다.
 */
export class GlobalRateLimit {
  private gate: { promise: Promise<void>; open: () => void } | undefined;
  private holders = 0;

  /** 게이트가 닫혀 있는지 */
  get active(): boolean {
    return this.gate !== undefined;
  }

  /** 게이트를 닫고 ms 동안 대기 후 연다 (여러 hold가 겹치면 마지막 hold가 끝날 때 열림) */
  async hold(ms: number, sleep: Sleep, signal?: AbortSignal): Promise<void> {
    if (!this.gate) {
      let open: () => void = () => {};
      const promise = new Promise<void>((resolve) => {
        open = resolve;
      });
      this.gate = { promise, open };
    }
    this.holders++;
    try {
      await sleep(ms, signal);
    } finally {
      this.holders--;
      if (this.holders === 0) {
        this.clear();
      }
    }
  }

  /** 게이트가 열릴 때까지 대기 */
  async wait(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortedError('Global rate limit wait');
    }
    const gate = this.gate;
    if (!gate) {
      return;
    }
    if (!signal) {
      return gate.promise;
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(new AbortedError('Global rate limit wait'));
      signal.addEventListener('abort', onAbort, { once: true });
      void gate.promise.then(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
    });
  }

  /** 즉시 연다 */
  clear(): void {
    const gate = this.gate;
    this.gate = undefined;
    gate?.open();
  }
}
