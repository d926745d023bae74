// packages/infra/src/async-lock.ts
import { AbortedError, GatecordError } from './errors.js';

export interface AsyncLockOptions {
  /** 대기열 최대 크기 (기본: 무제한) */
  maxQueueSize?: number;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
  detach: () => void;
}

/**
 * FIFO 비동기 뮤텍스
 *
 * - 동시에 하나의 보유자만 허용
 * - release 시 대기열 선두에게 소유권을 그대로 넘긴다 (slot transfer)
 * - AbortSignal로 대기 취소 가능
 */
export class AsyncLock {
  private held = false;
  private readonly waiters: Waiter[] = [];
  private readonly maxQueueSize: number;

  constructor(opts: AsyncLockOptions = {}) {
    this.maxQueueSize = opts.maxQueueSize ?? Number.POSITIVE_INFINITY;
  }

  get locked(): boolean {
    return this.held;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /** 보유자도 대기자도 없음 */
  get idle(): boolean {
    return !this.held && this.waiters.length === 0;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortedError('Lock wait');
    }
    if (!this.held) {
      this.held = true;
      return;
    }
    if (this.waiters.length >= this.maxQueueSize) {
      throw new GatecordError('Lock queue full', 'LOCK_QUEUE_FULL', {
        details: { waiting: this.waiters.length },
      });
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(waiter);
        reject(new AbortedError('Lock wait'));
      };
      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** 대기열 맨 앞에서 기다린다 (취소 불가, 대기열 상한 무시) */
  acquireFirst(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.unshift({ resolve, reject, detach: () => {} });
    });
  }

  /** 잠겨 있지 않으면 즉시 획득 */
  tryAcquire(): boolean {
    if (this.held) {
      return false;
    }
    this.held = true;
    return true;
  }

  // NOTE: 대기자가 있으면 held를 false로 내리지 않는다 (소유권 이전).
  // 그 사이에 tryAcquire가 끼어들 틈이 없어야 한다.
  release(): void {
    if (!this.held) {
      throw new GatecordError('Lock is not held', 'LOCK_NOT_HELD');
    }
    const next = this.waiters.shift();
    if (next) {
      next.detach();
      next.resolve();
      return;
    }
    this.held = false;
  }

  /** 대기 중인 모든 waiter를 LOCK_CLEARED로 reject */
  clear(): void {
    const pending = this.waiters.splice(0);
    for (const waiter of pending) {
      waiter.detach();
      waiter.reject(new GatecordError('Lock cleared', 'LOCK_CLEARED'));
    }
  }

  private removeWaiter(waiter: Waiter): void {
    const idx = this.waiters.indexOf(waiter);
    if (idx !== -1) {
      this.waiters.splice(idx, 1);
    }
  }
}
