// packages/rest/src/bucket.ts
import type { MajorParams, RateLimitInfo } from '@gatecord/types';
import { AsyncLock, isGatecordError } from '@gatecord/infra';
import { computeResetDelayMs } from './headers.js';

export interface BucketDeps {
  now?: () => number;
  /** 유휴 + 리셋 경과 시 호출: 레지스트리에서 제거 */
  onExpire: (bucket: Bucket) => void;
}

/**
 * 레이트 리밋 스코프 하나
 *
 * - lock: 스코프당 동시 요청 1개
 * - remaining=0 이면 release를 리셋 시각까지 미룬다 (deferred release)
 * - 유휴 상태로 리셋이 지나면 onExpire
 * - 같은 스코프로 밝혀진 다른 버킷에 병합되면, 남은 대기자는 병합 대상의 큐로 넘어간다
 */
export class Bucket {
  readonly lock = new AsyncLock();
  readonly routeKey: string;
  readonly major: MajorParams;
  key: string;
  bucketId: string | undefined;
  limit: number | undefined;
  remaining: number | undefined;
  /** 리셋 시각 (ms epoch) */
  resetAt: number | undefined;
  /** 병합 대상 (같은 스코프의 살아 있는 버킷) */
  mergedInto: Bucket | undefined;

  private readonly now: () => number;
  private readonly onExpire: (bucket: Bucket) => void;
  private readonly timers = new Set<NodeJS.Timeout>();
  private disposed = false;
  /** 이 버킷으로 병합됐지만 아직 대기자가 남은 버킷 수 */
  private inbound = 0;
  private drained = false;
  /** 병합 시점에 진행 중이던 요청을 대신해 target에 걸어 둔 보유 */
  private proxy: Promise<void> | undefined;

  constructor(key: string, routeKey: string, major: MajorParams, deps: BucketDeps) {
    this.key = key;
    this.routeKey = routeKey;
    this.major = major;
    this.now = deps.now ?? Date.now;
    this.onExpire = deps.onExpire;
  }

  /** 리셋까지 남은 시간 (ms, 지났거나 모르면 0) */
  get resetDelayMs(): number {
    return this.resetAt === undefined ? 0 : Math.max(0, this.resetAt - this.now());
  }

  /** 남은 요청이 없고 윈도우가 아직 안 끝남 */
  get exhausted(): boolean {
    return this.remaining === 0 && this.resetDelayMs > 0;
  }

  /** 대기 중인 release 타이머 수 (테스트/진단용) */
  get pendingTimers(): number {
    return this.timers.size;
  }

  /** 병합을 따라간 최종 버킷 */
  get live(): Bucket {
    let current: Bucket = this;
    while (current.mergedInto) {
      current = current.mergedInto;
    }
    return current;
  }

  /** 락을 잡고, 그 사이 병합됐으면 최종 버킷의 락까지 잡는다 (반환값이 실제 보유 버킷) */
  async acquire(signal?: AbortSignal): Promise<Bucket> {
    await this.lock.acquire(signal);
    return this.forward(signal);
  }

  /**
   * 보유 중인 락을 병합 대상에 넘긴다
   *
   * 병합되지 않았으면 그대로 this. 대상 락을 기다리다 실패하면 아무것도 보유하지 않은 채 던진다.
   */
  async forward(signal?: AbortSignal): Promise<Bucket> {
    let current: Bucket = this;
    while (current.mergedInto) {
      const target = current.mergedInto;
      current.releaseNow();
      await target.lock.acquire(signal);
      current = target;
    }
    return current;
  }

  /** 이 버킷을 target에 병합: 이후 대기자는 target의 큐 뒤에 선다 */
  mergeInto(target: Bucket): void {
    if (this.mergedInto || target === this) {
      return;
    }
    this.mergedInto = target;
    target.inbound++;
    if (this.lock.locked) {
      // 진행 중인 요청이 끝날 때까지 target의 다음 요청도 막는다
      this.proxy = target.lock.acquireFirst();
    }
    this.settle();
  }

  /** 응답 헤더로 상태 갱신 (헤더가 없는 값은 유지) */
  update(info: RateLimitInfo): void {
    if (info.limit !== undefined) {
      this.limit = info.limit;
    }
    if (info.remaining !== undefined) {
      this.remaining = info.remaining;
    }
    if (info.resetAfter !== undefined || info.reset !== undefined) {
      this.resetAt = this.now() + computeResetDelayMs(info, this.now());
    }
  }

  /** 소진 상태면 리셋 시각까지 release를 미룬다 */
  release(): void {
    if (this.disposed) {
      return;
    }
    if (this.exhausted) {
      this.schedule(this.resetDelayMs, () => this.releaseNow(), true);
      return;
    }
    this.releaseNow();
  }

  /** 타이머 취소 + 대기자 정리 */
  dispose(): void {
    this.disposed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.lock.clear();
  }

  private releaseNow(): void {
    if (this.disposed) {
      return;
    }
    this.lock.release();
    const proxy = this.proxy;
    const target = this.mergedInto;
    if (proxy && target) {
      this.proxy = undefined;
      void proxy.then(() => target.releaseNow(), ignoreCleared);
    }
    this.settle();
  }

  private settle(): void {
    if (!this.lock.idle || this.inbound > 0) {
      return;
    }
    const target = this.mergedInto;
    if (target) {
      if (!this.drained) {
        this.drained = true;
        target.inbound--;
        this.onExpire(this);
        target.settle();
      }
      return;
    }
    const delay = this.resetDelayMs;
    if (delay > 0) {
      this.schedule(delay, () => this.expire(), false);
    } else {
      this.expire();
    }
  }

  private expire(): void {
    if (!this.disposed && this.lock.idle && this.inbound === 0) {
      this.onExpire(this);
    }
  }

  private schedule(ms: number, fn: () => void, keepAlive: boolean): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, ms);
    if (!keepAlive) {
      timer.unref();
    }
    this.timers.add(timer);
  }
}

/** 닫힌 레지스트리의 대기 취소는 넘길 보유가 없다는 뜻 */
function ignoreCleared(err: unknown): void {
  if (isGatecordError(err) && err.code === 'LOCK_CLEARED') {
    return;
  }
  throw err;
}
