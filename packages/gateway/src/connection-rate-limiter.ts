// packages/gateway/src/connection-rate-limiter.ts
import { sleepWithAbort } from '@gatecord/infra';

export interface ConnectionRateLimiterOptions {
  /** 버킷 용량 = 윈도우당 전송 가능 프레임 (기본: 120) */
  limit?: number;
  /** limit개가 다시 차는 데 걸리는 시간 (ms, 기본: 60000) */
  windowMs?: number;
  /** 하트비트/identify/resume 전용으로 남겨두는 몫 (기본: 3) */
  reserved?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * 게이트웨이 연결 1개의 송신 한도
 *
 * 토큰 버킷. 용량 limit, windowMs 동안 limit개가 연속으로 다시 찬다.
 * 일반 프레임은 reserved개를 남겨 두고, priority 프레임(하트비트 등)은 마지막 토큰까지 쓴다.
 */
export class ConnectionRateLimiter {
  readonly limit: number;
  readonly windowMs: number;
  readonly reserved: number;

  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private tokens: number;
  private updatedAt: number;

  constructor(opts: ConnectionRateLimiterOptions = {}) {
    this.limit = opts.limit ?? 120;
    this.windowMs = opts.windowMs ?? 60_000;
    this.reserved = Math.min(opts.reserved ?? 3, this.limit);
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? sleepWithAbort;
    this.tokens = this.limit;
    this.updatedAt = this.now();
  }

  /** 일반 프레임이 지금 바로 보낼 수 있는 수 */
  get remaining(): number {
    this.refill();
    return Math.max(0, Math.floor(this.tokens) - this.reserved);
  }

  /** 토큰 하나를 얻을 때까지 대기 */
  async acquire(priority = false, signal?: AbortSignal): Promise<void> {
    const floor = priority ? 0 : this.reserved;
    for (;;) {
      this.refill();
      if (this.tokens - 1 >= floor) {
        this.tokens--;
        return;
      }
      const deficit = floor + 1 - this.tokens;
      await this.sleep(Math.max(1, Math.ceil((deficit * this.windowMs) / this.limit)), signal);
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.updatedAt;
    if (elapsed > 0) {
      this.tokens = Math.min(this.limit, this.tokens + (elapsed * this.limit) / this.windowMs);
      this.updatedAt = now;
    }
  }
}
