import { describe, it, expect, vi } from 'vitest';
import { ConnectionRateLimiter } from '../src/connection-rate-limiter.js';

function createLimiter() {
  let now = 0;
  const sleep = vi.fn(async (ms: number) => {
    now += ms;
  });
  const limiter = new ConnectionRateLimiter({
    limit: 5,
    windowMs: 1000,
    reserved: 2,
    now: () => now,
    sleep,
  });
  return { limiter, sleep };
}

describe('ConnectionRateLimiter', () => {
  it('일반 프레임은 reserved를 남기고 멈춘다', async () => {
    const { limiter, sleep } = createLimiter();
    for (let i = 0; i < 3; i++) {
      await limiter.acquire();
    }
    expect(limiter.remaining).toBe(0);
    expect(sleep).not.toHaveBeenCalled();

    // 남은 몫은 우선 프레임만 쓸 수 있다
    await limiter.acquire(true);
    await limiter.acquire(true);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('한도를 넘으면 토큰 하나가 찰 때까지 기다린다', async () => {
    const { limiter, sleep } = createLimiter();
    for (let i = 0; i < 3; i++) {
      await limiter.acquire();
    }
    await limiter.acquire();

    // 1000ms에 5개 → 200ms에 1개
    expect(sleep).toHaveBeenCalledOnce();
    expect(sleep).toHaveBeenCalledWith(200, undefined);
    expect(limiter.remaining).toBe(0);
  });

  it('윈도우 경계에서 한도의 두 배를 몰아 보내지 않는다', async () => {
    const { limiter, sleep } = createLimiter();
    for (let i = 0; i < 5; i++) {
      await limiter.acquire(true);
    }
    expect(sleep).not.toHaveBeenCalled();

    for (let i = 0; i < 5; i++) {
      await limiter.acquire(true);
    }
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 200, 200, 200, 200]);
  });

  it('reserved는 limit를 넘지 않는다', () => {
    const limiter = new ConnectionRateLimiter({ limit: 2, reserved: 5 });
    expect(limiter.reserved).toBe(2);
    expect(limiter.remaining).toBe(0);
  });
});
