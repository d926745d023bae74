import { describe, it, expect, vi } from 'vitest';
import { retry, resolveRetryConfig } from '../src/retry.js';

const transient = () => Object.assign(new Error('fail'), { code: 'ECONNRESET' });

describe('resolveRetryConfig', () => {
  it('기본값을 적용한다', () => {
    expect(resolveRetryConfig()).toEqual({
      maxAttempts: 3,
      minDelay: 1000,
      maxDelay: 30000,
      jitter: true,
    });
  });

  it('부분 설정을 병합한다', () => {
    const config = resolveRetryConfig({ maxAttempts: 5, jitter: false });
    expect(config.maxAttempts).toBe(5);
    expect(config.minDelay).toBe(1000);
    expect(config.jitter).toBe(false);
  });
});

describe('retry', () => {
  it('첫 시도 성공 시 즉시 반환한다', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(retry(fn, { maxAttempts: 3, minDelay: 10 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(0);
  });

  it('일시적 에러 후 재시도하여 성공한다', async () => {
    const fn = vi.fn().mockRejectedValueOnce(transient()).mockResolvedValue('ok');
    await expect(retry(fn, { maxAttempts: 3, minDelay: 10, jitter: false })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenLastCalledWith(1);
  });

  it('maxAttempts 초과 시 마지막 에러를 던진다', async () => {
    const fn = vi.fn().mockRejectedValue(transient());
    await expect(retry(fn, { maxAttempts: 2, minDelay: 10, jitter: false })).rejects.toThrow(
      'fail',
    );
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('shouldRetry가 false이면 즉시 throw한다', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));
    await expect(
      retry(fn, { maxAttempts: 3, minDelay: 10, shouldRetry: () => false }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('signal이 abort되면 즉시 throw한다', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(retry(fn, { maxAttempts: 3, signal: controller.signal })).rejects.toThrow(
      'Retry aborted',
    );
    expect(fn).not.toHaveBeenCalled();
  });

  it('onRetry 콜백에 attempt와 지연을 넘긴다', async () => {
    const err = transient();
    const fn = vi.fn().mockRejectedValueOnce(err).mockResolvedValue('ok');
    const onRetry = vi.fn();
    await retry(fn, { maxAttempts: 3, minDelay: 10, jitter: false, onRetry });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(err, 0, 10);
  });

  it('비일시적 에러는 재시도하지 않는다 (기본 shouldRetry)', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('not transient'));
    await expect(retry(fn, { maxAttempts: 3, minDelay: 10 })).rejects.toThrow('not transient');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('주입한 sleep과 난수원으로 백오프를 계산한다', async () => {
    const fn = vi.fn().mockRejectedValueOnce(transient()).mockRejectedValueOnce(transient()).mockResolvedValue('ok');
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    await expect(retry(fn, { maxAttempts: 3, minDelay: 100, random: () => 0.5, sleep })).resolves.toBe('ok');
    // 100 + floor(0.5 * 10), 200 + floor(0.5 * 20)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([105, 210]);
  });
});
