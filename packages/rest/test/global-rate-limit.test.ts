import { describe, it, expect, vi } from 'vitest';
import { AbortedError } from '@gatecord/infra';
import { GlobalRateLimit } from '../src/global-rate-limit.js';
import { deferred } from './helpers.js';

describe('GlobalRateLimit', () => {
  it('열려 있으면 wait는 바로 통과한다', async () => {
    const gate = new GlobalRateLimit();
    expect(gate.active).toBe(false);
    await expect(gate.wait()).resolves.toBeUndefined();
  });

  it('hold가 끝날 때까지 wait를 막는다', async () => {
    const gate = new GlobalRateLimit();
    const timer = deferred();
    const sleep = vi.fn(() => timer.promise);

    const holding = gate.hold(1000, sleep);
    expect(gate.active).toBe(true);
    expect(sleep).toHaveBeenCalledWith(1000, undefined);

    const passed = vi.fn();
    const waiting = gate.wait().then(passed);
    await Promise.resolve();
    expect(passed).not.toHaveBeenCalled();

    timer.resolve();
    await holding;
    await waiting;
    expect(passed).toHaveBeenCalledOnce();
    expect(gate.active).toBe(false);
  });

  it('겹친 hold는 마지막 것이 끝날 때 연다', async () => {
    const gate = new GlobalRateLimit();
    const a = deferred();
    const b = deferred();
    const first = gate.hold(100, () => a.promise);
    const second = gate.hold(200, () => b.promise);

    a.resolve();
    await first;
    expect(gate.active).toBe(true);

    b.resolve();
    await second;
    expect(gate.active).toBe(false);
  });

  it('abort되면 wait가 AbortedError로 끝난다', async () => {
    const gate = new GlobalRateLimit();
    const timer = deferred();
    const holding = gate.hold(1000, () => timer.promise);
    const controller = new AbortController();

    const waiting = gate.wait(controller.signal);
    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(AbortedError);

    gate.clear();
    expect(gate.active).toBe(false);
    timer.resolve();
    await holding;
  });
});
