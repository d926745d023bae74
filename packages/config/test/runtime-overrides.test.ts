// packages/config/test/runtime-overrides.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import {
  setOverride,
  unsetOverride,
  applyOverrides,
  resetOverrides,
  getOverrideCount,
} from '../src/runtime-overrides.js';

describe('runtime-overrides', () => {
  beforeEach(() => {
    resetOverrides();
  });

  it('오버라이드가 없으면 원본을 그대로 반환한다', () => {
    const raw = { gateway: { intents: 1 } };
    expect(applyOverrides(raw)).toBe(raw);
  });

  it('중첩 경로에 값을 설정하고 형제 키를 유지한다', () => {
    setOverride('gateway.intents', 32767);
    expect(applyOverrides({ gateway: { intents: 513, largeThreshold: 100 } })).toEqual({
      gateway: { intents: 32767, largeThreshold: 100 },
    });
  });

  it('없는 섹션도 만들어 낸다', () => {
    setOverride('gateway.sendLimit.reserved', 5);
    expect(applyOverrides({})).toEqual({ gateway: { sendLimit: { reserved: 5 } } });
    expect(applyOverrides('not-an-object')).toEqual({ gateway: { sendLimit: { reserved: 5 } } });
  });

  it('unset/reset으로 오버라이드를 제거한다', () => {
    setOverride('gateway.intents', 1);
    setOverride('logging.level', 'debug');
    expect(getOverrideCount()).toBe(2);
    unsetOverride('gateway.intents');
    expect(getOverrideCount()).toBe(1);
    resetOverrides();
    expect(getOverrideCount()).toBe(0);
  });

  it('원본을 변경하지 않는다', () => {
    setOverride('gateway.intents', 9);
    const raw = { gateway: { intents: 513 } };
    applyOverrides(raw);
    expect(raw.gateway.intents).toBe(513);
  });
});
