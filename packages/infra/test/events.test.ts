import { describe, it, expect, vi, afterEach } from 'vitest';
import { createTypedEmitter, getEventBus, resetEventBus } from '../src/events.js';

describe('createTypedEmitter', () => {
  it('등록된 리스너에 인자를 전달한다', () => {
    interface ShardEvents {
      'shard:ready': (shardId: number) => void;
    }
    const emitter = createTypedEmitter<ShardEvents>();
    const listener = vi.fn();
    emitter.on('shard:ready', listener);
    expect(emitter.emit('shard:ready', 3)).toBe(true);
    expect(listener).toHaveBeenCalledWith(3);
    emitter.off('shard:ready', listener);
    expect(emitter.listenerCount('shard:ready')).toBe(0);
  });
});

describe('getEventBus', () => {
  afterEach(() => {
    resetEventBus();
  });

  it('싱글턴을 반환한다', () => {
    expect(getEventBus()).toBe(getEventBus());
  });

  it('reset 후 새 인스턴스이며 리스너가 제거된다', () => {
    const bus = getEventBus();
    const listener = vi.fn();
    bus.on('rest:bucket:migrate', listener);
    resetEventBus();

    expect(getEventBus()).not.toBe(bus);
    bus.emit('rest:bucket:migrate', 'GET /a:///', 'abc:///');
    expect(listener).not.toHaveBeenCalled();
  });
});
