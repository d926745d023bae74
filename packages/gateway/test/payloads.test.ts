import { describe, it, expect } from 'vitest';
import {
  DEFAULT_IDENTIFY_PROPERTIES,
  buildGatewayUrl,
  buildHeartbeat,
  buildIdentify,
  buildRequestGuildMembers,
  buildResume,
} from '../src/payloads.js';

describe('buildGatewayUrl', () => {
  it('v, encoding, compress 쿼리를 붙인다', () => {
    expect(
      buildGatewayUrl('wss://gateway.test', { version: 10, encoding: 'json', compression: 'zlib-stream' }),
    ).toBe('wss://gateway.test/?v=10&encoding=json&compress=zlib-stream');
  });

  it('zlib-stream이 아니면 compress를 빼고 기존 쿼리는 덮어쓴다', () => {
    expect(
      buildGatewayUrl('wss://gateway.test/?v=6&compress=zlib-stream', {
        version: 10,
        encoding: 'json',
        compression: 'payload',
      }),
    ).toBe('wss://gateway.test/?v=10&encoding=json');
  });
});

describe('control payloads', () => {
  it('identify: 샤드가 있을 때만 shard 필드', () => {
    expect(
      buildIdentify({
        token: 'test-token',
        intents: 513,
        largeThreshold: 250,
        compression: 'zlib-stream',
      }),
    ).toEqual({
      op: 2,
      d: {
        token: 'test-token',
        properties: DEFAULT_IDENTIFY_PROPERTIES,
        compress: false,
        large_threshold: 250,
        intents: 513,
      },
    });

    const sharded = buildIdentify({
      token: 'test-token',
      intents: 1,
      largeThreshold: 50,
      compression: 'payload',
      shard: [1, 4],
    });
    expect(sharded.d.shard).toEqual([1, 4]);
    expect(sharded.d.compress).toBe(true);
  });

  it('resume / heartbeat', () => {
    expect(buildResume('test-token', 'abc', 42)).toEqual({
      op: 6,
      d: { token: 'test-token', session_id: 'abc', seq: 42 },
    });
    expect(buildHeartbeat(undefined)).toEqual({ op: 1, d: null });
    expect(buildHeartbeat(7)).toEqual({ op: 1, d: 7 });
  });
});

describe('buildRequestGuildMembers', () => {
  it('query와 userIds가 없으면 query는 빈 문자열', () => {
    expect(buildRequestGuildMembers({ guildId: 'g1' })).toEqual({
      op: 8,
      d: { guild_id: 'g1', limit: 0, query: '' },
    });
  });

  it('userIds가 있으면 query를 넣지 않는다', () => {
    expect(buildRequestGuildMembers({ guildId: 'g1', userIds: ['u1', 'u2'], nonce: 'n' }).d).toEqual({
      guild_id: 'g1',
      limit: 0,
      user_ids: ['u1', 'u2'],
      nonce: 'n',
    });
  });

  it('presences와 명시한 query는 그대로', () => {
    expect(
      buildRequestGuildMembers({ guildId: 'g1', limit: 10, presences: true, query: 'ab' }).d,
    ).toEqual({ guild_id: 'g1', limit: 10, presences: true, query: 'ab' });
  });
});
