import type { GatewayFrame, IdentifyPayload } from '@gatecord/types';
import { DEFAULT_FATAL_CLOSE_CODES, GatewayCloseCode, GatewayOpcode } from '@gatecord/types';
import { describe, it, expect, expectTypeOf } from 'vitest';

describe('GatewayOpcode', () => {
  it('와이어 값이 고정되어 있다', () => {
    expect(GatewayOpcode).toEqual({
      DISPATCH: 0,
      HEARTBEAT: 1,
      IDENTIFY: 2,
      RESUME: 6,
      RECONNECT: 7,
      REQUEST_GUILD_MEMBERS: 8,
      INVALID_SESSION: 9,
      HELLO: 10,
      HEARTBEAT_ACK: 11,
    });
  });

  it('GatewayOpcode 타입은 값 유니온이다', () => {
    expectTypeOf<GatewayOpcode>().toEqualTypeOf<0 | 1 | 2 | 6 | 7 | 8 | 9 | 10 | 11>();
  });
});

describe('DEFAULT_FATAL_CLOSE_CODES', () => {
  it('인증 실패와 인텐트/샤드/버전 오류를 포함한다', () => {
    expect(DEFAULT_FATAL_CLOSE_CODES).toEqual([4004, 4010, 4011, 4012, 4013, 4014]);
  });

  it('일반 종료와 세션 타임아웃은 포함하지 않는다', () => {
    expect(DEFAULT_FATAL_CLOSE_CODES).not.toContain(GatewayCloseCode.NORMAL);
    expect(DEFAULT_FATAL_CLOSE_CODES).not.toContain(GatewayCloseCode.SESSION_TIMED_OUT);
  });
});

describe('IdentifyPayload', () => {
  it('shard는 선택적 2-튜플이다', () => {
    expectTypeOf<IdentifyPayload['shard']>().toEqualTypeOf<[number, number] | undefined>();
  });

  it('GatewayFrame의 s/t는 null을 허용한다', () => {
    const frame: GatewayFrame = { op: 11, d: null, s: null, t: null };
    expect(frame.op).toBe(GatewayOpcode.HEARTBEAT_ACK);
  });
});
