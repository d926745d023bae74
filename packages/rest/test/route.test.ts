import { describe, it, expect } from 'vitest';
import { RouteParameterError } from '../src/errors.js';
import { compileRoute, getBucketKey, getMajorParams, getRouteKey } from '../src/route.js';

describe('compileRoute', () => {
  it('파라미터를 URL 인코딩해서 채운다', () => {
    expect(
      compileRoute('/webhooks/{webhook_id}/{webhook_token}', {
        webhook_id: '42',
        webhook_token: 'a/b c',
      }),
    ).toBe('/webhooks/42/a%2Fb%20c');
  });

  it('숫자와 bigint도 문자열로 바꾼다', () => {
    expect(compileRoute('/guilds/{guild_id}/members/{user_id}', { guild_id: 7, user_id: 9n })).toBe(
      '/guilds/7/members/9',
    );
  });

  it('누락된 파라미터는 RouteParameterError', () => {
    expect(() => compileRoute('/channels/{channel_id}/messages', {})).toThrow(RouteParameterError);
    expect(() => compileRoute('/channels/{channel_id}/messages')).toThrow(
      'Missing route parameter "channel_id" for /channels/{channel_id}/messages',
    );
  });

  it('@original 같은 고정 세그먼트는 그대로 둔다', () => {
    expect(
      compileRoute('/webhooks/{webhook_id}/{webhook_token}/messages/@original', {
        webhook_id: '1',
        webhook_token: 't',
      }),
    ).toBe('/webhooks/1/t/messages/@original');
  });
});

describe('getMajorParams', () => {
  it('메이저 파라미터만 뽑는다', () => {
    expect(getMajorParams({ channel_id: '1', message_id: '2', guild_id: 3 })).toEqual({
      channelId: '1',
      guildId: '3',
      webhookId: undefined,
      webhookToken: undefined,
    });
  });
});

describe('bucket keys', () => {
  it('라우트 키는 메서드 + 템플릿', () => {
    expect(getRouteKey('PATCH', '/channels/{channel_id}')).toBe('PATCH /channels/{channel_id}');
  });

  it('없는 메이저 파라미터는 빈 문자열', () => {
    expect(getBucketKey('abc', { channelId: '1' })).toBe('abc:1///');
    expect(getBucketKey('abc', { webhookId: 'w', webhookToken: 't' })).toBe('abc://w/t');
  });
});
