// packages/rest/src/route.ts
import type { HttpMethod, MajorParams, RouteParams } from '@gatecord/types';
import { RouteParameterError } from './errors.js';

const PARAM_PATTERN = /\{([a-z_]+)\}/g;

/** `{channel_id}` 자리에 URL 인코딩한 값을 채운다 */
export function compileRoute(route: string, params: RouteParams = {}): string {
  return route.replace(PARAM_PATTERN, (_, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new RouteParameterError(route, name);
    }
    return encodeURIComponent(String(value));
  });
}

/** 버킷을 나누는 메이저 파라미터만 추출 */
export function getMajorParams(params: RouteParams = {}): MajorParams {
  const pick = (name: string): string | undefined => {
    const value = params[name];
    return value === undefined ? undefined : String(value);
  };
  return {
    channelId: pick('channel_id'),
    guildId: pick('guild_id'),
    webhookId: pick('webhook_id'),
    webhookToken: pick('webhook_token'),
  };
}

/** 버킷 ID를 모를 때 쓰는 라우트 키 */
export function getRouteKey(method: HttpMethod, route: string): string {
  return `${method} ${route}`;
}

/** 버킷 ID(또는 라우트 키) + 메이저 파라미터 → 레지스트리 키 */
export function getBucketKey(base: string, major: MajorParams): string {
  const { channelId = '', guildId = '', webhookId = '', webhookToken = '' } = major;
  return `${base}:${channelId}/${guildId}/${webhookId}/${webhookToken}`;
}
