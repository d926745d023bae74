// packages/gateway/src/payloads.ts
import type {
  GatewayCompression,
  GatewayFrame,
  HelloData,
  IdentifyPayload,
  IdentifyProperties,
  ReadyData,
  RequestGuildMembersPayload,
  ResumePayload,
} from '@gatecord/types';
import { GatewayOpcode } from '@gatecord/types';

export interface GatewayUrlOptions {
  version: number;
  encoding: 'json';
  compression: GatewayCompression;
}

/** 부트스트랩/재개 URL에 v, encoding, compress 쿼리를 붙인다 */
export function buildGatewayUrl(base: string, opts: GatewayUrlOptions): string {
  const url = new URL(base);
  url.searchParams.set('v', String(opts.version));
  url.searchParams.set('encoding', opts.encoding);
  if (opts.compression === 'zlib-stream') {
    url.searchParams.set('compress', 'zlib-stream');
  } else {
    url.searchParams.delete('compress');
  }
  return url.toString();
}

export interface IdentifyOptions {
  token: string;
  intents: number;
  largeThreshold: number;
  compression: GatewayCompression;
  shard?: readonly [number, number];
  properties?: IdentifyProperties;
}

export const DEFAULT_IDENTIFY_PROPERTIES: IdentifyProperties = {
  os: process.platform,
  browser: 'gatecord',
  device: 'gatecord',
};

export function buildIdentify(opts: IdentifyOptions): GatewayFrame<IdentifyPayload> {
  const d: IdentifyPayload = {
    token: opts.token,
    properties: opts.properties ?? DEFAULT_IDENTIFY_PROPERTIES,
    // zlib-stream은 전송 레벨 압축이라 payload 압축은 끈다
    compress: opts.compression === 'payload',
    large_threshold: opts.largeThreshold,
    intents: opts.intents,
  };
  if (opts.shard) {
    d.shard = [opts.shard[0], opts.shard[1]];
  }
  return { op: GatewayOpcode.IDENTIFY, d };
}

export function buildResume(token: string, sessionId: string, seq: number): GatewayFrame<ResumePayload> {
  return { op: GatewayOpcode.RESUME, d: { token, session_id: sessionId, seq } };
}

export function buildHeartbeat(sequence: number | undefined): GatewayFrame<number | null> {
  return { op: GatewayOpcode.HEARTBEAT, d: sequence ?? null };
}

export interface RequestGuildMembersOptions {
  guildId: string;
  limit?: number;
  presences?: boolean;
  nonce?: string;
  userIds?: string | string[];
  query?: string;
}

/** op 8: query와 userIds가 모두 없으면 query는 "" (전체 멤버) */
export function buildRequestGuildMembers(
  opts: RequestGuildMembersOptions,
): GatewayFrame<RequestGuildMembersPayload> {
  const d: RequestGuildMembersPayload = { guild_id: opts.guildId, limit: opts.limit ?? 0 };
  const hasUserIds = Array.isArray(opts.userIds) ? opts.userIds.length > 0 : Boolean(opts.userIds);
  if (opts.presences) {
    d.presences = true;
  }
  if (opts.nonce) {
    d.nonce = opts.nonce;
  }
  if (opts.userIds !== undefined && hasUserIds) {
    d.user_ids = opts.userIds;
  }
  if (opts.query !== undefined) {
    d.query = opts.query;
  } else if (!hasUserIds) {
    d.query = '';
  }
  return { op: GatewayOpcode.REQUEST_GUILD_MEMBERS, d };
}

// ── 수신 페이로드 판별 ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isHelloData(value: unknown): value is HelloData {
  return (
    isRecord(value) &&
    typeof value.heartbeat_interval === 'number' &&
    value.heartbeat_interval > 0
  );
}

export function isReadyData(value: unknown): value is ReadyData {
  return (
    isRecord(value) &&
    typeof value.session_id === 'string' &&
    (value.resume_gateway_url === undefined || typeof value.resume_gateway_url === 'string')
  );
}

/** 디스패치 데이터 (객체가 아니면 빈 객체) */
export function toDispatchData(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
