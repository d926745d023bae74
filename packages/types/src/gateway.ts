/**
 * 게이트웨이 오프코드 (와이어 값 고정)
 */
export const GatewayOpcode = {
  DISPATCH: 0,
  HEARTBEAT: 1,
  IDENTIFY: 2,
  RESUME: 6,
  RECONNECT: 7,
  REQUEST_GUILD_MEMBERS: 8,
  INVALID_SESSION: 9,
  HELLO: 10,
  HEARTBEAT_ACK: 11,
} as const;

export type GatewayOpcode = (typeof GatewayOpcode)[keyof typeof GatewayOpcode];

/**
 * 게이트웨이 종료 코드
 *
 * 4000번대는 플랫폼이 보내는 코드, 1000번대는 WebSocket 표준 코드.
 */
export const GatewayCloseCode = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  ABNORMAL: 1006,
  UNKNOWN_ERROR: 4000,
  UNKNOWN_OPCODE: 4001,
  DECODE_ERROR: 4002,
  NOT_AUTHENTICATED: 4003,
  AUTHENTICATION_FAILED: 4004,
  ALREADY_AUTHENTICATED: 4005,
  INVALID_SEQ: 4007,
  RATE_LIMITED: 4008,
  SESSION_TIMED_OUT: 4009,
  INVALID_SHARD: 4010,
  SHARDING_REQUIRED: 4011,
  INVALID_API_VERSION: 4012,
  INVALID_INTENTS: 4013,
  DISALLOWED_INTENTS: 4014,
} as const;

/** 재연결하면 안 되는 기본 종료 코드 목록 (설정으로 교체 가능) */
export const DEFAULT_FATAL_CLOSE_CODES: readonly number[] = [
  GatewayCloseCode.AUTHENTICATION_FAILED,
  GatewayCloseCode.INVALID_SHARD,
  GatewayCloseCode.SHARDING_REQUIRED,
  GatewayCloseCode.INVALID_API_VERSION,
  GatewayCloseCode.INVALID_INTENTS,
  GatewayCloseCode.DISALLOWED_INTENTS,
];

/** 게이트웨이 와이어 프레임 */
export interface GatewayFrame<D = unknown> {
  op: number;
  d: D;
  s?: number | null;
  t?: string | null;
}

/** 소비자에게 전달되는 디스패치 이벤트 */
export interface DispatchEvent<T = Record<string, unknown>> {
  type: string;
  data: T;
  sequence: number;
}

export interface HelloData {
  heartbeat_interval: number;
}

/** READY 디스패치에서 세션이 참조하는 필드 */
export interface ReadyData {
  session_id: string;
  resume_gateway_url?: string;
}

export interface IdentifyProperties {
  os: string;
  browser: string;
  device: string;
}

export interface IdentifyPayload {
  token: string;
  properties: IdentifyProperties;
  compress: boolean;
  large_threshold: number;
  intents: number;
  shard?: [shardId: number, shardCount: number];
}

export interface ResumePayload {
  token: string;
  session_id: string;
  seq: number;
}

export interface RequestGuildMembersPayload {
  guild_id: string;
  limit: number;
  query?: string;
  presences?: boolean;
  user_ids?: string | string[];
  nonce?: string;
}

/** 게이트웨이 전송 압축 방식 */
export type GatewayCompression = 'zlib-stream' | 'payload' | 'none';

/** 세션 상태 머신 */
export type GatewaySessionState =
  | 'connecting'
  | 'awaiting-hello'
  | 'identifying'
  | 'resuming'
  | 'ready'
  | 'closed';

/** 재개(resume)에 필요한 세션 상태 스냅샷 */
export interface ResumeState {
  sessionId: string;
  sequence: number;
  resumeUrl?: string;
}
