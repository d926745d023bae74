import type { Snowflake } from './common.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** 경로 템플릿에 치환할 파라미터 (`{channel_id}` → routeParams.channel_id) */
export type RouteParams = Readonly<Record<string, string | number | bigint>>;

/** 레이트 리밋 버킷을 나누는 메이저 파라미터 */
export interface MajorParams {
  channelId?: string;
  guildId?: string;
  webhookId?: string;
  webhookToken?: string;
}

/** 멀티파트 업로드 파일 */
export interface RestFile {
  name: string;
  data: Uint8Array;
  contentType?: string;
}

/** RequestExecutor 입력 */
export interface RestRequest {
  method: HttpMethod;
  /** 경로 템플릿, 예: `/channels/{channel_id}/messages` */
  route: string;
  params?: RouteParams;
  body?: unknown;
  query?: Readonly<Record<string, string | number | boolean>>;
  files?: readonly RestFile[];
  /** X-Audit-Log-Reason 헤더 */
  reason?: string;
  /** false면 전역 레이트 리밋 게이트를 기다리지 않는다 (인터랙션 콜백 등) */
  global?: boolean;
  signal?: AbortSignal;
}

/** 응답 헤더에서 읽은 레이트 리밋 정보 */
export interface RateLimitInfo {
  limit?: number;
  remaining?: number;
  /** 초 단위 epoch */
  reset?: number;
  /** 초 */
  resetAfter?: number;
  bucket?: string;
  global: boolean;
  scope?: 'user' | 'global' | 'shared';
}

/** 429 응답 본문 */
export interface RateLimitBody {
  message: string;
  retry_after: number;
  global: boolean;
  code?: number;
}

/** GET /gateway/bot 응답 */
export interface GatewayBotInfo {
  url: string;
  shards: number;
  session_start_limit: {
    total: number;
    remaining: number;
    reset_after: number;
    max_concurrency: number;
  };
}

/** 엔드포인트 헬퍼가 반환하는 최소 메시지 형태 */
export interface MessageLike {
  id: Snowflake;
  channel_id: Snowflake;
  content?: string;
  [key: string]: unknown;
}
