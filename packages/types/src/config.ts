import type { LogLevel } from './common.js';
import type { GatewayCompression } from './gateway.js';

/** Gatecord 루트 설정 타입 (파일에서 읽은 그대로 -- 모든 필드 optional) */
export interface GatecordConfig {
  auth?: AuthConfig;
  rest?: RestConfig;
  gateway?: GatewayConfig;
  logging?: LoggingConfig;
  meta?: ConfigMeta;
}

export interface AuthConfig {
  token?: string;
}

export interface RestConfig {
  baseUrl?: string;
  version?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  maxRateLimitRetries?: number;
  userAgent?: string;
}

export interface GatewaySendLimitConfig {
  limit?: number;
  windowMs?: number;
  /** 하트비트/identify/resume 전용 예약 슬롯 */
  reserved?: number;
}

export interface GatewayConfig {
  version?: number;
  encoding?: 'json';
  compression?: GatewayCompression;
  intents?: number;
  largeThreshold?: number;
  shard?: [number, number];
  fatalCloseCodes?: number[];
  maxReconnectAttempts?: number;
  helloTimeoutMs?: number;
  maxInvalidSessions?: number;
  sendLimit?: GatewaySendLimitConfig;
}

export interface LoggingConfig {
  level?: LogLevel;
  file?: boolean;
  redactSensitive?: boolean;
  /** 로그 디렉토리 (~/ 확장됨) */
  dir?: string;
}

export interface ConfigMeta {
  lastTouchedVersion?: string;
  lastTouchedAt?: string;
}

/** 기본값 적용 후 설정 -- 런타임 컴포넌트는 이 타입만 받는다 */
export interface ResolvedConfig {
  auth: AuthConfig;
  rest: Required<Omit<RestConfig, 'userAgent'>> & Pick<RestConfig, 'userAgent'>;
  gateway: Required<Omit<GatewayConfig, 'shard' | 'sendLimit'>> &
    Pick<GatewayConfig, 'shard'> & { sendLimit: Required<GatewaySendLimitConfig> };
  logging: Required<Omit<LoggingConfig, 'dir'>> & Pick<LoggingConfig, 'dir'>;
  meta?: ConfigMeta;
}

export interface ConfigValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}
