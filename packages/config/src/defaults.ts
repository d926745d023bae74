// packages/config/src/defaults.ts
import type { GatecordConfig, ResolvedConfig } from '@gatecord/types';
import { DEFAULT_FATAL_CLOSE_CODES } from '@gatecord/types';

type Defaults = Omit<ResolvedConfig, 'auth' | 'meta'>;

/**
 * 불변 기본값
 *
 * Zod .default()를 쓰지 않고 파이프라인의 명시적 단계로 분리한다.
 */
const DEFAULTS: Readonly<Defaults> = Object.freeze({
  rest: {
    baseUrl: 'https://discord.com/api',
    version: 10,
    timeoutMs: 15_000,
    maxAttempts: 3,
    retryBaseDelayMs: 1000,
    maxRateLimitRetries: 5,
  },
  gateway: {
    version: 10,
    encoding: 'json',
    compression: 'zlib-stream',
    // GUILDS | GUILD_MESSAGES
    intents: 513,
    largeThreshold: 250,
    fatalCloseCodes: [...DEFAULT_FATAL_CLOSE_CODES],
    maxReconnectAttempts: 10,
    helloTimeoutMs: 30_000,
    maxInvalidSessions: 5,
    sendLimit: { limit: 120, windowMs: 60_000, reserved: 3 },
  },
  logging: {
    level: 'info',
    file: false,
    redactSensitive: true,
  },
});

/**
 * 기본값을 유저 설정에 적용 (유저 값 우선)
 *
 * auth.token이 없으면 DISCORD_TOKEN 환경변수를 사용한다.
 */
export function applyDefaults(
  user: GatecordConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const rest = user.rest ?? {};
  const gateway = user.gateway ?? {};
  const sendLimit = gateway.sendLimit ?? {};
  const logging = user.logging ?? {};
  const d = DEFAULTS;

  return {
    auth: { token: user.auth?.token ?? (env.DISCORD_TOKEN || undefined) },
    rest: {
      baseUrl: rest.baseUrl ?? d.rest.baseUrl,
      version: rest.version ?? d.rest.version,
      timeoutMs: rest.timeoutMs ?? d.rest.timeoutMs,
      maxAttempts: rest.maxAttempts ?? d.rest.maxAttempts,
      retryBaseDelayMs: rest.retryBaseDelayMs ?? d.rest.retryBaseDelayMs,
      maxRateLimitRetries: rest.maxRateLimitRetries ?? d.rest.maxRateLimitRetries,
      userAgent: rest.userAgent,
    },
    gateway: {
      version: gateway.version ?? d.gateway.version,
      encoding: gateway.encoding ?? d.gateway.encoding,
      compression: gateway.compression ?? d.gateway.compression,
      intents: gateway.intents ?? d.gateway.intents,
      largeThreshold: gateway.largeThreshold ?? d.gateway.largeThreshold,
      shard: gateway.shard,
      fatalCloseCodes: gateway.fatalCloseCodes ?? [...d.gateway.fatalCloseCodes],
      maxReconnectAttempts: gateway.maxReconnectAttempts ?? d.gateway.maxReconnectAttempts,
      helloTimeoutMs: gateway.helloTimeoutMs ?? d.gateway.helloTimeoutMs,
      maxInvalidSessions: gateway.maxInvalidSessions ?? d.gateway.maxInvalidSessions,
      sendLimit: {
        limit: sendLimit.limit ?? d.gateway.sendLimit.limit,
        windowMs: sendLimit.windowMs ?? d.gateway.sendLimit.windowMs,
        reserved: sendLimit.reserved ?? d.gateway.sendLimit.reserved,
      },
    },
    logging: {
      level: logging.level ?? d.logging.level,
      file: logging.file ?? d.logging.file,
      redactSensitive: logging.redactSensitive ?? d.logging.redactSensitive,
      dir: logging.dir,
    },
    meta: user.meta,
  };
}

/** 기본값 조회 (읽기 전용) */
export function getDefaults(): Readonly<Defaults> {
  return DEFAULTS;
}
