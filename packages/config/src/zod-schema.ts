// packages/config/src/zod-schema.ts
import { z } from 'zod/v4';

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

/** 인증 스키마 */
const AuthSchema = z.strictObject({
  token: z.string().min(1),
});

/** REST 설정 스키마 */
const RestSchema = z.strictObject({
  baseUrl: z.url(),
  version: z.number().int().min(6),
  timeoutMs: z.number().int().min(1),
  maxAttempts: z.number().int().min(1).max(10),
  retryBaseDelayMs: z.number().int().min(0),
  maxRateLimitRetries: z.number().int().min(0),
  userAgent: z.string().min(1),
});

/** 게이트웨이 송신 제한 스키마 */
const SendLimitSchema = z
  .strictObject({
    limit: z.number().int().min(1),
    windowMs: z.number().int().min(1),
    reserved: z.number().int().min(0),
  })
  .partial();

/** [shardId, shardCount]: shardId < shardCount */
const ShardSchema = z
  .tuple([z.number().int().min(0), z.number().int().min(1)])
  .refine(([id, count]) => id < count, 'shard id must be less than shard count');

/** 게이트웨이 설정 스키마 */
const GatewaySchema = z.strictObject({
  version: z.number().int().min(6),
  encoding: z.literal('json'),
  compression: z.enum(['zlib-stream', 'payload', 'none']),
  intents: z.number().int().min(0),
  largeThreshold: z.number().int().min(50).max(250),
  shard: ShardSchema,
  fatalCloseCodes: z.array(z.number().int().min(1000).max(4999)),
  maxReconnectAttempts: z.number().int().min(1),
  helloTimeoutMs: z.number().int().min(1),
  maxInvalidSessions: z.number().int().min(1),
  sendLimit: SendLimitSchema,
});

/** 로깅 설정 스키마 */
const LoggingSchema = z.strictObject({
  level: LogLevelSchema,
  file: z.boolean(),
  redactSensitive: z.boolean(),
  dir: z.string().min(1),
});

/**
 * GatecordConfig 루트 스키마
 *
 * - z.strictObject() 사용: 알 수 없는 키 감지 (오타 방지)
 * - 모든 최상위 섹션은 optional (빈 {} 허용)
 * - .default()는 사용하지 않음: defaults.ts에서 별도 적용
 */
export const GatecordConfigSchema = z.strictObject({
  auth: AuthSchema.partial().optional(),
  rest: RestSchema.partial().optional(),
  gateway: GatewaySchema.partial().optional(),
  logging: LoggingSchema.partial().optional(),
  meta: z
    .strictObject({
      lastTouchedVersion: z.string().optional(),
      lastTouchedAt: z.string().optional(),
    })
    .optional(),
});

export type ValidatedGatecordConfig = z.infer<typeof GatecordConfigSchema>;
