// packages/infra/src/errors.ts

/** Gatecord 기본 에러: 모든 커스텀 에러의 상위 클래스 */
export class GatecordError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly isOperational: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    opts: {
      statusCode?: number;
      isOperational?: boolean;
      cause?: Error;
      details?: Record<string, unknown>;
    } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = 'GatecordError';
    this.code = code;
    this.statusCode = opts.statusCode ?? 500;
    this.isOperational = opts.isOperational ?? true;
    this.details = opts.details;
  }
}

/** 작업이 취소됨 (close/dispose 등) */
export class AbortedError extends GatecordError {
  constructor(what: string) {
    super(`${what} aborted`, 'ABORTED', { statusCode: 499 });
    this.name = 'AbortError';
  }
}

// ──────────────────────────────────────────────
// 도메인 에러 co-location 원칙:
//   ConfigError      → packages/config/src/errors.ts
//   HttpError 계열   → packages/rest/src/errors.ts
//   GatewayError 계열 → packages/gateway/src/errors.ts
// ──────────────────────────────────────────────

/** 타입 가드 */
export function isGatecordError(err: unknown): err is GatecordError {
  return err instanceof GatecordError;
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/** errno 계열 코드 추출 (fetch는 cause에 원래 에러를 담는다) */
export function getErrorCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) {
    return undefined;
  }
  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return err.cause instanceof Error ? getErrorCode(err.cause) : undefined;
}

/** 재시도해도 되는 네트워크 에러인지 판별 */
export function isTransientNetworkError(err: unknown): boolean {
  return TRANSIENT_NETWORK_CODES.has(getErrorCode(err) ?? '');
}
