// packages/infra/src/unhandled-rejections.ts
import { getErrorCode, isGatecordError, isTransientNetworkError } from './errors.js';
import { getEventBus } from './events.js';

export type ErrorLevel = 'abort' | 'fatal' | 'config' | 'transient' | 'unknown';

/**
 * abort      → warn
 * fatal      → exit (OOM 등)
 * config     → exit (토큰/설정 문제, 치명적 close 코드)
 * transient  → warn (네트워크)
 * unknown    → exit
 */
type RejectionLogger = {
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

/** 분류 후 로그/이벤트/종료를 수행하는 핸들러 생성 */
export function createUnhandledRejectionHandler(
  logger: RejectionLogger,
  exit: (code: number) => void = (code) => process.exit(code),
): (reason: unknown) => void {
  return (reason: unknown): void => {
    const level = classifyError(reason);
    getEventBus().emit('system:unhandledRejection', level, reason);

    switch (level) {
      case 'abort':
      case 'transient':
        logger.warn(`Unhandled rejection (${level}): ${formatReason(reason)}`);
        break;
      default:
        logger.error(`Fatal unhandled rejection (${level}): ${formatReason(reason)}`);
        exit(1);
    }
  };
}

/** process에 핸들러를 등록하고 해제 함수를 반환 */
export function setupUnhandledRejectionHandler(
  logger: RejectionLogger,
  exit?: (code: number) => void,
): () => void {
  const handler = createUnhandledRejectionHandler(logger, exit);
  process.on('unhandledRejection', handler);
  return () => {
    process.off('unhandledRejection', handler);
  };
}

/** 에러 분류 (테스트에서도 사용) */
export function classifyError(err: unknown): ErrorLevel {
  if (err instanceof Error && err.name === 'AbortError') {
    return 'abort';
  }
  if (isFatalError(err)) {
    return 'fatal';
  }
  if (isConfigError(err)) {
    return 'config';
  }
  if (isTransientNetworkError(err)) {
    return 'transient';
  }
  return 'unknown';
}

function isFatalError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  const msg = err.message.toLowerCase();
  return (
    msg.includes('out of memory') ||
    msg.includes('heap') ||
    msg.includes('stack overflow') ||
    getErrorCode(err) === 'ERR_WORKER_OUT_OF_MEMORY'
  );
}

const CONFIG_ERROR_CODES = new Set([
  'CONFIG_ERROR',
  'INVALID_CONFIG',
  'MISSING_ENV_VAR',
  'UNAUTHORIZED',
  'FORBIDDEN',
  'GATEWAY_CLOSED',
]);

function isConfigError(err: unknown): boolean {
  if (isGatecordError(err) && CONFIG_ERROR_CODES.has(err.code)) {
    // 재개 가능한 close는 설정 문제가 아니다
    return !(err.code === 'GATEWAY_CLOSED' && err.details?.resumable === true);
  }
  if (!(err instanceof Error)) {
    return false;
  }
  const msg = err.message.toLowerCase();
  return (
    msg.includes('invalid config') ||
    msg.includes('authentication failed') ||
    msg.includes('invalid token')
  );
}

function formatReason(reason: unknown): string {
  if (reason instanceof Error) {
    return `${reason.name}: ${reason.message}`;
  }
  return String(reason);
}
