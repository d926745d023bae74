// @gatecord/infra: barrel export

// 에러
export {
  GatecordError,
  AbortedError,
  isGatecordError,
  getErrorCode,
  isTransientNetworkError,
} from './errors.js';

// 백오프/재시도/동시성
export {
  computeBackoff,
  computeLinearBackoff,
  computeJitter,
  sleepWithAbort,
  type BackoffOptions,
} from './backoff.js';
export { retry, resolveRetryConfig, type RetryOptions } from './retry.js';
export { AsyncLock, type AsyncLockOptions } from './async-lock.js';

// 유틸
export { formatDuration } from './format-duration.js';

// 컨텍스트
export { runWithContext, getContext, type RequestContext } from './context.js';

// 환경/설정
export {
  assertSupportedRuntime,
  getNodeMajorVersion,
  MINIMUM_NODE_VERSION,
} from './runtime-guard.js';
export { getEnv } from './env.js';
export { getStateDir, getConfigDir, getLogDir } from './paths.js';

// 로깅
export {
  createLogger,
  createSilentLogger,
  defaultLoggerFactory,
  DEFAULT_REDACT_KEYS,
  type LoggerConfig,
  type LoggerFactory,
  type GatecordLogger,
} from './logger.js';
export {
  attachFileTransport,
  rotateFiles,
  RotatingLogFile,
  type FileTransportConfig,
} from './logger-transports.js';

// 이벤트
export {
  createTypedEmitter,
  getEventBus,
  resetEventBus,
  type EventMap,
  type TypedEmitter,
  type GatecordEventMap,
} from './events.js';

// 프로세스
export {
  setupUnhandledRejectionHandler,
  createUnhandledRejectionHandler,
  classifyError,
  type ErrorLevel,
} from './unhandled-rejections.js';
