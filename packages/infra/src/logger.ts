import type { LogLevel } from '@gatecord/types';
// packages/infra/src/logger.ts
import { Logger as TsLogger, type ILogObj } from 'tslog';
import { getContext } from './context.js';
import { attachFileTransport, type FileTransportConfig } from './logger-transports.js';

export interface LoggerConfig {
  name: string;
  level?: LogLevel;
  file?: FileTransportConfig;
  console?: {
    enabled: boolean;
    pretty?: boolean; // 기본: !isCI
  };
  /** 마스킹할 키 목록. 빈 배열이면 마스킹하지 않는다 */
  redactKeys?: string[];
  autoInjectContext?: boolean; // 기본: true
}

/** 로거 팩토리 인터페이스: DI/테스트 교체 지점 */
export interface LoggerFactory {
  create(config: LoggerConfig): GatecordLogger;
}

export interface GatecordLogger {
  trace(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  fatal(msg: string, ...args: unknown[]): void;
  child(name: string): GatecordLogger;
  flush(): Promise<void>;
}

export const DEFAULT_REDACT_KEYS = [
  'token',
  'password',
  'secret',
  'authorization',
  'Authorization',
  'cookie',
  'webhook_token',
  'webhookToken',
];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/** Gatecord 로거 팩토리 (기본 구현) */
export function createLogger(config: LoggerConfig): GatecordLogger {
  const isCI = process.env.CI === 'true';
  const consoleEnabled = config.console?.enabled ?? true;
  const tsLogger = new TsLogger<ILogObj>({
    name: config.name,
    minLevel: LOG_LEVEL_MAP[config.level ?? 'info'],
    type: !consoleEnabled ? 'hidden' : (config.console?.pretty ?? !isCI) ? 'pretty' : 'json',
    maskValuesOfKeys: config.redactKeys ?? DEFAULT_REDACT_KEYS,
    hideLogPositionForProduction: true,
  });

  const flushCallbacks: (() => Promise<void>)[] = [];

  if (config.file?.enabled) {
    const flush = attachFileTransport(tsLogger, config.file);
    if (flush) {
      flushCallbacks.push(flush);
    }
  }

  return wrapLogger(tsLogger, config.autoInjectContext ?? true, flushCallbacks);
}

/** tslog 인스턴스를 GatecordLogger로 래핑 */
function wrapLogger(
  tsLogger: TsLogger<ILogObj>,
  injectContext: boolean,
  flushCallbacks: (() => Promise<void>)[],
): GatecordLogger {
  const withCtx = (args: unknown[]): unknown[] => {
    if (!injectContext) {
      return args;
    }
    const ctx = getContext();
    if (!ctx) {
      return args;
    }
    return [{ _ctx: { requestId: ctx.requestId, route: ctx.route } }, ...args];
  };

  return {
    trace: (msg, ...args) => tsLogger.trace(msg, ...withCtx(args)),
    debug: (msg, ...args) => tsLogger.debug(msg, ...withCtx(args)),
    info: (msg, ...args) => tsLogger.info(msg, ...withCtx(args)),
    warn: (msg, ...args) => tsLogger.warn(msg, ...withCtx(args)),
    error: (msg, ...args) => tsLogger.error(msg, ...withCtx(args)),
    fatal: (msg, ...args) => tsLogger.fatal(msg, ...withCtx(args)),
    // 자식 로거는 부모의 트랜스포트를 상속하므로 flush 목록도 공유한다
    child: (name: string) =>
      wrapLogger(tsLogger.getSubLogger({ name }), injectContext, flushCallbacks),
    flush: async () => {
      await Promise.all(flushCallbacks.map((fn) => fn()));
    },
  };
}

/** 기본 LoggerFactory 구현 */
export const defaultLoggerFactory: LoggerFactory = {
  create: createLogger,
};

/** 아무것도 출력하지 않는 로거 (라이브러리 기본값/테스트용) */
export function createSilentLogger(): GatecordLogger {
  const noop = () => {};
  const silent: GatecordLogger = {
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => silent,
    flush: async () => {},
  };
  return silent;
}
