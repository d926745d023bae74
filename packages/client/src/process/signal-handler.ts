import { getEventBus, type GatecordLogger } from '@gatecord/infra';
// packages/client/src/process/signal-handler.ts
import type { CleanupFn } from '@gatecord/types';

/** process 중 시그널 구독에 필요한 부분 */
export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface GracefulShutdownOptions {
  /** 정리 제한 시간 (기본: 30초) */
  timeoutMs?: number;
  exit?: (code: number) => void;
  /** 시그널을 받을 대상 (기본: process) */
  target?: SignalTarget;
}

/**
 * 우아한 종료 핸들러
 *
 * SIGINT/SIGTERM 수신 시:
 * 1. 게이트웨이 세션 종료, REST 대기 취소
 * 2. 리소스 정리 (CleanupFn[] 순차 실행, 30초 타임아웃)
 * 3. 프로세스 종료
 *
 * 두 번째 시그널은 즉시 종료한다.
 * @returns 시그널 핸들러 해제 함수
 */
export function setupGracefulShutdown(
  logger: GatecordLogger,
  getCleanupFns: () => CleanupFn[],
  opts: GracefulShutdownOptions = {},
): () => void {
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  const target: SignalTarget = opts.target ?? process;
  let shuttingDown = false;

  const handler = async (signal: string) => {
    if (shuttingDown) {
      logger.warn(`Forced exit on second ${signal}`);
      exit(1);
      return;
    }

    shuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    getEventBus().emit('system:shutdown', signal);

    const timeout = setTimeout(() => {
      logger.error(`Shutdown timeout (${timeoutMs / 1000}s), forcing exit`);
      exit(1);
    }, timeoutMs);
    timeout.unref();

    for (const cleanup of getCleanupFns()) {
      try {
        await cleanup();
      } catch (err) {
        logger.error(`Cleanup error: ${String(err)}`);
      }
    }
    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    exit(0);
  };

  const onSigint = () => void handler('SIGINT');
  const onSigterm = () => void handler('SIGTERM');
  target.on('SIGINT', onSigint);
  target.on('SIGTERM', onSigterm);
  return () => {
    target.off('SIGINT', onSigint);
    target.off('SIGTERM', onSigterm);
  };
}
