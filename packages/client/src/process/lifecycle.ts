import type { GatecordLogger } from '@gatecord/infra';
// packages/client/src/process/lifecycle.ts
import type { CleanupFn } from '@gatecord/types';
import { setupGracefulShutdown, type GracefulShutdownOptions } from './signal-handler.js';

export interface ProcessLifecycleDeps {
  logger: GatecordLogger;
  signals?: GracefulShutdownOptions;
}

/**
 * 프로세스 라이프사이클 관리자
 *
 * - CleanupFn 등록
 * - 시그널 핸들러 연동
 * - 정리 함수를 등록 역순으로 실행 (LIFO)
 */
export class ProcessLifecycle {
  private readonly cleanupFns: CleanupFn[] = [];
  private readonly logger: GatecordLogger;
  private readonly signals: GracefulShutdownOptions | undefined;
  private disposeSignals: (() => void) | undefined;

  constructor(deps: ProcessLifecycleDeps) {
    this.logger = deps.logger;
    this.signals = deps.signals;
  }

  /** 정리 함수 등록 (LIFO 순서로 실행됨) */
  register(fn: CleanupFn): void {
    this.cleanupFns.push(fn);
  }

  /** 시그널 핸들러 초기화 (한 번만 호출) */
  init(): void {
    if (this.disposeSignals) {
      return;
    }
    // 시그널 발생 시점에 최신 배열을 읽도록 getter 전달
    this.disposeSignals = setupGracefulShutdown(
      this.logger,
      () => [...this.cleanupFns].toReversed(),
      this.signals,
    );
    this.logger.info('Process lifecycle initialized');
  }

  /** 수동 종료 (테스트 등에서 사용) */
  async shutdown(): Promise<void> {
    this.logger.info('Manual shutdown initiated');
    this.disposeSignals?.();
    this.disposeSignals = undefined;
    for (const cleanup of [...this.cleanupFns].toReversed()) {
      try {
        await cleanup();
      } catch (err) {
        this.logger.error(`Cleanup error: ${String(err)}`);
      }
    }
  }
}
