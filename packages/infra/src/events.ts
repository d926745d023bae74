// packages/infra/src/events.ts
import type { GatewaySessionState } from '@gatecord/types';
import { EventEmitter } from 'node:events';

/**
 * 이벤트 맵 타입: 이벤트명 → 핸들러 시그니처 매핑
 *
 * ```typescript
 * interface ShardEvents {
 *   'shard:ready': (shardId: number) => void;
 * }
 * const emitter = createTypedEmitter<ShardEvents>();
 * ```
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/** 타입 안전 EventEmitter 래퍼 */
export interface TypedEmitter<T extends { [K in keyof T]: (...args: never[]) => void }> {
  on<K extends keyof T & string>(event: K, listener: T[K]): this;
  off<K extends keyof T & string>(event: K, listener: T[K]): this;
  once<K extends keyof T & string>(event: K, listener: T[K]): this;
  emit<K extends keyof T & string>(event: K, ...args: Parameters<T[K]>): boolean;
  removeAllListeners<K extends keyof T & string>(event?: K): this;
  listenerCount<K extends keyof T & string>(event: K): number;
}

/** TypedEmitter 팩토리 */
export function createTypedEmitter<
  T extends { [K in keyof T]: (...args: never[]) => void },
>(): TypedEmitter<T> {
  return new EventEmitter() as unknown as TypedEmitter<T>;
}

/** Gatecord 시스템 이벤트 맵 */
export interface GatecordEventMap {
  /** 시스템 초기화 완료 */
  'system:ready': () => void;
  /** 시스템 종료 시작 */
  'system:shutdown': (reason: string) => void;
  /** 미처리 rejection */
  'system:unhandledRejection': (level: string, reason: unknown) => void;

  // ── Gateway ──
  'gateway:state': (shardId: number, from: GatewaySessionState, to: GatewaySessionState) => void;
  'gateway:open': (shardId: number, url: string) => void;
  'gateway:close': (shardId: number, code: number, reason: string) => void;
  'gateway:identify': (shardId: number) => void;
  'gateway:resume': (shardId: number, sessionId: string, sequence: number) => void;
  /** ACK 없이 다음 하트비트 시점 도달 */
  'gateway:heartbeat:zombie': (shardId: number) => void;

  // ── REST ──
  'rest:request': (method: string, route: string, status: number, durationMs: number) => void;
  'rest:ratelimit': (bucketKey: string, retryAfterMs: number, global: boolean) => void;
  'rest:bucket:migrate': (fromKey: string, toKey: string) => void;
}

/** 전역 이벤트 버스 (싱글턴) */
let globalBus: TypedEmitter<GatecordEventMap> | undefined;

export function getEventBus(): TypedEmitter<GatecordEventMap> {
  if (!globalBus) {
    globalBus = createTypedEmitter<GatecordEventMap>();
  }
  return globalBus;
}

/** 테스트용 이벤트 버스 초기화 */
export function resetEventBus(): void {
  globalBus?.removeAllListeners();
  globalBus = undefined;
}
