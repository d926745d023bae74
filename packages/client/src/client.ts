// packages/client/src/client.ts
import type { DispatchEvent, ResolvedConfig, ResumeState } from '@gatecord/types';
import {
  GatewayClosedError,
  GatewaySession,
  type GatewaySocketFactory,
  type RequestGuildMembersOptions,
} from '@gatecord/gateway';
import {
  GatecordError,
  computeBackoff,
  createSilentLogger,
  createTypedEmitter,
  formatDuration,
  sleepWithAbort,
  type GatecordLogger,
} from '@gatecord/infra';
import { RequestExecutor, RestApi, type HttpTransport } from '@gatecord/rest';

export interface ClientEventMap {
  /** 모든 디스패치 (이벤트 이름별 리스너보다 먼저) */
  dispatch: (event: DispatchEvent) => void;
  /** 재개 가능한 종료 후 새 세션을 만들기 직전 */
  restart: (attempt: number, error: GatewayClosedError) => void;
}

export type DispatchListener = (
  data: Record<string, unknown>,
  event: DispatchEvent,
) => void | Promise<void>;

export interface GatecordClientOptions {
  config: ResolvedConfig;
  logger?: GatecordLogger;
  transport?: HttpTransport;
  socketFactory?: GatewaySocketFactory;
  /** 세션 재생성 최대 연속 횟수 (READY/RESUMED마다 초기화, 기본: 5) */
  maxSessionRestarts?: number;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * REST 실행기와 게이트웨이 세션을 묶는 클라이언트
 *
 * connect()는 GET /gateway/bot으로 URL을 얻고 세션을 돌린다.
 * 세션이 재개 가능한 에러로 끝나면 이전 resume 상태로 새 세션을 만들고,
 * 재개 불가 에러는 connect()의 reject가 된다. close() 후에는 resolve된다.
 */
export class GatecordClient {
  readonly executor: RequestExecutor;
  readonly rest: RestApi;

  private readonly config: ResolvedConfig;
  private readonly token: string;
  private readonly baseLogger: GatecordLogger;
  private readonly logger: GatecordLogger;
  private readonly socketFactory: GatewaySocketFactory | undefined;
  private readonly maxSessionRestarts: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private readonly events = createTypedEmitter<ClientEventMap>();
  private readonly listeners = new Map<string, Set<DispatchListener>>();
  private readonly closeController = new AbortController();
  private started = false;
  private currentSession: GatewaySession | undefined;

  constructor(opts: GatecordClientOptions) {
    const token = opts.config.auth.token;
    if (!token) {
      throw new GatecordError(
        'Bot token is not configured (set auth.token or DISCORD_TOKEN)',
        'CONFIG_ERROR',
      );
    }
    this.config = opts.config;
    this.token = token;
    this.baseLogger = opts.logger ?? createSilentLogger();
    this.logger = this.baseLogger.child('client');
    this.socketFactory = opts.socketFactory;
    this.maxSessionRestarts = opts.maxSessionRestarts ?? 5;
    this.random = opts.random ?? Math.random;
    this.sleep = opts.sleep ?? sleepWithAbort;

    const rest = opts.config.rest;
    this.executor = new RequestExecutor({
      token,
      baseUrl: rest.baseUrl,
      version: rest.version,
      timeoutMs: rest.timeoutMs,
      maxAttempts: rest.maxAttempts,
      retryBaseDelayMs: rest.retryBaseDelayMs,
      maxRateLimitRetries: rest.maxRateLimitRetries,
      userAgent: rest.userAgent,
      transport: opts.transport,
      logger: this.baseLogger,
      sleep: this.sleep,
    });
    this.rest = new RestApi(this.executor);
  }

  get closed(): boolean {
    return this.closeController.signal.aborted;
  }

  /** 현재 돌고 있는 세션 (재생성 대기 중에는 undefined) */
  get session(): GatewaySession | undefined {
    return this.currentSession;
  }

  on<K extends keyof ClientEventMap & string>(event: K, listener: ClientEventMap[K]): this {
    this.events.on(event, listener);
    return this;
  }

  off<K extends keyof ClientEventMap & string>(event: K, listener: ClientEventMap[K]): this {
    this.events.off(event, listener);
    return this;
  }

  /** 이벤트 이름별 리스너 등록. 해제 함수를 반환한다. */
  onDispatch(type: string, listener: DispatchListener): () => void {
    const set = this.listeners.get(type) ?? new Set<DispatchListener>();
    this.listeners.set(type, set);
    set.add(listener);
    return () => {
      set.delete(listener);
      if (set.size === 0) {
        this.listeners.delete(type);
      }
    };
  }

  async connect(): Promise<void> {
    if (this.closed) {
      throw new GatecordError('Client is closed', 'CLIENT_CLOSED');
    }
    if (this.started) {
      throw new GatecordError('Client already started', 'CLIENT_STARTED');
    }
    this.started = true;

    try {
      await this.run();
    } catch (err) {
      if (this.closed) {
        return;
      }
      this.close();
      throw err;
    }
  }

  async requestGuildMembers(opts: RequestGuildMembersOptions): Promise<void> {
    const session = this.currentSession;
    if (!session) {
      throw new GatecordError('No active gateway session', 'SESSION_NOT_READY');
    }
    await session.requestGuildMembers(opts);
  }

  /** 세션을 닫고 대기 중인 REST 호출과 타이머를 모두 취소한다 */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closeController.abort();
    this.currentSession?.close();
    this.currentSession = undefined;
    this.executor.close();
    this.logger.info('Client closed');
  }

  private async run(): Promise<void> {
    const info = await this.rest.getGatewayBot();
    this.logger.info(
      `Gateway ${info.url} (recommended shards: ${info.shards}, ` +
        `session starts left: ${info.session_start_limit.remaining})`,
    );

    let resumeState: ResumeState | undefined;
    let restarts = 0;
    while (!this.closed) {
      const session = this.createSession(info.url, resumeState);
      this.currentSession = session;
      try {
        await session.connect();
        for await (const event of session) {
          if (event.type === 'READY' || event.type === 'RESUMED') {
            restarts = 0;
          }
          this.route(event);
        }
        return;
      } catch (err) {
        if (this.closed) {
          return;
        }
        if (!(err instanceof GatewayClosedError) || !err.resumable || restarts >= this.maxSessionRestarts) {
          throw err;
        }
        restarts++;
        resumeState = err.resumeState ?? session.resumeState;
        const delay = computeBackoff(restarts - 1, { random: this.random });
        this.logger.warn(
          `Gateway session ended (${err.message}), starting a new one in ${formatDuration(delay)} ` +
            `[${restarts}/${this.maxSessionRestarts}]`,
        );
        this.events.emit('restart', restarts, err);
        this.currentSession = undefined;
        await this.sleep(delay, this.closeController.signal);
      }
    }
  }

  private createSession(url: string, resumeState: ResumeState | undefined): GatewaySession {
    const gateway = this.config.gateway;
    return new GatewaySession({
      url,
      token: this.token,
      intents: gateway.intents,
      version: gateway.version,
      compression: gateway.compression,
      largeThreshold: gateway.largeThreshold,
      shard: gateway.shard,
      fatalCloseCodes: gateway.fatalCloseCodes,
      maxReconnectAttempts: gateway.maxReconnectAttempts,
      helloTimeoutMs: gateway.helloTimeoutMs,
      maxInvalidSessions: gateway.maxInvalidSessions,
      sendLimit: gateway.sendLimit,
      resumeState,
      socketFactory: this.socketFactory,
      logger: this.baseLogger,
      random: this.random,
      sleep: this.sleep,
    });
  }

  private route(event: DispatchEvent): void {
    try {
      this.events.emit('dispatch', event);
    } catch (err) {
      this.reportListenerError(event.type, err);
    }

    const listeners = this.listeners.get(event.type);
    if (!listeners) {
      return;
    }
    for (const listener of [...listeners]) {
      try {
        const result = listener(event.data, event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportListenerError(event.type, err));
        }
      } catch (err) {
        this.reportListenerError(event.type, err);
      }
    }
  }

  private reportListenerError(type: string, err: unknown): void {
    this.logger.error(`${type} listener failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}
