// packages/gateway/src/session.ts
import type {
  DispatchEvent,
  GatewayCompression,
  GatewayFrame,
  GatewaySessionState,
  IdentifyProperties,
  ResumeState,
} from '@gatecord/types';
import { DEFAULT_FATAL_CLOSE_CODES, GatewayCloseCode, GatewayOpcode } from '@gatecord/types';
import {
  AbortedError,
  computeBackoff,
  createSilentLogger,
  formatDuration,
  getEventBus,
  retry,
  sleepWithAbort,
  type GatecordLogger,
} from '@gatecord/infra';
import { AsyncQueue } from './async-queue.js';
import { ConnectionRateLimiter, type ConnectionRateLimiterOptions } from './connection-rate-limiter.js';
import {
  GatewayClosedError,
  GatewayConnectError,
  GatewayError,
  InvalidSessionError,
} from './errors.js';
import { FrameCodec } from './frame-codec.js';
import { Heartbeat } from './heartbeat.js';
import {
  buildGatewayUrl,
  buildHeartbeat,
  buildIdentify,
  buildRequestGuildMembers,
  buildResume,
  isHelloData,
  isReadyData,
  toDispatchData,
  type RequestGuildMembersOptions,
} from './payloads.js';
import { WsSocketFactory, type GatewaySocket, type GatewaySocketFactory } from './socket.js';

/** 재개 가능하게 닫는 코드 (1000/1001은 서버가 세션을 폐기한다) */
const RESUMABLE_CLOSE_CODE = GatewayCloseCode.UNKNOWN_ERROR;

export type SendLimitOptions = Pick<ConnectionRateLimiterOptions, 'limit' | 'windowMs' | 'reserved'>;

export interface GatewaySessionOptions {
  /** GET /gateway/bot이 돌려준 URL (쿼리 없이) */
  url: string;
  token: string;
  intents: number;
  version?: number;
  compression?: GatewayCompression;
  largeThreshold?: number;
  shard?: readonly [number, number];
  properties?: IdentifyProperties;
  /** 재연결하지 않고 치명 에러로 올리는 종료 코드 */
  fatalCloseCodes?: readonly number[];
  maxReconnectAttempts?: number;
  /** 소켓 오픈 시도 횟수 (기본: 3) */
  connectAttempts?: number;
  helloTimeoutMs?: number;
  maxInvalidSessions?: number;
  sendLimit?: SendLimitOptions;
  /** 이전 세션에서 이어받는 재개 상태 */
  resumeState?: ResumeState;
  socketFactory?: GatewaySocketFactory;
  logger?: GatecordLogger;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * 게이트웨이 세션
 *
 * 소켓 하나를 독점하고 하트비트, 시퀀스 추적, resume/identify 결정을 맡는다.
 * 소비자는 next() (또는 for await)로 디스패치만 받는다.
 * 일반 종료는 내부에서 재연결하고, 치명 종료는 next()의 에러로 나온다.
 * 닫힌 세션은 다시 쓰지 않는다.
 */
export class GatewaySession {
  readonly shardId: number;
  sessionId: string | undefined;
  sequence: number | undefined;
  resumeUrl: string | undefined;

  private readonly url: string;
  private readonly token: string;
  private readonly intents: number;
  private readonly version: number;
  private readonly compression: GatewayCompression;
  private readonly largeThreshold: number;
  private readonly shard: readonly [number, number] | undefined;
  private readonly properties: IdentifyProperties | undefined;
  private readonly fatalCloseCodes: readonly number[];
  private readonly maxReconnectAttempts: number;
  private readonly connectAttempts: number;
  private readonly helloTimeoutMs: number;
  private readonly maxInvalidSessions: number;
  private readonly sendLimit: SendLimitOptions | undefined;
  private readonly socketFactory: GatewaySocketFactory;
  private readonly logger: GatecordLogger;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private readonly dispatches = new AsyncQueue<DispatchEvent>();
  private readonly closeController = new AbortController();
  private currentState: GatewaySessionState = 'connecting';
  private started = false;
  private generation = 0;
  private socket: GatewaySocket | undefined;
  private codec: FrameCodec | undefined;
  private limiter: ConnectionRateLimiter | undefined;
  private heartbeat: Heartbeat | undefined;
  private generationController: AbortController | undefined;
  private helloTimer: NodeJS.Timeout | undefined;
  private reconnectAttempts = 0;
  private invalidSessions = 0;

  constructor(opts: GatewaySessionOptions) {
    this.url = opts.url;
    this.token = opts.token;
    this.intents = opts.intents;
    this.version = opts.version ?? 10;
    this.compression = opts.compression ?? 'zlib-stream';
    this.largeThreshold = opts.largeThreshold ?? 250;
    this.shard = opts.shard;
    this.shardId = opts.shard?.[0] ?? 0;
    this.properties = opts.properties;
    this.fatalCloseCodes = opts.fatalCloseCodes ?? DEFAULT_FATAL_CLOSE_CODES;
    this.maxReconnectAttempts = opts.maxReconnectAttempts ?? 10;
    this.connectAttempts = opts.connectAttempts ?? 3;
    this.helloTimeoutMs = opts.helloTimeoutMs ?? 30_000;
    this.maxInvalidSessions = opts.maxInvalidSessions ?? 5;
    this.sendLimit = opts.sendLimit;
    this.logger = (opts.logger ?? createSilentLogger()).child('gateway');
    this.socketFactory = opts.socketFactory ?? new WsSocketFactory({ logger: this.logger });
    this.random = opts.random ?? Math.random;
    this.sleep = opts.sleep ?? sleepWithAbort;

    if (opts.resumeState) {
      this.sessionId = opts.resumeState.sessionId;
      this.sequence = opts.resumeState.sequence;
      this.resumeUrl = opts.resumeState.resumeUrl;
    }
  }

  get state(): GatewaySessionState {
    return this.currentState;
  }

  get closed(): boolean {
    return this.currentState === 'closed';
  }

  /** 재개에 필요한 상태가 다 있으면 스냅샷 */
  get resumeState(): ResumeState | undefined {
    if (this.sessionId === undefined || this.sequence === undefined) {
      return undefined;
    }
    return { sessionId: this.sessionId, sequence: this.sequence, resumeUrl: this.resumeUrl };
  }

  /** 마지막 하트비트 왕복 시간 (ms) */
  get latencyMs(): number | undefined {
    return this.heartbeat?.latencyMs;
  }

  /** 첫 소켓을 연다. 이후 진행은 next()로 관찰한다. */
  async connect(): Promise<void> {
    if (this.started) {
      throw new GatewayError('Session already started', 'SESSION_STARTED');
    }
    this.started = true;
    try {
      await this.openSocket();
    } catch (err) {
      const error = toGatewayError(err);
      this.terminate(error);
      throw error;
    }
  }

  /** 다음 디스패치 (정상 close 후에는 done) */
  next(): Promise<IteratorResult<DispatchEvent, undefined>> {
    return this.dispatches.next();
  }

  [Symbol.asyncIterator](): AsyncIterator<DispatchEvent, undefined> {
    return this;
  }

  /** op 8: 일반 송신 한도를 거친다 */
  async requestGuildMembers(opts: RequestGuildMembersOptions): Promise<void> {
    if (this.currentState !== 'ready') {
      throw new GatewayError('Session is not ready', 'SESSION_NOT_READY');
    }
    await this.sendFrame(this.generation, buildRequestGuildMembers(opts), false);
  }

  /** 세션 종료. 기본 코드 1000은 서버 쪽 세션도 폐기한다. */
  close(code: number = GatewayCloseCode.NORMAL, reason = 'Client closing'): void {
    if (this.closed) {
      return;
    }
    this.retire(code, reason);
    this.finish();
    this.dispatches.end();
  }

  // ── 연결 ──

  private async openSocket(): Promise<void> {
    const resuming = this.resumeState !== undefined;
    const base = resuming && this.resumeUrl ? this.resumeUrl : this.url;
    const url = buildGatewayUrl(base, {
      version: this.version,
      encoding: 'json',
      compression: this.compression,
    });
    this.setState('connecting');

    let socket: GatewaySocket;
    try {
      socket = await retry(() => this.socketFactory.open(url, this.closeController.signal), {
        maxAttempts: this.connectAttempts,
        signal: this.closeController.signal,
        shouldRetry: () => !this.closed,
        random: this.random,
        sleep: this.sleep,
        onRetry: (err, attempt, delay) => {
          this.logger.warn(
            `Gateway connect attempt ${attempt + 1} failed (${describe(err)}), retrying in ${formatDuration(delay)}`,
          );
        },
      });
    } catch (err) {
      if (this.closed) {
        throw new AbortedError('Gateway connect');
      }
      throw new GatewayConnectError(url, err instanceof Error ? err : undefined);
    }

    if (this.closed) {
      socket.close(GatewayCloseCode.NORMAL, 'Session closed');
      return;
    }

    const generation = ++this.generation;
    const codec = new FrameCodec(this.compression);
    this.socket = socket;
    this.codec = codec;
    this.limiter = new ConnectionRateLimiter({ ...this.sendLimit, sleep: this.sleep });
    this.generationController = new AbortController();
    this.setState('awaiting-hello');
    this.logger.info(`Connected to ${url}`);
    getEventBus().emit('gateway:open', this.shardId, url);

    this.helloTimer = setTimeout(() => {
      this.logger.warn(`No HELLO within ${formatDuration(this.helloTimeoutMs)}`);
      void this.reconnect(generation, RESUMABLE_CLOSE_CODE, 'Hello timeout');
    }, this.helloTimeoutMs);
    this.helloTimer.unref();

    this.readLoop(socket, codec, generation).catch((err: unknown) => {
      this.onLoopError(err, generation);
    });
  }

  private async readLoop(socket: GatewaySocket, codec: FrameCodec, generation: number): Promise<void> {
    for (;;) {
      const event = await socket.receive();
      if (generation !== this.generation) {
        return;
      }
      if (event.type === 'close') {
        await this.handleClose(generation, event.code, event.reason);
        return;
      }

      let frame: GatewayFrame | undefined;
      try {
        frame = await codec.feed(event.data);
      } catch (err) {
        this.handleDecodeError(err);
        return;
      }
      if (generation !== this.generation) {
        return;
      }
      if (frame) {
        await this.handleFrame(frame, generation);
      }
    }
  }

  private onLoopError(err: unknown, generation: number): void {
    if (this.closed || generation !== this.generation) {
      // 교체된 세대의 대기(송신 한도, invalid session 지연)가 취소된 것
      this.logger.debug(`Stale gateway loop ended: ${describe(err)}`);
      return;
    }
    this.terminate(toGatewayError(err));
  }

  /** 현재 소켓을 버리고 새 소켓으로 resume/identify */
  private async reconnect(generation: number, code: number, reason: string): Promise<void> {
    if (generation !== this.generation || this.closed) {
      return;
    }
    this.retire(code, reason);

    this.reconnectAttempts++;
    if (this.reconnectAttempts > this.maxReconnectAttempts) {
      this.terminate(
        new GatewayClosedError(code, `Gave up after ${this.maxReconnectAttempts} reconnect attempts`, {
          resumable: true,
          resumeState: this.resumeState,
        }),
      );
      return;
    }

    // 첫 재연결은 즉시, 이후 지수 백오프
    const delay =
      this.reconnectAttempts === 1
        ? 0
        : computeBackoff(this.reconnectAttempts - 2, { random: this.random });
    this.logger.info(
      `Reconnecting (${reason}), attempt ${this.reconnectAttempts}/${this.maxReconnectAttempts}` +
        (delay > 0 ? ` in ${formatDuration(delay)}` : ''),
    );

    try {
      await this.sleep(delay, this.closeController.signal);
      await this.openSocket();
    } catch (err) {
      if (!this.closed) {
        this.terminate(toGatewayError(err));
      }
    }
  }

  /** 소켓 세대 정리: 하트비트를 먼저 멈추고 소켓을 닫는다 */
  private retire(code: number, reason: string): void {
    this.generation++;
    this.generationController?.abort();
    this.generationController = undefined;
    this.heartbeat?.stop();
    this.heartbeat = undefined;
    clearTimeout(this.helloTimer);
    this.helloTimer = undefined;
    this.codec?.close();
    this.codec = undefined;
    this.limiter = undefined;
    const socket = this.socket;
    this.socket = undefined;
    socket?.close(code, reason);
  }

  private terminate(error: GatewayError): void {
    if (this.closed) {
      return;
    }
    const resumable = error instanceof GatewayClosedError && error.resumable;
    this.retire(resumable ? RESUMABLE_CLOSE_CODE : GatewayCloseCode.NORMAL, error.message);
    this.finish();
    this.logger.error(`Gateway session terminated: ${error.message}`);
    this.dispatches.fail(error);
  }

  private finish(): void {
    this.setState('closed');
    this.closeController.abort();
  }

  // ── 수신 처리 ──

  private async handleClose(generation: number, code: number, reason: string): Promise<void> {
    getEventBus().emit('gateway:close', this.shardId, code, reason);
    if (this.fatalCloseCodes.includes(code)) {
      this.terminate(new GatewayClosedError(code, reason, { resumable: false }));
      return;
    }
    this.logger.warn(`Gateway closed with code ${code}${reason ? ` (${reason})` : ''}`);
    await this.reconnect(generation, code, reason || 'Connection closed');
  }

  private handleDecodeError(err: unknown): void {
    this.terminate(
      new GatewayClosedError(GatewayCloseCode.DECODE_ERROR, describe(err), {
        resumable: true,
        resumeState: this.resumeState,
        cause: err instanceof Error ? err : undefined,
      }),
    );
  }

  private async handleFrame(frame: GatewayFrame, generation: number): Promise<void> {
    switch (frame.op) {
      case GatewayOpcode.DISPATCH:
        this.handleDispatch(frame);
        return;
      case GatewayOpcode.HEARTBEAT:
        if (this.heartbeat) {
          this.heartbeat.beatNow();
        } else {
          await this.sendFrame(generation, buildHeartbeat(this.sequence), true);
        }
        return;
      case GatewayOpcode.RECONNECT:
        this.logger.info('Server requested reconnect');
        await this.reconnect(generation, RESUMABLE_CLOSE_CODE, 'Reconnect requested');
        return;
      case GatewayOpcode.INVALID_SESSION:
        await this.handleInvalidSession(frame.d === true, generation);
        return;
      case GatewayOpcode.HELLO:
        await this.handleHello(frame.d, generation);
        return;
      case GatewayOpcode.HEARTBEAT_ACK:
        this.heartbeat?.ack();
        return;
      default:
        this.logger.debug(`Ignoring gateway opcode ${frame.op}`);
    }
  }

  private handleDispatch(frame: GatewayFrame): void {
    if (typeof frame.s === 'number') {
      this.sequence = frame.s;
    }
    const type = frame.t;
    if (!type) {
      this.logger.debug('Dispatch frame without event name');
      return;
    }

    if (type === 'READY') {
      if (isReadyData(frame.d)) {
        this.sessionId = frame.d.session_id;
        this.resumeUrl = frame.d.resume_gateway_url ?? this.resumeUrl;
      }
      this.markReady();
    } else if (type === 'RESUMED') {
      this.markReady();
    }

    this.dispatches.push({
      type,
      data: toDispatchData(frame.d),
      sequence: frame.s ?? this.sequence ?? 0,
    });
  }

  private markReady(): void {
    this.reconnectAttempts = 0;
    this.invalidSessions = 0;
    this.setState('ready');
  }

  private async handleHello(data: unknown, generation: number): Promise<void> {
    if (!isHelloData(data)) {
      this.handleDecodeError(new GatewayError('Malformed HELLO payload', 'FRAME_DECODE'));
      return;
    }
    clearTimeout(this.helloTimer);
    this.helloTimer = undefined;

    this.heartbeat?.stop();
    const heartbeat = new Heartbeat({
      intervalMs: data.heartbeat_interval,
      beat: () => this.beat(generation),
      onZombie: () => {
        getEventBus().emit('gateway:heartbeat:zombie', this.shardId);
        void this.reconnect(generation, RESUMABLE_CLOSE_CODE, 'Heartbeat ACK timeout');
      },
      random: this.random,
      logger: this.logger.child('heartbeat'),
    });
    this.heartbeat = heartbeat;
    heartbeat.start();

    if (this.resumeState) {
      await this.sendResume(generation);
    } else {
      await this.sendIdentify(generation);
    }
  }

  private async handleInvalidSession(resumable: boolean, generation: number): Promise<void> {
    if (resumable && this.resumeState) {
      await this.reconnect(generation, RESUMABLE_CLOSE_CODE, 'Invalid session (resumable)');
      return;
    }

    this.invalidSessions++;
    if (this.invalidSessions > this.maxInvalidSessions) {
      this.terminate(new InvalidSessionError(this.invalidSessions));
      return;
    }

    this.sessionId = undefined;
    this.sequence = undefined;
    this.resumeUrl = undefined;
    // 바로 다시 identify하면 서버가 또 거절한다
    const delay = 1000 + Math.floor(this.random() * 4000);
    this.logger.warn(`Session invalidated, identifying again in ${formatDuration(delay)}`);
    await this.sleep(delay, this.generationController?.signal);
    if (generation !== this.generation) {
      return;
    }
    await this.sendIdentify(generation);
  }

  // ── 송신 ──

  private async sendIdentify(generation: number): Promise<void> {
    this.setState('identifying');
    await this.sendFrame(
      generation,
      buildIdentify({
        token: this.token,
        intents: this.intents,
        largeThreshold: this.largeThreshold,
        compression: this.compression,
        shard: this.shard,
        properties: this.properties,
      }),
      true,
    );
    getEventBus().emit('gateway:identify', this.shardId);
  }

  private async sendResume(generation: number): Promise<void> {
    const state = this.resumeState;
    if (!state) {
      await this.sendIdentify(generation);
      return;
    }
    this.setState('resuming');
    await this.sendFrame(generation, buildResume(this.token, state.sessionId, state.sequence), true);
    this.logger.info(`Resuming session ${state.sessionId} at sequence ${state.sequence}`);
    getEventBus().emit('gateway:resume', this.shardId, state.sessionId, state.sequence);
  }

  private beat(generation: number): void {
    this.sendFrame(generation, buildHeartbeat(this.sequence), true).catch((err: unknown) => {
      this.logger.debug(`Heartbeat not sent: ${describe(err)}`);
    });
  }

  private async sendFrame(generation: number, frame: GatewayFrame, priority: boolean): Promise<void> {
    const socket = this.socket;
    const limiter = this.limiter;
    if (generation !== this.generation || !socket || !limiter) {
      throw new GatewayError('Gateway socket is not open', 'SOCKET_NOT_OPEN');
    }
    await limiter.acquire(priority, this.generationController?.signal);
    if (generation !== this.generation) {
      throw new AbortedError('Gateway send');
    }
    socket.send(JSON.stringify(frame));
  }

  private setState(to: GatewaySessionState): void {
    const from = this.currentState;
    if (from === to) {
      return;
    }
    this.currentState = to;
    this.logger.debug(`State ${from} -> ${to}`);
    getEventBus().emit('gateway:state', this.shardId, from, to);
  }
}

function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) {
    return err;
  }
  if (err instanceof Error) {
    return new GatewayError(err.message, 'GATEWAY_ERROR', { cause: err });
  }
  return new GatewayError(String(err));
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
