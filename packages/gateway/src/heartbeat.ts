// packages/gateway/src/heartbeat.ts
import { computeJitter, type GatecordLogger } from '@gatecord/infra';

export interface HeartbeatOptions {
  intervalMs: number;
  /** 하트비트 프레임 송신 */
  beat: () => void;
  /** ACK 없이 다음 틱 도달 */
  onZombie: () => void;
  random?: () => number;
  now?: () => number;
  logger?: GatecordLogger;
}

/**
 * 소켓 세대 하나의 하트비트 루프
 *
 * 첫 박동은 [0, interval) 지터 뒤, 이후 interval마다.
 * 틱 시점에 이전 박동이 ACK되지 않았으면 박동 대신 onZombie를 부르고 멈춘다.
 * 소켓을 교체할 때는 새 Heartbeat를 만들기 전에 반드시 stop().
 */
export class Heartbeat {
  readonly intervalMs: number;
  /** 마지막 박동의 ACK 여부 */
  acked = true;
  /** 마지막 ACK 왕복 시간 (ms) */
  latencyMs: number | undefined;

  private readonly beat: () => void;
  private readonly onZombie: () => void;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly logger: GatecordLogger | undefined;
  private timer: NodeJS.Timeout | undefined;
  private lastSentAt: number | undefined;
  private stopped = false;

  constructor(opts: HeartbeatOptions) {
    this.intervalMs = opts.intervalMs;
    this.beat = opts.beat;
    this.onZombie = opts.onZombie;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.stopped || this.timer) {
      return;
    }
    const jitter = computeJitter(this.intervalMs, this.random);
    this.logger?.debug(`First heartbeat in ${jitter}ms (interval ${this.intervalMs}ms)`);
    this.timer = setTimeout(() => {
      this.tick();
      if (!this.stopped) {
        this.timer = setInterval(() => this.tick(), this.intervalMs);
      }
    }, jitter);
  }

  /** 서버 op 1 요청: 타이머와 무관하게 즉시 박동 */
  beatNow(): void {
    if (this.stopped) {
      return;
    }
    this.send();
  }

  ack(): void {
    this.acked = true;
    if (this.lastSentAt !== undefined) {
      this.latencyMs = this.now() - this.lastSentAt;
    }
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private tick(): void {
    if (this.stopped) {
      return;
    }
    if (!this.acked) {
      this.logger?.warn(`No heartbeat ACK within ${this.intervalMs}ms, connection is dead`);
      this.stop();
      this.onZombie();
      return;
    }
    this.send();
  }

  private send(): void {
    this.acked = false;
    this.lastSentAt = this.now();
    this.beat();
  }
}
