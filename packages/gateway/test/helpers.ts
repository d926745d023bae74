import type { GatewayFrame } from '@gatecord/types';
import { AsyncQueue } from '../src/async-queue.js';
import type { GatewaySocket, GatewaySocketFactory, SocketEvent } from '../src/socket.js';

/** 인프로세스 가짜 소켓: 서버 쪽 동작을 테스트가 직접 흘려 넣는다 */
export class FakeSocket implements GatewaySocket {
  readonly sent: GatewayFrame[] = [];
  closedWith: { code: number; reason: string } | undefined;

  private readonly events = new AsyncQueue<SocketEvent>();
  private lastClose: SocketEvent | undefined;

  async receive(): Promise<SocketEvent> {
    const result = await this.events.next();
    if (!result.done) {
      return result.value;
    }
    return this.lastClose ?? { type: 'close', code: 1006, reason: '' };
  }

  send(data: string): void {
    const frame: GatewayFrame = JSON.parse(data);
    this.sent.push(frame);
  }

  close(code: number, reason = ''): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = { code, reason };
    this.finish(code, reason);
  }

  // ── 서버 쪽 조작 ──

  serverSend(frame: GatewayFrame): void {
    this.events.push({ type: 'message', data: JSON.stringify(frame) });
  }

  serverSendRaw(data: string | Uint8Array): void {
    this.events.push({ type: 'message', data });
  }

  serverClose(code: number, reason = ''): void {
    this.finish(code, reason);
  }

  ops(): number[] {
    return this.sent.map((frame) => frame.op);
  }

  private finish(code: number, reason: string): void {
    if (this.lastClose) {
      return;
    }
    this.lastClose = { type: 'close', code, reason };
    this.events.push(this.lastClose);
    this.events.end();
  }
}

export class FakeSocketFactory implements GatewaySocketFactory {
  readonly sockets: FakeSocket[] = [];
  readonly urls: string[] = [];

  async open(url: string): Promise<GatewaySocket> {
    const socket = new FakeSocket();
    this.urls.push(url);
    this.sockets.push(socket);
    return socket;
  }

  /** n번째로 연 소켓 (없으면 에러) */
  at(index: number): FakeSocket {
    const socket = this.sockets[index];
    if (!socket) {
      throw new Error(`socket ${index} was never opened`);
    }
    return socket;
  }
}

export const hello = (interval = 45_000): GatewayFrame => ({
  op: 10,
  d: { heartbeat_interval: interval },
});

export const ready = (sessionId: string, seq: number, resumeUrl?: string): GatewayFrame => ({
  op: 0,
  t: 'READY',
  s: seq,
  d: { session_id: sessionId, resume_gateway_url: resumeUrl, v: 10 },
});

export const dispatch = (type: string, seq: number, d: Record<string, unknown> = {}): GatewayFrame => ({
  op: 0,
  t: type,
  s: seq,
  d,
});
