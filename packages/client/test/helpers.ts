import type { GatewayFrame } from '@gatecord/types';
import {
  AsyncQueue,
  type GatewaySocket,
  type GatewaySocketFactory,
  type SocketEvent,
} from '@gatecord/gateway';
import type { HttpRequestInit, HttpResponse, HttpTransport } from '@gatecord/rest';

/** GET /gateway/bot 응답만 돌려주는 가짜 트랜스포트 */
export class GatewayBotTransport implements HttpTransport {
  readonly requests: HttpRequestInit[] = [];

  constructor(private readonly url = 'wss://gateway.test') {}

  async send(request: HttpRequestInit): Promise<HttpResponse> {
    this.requests.push(request);
    return {
      status: 200,
      headers: new Headers({ 'content-type': 'application/json' }),
      body: {
        url: this.url,
        shards: 1,
        session_start_limit: { total: 1000, remaining: 999, reset_after: 0, max_concurrency: 1 },
      },
    };
  }
}

/** 서버 쪽 프레임을 테스트가 밀어 넣는 소켓 */
export class ScriptedSocket implements GatewaySocket {
  readonly sent: GatewayFrame[] = [];
  closedWith: number | undefined;
  private readonly events = new AsyncQueue<SocketEvent>();

  async receive(): Promise<SocketEvent> {
    const result = await this.events.next();
    return result.done ? { type: 'close', code: 1006, reason: '' } : result.value;
  }

  send(data: string): void {
    const frame: GatewayFrame = JSON.parse(data);
    this.sent.push(frame);
  }

  close(code: number): void {
    this.closedWith ??= code;
    this.events.end();
  }

  push(frame: GatewayFrame): void {
    this.events.push({ type: 'message', data: JSON.stringify(frame) });
  }

  drop(code: number, reason = ''): void {
    this.events.push({ type: 'close', code, reason });
  }
}

export class ScriptedSocketFactory implements GatewaySocketFactory {
  readonly sockets: ScriptedSocket[] = [];
  readonly urls: string[] = [];

  async open(url: string): Promise<GatewaySocket> {
    const socket = new ScriptedSocket();
    this.urls.push(url);
    this.sockets.push(socket);
    return socket;
  }

  at(index: number): ScriptedSocket {
    const socket = this.sockets[index];
    if (!socket) {
      throw new Error(`socket ${index} was never opened`);
    }
    return socket;
  }
}
