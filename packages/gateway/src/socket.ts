// packages/gateway/src/socket.ts
import WebSocket from 'ws';
import { AbortedError, type GatecordLogger } from '@gatecord/infra';
import { AsyncQueue } from './async-queue.js';

/** 소켓에서 받은 것: 메시지 또는 종료 */
export type SocketEvent =
  | { type: 'message'; data: string | Uint8Array }
  | { type: 'close'; code: number; reason: string };

/**
 * 세션이 독점하는 양방향 연결
 *
 * receive()는 pull 방식이다. 종료 후에는 close 이벤트를 계속 돌려준다.
 */
export interface GatewaySocket {
  receive(): Promise<SocketEvent>;
  send(data: string): void;
  close(code: number, reason?: string): void;
}

export interface GatewaySocketFactory {
  open(url: string, signal?: AbortSignal): Promise<GatewaySocket>;
}

/** ws 기반 GatewaySocket */
export class WsGatewaySocket implements GatewaySocket {
  private readonly events = new AsyncQueue<SocketEvent>();
  private closeEvent: SocketEvent | undefined;

  constructor(
    private readonly ws: WebSocket,
    private readonly logger?: GatecordLogger,
  ) {
    ws.on('message', (data, isBinary) => {
      this.events.push(
        isBinary ? { type: 'message', data: toBytes(data) } : { type: 'message', data: data.toString() },
      );
    });
    ws.on('close', (code, reason) => {
      this.closeEvent = { type: 'close', code, reason: reason.toString() };
      this.events.push(this.closeEvent);
      this.events.end();
    });
    // 에러 뒤에는 항상 close가 온다
    ws.on('error', (err) => {
      this.logger?.warn(`Gateway socket error: ${err.message}`);
    });
  }

  async receive(): Promise<SocketEvent> {
    const result = await this.events.next();
    if (!result.done) {
      return result.value;
    }
    return this.closeEvent ?? { type: 'close', code: 1006, reason: '' };
  }

  send(data: string): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(data);
    }
  }

  close(code: number, reason = ''): void {
    if (this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED) {
      return;
    }
    if (this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
      return;
    }
    this.ws.close(code, reason);
  }
}

export interface WsSocketFactoryOptions {
  /** 핸드셰이크 타임아웃 (ms, 기본: 30000) */
  handshakeTimeoutMs?: number;
  userAgent?: string;
  logger?: GatecordLogger;
}

/** ws로 소켓을 여는 기본 팩토리 */
export class WsSocketFactory implements GatewaySocketFactory {
  constructor(private readonly opts: WsSocketFactoryOptions = {}) {}

  open(url: string, signal?: AbortSignal): Promise<GatewaySocket> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, {
        handshakeTimeout: this.opts.handshakeTimeoutMs ?? 30_000,
        headers: this.opts.userAgent ? { 'User-Agent': this.opts.userAgent } : undefined,
        // 압축은 게이트웨이 프로토콜 레벨에서 처리
        perMessageDeflate: false,
      });

      const onAbort = () => {
        ws.terminate();
        reject(new AbortedError('Gateway connect'));
      };
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      ws.once('open', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(new WsGatewaySocket(ws, this.opts.logger));
      });
      ws.once('error', (err) => {
        signal?.removeEventListener('abort', onAbort);
        reject(err);
      });
    });
  }
}

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}
