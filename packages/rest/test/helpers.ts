import { setTimeout as delay } from 'node:timers/promises';
import type { HttpRequestInit, HttpResponse, HttpTransport } from '../src/transport.js';

export interface FakeReply {
  status?: number;
  headers?: Record<string, string>;
  body?: unknown;
  /** 응답 전 실제 대기 (ms) */
  delayMs?: number;
  /** signal이 abort될 때까지 응답하지 않음 */
  hang?: boolean;
}

type Responder = (request: HttpRequestInit, index: number) => FakeReply;

/** 인프로세스 가짜 트랜스포트: 요청을 기록하고 동시 송신 수를 잰다 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequestInit[] = [];
  readonly sentAt: number[] = [];
  /** 송신(>)과 응답 완료(<)를 `> GET /channels/1` 형태로 기록 */
  readonly log: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  private readonly respond: Responder;

  constructor(replies: Responder | FakeReply[]) {
    this.respond = Array.isArray(replies)
      ? (_, index) => replies[Math.min(index, replies.length - 1)] ?? {}
      : replies;
  }

  async send(request: HttpRequestInit): Promise<HttpResponse> {
    const index = this.requests.length;
    this.requests.push(request);
    this.sentAt.push(Date.now());
    const label = `${request.method} ${new URL(request.url).pathname.replace(/^\/api\/v\d+/, '')}`;
    this.log.push(`> ${label}`);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const reply = this.respond(request, index);
      if (reply.hang) {
        await waitForAbort(request.signal);
      }
      if (reply.delayMs) {
        await delay(reply.delayMs);
      }
      return {
        status: reply.status ?? 200,
        headers: new Headers(reply.headers),
        body: reply.body ?? {},
      };
    } finally {
      this.inFlight--;
      this.log.push(`< ${label}`);
    }
  }
}

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_, reject) => {
    const fail = () => reject(Object.assign(new Error('aborted'), { name: 'AbortError' }));
    if (signal?.aborted) {
      fail();
      return;
    }
    signal?.addEventListener('abort', fail, { once: true });
  });
}

/** 수동으로 푸는 프로미스 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const BASE_URL = 'https://discord.test/api';
