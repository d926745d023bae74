// packages/rest/src/transport.ts
import type { HttpMethod } from '@gatecord/types';
import { HttpError } from './errors.js';
import type { HeaderLookup } from './headers.js';

export interface HttpRequestInit {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | FormData;
  signal?: AbortSignal;
}

export type ResponseHeaders = HeaderLookup & {
  forEach(fn: (value: string, key: string) => void): void;
};

export interface HttpResponse {
  status: number;
  headers: ResponseHeaders;
  /** JSON이면 파싱된 값, 아니면 텍스트 */
  body: unknown;
}

/** RequestExecutor의 송신 지점: 테스트에서 인프로세스 가짜로 교체 */
export interface HttpTransport {
  send(request: HttpRequestInit): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  /** 요청당 타임아웃 (ms, 기본: 15000) */
  timeoutMs?: number;
}

/** 전역 fetch 기반 기본 트랜스포트 */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;

  constructor(opts: FetchTransportOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 15_000;
  }

  async send(request: HttpRequestInit): Promise<HttpResponse> {
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const signal = request.signal ? AbortSignal.any([request.signal, timeoutSignal]) : timeoutSignal;

    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal,
      redirect: 'error',
    });

    return {
      status: response.status,
      headers: response.headers,
      body: await readBody(request, response),
    };
  }
}

/** 에러에 싣기 위한 평범한 헤더 객체 */
export function headersToRecord(headers: ResponseHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

/** JSON이라고 표시됐는데 파싱되지 않으면 원문을 실은 HttpError */
async function readBody(request: HttpRequestInit, response: Response): Promise<unknown> {
  const text = await response.text();
  const contentType = response.headers.get('content-type') ?? '';
  if (text.length === 0 || !contentType.includes('application/json')) {
    return text;
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new HttpError(
      {
        status: response.status,
        method: request.method,
        url: request.url,
        body: text,
        headers: headersToRecord(response.headers),
      },
      'INVALID_RESPONSE_BODY',
      err instanceof Error ? err : undefined,
    );
  }
}
