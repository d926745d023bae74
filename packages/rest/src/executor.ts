// packages/rest/src/executor.ts
import type { HttpMethod, RestRequest, RouteParams } from '@gatecord/types';
import { randomUUID } from 'node:crypto';
import {
  computeLinearBackoff,
  createSilentLogger,
  formatDuration,
  getEventBus,
  runWithContext,
  sleepWithAbort,
  type GatecordLogger,
} from '@gatecord/infra';
import { BucketRegistry } from './bucket-registry.js';
import type { Bucket } from './bucket.js';
import {
  HttpError,
  RateLimitError,
  RestClosedError,
  classifyHttpError,
  type HttpErrorInit,
} from './errors.js';
import { getRetryAfterMs, isGlobalRateLimit, parseRateLimitHeaders } from './headers.js';
import { GlobalRateLimit } from './global-rate-limit.js';
import { compileRoute, getMajorParams, getRouteKey } from './route.js';
import {
  FetchTransport,
  headersToRecord,
  type HttpResponse,
  type HttpTransport,
} from './transport.js';

export const DEFAULT_USER_AGENT = 'DiscordBot (gatecord, 0.1.0)';

/** 500/502/504만 재시도, 그 외 5xx는 즉시 실패 */
const RETRYABLE_STATUSES = new Set([500, 502, 504]);

export interface RequestExecutorOptions {
  token?: string;
  baseUrl?: string;
  version?: number;
  timeoutMs?: number;
  /** 논리 호출당 최대 시도 (429 제외, 기본: 3) */
  maxAttempts?: number;
  /** 5xx 선형 백오프 단위 (ms, 기본: 1000) */
  retryBaseDelayMs?: number;
  /** 논리 호출당 429 재시도 상한 (기본: 5) */
  maxRateLimitRetries?: number;
  userAgent?: string;
  transport?: HttpTransport;
  logger?: GatecordLogger;
  /** 테스트용 */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

/**
 * 레이트 리밋을 지키는 REST 실행기
 *
 * 버킷 락 → (전역 게이트) → 송신 → 헤더 반영 → 상태 분류의 순서로 한 시도를 돈다.
 */
export class RequestExecutor {
  readonly buckets: BucketRegistry;
  readonly globalRateLimit = new GlobalRateLimit();

  private readonly token: string | undefined;
  private readonly baseUrl: string;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxRateLimitRetries: number;
  private readonly userAgent: string;
  private readonly transport: HttpTransport;
  private readonly logger: GatecordLogger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;
  private readonly closeController = new AbortController();

  constructor(opts: RequestExecutorOptions = {}) {
    this.token = opts.token;
    this.baseUrl = `${(opts.baseUrl ?? 'https://discord.com/api').replace(/\/+$/, '')}/v${opts.version ?? 10}`;
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 1000;
    this.maxRateLimitRetries = opts.maxRateLimitRetries ?? 5;
    this.userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
    this.transport = opts.transport ?? new FetchTransport({ timeoutMs: opts.timeoutMs });
    this.logger = (opts.logger ?? createSilentLogger()).child('rest');
    this.sleep = opts.sleep ?? sleepWithAbort;
    this.now = opts.now ?? Date.now;
    this.buckets = new BucketRegistry({ now: this.now, logger: this.logger.child('bucket') });
  }

  get closed(): boolean {
    return this.closeController.signal.aborted;
  }

  /** 경로 템플릿 + 파라미터로 요청 (간단 형태) */
  request<T = unknown>(
    method: HttpMethod,
    route: string,
    params?: RouteParams,
    body?: unknown,
  ): Promise<T> {
    return this.execute<T>({ method, route, params, body });
  }

  /**
   * 논리 호출 1건 실행
   *
   * 같은 스코프의 요청은 한 번에 하나만 나간다.
   * 응답 본문의 타입은 호출자가 T로 지정한다 (검증하지 않음).
   */
  async execute<T = unknown>(request: RestRequest): Promise<T> {
    if (this.closed) {
      throw new RestClosedError();
    }
    // 템플릿 오류는 버킷을 잡기 전에 던진다
    const path = compileRoute(request.route, request.params);
    const routeKey = getRouteKey(request.method, request.route);
    const url = this.buildUrl(path, request.query);

    const ctx = { requestId: randomUUID(), route: routeKey, startedAt: this.now() };
    try {
      const body = await runWithContext(ctx, () => this.run(request, routeKey, url));
      // 타입 파라미터는 호출자 책임: 와이어 값을 그대로 넘긴다
      return body as T;
    } catch (err) {
      if (this.closed && !(err instanceof HttpError)) {
        throw new RestClosedError();
      }
      throw err;
    }
  }

  /** 대기 중인 릴리스 타이머, 전역 게이트 대기, 버킷 대기자를 모두 정리 */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closeController.abort();
    this.globalRateLimit.clear();
    this.buckets.close();
  }

  private async run(request: RestRequest, routeKey: string, url: string): Promise<unknown> {
    const signal = request.signal
      ? AbortSignal.any([request.signal, this.closeController.signal])
      : this.closeController.signal;
    // held: 지금 락을 보유한 버킷 (병합되면 대상 버킷으로 바뀐다)
    let held: Bucket | undefined = await this.buckets
      .resolve(routeKey, getMajorParams(request.params))
      .acquire(signal);
    try {
      let lastError: HttpError | undefined;
      let rateLimitRetries = 0;
      let attempt = 0;

      while (attempt < this.maxAttempts) {
        const current: Bucket = held;
        held = undefined;
        held = await current.forward(signal);
        const bucket: Bucket = held;

        if (request.global !== false) {
          await this.globalRateLimit.wait(signal);
        }

        const startedAt = this.now();
        const response = await this.transport.send({
          method: request.method,
          url,
          headers: this.buildHeaders(request),
          body: this.buildBody(request),
          signal,
        });
        const info = parseRateLimitHeaders(response.headers);
        this.buckets.update(bucket, info);
        getEventBus().emit(
          'rest:request',
          request.method,
          routeKey,
          response.status,
          this.now() - startedAt,
        );

        if (response.status >= 200 && response.status < 300) {
          return response.body;
        }

        const init = toErrorInit(request.method, url, response);

        if (response.status === 429) {
          const retryAfterMs = getRetryAfterMs(response.body, response.headers, info);
          const global = isGlobalRateLimit(response.body, info);
          lastError = new RateLimitError(init, retryAfterMs, global);
          getEventBus().emit('rest:ratelimit', bucket.key, retryAfterMs, global);

          if (++rateLimitRetries > this.maxRateLimitRetries) {
            throw lastError;
          }
          this.logger.warn(
            `Rate limited on ${routeKey} (${global ? 'global' : bucket.key}), retrying in ${formatDuration(retryAfterMs)}`,
          );
          if (global) {
            await this.globalRateLimit.hold(retryAfterMs, this.sleep, signal);
          } else {
            await this.sleep(retryAfterMs, signal);
          }
          // 429는 시도 횟수를 소모하지 않는다
          continue;
        }

        const error = classifyHttpError(init);
        if (!RETRYABLE_STATUSES.has(response.status)) {
          throw error;
        }

        lastError = error;
        attempt++;
        if (attempt < this.maxAttempts) {
          const delay = computeLinearBackoff(attempt - 1, this.retryBaseDelayMs);
          this.logger.debug(
            `${routeKey} returned ${response.status}, attempt ${attempt}/${this.maxAttempts}, retrying in ${formatDuration(delay)}`,
          );
          await this.sleep(delay, signal);
        }
      }

      if (!lastError) {
        throw new HttpError({ status: 0, method: request.method, url, body: '', headers: {} });
      }
      throw lastError;
    } finally {
      held?.release();
    }
  }

  private buildUrl(path: string, query: RestRequest['query']): string {
    if (!query) {
      return `${this.baseUrl}${path}`;
    }
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      search.append(key, String(value));
    }
    const qs = search.toString();
    return qs ? `${this.baseUrl}${path}?${qs}` : `${this.baseUrl}${path}`;
  }

  private buildHeaders(request: RestRequest): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    if (this.token) {
      headers.Authorization = `Bot ${this.token}`;
    }
    if (request.reason) {
      headers['X-Audit-Log-Reason'] = encodeURIComponent(request.reason);
    }
    if (request.body !== undefined && !request.files?.length) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }

  /** files가 있으면 payload_json + files[n] 멀티파트 */
  private buildBody(request: RestRequest): string | FormData | undefined {
    if (request.files?.length) {
      const form = new FormData();
      if (request.body !== undefined) {
        form.append('payload_json', JSON.stringify(request.body));
      }
      request.files.forEach((file, index) => {
        const blob = new Blob([new Uint8Array(file.data)], {
          type: file.contentType ?? 'application/octet-stream',
        });
        form.append(`files[${index}]`, blob, file.name);
      });
      return form;
    }
    return request.body === undefined ? undefined : JSON.stringify(request.body);
  }
}

function toErrorInit(method: HttpMethod, url: string, response: HttpResponse): HttpErrorInit {
  return {
    status: response.status,
    method,
    url,
    body: response.body,
    headers: headersToRecord(response.headers),
  };
}
