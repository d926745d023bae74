// packages/rest/src/errors.ts
import type { HttpMethod } from '@gatecord/types';
import { GatecordError } from '@gatecord/infra';

/** 응답 진단 정보: 에러에 원본 응답을 그대로 싣는다 */
export interface HttpErrorInit {
  status: number;
  method: HttpMethod;
  url: string;
  body: unknown;
  headers: Record<string, string>;
}

/** HTTP 응답 에러 (분류되지 않은 비정상 상태) */
export class HttpError extends GatecordError {
  readonly status: number;
  readonly method: HttpMethod;
  readonly url: string;
  readonly body: unknown;
  readonly headers: Record<string, string>;

  constructor(init: HttpErrorInit, code = 'HTTP_ERROR', cause?: Error) {
    super(`${init.method} ${init.url} failed with ${init.status}: ${describeBody(init.body)}`, code, {
      statusCode: init.status,
      details: { status: init.status, method: init.method, url: init.url },
      cause,
    });
    this.name = 'HttpError';
    this.status = init.status;
    this.method = init.method;
    this.url = init.url;
    this.body = init.body;
    this.headers = init.headers;
  }
}

export class BadRequestError extends HttpError {
  constructor(init: HttpErrorInit) {
    super(init, 'BAD_REQUEST');
    this.name = 'BadRequestError';
  }
}

export class UnauthorizedError extends HttpError {
  constructor(init: HttpErrorInit) {
    super(init, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends HttpError {
  constructor(init: HttpErrorInit) {
    super(init, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends HttpError {
  constructor(init: HttpErrorInit) {
    super(init, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(init: HttpErrorInit) {
    super(init, 'METHOD_NOT_ALLOWED');
    this.name = 'MethodNotAllowedError';
  }
}

/** 5xx */
export class ServerError extends HttpError {
  constructor(init: HttpErrorInit) {
    super(init, 'SERVER_ERROR');
    this.name = 'ServerError';
  }
}

/** 429 재시도 예산 소진 */
export class RateLimitError extends HttpError {
  readonly retryAfterMs: number;
  readonly global: boolean;

  constructor(init: HttpErrorInit, retryAfterMs: number, global: boolean) {
    super(init, 'RATE_LIMITED');
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
    this.global = global;
  }
}

/** 경로 템플릿이 참조하는 파라미터 누락 */
export class RouteParameterError extends GatecordError {
  constructor(route: string, param: string) {
    super(`Missing route parameter "${param}" for ${route}`, 'ROUTE_PARAMETER', {
      statusCode: 400,
      isOperational: false,
      details: { route, param },
    });
    this.name = 'RouteParameterError';
  }
}

/** close() 이후 호출 */
export class RestClosedError extends GatecordError {
  constructor() {
    super('REST client is closed', 'REST_CLOSED', { statusCode: 503 });
    this.name = 'RestClosedError';
  }
}

/** 상태 코드 → 타입별 에러 */
export function classifyHttpError(init: HttpErrorInit): HttpError {
  switch (init.status) {
    case 400:
      return new BadRequestError(init);
    case 401:
      return new UnauthorizedError(init);
    case 403:
      return new ForbiddenError(init);
    case 404:
      return new NotFoundError(init);
    case 405:
      return new MethodNotAllowedError(init);
  }
  return init.status >= 500 ? new ServerError(init) : new HttpError(init);
}

function describeBody(body: unknown): string {
  if (typeof body === 'string') {
    return body.length > 0 ? body.slice(0, 200) : '(empty body)';
  }
  if (typeof body === 'object' && body !== null && 'message' in body) {
    return String(body.message);
  }
  return '(no message)';
}
