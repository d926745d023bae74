// @gatecord/rest: barrel export

export {
  RequestExecutor,
  DEFAULT_USER_AGENT,
  type RequestExecutorOptions,
} from './executor.js';
export { RestApi, type MessageBody, type PatchFields } from './endpoints.js';
export { Bucket, type BucketDeps } from './bucket.js';
export { BucketRegistry, type BucketRegistryDeps } from './bucket-registry.js';
export { GlobalRateLimit } from './global-rate-limit.js';
export { compileRoute, getMajorParams, getRouteKey, getBucketKey } from './route.js';
export {
  parseRateLimitHeaders,
  computeResetDelayMs,
  getRetryAfterMs,
  isGlobalRateLimit,
  isRateLimitBody,
  type HeaderLookup,
} from './headers.js';
export {
  FetchTransport,
  type FetchTransportOptions,
  type HttpTransport,
  type HttpRequestInit,
  type HttpResponse,
  type ResponseHeaders,
} from './transport.js';
export {
  HttpError,
  BadRequestError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  MethodNotAllowedError,
  ServerError,
  RateLimitError,
  RouteParameterError,
  RestClosedError,
  classifyHttpError,
  type HttpErrorInit,
} from './errors.js';
