// @gatecord/gateway: barrel export

export { GatewaySession, type GatewaySessionOptions, type SendLimitOptions } from './session.js';
export { FrameCodec, parseFrame } from './frame-codec.js';
export {
  ConnectionRateLimiter,
  type ConnectionRateLimiterOptions,
} from './connection-rate-limiter.js';
export { Heartbeat, type HeartbeatOptions } from './heartbeat.js';
export { AsyncQueue } from './async-queue.js';
export {
  WsGatewaySocket,
  WsSocketFactory,
  type GatewaySocket,
  type GatewaySocketFactory,
  type SocketEvent,
  type WsSocketFactoryOptions,
} from './socket.js';
export {
  buildGatewayUrl,
  buildIdentify,
  buildResume,
  buildHeartbeat,
  buildRequestGuildMembers,
  DEFAULT_IDENTIFY_PROPERTIES,
  type GatewayUrlOptions,
  type IdentifyOptions,
  type RequestGuildMembersOptions,
} from './payloads.js';
export {
  GatewayError,
  GatewayClosedError,
  FrameDecodeError,
  InvalidSessionError,
  GatewayConnectError,
} from './errors.js';
