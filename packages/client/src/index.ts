// @gatecord/client: barrel export
export {
  GatecordClient,
  type GatecordClientOptions,
  type ClientEventMap,
  type DispatchListener,
} from './client.js';
export { ProcessLifecycle, type ProcessLifecycleDeps } from './process/lifecycle.js';
export {
  setupGracefulShutdown,
  type GracefulShutdownOptions,
  type SignalTarget,
} from './process/signal-handler.js';
