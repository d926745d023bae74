// @gatecord/types: barrel export
export type * from './common.js';
export type * from './config.js';
export type * from './gateway.js';
export type * from './rest.js';

// 런타임 값 (const enum 대체)
export { GatewayOpcode, GatewayCloseCode, DEFAULT_FATAL_CLOSE_CODES } from './gateway.js';

// 팩토리/헬퍼
export {
  unset,
  explicitNull,
  present,
  serializeFields,
} from './common.js';
