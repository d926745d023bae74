import type { ResolvedConfig } from '@gatecord/types';
// packages/config/src/cache-utils.ts
import type { ConfigCache } from './types.js';

const DEFAULT_TTL_MS = 200;

/** TTL 캐시 생성 */
export function createConfigCache(ttlMs = DEFAULT_TTL_MS, now: () => number = Date.now): ConfigCache {
  let config: ResolvedConfig | null = null;
  let expireAt = 0;

  const isValid = (): boolean => config !== null && now() < expireAt;

  return {
    get config() {
      return config;
    },
    get expireAt() {
      return expireAt;
    },
    isValid,
    get(): ResolvedConfig | null {
      return isValid() ? config : null;
    },
    set(newConfig: ResolvedConfig): void {
      config = newConfig;
      expireAt = now() + ttlMs;
    },
    invalidate(): void {
      config = null;
      expireAt = 0;
    },
  };
}
