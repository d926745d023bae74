import type { GatecordLogger } from '@gatecord/infra';
// packages/config/src/types.ts
import type { ResolvedConfig } from '@gatecord/types';

/** createConfigIO()에 주입하는 의존성 (테스트 교체 지점, 모두 sync) */
export interface ConfigDeps {
  fs?: Pick<typeof import('node:fs'), 'readFileSync'>;
  json5?: { parse(text: string): unknown };
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  configPath?: string;
  logger?: Pick<GatecordLogger, 'error' | 'warn' | 'info' | 'debug'>;
}

/** TTL 캐시 내부 상태 */
export interface ConfigCache {
  readonly config: ResolvedConfig | null;
  readonly expireAt: number;
  isValid(): boolean;
  get(): ResolvedConfig | null;
  set(config: ResolvedConfig): void;
  invalidate(): void;
}
