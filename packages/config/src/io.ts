// packages/config/src/io.ts
import type { ResolvedConfig } from '@gatecord/types';
import { getErrorCode } from '@gatecord/infra';
import JSON5 from 'json5';
import * as fs from 'node:fs';
import * as os from 'node:os';
import type { ConfigCache, ConfigDeps } from './types.js';
import { createConfigCache } from './cache-utils.js';
import { applyDefaults } from './defaults.js';
import { resolveEnvVars } from './env-substitution.js';
import { ConfigError } from './errors.js';
import { normalizePaths } from './normalize-paths.js';
import { resolveConfigPath } from './paths.js';
import { applyOverrides } from './runtime-overrides.js';
import { validateConfig } from './validation.js';

/** ConfigIO: 설정 읽기 파사드 */
export interface ConfigIO {
  /** 파이프라인으로 설정 로드 */
  loadConfig(): ResolvedConfig;
  /** 캐시 무효화 */
  invalidateCache(): void;
  /** 현재 설정 파일 경로 */
  readonly configPath: string;
}

/**
 * ConfigIO 팩토리
 *
 * 파이프라인:
 *   1. 파일 읽기 (JSON5, 없으면 {})
 *   2. 환경변수 치환
 *   3. 경로 정규화 (~/)
 *   4. 런타임 오버라이드
 *   5. Zod 검증 (실패 시 이슈 로그 + 파일 내용 폐기)
 *   6. 기본값 적용
 */
export function createConfigIO(deps: ConfigDeps = {}): ConfigIO {
  const fsModule = deps.fs ?? fs;
  const json5Module = deps.json5 ?? JSON5;
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const configPath = deps.configPath ?? resolveConfigPath(env, homedir);
  const logger = deps.logger;
  const cache: ConfigCache = createConfigCache();

  function readConfigFile(): unknown {
    let content: string;
    try {
      content = fsModule.readFileSync(configPath, 'utf-8');
    } catch (err) {
      if (getErrorCode(err) === 'ENOENT') {
        logger?.debug(`Config file not found: ${configPath}, using defaults`);
        return {};
      }
      throw new ConfigError(`Failed to read config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    try {
      return json5Module.parse(content);
    } catch (err) {
      throw new ConfigError(`Failed to parse config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  function loadConfig(): ResolvedConfig {
    const cached = cache.get();
    if (cached) {
      return cached;
    }

    let raw = readConfigFile();
    raw = resolveEnvVars(raw, env);
    raw = normalizePaths(raw, homedir);
    raw = applyOverrides(raw);

    const { valid, config, issues } = validateConfig(raw);
    if (!valid) {
      for (const issue of issues) {
        logger?.warn(`Config issue [${issue.path}]: ${issue.message}`);
      }
    }

    const resolved = applyDefaults(config, env);
    cache.set(resolved);
    return resolved;
  }

  return {
    loadConfig,
    invalidateCache: () => cache.invalidate(),
    get configPath() {
      return configPath;
    },
  };
}

// ─── 모듈 레벨 래퍼 (편의) ───

let defaultIO: ConfigIO | null = null;
let defaultDeps: ConfigDeps | undefined;

/**
 * 기본 ConfigIO로 설정 로드 (싱글턴).
 * deps가 이전 호출과 다르면 내부 IO를 재생성한다.
 */
export function loadConfig(deps?: ConfigDeps): ResolvedConfig {
  if (!defaultIO || (deps && deps !== defaultDeps)) {
    defaultDeps = deps;
    defaultIO = createConfigIO(deps);
  }
  return defaultIO.loadConfig();
}

/** 기본 ConfigIO 캐시 초기화 */
export function clearConfigCache(): void {
  defaultIO?.invalidateCache();
  defaultIO = null;
  defaultDeps = undefined;
}
