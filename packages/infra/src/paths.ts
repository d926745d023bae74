// packages/infra/src/paths.ts
import * as os from 'node:os';
import * as path from 'node:path';
import { getEnv } from './env.js';

/** Gatecord 상태 디렉토리 (설정/로그의 루트, GATECORD_STATE_DIR로 재정의) */
export function getStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  return getEnv('STATE_DIR', env) ?? path.join(homedir(), '.gatecord');
}

/** 설정 디렉토리 */
export function getConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  return path.join(getStateDir(env, homedir), 'config');
}

/** 로그 디렉토리 */
export function getLogDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  return path.join(getStateDir(env, homedir), 'logs');
}
