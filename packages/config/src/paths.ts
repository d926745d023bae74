// packages/config/src/paths.ts
import { getConfigDir } from '@gatecord/infra';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export const CONFIG_FILE_NAME = 'gatecord.json5';

/**
 * 설정 파일 경로 해석
 *
 * 우선순위:
 *   1. GATECORD_CONFIG 환경변수
 *   2. <상태 디렉토리>/config/gatecord.json5 (기본 ~/.gatecord, GATECORD_STATE_DIR로 재정의)
 *   3. ./gatecord.json5
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const envPath = env.GATECORD_CONFIG;
  if (envPath) {
    return path.resolve(envPath);
  }

  const homePath = path.join(getConfigDir(env, homedir), CONFIG_FILE_NAME);
  if (fs.existsSync(homePath)) {
    return homePath;
  }

  return path.resolve(CONFIG_FILE_NAME);
}
