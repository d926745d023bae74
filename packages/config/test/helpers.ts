// packages/config/test/helpers.ts
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/** 임시 홈 디렉토리에서 콜백 실행 후 정리 */
export async function withTempHome<T>(fn: (tmpHome: string) => T | Promise<T>): Promise<T> {
  const tmpHome = fs.mkdtempSync(path.join(os.tmpdir(), 'gatecord-home-'));
  try {
    return await fn(tmpHome);
  } finally {
    fs.rmSync(tmpHome, { recursive: true, force: true });
  }
}
