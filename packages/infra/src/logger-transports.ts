// packages/infra/src/logger-transports.ts
import * as fs from 'node:fs';
import * as path from 'node:path';
import { getLogDir } from './paths.js';

export interface FileTransportConfig {
  enabled: boolean;
  /** 로그 디렉토리 (기본: getLogDir()) */
  path?: string;
  maxSizeMb?: number; // 기본: 10
  maxFiles?: number; // 기본: 5
}

const LOG_FILE_NAME = 'gatecord.log';

/**
 * 크기 기반 로테이션 로그 파일
 *
 * 다음 줄을 쓰면 maxBytes를 넘는 시점에 gatecord.log → .1 → ... 로 밀어낸다.
 * close() 후 다시 write()하면 파일을 새로 연다.
 */
export class RotatingLogFile {
  private stream: fs.WriteStream | undefined;
  private ending: Promise<void>[] = [];
  private size: number;

  constructor(
    readonly filePath: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {
    this.size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
  }

  write(line: string): void {
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxBytes) {
      this.endStream();
      rotateFiles(this.filePath, this.maxFiles);
      this.size = 0;
    }
    // fd를 동기로 열어야 바로 뒤의 로테이션이 이 파일을 본다
    this.stream ??= fs.createWriteStream(this.filePath, {
      fd: fs.openSync(this.filePath, 'a', 0o600),
    });
    this.stream.write(line);
    this.size += bytes;
  }

  /** 버퍼에 남은 줄까지 기록하고 스트림을 닫는다 */
  async close(): Promise<void> {
    this.endStream();
    const ending = this.ending;
    this.ending = [];
    await Promise.all(ending);
  }

  private endStream(): void {
    const stream = this.stream;
    this.stream = undefined;
    if (stream && !stream.writableFinished) {
      this.ending.push(new Promise<void>((resolve) => stream.end(resolve)));
    }
  }
}

/**
 * tslog에 JSON 라인 파일 트랜스포트 부착
 *
 * @returns 로그 파일을 닫는 flush 함수 (비활성이면 undefined)
 */
export function attachFileTransport(
  logger: { attachTransport: (fn: (logObj: unknown) => void) => void },
  config: FileTransportConfig,
): (() => Promise<void>) | undefined {
  if (!config.enabled) {
    return undefined;
  }

  const logDir = config.path ?? getLogDir();
  fs.mkdirSync(logDir, { recursive: true });
  const file = new RotatingLogFile(
    path.join(logDir, LOG_FILE_NAME),
    (config.maxSizeMb ?? 10) * 1024 * 1024,
    config.maxFiles ?? 5,
  );

  logger.attachTransport((logObj: unknown) => {
    file.write(JSON.stringify(logObj) + '\n');
  });
  return () => file.close();
}

/** gatecord.log → gatecord.log.1 → ... → gatecord.log.(maxFiles-1), 가장 오래된 것은 덮어쓴다 */
export function rotateFiles(basePath: string, maxFiles: number): void {
  for (let i = maxFiles - 1; i >= 1; i--) {
    const from = i === 1 ? basePath : `${basePath}.${i - 1}`;
    if (fs.existsSync(from)) {
      fs.renameSync(from, `${basePath}.${i}`);
    }
  }
}
