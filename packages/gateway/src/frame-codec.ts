// packages/gateway/src/frame-codec.ts
import type { GatewayCompression, GatewayFrame } from '@gatecord/types';
import { promisify } from 'node:util';
import zlib from 'node:zlib';
import { FrameDecodeError } from './errors.js';

const inflateAsync = promisify(zlib.inflate);

/** zlib sync flush 마커: 메시지 경계 */
const ZLIB_SUFFIX = Buffer.from([0x00, 0x00, 0xff, 0xff]);

/**
 * 수신 메시지 → 게이트웨이 프레임
 *
 * - 텍스트: 그대로 JSON 파싱
 * - zlib-stream: 연결 전체에 걸친 inflate 컨텍스트를 유지하고,
 *   누적 버퍼가 00 00 FF FF로 끝날 때만 압축을 푼다
 * - payload: 바이너리 메시지 하나가 완결된 zlib 데이터
 *
 * 연결(소켓 세대)마다 새로 만든다.
 */
export class FrameCodec {
  private readonly compression: GatewayCompression;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private inflater: zlib.Inflate | undefined;
  private output: Buffer[] = [];

  constructor(compression: GatewayCompression = 'zlib-stream') {
    this.compression = compression;
  }

  /** 누적 중인 바이트 수 */
  get pendingBytes(): number {
    return this.buffered;
  }

  /** 완결된 프레임이 생기면 반환, 아직 조각이면 undefined */
  async feed(chunk: string | Uint8Array): Promise<GatewayFrame | undefined> {
    if (typeof chunk === 'string') {
      return parseFrame(chunk);
    }
    if (this.compression === 'payload') {
      return parseFrame(await this.inflateMessage(chunk));
    }
    if (this.compression === 'none') {
      return parseFrame(Buffer.from(chunk).toString('utf8'));
    }

    this.chunks.push(Buffer.from(chunk));
    this.buffered += chunk.byteLength;
    if (!this.endsWithSuffix()) {
      return undefined;
    }

    const data = Buffer.concat(this.chunks, this.buffered);
    this.chunks = [];
    this.buffered = 0;
    return parseFrame(await this.inflateStream(data));
  }

  /** inflate 컨텍스트 해제 */
  close(): void {
    this.inflater?.destroy();
    this.inflater = undefined;
    this.chunks = [];
    this.buffered = 0;
  }

  private endsWithSuffix(): boolean {
    if (this.buffered < ZLIB_SUFFIX.length) {
      return false;
    }
    // 마지막 4바이트가 여러 조각에 걸쳐 있을 수 있다
    const tail = Buffer.concat(this.chunks.slice(-ZLIB_SUFFIX.length)).subarray(-ZLIB_SUFFIX.length);
    return tail.equals(ZLIB_SUFFIX);
  }

  private async inflateMessage(chunk: Uint8Array): Promise<string> {
    try {
      const out = await inflateAsync(chunk);
      return out.toString('utf8');
    } catch (err) {
      throw new FrameDecodeError('Failed to inflate gateway payload', toError(err));
    }
  }

  private inflateStream(data: Buffer): Promise<string> {
    const inflater = this.getInflater();
    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (err: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        this.output = [];
        reject(new FrameDecodeError('Failed to inflate gateway stream', err));
      };
      // 손상된 입력이면 write 콜백 대신 error 이벤트만 올 수 있다
      inflater.once('error', fail);
      inflater.write(data, (err) => {
        inflater.off('error', fail);
        if (err) {
          fail(err);
          return;
        }
        if (settled) {
          return;
        }
        settled = true;
        const out = Buffer.concat(this.output);
        this.output = [];
        resolve(out.toString('utf8'));
      });
    });
  }

  private getInflater(): zlib.Inflate {
    if (!this.inflater) {
      const inflater = zlib.createInflate({ flush: zlib.constants.Z_SYNC_FLUSH });
      inflater.on('data', (out: Buffer) => {
        this.output.push(out);
      });
      // 에러 후 컨텍스트는 못 쓴다
      inflater.on('error', () => {
        this.inflater = undefined;
      });
      this.inflater = inflater;
    }
    return this.inflater;
  }
}

/** JSON 텍스트 → 프레임 (op가 없으면 디코드 실패) */
export function parseFrame(text: string): GatewayFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new FrameDecodeError('Gateway message is not valid JSON', toError(err));
  }
  if (typeof parsed !== 'object' || parsed === null || !('op' in parsed)) {
    throw new FrameDecodeError('Gateway message has no opcode');
  }
  const { op } = parsed;
  if (typeof op !== 'number') {
    throw new FrameDecodeError('Gateway message has no opcode');
  }
  const d = 'd' in parsed ? parsed.d : null;
  const s = 's' in parsed && typeof parsed.s === 'number' ? parsed.s : null;
  const t = 't' in parsed && typeof parsed.t === 'string' ? parsed.t : null;
  return { op, d, s, t };
}

function toError(err: unknown): Error | undefined {
  return err instanceof Error ? err : undefined;
}
