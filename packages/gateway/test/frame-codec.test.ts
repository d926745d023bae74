import { describe, it, expect, afterEach } from 'vitest';
import type { GatewayFrame } from '@gatecord/types';
import { constants, deflateRawSync, deflateSync } from 'node:zlib';
import { FrameDecodeError } from '../src/errors.js';
import { FrameCodec, parseFrame } from '../src/frame-codec.js';

const first: GatewayFrame = { op: 10, d: { heartbeat_interval: 41250 }, s: null, t: null };
const second: GatewayFrame = {
  op: 0,
  d: { content: 'hello hello hello', channel_id: '1' },
  s: 1,
  t: 'MESSAGE_CREATE',
};

/** 연결 하나의 zlib 스트림: 메시지마다 sync flush로 끝난다 */
function compressedStream(): Buffer[] {
  const opts = { finishFlush: constants.Z_SYNC_FLUSH };
  return [
    deflateSync(JSON.stringify(first), opts),
    // 같은 스트림의 이어지는 블록 (헤더 없음)
    deflateRawSync(JSON.stringify(second), opts),
  ];
}

async function feedAll(codec: FrameCodec, chunks: Uint8Array[]): Promise<GatewayFrame[]> {
  const frames: GatewayFrame[] = [];
  for (const chunk of chunks) {
    const frame = await codec.feed(chunk);
    if (frame) {
      frames.push(frame);
    }
  }
  return frames;
}

const codecs: FrameCodec[] = [];
function createCodec(...args: ConstructorParameters<typeof FrameCodec>): FrameCodec {
  const codec = new FrameCodec(...args);
  codecs.push(codec);
  return codec;
}

afterEach(() => {
  for (const codec of codecs.splice(0)) {
    codec.close();
  }
});

describe('FrameCodec', () => {
  it('텍스트 프레임은 바로 파싱한다', async () => {
    const codec = createCodec('zlib-stream');
    await expect(codec.feed('{"op":11,"d":null}')).resolves.toEqual({
      op: 11,
      d: null,
      s: null,
      t: null,
    });
  });

  it('zlib-stream: 메시지 단위로 넣으면 순서대로 풀린다', async () => {
    const codec = createCodec('zlib-stream');
    await expect(feedAll(codec, compressedStream())).resolves.toEqual([first, second]);
  });

  it('zlib-stream: 한 바이트씩 넣어도 같은 프레임이 나온다', async () => {
    const codec = createCodec('zlib-stream');
    const bytes = [...Buffer.concat(compressedStream())].map((b) => Uint8Array.of(b));
    await expect(feedAll(codec, bytes)).resolves.toEqual([first, second]);
    expect(codec.pendingBytes).toBe(0);
  });

  it('zlib-stream: 마커 전까지는 아무것도 반환하지 않는다', async () => {
    const codec = createCodec('zlib-stream');
    const [message = Buffer.alloc(0)] = compressedStream();
    await expect(codec.feed(message.subarray(0, message.length - 4))).resolves.toBeUndefined();
    expect(codec.pendingBytes).toBe(message.length - 4);
    await expect(codec.feed(message.subarray(message.length - 4))).resolves.toEqual(first);
  });

  it('payload: 바이너리 메시지 하나씩 따로 푼다', async () => {
    const codec = createCodec('payload');
    await expect(codec.feed(deflateSync(JSON.stringify(second)))).resolves.toEqual(second);
    await expect(codec.feed(deflateSync(JSON.stringify(first)))).resolves.toEqual(first);
  });

  it('none: 바이너리는 UTF-8 JSON으로 읽는다', async () => {
    const codec = createCodec('none');
    await expect(codec.feed(Buffer.from('{"op":1,"d":7}'))).resolves.toEqual({
      op: 1,
      d: 7,
      s: null,
      t: null,
    });
  });

  it('손상된 스트림은 FrameDecodeError', async () => {
    const codec = createCodec('zlib-stream');
    await expect(codec.feed(Uint8Array.of(1, 2, 3, 0, 0, 0xff, 0xff))).rejects.toBeInstanceOf(
      FrameDecodeError,
    );
  });
});

describe('parseFrame', () => {
  it('JSON이 아니면 FrameDecodeError', () => {
    expect(() => parseFrame('{op:')).toThrow(FrameDecodeError);
  });

  it('op가 없거나 숫자가 아니면 FrameDecodeError', () => {
    expect(() => parseFrame('{"d":{}}')).toThrow('Gateway message has no opcode');
    expect(() => parseFrame('{"op":"0"}')).toThrow('Gateway message has no opcode');
    expect(() => parseFrame('[1]')).toThrow(FrameDecodeError);
  });
});
