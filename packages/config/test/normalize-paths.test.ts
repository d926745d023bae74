// packages/config/test/normalize-paths.test.ts
import { describe, it, expect } from 'vitest';
import { normalizePaths } from '../src/normalize-paths.js';

describe('normalizePaths', () => {
  const homedir = () => '/home/bot';

  it('logging.dir의 ~/와 ~를 homedir로 확장한다', () => {
    expect(normalizePaths({ logging: { dir: '~/logs', file: true } }, homedir)).toEqual({
      logging: { dir: '/home/bot/logs', file: true },
    });
    expect(normalizePaths({ logging: { dir: '~' } }, homedir)).toEqual({
      logging: { dir: '/home/bot' },
    });
  });

  it('경로가 아닌 필드는 ~로 시작해도 그대로 둔다', () => {
    const input = { auth: { token: '~/test-token' }, logging: { dir: '/var/log/gatecord' } };
    expect(normalizePaths(input, homedir)).toEqual(input);
  });

  it('원본 객체를 바꾸지 않는다', () => {
    const input = { logging: { dir: '~/logs' } };
    normalizePaths(input, homedir);
    expect(input.logging.dir).toBe('~/logs');
  });

  it('객체가 아니거나 경로가 없으면 그대로 반환한다', () => {
    expect(normalizePaths('~/x', homedir)).toBe('~/x');
    expect(normalizePaths({ logging: 'bad' }, homedir)).toEqual({ logging: 'bad' });
    expect(normalizePaths({}, homedir)).toEqual({});
  });

  it('확장할 키 경로를 지정할 수 있다', () => {
    expect(normalizePaths({ a: { b: '~/c' } }, homedir, ['a.b'])).toEqual({ a: { b: '/home/bot/c' } });
  });
});
