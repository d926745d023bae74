// packages/config/test/io.test.ts
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigError, MissingEnvVarError } from '../src/errors.js';
import { createConfigIO, loadConfig, clearConfigCache } from '../src/io.js';
import { resetOverrides, setOverride } from '../src/runtime-overrides.js';

describe('createConfigIO', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gatecord-io-test-'));
    resetOverrides();
    clearConfigCache();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    resetOverrides();
    clearConfigCache();
  });

  function writeJson5(filename: string, content: string): string {
    const filePath = path.join(tmpDir, filename);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  it('설정 파일이 없으면 기본값을 반환한다', () => {
    const io = createConfigIO({ configPath: path.join(tmpDir, 'nonexistent.json5'), env: {} });
    const config = io.loadConfig();
    expect(config.gateway.intents).toBe(513);
    expect(config.logging.level).toBe('info');
    expect(config.auth.token).toBeUndefined();
  });

  it('JSON5 파일에서 값을 읽는다', () => {
    const cfgPath = writeJson5(
      'bot.json5',
      `{
        // 주석 허용
        gateway: { intents: 32767, compression: 'none', },
      }`,
    );
    const config = createConfigIO({ configPath: cfgPath, env: {} }).loadConfig();
    expect(config.gateway.intents).toBe(32767);
    expect(config.gateway.compression).toBe('none');
  });

  it('환경변수 치환과 ~/ 확장을 적용한다', () => {
    const cfgPath = writeJson5(
      'bot.json5',
      '{ auth: { token: "${BOT_TOKEN}" }, logging: { dir: "~/bot-logs" } }',
    );
    const config = createConfigIO({
      configPath: cfgPath,
      env: { BOT_TOKEN: 'test-secret' },
      homedir: () => '/home/bot',
    }).loadConfig();
    expect(config.auth.token).toBe('test-secret');
    expect(config.logging.dir).toBe('/home/bot/bot-logs');
  });

  it('참조한 환경변수가 없으면 MissingEnvVarError', () => {
    const cfgPath = writeJson5('bot.json5', '{ auth: { token: "${BOT_TOKEN}" } }');
    const io = createConfigIO({ configPath: cfgPath, env: {} });
    expect(() => io.loadConfig()).toThrow(MissingEnvVarError);
  });

  it('검증 실패 시 이슈를 경고하고 파일 내용을 버린다', () => {
    const cfgPath = writeJson5('bot.json5', '{ gateway: { intents: -1 } }');
    const logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const config = createConfigIO({ configPath: cfgPath, env: {}, logger }).loadConfig();
    expect(config.gateway.intents).toBe(513);
    expect(logger.warn).toHaveBeenCalledOnce();
    expect(logger.warn.mock.calls[0]?.[0]).toMatch(/^Config issue \[gateway\.intents\]: /);
  });

  it('파싱 불가한 파일은 ConfigError', () => {
    const cfgPath = writeJson5('bot.json5', '{ gateway: ');
    expect(() => createConfigIO({ configPath: cfgPath, env: {} }).loadConfig()).toThrow(
      ConfigError,
    );
  });

  it('런타임 오버라이드가 파일 값보다 우선한다', () => {
    const cfgPath = writeJson5('bot.json5', '{ gateway: { intents: 1 } }');
    setOverride('gateway.intents', 4096);
    const config = createConfigIO({ configPath: cfgPath, env: {} }).loadConfig();
    expect(config.gateway.intents).toBe(4096);
  });

  it('TTL 캐시 안에서는 동일 참조를 반환한다', () => {
    const cfgPath = writeJson5('bot.json5', '{ rest: { maxAttempts: 4 } }');
    const io = createConfigIO({ configPath: cfgPath, env: {} });
    expect(io.loadConfig()).toBe(io.loadConfig());
  });

  it('invalidateCache 후 새로 로드한다', () => {
    const cfgPath = writeJson5('bot.json5', '{ rest: { maxAttempts: 4 } }');
    const io = createConfigIO({ configPath: cfgPath, env: {} });
    const first = io.loadConfig();
    io.invalidateCache();
    const second = io.loadConfig();
    expect(first).not.toBe(second);
    expect(first).toEqual(second);
  });

  it('configPath를 노출한다', () => {
    const cfgPath = path.join(tmpDir, 'bot.json5');
    expect(createConfigIO({ configPath: cfgPath }).configPath).toBe(cfgPath);
  });
});

describe('loadConfig / clearConfigCache', () => {
  afterEach(() => {
    clearConfigCache();
  });

  it('모듈 레벨 래퍼가 기본값을 반환한다', () => {
    const config = loadConfig({ configPath: path.join(os.tmpdir(), 'gatecord-missing.json5') });
    expect(config.rest.baseUrl).toBe('https://discord.com/api');
  });
});
