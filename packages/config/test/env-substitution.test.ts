// packages/config/test/env-substitution.test.ts
import { describe, it, expect } from 'vitest';
import { resolveEnvVars } from '../src/env-substitution.js';
import { MissingEnvVarError } from '../src/errors.js';

describe('resolveEnvVars', () => {
  const env: NodeJS.ProcessEnv = {
    DISCORD_TOKEN: 'test-secret',
    API_HOST: 'discord.test',
    API_VERSION: '10',
  };

  it('${VAR}를 치환한다', () => {
    expect(resolveEnvVars('${DISCORD_TOKEN}', env)).toBe('test-secret');
  });

  it('문자열 내 여러 변수를 치환한다', () => {
    expect(resolveEnvVars('https://${API_HOST}/v${API_VERSION}', env)).toBe(
      'https://discord.test/v10',
    );
  });

  it('소문자 변수는 치환하지 않는다', () => {
    expect(resolveEnvVars('${lower}', env)).toBe('${lower}');
  });

  it('미설정/빈 변수에 MissingEnvVarError를 throw한다', () => {
    expect(() => resolveEnvVars('${MISSING_VAR}', env)).toThrow(MissingEnvVarError);
    expect(() => resolveEnvVars('${EMPTY}', { EMPTY: '' })).toThrow(
      'Environment variable not set: EMPTY',
    );
  });

  it('에러에 변수를 참조한 설정 키를 싣는다', () => {
    const input = { auth: { token: '${BOT_TOKEN}' } };
    expect(() => resolveEnvVars(input, env)).toThrow(
      'Environment variable not set: BOT_TOKEN (referenced by auth.token)',
    );

    const err = (() => {
      try {
        resolveEnvVars({ gateway: { hosts: ['ok', '${NOPE}'] } }, env);
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(MissingEnvVarError);
    expect(err).toMatchObject({ variable: 'NOPE', keyPath: 'gateway.hosts[1]' });
  });

  it('$${VAR} escape를 리터럴 ${VAR}로 출력한다', () => {
    expect(resolveEnvVars('$${DISCORD_TOKEN}', env)).toBe('${DISCORD_TOKEN}');
  });

  it('치환 결과를 다시 해석하지 않는다', () => {
    expect(resolveEnvVars('${NESTED}', { NESTED: '${DISCORD_TOKEN}' })).toBe('${DISCORD_TOKEN}');
  });

  it('객체/배열을 재귀적으로 치환하고 비문자열은 그대로 둔다', () => {
    const input = { auth: { token: '${DISCORD_TOKEN}' }, codes: ['${API_VERSION}', 4004], file: true };
    expect(resolveEnvVars(input, env)).toEqual({
      auth: { token: 'test-secret' },
      codes: ['10', 4004],
      file: true,
    });
  });
});
