// packages/config/src/errors.ts
import { GatecordError } from '@gatecord/infra';

/** 설정 시스템 기본 에러 */
export class ConfigError extends GatecordError {
  constructor(
    message: string,
    opts: { code?: string; cause?: Error; details?: Record<string, unknown> } = {},
  ) {
    super(message, opts.code ?? 'CONFIG_ERROR', { cause: opts.cause, details: opts.details });
    this.name = 'ConfigError';
  }
}

/** 필수 환경변수 누락 */
export class MissingEnvVarError extends ConfigError {
  readonly variable: string;
  /** 변수를 참조한 설정 키 (예: `auth.token`) */
  readonly keyPath: string | undefined;

  constructor(variable: string, keyPath?: string) {
    super(
      `Environment variable not set: ${variable}` + (keyPath ? ` (referenced by ${keyPath})` : ''),
      { code: 'MISSING_ENV_VAR', details: { variable, keyPath } },
    );
    this.name = 'MissingEnvVarError';
    this.variable = variable;
    this.keyPath = keyPath;
  }
}

/** Zod 검증 실패 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'INVALID_CONFIG', details });
    this.name = 'ConfigValidationError';
  }
}
