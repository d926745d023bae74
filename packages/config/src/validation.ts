import type { GatecordConfig, ConfigValidationIssue } from '@gatecord/types';
// packages/config/src/validation.ts
import { ConfigValidationError } from './errors.js';
import { GatecordConfigSchema } from './zod-schema.js';

export interface ValidationResult {
  valid: boolean;
  /** 검증 실패 시 빈 {} */
  config: GatecordConfig;
  issues: ConfigValidationIssue[];
}

/**
 * Zod 기반 검증
 *
 * 실패 시 이슈를 `a.b[0]` 경로로 평탄화하고 빈 설정을 돌려준다.
 */
export function validateConfig(raw: unknown): ValidationResult {
  const result = GatecordConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data, issues: [] };
  }

  const issues = result.error.issues.map(
    (issue): ConfigValidationIssue => ({
      path: formatIssuePath(issue.path) || '(root)',
      message: issue.message,
      severity: 'error',
    }),
  );

  return { valid: false, config: {}, issues };
}

/** 검증 실패 시 에러를 throw하는 strict 버전 */
export function validateConfigStrict(raw: unknown): GatecordConfig {
  const { valid, config, issues } = validateConfig(raw);
  if (!valid) {
    throw new ConfigValidationError(
      `Config validation failed: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues },
    );
  }
  return config;
}

function formatIssuePath(segments: readonly PropertyKey[]): string {
  let out = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${String(segment)}` : String(segment);
    }
  }
  return out;
}
