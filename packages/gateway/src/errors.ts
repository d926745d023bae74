// packages/gateway/src/errors.ts
import type { ResumeState } from '@gatecord/types';
import { GatecordError } from '@gatecord/infra';

/** 게이트웨이 에러 베이스 */
export class GatewayError extends GatecordError {
  constructor(
    message: string,
    code = 'GATEWAY_ERROR',
    opts: { cause?: Error; details?: Record<string, unknown> } = {},
  ) {
    super(message, code, { statusCode: 502, ...opts });
    this.name = 'GatewayError';
  }
}

/**
 * 세션 종료
 *
 * resumable=false는 재연결 금지 코드(인증 실패 등)로 닫힌 경우.
 * resumable=true면 호출자가 resumeState로 새 세션을 만들 수 있다.
 */
export class GatewayClosedError extends GatewayError {
  readonly closeCode: number;
  readonly resumable: boolean;
  readonly resumeState: ResumeState | undefined;

  constructor(
    closeCode: number,
    reason: string,
    opts: { resumable: boolean; resumeState?: ResumeState; cause?: Error },
  ) {
    super(
      reason ? `Gateway closed with code ${closeCode}: ${reason}` : `Gateway closed with code ${closeCode}`,
      'GATEWAY_CLOSED',
      { cause: opts.cause, details: { closeCode, resumable: opts.resumable } },
    );
    this.name = 'GatewayClosedError';
    this.closeCode = closeCode;
    this.resumable = opts.resumable;
    this.resumeState = opts.resumeState;
  }
}

/** 수신 프레임 압축 해제/파싱 실패 */
export class FrameDecodeError extends GatewayError {
  constructor(message: string, cause?: Error) {
    super(message, 'FRAME_DECODE', { cause });
    this.name = 'FrameDecodeError';
  }
}

/** 재개 불가 invalid session이 연속으로 한도를 넘음 */
export class InvalidSessionError extends GatewayError {
  constructor(count: number) {
    super(`Session invalidated ${count} times in a row`, 'INVALID_SESSION', {
      details: { count },
    });
    this.name = 'InvalidSessionError';
  }
}

/** 소켓 오픈 실패 (재시도 소진) */
export class GatewayConnectError extends GatewayError {
  constructor(url: string, cause?: Error) {
    super(`Failed to connect to ${url}`, 'GATEWAY_CONNECT', { cause, details: { url } });
    this.name = 'GatewayConnectError';
  }
}
