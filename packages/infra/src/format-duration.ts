// packages/infra/src/format-duration.ts

/**
 * 밀리초를 사람이 읽는 문자열로 변환 (레이트 리밋/재연결 대기 로그용)
 *
 * - 0ms → "0ms"
 * - 250ms → "250ms"
 * - 1250ms → "1.25s"
 * - 3661000ms → "1h 1m 1s"
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms <= 0) {
    return '0ms';
  }
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    // 소수점 둘째 자리까지, 뒤쪽 0 제거
    return `${Number((ms / 1000).toFixed(2))}s`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  const parts: string[] = [];
  if (hours > 0) {
    parts.push(`${hours}h`);
  }
  if (minutes % 60 > 0) {
    parts.push(`${minutes % 60}m`);
  }
  if (seconds % 60 > 0) {
    parts.push(`${seconds % 60}s`);
  }
  return parts.join(' ');
}
