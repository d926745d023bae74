// packages/infra/src/runtime-guard.ts
export const MINIMUM_NODE_VERSION = 20;

/**
 * Node.js 버전 검증
 *
 * 20 미만이면 에러 메시지 출력 후 process.exit(1).
 */
export function assertSupportedRuntime(version: string = process.versions.node): void {
  const major = getNodeMajorVersion(version);
  if (major < MINIMUM_NODE_VERSION) {
    console.error(
      `Gatecord requires Node.js ${MINIMUM_NODE_VERSION} or later.\n` +
        `Current version: ${version}\n` +
        `Install: https://nodejs.org/`,
    );
    process.exit(1);
  }
}

/** Node.js 메이저 버전 반환 */
export function getNodeMajorVersion(version: string = process.versions.node): number {
  return Number(version.split('.')[0]);
}
