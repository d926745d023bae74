// packages/client/src/main.ts
import { loadConfig } from '@gatecord/config';
import {
  assertSupportedRuntime,
  createLogger,
  getEventBus,
  setupUnhandledRejectionHandler,
} from '@gatecord/infra';
import { GatecordClient } from './client.js';
import { ProcessLifecycle } from './process/lifecycle.js';

async function main(): Promise<void> {
  assertSupportedRuntime();

  const config = loadConfig();
  const logger = createLogger({
    name: 'gatecord',
    level: config.logging.level,
    file: { enabled: config.logging.file, path: config.logging.dir },
    redactKeys: config.logging.redactSensitive ? undefined : [],
  });
  const lifecycle = new ProcessLifecycle({ logger });
  const disposeRejections = setupUnhandledRejectionHandler(logger);

  const client = new GatecordClient({ config, logger });
  client.onDispatch('READY', (data) => {
    const user = data.user;
    const name = user && typeof user === 'object' && 'username' in user ? String(user.username) : 'unknown';
    logger.info(`Logged in as ${name}`);
    getEventBus().emit('system:ready');
  });

  // CleanupFn 등록 (역순 실행: 클라이언트 → rejection 핸들러 → 로그 flush)
  lifecycle.register(() => logger.flush());
  lifecycle.register(async () => disposeRejections());
  lifecycle.register(async () => client.close());

  // 시그널 핸들러 초기화
  lifecycle.init();

  await client.connect();
}

main().catch((err: unknown) => {
  console.error('Gatecord client stopped:', err);
  process.exit(1);
});
