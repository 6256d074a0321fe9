import { env } from './env';
import { log } from './log';
import { enableDefaultMetrics } from './metrics';
import { buildServer } from './server';

async function main(): Promise<void> {
  enableDefaultMetrics();
  const { api, state, config } = await buildServer();

  await api.start();
  log.info(
    { event: 'server_listening', port: api.port, bind_scope: config.bindScope, service: config.serviceName },
    'server listening',
  );

  // Requests arriving before warm-up finishes wait on the same load.
  state.warmUp(env.DEFAULT_MODEL).catch((error: unknown) => {
    log.error({ err: error, event: 'model_warm_up_failed' }, 'model warm-up failed');
  });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    log.info({ event: 'server_stopping', signal }, 'server stopping');
    api.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: error, event: 'server_stop_failed' }, 'server stop failed');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  log.fatal({ err: error, event: 'server_start_failed' }, 'server failed to start');
  process.exit(1);
});
