import { getServerEnv } from '@dealrelay/shared';

import { createDealPipeline } from './app.js';
import { startScheduleRuntime } from './scheduler/runtime.js';

async function main() {
  const env = getServerEnv();
  const pipeline = createDealPipeline(env);

  const runtime = startScheduleRuntime([
    { name: 'DEAL_CYCLE', cron: env.DEAL_CYCLE_CRON, run: () => pipeline.runCycle() },
    { name: 'PUBLISH_PERIOD_RESET', cron: env.PUBLISH_RESET_CRON, run: async () => pipeline.resetPublishPeriod() },
  ]);

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    // eslint-disable-next-line no-console
    console.log(`[worker] ${signal} received, draining in-flight cycle`);
    runtime.stop().then(
      () => {
        // eslint-disable-next-line no-console
        console.log('[worker] stopped');
      },
      (err: unknown) => {
        // eslint-disable-next-line no-console
        console.error('[worker] shutdown failed', err);
        process.exitCode = 1;
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // eslint-disable-next-line no-console
  console.log(
    `[worker] initialized (logLevel=${env.WORKER_LOG_LEVEL}) (publishing=${env.PUBLISHING_ENABLED ? 'live' : 'dry-run'}) (cycle=${env.DEAL_CYCLE_CRON})`,
  );
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('[worker] fatal', err);
  process.exitCode = 1;
});
