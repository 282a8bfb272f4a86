import { createDealPipeline } from '../app.js';

/**
 * Cron-compatible single deal cycle.
 * One-shot (exit 0/1) so it can be invoked by system cron, CI schedules, etc.
 */
async function main() {
  const stats = await createDealPipeline().runCycle();
  if (stats.state === 'FAILED') process.exitCode = 1;
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('[deal-cycle] fatal', err);
  process.exitCode = 1;
});
