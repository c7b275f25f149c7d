/**
 * Check ZIP
 *
 * CLI tool to see how a ZIP would route right now, using the local tier
 * configuration and ZIP data directory (no server needed, no bid sent).
 *
 * Usage: npm run check-zip -- <zip> [iso-time]
 * Example: npm run check-zip -- 10001 2026-10-19T14:00:00Z
 */

import pino from 'pino';
import { ZIP_DATA_DIR } from '../src/config/server';
import { loadTierRegistry } from '../src/config/tiers';
import { createRoutingEngineState, routeCall } from '../src/utils/routing';
import { directorySource } from '../src/utils/zip-data';

async function main() {
  const zip = process.argv[2];
  const at = process.argv[3] ? new Date(process.argv[3]) : new Date();

  if (!zip || Number.isNaN(at.getTime())) {
    console.log('Usage: npm run check-zip -- <zip> [iso-time]');
    console.log('Example: npm run check-zip -- 10001 2026-10-19T14:00:00Z');
    process.exit(1);
  }

  const logger = pino({ level: 'warn' });
  const registry = loadTierRegistry();
  const state = createRoutingEngineState({ registry, logger });

  const load = await state.zips.reload(directorySource(ZIP_DATA_DIR, registry.priority(), logger));
  if (!load.ok) {
    console.error(`Cannot load ZIP data: ${load.error}`);
    process.exit(1);
  }

  const result = routeCall(state, zip, 'check-zip', at);

  console.log(`\nZIP ${zip} at ${at.toISOString()}:`);
  if (!result.routed) {
    console.log(`  Not routed (${result.reason})`);
    return;
  }

  console.log(`  Original tier: ${result.original_tier}`);
  console.log(`  Chosen tier:   ${result.chosen_tier} (offer ${result.offer_id})`);
  console.log(`  Fallback used: ${result.fallback_used}`);
  for (const attempt of result.attempts) {
    console.log(
      `    ${attempt.tier}: hours ${attempt.business_hours_ok ? 'open' : 'closed'}, ` +
        `cap ${attempt.rate_limit_ok ? 'ok' : 'full'}`
    );
  }
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
