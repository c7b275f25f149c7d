import { buildApp } from './app';
import { ADMIN_API_KEY } from '../config/auth';
import { BID_API_BASE, BID_API_KEY, BID_CAMPAIGN_ID, BID_TIMEOUT_MS } from '../config/bidding';
import { logger } from '../config/logger';
import { HISTORY_CAPACITY, HOST, PORT, ZIP_DATA_DIR } from '../config/server';
import { loadTierRegistry } from '../config/tiers';
import { createBidClient } from '../utils/bidding';
import { createRoutingEngineState } from '../utils/routing';
import { directorySource } from '../utils/zip-data';

// Start server
const start = async () => {
  try {
    // Invalid tier configuration is fatal: throws ConfigurationError
    const registry = loadTierRegistry();

    const state = createRoutingEngineState({
      registry,
      logger,
      historyCapacity: HISTORY_CAPACITY,
    });

    const zipSource = directorySource(ZIP_DATA_DIR, registry.priority(), logger);

    // A failed first load is not fatal: the service starts degraded and
    // routes every call as unrouted until a reload succeeds
    await state.zips.reload(zipSource);

    const app = buildApp({
      state,
      zipSource,
      logger,
      adminApiKey: ADMIN_API_KEY,
      bid: createBidClient({
        apiBase: BID_API_BASE,
        apiKey: BID_API_KEY,
        campaignId: BID_CAMPAIGN_ID,
        timeoutMs: BID_TIMEOUT_MS,
      }),
    });

    await app.listen({ port: PORT, host: HOST });
  } catch (err) {
    logger.error({ err }, 'Failed to start');
    process.exit(1);
  }
};

void start();
