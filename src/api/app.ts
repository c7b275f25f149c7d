import Fastify from 'fastify';
import { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { Logger } from 'pino';
import {
  AnalyticsResponseSchema,
  CallEventRequestSchema,
  CallEventResponseSchema,
  ErrorResponseSchema,
  HealthResponseSchema,
  HistoryQuerySchema,
  HistoryResponseSchema,
  TierListResponseSchema,
  ZipReloadResponseSchema,
} from './schemas';
import { validateCallEvent } from './validation';
import { createAdminAuthHook } from './hooks/authenticate';
import { handleCallEvent } from '../utils/calls';
import { RoutingEngineState } from '../utils/routing';
import { ZipSource } from '../utils/zip-index';
import { BidClient } from '../types/bidding';

const DEFAULT_HISTORY_LIMIT = 50;

export interface AppDependencies {
  state: RoutingEngineState;
  bid: BidClient;
  /** Source read by POST /v1/admin/zips/reload */
  zipSource: ZipSource;
  logger: Logger;
  adminApiKey?: string;
  /** Clock for routing decisions */
  now?: () => Date;
}

export function buildApp(deps: AppDependencies) {
  const { state, bid, zipSource } = deps;
  const now = deps.now ?? (() => new Date());

  const app = Fastify({
    logger: deps.logger,
  }).withTypeProvider<TypeBoxTypeProvider>();

  app.addHook('preHandler', createAdminAuthHook(deps.adminApiKey ?? ''));

  app.get('/', async () => {
    return 'Webhook is running';
  });

  /**
   * GET /health - Liveness plus ZIP index freshness
   *
   * Reports "degraded" while no ZIP data has ever loaded or the last reload failed.
   */
  app.get(
    '/health',
    {
      schema: {
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      const zipIndex = state.zips.status();
      return {
        status: zipIndex.degraded ? ('degraded' as const) : ('ok' as const),
        zip_index: zipIndex,
      };
    }
  );

  /**
   * POST /call-event - Route an inbound call and send the bid request
   *
   * 1. Validate caller_id / zip_code
   * 2. Route (ZIP lookup → business hours / rate limit → fallback)
   * 3. Send the bid request for the chosen offer
   * 4. Record the outcome
   *
   * An unrouted ZIP or a failed bid is still a 200: the webhook accepted the
   * event and the outcome is in the response and the call history.
   */
  app.post(
    '/call-event',
    {
      schema: {
        body: CallEventRequestSchema,
        response: {
          200: CallEventResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const validation = validateCallEvent(request.body);

      if (!validation.valid) {
        return reply.status(400).send({ error: validation.reason });
      }

      const result = await handleCallEvent(state, bid, validation.input, now());

      return reply.status(200).send({
        call_id: result.call_id,
        status: result.status,
        decision: result.decision,
        bid: result.bid,
      });
    }
  );

  /**
   * GET /v1/tiers - Tier configuration with live gate state
   */
  app.get(
    '/v1/tiers',
    {
      schema: {
        response: {
          200: TierListResponseSchema,
        },
      },
    },
    async () => {
      const at = now();
      return {
        tiers: state.registry.list().map((tier) => ({
          ...tier,
          fallback_chain: state.registry.fallbackChain(tier.tier_id),
          open_now: state.gate.isOpen(tier.tier_id, at),
          calls_this_hour: state.limiter.count(tier.tier_id, at),
        })),
      };
    }
  );

  /**
   * GET /v1/analytics - Aggregate call counters and this hour's rate counters
   */
  app.get(
    '/v1/analytics',
    {
      schema: {
        response: {
          200: AnalyticsResponseSchema,
        },
      },
    },
    async () => {
      return {
        analytics: state.recorder.snapshotAnalytics(),
        rate_limits: state.limiter.snapshot(now()),
      };
    }
  );

  /**
   * GET /v1/history - Most recent call records, newest first
   */
  app.get(
    '/v1/history',
    {
      schema: {
        querystring: HistoryQuerySchema,
        response: {
          200: HistoryResponseSchema,
        },
      },
    },
    async (request) => {
      const limit = request.query.limit ?? DEFAULT_HISTORY_LIMIT;
      return { calls: state.recorder.recentHistory(limit) };
    }
  );

  /**
   * POST /v1/admin/zips/reload - Rebuild the ZIP index from the data source
   *
   * On failure the previous index keeps serving and the response says why.
   */
  app.post(
    '/v1/admin/zips/reload',
    {
      schema: {
        response: {
          200: ZipReloadResponseSchema,
          503: ZipReloadResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const result = await state.zips.reload(zipSource);
      return reply.status(result.ok ? 200 : 503).send(result);
    }
  );

  return app;
}

export type RouterApp = ReturnType<typeof buildApp>;
