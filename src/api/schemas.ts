import { Type, Static } from '@sinclair/typebox';

/**
 * Tier id schema
 */
export const TierIdSchema = Type.Union([
  Type.Literal('tier_1'),
  Type.Literal('tier_2'),
  Type.Literal('tier_3'),
]);

/**
 * Tier configuration schema (also the shape of TIERS_CONFIG_PATH entries)
 */
export const TierConfigSchema = Type.Object({
  tier_id: TierIdSchema,
  offer_id: Type.String({ minLength: 1 }),
  business_hours: Type.Object({
    start_hour: Type.Integer({ minimum: 0, maximum: 23 }),
    end_hour: Type.Integer({ minimum: 1, maximum: 24 }),
    timezone: Type.String({ minLength: 1 }),
  }),
  max_calls_per_hour: Type.Integer({ minimum: 1 }),
  fallback_tier: Type.Union([TierIdSchema, Type.Null()]),
});

export const TierConfigListSchema = Type.Array(TierConfigSchema, { minItems: 1 });

/**
 * Tier list response schema
 */
export const TierListResponseSchema = Type.Object({
  tiers: Type.Array(
    Type.Object({
      tier_id: TierIdSchema,
      offer_id: Type.String(),
      business_hours: Type.Object({
        start_hour: Type.Integer(),
        end_hour: Type.Integer(),
        timezone: Type.String(),
      }),
      max_calls_per_hour: Type.Integer(),
      fallback_tier: Type.Union([TierIdSchema, Type.Null()]),
      fallback_chain: Type.Array(TierIdSchema),
      open_now: Type.Boolean(),
      calls_this_hour: Type.Integer(),
    })
  ),
});

/**
 * Inbound call event (body). Fields are checked for presence by
 * validateCallEvent so a missing field gets the webhook's own error message.
 */
export const CallEventRequestSchema = Type.Object({
  caller_id: Type.Optional(Type.String({ maxLength: 64 })),
  zip_code: Type.Optional(Type.Union([Type.String({ maxLength: 16 }), Type.Number()])),
});

export const TierAttemptSchema = Type.Object({
  tier: TierIdSchema,
  business_hours_ok: Type.Boolean(),
  rate_limit_ok: Type.Boolean(),
});

export const RoutingDecisionSchema = Type.Object({
  original_tier: TierIdSchema,
  chosen_tier: TierIdSchema,
  offer_id: Type.String(),
  fallback_used: Type.Boolean(),
  business_hours_ok: Type.Boolean(),
  rate_limit_ok: Type.Boolean(),
  attempts: Type.Array(TierAttemptSchema),
});

export const BidResultSchema = Type.Object({
  ok: Type.Boolean(),
  status_code: Type.Union([Type.Integer(), Type.Null()]),
  external_call_id: Type.Union([Type.String(), Type.Null()]),
  body: Type.Unknown(),
  error: Type.Union([Type.String(), Type.Null()]),
});

/**
 * Call event response schema
 */
export const CallEventResponseSchema = Type.Object({
  call_id: Type.String(),
  status: Type.String(),
  decision: Type.Optional(RoutingDecisionSchema),
  bid: Type.Optional(BidResultSchema),
});

export const CallStatusSchema = Type.Union([
  Type.Literal('success'),
  Type.Literal('api_error'),
  Type.Literal('no_tier'),
  Type.Literal('exception'),
]);

export const CallRecordSchema = Type.Object({
  call_id: Type.String(),
  timestamp: Type.Number(),
  caller_id: Type.String(),
  zip_code: Type.String(),
  original_tier: Type.Union([TierIdSchema, Type.Null()]),
  chosen_tier: Type.Union([TierIdSchema, Type.Null()]),
  offer_id: Type.Union([Type.String(), Type.Null()]),
  fallback_used: Type.Boolean(),
  business_hours_ok: Type.Boolean(),
  rate_limit_ok: Type.Boolean(),
  status: CallStatusSchema,
  response_time_ms: Type.Number(),
  external_call_id: Type.Union([Type.String(), Type.Null()]),
  error: Type.Union([Type.String(), Type.Null()]),
});

/**
 * History query schema (query params)
 */
export const HistoryQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })),
});

export const HistoryResponseSchema = Type.Object({
  calls: Type.Array(CallRecordSchema),
});

export const CountsSchema = Type.Record(Type.String(), Type.Number());

/**
 * Analytics response schema
 */
export const AnalyticsResponseSchema = Type.Object({
  analytics: Type.Object({
    total_calls: Type.Number(),
    successful_calls: Type.Number(),
    failed_calls: Type.Number(),
    fallback_calls: Type.Number(),
    by_status: CountsSchema,
    by_tier: CountsSchema,
    by_hour: CountsSchema,
    by_zip: CountsSchema,
    avg_response_time_ms: Type.Number(),
    history_size: Type.Number(),
    history_capacity: Type.Number(),
    first_call_at: Type.Union([Type.Number(), Type.Null()]),
    last_call_at: Type.Union([Type.Number(), Type.Null()]),
  }),
  rate_limits: Type.Array(
    Type.Object({
      tier: TierIdSchema,
      bucket: Type.String(),
      count: Type.Integer(),
      limit: Type.Integer(),
    })
  ),
});

export const ZipIndexStatusSchema = Type.Object({
  zip_count: Type.Integer(),
  loaded_at: Type.Union([Type.Number(), Type.Null()]),
  last_attempt_at: Type.Union([Type.Number(), Type.Null()]),
  last_error: Type.Union([Type.String(), Type.Null()]),
  degraded: Type.Boolean(),
  by_tier: CountsSchema,
});

/**
 * Health response schema
 */
export const HealthResponseSchema = Type.Object({
  status: Type.Union([Type.Literal('ok'), Type.Literal('degraded')]),
  zip_index: ZipIndexStatusSchema,
});

/**
 * ZIP reload response schema
 */
export const ZipReloadResponseSchema = Type.Object({
  ok: Type.Boolean(),
  loaded: Type.Optional(Type.Integer()),
  skipped: Type.Optional(Type.Integer()),
  conflicts: Type.Optional(Type.Integer()),
  loaded_at: Type.Optional(Type.Number()),
  error: Type.Optional(Type.String()),
  retained: Type.Optional(Type.Integer()),
});

/**
 * Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
});

// TypeScript types derived from schemas
export type CallEventRequest = Static<typeof CallEventRequestSchema>;
