import { Type, Static } from '@sinclair/typebox';

/**
 * Single usage event schema with validation
 */
export const UsageEventSchema = Type.Object({
  transaction_id: Type.String({ minLength: 1, maxLength: 255 }),
  customer_id: Type.String({ minLength: 1, maxLength: 255 }),
  event_type: Type.String({ minLength: 1, maxLength: 100 }),
  timestamp: Type.Number({ minimum: 0 }),
  properties: Type.Record(
    Type.String(),
    Type.Union([Type.String(), Type.Number(), Type.Boolean()])
  ),
});

/**
 * Batch request schema - array of events
 */
export const BatchEventRequestSchema = Type.Object({
  events: Type.Array(UsageEventSchema, { minItems: 1, maxItems: 1000 }),
});

/**
 * Response schema for event ingestion (upsert by transaction_id)
 */
export const EventIngestionResponseSchema = Type.Object({
  inserted: Type.Number(),
  updated: Type.Number(),
  failed: Type.Array(
    Type.Object({
      transaction_id: Type.String(),
      reason: Type.String(),
    })
  ),
});

/**
 * Event list query (query params)
 */
export const EventListQuerySchema = Type.Object({
  customer_id: Type.Optional(Type.String({ minLength: 1 })),
  event_type: Type.Optional(Type.String({ minLength: 1 })),
  limit: Type.Integer({ minimum: 1, maximum: 200, default: 50 }),
  offset: Type.Integer({ minimum: 0, default: 0 }),
});

export const EventListResponseSchema = Type.Object({
  total: Type.Number(),
  items: Type.Array(UsageEventSchema),
});

export const EventParamsSchema = Type.Object({
  transaction_id: Type.String({ minLength: 1, maxLength: 255 }),
});

export const DeleteResponseSchema = Type.Object({
  deleted: Type.Boolean(),
});

/**
 * Echo accepts any JSON object
 */
export const EchoRequestSchema = Type.Object({}, { additionalProperties: true });

export const EchoResponseSchema = Type.Object({
  you_sent: Type.Unknown(),
});

/**
 * Uniform error body for every rejection
 */
export const ErrorResponseSchema = Type.Object({
  code: Type.String(),
  message: Type.String(),
  error: Type.String(),
  request_id: Type.String(),
  details: Type.Optional(Type.Unknown()),
});

export const HealthResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export const ReadinessResponseSchema = Type.Object({
  status: Type.Union([Type.Literal('ok'), Type.Literal('degraded')]),
  checks: Type.Record(
    Type.String(),
    Type.Object({
      ok: Type.Boolean(),
      detail: Type.Union([Type.String(), Type.Null()]),
    })
  ),
});

// TypeScript types derived from schemas
export type UsageEvent = Static<typeof UsageEventSchema>;
export type EventIngestionResponse = Static<typeof EventIngestionResponseSchema>;
export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
