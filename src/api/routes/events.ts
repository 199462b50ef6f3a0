/**
 * Usage event routes (mounted under /v1, behind the gatekeeper)
 */

import { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';
import { EventStore } from '../../types/event';
import {
  BatchEventRequestSchema,
  DeleteResponseSchema,
  EchoRequestSchema,
  EchoResponseSchema,
  ErrorResponseSchema,
  EventIngestionResponse,
  EventIngestionResponseSchema,
  EventListQuerySchema,
  EventListResponseSchema,
  EventParamsSchema,
  UsageEvent,
  UsageEventSchema,
} from '../schemas';
import { validateEvent } from '../validation';
import { buildErrorBody } from '../../utils/errors';

export interface EventRoutesOptions {
  store: EventStore;
  clock: () => number;
}

export const eventRoutes: FastifyPluginAsyncTypebox<EventRoutesOptions> = async (app, { store, clock }) => {
  /**
   * POST /v1/events - Upsert a batch of usage events
   *
   * 1. Schema validation (automatic via Fastify)
   * 2. Business validation (timestamp, format checks)
   * 3. Upsert by transaction_id
   */
  app.post(
    '/events',
    {
      schema: {
        body: BatchEventRequestSchema,
        response: {
          201: EventIngestionResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { events } = request.body;
      const now = clock();

      const valid: UsageEvent[] = [];
      const failed: EventIngestionResponse['failed'] = [];

      for (const event of events) {
        const validation = validateEvent(event, now);
        if (validation.valid) {
          valid.push(event);
        } else {
          failed.push({
            transaction_id: event.transaction_id,
            reason: validation.reason ?? 'invalid event',
          });
        }
      }

      const { inserted, updated } = await store.upsert(valid);
      const response: EventIngestionResponse = { inserted, updated, failed };

      return reply.status(201).send(response);
    }
  );

  /**
   * GET /v1/events - List events, newest first
   */
  app.get(
    '/events',
    {
      schema: {
        querystring: EventListQuerySchema,
        response: {
          200: EventListResponseSchema,
        },
      },
    },
    async (request) => {
      const { customer_id, event_type, limit, offset } = request.query;
      return store.list({ customer_id, event_type, limit, offset });
    }
  );

  /**
   * GET /v1/events/:transaction_id
   */
  app.get(
    '/events/:transaction_id',
    {
      schema: {
        params: EventParamsSchema,
        response: {
          200: UsageEventSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const event = await store.get(request.params.transaction_id);
      if (!event) {
        return reply.status(404).send(
          buildErrorBody({
            statusCode: 404,
            code: 'NOT_FOUND',
            message: `Event not found: ${request.params.transaction_id}`,
            requestId: request.id,
          })
        );
      }
      return event;
    }
  );

  /**
   * DELETE /v1/events/:transaction_id
   */
  app.delete(
    '/events/:transaction_id',
    {
      schema: {
        params: EventParamsSchema,
        response: {
          200: DeleteResponseSchema,
        },
      },
    },
    async (request) => {
      const deleted = await store.delete(request.params.transaction_id);
      return { deleted };
    }
  );

  /**
   * POST /v1/echo - Return the parsed request body (gatekeeper smoke test)
   */
  app.post(
    '/echo',
    {
      schema: {
        body: EchoRequestSchema,
        response: {
          200: EchoResponseSchema,
        },
      },
    },
    async (request) => {
      return { you_sent: request.body };
    }
  );
};
