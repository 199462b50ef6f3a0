/**
 * Usage event storage contract
 *
 * The ingest routes only see this interface; persistence details live
 * behind it.
 */

import { UsageEvent } from '../api/schemas';

export interface UpsertResult {
  inserted: number;
  updated: number;
}

export interface EventFilter {
  customer_id?: string;
  event_type?: string;
  limit: number;
  offset: number;
}

export interface EventStore {
  upsert(events: UsageEvent[]): Promise<UpsertResult>;
  list(filter: EventFilter): Promise<{ total: number; items: UsageEvent[] }>;
  get(transactionId: string): Promise<UsageEvent | null>;
  delete(transactionId: string): Promise<boolean>;
  checkHealth(): Promise<{ ok: boolean; detail: string | null }>;
}
