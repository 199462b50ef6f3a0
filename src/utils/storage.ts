import { UsageEvent } from '../api/schemas';
import { EventFilter, EventStore, UpsertResult } from '../types/event';

/**
 * In-process event store keyed by transaction_id.
 *
 * Re-sending a transaction_id replaces the stored event (upsert), so
 * client retries are idempotent. Listing is newest-first by timestamp.
 */
export class MemoryEventStore implements EventStore {
  private events = new Map<string, UsageEvent>();

  async upsert(events: UsageEvent[]): Promise<UpsertResult> {
    let inserted = 0;
    let updated = 0;

    for (const event of events) {
      if (this.events.has(event.transaction_id)) {
        updated++;
      } else {
        inserted++;
      }
      this.events.set(event.transaction_id, { ...event, properties: { ...event.properties } });
    }

    return { inserted, updated };
  }

  async list(filter: EventFilter): Promise<{ total: number; items: UsageEvent[] }> {
    const matching = [...this.events.values()]
      .filter((event) => !filter.customer_id || event.customer_id === filter.customer_id)
      .filter((event) => !filter.event_type || event.event_type === filter.event_type)
      .sort((a, b) => b.timestamp - a.timestamp);

    return {
      total: matching.length,
      items: matching.slice(filter.offset, filter.offset + filter.limit),
    };
  }

  async get(transactionId: string): Promise<UsageEvent | null> {
    return this.events.get(transactionId) ?? null;
  }

  async delete(transactionId: string): Promise<boolean> {
    return this.events.delete(transactionId);
  }

  async checkHealth(): Promise<{ ok: boolean; detail: string | null }> {
    return { ok: true, detail: `${this.events.size} events` };
  }
}
