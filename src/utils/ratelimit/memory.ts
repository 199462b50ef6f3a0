/**
 * In-process fixed-window counter keyed by client identity.
 *
 * Only correct for a single-process deployment. The read-modify-write below
 * has no await in it, so concurrent requests cannot interleave inside it.
 */

import { BackendHealth, FixedWindow, RateLimitBackend } from './backend';

/** Table size at which windows older than the previous one are dropped */
const PRUNE_THRESHOLD = 4096;

interface WindowCounter {
  windowIndex: number;
  count: number;
}

export class MemoryRateLimitBackend implements RateLimitBackend {
  readonly name = 'memory';
  readonly remote = false;
  private windows = new Map<string, WindowCounter>();

  async incrementAndCount(identity: string, window: FixedWindow): Promise<number> {
    const current = this.windows.get(identity);
    const count = current && current.windowIndex === window.index ? current.count + 1 : 1;
    this.windows.set(identity, { windowIndex: window.index, count });
    this.prune(window.index);
    return count;
  }

  async checkHealth(): Promise<BackendHealth> {
    return { ok: true, detail: 'memory backend' };
  }

  get size(): number {
    return this.windows.size;
  }

  private prune(nowWindow: number): void {
    if (this.windows.size < PRUNE_THRESHOLD) return;
    const minWindow = nowWindow - 1;
    for (const [identity, counter] of this.windows) {
      if (counter.windowIndex < minWindow) {
        this.windows.delete(identity);
      }
    }
  }
}
