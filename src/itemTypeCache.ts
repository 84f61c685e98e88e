import type { ItemMetadataSource } from './metadataClient';
import { logger as defaultLogger, type Logger } from './logger';

/**
 * Bounded item-id → item-type cache in front of an {@link ItemMetadataSource}.
 *
 * Entries expire after `ttlMs` and the least recently used entry is evicted
 * once `maxEntries` is reached. Concurrent resolves for the same uncached id
 * share a single upstream lookup. Failed lookups are never stored.
 */

export type Clock = () => number;

export interface ItemTypeEntry {
  itemId: string;
  isStrm: boolean;
  name?: string;
  fetchedAt: number;
}

export interface ItemTypeCacheOptions {
  ttlMs: number;
  maxEntries: number;
  clock?: Clock;
  logger?: Logger;
}

export interface ItemTypeCacheStats {
  size: number;
  pending: number;
  hits: number;
  misses: number;
  coalesced: number;
  evictions: number;
}

export interface ItemTypeResolver {
  resolve(itemId: string): Promise<ItemTypeEntry>;
}

export class ItemTypeCache implements ItemTypeResolver {
  // Map iteration order doubles as recency order: oldest use first.
  private readonly entries = new Map<string, ItemTypeEntry>();
  private readonly pending = new Map<string, Promise<ItemTypeEntry>>();
  private readonly clock: Clock;
  private readonly log: Logger;
  private counters = { hits: 0, misses: 0, coalesced: 0, evictions: 0 };

  constructor(
    private readonly source: ItemMetadataSource,
    private readonly options: ItemTypeCacheOptions,
  ) {
    if (!(options.ttlMs > 0)) throw new RangeError('ttlMs must be positive');
    if (!(options.maxEntries >= 1)) throw new RangeError('maxEntries must be at least 1');
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? defaultLogger;
  }

  /** Fresh entry for `itemId`, or undefined. Touches recency but never fetches. */
  peek(itemId: string): ItemTypeEntry | undefined {
    const entry = this.entries.get(itemId);
    if (!entry) return undefined;

    if (this.clock() - entry.fetchedAt >= this.options.ttlMs) {
      this.entries.delete(itemId);
      return undefined;
    }

    this.entries.delete(itemId);
    this.entries.set(itemId, entry);
    return entry;
  }

  async resolve(itemId: string): Promise<ItemTypeEntry> {
    const cached = this.peek(itemId);
    if (cached) {
      this.counters.hits++;
      return cached;
    }

    const inFlight = this.pending.get(itemId);
    if (inFlight) {
      this.counters.coalesced++;
      return inFlight;
    }

    this.counters.misses++;
    const lookup = this.fetch(itemId).finally(() => {
      this.pending.delete(itemId);
    });
    this.pending.set(itemId, lookup);
    return lookup;
  }

  invalidate(itemId: string): boolean {
    return this.entries.delete(itemId);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  stats(): ItemTypeCacheStats {
    return { size: this.entries.size, pending: this.pending.size, ...this.counters };
  }

  private async fetch(itemId: string): Promise<ItemTypeEntry> {
    const metadata = await this.source.lookup(itemId);
    const entry: ItemTypeEntry = {
      itemId,
      isStrm: metadata.isStrm,
      name: metadata.name,
      fetchedAt: this.clock(),
    };
    this.store(entry);
    return entry;
  }

  private store(entry: ItemTypeEntry): void {
    this.entries.delete(entry.itemId);

    while (this.entries.size >= this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.counters.evictions++;
      this.log.log(`  🗑️  Evicted item ${oldest.value} from type cache`);
    }

    this.entries.set(entry.itemId, entry);
  }
}
