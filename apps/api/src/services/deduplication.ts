import { LRUCache } from 'lru-cache';
import { DEDUP_CONFIG } from '../config/constants.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Dedup');

/**
 * Inbound Message Deduplication
 *
 * Layer 1: Memory (fast, in-process)
 * - LRU cache keyed by (threadId, externalMessageId)
 * - 2-hour TTL, covers platform retries within a process lifetime
 *
 * Layer 2: Database (authoritative)
 * - Partial unique index on (external_message_id, chat_thread_id)
 * - Insert with conflict-do-nothing, so concurrent handlers cannot both store
 *
 * Layer 3: Frontend
 * - Message map by id, so repeated socket notifications are harmless
 */
export class MessageDeduplicator {
  private memoryCache: LRUCache<string, number>;

  private stats = {
    memoryHits: 0,
    memoryMisses: 0,
    storageConflicts: 0,
  };

  constructor(options: { maxEntries?: number; ttlMs?: number } = {}) {
    this.memoryCache = new LRUCache<string, number>({
      max: options.maxEntries ?? DEDUP_CONFIG.MEMORY_MAX_ENTRIES,
      ttl: options.ttlMs ?? DEDUP_CONFIG.MEMORY_TTL_MS,
    });

    log.debug(
      { maxEntries: this.memoryCache.max, ttlMs: this.memoryCache.ttl },
      'Deduplicator initialized'
    );
  }

  private getKey(threadId: string, externalMessageId: string): string {
    return `${threadId}:${externalMessageId}`;
  }

  /**
   * Fast-path check. False means "not seen here", not "new": the storage
   * insert still decides.
   */
  isKnown(threadId: string, externalMessageId: string): boolean {
    if (this.memoryCache.has(this.getKey(threadId, externalMessageId))) {
      this.stats.memoryHits++;
      return true;
    }
    this.stats.memoryMisses++;
    return false;
  }

  /**
   * Remember a message that is now stored (or was found already stored)
   */
  markStored(threadId: string, externalMessageId: string): void {
    this.memoryCache.set(this.getKey(threadId, externalMessageId), Date.now());
  }

  /**
   * Record that storage rejected an insert the memory layer let through
   */
  recordStorageConflict(threadId: string, externalMessageId: string): void {
    this.stats.storageConflicts++;
    this.markStored(threadId, externalMessageId);
  }

  getStats(): {
    memorySize: number;
    memoryHitRate: number;
    storageConflicts: number;
  } {
    const totalMemoryChecks = this.stats.memoryHits + this.stats.memoryMisses;

    return {
      memorySize: this.memoryCache.size,
      memoryHitRate: totalMemoryChecks > 0
        ? this.stats.memoryHits / totalMemoryChecks
        : 0,
      storageConflicts: this.stats.storageConflicts,
    };
  }

  clear(): void {
    this.memoryCache.clear();
  }
}
