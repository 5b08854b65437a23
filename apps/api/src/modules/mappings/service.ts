import { randomBytes } from 'crypto';
import { LRUCache } from 'lru-cache';
import type {
  ChannelMapping,
  ChannelMappingSummary,
  ExternalPlatform,
  MappingListFilter,
} from '@cobra-relay/shared';
import { formatPlatformName } from '@cobra-relay/shared';
import { MAPPING_CACHE_CONFIG, RELAY_CONFIG } from '../../config/constants.js';
import { ConflictError, NotFoundError, ValidationError } from '../../middleware/error-handler.js';
import { createLogger } from '../../utils/logger.js';
import type { ChatThreadRepository } from '../threads/repository.js';
import type {
  ChannelMappingPatch,
  ChannelMappingRepository,
} from './repository.js';

const log = createLogger('Mappings');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CreateMappingInput {
  /** Preassigned id, when the external side already points at it */
  id?: string;
  platform: ExternalPlatform;
  externalGroupId: string;
  externalGroupName?: string;
  eventId?: string | null;
  chatThreadId?: string | null;
  shareUrl?: string | null;
  botId?: string;
  webhookSecret?: string;
  conversationReference?: string | null;
  tenantId?: string | null;
  installedByName?: string | null;
  isEmulatorOrTest?: boolean;
  createdBy: string;
}

/**
 * Fields refreshed by an inbound message or a bot upsert. Undefined fields
 * are left alone; `installedByName` is only written when the mapping has none.
 */
export interface ActivityPatch {
  conversationReference?: string;
  lastActivityAt?: Date;
  tenantId?: string;
  installedByName?: string;
  externalGroupName?: string;
  isEmulatorOrTest?: boolean;
}

export interface ConversationReferenceUpsert {
  externalGroupId: string;
  conversationReference: string;
  tenantId?: string;
  channelName?: string;
  installedByName?: string;
  isEmulator?: boolean;
}

export interface ChannelMappingStoreOptions {
  cacheMaxEntries?: number;
  cacheTtlMs?: number;
  now?: () => Date;
}

/**
 * Generate a webhook secret (32 random bytes, base64url)
 */
export function generateWebhookSecret(): string {
  return randomBytes(RELAY_CONFIG.WEBHOOK_SECRET_BYTES).toString('base64url');
}

/**
 * Admin-facing projection of a mapping
 */
export function toMappingSummary(mapping: ChannelMapping): ChannelMappingSummary {
  return {
    id: mapping.id,
    eventId: mapping.eventId,
    chatThreadId: mapping.chatThreadId,
    platform: mapping.platform,
    externalGroupId: mapping.externalGroupId,
    externalGroupName: mapping.externalGroupName,
    shareUrl: mapping.shareUrl,
    tenantId: mapping.tenantId,
    installedByName: mapping.installedByName,
    isEmulatorOrTest: mapping.isEmulatorOrTest,
    isActive: mapping.isActive,
    hasConversationReference: Boolean(mapping.conversationReference?.trim()),
    lastActivityAt: mapping.lastActivityAt?.toISOString() ?? null,
    createdAt: mapping.createdAt.toISOString(),
  };
}

/**
 * ChannelMapping Store
 *
 * Durable record of which external conversation is bound to which COBRA
 * event and chat thread. Mappings are never hard-deleted; deactivation frees
 * the (platform, externalGroupId) slot for a new mapping.
 *
 * An LRU cache fronts getById for the webhook hot path. Every write through
 * the store evicts the entry, so the repository stays the source of truth.
 */
export class ChannelMappingStore {
  private cache: LRUCache<string, ChannelMapping>;
  private readonly now: () => Date;

  constructor(
    private readonly repository: ChannelMappingRepository,
    private readonly threads: ChatThreadRepository,
    options: ChannelMappingStoreOptions = {}
  ) {
    this.cache = new LRUCache<string, ChannelMapping>({
      max: options.cacheMaxEntries ?? MAPPING_CACHE_CONFIG.MAX_ENTRIES,
      ttl: options.cacheTtlMs ?? MAPPING_CACHE_CONFIG.TTL_MS,
    });
    this.now = options.now ?? (() => new Date());
  }

  // ============================================
  // READS
  // ============================================

  async getById(id: string): Promise<ChannelMapping | null> {
    const cached = this.cache.get(id);
    if (cached) return cached;

    const mapping = await this.repository.findById(id);
    if (mapping) {
      this.cache.set(id, mapping);
    }
    return mapping;
  }

  async requireById(id: string): Promise<ChannelMapping> {
    const mapping = await this.getById(id);
    if (!mapping) {
      throw new NotFoundError('Mapping', id);
    }
    return mapping;
  }

  /**
   * The active mapping for an external conversation, else the most recent one
   */
  async findByExternal(platform: ExternalPlatform, externalGroupId: string): Promise<ChannelMapping | null> {
    const [first] = await this.repository.findByExternal(platform, externalGroupId);
    return first ?? null;
  }

  async findByThread(threadId: string): Promise<ChannelMapping | null> {
    return this.repository.findActiveByThread(threadId);
  }

  async listForEvent(eventId: string, options: { activeOnly?: boolean } = {}): Promise<ChannelMapping[]> {
    const activeOnly = options.activeOnly ?? true;
    return this.repository.query({
      eventId,
      isActive: activeOnly ? true : undefined,
    });
  }

  async list(filter: MappingListFilter = {}): Promise<ChannelMapping[]> {
    return this.repository.query({
      platform: filter.platform,
      isActive: filter.isActive,
      isEmulatorOrTest: filter.isEmulatorOrTest,
      inactiveSince: filter.staleDays !== undefined
        ? this.cutoff(filter.staleDays)
        : undefined,
    });
  }

  // ============================================
  // WRITES
  // ============================================

  async create(input: CreateMappingInput): Promise<ChannelMapping> {
    const externalGroupId = input.externalGroupId.trim();
    if (!externalGroupId) {
      throw new ValidationError('externalGroupId', 'External group id is required');
    }

    await this.assertExternalFree(input.platform, externalGroupId);

    let eventId = input.eventId ?? null;
    if (input.chatThreadId) {
      const thread = await this.requireThread(input.chatThreadId);
      await this.assertThreadFree(thread.id);
      eventId = thread.eventId;
    }

    const now = this.now();
    const mapping = await this.repository.insert({
      id: input.id,
      eventId,
      chatThreadId: input.chatThreadId ?? null,
      platform: input.platform,
      externalGroupId,
      externalGroupName: input.externalGroupName?.trim() || `${formatPlatformName(input.platform)} conversation`,
      shareUrl: input.shareUrl ?? null,
      botId: input.botId ?? '',
      webhookSecret: input.webhookSecret ?? generateWebhookSecret(),
      conversationReference: input.conversationReference ?? null,
      tenantId: input.tenantId ?? null,
      installedByName: input.installedByName ?? null,
      isEmulatorOrTest: input.isEmulatorOrTest ?? false,
      lastActivityAt: null,
      isActive: true,
      createdAt: now,
      createdBy: input.createdBy,
      modifiedAt: now,
      modifiedBy: input.createdBy,
    });

    log.info(
      { mappingId: mapping.id, platform: mapping.platform, externalGroupId, eventId },
      'Mapping created'
    );
    return mapping;
  }

  async rename(id: string, name: string, actor: string): Promise<ChannelMapping> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('name', 'Name is required');
    }
    return this.write(id, { externalGroupName: trimmed }, actor);
  }

  /**
   * Soft delete. Deactivating an inactive mapping is a no-op.
   */
  async deactivate(id: string, actor: string): Promise<ChannelMapping> {
    const mapping = await this.requireFresh(id);
    if (!mapping.isActive) {
      return mapping;
    }

    const updated = await this.write(id, { isActive: false }, actor);
    log.info({ mappingId: id, platform: mapping.platform, actor }, 'Mapping deactivated');
    return updated;
  }

  async reactivate(id: string, actor: string): Promise<ChannelMapping> {
    const mapping = await this.requireFresh(id);
    if (mapping.isActive) {
      return mapping;
    }

    await this.assertExternalFree(mapping.platform, mapping.externalGroupId);
    if (mapping.chatThreadId) {
      await this.assertThreadFree(mapping.chatThreadId);
    }

    const updated = await this.write(id, { isActive: true }, actor);
    log.info({ mappingId: id, platform: mapping.platform, actor }, 'Mapping reactivated');
    return updated;
  }

  /**
   * Deactivate active mappings with no activity in the last `inactiveDays`
   */
  async cleanupStale(options: { platform?: ExternalPlatform; inactiveDays?: number } = {}): Promise<string[]> {
    const inactiveDays = options.inactiveDays ?? RELAY_CONFIG.DEFAULT_STALE_CLEANUP_DAYS;
    const stale = await this.repository.query({
      platform: options.platform,
      isActive: true,
      inactiveSince: this.cutoff(inactiveDays),
    });

    const ids: string[] = [];
    for (const mapping of stale) {
      await this.write(mapping.id, { isActive: false }, RELAY_CONFIG.STALE_CLEANUP_ACTOR);
      ids.push(mapping.id);
    }

    if (ids.length > 0) {
      log.info({ count: ids.length, inactiveDays, platform: options.platform }, 'Stale mappings deactivated');
    }
    return ids;
  }

  async linkToThread(id: string, threadId: string, actor: string): Promise<ChannelMapping> {
    const mapping = await this.requireFresh(id);
    const thread = await this.requireThread(threadId);

    if (mapping.chatThreadId === thread.id && mapping.isActive) {
      return mapping;
    }
    await this.assertThreadFree(thread.id);

    const updated = await this.write(id, { chatThreadId: thread.id, eventId: thread.eventId }, actor);
    log.info({ mappingId: id, threadId, eventId: thread.eventId }, 'Mapping linked to thread');
    return updated;
  }

  /**
   * Detach whatever active mapping is linked to the thread. The mapping keeps
   * receiving callbacks but they are parked until it is linked again.
   */
  async unlinkThread(threadId: string, actor: string): Promise<ChannelMapping | null> {
    const mapping = await this.repository.findActiveByThread(threadId);
    if (!mapping) return null;

    const updated = await this.write(mapping.id, { chatThreadId: null }, actor);
    log.info({ mappingId: mapping.id, threadId }, 'Mapping unlinked from thread');
    return updated;
  }

  async recordActivity(id: string, patch: ActivityPatch): Promise<ChannelMapping> {
    const mapping = await this.requireFresh(id);

    const update: Omit<ChannelMappingPatch, 'modifiedAt' | 'modifiedBy'> = {};
    if (patch.conversationReference !== undefined) update.conversationReference = patch.conversationReference;
    if (patch.lastActivityAt !== undefined) update.lastActivityAt = patch.lastActivityAt;
    if (patch.tenantId !== undefined) update.tenantId = patch.tenantId;
    if (patch.externalGroupName !== undefined) update.externalGroupName = patch.externalGroupName;
    if (patch.isEmulatorOrTest !== undefined) update.isEmulatorOrTest = patch.isEmulatorOrTest;
    if (patch.installedByName && !mapping.installedByName) {
      update.installedByName = patch.installedByName;
    }

    return this.write(id, update, RELAY_CONFIG.SYSTEM_USER);
  }

  // ============================================
  // CONVERSATION REFERENCES
  // ============================================

  async getConversationReference(platform: ExternalPlatform, externalGroupId: string): Promise<ChannelMapping | null> {
    return this.findByExternal(platform, externalGroupId);
  }

  /**
   * Store the reference a platform bot captured for a conversation. Unknown
   * conversations get a new, unlinked mapping that an admin links later; a
   * known one is refreshed in place, active or not, so it stays reactivatable.
   */
  async putConversationReference(
    platform: ExternalPlatform,
    request: ConversationReferenceUpsert
  ): Promise<{ mapping: ChannelMapping; created: boolean }> {
    const existing = await this.findByExternal(platform, request.externalGroupId);

    if (existing) {
      const mapping = await this.recordActivity(existing.id, {
        conversationReference: request.conversationReference,
        lastActivityAt: this.now(),
        tenantId: request.tenantId,
        installedByName: request.installedByName,
        externalGroupName: request.channelName?.trim() || undefined,
        isEmulatorOrTest: request.isEmulator,
      });
      return { mapping, created: false };
    }

    const mapping = await this.create({
      platform,
      externalGroupId: request.externalGroupId,
      externalGroupName: request.channelName,
      conversationReference: request.conversationReference,
      tenantId: request.tenantId ?? null,
      installedByName: request.installedByName ?? null,
      isEmulatorOrTest: request.isEmulator ?? false,
      createdBy: RELAY_CONFIG.SYSTEM_USER,
    });
    const refreshed = await this.recordActivity(mapping.id, { lastActivityAt: this.now() });
    return { mapping: refreshed, created: true };
  }

  getCacheStats(): { size: number; max: number } {
    return { size: this.cache.size, max: this.cache.max };
  }

  // ============================================
  // HELPERS
  // ============================================

  private async write(
    id: string,
    patch: Omit<ChannelMappingPatch, 'modifiedAt' | 'modifiedBy'>,
    actor: string
  ): Promise<ChannelMapping> {
    this.cache.delete(id);
    const updated = await this.repository.update(id, {
      ...patch,
      modifiedAt: this.now(),
      modifiedBy: actor,
    });
    if (!updated) {
      throw new NotFoundError('Mapping', id);
    }
    return updated;
  }

  private async requireFresh(id: string): Promise<ChannelMapping> {
    const mapping = await this.repository.findById(id);
    if (!mapping) {
      throw new NotFoundError('Mapping', id);
    }
    return mapping;
  }

  private async requireThread(threadId: string) {
    const thread = await this.threads.findById(threadId);
    if (!thread) {
      throw new NotFoundError('Thread', threadId);
    }
    return thread;
  }

  private async assertExternalFree(platform: ExternalPlatform, externalGroupId: string): Promise<void> {
    const mappings = await this.repository.findByExternal(platform, externalGroupId);
    if (mappings.some(m => m.isActive)) {
      throw new ConflictError(`An active ${platform} mapping already exists for '${externalGroupId}'`);
    }
  }

  private async assertThreadFree(threadId: string): Promise<void> {
    const linked = await this.repository.findActiveByThread(threadId);
    if (linked) {
      throw new ConflictError(`Thread '${threadId}' is already linked to mapping '${linked.id}'`);
    }
  }

  private cutoff(days: number): Date {
    return new Date(this.now().getTime() - days * DAY_MS);
  }
}
