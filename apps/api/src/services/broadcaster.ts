import type {
  AnnouncementPriority,
  AnnouncementResult,
  BroadcastOutcome,
  ChannelMapping,
  ChatThread,
} from '@cobra-relay/shared';
import type { ChannelRouter } from '../channels/router.js';
import { RELAY_CONFIG } from '../config/constants.js';
import { DeliveryError } from '../middleware/error-handler.js';
import type { ChannelMappingStore } from '../modules/mappings/service.js';
import type { ChatThreadRepository } from '../modules/threads/repository.js';
import type { RealtimeNotifier } from '../realtime/notifier.js';
import { createLogger } from '../utils/logger.js';
import { processWithConcurrency, TimeoutError, withTimeout } from '../utils/parallel.js';
import {
  assessStaleness,
  expiredResult,
  parseConversationReference,
  type ExpiryPatternTable,
} from './reference-validator.js';

const log = createLogger('Broadcast');

export interface SendRequest {
  eventId: string;
  message: string;
  senderName: string;
  threadId?: string;
}

export interface AnnouncementRequest {
  eventId: string;
  title: string;
  message: string;
  senderName: string;
  priority?: AnnouncementPriority;
}

export interface BroadcasterDeps {
  mappings: ChannelMappingStore;
  threads: ChatThreadRepository;
  router: ChannelRouter;
  expiryPatterns: ExpiryPatternTable;
  notifier: RealtimeNotifier;
  concurrency: number;
  timeoutMs: number;
  staleAfterDays: number;
  now?: () => Date;
}

/**
 * Text as it appears in the external conversation
 */
export function formatOutboundText(
  message: string,
  senderName: string,
  context: string | null
): string {
  return context
    ? `[${context}] [${senderName}] ${message}`
    : `[${senderName}] ${message}`;
}

export function formatAnnouncement(title: string, message: string, priority: AnnouncementPriority = 'normal'): string {
  const marker = priority === 'urgent' ? ' (URGENT)' : priority === 'high' ? ' (HIGH)' : '';
  return `📢 ANNOUNCEMENT${marker}: ${title}\n${message}`;
}

/**
 * Outbound Broadcaster
 *
 * Fans one message out to every candidate channel with bounded parallelism.
 * Each channel settles on its own: a skipped or failed channel is reported in
 * its outcome and never stops delivery to the rest.
 */
export class Broadcaster {
  private readonly now: () => Date;

  constructor(private readonly deps: BroadcasterDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async send(request: SendRequest): Promise<BroadcastOutcome[]> {
    const eventMappings = await this.deps.mappings.listForEvent(request.eventId);

    let candidates: ChannelMapping[];
    let thread: ChatThread | null = null;
    if (request.threadId) {
      const linked = await this.deps.mappings.findByThread(request.threadId);
      // A thread linked under another event is not this event's channel
      candidates = linked && linked.eventId === request.eventId ? [linked] : [];
      if (linked && !candidates.length) {
        log.warn({ threadId: request.threadId, eventId: request.eventId, mappingEventId: linked.eventId }, 'Thread belongs to another event');
      }
      thread = await this.deps.threads.findById(request.threadId);
    } else {
      candidates = eventMappings;
    }

    if (candidates.length === 0) {
      return [];
    }

    const context = eventMappings.length > 1
      ? await this.describeContext(request.eventId, thread)
      : null;
    const text = formatOutboundText(request.message, request.senderName, context);

    return this.dispatch(candidates, text);
  }

  async broadcastAnnouncement(request: AnnouncementRequest): Promise<AnnouncementResult> {
    const candidates = await this.deps.mappings.listForEvent(request.eventId);
    const body = formatAnnouncement(request.title, request.message, request.priority);
    const text = formatOutboundText(body, request.senderName, null);

    const outcomes = await this.dispatch(candidates, text);
    const channelsReached = outcomes.filter(o => o.status === 'sent').length;

    log.info(
      { eventId: request.eventId, priority: request.priority ?? 'normal', channelsReached, total: outcomes.length },
      'Announcement broadcast'
    );
    return { channelsReached, outcomes };
  }

  // ============================================
  // PER-CHANNEL DELIVERY
  // ============================================

  private async dispatch(candidates: ChannelMapping[], text: string): Promise<BroadcastOutcome[]> {
    const settled = await processWithConcurrency(
      candidates,
      this.deps.concurrency,
      mapping => this.deliver(mapping, text)
    );

    return settled.map((result, index): BroadcastOutcome => {
      if (result.ok) {
        return result.value;
      }
      // deliver() reports its own failures; this only catches bugs in it
      const mapping = candidates[index];
      log.error({ err: result.error, mappingId: mapping.id }, 'Unexpected broadcast error');
      return {
        ...this.baseOutcome(mapping),
        status: 'failed',
        classification: 'transient',
        error: result.error instanceof Error ? result.error.message : String(result.error),
      };
    });
  }

  private async deliver(mapping: ChannelMapping, text: string): Promise<BroadcastOutcome> {
    const base = this.baseOutcome(mapping);
    const parsed = parseConversationReference(mapping.conversationReference);

    if (!parsed.ok) {
      log.info(
        { mappingId: mapping.id, status: parsed.validation.status, reason: parsed.validation.message },
        'Channel skipped'
      );
      return {
        ...base,
        status: 'skipped-invalid-reference',
        referenceStatus: parsed.validation.status,
        error: parsed.validation.message,
      };
    }

    const validation = assessStaleness(
      { status: 'Valid', canAttemptSend: true, message: '' },
      mapping.lastActivityAt,
      this.now(),
      this.deps.staleAfterDays
    );
    const rawReference = mapping.conversationReference ?? '';
    const adapter = this.deps.router.get(mapping.platform);

    try {
      const result = await withTimeout(
        signal => adapter.send({ mapping, reference: parsed.reference, rawReference }, text, { signal }),
        this.deps.timeoutMs
      );
      return {
        ...base,
        status: 'sent',
        externalMessageId: result.externalMessageId,
        referenceStatus: validation.status,
      };
    } catch (caught) {
      const error = caught instanceof TimeoutError
        ? new DeliveryError(mapping.platform, caught.message, { timedOut: true, cause: caught })
        : caught;
      return this.handleFailure(mapping, base, error);
    }
  }

  private async handleFailure(
    mapping: ChannelMapping,
    base: Pick<BroadcastOutcome, 'mappingId' | 'platform' | 'externalGroupName'>,
    error: unknown
  ): Promise<BroadcastOutcome> {
    const classification = this.deps.expiryPatterns.classify(error, mapping.platform);
    const message = error instanceof Error ? error.message : String(error);

    if (classification === 'transient') {
      log.warn({ mappingId: mapping.id, platform: mapping.platform, error: message }, 'Delivery failed');
      return { ...base, status: 'failed', classification, error: message };
    }

    const expired = expiredResult(error);
    log.warn({ mappingId: mapping.id, platform: mapping.platform, error: message }, 'Reference expired, deactivating mapping');

    try {
      await this.deps.mappings.deactivate(mapping.id, RELAY_CONFIG.EXPIRY_ACTOR);
      this.deps.notifier.notifyChannelStatus({
        eventId: mapping.eventId,
        mappingId: mapping.id,
        platform: mapping.platform,
        isActive: false,
        reason: expired.message,
        timestamp: this.now().toISOString(),
      });
    } catch (deactivateError) {
      log.error({ err: deactivateError, mappingId: mapping.id }, 'Failed to deactivate expired mapping');
    }

    return {
      ...base,
      status: 'failed',
      classification,
      referenceStatus: expired.status,
      error: message,
    };
  }

  private baseOutcome(mapping: ChannelMapping): Pick<BroadcastOutcome, 'mappingId' | 'platform' | 'externalGroupName'> {
    return {
      mappingId: mapping.id,
      platform: mapping.platform,
      externalGroupName: mapping.externalGroupName,
    };
  }

  private async describeContext(eventId: string, thread: ChatThread | null): Promise<string | null> {
    const eventName = await this.deps.threads.findEventName(eventId);
    if (thread && eventName) return `${eventName}: ${thread.name}`;
    return thread?.name ?? eventName;
  }
}
