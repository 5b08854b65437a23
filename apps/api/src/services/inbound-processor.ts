import type { ChannelMapping, ExternalPlatform } from '@cobra-relay/shared';
import type { ChannelRouter } from '../channels/router.js';
import type { InboundMessage, PlatformAdapter } from '../channels/base.js';
import { RELAY_CONFIG } from '../config/constants.js';
import { safeCompare } from '../middleware/auth.js';
import { AuthenticationError, ConflictError, NotFoundError } from '../middleware/error-handler.js';
import type { ChannelMappingStore } from '../modules/mappings/service.js';
import type { ChatMessageRepository } from '../modules/messages/repository.js';
import { toChatMessageDto } from '../modules/messages/mapper.js';
import type { RealtimeNotifier } from '../realtime/notifier.js';
import { createLogger } from '../utils/logger.js';
import type { MessageDeduplicator } from './deduplication.js';

const log = createLogger('Inbound');

export type InboundOutcome = 'stored' | 'duplicate' | 'ignored' | 'parked';

export interface InboundResult {
  outcome: InboundOutcome;
  mappingId: string;
  messageId?: string;
}

export interface UnmappedInboundResult extends InboundResult {
  isNewMapping: boolean;
}

export interface CallbackRequest {
  platform: ExternalPlatform;
  mappingId: string;
  secret: string | undefined;
  payload: unknown;
  receivedAt?: Date;
}

export interface UnmappedCallbackRequest {
  platform: ExternalPlatform;
  payload: unknown;
  receivedAt?: Date;
}

export interface InboundProcessorDeps {
  mappings: ChannelMappingStore;
  messages: ChatMessageRepository;
  router: ChannelRouter;
  deduplicator: MessageDeduplicator;
  notifier: RealtimeNotifier;
  now?: () => Date;
}

/**
 * Inbound Webhook Processor
 *
 * authenticate → parse → refresh mapping → dedupe → persist → notify
 *
 * Every rejection happens before anything is written. A retried callback is
 * answered as a success without a second record.
 */
export class InboundProcessor {
  private readonly now: () => Date;

  constructor(private readonly deps: InboundProcessorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async processCallback(request: CallbackRequest): Promise<InboundResult> {
    const { platform, mappingId } = request;

    const mapping = await this.deps.mappings.getById(mappingId);
    if (!mapping) {
      throw new NotFoundError('Mapping', mappingId);
    }

    if (mapping.platform !== platform || !mapping.isActive) {
      log.warn({ mappingId, platform, isActive: mapping.isActive }, 'Callback rejected: mapping not usable');
      throw new AuthenticationError();
    }

    if (!request.secret || !safeCompare(request.secret, mapping.webhookSecret)) {
      log.warn({ mappingId, platform }, 'Callback rejected: secret mismatch');
      throw new AuthenticationError();
    }

    const adapter = this.deps.router.get(platform);
    const callback = adapter.parseInboundCallback(request.payload);

    if (callback.conversationId !== mapping.externalGroupId) {
      log.warn(
        { mappingId, platform, conversationId: callback.conversationId },
        'Callback rejected: conversation does not belong to mapping'
      );
      throw new AuthenticationError();
    }

    if (callback.kind === 'ignored') {
      log.debug({ mappingId, reason: callback.reason }, 'Callback ignored');
      return { outcome: 'ignored', mappingId };
    }

    return this.accept(adapter, mapping, callback, request.receivedAt ?? this.now());
  }

  /**
   * Callback for a conversation the relay may not know yet. Unknown
   * conversations are parked on a new, unlinked mapping. A conversation whose
   * mapping was deactivated is left untouched.
   */
  async processUnmappedCallback(request: UnmappedCallbackRequest): Promise<UnmappedInboundResult> {
    const { platform } = request;
    const adapter = this.deps.router.get(platform);
    const callback = adapter.parseInboundCallback(request.payload);
    const receivedAt = request.receivedAt ?? this.now();

    const { mapping, isNewMapping } = await this.findOrCreate(
      platform,
      callback.conversationId,
      callback.kind === 'message' ? callback : undefined
    );

    if (callback.kind === 'ignored') {
      return { outcome: 'ignored', mappingId: mapping.id, isNewMapping };
    }

    // A deactivated conversation stays deactivated until an admin reactivates it
    if (!mapping.isActive) {
      log.info({ mappingId: mapping.id, platform }, 'Callback ignored: mapping inactive');
      return { outcome: 'ignored', mappingId: mapping.id, isNewMapping: false };
    }

    const result = await this.accept(adapter, mapping, callback, receivedAt);
    return { ...result, isNewMapping };
  }

  // ============================================
  // PIPELINE
  // ============================================

  private async accept(
    adapter: PlatformAdapter,
    mapping: ChannelMapping,
    callback: InboundMessage,
    receivedAt: Date
  ): Promise<InboundResult> {
    const refreshed = await this.deps.mappings.recordActivity(mapping.id, {
      conversationReference: callback.reference
        ?? (mapping.conversationReference ? undefined : adapter.buildReference(mapping) ?? undefined),
      lastActivityAt: receivedAt,
      tenantId: callback.tenantId,
      installedByName: callback.installedByName,
    });

    const threadId = refreshed.chatThreadId;
    if (!threadId) {
      log.info({ mappingId: mapping.id, platform: mapping.platform }, 'Callback parked on unlinked mapping');
      return { outcome: 'parked', mappingId: mapping.id };
    }

    const body = messageBody(callback);
    if (!body) {
      return { outcome: 'ignored', mappingId: mapping.id };
    }

    const { deduplicator } = this.deps;
    if (deduplicator.isKnown(threadId, callback.externalMessageId)) {
      log.debug({ mappingId: mapping.id, externalMessageId: callback.externalMessageId }, 'Duplicate callback');
      return { outcome: 'duplicate', mappingId: mapping.id };
    }

    const stored = await this.deps.messages.insert({
      chatThreadId: threadId,
      message: body,
      createdAt: receivedAt,
      createdBy: RELAY_CONFIG.SYSTEM_USER,
      isActive: true,
      externalSource: mapping.platform,
      externalMessageId: callback.externalMessageId,
      externalSenderName: callback.senderName || null,
      externalSenderId: callback.senderId || null,
      externalTimestamp: callback.timestamp ?? receivedAt,
      externalAttachmentUrl: callback.attachmentUrl ?? null,
      externalChannelMappingId: mapping.id,
    });

    if (!stored) {
      deduplicator.recordStorageConflict(threadId, callback.externalMessageId);
      log.debug({ mappingId: mapping.id, externalMessageId: callback.externalMessageId }, 'Duplicate callback (storage)');
      return { outcome: 'duplicate', mappingId: mapping.id };
    }

    deduplicator.markStored(threadId, callback.externalMessageId);

    try {
      this.deps.notifier.notifyMessage({
        chatThreadId: threadId,
        message: toChatMessageDto(stored),
        _source: 'external',
      });
    } catch (error) {
      log.warn({ err: error, messageId: stored.id }, 'Realtime notification failed');
    }

    log.info(
      { mappingId: mapping.id, platform: mapping.platform, threadId, messageId: stored.id },
      'External message stored'
    );
    return { outcome: 'stored', mappingId: mapping.id, messageId: stored.id };
  }

  private async findOrCreate(
    platform: ExternalPlatform,
    conversationId: string,
    callback: InboundMessage | undefined
  ): Promise<{ mapping: ChannelMapping; isNewMapping: boolean }> {
    const existing = await this.deps.mappings.findByExternal(platform, conversationId);
    if (existing) {
      return { mapping: existing, isNewMapping: false };
    }

    try {
      const mapping = await this.deps.mappings.create({
        platform,
        externalGroupId: conversationId,
        externalGroupName: callback?.conversationName,
        eventId: null,
        chatThreadId: null,
        conversationReference: callback?.reference ?? null,
        tenantId: callback?.tenantId ?? null,
        installedByName: callback?.installedByName ?? null,
        isEmulatorOrTest: callback?.isEmulatorOrTest ?? false,
        createdBy: RELAY_CONFIG.SYSTEM_USER,
      });
      log.info({ mappingId: mapping.id, platform, conversationId }, 'Unmapped conversation parked');
      return { mapping, isNewMapping: true };
    } catch (error) {
      // Another callback for the same conversation created it first
      if (error instanceof ConflictError) {
        const winner = await this.deps.mappings.findByExternal(platform, conversationId);
        if (winner) {
          return { mapping: winner, isNewMapping: false };
        }
      }
      throw error;
    }
  }
}

/**
 * Stored text for a callback; attachment-only messages get a placeholder
 */
export function messageBody(callback: InboundMessage): string {
  if (callback.text) {
    return callback.text;
  }
  if (callback.attachmentUrl) {
    return callback.attachmentType === 'image'
      ? RELAY_CONFIG.IMAGE_PLACEHOLDER
      : RELAY_CONFIG.ATTACHMENT_PLACEHOLDER;
  }
  return '';
}
