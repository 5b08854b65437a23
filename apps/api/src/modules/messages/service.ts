import type { BroadcastOutcome, ChatMessage } from '@cobra-relay/shared';
import { API_CONFIG } from '../../config/constants.js';
import { ConflictError, NotFoundError, ValidationError } from '../../middleware/error-handler.js';
import type { RealtimeNotifier } from '../../realtime/notifier.js';
import type { Broadcaster } from '../../services/broadcaster.js';
import { createLogger } from '../../utils/logger.js';
import type { ChatThreadRepository } from '../threads/repository.js';
import { toChatMessageDto } from './mapper.js';
import type { ChatMessageRepository } from './repository.js';

const log = createLogger('Messages');

export interface GetMessagesParams {
  limit?: number;
  before?: Date;
}

export interface PostMessageParams {
  threadId: string;
  message: string;
  senderName: string;
}

export interface ChatServiceDeps {
  messages: ChatMessageRepository;
  threads: ChatThreadRepository;
  broadcaster: Broadcaster;
  notifier: RealtimeNotifier;
  now?: () => Date;
}

/**
 * Native chat messages: the COBRA side of a relayed conversation
 */
export class ChatService {
  private readonly now: () => Date;

  constructor(private readonly deps: ChatServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Active messages of a thread in chronological order
   */
  async getMessages(threadId: string, params: GetMessagesParams = {}): Promise<ChatMessage[]> {
    const limit = Math.min(params.limit ?? API_CONFIG.DEFAULT_PAGE_SIZE, API_CONFIG.MAX_PAGE_SIZE);
    const page = await this.deps.messages.listByThread(threadId, { limit, before: params.before });
    return page.reverse();
  }

  /**
   * Store a message typed in COBRA, push it to live clients, then relay it to
   * the thread's external channel (if linked)
   */
  async postMessage(params: PostMessageParams): Promise<{ message: ChatMessage; outbound: BroadcastOutcome[] }> {
    const text = params.message.trim();
    if (!text) {
      throw new ValidationError('message', 'Message is required');
    }

    const thread = await this.deps.threads.findById(params.threadId);
    if (!thread || !thread.isActive) {
      throw new NotFoundError('Thread', params.threadId);
    }

    const stored = await this.deps.messages.insert({
      chatThreadId: thread.id,
      message: text,
      createdAt: this.now(),
      createdBy: params.senderName,
      isActive: true,
      externalSource: null,
      externalMessageId: null,
      externalSenderName: null,
      externalSenderId: null,
      externalTimestamp: null,
      externalAttachmentUrl: null,
      externalChannelMappingId: null,
    });
    if (!stored) {
      // Native messages carry no external id, so the dedup index cannot reject them
      throw new Error('Message insert returned no row');
    }

    try {
      this.deps.notifier.notifyMessage({
        chatThreadId: thread.id,
        message: toChatMessageDto(stored),
        _source: 'native',
      });
    } catch (error) {
      log.warn({ err: error, messageId: stored.id }, 'Realtime notification failed');
    }

    const outbound = await this.deps.broadcaster.send({
      eventId: thread.eventId,
      message: text,
      senderName: params.senderName,
      threadId: thread.id,
    });

    return { message: stored, outbound };
  }

  /**
   * Mark a message as promoted to a logbook entry. Promotion happens once.
   */
  async recordPromotion(messageId: string, logbookEntryId: string, actor: string): Promise<ChatMessage> {
    const promoted = await this.deps.messages.markPromoted(messageId, logbookEntryId, actor, this.now());
    if (promoted) {
      log.info({ messageId, logbookEntryId }, 'Message promoted');
      return promoted;
    }

    const existing = await this.deps.messages.findById(messageId);
    if (!existing) {
      throw new NotFoundError('Message', messageId);
    }
    throw new ConflictError(
      `Message '${messageId}' was already promoted to logbook entry '${existing.promotedToLogbookEntryId}'`,
      'ALREADY_PROMOTED'
    );
  }
}
