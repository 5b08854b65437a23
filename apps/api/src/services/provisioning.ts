import { randomUUID } from 'crypto';
import { formatPlatformName, type ChannelMapping, type ExternalPlatform } from '@cobra-relay/shared';
import { canProvision } from '../channels/base.js';
import type { ChannelRouter } from '../channels/router.js';
import { AppError, NotFoundError, ValidationError } from '../middleware/error-handler.js';
import { generateWebhookSecret, type ChannelMappingStore } from '../modules/mappings/service.js';
import type { ChatThreadRepository } from '../modules/threads/repository.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Provisioning');

export interface CreateChannelRequest {
  platform: ExternalPlatform;
  eventId: string;
  chatThreadId?: string | null;
  groupName?: string;
  createdBy: string;
}

export interface ChannelProvisioningDeps {
  mappings: ChannelMappingStore;
  threads: ChatThreadRepository;
  router: ChannelRouter;
  /** Base URL the platform can reach our webhooks on */
  publicBaseUrl?: string;
}

/**
 * Creates external conversations for an event and tears them down again.
 * Only platforms whose adapter can provision are accepted; the others are
 * connected by their own bots and arrive through the reference upsert.
 */
export class ChannelProvisioningService {
  constructor(private readonly deps: ChannelProvisioningDeps) {}

  async createChannel(request: CreateChannelRequest): Promise<ChannelMapping> {
    const { platform, eventId } = request;
    const adapter = this.deps.router.get(platform);
    if (!canProvision(adapter)) {
      throw new ValidationError('platform', `${formatPlatformName(platform)} channels cannot be created from COBRA`);
    }

    const baseUrl = this.deps.publicBaseUrl?.replace(/\/+$/, '');
    if (!baseUrl) {
      throw new AppError('PROVISIONING_NOT_CONFIGURED', 'PUBLIC_BASE_URL is required to provision channels');
    }

    const eventName = await this.deps.threads.findEventName(eventId);
    if (eventName === null) {
      throw new NotFoundError('Event', eventId);
    }

    if (request.chatThreadId) {
      const thread = await this.deps.threads.findById(request.chatThreadId);
      if (!thread) {
        throw new NotFoundError('Thread', request.chatThreadId);
      }
      if (thread.eventId !== eventId) {
        throw new ValidationError('chatThreadId', 'Thread belongs to another event');
      }
    }

    // The callback URL names the mapping, so its id and secret exist before the row
    const mappingId = randomUUID();
    const webhookSecret = generateWebhookSecret();
    const callbackUrl = `${baseUrl}/webhooks/${platform}/${mappingId}?token=${encodeURIComponent(webhookSecret)}`;

    const channel = await adapter.provisionChannel({
      name: request.groupName?.trim() || `COBRA: ${eventName}`,
      callbackUrl,
    });

    let mapping: ChannelMapping;
    try {
      mapping = await this.deps.mappings.create({
        id: mappingId,
        platform,
        externalGroupId: channel.externalGroupId,
        externalGroupName: channel.externalGroupName,
        eventId,
        chatThreadId: request.chatThreadId ?? null,
        shareUrl: channel.shareUrl,
        botId: channel.botId,
        webhookSecret,
        createdBy: request.createdBy,
      });
    } catch (error) {
      log.warn({ err: error, platform, externalGroupId: channel.externalGroupId }, 'Mapping rejected, archiving new channel');
      await adapter.archiveChannel({
        id: mappingId,
        externalGroupId: channel.externalGroupId,
        botId: channel.botId,
      }).catch((archiveError: unknown) => {
        log.error({ err: archiveError, externalGroupId: channel.externalGroupId }, 'Failed to archive orphaned channel');
      });
      throw error;
    }

    const reference = adapter.buildReference(mapping);
    if (reference) {
      mapping = await this.deps.mappings.recordActivity(mapping.id, { conversationReference: reference });
    }

    log.info(
      { mappingId: mapping.id, platform, eventId, externalGroupId: mapping.externalGroupId },
      'Channel provisioned'
    );
    return mapping;
  }

  /**
   * Deactivate a mapping, optionally archiving the external conversation
   * first. A refused archive leaves the mapping active.
   */
  async deactivate(id: string, actor: string, options: { archive?: boolean } = {}): Promise<ChannelMapping> {
    if (!options.archive) {
      return this.deps.mappings.deactivate(id, actor);
    }

    const mapping = await this.deps.mappings.requireById(id);
    const adapter = this.deps.router.get(mapping.platform);
    if (!canProvision(adapter)) {
      throw new ValidationError('archive', `${formatPlatformName(mapping.platform)} conversations cannot be archived from COBRA`);
    }

    await adapter.archiveChannel(mapping);
    return this.deps.mappings.deactivate(id, actor);
  }
}
