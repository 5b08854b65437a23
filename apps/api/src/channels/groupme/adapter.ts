import { z } from 'zod';
import { truncate, type ChannelMapping, type ConversationReference } from '@cobra-relay/shared';
import { DeliveryError, MalformedPayloadError } from '../../middleware/error-handler.js';
import { createLogger } from '../../utils/logger.js';
import {
  HttpPlatformAdapter,
  type ArchiveTarget,
  type ChannelProvisioner,
  type HttpAdapterOptions,
  type InboundCallback,
  type ProvisionedChannel,
  type ProvisionRequest,
  type SendOptions,
  type SendResult,
  type SendTarget,
} from '../base.js';
import { formatIssues } from '../payload.js';

const log = createLogger('GroupMe');

// GroupMe rejects bot posts longer than this
const MAX_TEXT_LENGTH = 1000;

const DEFAULT_BOT_NAME = 'COBRA';

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

const groupMeCallbackSchema = z.object({
  id: idSchema,
  group_id: idSchema,
  text: z.string().nullable().optional(),
  name: z.string().default(''),
  sender_id: idSchema.optional(),
  user_id: idSchema.optional(),
  sender_type: z.string().default('user'),
  created_at: z.number().optional(),
  attachments: z
    .array(z.object({ type: z.string(), url: z.string().optional() }).passthrough())
    .default([]),
});

export type GroupMeCallback = z.input<typeof groupMeCallbackSchema>;

const createGroupResponseSchema = z.object({
  response: z.object({
    id: idSchema,
    name: z.string(),
    share_url: z.string().nullable().optional(),
  }),
});

const createBotResponseSchema = z.object({
  response: z.object({
    bot: z.object({ bot_id: idSchema }),
  }),
});

export interface GroupMeAdapterOptions extends HttpAdapterOptions {
  apiBase: string;
  /** Account token for group and bot management; posting as a bot needs none */
  accessToken?: string;
  botName?: string;
}

/**
 * GroupMe adapter
 *
 * Inbound: the bot callback GroupMe posts for every group message.
 * Outbound: POST /bots/post addressed by bot id; GroupMe answers 202 with
 * no body, so sent messages have no external id.
 * Provisioning: creates the group and registers a bot whose callback URL
 * points at the mapping's webhook.
 */
export class GroupMeAdapter extends HttpPlatformAdapter implements ChannelProvisioner {
  readonly platform = 'groupme' as const;
  private readonly apiBase: string;
  private readonly accessToken: string | undefined;
  private readonly botName: string;

  constructor(options: GroupMeAdapterOptions) {
    super(options);
    this.apiBase = options.apiBase.replace(/\/+$/, '');
    this.accessToken = options.accessToken || undefined;
    this.botName = options.botName ?? DEFAULT_BOT_NAME;
  }

  parseInboundCallback(raw: unknown): InboundCallback {
    const result = groupMeCallbackSchema.safeParse(raw);
    if (!result.success) {
      throw new MalformedPayloadError(this.platform, formatIssues(result.error));
    }
    const payload = result.data;

    // Our own bot posts come back as callbacks; relaying them would loop
    if (payload.sender_type === 'bot' || payload.sender_type === 'system') {
      return {
        kind: 'ignored',
        conversationId: payload.group_id,
        reason: `${payload.sender_type} message`,
      };
    }

    const image = payload.attachments.find(a => a.type === 'image' && a.url);

    return {
      kind: 'message',
      conversationId: payload.group_id,
      externalMessageId: payload.id,
      text: payload.text?.trim() ?? '',
      senderName: payload.name,
      senderId: payload.sender_id ?? payload.user_id ?? '',
      timestamp: payload.created_at !== undefined ? new Date(payload.created_at * 1000) : undefined,
      attachmentUrl: image?.url,
      attachmentType: image ? 'image' : undefined,
    };
  }

  buildReference(mapping: ChannelMapping): string | null {
    if (!mapping.botId) {
      return null;
    }

    const reference: ConversationReference = {
      serviceUrl: this.apiBase,
      channelId: 'groupme',
      conversation: { id: mapping.externalGroupId, name: mapping.externalGroupName },
      bot: { id: mapping.botId },
    };
    return JSON.stringify(reference);
  }

  async send(target: SendTarget, text: string, options: SendOptions = {}): Promise<SendResult> {
    const botId = target.reference.bot?.id || target.mapping.botId;
    if (!botId) {
      throw new DeliveryError(this.platform, 'GroupMe bot id missing from reference');
    }

    const serviceUrl = target.reference.serviceUrl.replace(/\/+$/, '');
    await this.postJson(
      `${serviceUrl}/bots/post`,
      { bot_id: botId, text: truncate(text, MAX_TEXT_LENGTH) },
      { signal: options.signal }
    );

    return { externalMessageId: null };
  }

  // ============================================
  // GROUP AND BOT MANAGEMENT
  // ============================================

  async provisionChannel(request: ProvisionRequest): Promise<ProvisionedChannel> {
    const group = await this.createGroup(request.name);

    let botId: string;
    try {
      botId = await this.createBot(group.groupId, request.callbackUrl);
    } catch (error) {
      // Don't leave a bot-less group behind
      await this.archiveGroup(group.groupId).catch((archiveError: unknown) => {
        log.error({ err: archiveError, groupId: group.groupId }, 'Failed to archive group after bot creation failed');
      });
      throw error;
    }

    log.info({ groupId: group.groupId, botId }, 'GroupMe group provisioned');
    return {
      externalGroupId: group.groupId,
      externalGroupName: group.name,
      botId,
      shareUrl: group.shareUrl,
    };
  }

  async archiveChannel(channel: ArchiveTarget): Promise<void> {
    if (channel.botId) {
      await this.destroyBot(channel.botId);
    }
    await this.archiveGroup(channel.externalGroupId);
    log.info({ mappingId: channel.id, groupId: channel.externalGroupId }, 'GroupMe group archived');
  }

  async createGroup(name: string): Promise<{ groupId: string; name: string; shareUrl: string | null }> {
    const { data } = await this.postJson(this.managementUrl('/groups'), { name, share: true });
    const parsed = createGroupResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new DeliveryError(this.platform, 'Unexpected response to group creation');
    }

    const group = parsed.data.response;
    return { groupId: group.id, name: group.name, shareUrl: group.share_url ?? null };
  }

  async createBot(groupId: string, callbackUrl: string): Promise<string> {
    const { data } = await this.postJson(this.managementUrl('/bots'), {
      bot: { name: this.botName, group_id: groupId, callback_url: callbackUrl },
    });
    const parsed = createBotResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new DeliveryError(this.platform, 'Unexpected response to bot creation');
    }
    return parsed.data.response.bot.bot_id;
  }

  async destroyBot(botId: string): Promise<void> {
    await this.postJson(this.managementUrl('/bots/destroy'), { bot_id: botId });
  }

  async archiveGroup(groupId: string): Promise<void> {
    await this.postJson(this.managementUrl(`/groups/${encodeURIComponent(groupId)}/destroy`), {});
  }

  private managementUrl(path: string): string {
    if (!this.accessToken) {
      throw new DeliveryError(this.platform, 'GroupMe access token not configured');
    }
    return `${this.apiBase}${path}?token=${encodeURIComponent(this.accessToken)}`;
  }
}
