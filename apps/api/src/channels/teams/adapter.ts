import { z } from 'zod';
import type { ChannelMapping } from '@cobra-relay/shared';
import { DeliveryError, MalformedPayloadError } from '../../middleware/error-handler.js';
import {
  HttpPlatformAdapter,
  type HttpAdapterOptions,
  type InboundCallback,
  type SendOptions,
  type SendResult,
  type SendTarget,
} from '../base.js';
import { formatIssues } from '../payload.js';

/**
 * Activity as forwarded by the companion Teams bot
 */
const teamsActivitySchema = z.object({
  type: z.string().optional(),
  messageId: z.string().min(1),
  conversationId: z.string().min(1),
  text: z.string().nullable().optional(),
  fromName: z.string().nullable().optional(),
  fromId: z.string().nullable().optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
  conversationReferenceJson: z.string().nullable().optional(),
  tenantId: z.string().nullable().optional(),
  channelName: z.string().nullable().optional(),
  installedByName: z.string().nullable().optional(),
  isEmulator: z.boolean().optional(),
  attachments: z
    .array(z.object({
      contentType: z.string(),
      contentUrl: z.string().nullable().optional(),
      name: z.string().nullable().optional(),
    }))
    .default([]),
});

export type TeamsActivity = z.input<typeof teamsActivitySchema>;

const sendResponseSchema = z.object({
  success: z.boolean(),
  messageId: z.string().nullable().optional(),
  error: z.string().nullable().optional(),
});

const HTML_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

/**
 * Drop @-mentions and markup Teams wraps around message text
 */
export function cleanTeamsText(text: string): string {
  return text
    .replace(/<at>[^<]*<\/at>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(nbsp|amp|lt|gt|quot|#39);/g, entity => HTML_ENTITIES[entity] ?? entity)
    .replace(/[ \t]+/g, ' ')
    .trim();
}

export interface TeamsAdapterOptions extends HttpAdapterOptions {
  botUrl?: string;
  botApiKey?: string;
}

/**
 * Teams adapter
 *
 * Teams only accepts proactive messages from the bot that holds the
 * conversation reference, so outbound sends go through the companion bot's
 * internal endpoint, which continues the conversation on our behalf.
 */
export class TeamsAdapter extends HttpPlatformAdapter {
  readonly platform = 'teams' as const;
  private readonly botUrl: string | undefined;
  private readonly botApiKey: string | undefined;

  constructor(options: TeamsAdapterOptions = {}) {
    super(options);
    this.botUrl = options.botUrl?.replace(/\/+$/, '');
    this.botApiKey = options.botApiKey;
  }

  parseInboundCallback(raw: unknown): InboundCallback {
    const result = teamsActivitySchema.safeParse(raw);
    if (!result.success) {
      throw new MalformedPayloadError(this.platform, formatIssues(result.error));
    }
    const activity = result.data;

    if (activity.type && activity.type !== 'message') {
      return {
        kind: 'ignored',
        conversationId: activity.conversationId,
        reason: `${activity.type} activity`,
      };
    }

    const attachment = activity.attachments.find(a => a.contentUrl);

    return {
      kind: 'message',
      conversationId: activity.conversationId,
      externalMessageId: activity.messageId,
      text: cleanTeamsText(activity.text ?? ''),
      senderName: activity.fromName ?? '',
      senderId: activity.fromId ?? '',
      timestamp: activity.timestamp ? new Date(activity.timestamp) : undefined,
      attachmentUrl: attachment?.contentUrl ?? undefined,
      attachmentType: attachment
        ? attachment.contentType.startsWith('image/') ? 'image' : 'file'
        : undefined,
      reference: activity.conversationReferenceJson ?? undefined,
      tenantId: activity.tenantId ?? undefined,
      conversationName: activity.channelName ?? undefined,
      installedByName: activity.installedByName ?? undefined,
      isEmulatorOrTest: activity.isEmulator,
    };
  }

  // Teams references only come from the bot
  buildReference(_mapping: ChannelMapping): string | null {
    return null;
  }

  async send(target: SendTarget, text: string, options: SendOptions = {}): Promise<SendResult> {
    if (!this.botUrl) {
      throw new DeliveryError(this.platform, 'Teams bot URL not configured');
    }

    const { data } = await this.postJson(
      `${this.botUrl}/api/internal/send`,
      {
        conversationId: target.reference.conversation.id,
        conversationReferenceJson: target.rawReference,
        message: text,
      },
      {
        headers: this.botApiKey ? { 'X-Api-Key': this.botApiKey } : {},
        signal: options.signal,
      }
    );

    const parsed = sendResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new DeliveryError(this.platform, 'Unexpected response from Teams bot');
    }
    if (!parsed.data.success) {
      throw new DeliveryError(this.platform, parsed.data.error || 'Teams bot reported a failed send');
    }

    return { externalMessageId: parsed.data.messageId ?? null };
  }
}
