import type { ChannelMapping, ConversationReference, ExternalPlatform } from '@cobra-relay/shared';
import { DeliveryError } from '../middleware/error-handler.js';

// ============================================
// INBOUND
// ============================================

/**
 * Platform-neutral view of one inbound callback
 */
export interface InboundMessage {
  kind: 'message';
  conversationId: string;
  externalMessageId: string;
  text: string;
  senderName: string;
  senderId: string;
  timestamp?: Date;
  attachmentUrl?: string;
  attachmentType?: 'image' | 'file';
  /** Serialized reference, when the payload carries fresh addressing data */
  reference?: string;
  tenantId?: string;
  conversationName?: string;
  installedByName?: string;
  isEmulatorOrTest?: boolean;
}

/**
 * Well-formed callback that must not become a chat message (bot echoes,
 * system notices, membership changes)
 */
export interface IgnoredCallback {
  kind: 'ignored';
  conversationId: string;
  reason: string;
}

export type InboundCallback = InboundMessage | IgnoredCallback;

// ============================================
// OUTBOUND
// ============================================

export interface SendTarget {
  mapping: ChannelMapping;
  reference: ConversationReference;
  /** Stored reference exactly as persisted */
  rawReference: string;
}

export interface SendResult {
  externalMessageId: string | null;
}

export interface SendOptions {
  signal?: AbortSignal;
}

// ============================================
// PLATFORM ADAPTER INTERFACE
// ============================================

/**
 * Base interface for all platform adapters
 * The relay never branches on platform beyond picking the adapter.
 */
export interface PlatformAdapter {
  /** Platform identifier */
  readonly platform: ExternalPlatform;

  /**
   * Deliver formatted text to the external conversation
   * @throws DeliveryError on transport failure or platform rejection
   */
  send(target: SendTarget, text: string, options?: SendOptions): Promise<SendResult>;

  /**
   * Map a raw callback body to generic message fields
   * @throws MalformedPayloadError when the body is not a valid callback
   */
  parseInboundCallback(raw: unknown): InboundCallback;

  /**
   * Reference derivable from the mapping alone, for platforms whose
   * callbacks carry no addressing data
   */
  buildReference(mapping: ChannelMapping): string | null;
}

// ============================================
// PROVISIONING
// ============================================

export interface ProvisionRequest {
  name: string;
  /** Where the platform should deliver callbacks for the new conversation */
  callbackUrl: string;
}

export interface ProvisionedChannel {
  externalGroupId: string;
  externalGroupName: string;
  botId: string;
  shareUrl: string | null;
}

export type ArchiveTarget = Pick<ChannelMapping, 'id' | 'externalGroupId' | 'botId'>;

/**
 * Adapters whose platform lets the relay create and tear down the external
 * conversation itself
 */
export interface ChannelProvisioner {
  provisionChannel(request: ProvisionRequest): Promise<ProvisionedChannel>;
  /**
   * Remove the relay's bot and archive the conversation
   * @throws DeliveryError when the platform refuses
   */
  archiveChannel(channel: ArchiveTarget): Promise<void>;
}

export function canProvision(adapter: PlatformAdapter): adapter is PlatformAdapter & ChannelProvisioner {
  return 'provisionChannel' in adapter
    && typeof adapter.provisionChannel === 'function'
    && 'archiveChannel' in adapter
    && typeof adapter.archiveChannel === 'function';
}

export interface HttpAdapterOptions {
  fetch?: typeof fetch;
}

/**
 * Shared HTTP plumbing for adapters that talk JSON over fetch
 */
export abstract class HttpPlatformAdapter implements PlatformAdapter {
  abstract readonly platform: ExternalPlatform;

  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpAdapterOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  abstract send(target: SendTarget, text: string, options?: SendOptions): Promise<SendResult>;
  abstract parseInboundCallback(raw: unknown): InboundCallback;
  abstract buildReference(mapping: ChannelMapping): string | null;

  /**
   * POST a JSON body. Non-2xx responses become DeliveryError carrying the
   * status and the first part of the response body.
   */
  protected async postJson(
    url: string,
    body: unknown,
    options: { headers?: Record<string, string>; signal?: AbortSignal } = {}
  ): Promise<{ status: number; data: unknown }> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...options.headers },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new DeliveryError(this.platform, `Request to ${this.platform} failed: ${message}`, { cause: error });
    }

    const text = await response.text().catch(() => '');

    if (!response.ok) {
      throw new DeliveryError(
        this.platform,
        `HTTP ${response.status}: ${text.slice(0, 500)}`,
        { statusCode: response.status }
      );
    }

    return { status: response.status, data: parseJsonBody(text) };
  }
}

function parseJsonBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Adapter for platforms that are modelled but have no integration yet
 */
export class UnsupportedPlatformAdapter implements PlatformAdapter {
  constructor(readonly platform: ExternalPlatform) {}

  async send(): Promise<SendResult> {
    throw new DeliveryError(this.platform, 'Platform not supported', { unsupported: true });
  }

  parseInboundCallback(): InboundCallback {
    throw new DeliveryError(this.platform, 'Platform not supported', { unsupported: true });
  }

  buildReference(_mapping: ChannelMapping): string | null {
    return null;
  }
}
