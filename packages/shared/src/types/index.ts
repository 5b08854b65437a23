// Core relay types
export type ExternalPlatform = 'groupme' | 'signal' | 'teams' | 'slack';

export const EXTERNAL_PLATFORMS = ['groupme', 'signal', 'teams', 'slack'] as const satisfies readonly ExternalPlatform[];

export type ReferenceStatus = 'Valid' | 'Missing' | 'Invalid' | 'Expired' | 'PossiblyStale';

export type FailureClassification = 'expired' | 'transient';

export type BroadcastStatus = 'sent' | 'skipped-invalid-reference' | 'failed';

export type AnnouncementPriority = 'normal' | 'high' | 'urgent';

// ============================================
// CONVERSATION REFERENCE
// ============================================

/**
 * Addressing data needed to push a message into an external conversation
 * without a preceding inbound message. Stored as JSON on the mapping.
 */
export interface ConversationReference {
  serviceUrl: string;
  channelId?: string;
  conversation: {
    id: string;
    name?: string;
  };
  bot?: {
    id: string;
    name?: string;
  };
  tenantId?: string;
}

export interface ReferenceValidation {
  status: ReferenceStatus;
  canAttemptSend: boolean;
  message: string;
  suggestedHttpStatus?: number;
}

// ============================================
// CHANNEL MAPPINGS
// ============================================

export interface ChannelMapping {
  id: string;
  eventId: string | null;
  chatThreadId: string | null;
  platform: ExternalPlatform;
  externalGroupId: string;
  externalGroupName: string;
  shareUrl: string | null;
  botId: string;
  webhookSecret: string;
  conversationReference: string | null;
  tenantId: string | null;
  installedByName: string | null;
  isEmulatorOrTest: boolean;
  lastActivityAt: Date | null;
  isActive: boolean;
  createdAt: Date;
  createdBy: string;
  modifiedAt: Date;
  modifiedBy: string;
}

/**
 * Mapping as exposed to the admin UI. The webhook secret and the raw
 * reference never leave the service.
 */
export interface ChannelMappingSummary {
  id: string;
  eventId: string | null;
  chatThreadId: string | null;
  platform: ExternalPlatform;
  externalGroupId: string;
  externalGroupName: string;
  shareUrl: string | null;
  tenantId: string | null;
  installedByName: string | null;
  isEmulatorOrTest: boolean;
  isActive: boolean;
  hasConversationReference: boolean;
  lastActivityAt: string | null;
  createdAt: string;
}

export interface MappingListFilter {
  platform?: ExternalPlatform;
  isActive?: boolean;
  isEmulatorOrTest?: boolean;
  staleDays?: number;
}

// ============================================
// CHAT
// ============================================

export interface ChatThread {
  id: string;
  eventId: string;
  name: string;
  isDefaultEventThread: boolean;
  isActive: boolean;
  createdAt: Date;
}

export interface ChatMessage {
  id: string;
  chatThreadId: string;
  message: string;
  createdAt: Date;
  createdBy: string;
  isActive: boolean;
  // External origin (all null for native messages)
  externalSource: ExternalPlatform | null;
  externalMessageId: string | null;
  externalSenderName: string | null;
  externalSenderId: string | null;
  externalTimestamp: Date | null;
  externalAttachmentUrl: string | null;
  externalChannelMappingId: string | null;
  // Logbook promotion markers
  promotedToLogbookEntryId: string | null;
  promotedAt: Date | null;
  promotedBy: string | null;
}

export interface ChatMessageDto {
  id: string;
  chatThreadId: string;
  message: string;
  createdAt: string;
  createdBy: string;
  senderDisplayName: string;
  isExternalMessage: boolean;
  externalSource: ExternalPlatform | null;
  externalSenderName: string | null;
  externalAttachmentUrl: string | null;
  promotedToLogbookEntryId: string | null;
}

// ============================================
// OUTBOUND
// ============================================

export interface BroadcastOutcome {
  mappingId: string;
  platform: ExternalPlatform;
  externalGroupName: string;
  status: BroadcastStatus;
  externalMessageId?: string | null;
  referenceStatus?: ReferenceStatus;
  classification?: FailureClassification;
  error?: string;
}

export interface AnnouncementResult {
  channelsReached: number;
  outcomes: BroadcastOutcome[];
}

// Re-export all types
export * from './socket.js';
export * from './errors.js';
