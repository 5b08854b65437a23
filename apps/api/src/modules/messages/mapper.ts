import { formatPlatformName, type ChatMessage, type ChatMessageDto } from '@cobra-relay/shared';

export function toChatMessageDto(message: ChatMessage): ChatMessageDto {
  const isExternalMessage = message.externalSource !== null;

  return {
    id: message.id,
    chatThreadId: message.chatThreadId,
    message: message.message,
    createdAt: message.createdAt.toISOString(),
    createdBy: message.createdBy,
    senderDisplayName: message.externalSource
      ? message.externalSenderName || `${formatPlatformName(message.externalSource)} user`
      : message.createdBy,
    isExternalMessage,
    externalSource: message.externalSource,
    externalSenderName: message.externalSenderName,
    externalAttachmentUrl: message.externalAttachmentUrl,
    promotedToLogbookEntryId: message.promotedToLogbookEntryId,
  };
}
