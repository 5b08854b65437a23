import type { ChannelStatusEvent, ChatMessageEvent } from '@cobra-relay/shared';

/**
 * Sink for live updates. Delivery is at-least-once; clients dedupe chat
 * messages by id.
 */
export interface RealtimeNotifier {
  notifyMessage(event: ChatMessageEvent): void;
  notifyChannelStatus(event: ChannelStatusEvent): void;
}
