import type { ChatMessageDto, ExternalPlatform } from './index.js';

// ============================================
// SERVER → CLIENT EVENTS
// ============================================

export interface ChatMessageEvent {
  chatThreadId: string;
  message: ChatMessageDto;
  _source: 'native' | 'external'; // UI dedupes by message.id either way
}

export interface ChannelStatusEvent {
  eventId: string | null;
  mappingId: string;
  platform: ExternalPlatform;
  isActive: boolean;
  reason: string;
  timestamp: string;
}

export interface ServerToClientEvents {
  'chat:message': (event: ChatMessageEvent) => void;
  'channel:status': (event: ChannelStatusEvent) => void;
  'room:joined': (data: { room: string }) => void;
  'room:error': (data: { room: string; error: string }) => void;
}

// ============================================
// CLIENT → SERVER EVENTS
// ============================================

export interface ClientToServerEvents {
  'join:thread': (data: { threadId: string }) => void;
  'leave:thread': (data: { threadId: string }) => void;
  'join:event': (data: { eventId: string }) => void;
  'leave:event': (data: { eventId: string }) => void;
}

export interface InterServerEvents {
  ping: () => void;
}

export interface SocketData {
  userId: string;
  userName: string;
}
