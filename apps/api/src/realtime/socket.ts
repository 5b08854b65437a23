import type { Server as HttpServer } from 'http';
import { Server, type Socket } from 'socket.io';
import type {
  ServerToClientEvents,
  ClientToServerEvents,
  InterServerEvents,
  SocketData,
  ChatMessageEvent,
  ChannelStatusEvent,
} from '@cobra-relay/shared';
import { SOCKET_CONFIG } from '../config/constants.js';
import { verifyToken } from '../middleware/auth.js';
import { createLogger } from '../utils/logger.js';
import type { RealtimeNotifier } from './notifier.js';

const log = createLogger('Socket');

type TypedServer = Server<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

type TypedSocket = Socket<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

export interface SocketOptions {
  jwtSecret: string;
  corsOrigin: string;
}

/**
 * Initialize Socket.io server with typed events
 */
export function initializeSocket(httpServer: HttpServer, options: SocketOptions): TypedServer {
  const io: TypedServer = new Server<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    SocketData
  >(httpServer, {
    cors: {
      origin: options.corsOrigin,
      methods: ['GET', 'POST'],
      credentials: true,
    },
    pingInterval: SOCKET_CONFIG.PING_INTERVAL_MS,
    pingTimeout: SOCKET_CONFIG.PING_TIMEOUT_MS,
  });

  // Authentication middleware
  io.use((socket, next) => {
    const authToken: unknown = socket.handshake.auth.token;
    const token = typeof authToken === 'string'
      ? authToken
      : socket.handshake.headers.authorization?.replace('Bearer ', '');

    if (!token) {
      next(new Error('Authentication required'));
      return;
    }

    const payload = options.jwtSecret ? verifyToken(token, options.jwtSecret) : null;
    if (!payload) {
      next(new Error('Invalid token'));
      return;
    }

    socket.data.userId = payload.userId;
    socket.data.userName = payload.name || 'Unknown';
    next();
  });

  io.on('connection', (socket: TypedSocket) => {
    log.debug({ userId: socket.data.userId, socketId: socket.id }, 'Connected');

    // Join personal room
    void socket.join(`${SOCKET_CONFIG.ROOM_USER}${socket.data.userId}`);

    socket.on('join:thread', ({ threadId }) => {
      joinRoom(socket, `${SOCKET_CONFIG.ROOM_THREAD}${threadId}`, threadId);
    });

    socket.on('leave:thread', ({ threadId }) => {
      void socket.leave(`${SOCKET_CONFIG.ROOM_THREAD}${threadId}`);
    });

    socket.on('join:event', ({ eventId }) => {
      joinRoom(socket, `${SOCKET_CONFIG.ROOM_EVENT}${eventId}`, eventId);
    });

    socket.on('leave:event', ({ eventId }) => {
      void socket.leave(`${SOCKET_CONFIG.ROOM_EVENT}${eventId}`);
    });

    socket.on('disconnect', (reason) => {
      log.debug({ userId: socket.data.userId, reason }, 'Disconnected');
    });
  });

  log.info('Socket server initialized');
  return io;
}

function joinRoom(socket: TypedSocket, room: string, id: string): void {
  if (typeof id !== 'string' || id.length === 0) {
    socket.emit('room:error', { room, error: 'Missing room id' });
    return;
  }
  void socket.join(room);
  socket.emit('room:joined', { room });
}

// ============================================
// NOTIFIER
// ============================================

/**
 * Pushes relay updates to thread and event rooms
 */
export class SocketNotifier implements RealtimeNotifier {
  constructor(private readonly io: TypedServer) {}

  notifyMessage(event: ChatMessageEvent): void {
    this.io.to(`${SOCKET_CONFIG.ROOM_THREAD}${event.chatThreadId}`).emit('chat:message', event);
  }

  notifyChannelStatus(event: ChannelStatusEvent): void {
    if (event.eventId) {
      this.io.to(`${SOCKET_CONFIG.ROOM_EVENT}${event.eventId}`).emit('channel:status', event);
    } else {
      this.io.emit('channel:status', event);
    }
  }
}
