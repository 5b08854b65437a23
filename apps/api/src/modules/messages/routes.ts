import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { API_CONFIG } from '../../config/constants.js';
import { currentActor } from '../../middleware/auth.js';
import { asyncHandler, sendCreated, sendSuccess } from '../../middleware/error-handler.js';
import type { RelayServices } from '../../services/container.js';
import { toChatMessageDto } from './mapper.js';

const threadParamsSchema = z.object({ threadId: z.string().uuid() });
const messageParamsSchema = z.object({ messageId: z.string().uuid() });
const eventParamsSchema = z.object({ eventId: z.string().uuid() });

const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(API_CONFIG.MAX_PAGE_SIZE).optional(),
  before: z.string().datetime({ offset: true }).transform(v => new Date(v)).optional(),
});

const postMessageSchema = z.object({
  message: z.string().trim().min(1).max(4000),
});

const promotionSchema = z.object({
  logbookEntryId: z.string().uuid(),
});

const externalMessageSchema = z.object({
  message: z.string().trim().min(1).max(4000),
  senderName: z.string().trim().min(1).max(255).optional(),
  threadId: z.string().uuid().optional(),
});

const announcementSchema = z.object({
  title: z.string().trim().min(1).max(255),
  message: z.string().trim().min(1).max(4000),
  priority: z.enum(['normal', 'high', 'urgent']).optional(),
});

/**
 * Chat and outbound routes, mounted at /api behind JWT auth
 */
export function createMessageRoutes(services: RelayServices, options: { authenticate: RequestHandler }): Router {
  const router = Router();
  const { chat, broadcaster } = services;

  router.use(['/chat', '/events'], options.authenticate);

  /**
   * GET /api/chat/threads/:threadId/messages
   */
  router.get('/chat/threads/:threadId/messages', asyncHandler(async (req, res) => {
    const { threadId } = threadParamsSchema.parse(req.params);
    const query = listQuerySchema.parse(req.query);

    const messages = await chat.getMessages(threadId, query);
    sendSuccess(res, { messages: messages.map(toChatMessageDto) });
  }));

  /**
   * POST /api/chat/threads/:threadId/messages
   * Store and relay to the thread's external channel
   */
  router.post('/chat/threads/:threadId/messages', asyncHandler(async (req, res) => {
    const { threadId } = threadParamsSchema.parse(req.params);
    const { message } = postMessageSchema.parse(req.body);

    const result = await chat.postMessage({
      threadId,
      message,
      senderName: currentActor(req),
    });

    sendCreated(res, {
      message: toChatMessageDto(result.message),
      outbound: result.outbound,
    });
  }));

  /**
   * POST /api/chat/messages/:messageId/promotion
   */
  router.post('/chat/messages/:messageId/promotion', asyncHandler(async (req, res) => {
    const { messageId } = messageParamsSchema.parse(req.params);
    const { logbookEntryId } = promotionSchema.parse(req.body);

    const message = await chat.recordPromotion(messageId, logbookEntryId, currentActor(req));
    sendSuccess(res, toChatMessageDto(message));
  }));

  /**
   * POST /api/events/:eventId/external-messages
   * Send to the event's external channels without storing a chat message
   */
  router.post('/events/:eventId/external-messages', asyncHandler(async (req, res) => {
    const { eventId } = eventParamsSchema.parse(req.params);
    const body = externalMessageSchema.parse(req.body);

    const outcomes = await broadcaster.send({
      eventId,
      message: body.message,
      senderName: body.senderName ?? currentActor(req),
      threadId: body.threadId,
    });
    sendSuccess(res, { outcomes });
  }));

  /**
   * POST /api/events/:eventId/announcements
   */
  router.post('/events/:eventId/announcements', asyncHandler(async (req, res) => {
    const { eventId } = eventParamsSchema.parse(req.params);
    const body = announcementSchema.parse(req.body);

    const result = await broadcaster.broadcastAnnouncement({
      eventId,
      title: body.title,
      message: body.message,
      senderName: currentActor(req),
      priority: body.priority,
    });
    sendSuccess(res, result);
  }));

  return router;
}
