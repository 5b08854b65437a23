import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { EXTERNAL_PLATFORMS } from '@cobra-relay/shared';
import { config } from '../../config/env.js';
import { apiKeyMiddleware, currentActor } from '../../middleware/auth.js';
import { asyncHandler, NotFoundError, sendCreated, sendSuccess } from '../../middleware/error-handler.js';
import type { RelayServices } from '../../services/container.js';
import { assessStaleness, validateReference } from '../../services/reference-validator.js';
import { createLogger } from '../../utils/logger.js';
import { toMappingSummary } from './service.js';

const log = createLogger('MappingRoutes');

const platformSchema = z.enum(EXTERNAL_PLATFORMS);
const booleanQuery = z.enum(['true', 'false']).transform(v => v === 'true');

const idParamsSchema = z.object({ id: z.string().uuid() });
const threadParamsSchema = z.object({ threadId: z.string().uuid() });
const eventParamsSchema = z.object({ eventId: z.string().uuid() });
const referenceParamsSchema = z.object({
  platform: platformSchema,
  conversationId: z.string().min(1),
});

const listQuerySchema = z.object({
  platform: platformSchema.optional(),
  isActive: booleanQuery.optional(),
  isEmulatorOrTest: booleanQuery.optional(),
  staleDays: z.coerce.number().int().min(0).optional(),
});

const createMappingSchema = z.object({
  platform: platformSchema,
  externalGroupId: z.string().trim().min(1),
  externalGroupName: z.string().trim().max(255).optional(),
  eventId: z.string().uuid().nullable().optional(),
  chatThreadId: z.string().uuid().nullable().optional(),
  shareUrl: z.string().url().nullable().optional(),
  botId: z.string().max(255).optional(),
  conversationReference: z.string().nullable().optional(),
  isEmulatorOrTest: z.boolean().optional(),
});

const renameSchema = z.object({
  name: z.string().trim().min(1).max(255),
});

const staleQuerySchema = z.object({
  inactiveDays: z.coerce.number().int().min(1).optional(),
  platform: platformSchema.optional(),
});

const linkSchema = z.object({
  mappingId: z.string().uuid(),
});

const channelsQuerySchema = z.object({
  includeInactive: booleanQuery.optional(),
});

const deactivateQuerySchema = z.object({
  archive: booleanQuery.optional(),
});

const provisionChannelSchema = z.object({
  platform: platformSchema,
  groupName: z.string().trim().min(1).max(140).optional(),
  chatThreadId: z.string().uuid().nullable().optional(),
});

const putReferenceSchema = z.object({
  conversationReferenceJson: z.string().min(1),
  tenantId: z.string().optional(),
  channelName: z.string().optional(),
  installedByName: z.string().optional(),
  isEmulator: z.boolean().optional(),
});

export interface RelayRouteOptions {
  authenticate: RequestHandler;
  inboundApiKey: string;
  staleAfterDays?: number;
}

/**
 * Mapping administration, thread links and bot reference upserts, mounted at /api
 */
export function createMappingRoutes(services: RelayServices, options: RelayRouteOptions): Router {
  const router = Router();
  const { mappings } = services;
  const staleAfterDays = options.staleAfterDays ?? config.relay.staleAfterDays;

  // ============================================
  // BOT ENDPOINTS (X-Api-Key)
  // ============================================

  /**
   * GET /api/relay/conversation-references/:platform/:conversationId
   */
  router.get(
    '/relay/conversation-references/:platform/:conversationId',
    apiKeyMiddleware(options.inboundApiKey),
    asyncHandler(async (req, res) => {
      const { platform, conversationId } = referenceParamsSchema.parse(req.params);
      const mapping = await mappings.getConversationReference(platform, conversationId);
      if (!mapping) {
        throw new NotFoundError('Mapping', conversationId);
      }

      sendSuccess(res, {
        mappingId: mapping.id,
        conversationReferenceJson: mapping.conversationReference,
        isActive: mapping.isActive,
      });
    })
  );

  /**
   * PUT /api/relay/conversation-references/:platform/:conversationId
   * Store the reference captured by the bot; unknown conversations are parked
   */
  router.put(
    '/relay/conversation-references/:platform/:conversationId',
    apiKeyMiddleware(options.inboundApiKey),
    asyncHandler(async (req, res) => {
      const { platform, conversationId } = referenceParamsSchema.parse(req.params);
      const body = putReferenceSchema.parse(req.body);

      const { mapping, created } = await mappings.putConversationReference(platform, {
        externalGroupId: conversationId,
        conversationReference: body.conversationReferenceJson,
        tenantId: body.tenantId,
        channelName: body.channelName,
        installedByName: body.installedByName,
        isEmulator: body.isEmulator,
      });

      sendSuccess(res, { mappingId: mapping.id, isNewMapping: created });
    })
  );

  // ============================================
  // ADMIN ENDPOINTS (JWT)
  // ============================================

  /**
   * GET /api/relay/mappings
   */
  router.get(
    '/relay/mappings',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const query = listQuerySchema.parse(req.query);
      const list = await mappings.list(query);
      sendSuccess(res, { mappings: list.map(toMappingSummary), total: list.length });
    })
  );

  /**
   * POST /api/relay/mappings
   * The webhook secret is only ever returned here
   */
  router.post(
    '/relay/mappings',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const body = createMappingSchema.parse(req.body);
      const mapping = await mappings.create({ ...body, createdBy: currentActor(req) });

      sendCreated(res, {
        mapping: toMappingSummary(mapping),
        webhookSecret: mapping.webhookSecret,
        webhookPath: `/webhooks/${mapping.platform}/${mapping.id}`,
      });
    })
  );

  /**
   * DELETE /api/relay/mappings/stale
   * Deactivate mappings with no recent activity
   */
  router.delete(
    '/relay/mappings/stale',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const query = staleQuerySchema.parse(req.query);
      const ids = await mappings.cleanupStale(query);
      log.info({ count: ids.length, actor: currentActor(req) }, 'Stale cleanup requested');
      sendSuccess(res, { deactivated: ids.length, mappingIds: ids });
    })
  );

  /**
   * GET /api/relay/mappings/:id
   */
  router.get(
    '/relay/mappings/:id',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const mapping = await mappings.requireById(id);
      sendSuccess(res, toMappingSummary(mapping));
    })
  );

  /**
   * PATCH /api/relay/mappings/:id/name
   */
  router.patch(
    '/relay/mappings/:id/name',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const { name } = renameSchema.parse(req.body);
      const mapping = await mappings.rename(id, name, currentActor(req));
      sendSuccess(res, toMappingSummary(mapping));
    })
  );

  /**
   * DELETE /api/relay/mappings/:id?archive=true
   * Soft delete; `archive` also tears down the external group
   */
  router.delete(
    '/relay/mappings/:id',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const { archive } = deactivateQuerySchema.parse(req.query);
      const mapping = await services.provisioning.deactivate(id, currentActor(req), { archive });
      sendSuccess(res, toMappingSummary(mapping));
    })
  );

  /**
   * POST /api/relay/mappings/:id/reactivate
   */
  router.post(
    '/relay/mappings/:id/reactivate',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const mapping = await mappings.reactivate(id, currentActor(req));
      sendSuccess(res, toMappingSummary(mapping));
    })
  );

  /**
   * GET /api/relay/mappings/:id/reference-status
   */
  router.get(
    '/relay/mappings/:id/reference-status',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const mapping = await mappings.requireById(id);
      const validation = assessStaleness(
        validateReference(mapping.conversationReference),
        mapping.lastActivityAt,
        new Date(),
        staleAfterDays
      );
      sendSuccess(res, { mappingId: mapping.id, ...validation });
    })
  );

  /**
   * POST /api/relay/expiry-patterns/reload
   */
  router.post(
    '/relay/expiry-patterns/reload',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const table = await services.expiryPatterns.reload();
      log.info({ actor: currentActor(req) }, 'Expiry patterns reloaded');
      sendSuccess(res, table);
    })
  );

  // ============================================
  // THREAD LINKS
  // ============================================

  /**
   * POST /api/chat/threads/:threadId/link
   */
  router.post(
    '/chat/threads/:threadId/link',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { threadId } = threadParamsSchema.parse(req.params);
      const { mappingId } = linkSchema.parse(req.body);
      const mapping = await mappings.linkToThread(mappingId, threadId, currentActor(req));
      sendSuccess(res, toMappingSummary(mapping));
    })
  );

  /**
   * DELETE /api/chat/threads/:threadId/link
   */
  router.delete(
    '/chat/threads/:threadId/link',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { threadId } = threadParamsSchema.parse(req.params);
      const mapping = await mappings.unlinkThread(threadId, currentActor(req));
      if (!mapping) {
        throw new NotFoundError('Mapping');
      }
      sendSuccess(res, toMappingSummary(mapping));
    })
  );

  /**
   * GET /api/events/:eventId/channels
   */
  router.get(
    '/events/:eventId/channels',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { eventId } = eventParamsSchema.parse(req.params);
      const { includeInactive } = channelsQuerySchema.parse(req.query);
      const list = await mappings.listForEvent(eventId, { activeOnly: !includeInactive });
      sendSuccess(res, { channels: list.map(toMappingSummary) });
    })
  );

  /**
   * POST /api/events/:eventId/channels
   * Create the external group and its bot, then map it to the event
   */
  router.post(
    '/events/:eventId/channels',
    options.authenticate,
    asyncHandler(async (req, res) => {
      const { eventId } = eventParamsSchema.parse(req.params);
      const body = provisionChannelSchema.parse(req.body);
      const mapping = await services.provisioning.createChannel({
        ...body,
        eventId,
        createdBy: currentActor(req),
      });

      sendCreated(res, {
        mapping: toMappingSummary(mapping),
        shareUrl: mapping.shareUrl,
        webhookPath: `/webhooks/${mapping.platform}/${mapping.id}`,
      });
    })
  );

  return router;
}
