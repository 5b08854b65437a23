import express, { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import { EXTERNAL_PLATFORMS, type ExternalPlatform } from '@cobra-relay/shared';
import { API_CONFIG } from '../../config/constants.js';
import { apiKeyMiddleware } from '../../middleware/auth.js';
import { AppError, asyncHandler } from '../../middleware/error-handler.js';
import { getRequestId } from '../../middleware/request-context.js';
import type { RelayServices } from '../../services/container.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('Webhooks');

const mappingIdSchema = z.string().uuid();

/**
 * Resolve the :platform param to a platform with an adapter
 */
function supportedPlatform(services: RelayServices, value: string): ExternalPlatform | null {
  const platform = EXTERNAL_PLATFORMS.find(p => p === value);
  return platform && services.router.isSupported(platform) ? platform : null;
}

function readSecret(req: Request): string | undefined {
  const header = req.headers['x-webhook-secret'];
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }
  const token = req.query.token;
  return typeof token === 'string' && token.length > 0 ? token : undefined;
}

/**
 * Platforms get a status code and nothing else. Details stay in the logs.
 */
function webhookErrorHandler() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    let status = 500;
    if (err instanceof AppError) {
      status = err.httpStatus;
    } else if (isBodyParseError(err)) {
      status = 400;
    }

    const requestId = getRequestId(req);
    if (status >= 500) {
      log.error({ err, requestId, path: req.path }, 'Webhook processing failed');
    } else {
      log.info(
        { requestId, path: req.path, status, reason: err instanceof Error ? err.message : String(err) },
        'Webhook rejected'
      );
    }

    res.status(status).json({ status: status >= 500 ? 'error' : 'rejected' });
  };
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Inbound webhook routes, mounted at /webhooks
 */
export function createWebhookRoutes(services: RelayServices, options: { inboundApiKey: string }): Router {
  const router = Router();

  router.use(express.json({ limit: API_CONFIG.MAX_BODY_SIZE }));

  /**
   * POST /webhooks/:platform
   * First-contact callback forwarded by a platform bot
   */
  router.post(
    '/:platform',
    apiKeyMiddleware(options.inboundApiKey),
    asyncHandler(async (req, res) => {
      const platform = supportedPlatform(services, req.params.platform);
      if (!platform) {
        throw new AppError('ROUTE_NOT_FOUND');
      }

      const result = await services.processor.processUnmappedCallback({
        platform,
        payload: req.body,
      });

      res.json({
        status: 'accepted',
        mappingId: result.mappingId,
        isNewMapping: result.isNewMapping,
      });
    })
  );

  /**
   * POST /webhooks/:platform/:mappingId
   * Callback for a known mapping, authenticated by its webhook secret
   */
  router.post(
    '/:platform/:mappingId',
    asyncHandler(async (req, res) => {
      const platform = supportedPlatform(services, req.params.platform);
      const mappingId = mappingIdSchema.safeParse(req.params.mappingId);
      if (!platform || !mappingId.success) {
        throw new AppError('ROUTE_NOT_FOUND');
      }

      await services.processor.processCallback({
        platform,
        mappingId: mappingId.data,
        secret: readSecret(req),
        payload: req.body,
      });

      res.json({ status: 'accepted' });
    })
  );

  router.use(webhookErrorHandler());

  return router;
}
