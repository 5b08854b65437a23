import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_CONFIG } from './config/constants.js';
import { authMiddleware } from './middleware/auth.js';
import { globalErrorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestContext } from './middleware/request-context.js';
import { createMappingRoutes } from './modules/mappings/routes.js';
import { createMessageRoutes } from './modules/messages/routes.js';
import { createWebhookRoutes } from './modules/webhooks/routes.js';
import type { RelayServices } from './services/container.js';

export interface AppOptions {
  services: RelayServices;
  jwtSecret: string;
  inboundApiKey: string;
  corsOrigin: string;
  staleAfterDays?: number;
  /** Database check for /health; omitted means "not checked" */
  checkDatabase?: () => Promise<boolean>;
}

/**
 * Build the Express application over a set of relay services
 */
export function createApp(options: AppOptions): Express {
  const { services } = options;
  const app = express();

  // ============================================
  // MIDDLEWARE
  // ============================================

  // Security headers
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API
  }));

  // CORS
  app.use(cors({
    origin: options.corsOrigin,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Api-Key', 'X-Request-Id'],
  }));

  app.use(requestContext());

  // Webhooks parse their own bodies and answer with bare status codes
  app.use('/webhooks', createWebhookRoutes(services, { inboundApiKey: options.inboundApiKey }));

  // Body parsing
  app.use(express.json({ limit: API_CONFIG.MAX_BODY_SIZE }));

  // ============================================
  // HEALTH CHECK
  // ============================================

  app.get('/health', async (_req, res, next) => {
    try {
      const database = options.checkDatabase ? await options.checkDatabase() : null;
      const dedupStats = services.deduplicator.getStats();

      res.json({
        status: database === false ? 'degraded' : 'healthy',
        timestamp: new Date().toISOString(),
        database: database === null ? 'unchecked' : database ? 'connected' : 'disconnected',
        platforms: services.router.getSupportedPlatforms(),
        deduplication: {
          memorySize: dedupStats.memorySize,
          memoryHitRate: `${(dedupStats.memoryHitRate * 100).toFixed(1)}%`,
          storageConflicts: dedupStats.storageConflicts,
        },
        mappingCache: services.mappings.getCacheStats(),
      });
    } catch (error) {
      next(error);
    }
  });

  // ============================================
  // API ROUTES
  // ============================================

  const authenticate = authMiddleware(options.jwtSecret);

  app.use('/api', createMappingRoutes(services, {
    authenticate,
    inboundApiKey: options.inboundApiKey,
    staleAfterDays: options.staleAfterDays,
  }));
  app.use('/api', createMessageRoutes(services, { authenticate }));

  // ============================================
  // ERROR HANDLING
  // ============================================

  app.use(notFoundHandler());
  app.use(globalErrorHandler());

  return app;
}
