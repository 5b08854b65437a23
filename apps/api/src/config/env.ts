import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
dotenv.config();

/**
 * Get required environment variable
 * Throws in production if missing, returns empty string in development
 */
function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value && process.env.NODE_ENV === 'production') {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

/**
 * Get optional environment variable with default
 */
function optionalEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function optionalInt(key: string, defaultValue: number): number {
  const parsed = parseInt(optionalEnv(key, String(defaultValue)), 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

const nodeEnv = optionalEnv('NODE_ENV', 'development');

export const config = {
  // === SERVER ===
  port: optionalInt('PORT', 3001),
  nodeEnv,
  isDev: nodeEnv === 'development',
  isProd: nodeEnv === 'production',
  isTest: nodeEnv === 'test',
  logLevel: optionalEnv(
    'LOG_LEVEL',
    nodeEnv === 'test' ? 'silent' : nodeEnv === 'development' ? 'debug' : 'info'
  ),

  // === DATABASE ===
  databaseUrl: requireEnv('DATABASE_URL'),

  // === AUTHENTICATION ===
  jwtSecret: requireEnv('JWT_SECRET'),
  // Shared key the platform bots use for first-contact callbacks and reference upserts
  inboundApiKey: requireEnv('INBOUND_API_KEY'),

  // === CORS ===
  corsOrigin: optionalEnv('CORS_ORIGIN', 'http://localhost:5173'),

  // === GROUPME ===
  groupme: {
    apiBase: optionalEnv('GROUPME_API_BASE', 'https://api.groupme.com/v3'),
    accessToken: process.env.GROUPME_ACCESS_TOKEN,
    isConfigured: !!process.env.GROUPME_ACCESS_TOKEN,
  },

  // === TEAMS (companion bot service) ===
  teams: {
    botUrl: process.env.TEAMS_BOT_URL,
    botApiKey: process.env.TEAMS_BOT_API_KEY,
    isConfigured: !!process.env.TEAMS_BOT_URL,
  },

  // === RELAY ===
  relay: {
    // Externally reachable base URL, used in callback URLs of provisioned channels
    publicBaseUrl: process.env.PUBLIC_BASE_URL,
    outboundTimeoutMs: optionalInt('RELAY_OUTBOUND_TIMEOUT_MS', 10000),
    broadcastConcurrency: optionalInt('RELAY_BROADCAST_CONCURRENCY', 4),
    staleAfterDays: optionalInt('RELAY_STALE_AFTER_DAYS', 30),
    expiryPatternsFile: optionalEnv(
      'RELAY_EXPIRY_PATTERNS_FILE',
      fileURLToPath(new URL('../../config/expiry-patterns.json', import.meta.url))
    ),
  },
} as const;

// Type for the config object
export type Config = typeof config;

// Validate critical config on startup
export function validateConfig(log: (message: string) => void): void {
  const missing: string[] = [];

  if (!config.databaseUrl) missing.push('DATABASE_URL');
  if (!config.jwtSecret) missing.push('JWT_SECRET');
  if (!config.inboundApiKey) missing.push('INBOUND_API_KEY');

  if (missing.length > 0 && config.isProd) {
    throw new Error(
      `Missing critical environment variables: ${missing.join(', ')}`
    );
  }

  if (missing.length > 0) {
    log(`Missing environment variables: ${missing.join(', ')}`);
  }

  log(
    `Configured integrations: GroupMe=${config.groupme.isConfigured ? 'yes' : 'no'}, ` +
    `Teams=${config.teams.isConfigured ? 'yes' : 'no'}`
  );
}
