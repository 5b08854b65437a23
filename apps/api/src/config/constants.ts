// ============================================
// RELAY CONFIGURATION
// ============================================

export const RELAY_CONFIG = {
  // Audit actor recorded on writes made by the relay itself
  SYSTEM_USER: 'system',
  SYSTEM_DISPLAY_NAME: 'External Relay',
  EXPIRY_ACTOR: 'ReferenceValidator',
  STALE_CLEANUP_ACTOR: 'StaleCleanup',

  // Body used when a callback carries only an attachment
  IMAGE_PLACEHOLDER: '[Image]',
  ATTACHMENT_PLACEHOLDER: '[Attachment]',

  // Webhook secret entropy
  WEBHOOK_SECRET_BYTES: 32,

  // Stale cleanup default
  DEFAULT_STALE_CLEANUP_DAYS: 30,
} as const;

// ============================================
// DEDUPLICATION CONFIGURATION
// ============================================

export const DEDUP_CONFIG = {
  // Memory cache settings
  MEMORY_MAX_ENTRIES: 50000,
  MEMORY_TTL_MS: 7200000, // 2 hours
} as const;

// ============================================
// MAPPING CACHE CONFIGURATION
// ============================================

export const MAPPING_CACHE_CONFIG = {
  MAX_ENTRIES: 5000,
  TTL_MS: 60000, // 1 minute
} as const;

// ============================================
// SOCKET.IO CONFIGURATION
// ============================================

export const SOCKET_CONFIG = {
  // Room prefixes
  ROOM_USER: 'user:',
  ROOM_THREAD: 'thread:',
  ROOM_EVENT: 'event:',

  // Ping settings
  PING_INTERVAL_MS: 25000,
  PING_TIMEOUT_MS: 20000,
} as const;

// ============================================
// API CONFIGURATION
// ============================================

export const API_CONFIG = {
  // Pagination
  DEFAULT_PAGE_SIZE: 50,
  MAX_PAGE_SIZE: 200,

  // Body size
  MAX_BODY_SIZE: '1mb',
} as const;

// ============================================
// DATABASE POOL
// ============================================

export const DB_CONFIG = {
  POOL_SIZE: 10,
  IDLE_TIMEOUT_MS: 30000,
  CONNECTION_TIMEOUT_MS: 10000,
} as const;
