/**
 * Relay error codes
 *
 * Error code ranges:
 * - 40001-40099: Inbound (webhook) errors
 * - 40100-40199: Mapping store errors
 * - 40200-40299: Outbound delivery errors
 * - 40600-40699: Validation errors
 * - 40900-40999: System errors
 */

export type ErrorCategory =
  | 'auth'
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'delivery'
  | 'system';

export interface ErrorCodeDefinition {
  code: number;
  category: ErrorCategory;
  name: string;
  description: string;
  retryable: boolean;
}

export const ERROR_CODES = {
  // ============================================
  // 40001-40099: Inbound Errors
  // ============================================
  AUTHENTICATION_FAILED: {
    code: 40001,
    category: 'auth' as const,
    name: 'AUTHENTICATION_FAILED',
    description: 'Webhook request could not be authenticated',
    retryable: false,
  },
  MALFORMED_PAYLOAD: {
    code: 40002,
    category: 'validation' as const,
    name: 'MALFORMED_PAYLOAD',
    description: 'Callback payload could not be parsed',
    retryable: false,
  },
  UNAUTHORIZED: {
    code: 40003,
    category: 'auth' as const,
    name: 'UNAUTHORIZED',
    description: 'Authentication required',
    retryable: false,
  },

  // ============================================
  // 40100-40199: Mapping Store Errors
  // ============================================
  MAPPING_NOT_FOUND: {
    code: 40101,
    category: 'not_found' as const,
    name: 'MAPPING_NOT_FOUND',
    description: 'Channel mapping not found',
    retryable: false,
  },
  MAPPING_CONFLICT: {
    code: 40102,
    category: 'conflict' as const,
    name: 'MAPPING_CONFLICT',
    description: 'An active mapping already exists for this conversation',
    retryable: false,
  },
  THREAD_NOT_FOUND: {
    code: 40103,
    category: 'not_found' as const,
    name: 'THREAD_NOT_FOUND',
    description: 'Chat thread not found',
    retryable: false,
  },
  MESSAGE_NOT_FOUND: {
    code: 40104,
    category: 'not_found' as const,
    name: 'MESSAGE_NOT_FOUND',
    description: 'Chat message not found',
    retryable: false,
  },
  ALREADY_PROMOTED: {
    code: 40105,
    category: 'conflict' as const,
    name: 'ALREADY_PROMOTED',
    description: 'Message has already been promoted to the logbook',
    retryable: false,
  },
  EVENT_NOT_FOUND: {
    code: 40106,
    category: 'not_found' as const,
    name: 'EVENT_NOT_FOUND',
    description: 'Event not found',
    retryable: false,
  },

  // ============================================
  // 40200-40299: Outbound Delivery Errors
  // ============================================
  DELIVERY_FAILED: {
    code: 40203,
    category: 'delivery' as const,
    name: 'DELIVERY_FAILED',
    description: 'Platform rejected or failed the message',
    retryable: true,
  },
  DELIVERY_TIMEOUT: {
    code: 40204,
    category: 'delivery' as const,
    name: 'DELIVERY_TIMEOUT',
    description: 'Platform call timed out',
    retryable: true,
  },
  PLATFORM_UNSUPPORTED: {
    code: 40205,
    category: 'delivery' as const,
    name: 'PLATFORM_UNSUPPORTED',
    description: 'Platform not supported',
    retryable: false,
  },

  // ============================================
  // 40600-40699: Validation Errors
  // ============================================
  VALIDATION_FAILED: {
    code: 40601,
    category: 'validation' as const,
    name: 'VALIDATION_FAILED',
    description: 'Request validation failed',
    retryable: false,
  },

  // ============================================
  // 40900-40999: System Errors
  // ============================================
  INTERNAL_ERROR: {
    code: 40901,
    category: 'system' as const,
    name: 'INTERNAL_ERROR',
    description: 'Internal server error',
    retryable: true,
  },
  ROUTE_NOT_FOUND: {
    code: 40902,
    category: 'not_found' as const,
    name: 'ROUTE_NOT_FOUND',
    description: 'Route not found',
    retryable: false,
  },
  PROVISIONING_NOT_CONFIGURED: {
    code: 40903,
    category: 'system' as const,
    name: 'PROVISIONING_NOT_CONFIGURED',
    description: 'Channel provisioning is not configured',
    retryable: false,
  },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Get HTTP status code for error category
 */
export function getHttpStatusForCategory(category: ErrorCategory): number {
  switch (category) {
    case 'validation':
      return 400;
    case 'auth':
      return 401;
    case 'not_found':
      return 404;
    case 'conflict':
      return 409;
    case 'delivery':
      return 502;
    case 'system':
    default:
      return 500;
  }
}
