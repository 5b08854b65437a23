import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  EXTERNAL_PLATFORMS,
  isHttpUrl,
  type ConversationReference,
  type ExternalPlatform,
  type FailureClassification,
  type ReferenceValidation,
} from '@cobra-relay/shared';
import { DeliveryError } from '../middleware/error-handler.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ReferenceValidator');

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// REFERENCE VALIDATION
// ============================================

const NO_CONVERSATION_ID = 'Conversation reference has no conversation id';
const NO_SERVICE_URL = 'Conversation reference has no service URL';

const conversationReferenceSchema = z.object({
  serviceUrl: z
    .string({ required_error: NO_SERVICE_URL, invalid_type_error: NO_SERVICE_URL })
    .trim()
    .min(1, NO_SERVICE_URL)
    .refine(isHttpUrl, 'Conversation reference service URL is not an absolute http(s) URL'),
  channelId: z.string().optional(),
  conversation: z.object(
    {
      id: z
        .string({ required_error: NO_CONVERSATION_ID, invalid_type_error: NO_CONVERSATION_ID })
        .trim()
        .min(1, NO_CONVERSATION_ID),
      name: z.string().optional(),
    },
    { required_error: NO_CONVERSATION_ID, invalid_type_error: NO_CONVERSATION_ID }
  ),
  bot: z.object({ id: z.string(), name: z.string().optional() }).optional(),
  tenantId: z.string().optional(),
});

type ParsedReference =
  | { ok: true; reference: ConversationReference }
  | { ok: false; validation: ReferenceValidation };

function invalid(message: string): ReferenceValidation {
  return { status: 'Invalid', canAttemptSend: false, message, suggestedHttpStatus: 400 };
}

/**
 * Parse a stored reference, reporting Missing or Invalid instead of throwing
 */
export function parseConversationReference(raw: string | null | undefined): ParsedReference {
  if (raw === null || raw === undefined || raw.trim() === '') {
    return {
      ok: false,
      validation: {
        status: 'Missing',
        canAttemptSend: false,
        message: 'No conversation reference stored',
        suggestedHttpStatus: 404,
      },
    };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, validation: invalid('Conversation reference is not valid JSON') };
  }

  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    return { ok: false, validation: invalid('Conversation reference must be a JSON object') };
  }

  const result = conversationReferenceSchema.safeParse(json);
  if (!result.success) {
    const [issue] = result.error.errors;
    return { ok: false, validation: invalid(issue?.message ?? 'Conversation reference is malformed') };
  }

  return { ok: true, reference: result.data };
}

/**
 * Classify a stored reference without contacting the platform. Total: every
 * input yields a result.
 */
export function validateReference(raw: string | null | undefined): ReferenceValidation {
  const parsed = parseConversationReference(raw);
  if (!parsed.ok) {
    return parsed.validation;
  }
  return { status: 'Valid', canAttemptSend: true, message: 'Conversation reference is valid' };
}

/**
 * Downgrade a Valid result to PossiblyStale when the mapping has seen no
 * activity within the threshold. Informational only; sends still go ahead.
 */
export function assessStaleness(
  validation: ReferenceValidation,
  lastActivityAt: Date | null,
  now: Date,
  thresholdDays: number
): ReferenceValidation {
  if (validation.status !== 'Valid') {
    return validation;
  }

  const stale = lastActivityAt === null
    || now.getTime() - lastActivityAt.getTime() > thresholdDays * DAY_MS;

  if (!stale) {
    return validation;
  }

  return {
    status: 'PossiblyStale',
    canAttemptSend: true,
    message: lastActivityAt === null
      ? 'No activity recorded; reference may be stale'
      : `No activity in the last ${thresholdDays} days; reference may be stale`,
  };
}

/**
 * Result recorded when a send proved the reference unusable
 */
export function expiredResult(error: unknown): ReferenceValidation {
  const detail = error instanceof Error ? error.message : String(error);
  return {
    status: 'Expired',
    canAttemptSend: false,
    message: `Conversation reference expired: ${detail}`,
    suggestedHttpStatus: 410,
  };
}

// ============================================
// FAILURE CLASSIFICATION
// ============================================

const expiryPatternFileSchema = z.object({
  statusCodes: z.array(z.number().int().min(100).max(599)),
  patterns: z.array(z.string().min(1)),
  platforms: z.record(z.array(z.string().min(1))).optional(),
});

export interface ExpiryPatternConfig {
  statusCodes: number[];
  patterns: string[];
  platforms: Partial<Record<ExternalPlatform, string[]>>;
}

export const DEFAULT_EXPIRY_PATTERNS: ExpiryPatternConfig = {
  statusCodes: [403, 404],
  patterns: [
    'Bot is not part of the conversation',
    'Conversation not found',
    'The bot is not installed',
    'bot not installed',
    'Resource not found',
    'Forbidden',
    'The conversation reference is not valid',
  ],
  platforms: {
    groupme: ['Bot not found', 'Group not found'],
  },
};

function isExternalPlatform(value: string): value is ExternalPlatform {
  return EXTERNAL_PLATFORMS.some(platform => platform === value);
}

/**
 * Turn the file contents into a config, dropping unknown platform keys
 */
export function parseExpiryPatterns(content: string): ExpiryPatternConfig {
  const file = expiryPatternFileSchema.parse(JSON.parse(content));
  const platforms: Partial<Record<ExternalPlatform, string[]>> = {};

  for (const [name, patterns] of Object.entries(file.platforms ?? {})) {
    if (isExternalPlatform(name)) {
      platforms[name] = patterns;
    } else {
      log.warn({ platform: name }, 'Ignoring expiry patterns for unknown platform');
    }
  }

  return { statusCodes: file.statusCodes, patterns: file.patterns, platforms };
}

function collectMessages(error: unknown): string[] {
  const messages: string[] = [];
  let current: unknown = error;

  // Walk the cause chain a few levels deep
  for (let depth = 0; depth < 3 && current !== undefined && current !== null; depth++) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      break;
    }
  }

  return messages.map(m => m.toLowerCase());
}

/**
 * Expiry pattern table
 *
 * Decides whether a failed send means the reference is gone for good
 * (`expired`) or may work later (`transient`). The shared pattern list
 * applies to every platform; `platforms.<name>` entries are appended to it
 * for that platform only.
 */
export class ExpiryPatternTable {
  private current: ExpiryPatternConfig;

  constructor(
    private readonly filePath?: string,
    initial: ExpiryPatternConfig = DEFAULT_EXPIRY_PATTERNS
  ) {
    this.current = initial;
  }

  /**
   * Read the table from its file. A bad file leaves the previous table in place.
   */
  async load(): Promise<ExpiryPatternConfig> {
    if (!this.filePath) {
      return this.current;
    }

    const content = await readFile(this.filePath, 'utf8');
    this.current = parseExpiryPatterns(content);

    log.info(
      {
        file: this.filePath,
        statusCodes: this.current.statusCodes,
        patterns: this.current.patterns.length,
        platforms: Object.keys(this.current.platforms),
      },
      'Expiry patterns loaded'
    );
    return this.current;
  }

  reload(): Promise<ExpiryPatternConfig> {
    return this.load();
  }

  snapshot(): ExpiryPatternConfig {
    return this.current;
  }

  classify(error: unknown, platform?: ExternalPlatform): FailureClassification {
    if (error instanceof DeliveryError) {
      if (error.timedOut) {
        return 'transient';
      }
      if (error.statusCode !== undefined && this.current.statusCodes.includes(error.statusCode)) {
        return 'expired';
      }
    }

    const patterns = [
      ...this.current.patterns,
      ...(platform ? this.current.platforms[platform] ?? [] : []),
    ].map(p => p.toLowerCase());

    const messages = collectMessages(error);
    const matched = messages.some(message => patterns.some(pattern => message.includes(pattern)));

    return matched ? 'expired' : 'transient';
  }
}

