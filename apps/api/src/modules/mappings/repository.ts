import { and, desc, eq, isNull, lt, or, sql, type SQL } from 'drizzle-orm';
import type { ChannelMapping, ExternalPlatform } from '@cobra-relay/shared';
import type { Database } from '../../db/index.js';
import { isUniqueViolation } from '../../db/errors.js';
import { externalChannelMappings } from '../../db/schema.js';
import { ConflictError } from '../../middleware/error-handler.js';

// `id` is generated unless the caller had to know it in advance
export type NewChannelMapping = Omit<ChannelMapping, 'id'> & { id?: string };

export type ChannelMappingPatch = Partial<Pick<
  ChannelMapping,
  | 'eventId'
  | 'chatThreadId'
  | 'externalGroupName'
  | 'shareUrl'
  | 'botId'
  | 'conversationReference'
  | 'tenantId'
  | 'installedByName'
  | 'isEmulatorOrTest'
  | 'lastActivityAt'
  | 'isActive'
>> & Pick<ChannelMapping, 'modifiedAt' | 'modifiedBy'>;

export interface ChannelMappingQuery {
  platform?: ExternalPlatform;
  isActive?: boolean;
  isEmulatorOrTest?: boolean;
  eventId?: string;
  // Last activity (or creation, when never active) strictly before this instant
  inactiveSince?: Date;
}

/**
 * Storage seam for channel mappings. Implementations enforce that no two
 * active mappings share (platform, externalGroupId) and raise ConflictError
 * when a write would break that.
 */
export interface ChannelMappingRepository {
  insert(mapping: NewChannelMapping): Promise<ChannelMapping>;
  findById(id: string): Promise<ChannelMapping | null>;
  /** Active mapping first, then most recently created */
  findByExternal(platform: ExternalPlatform, externalGroupId: string): Promise<ChannelMapping[]>;
  findActiveByThread(threadId: string): Promise<ChannelMapping | null>;
  /** Ordered by last activity desc, then created desc */
  query(query: ChannelMappingQuery): Promise<ChannelMapping[]>;
  update(id: string, patch: ChannelMappingPatch): Promise<ChannelMapping | null>;
}

// ============================================
// DRIZZLE IMPLEMENTATION
// ============================================

export class DrizzleChannelMappingRepository implements ChannelMappingRepository {
  constructor(private readonly db: Database) {}

  async insert(mapping: NewChannelMapping): Promise<ChannelMapping> {
    try {
      const [row] = await this.db
        .insert(externalChannelMappings)
        .values(mapping)
        .returning();
      return row;
    } catch (error) {
      throw this.translate(error, mapping.platform, mapping.externalGroupId);
    }
  }

  async findById(id: string): Promise<ChannelMapping | null> {
    const row = await this.db.query.externalChannelMappings.findFirst({
      where: eq(externalChannelMappings.id, id),
    });
    return row ?? null;
  }

  async findByExternal(platform: ExternalPlatform, externalGroupId: string): Promise<ChannelMapping[]> {
    return this.db
      .select()
      .from(externalChannelMappings)
      .where(and(
        eq(externalChannelMappings.platform, platform),
        eq(externalChannelMappings.externalGroupId, externalGroupId)
      ))
      .orderBy(desc(externalChannelMappings.isActive), desc(externalChannelMappings.createdAt));
  }

  async findActiveByThread(threadId: string): Promise<ChannelMapping | null> {
    const row = await this.db.query.externalChannelMappings.findFirst({
      where: and(
        eq(externalChannelMappings.chatThreadId, threadId),
        eq(externalChannelMappings.isActive, true)
      ),
    });
    return row ?? null;
  }

  async query(query: ChannelMappingQuery): Promise<ChannelMapping[]> {
    const conditions: SQL[] = [];

    if (query.platform) {
      conditions.push(eq(externalChannelMappings.platform, query.platform));
    }
    if (query.isActive !== undefined) {
      conditions.push(eq(externalChannelMappings.isActive, query.isActive));
    }
    if (query.isEmulatorOrTest !== undefined) {
      conditions.push(eq(externalChannelMappings.isEmulatorOrTest, query.isEmulatorOrTest));
    }
    if (query.eventId) {
      conditions.push(eq(externalChannelMappings.eventId, query.eventId));
    }
    if (query.inactiveSince) {
      const stale = or(
        lt(externalChannelMappings.lastActivityAt, query.inactiveSince),
        and(
          isNull(externalChannelMappings.lastActivityAt),
          lt(externalChannelMappings.createdAt, query.inactiveSince)
        )
      );
      if (stale) conditions.push(stale);
    }

    return this.db
      .select()
      .from(externalChannelMappings)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(
        sql`${externalChannelMappings.lastActivityAt} DESC NULLS LAST`,
        desc(externalChannelMappings.createdAt)
      );
  }

  async update(id: string, patch: ChannelMappingPatch): Promise<ChannelMapping | null> {
    try {
      const [row] = await this.db
        .update(externalChannelMappings)
        .set(patch)
        .where(eq(externalChannelMappings.id, id))
        .returning();
      return row ?? null;
    } catch (error) {
      throw this.translate(error);
    }
  }

  private translate(error: unknown, platform?: ExternalPlatform, externalGroupId?: string): unknown {
    if (!isUniqueViolation(error)) return error;
    return new ConflictError(
      platform && externalGroupId
        ? `An active ${platform} mapping already exists for '${externalGroupId}'`
        : 'An active mapping already exists for this external conversation'
    );
  }
}
