import { eq } from 'drizzle-orm';
import type { ChatThread } from '@cobra-relay/shared';
import type { Database } from '../../db/index.js';
import { chatThreads, events } from '../../db/schema.js';

/**
 * Read-only view of the COBRA chat threads and events the relay links to.
 */
export interface ChatThreadRepository {
  findById(threadId: string): Promise<ChatThread | null>;
  findEventName(eventId: string): Promise<string | null>;
}

export class DrizzleChatThreadRepository implements ChatThreadRepository {
  constructor(private readonly db: Database) {}

  async findById(threadId: string): Promise<ChatThread | null> {
    const row = await this.db.query.chatThreads.findFirst({
      where: eq(chatThreads.id, threadId),
    });
    return row ?? null;
  }

  async findEventName(eventId: string): Promise<string | null> {
    const [row] = await this.db
      .select({ name: events.name })
      .from(events)
      .where(eq(events.id, eventId))
      .limit(1);
    return row?.name ?? null;
  }
}
