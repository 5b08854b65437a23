import { and, desc, eq, isNull, lt, type SQL } from 'drizzle-orm';
import type { ChatMessage } from '@cobra-relay/shared';
import type { Database } from '../../db/index.js';
import { chatMessages } from '../../db/schema.js';

export type NewChatMessage = Omit<ChatMessage, 'id' | 'promotedToLogbookEntryId' | 'promotedAt' | 'promotedBy'>;

export interface MessagePage {
  limit: number;
  before?: Date;
}

/**
 * Storage seam for chat messages. `insert` resolves to null when the
 * (externalMessageId, chatThreadId) dedup index already holds the message.
 */
export interface ChatMessageRepository {
  insert(message: NewChatMessage): Promise<ChatMessage | null>;
  findById(id: string): Promise<ChatMessage | null>;
  /** Active messages, newest first */
  listByThread(threadId: string, page: MessagePage): Promise<ChatMessage[]>;
  /** Sets the promotion markers unless already set; null when nothing changed */
  markPromoted(id: string, logbookEntryId: string, actor: string, at: Date): Promise<ChatMessage | null>;
}

export class DrizzleChatMessageRepository implements ChatMessageRepository {
  constructor(private readonly db: Database) {}

  async insert(message: NewChatMessage): Promise<ChatMessage | null> {
    const [row] = await this.db
      .insert(chatMessages)
      .values(message)
      .onConflictDoNothing()
      .returning();
    return row ?? null;
  }

  async findById(id: string): Promise<ChatMessage | null> {
    const row = await this.db.query.chatMessages.findFirst({
      where: eq(chatMessages.id, id),
    });
    return row ?? null;
  }

  async listByThread(threadId: string, page: MessagePage): Promise<ChatMessage[]> {
    const conditions: SQL[] = [
      eq(chatMessages.chatThreadId, threadId),
      eq(chatMessages.isActive, true),
    ];
    if (page.before) {
      conditions.push(lt(chatMessages.createdAt, page.before));
    }

    return this.db
      .select()
      .from(chatMessages)
      .where(and(...conditions))
      .orderBy(desc(chatMessages.createdAt))
      .limit(page.limit);
  }

  async markPromoted(id: string, logbookEntryId: string, actor: string, at: Date): Promise<ChatMessage | null> {
    const [row] = await this.db
      .update(chatMessages)
      .set({
        promotedToLogbookEntryId: logbookEntryId,
        promotedAt: at,
        promotedBy: actor,
      })
      .where(and(eq(chatMessages.id, id), isNull(chatMessages.promotedToLogbookEntryId)))
      .returning();
    return row ?? null;
  }
}
