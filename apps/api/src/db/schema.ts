import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  boolean,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { relations, sql } from 'drizzle-orm';
import type { ExternalPlatform } from '@cobra-relay/shared';

// ============================================
// EVENTS (owned by the COBRA core, read here for display names)
// ============================================

export const events = pgTable('events', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 255 }).notNull(),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

// ============================================
// CHAT THREADS
// ============================================

export const chatThreads = pgTable('chat_threads', {
  id: uuid('id').primaryKey().defaultRandom(),
  eventId: uuid('event_id').notNull().references(() => events.id, { onDelete: 'cascade' }),
  name: varchar('name', { length: 255 }).notNull(),
  isDefaultEventThread: boolean('is_default_event_thread').notNull().default(false),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (table) => ({
  eventIdIdx: index('idx_chat_threads_event_id').on(table.eventId),
}));

// ============================================
// EXTERNAL CHANNEL MAPPINGS
// ============================================

export const externalChannelMappings = pgTable('external_channel_mappings', {
  id: uuid('id').primaryKey().defaultRandom(),
  eventId: uuid('event_id').references(() => events.id, { onDelete: 'set null' }),
  chatThreadId: uuid('chat_thread_id').references(() => chatThreads.id, { onDelete: 'set null' }),
  platform: varchar('platform', { length: 20 }).$type<ExternalPlatform>().notNull(),
  externalGroupId: varchar('external_group_id', { length: 255 }).notNull(),
  externalGroupName: varchar('external_group_name', { length: 255 }).notNull(),
  shareUrl: text('share_url'),
  botId: varchar('bot_id', { length: 255 }).notNull().default(''),
  webhookSecret: varchar('webhook_secret', { length: 128 }).notNull(),
  conversationReference: text('conversation_reference'),              // Opaque JSON, see ConversationReference
  tenantId: varchar('tenant_id', { length: 100 }),
  installedByName: varchar('installed_by_name', { length: 255 }),
  isEmulatorOrTest: boolean('is_emulator_or_test').notNull().default(false),
  lastActivityAt: timestamp('last_activity_at'),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  createdBy: varchar('created_by', { length: 255 }).notNull(),
  modifiedAt: timestamp('modified_at').notNull().defaultNow(),
  modifiedBy: varchar('modified_by', { length: 255 }).notNull(),
}, (table) => ({
  eventIdIdx: index('idx_mappings_event_id').on(table.eventId),
  threadIdIdx: index('idx_mappings_chat_thread_id').on(table.chatThreadId),
  lastActivityIdx: index('idx_mappings_last_activity').on(table.lastActivityAt),
  activeExternalIdx: uniqueIndex('idx_mappings_active_external')
    .on(table.platform, table.externalGroupId)
    .where(sql`${table.isActive} = true`),
}));

// ============================================
// CHAT MESSAGES
// ============================================

export const chatMessages = pgTable('chat_messages', {
  id: uuid('id').primaryKey().defaultRandom(),
  chatThreadId: uuid('chat_thread_id').notNull().references(() => chatThreads.id, { onDelete: 'cascade' }),
  message: text('message').notNull(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  createdBy: varchar('created_by', { length: 255 }).notNull(),
  isActive: boolean('is_active').notNull().default(true),
  // External origin
  externalSource: varchar('external_source', { length: 20 }).$type<ExternalPlatform>(),
  externalMessageId: varchar('external_message_id', { length: 255 }),
  externalSenderName: varchar('external_sender_name', { length: 255 }),
  externalSenderId: varchar('external_sender_id', { length: 255 }),
  externalTimestamp: timestamp('external_timestamp'),
  externalAttachmentUrl: text('external_attachment_url'),
  externalChannelMappingId: uuid('external_channel_mapping_id')
    .references(() => externalChannelMappings.id, { onDelete: 'set null' }),
  // Logbook promotion
  promotedToLogbookEntryId: uuid('promoted_to_logbook_entry_id'),
  promotedAt: timestamp('promoted_at'),
  promotedBy: varchar('promoted_by', { length: 255 }),
}, (table) => ({
  threadCreatedIdx: index('idx_chat_messages_thread_created').on(table.chatThreadId, table.createdAt),
  externalDedupIdx: uniqueIndex('idx_chat_messages_external_dedup')
    .on(table.externalMessageId, table.chatThreadId)
    .where(sql`${table.externalMessageId} IS NOT NULL`),
}));

// ============================================
// RELATIONS
// ============================================

export const eventsRelations = relations(events, ({ many }) => ({
  threads: many(chatThreads),
  mappings: many(externalChannelMappings),
}));

export const chatThreadsRelations = relations(chatThreads, ({ one, many }) => ({
  event: one(events, {
    fields: [chatThreads.eventId],
    references: [events.id],
  }),
  messages: many(chatMessages),
}));

export const externalChannelMappingsRelations = relations(externalChannelMappings, ({ one }) => ({
  event: one(events, {
    fields: [externalChannelMappings.eventId],
    references: [events.id],
  }),
  thread: one(chatThreads, {
    fields: [externalChannelMappings.chatThreadId],
    references: [chatThreads.id],
  }),
}));

export const chatMessagesRelations = relations(chatMessages, ({ one }) => ({
  thread: one(chatThreads, {
    fields: [chatMessages.chatThreadId],
    references: [chatThreads.id],
  }),
  mapping: one(externalChannelMappings, {
    fields: [chatMessages.externalChannelMappingId],
    references: [externalChannelMappings.id],
  }),
}));

// ============================================
// TYPE EXPORTS
// ============================================

export type EventRow = typeof events.$inferSelect;
export type ChatThreadRow = typeof chatThreads.$inferSelect;
export type ChannelMappingRow = typeof externalChannelMappings.$inferSelect;
export type NewChannelMappingRow = typeof externalChannelMappings.$inferInsert;
export type ChatMessageRow = typeof chatMessages.$inferSelect;
export type NewChatMessageRow = typeof chatMessages.$inferInsert;
