/**
 * In-process stand-ins for the database, the socket server and the platform
 * APIs. The repositories enforce the same uniqueness rules as the partial
 * unique indexes in db/schema.ts.
 */
import { randomUUID } from 'node:crypto';
import type {
  ChannelMapping,
  ChannelStatusEvent,
  ChatMessage,
  ChatMessageEvent,
  ChatThread,
  ExternalPlatform,
} from '@cobra-relay/shared';
import type {
  InboundCallback,
  PlatformAdapter,
  SendOptions,
  SendResult,
  SendTarget,
} from '../channels/base.js';
import { ChannelRouter } from '../channels/router.js';
import { ConflictError } from '../middleware/error-handler.js';
import type {
  ChannelMappingPatch,
  ChannelMappingQuery,
  ChannelMappingRepository,
  NewChannelMapping,
} from '../modules/mappings/repository.js';
import type { ChatMessageRepository, MessagePage, NewChatMessage } from '../modules/messages/repository.js';
import type { ChatThreadRepository } from '../modules/threads/repository.js';
import type { RealtimeNotifier } from '../realtime/notifier.js';
import { createRelayServices, type RelayServices } from '../services/container.js';
import { DEFAULT_EXPIRY_PATTERNS, ExpiryPatternTable } from '../services/reference-validator.js';

// ============================================
// REPOSITORIES
// ============================================

export class InMemoryChannelMappingRepository implements ChannelMappingRepository {
  readonly rows = new Map<string, ChannelMapping>();

  async insert(mapping: NewChannelMapping): Promise<ChannelMapping> {
    const row: ChannelMapping = { ...mapping, id: mapping.id ?? randomUUID() };
    this.assertUnique(row);
    this.rows.set(row.id, row);
    return { ...row };
  }

  async findById(id: string): Promise<ChannelMapping | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findByExternal(platform: ExternalPlatform, externalGroupId: string): Promise<ChannelMapping[]> {
    return [...this.rows.values()]
      .filter(m => m.platform === platform && m.externalGroupId === externalGroupId)
      .sort((a, b) => Number(b.isActive) - Number(a.isActive) || b.createdAt.getTime() - a.createdAt.getTime())
      .map(m => ({ ...m }));
  }

  async findActiveByThread(threadId: string): Promise<ChannelMapping | null> {
    const row = [...this.rows.values()].find(m => m.chatThreadId === threadId && m.isActive);
    return row ? { ...row } : null;
  }

  async query(query: ChannelMappingQuery): Promise<ChannelMapping[]> {
    const { inactiveSince } = query;
    return [...this.rows.values()]
      .filter(m => query.platform === undefined || m.platform === query.platform)
      .filter(m => query.isActive === undefined || m.isActive === query.isActive)
      .filter(m => query.isEmulatorOrTest === undefined || m.isEmulatorOrTest === query.isEmulatorOrTest)
      .filter(m => query.eventId === undefined || m.eventId === query.eventId)
      .filter(m => !inactiveSince || (m.lastActivityAt ?? m.createdAt).getTime() < inactiveSince.getTime())
      .sort((a, b) => {
        const activity = (b.lastActivityAt?.getTime() ?? -Infinity) - (a.lastActivityAt?.getTime() ?? -Infinity);
        if (activity !== 0 && !Number.isNaN(activity)) return activity;
        return b.createdAt.getTime() - a.createdAt.getTime();
      })
      .map(m => ({ ...m }));
  }

  async update(id: string, patch: ChannelMappingPatch): Promise<ChannelMapping | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const updated: ChannelMapping = { ...row, ...definedOnly(patch) };
    this.assertUnique(updated);
    this.rows.set(id, updated);
    return { ...updated };
  }

  private assertUnique(row: ChannelMapping): void {
    if (!row.isActive) return;
    for (const other of this.rows.values()) {
      if (
        other.id !== row.id &&
        other.isActive &&
        other.platform === row.platform &&
        other.externalGroupId === row.externalGroupId
      ) {
        throw new ConflictError('duplicate key value violates unique constraint "idx_mappings_active_external"');
      }
    }
  }
}

// Mirrors Drizzle's .set(): undefined keys are not written
function definedOnly<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(patch)) {
    if (isKeyOf(patch, key) && patch[key] !== undefined) {
      result[key] = patch[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

export class InMemoryChatMessageRepository implements ChatMessageRepository {
  readonly rows = new Map<string, ChatMessage>();

  async insert(message: NewChatMessage): Promise<ChatMessage | null> {
    if (message.externalMessageId !== null) {
      for (const row of this.rows.values()) {
        if (row.externalMessageId === message.externalMessageId && row.chatThreadId === message.chatThreadId) {
          return null;
        }
      }
    }

    const row: ChatMessage = {
      ...message,
      id: randomUUID(),
      promotedToLogbookEntryId: null,
      promotedAt: null,
      promotedBy: null,
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async findById(id: string): Promise<ChatMessage | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async listByThread(threadId: string, page: MessagePage): Promise<ChatMessage[]> {
    const { before } = page;
    return [...this.rows.values()]
      .filter(m => m.chatThreadId === threadId && m.isActive)
      .filter(m => !before || m.createdAt.getTime() < before.getTime())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, page.limit)
      .map(m => ({ ...m }));
  }

  async markPromoted(id: string, logbookEntryId: string, actor: string, at: Date): Promise<ChatMessage | null> {
    const row = this.rows.get(id);
    if (!row || row.promotedToLogbookEntryId !== null) return null;
    const updated: ChatMessage = { ...row, promotedToLogbookEntryId: logbookEntryId, promotedAt: at, promotedBy: actor };
    this.rows.set(id, updated);
    return { ...updated };
  }
}

export class InMemoryChatThreadRepository implements ChatThreadRepository {
  readonly threads = new Map<string, ChatThread>();
  readonly events = new Map<string, string>();

  addEvent(name: string, id: string = randomUUID()): string {
    this.events.set(id, name);
    return id;
  }

  addThread(eventId: string, name: string, id: string = randomUUID()): ChatThread {
    const thread: ChatThread = {
      id,
      eventId,
      name,
      isDefaultEventThread: false,
      isActive: true,
      createdAt: new Date('2026-01-01T00:00:00Z'),
    };
    this.threads.set(id, thread);
    return thread;
  }

  async findById(threadId: string): Promise<ChatThread | null> {
    return this.threads.get(threadId) ?? null;
  }

  async findEventName(eventId: string): Promise<string | null> {
    return this.events.get(eventId) ?? null;
  }
}

// ============================================
// NOTIFIER
// ============================================

export class RecordingNotifier implements RealtimeNotifier {
  readonly messages: ChatMessageEvent[] = [];
  readonly statuses: ChannelStatusEvent[] = [];

  notifyMessage(event: ChatMessageEvent): void {
    this.messages.push(event);
  }

  notifyChannelStatus(event: ChannelStatusEvent): void {
    this.statuses.push(event);
  }
}

// ============================================
// ADAPTERS
// ============================================

export interface RecordedSend {
  mappingId: string;
  text: string;
  rawReference: string;
}

type SendBehaviour = (target: SendTarget, options: SendOptions) => Promise<SendResult>;

/**
 * Adapter whose sends are scripted per mapping. Unscripted mappings succeed
 * with a generated message id.
 */
export class ScriptedAdapter implements PlatformAdapter {
  readonly sends: RecordedSend[] = [];
  private readonly behaviours = new Map<string, SendBehaviour>();

  constructor(
    readonly platform: ExternalPlatform,
    private readonly parser?: PlatformAdapter
  ) {}

  on(mappingId: string, behaviour: SendBehaviour): this {
    this.behaviours.set(mappingId, behaviour);
    return this;
  }

  async send(target: SendTarget, text: string, options: SendOptions = {}): Promise<SendResult> {
    this.sends.push({ mappingId: target.mapping.id, text, rawReference: target.rawReference });
    const behaviour = this.behaviours.get(target.mapping.id);
    if (behaviour) {
      return behaviour(target, options);
    }
    return { externalMessageId: `sent-${this.sends.length}` };
  }

  parseInboundCallback(raw: unknown): InboundCallback {
    if (!this.parser) {
      throw new Error('ScriptedAdapter has no parser');
    }
    return this.parser.parseInboundCallback(raw);
  }

  buildReference(mapping: ChannelMapping): string | null {
    return this.parser ? this.parser.buildReference(mapping) : null;
  }
}

/**
 * Resolves once the signal aborts, then rejects like fetch does
 */
export function hangUntilAborted(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });
}

// ============================================
// FIXTURES
// ============================================

export function buildMapping(overrides: Partial<ChannelMapping> = {}): ChannelMapping {
  const createdAt = new Date('2026-01-01T00:00:00Z');
  return {
    id: randomUUID(),
    eventId: null,
    chatThreadId: null,
    platform: 'groupme',
    externalGroupId: 'g-100',
    externalGroupName: 'Field Team',
    shareUrl: null,
    botId: '',
    webhookSecret: 'test-secret',
    conversationReference: null,
    tenantId: null,
    installedByName: null,
    isEmulatorOrTest: false,
    lastActivityAt: null,
    isActive: true,
    createdAt,
    createdBy: 'admin',
    modifiedAt: createdAt,
    modifiedBy: 'admin',
    ...overrides,
  };
}

export interface FetchCall {
  url: string;
  headers: Headers;
  body: unknown;
}

/**
 * fetch stand-in that records each request and answers with `respond`
 */
export function stubFetch(respond: (call: FetchCall) => Response | Promise<Response>) {
  const calls: FetchCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const call: FetchCall = {
      url,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
    };
    calls.push(call);
    return respond(call);
  };
  return { calls, fetchImpl };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/**
 * Fake GroupMe management API. New groups get id 555 and new bots bot-77;
 * a path ending in `failOn` answers 500.
 */
export function groupMeApiStub(options: { failOn?: string } = {}) {
  return stubFetch(call => {
    const path = new URL(call.url).pathname;
    if (options.failOn && path.endsWith(options.failOn)) {
      return new Response('upstream error', { status: 500 });
    }
    if (path.endsWith('/groups')) {
      const body = call.body;
      const name = typeof body === 'object' && body !== null && 'name' in body && typeof body.name === 'string'
        ? body.name
        : '';
      return jsonResponse({ response: { id: '555', name, share_url: 'https://groupme.example.test/join/555/abc' } }, 201);
    }
    if (path.endsWith('/bots')) {
      return jsonResponse({ response: { bot: { bot_id: 'bot-77', group_id: '555' } } }, 201);
    }
    return new Response(null, { status: 200 });
  });
}

export function referenceJson(conversationId: string, serviceUrl = 'https://smba.example.test/teams/'): string {
  return JSON.stringify({
    serviceUrl,
    channelId: 'msteams',
    conversation: { id: conversationId },
    bot: { id: 'bot-1', name: 'COBRA' },
  });
}

export interface TestRelay {
  services: RelayServices;
  mappingRepo: InMemoryChannelMappingRepository;
  messageRepo: InMemoryChatMessageRepository;
  threadRepo: InMemoryChatThreadRepository;
  notifier: RecordingNotifier;
  router: ChannelRouter;
  clock: { now: Date };
}

export function createTestRelay(options: {
  adapters?: PlatformAdapter[];
  timeoutMs?: number;
  concurrency?: number;
  now?: Date;
  publicBaseUrl?: string;
} = {}): TestRelay {
  const mappingRepo = new InMemoryChannelMappingRepository();
  const messageRepo = new InMemoryChatMessageRepository();
  const threadRepo = new InMemoryChatThreadRepository();
  const notifier = new RecordingNotifier();
  const router = new ChannelRouter(options.adapters ?? []);
  const clock = { now: options.now ?? new Date('2026-03-01T12:00:00Z') };

  const services = createRelayServices({
    repositories: { mappings: mappingRepo, messages: messageRepo, threads: threadRepo },
    router,
    notifier,
    expiryPatterns: new ExpiryPatternTable(undefined, DEFAULT_EXPIRY_PATTERNS),
    relay: {
      broadcastConcurrency: options.concurrency ?? 4,
      outboundTimeoutMs: options.timeoutMs ?? 1000,
      staleAfterDays: 30,
      publicBaseUrl: options.publicBaseUrl ?? 'https://relay.example.test',
    },
    now: () => clock.now,
  });

  return { services, mappingRepo, messageRepo, threadRepo, notifier, router, clock };
}
