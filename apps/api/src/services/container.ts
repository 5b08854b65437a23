import type { ChannelRouter } from '../channels/router.js';
import type { ChannelMappingRepository } from '../modules/mappings/repository.js';
import { ChannelMappingStore } from '../modules/mappings/service.js';
import type { ChatMessageRepository } from '../modules/messages/repository.js';
import { ChatService } from '../modules/messages/service.js';
import type { ChatThreadRepository } from '../modules/threads/repository.js';
import type { RealtimeNotifier } from '../realtime/notifier.js';
import { Broadcaster } from './broadcaster.js';
import { MessageDeduplicator } from './deduplication.js';
import { InboundProcessor } from './inbound-processor.js';
import { ChannelProvisioningService } from './provisioning.js';
import type { ExpiryPatternTable } from './reference-validator.js';

export interface RelayServices {
  mappings: ChannelMappingStore;
  threads: ChatThreadRepository;
  processor: InboundProcessor;
  broadcaster: Broadcaster;
  chat: ChatService;
  provisioning: ChannelProvisioningService;
  expiryPatterns: ExpiryPatternTable;
  deduplicator: MessageDeduplicator;
  router: ChannelRouter;
}

export interface RelayServiceOptions {
  repositories: {
    mappings: ChannelMappingRepository;
    messages: ChatMessageRepository;
    threads: ChatThreadRepository;
  };
  router: ChannelRouter;
  notifier: RealtimeNotifier;
  expiryPatterns: ExpiryPatternTable;
  relay: {
    broadcastConcurrency: number;
    outboundTimeoutMs: number;
    staleAfterDays: number;
    publicBaseUrl?: string;
  };
  now?: () => Date;
}

/**
 * Wire the relay core over a set of repositories
 */
export function createRelayServices(options: RelayServiceOptions): RelayServices {
  const { repositories, router, notifier, expiryPatterns, relay, now } = options;

  const mappings = new ChannelMappingStore(repositories.mappings, repositories.threads, { now });
  const deduplicator = new MessageDeduplicator();

  const processor = new InboundProcessor({
    mappings,
    messages: repositories.messages,
    router,
    deduplicator,
    notifier,
    now,
  });

  const broadcaster = new Broadcaster({
    mappings,
    threads: repositories.threads,
    router,
    expiryPatterns,
    notifier,
    concurrency: relay.broadcastConcurrency,
    timeoutMs: relay.outboundTimeoutMs,
    staleAfterDays: relay.staleAfterDays,
    now,
  });

  const chat = new ChatService({
    messages: repositories.messages,
    threads: repositories.threads,
    broadcaster,
    notifier,
    now,
  });

  const provisioning = new ChannelProvisioningService({
    mappings,
    threads: repositories.threads,
    router,
    publicBaseUrl: relay.publicBaseUrl,
  });

  return {
    mappings,
    threads: repositories.threads,
    processor,
    broadcaster,
    chat,
    provisioning,
    expiryPatterns,
    deduplicator,
    router,
  };
}
