import assert from 'node:assert/strict';
import test from 'node:test';
import { ConflictError, NotFoundError, ValidationError } from '../../../middleware/error-handler.js';
import {
  InMemoryChannelMappingRepository,
  InMemoryChatThreadRepository,
  referenceJson,
} from '../../../__tests__/helpers.js';
import { ChannelMappingStore, toMappingSummary } from '../service.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function setup() {
  const repository = new InMemoryChannelMappingRepository();
  const threads = new InMemoryChatThreadRepository();
  const clock = { now: new Date('2026-03-01T12:00:00Z') };
  const store = new ChannelMappingStore(repository, threads, { now: () => clock.now });
  const eventId = threads.addEvent('Flood Response');
  const thread = threads.addThread(eventId, 'Operations');
  return { repository, threads, clock, store, eventId, thread };
}

test('create: fills defaults and a webhook secret', async () => {
  const { store } = setup();
  const mapping = await store.create({ platform: 'groupme', externalGroupId: ' 12345 ', createdBy: 'alice' });

  assert.equal(mapping.externalGroupId, '12345');
  assert.equal(mapping.externalGroupName, 'GroupMe conversation');
  assert.equal(mapping.isActive, true);
  assert.equal(mapping.lastActivityAt, null);
  assert.equal(mapping.chatThreadId, null);
  assert.equal(mapping.createdBy, 'alice');
  assert.equal(mapping.modifiedBy, 'alice');
  assert.match(mapping.webhookSecret, /^[A-Za-z0-9_-]{43}$/);
});

test('create: takes the event from the linked thread', async () => {
  const { store, thread, eventId } = setup();
  const mapping = await store.create({
    platform: 'teams',
    externalGroupId: '19:abc@thread.tacv2',
    chatThreadId: thread.id,
    createdBy: 'alice',
  });
  assert.equal(mapping.chatThreadId, thread.id);
  assert.equal(mapping.eventId, eventId);
});

test('create: rejects an empty external id and an unknown thread', async () => {
  const { store } = setup();
  await assert.rejects(
    store.create({ platform: 'groupme', externalGroupId: '   ', createdBy: 'alice' }),
    ValidationError
  );
  await assert.rejects(
    store.create({
      platform: 'groupme',
      externalGroupId: 'g-1',
      chatThreadId: '00000000-0000-4000-8000-000000000000',
      createdBy: 'alice',
    }),
    NotFoundError
  );
});

test('create: one active mapping per external conversation', async () => {
  const { store } = setup();
  const first = await store.create({ platform: 'groupme', externalGroupId: 'g-1', createdBy: 'alice' });

  await assert.rejects(
    store.create({ platform: 'groupme', externalGroupId: 'g-1', createdBy: 'bob' }),
    ConflictError
  );

  // Same id on another platform is a different conversation
  await store.create({ platform: 'teams', externalGroupId: 'g-1', createdBy: 'bob' });

  await store.deactivate(first.id, 'alice');
  const second = await store.create({ platform: 'groupme', externalGroupId: 'g-1', createdBy: 'bob' });
  assert.notEqual(second.id, first.id);
  assert.equal((await store.findByExternal('groupme', 'g-1'))?.id, second.id);
});

test('create: one active mapping per thread', async () => {
  const { store, thread } = setup();
  await store.create({ platform: 'groupme', externalGroupId: 'g-1', chatThreadId: thread.id, createdBy: 'alice' });
  await assert.rejects(
    store.create({ platform: 'teams', externalGroupId: 't-1', chatThreadId: thread.id, createdBy: 'alice' }),
    ConflictError
  );
});

test('deactivate: soft delete is idempotent', async () => {
  const { store, clock } = setup();
  const mapping = await store.create({ platform: 'groupme', externalGroupId: 'g-1', createdBy: 'alice' });

  clock.now = new Date('2026-03-02T00:00:00Z');
  const first = await store.deactivate(mapping.id, 'bob');
  assert.equal(first.isActive, false);
  assert.equal(first.modifiedBy, 'bob');
  assert.deepEqual(first.modifiedAt, new Date('2026-03-02T00:00:00Z'));

  clock.now = new Date('2026-03-03T00:00:00Z');
  const second = await store.deactivate(mapping.id, 'carol');
  assert.equal(second.isActive, false);
  assert.equal(second.modifiedBy, 'bob');

  // Still readable
  assert.equal((await store.getById(mapping.id))?.isActive, false);
});

test('deactivate: unknown id is NotFound', async () => {
  const { store } = setup();
  await assert.rejects(store.deactivate('00000000-0000-4000-8000-000000000000', 'alice'), NotFoundError);
});

test('getById: sees writes made through the store', async () => {
  const { store } = setup();
  const mapping = await store.create({ platform: 'groupme', externalGroupId: 'g-1', createdBy: 'alice' });
  assert.equal((await store.getById(mapping.id))?.externalGroupName, 'GroupMe conversation');

  await store.rename(mapping.id, 'Field Team', 'alice');
  assert.equal((await store.getById(mapping.id))?.externalGroupName, 'Field Team');
});

test('reactivate: conflicts while another mapping holds the conversation', async () => {
  const { store } = setup();
  const old = await store.create({ platform: 'groupme', externalGroupId: 'g-1', createdBy: 'alice' });
  await store.deactivate(old.id, 'alice');
  const replacement = await store.create({ platform: 'groupme', externalGroupId: 'g-1', createdBy: 'alice' });

  await assert.rejects(store.reactivate(old.id, 'alice'), ConflictError);

  await store.deactivate(replacement.id, 'alice');
  const revived = await store.reactivate(old.id, 'alice');
  assert.equal(revived.isActive, true);
});

test('cleanupStale: deactivates mappings idle past the cutoff', async () => {
  const { store, clock } = setup();
  const idle = await store.create({ platform: 'groupme', externalGroupId: 'g-idle', createdBy: 'alice' });
  const busy = await store.create({ platform: 'groupme', externalGroupId: 'g-busy', createdBy: 'alice' });
  const teams = await store.create({ platform: 'teams', externalGroupId: 't-idle', createdBy: 'alice' });

  clock.now = new Date(clock.now.getTime() + 40 * DAY_MS);
  await store.recordActivity(busy.id, { lastActivityAt: clock.now });

  const ids = await store.cleanupStale({ platform: 'groupme', inactiveDays: 30 });
  assert.deepEqual(ids, [idle.id]);

  const idleAfter = await store.requireById(idle.id);
  assert.equal(idleAfter.isActive, false);
  assert.equal(idleAfter.modifiedBy, 'StaleCleanup');
  assert.equal((await store.requireById(busy.id)).isActive, true);
  assert.equal((await store.requireById(teams.id)).isActive, true);

  assert.deepEqual(await store.cleanupStale({ platform: 'groupme', inactiveDays: 30 }), []);
});

test('list: staleDays filters by last activity', async () => {
  const { store, clock } = setup();
  const idle = await store.create({ platform: 'groupme', externalGroupId: 'g-idle', createdBy: 'alice' });
  const busy = await store.create({ platform: 'groupme', externalGroupId: 'g-busy', createdBy: 'alice' });

  clock.now = new Date(clock.now.getTime() + 10 * DAY_MS);
  await store.recordActivity(busy.id, { lastActivityAt: clock.now });

  const stale = await store.list({ staleDays: 7 });
  assert.deepEqual(stale.map(m => m.id), [idle.id]);

  const all = await store.list({ platform: 'groupme' });
  assert.deepEqual(all.map(m => m.id), [busy.id, idle.id]);
});

test('linkToThread and unlinkThread', async () => {
  const { store, thread, eventId } = setup();
  const mapping = await store.create({ platform: 'groupme', externalGroupId: 'g-1', createdBy: 'alice' });

  const linked = await store.linkToThread(mapping.id, thread.id, 'alice');
  assert.equal(linked.chatThreadId, thread.id);
  assert.equal(linked.eventId, eventId);
  assert.equal((await store.findByThread(thread.id))?.id, mapping.id);

  const other = await store.create({ platform: 'teams', externalGroupId: 't-1', createdBy: 'alice' });
  await assert.rejects(store.linkToThread(other.id, thread.id, 'alice'), ConflictError);

  const unlinked = await store.unlinkThread(thread.id, 'alice');
  assert.equal(unlinked?.id, mapping.id);
  assert.equal(unlinked?.chatThreadId, null);
  assert.equal(unlinked?.eventId, eventId);
  assert.equal(await store.findByThread(thread.id), null);
  assert.equal(await store.unlinkThread(thread.id, 'alice'), null);
});

test('recordActivity: installedByName is first-writer-wins', async () => {
  const { store } = setup();
  const mapping = await store.create({ platform: 'teams', externalGroupId: 't-1', createdBy: 'alice' });

  const first = await store.recordActivity(mapping.id, { installedByName: 'Dana', tenantId: 'tenant-1' });
  assert.equal(first.installedByName, 'Dana');
  assert.equal(first.tenantId, 'tenant-1');
  assert.equal(first.modifiedBy, 'system');

  const second = await store.recordActivity(mapping.id, { installedByName: 'Eli', tenantId: 'tenant-2' });
  assert.equal(second.installedByName, 'Dana');
  assert.equal(second.tenantId, 'tenant-2');
});

test('putConversationReference: creates an unlinked mapping for an unknown conversation', async () => {
  const { store, clock } = setup();
  const reference = referenceJson('19:new@thread.tacv2');

  const { mapping, created } = await store.putConversationReference('teams', {
    externalGroupId: '19:new@thread.tacv2',
    conversationReference: reference,
    channelName: 'General',
    tenantId: 'tenant-1',
    installedByName: 'Dana',
  });

  assert.equal(created, true);
  assert.equal(mapping.externalGroupName, 'General');
  assert.equal(mapping.conversationReference, reference);
  assert.equal(mapping.chatThreadId, null);
  assert.equal(mapping.eventId, null);
  assert.equal(mapping.isActive, true);
  assert.deepEqual(mapping.lastActivityAt, clock.now);
});

test('putConversationReference: refreshes an existing mapping', async () => {
  const { store } = setup();
  const existing = await store.create({ platform: 'teams', externalGroupId: 't-1', createdBy: 'alice' });

  const { mapping, created } = await store.putConversationReference('teams', {
    externalGroupId: 't-1',
    conversationReference: referenceJson('t-1'),
    channelName: 'Renamed',
  });

  assert.equal(created, false);
  assert.equal(mapping.id, existing.id);
  assert.equal(mapping.externalGroupName, 'Renamed');
  assert.equal(mapping.conversationReference, referenceJson('t-1'));

  const fetched = await store.getConversationReference('teams', 't-1');
  assert.equal(fetched?.conversationReference, referenceJson('t-1'));
});

test('putConversationReference: a deactivated mapping is refreshed in place, not replaced', async () => {
  const { store, repository, thread, clock } = setup();
  const original = await store.create({
    platform: 'teams',
    externalGroupId: 'conv-1',
    chatThreadId: thread.id,
    createdBy: 'alice',
  });
  await store.deactivate(original.id, 'alice');

  const { mapping, created } = await store.putConversationReference('teams', {
    externalGroupId: 'conv-1',
    conversationReference: referenceJson('conv-1'),
  });

  assert.equal(created, false);
  assert.equal(mapping.id, original.id);
  assert.equal(mapping.isActive, false);
  assert.equal(mapping.chatThreadId, thread.id);
  assert.equal(mapping.conversationReference, referenceJson('conv-1'));
  assert.deepEqual(mapping.lastActivityAt, clock.now);
  assert.equal(repository.rows.size, 1);

  const revived = await store.reactivate(original.id, 'alice');
  assert.equal(revived.isActive, true);
});

test('toMappingSummary: hides the secret and the raw reference', async () => {
  const { store } = setup();
  const mapping = await store.create({
    platform: 'teams',
    externalGroupId: 't-1',
    conversationReference: referenceJson('t-1'),
    createdBy: 'alice',
  });

  const summary = toMappingSummary(mapping);
  assert.equal(summary.hasConversationReference, true);
  assert.equal(summary.createdAt, '2026-03-01T12:00:00.000Z');
  assert.equal('webhookSecret' in summary, false);
  assert.equal('conversationReference' in summary, false);
});
