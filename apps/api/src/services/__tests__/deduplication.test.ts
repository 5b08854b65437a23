import assert from 'node:assert/strict';
import test from 'node:test';
import { MessageDeduplicator } from '../deduplication.js';

test('MessageDeduplicator: keys by thread and external id', () => {
  const dedup = new MessageDeduplicator();
  assert.equal(dedup.isKnown('thread-1', 'abc123'), false);

  dedup.markStored('thread-1', 'abc123');
  assert.equal(dedup.isKnown('thread-1', 'abc123'), true);
  assert.equal(dedup.isKnown('thread-2', 'abc123'), false);
});

test('MessageDeduplicator: stats', () => {
  const dedup = new MessageDeduplicator();
  dedup.markStored('thread-1', 'a');
  dedup.isKnown('thread-1', 'a');
  dedup.isKnown('thread-1', 'b');
  dedup.recordStorageConflict('thread-1', 'b');

  assert.deepEqual(dedup.getStats(), { memorySize: 2, memoryHitRate: 0.5, storageConflicts: 1 });
  assert.equal(dedup.isKnown('thread-1', 'b'), true);

  dedup.clear();
  assert.equal(dedup.getStats().memorySize, 0);
});

test('MessageDeduplicator: entries expire', async () => {
  const dedup = new MessageDeduplicator({ ttlMs: 10 });
  dedup.markStored('thread-1', 'a');
  await new Promise(resolve => setTimeout(resolve, 30));
  assert.equal(dedup.isKnown('thread-1', 'a'), false);
});
