import assert from 'node:assert/strict';
import test from 'node:test';
import { DeliveryError } from '../../middleware/error-handler.js';
import { UnsupportedPlatformAdapter } from '../base.js';
import { GroupMeAdapter } from '../groupme/adapter.js';
import { ChannelRouter } from '../router.js';
import { TeamsAdapter } from '../teams/adapter.js';
import { buildMapping } from '../../__tests__/helpers.js';

test('ChannelRouter: dispatches by platform', () => {
  const groupme = new GroupMeAdapter({ apiBase: 'https://api.groupme.example.test/v3' });
  const router = new ChannelRouter([new TeamsAdapter(), groupme]);

  assert.equal(router.get('groupme'), groupme);
  assert.equal(router.isSupported('teams'), true);
  assert.equal(router.isSupported('slack'), false);
  assert.deepEqual(router.getSupportedPlatforms(), ['groupme', 'teams']);
});

test('ChannelRouter: platforms without an adapter fail every send', async () => {
  const router = new ChannelRouter();
  const adapter = router.get('signal');

  assert.ok(adapter instanceof UnsupportedPlatformAdapter);
  assert.equal(adapter.buildReference(buildMapping({ platform: 'signal' })), null);
  await assert.rejects(
    router.get('signal').send(
      { mapping: buildMapping({ platform: 'signal' }), reference: { serviceUrl: 'https://x.test', conversation: { id: 'c' } }, rawReference: '{}' },
      'hi'
    ),
    (error: unknown) => {
      assert.ok(error instanceof DeliveryError);
      assert.equal(error.errorCode.name, 'PLATFORM_UNSUPPORTED');
      return true;
    }
  );
});
