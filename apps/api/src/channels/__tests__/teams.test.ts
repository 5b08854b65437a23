import assert from 'node:assert/strict';
import test from 'node:test';
import type { ConversationReference } from '@cobra-relay/shared';
import { DeliveryError, MalformedPayloadError } from '../../middleware/error-handler.js';
import { cleanTeamsText, TeamsAdapter } from '../teams/adapter.js';
import { buildMapping, referenceJson, stubFetch } from '../../__tests__/helpers.js';

const BOT_URL = 'http://teams-bot.test/';
const rawReference = referenceJson('19:abc@thread.tacv2');
const reference: ConversationReference = {
  serviceUrl: 'https://smba.example.test/teams/',
  channelId: 'msteams',
  conversation: { id: '19:abc@thread.tacv2' },
  bot: { id: 'bot-1', name: 'COBRA' },
};

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

test('cleanTeamsText: strips mentions and markup', () => {
  assert.equal(
    cleanTeamsText('<at>COBRA</at> Need <b>water</b> &amp; food<br/>at gate 3'),
    'Need water & food\nat gate 3'
  );
  assert.equal(cleanTeamsText('a&nbsp;&nbsp;b'), 'a b');
  assert.equal(cleanTeamsText('<at>COBRA</at>'), '');
});

test('TeamsAdapter.parseInboundCallback: maps a message activity', () => {
  const adapter = new TeamsAdapter();
  const callback = adapter.parseInboundCallback({
    type: 'message',
    messageId: '1700000000001',
    conversationId: '19:abc@thread.tacv2',
    text: '<p>Shelter full</p>',
    fromName: 'Ann',
    fromId: 'aad-1',
    timestamp: '2026-03-01T11:59:00.000Z',
    conversationReferenceJson: rawReference,
    tenantId: 'tenant-1',
    channelName: 'General',
    installedByName: 'Dana',
    isEmulator: false,
    attachments: [{ contentType: 'image/png', contentUrl: 'https://files.example.test/map.png' }],
  });

  assert.deepEqual(callback, {
    kind: 'message',
    conversationId: '19:abc@thread.tacv2',
    externalMessageId: '1700000000001',
    text: 'Shelter full',
    senderName: 'Ann',
    senderId: 'aad-1',
    timestamp: new Date('2026-03-01T11:59:00.000Z'),
    attachmentUrl: 'https://files.example.test/map.png',
    attachmentType: 'image',
    reference: rawReference,
    tenantId: 'tenant-1',
    conversationName: 'General',
    installedByName: 'Dana',
    isEmulatorOrTest: false,
  });
});

test('TeamsAdapter.parseInboundCallback: non-message activities are ignored', () => {
  const adapter = new TeamsAdapter();
  assert.deepEqual(
    adapter.parseInboundCallback({ type: 'conversationUpdate', messageId: 'x', conversationId: 'c-1' }),
    { kind: 'ignored', conversationId: 'c-1', reason: 'conversationUpdate activity' }
  );
});

test('TeamsAdapter.parseInboundCallback: rejects activities without ids', () => {
  const adapter = new TeamsAdapter();
  assert.throws(() => adapter.parseInboundCallback({ text: 'hi', conversationId: 'c-1' }), MalformedPayloadError);
  assert.throws(() => adapter.parseInboundCallback({ messageId: 'm', conversationId: 'c', timestamp: 'yesterday' }), MalformedPayloadError);
});

test('TeamsAdapter.buildReference: references only come from the bot', () => {
  assert.equal(new TeamsAdapter().buildReference(buildMapping({ platform: 'teams' })), null);
});

test('TeamsAdapter.send: forwards the stored reference to the bot', async () => {
  const { calls, fetchImpl } = stubFetch(() => jsonResponse({ success: true, messageId: '1700000000002' }));
  const adapter = new TeamsAdapter({ botUrl: BOT_URL, botApiKey: 'test-secret', fetch: fetchImpl });
  const mapping = buildMapping({ platform: 'teams', conversationReference: rawReference });

  const result = await adapter.send({ mapping, reference, rawReference }, '[Alice] hi');

  assert.deepEqual(result, { externalMessageId: '1700000000002' });
  assert.equal(calls[0].url, 'http://teams-bot.test/api/internal/send');
  assert.equal(calls[0].headers.get('x-api-key'), 'test-secret');
  assert.deepEqual(calls[0].body, {
    conversationId: '19:abc@thread.tacv2',
    conversationReferenceJson: rawReference,
    message: '[Alice] hi',
  });
});

test('TeamsAdapter.send: a failed send reported by the bot is a delivery error', async () => {
  const { fetchImpl } = stubFetch(() => jsonResponse({ success: false, error: 'Bot is not part of the conversation' }));
  const adapter = new TeamsAdapter({ botUrl: BOT_URL, fetch: fetchImpl });
  const mapping = buildMapping({ platform: 'teams' });

  await assert.rejects(adapter.send({ mapping, reference, rawReference }, 'hi'), (error: unknown) => {
    assert.ok(error instanceof DeliveryError);
    assert.equal(error.message, 'Bot is not part of the conversation');
    return true;
  });
});

test('TeamsAdapter.send: unexpected bot response', async () => {
  const { fetchImpl } = stubFetch(() => new Response('ok', { status: 200 }));
  const adapter = new TeamsAdapter({ botUrl: BOT_URL, fetch: fetchImpl });

  await assert.rejects(
    adapter.send({ mapping: buildMapping({ platform: 'teams' }), reference, rawReference }, 'hi'),
    { message: 'Unexpected response from Teams bot' }
  );
});

test('TeamsAdapter.send: needs a bot URL', async () => {
  const adapter = new TeamsAdapter();
  await assert.rejects(
    adapter.send({ mapping: buildMapping({ platform: 'teams' }), reference, rawReference }, 'hi'),
    { message: 'Teams bot URL not configured' }
  );
});
