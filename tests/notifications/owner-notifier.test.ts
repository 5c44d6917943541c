import { OwnerNotifier, formatOwnerMessage } from '../../src/notifications/owner-notifier';
import { FakePlatformClient, captureLogs } from '../helpers/fakes';

const messageOptions = { username: 'workspace reaper', iconEmoji: ':scream_cat:' };

describe('formatOwnerMessage', () => {
  test('wraps the message in a preformatted block', () => {
    expect(formatOwnerMessage('hello')).toBe('```hello```');
  });
});

describe('OwnerNotifier', () => {
  const logs = captureLogs();

  test('sends one direct message per owner with the configured identity', async () => {
    const client = new FakePlatformClient();
    const notifier = new OwnerNotifier(client, messageOptions);

    const result = await notifier.notifyOwners('account U1 revoked', [
      { id: 'UO1', email: 'o1@example.test' },
      { id: 'UO2', email: 'o2@example.test' },
    ]);

    expect(result).toEqual({ delivered: ['UO1', 'UO2'], failures: [] });
    expect(client.messages).toEqual([
      { recipientId: 'UO1', text: '```account U1 revoked```', options: messageOptions },
      { recipientId: 'UO2', text: '```account U1 revoked```', options: messageOptions },
    ]);
  });

  test('records a failed recipient and keeps going', async () => {
    const client = new FakePlatformClient();
    client.failMessagesTo.add('UO1');
    const notifier = new OwnerNotifier(client, messageOptions);

    const result = await notifier.notifyOwners('hi', [
      { id: 'UO1', email: 'o1@example.test' },
      { id: 'UO2', email: 'o2@example.test' },
    ]);

    expect(result.delivered).toEqual(['UO2']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].code).toBe('ACCOUNT.NOTIFY_FAILED');
    expect(result.failures[0].message).toBe('Failed to notify UO1: channel_not_found');
  });

  test('warns when there is nobody to notify', async () => {
    const client = new FakePlatformClient();
    const notifier = new OwnerNotifier(client, messageOptions);

    const result = await notifier.notifyOwners('hi', []);

    expect(result).toEqual({ delivered: [], failures: [] });
    const warning = logs.find((entry) => entry.message === 'No workspace owners to notify');
    expect(warning?.level).toBe('warn');
  });
});
