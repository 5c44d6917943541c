import { FetchFn, SlackPlatformClient } from '../../src/platform/slack-client';
import { ReaperError, isReaperError } from '../../src/domain/errors';
import { captureLogs } from '../helpers/fakes';

interface RecordedCall {
  url: string;
  method: string;
  authorization: string | null;
  body?: string;
}

type Reply = Response | Error;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** A fetch stand-in that answers from a queue and records each call. */
function scriptedFetch(replies: Reply[]): { fetchFn: FetchFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({
      url,
      method: init.method ?? 'GET',
      authorization: new Headers(init.headers).get('Authorization'),
      body: typeof init.body === 'string' ? init.body : undefined,
    });
    const reply = replies.shift();
    if (reply === undefined) throw new Error(`unexpected request to ${url}`);
    if (reply instanceof Error) throw reply;
    return reply;
  };
  return { fetchFn, calls };
}

function createClient(replies: Reply[], overrides: { scimPageSize?: number; memberPageSize?: number } = {}) {
  const { fetchFn, calls } = scriptedFetch(replies);
  const sleeps: number[] = [];
  const client = new SlackPlatformClient({
    token: 'test-secret-token',
    apiUrl: 'https://api.example.test',
    workspaceUrl: 'https://team.example.test',
    fetchFn,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    ...overrides,
  });
  return { client, calls, sleeps };
}

async function failureOf(promise: Promise<unknown>): Promise<ReaperError> {
  try {
    await promise;
  } catch (err) {
    if (isReaperError(err)) return err;
    throw err;
  }
  throw new Error('expected a ReaperError');
}

describe('SlackPlatformClient', () => {
  captureLogs();

  describe('listProvisionedUsers', () => {
    test('pages through SCIM results until the total is reached', async () => {
      const { client, calls } = createClient(
        [
          json({ totalResults: 3, Resources: [{ id: 'U1', active: true, emails: [{ value: 'a@example.test' }] }, { id: 'U2', active: false }] }),
          json({ totalResults: 3, Resources: [{ id: 'U3', active: true, emails: [] }] }),
        ],
        { scimPageSize: 2 },
      );

      const users = await client.listProvisionedUsers();

      expect(users.map((u) => u.id)).toEqual(['U1', 'U2', 'U3']);
      expect(users[1].emails).toEqual([]);
      expect(calls.map((c) => c.url)).toEqual([
        'https://api.example.test/scim/v1/Users?startIndex=1&count=2',
        'https://api.example.test/scim/v1/Users?startIndex=3&count=2',
      ]);
      expect(calls[0].authorization).toBe('Bearer test-secret-token');
    });

    test('stops on an empty page even if the total was overstated', async () => {
      const { client, calls } = createClient([
        json({ totalResults: 5, Resources: [{ id: 'U1', active: true }] }),
        json({ totalResults: 5, Resources: [] }),
      ]);

      expect(await client.listProvisionedUsers()).toHaveLength(1);
      expect(calls).toHaveLength(2);
    });

    test('rejects a response that fails validation', async () => {
      const { client } = createClient([json({ totalResults: 1, Resources: [{ id: 'U1' }] })]);

      const err = await failureOf(client.listProvisionedUsers());

      expect(err.code).toBe('PLATFORM.UNAVAILABLE');
      expect(err.message.startsWith('Platform response failed validation at Resources.0.active')).toBe(true);
    });
  });

  describe('listMembers', () => {
    test('follows next_cursor until it is empty', async () => {
      const { client, calls } = createClient([
        json({ ok: true, members: [{ id: 'U1', profile: { email: 'a@example.test' } }], response_metadata: { next_cursor: 'dXNlcjpVMg==' } }),
        json({ ok: true, members: [{ id: 'U2', is_owner: true }], response_metadata: { next_cursor: '' } }),
      ]);

      const members = await client.listMembers();

      expect(members.map((m) => m.id)).toEqual(['U1', 'U2']);
      expect(members[1].profile).toEqual({});
      expect(calls.map((c) => c.url)).toEqual([
        'https://team.example.test/api/users.list?limit=200',
        'https://team.example.test/api/users.list?limit=200&cursor=dXNlcjpVMg%3D%3D',
      ]);
    });

    test('fails when the API reports ok: false', async () => {
      const { client } = createClient([json({ ok: false, error: 'invalid_auth' })]);

      const err = await failureOf(client.listMembers());

      expect(err.code).toBe('PLATFORM.UNAVAILABLE');
      expect(err.message).toBe('users.list failed: invalid_auth');
    });

    test('fails when a cursor repeats', async () => {
      const { client } = createClient([
        json({ ok: true, members: [], response_metadata: { next_cursor: 'abc' } }),
        json({ ok: true, members: [], response_metadata: { next_cursor: 'abc' } }),
      ]);

      const err = await failureOf(client.listMembers());

      expect(err.message).toBe('users.list repeated a pagination cursor');
    });
  });

  describe('revokeUser', () => {
    test('sends a SCIM DELETE for the account', async () => {
      const { client, calls } = createClient([new Response(null, { status: 204 })]);

      await client.revokeUser('U 1');

      expect(calls).toEqual([
        { url: 'https://api.example.test/scim/v1/Users/U%201', method: 'DELETE', authorization: 'Bearer test-secret-token', body: undefined },
      ]);
    });

    test('treats 404 as already revoked', async () => {
      const { client } = createClient([new Response('not found', { status: 404 })]);
      await expect(client.revokeUser('U1')).resolves.toBeUndefined();
    });

    test('fails immediately on a non-retryable status and masks the token', async () => {
      const { client, calls, sleeps } = createClient([new Response('bad token test-secret-token', { status: 403 })]);

      const err = await failureOf(client.revokeUser('U1'));

      expect(err.message).toBe(
        'DELETE https://api.example.test/scim/v1/Users/U1 returned HTTP 403: bad token *************oken',
      );
      expect(err.typedError.retryable).toBe(false);
      expect(err.typedError.suggestedFixes[0].type).toBe('CHECK_API_TOKEN');
      expect(calls).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });
  });

  describe('retries', () => {
    test('retries 429 and 5xx with exponential backoff', async () => {
      const { client, calls, sleeps } = createClient([
        new Response('slow down', { status: 429 }),
        new Response('oops', { status: 503 }),
        new Response(null, { status: 204 }),
      ]);

      await client.revokeUser('U1');

      expect(calls).toHaveLength(3);
      expect(sleeps).toEqual([1000, 2000]);
    });

    test('retries network failures', async () => {
      const { client, calls } = createClient([new Error('ECONNRESET'), new Response(null, { status: 204 })]);

      await client.revokeUser('U1');

      expect(calls).toHaveLength(2);
    });

    test('gives up after three retries', async () => {
      const { client, calls, sleeps } = createClient([
        new Response('down', { status: 500 }),
        new Response('down', { status: 500 }),
        new Response('down', { status: 500 }),
        new Response('down', { status: 500 }),
      ]);

      const err = await failureOf(client.revokeUser('U1'));

      expect(err.message).toBe('DELETE https://api.example.test/scim/v1/Users/U1 returned HTTP 500: down');
      expect(err.typedError.retryable).toBe(true);
      expect(calls).toHaveLength(4);
      expect(sleeps).toEqual([1000, 2000, 4000]);
    });
  });

  describe('sendDirectMessage', () => {
    test('posts the message with the configured identity', async () => {
      const { client, calls } = createClient([json({ ok: true })]);

      await client.sendDirectMessage('UOWNER', '```hello```', { username: 'workspace reaper', iconEmoji: ':scream_cat:' });

      expect(calls[0].url).toBe('https://team.example.test/api/chat.postMessage');
      expect(calls[0].method).toBe('POST');
      expect(JSON.parse(calls[0].body ?? '{}')).toEqual({
        channel: 'UOWNER',
        text: '```hello```',
        username: 'workspace reaper',
        icon_emoji: ':scream_cat:',
      });
    });

    test('fails when the API rejects the message', async () => {
      const { client } = createClient([json({ ok: false, error: 'channel_not_found' })]);

      const err = await failureOf(client.sendDirectMessage('UOWNER', 'x', { username: 'u', iconEmoji: ':x:' }));

      expect(err.message).toBe('chat.postMessage failed: channel_not_found');
    });
  });
});
