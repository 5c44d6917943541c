/**
 * Slack-style platform client.
 *
 * SCIM endpoints live on the API host, Web API methods on the workspace
 * host. All requests carry the token as a Bearer header, time out after
 * 30s, and retry rate-limited (429), 5xx and network failures up to three
 * times with exponential backoff (1s, 2s, 4s). Any other non-2xx response
 * fails immediately.
 */

import { z } from 'zod';
import { ReaperError, describeThrown, maskSecretsInMessage, platformUnavailableError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { MessageOptions, PlatformClient } from './client';
import {
  ScimUser,
  WorkspaceMember,
  apiEnvelopeSchema,
  memberListResponseSchema,
  scimListResponseSchema,
} from './schemas';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface SlackClientOptions {
  token: string;
  /** SCIM host, e.g. https://api.slack.com */
  apiUrl: string;
  /** Web API host, e.g. https://example.slack.com */
  workspaceUrl: string;
  /** SCIM page size. Default: 1000. */
  scimPageSize?: number;
  /** users.list page size. Default: 200. */
  memberPageSize?: number;
  /** Injectable for tests. Default: global fetch. */
  fetchFn?: FetchFn;
  /** Injectable for tests. Default: setTimeout-based sleep. */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const MAX_RETRIES = 3;
const BACKOFF_BASE_MS = 1000;
const REQUEST_TIMEOUT_MS = 30_000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class SlackPlatformClient implements PlatformClient {
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;
  private readonly scimPageSize: number;
  private readonly memberPageSize: number;

  constructor(private readonly options: SlackClientOptions) {
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.log = (options.logger ?? rootLogger).child({ module: 'platform' });
    this.scimPageSize = options.scimPageSize ?? 1000;
    this.memberPageSize = options.memberPageSize ?? 200;
  }

  async listProvisionedUsers(): Promise<ScimUser[]> {
    const users: ScimUser[] = [];
    let startIndex = 1;

    for (;;) {
      const url = `${this.options.apiUrl}/scim/v1/Users?startIndex=${startIndex}&count=${this.scimPageSize}`;
      const response = await this.request(url, { method: 'GET' });
      const page = await this.parseBody(response, scimListResponseSchema, url);

      users.push(...page.Resources);
      if (page.Resources.length === 0 || users.length >= page.totalResults) break;
      startIndex += page.Resources.length;
    }

    this.log.debug('Listed provisioned users', { count: users.length });
    return users;
  }

  async listMembers(): Promise<WorkspaceMember[]> {
    const members: WorkspaceMember[] = [];
    const seenCursors = new Set<string>();
    let cursor = '';

    for (;;) {
      const params = new URLSearchParams({ limit: String(this.memberPageSize) });
      if (cursor) params.set('cursor', cursor);
      const url = `${this.options.workspaceUrl}/api/users.list?${params.toString()}`;
      const response = await this.request(url, { method: 'GET' });
      const page = await this.parseBody(response, memberListResponseSchema, url);
      if (!page.ok) {
        throw this.unavailable(`users.list failed: ${page.error ?? 'unknown_error'}`, { url, apiError: page.error });
      }

      members.push(...page.members);
      const next = page.response_metadata?.next_cursor ?? '';
      if (next === '') break;
      if (seenCursors.has(next)) {
        throw this.unavailable('users.list repeated a pagination cursor', { url });
      }
      seenCursors.add(next);
      cursor = next;
    }

    this.log.debug('Listed workspace members', { count: members.length });
    return members;
  }

  async revokeUser(id: string): Promise<void> {
    const url = `${this.options.apiUrl}/scim/v1/Users/${encodeURIComponent(id)}`;
    const response = await this.request(url, { method: 'DELETE' }, [404]);
    if (response.status === 404) {
      this.log.info('Account already revoked', { accountId: id });
    }
  }

  async sendDirectMessage(recipientId: string, text: string, options: MessageOptions): Promise<void> {
    const url = `${this.options.workspaceUrl}/api/chat.postMessage`;
    const response = await this.request(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json; charset=utf-8' },
      body: JSON.stringify({
        channel: recipientId,
        text,
        username: options.username,
        icon_emoji: options.iconEmoji,
      }),
    });
    const envelope = await this.parseBody(response, apiEnvelopeSchema, url);
    if (!envelope.ok) {
      throw this.unavailable(`chat.postMessage failed: ${envelope.error ?? 'unknown_error'}`, { url, apiError: envelope.error });
    }
  }

  /**
   * Perform one request with retry. Resolves with any 2xx response or a
   * status listed in `acceptStatuses`; rejects with PLATFORM.UNAVAILABLE
   * otherwise.
   */
  private async request(url: string, init: RequestInit, acceptStatuses: number[] = []): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${this.options.token}`);

    let lastError: ReaperError | undefined;

    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
      if (attempt > 0) {
        await this.sleep(BACKOFF_BASE_MS * Math.pow(2, attempt - 1));
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
      try {
        const response = await this.fetchFn(url, { ...init, headers, signal: controller.signal });
        if (response.ok || acceptStatuses.includes(response.status)) {
          return response;
        }
        const text = await response.text().catch(() => '');
        lastError = this.unavailable(`${init.method ?? 'GET'} ${url} returned HTTP ${response.status}: ${text.slice(0, 200)}`, {
          url,
          statusCode: response.status,
        });
        if (!isRetryableStatus(response.status)) throw lastError;
      } catch (err) {
        if (err instanceof ReaperError) throw err;
        lastError = this.unavailable(`${init.method ?? 'GET'} ${url} failed: ${describeThrown(err)}`, { url });
      } finally {
        clearTimeout(timeout);
      }
      if (attempt < MAX_RETRIES) {
        this.log.warn('Platform request failed, retrying', { url, attempt: attempt + 1, error: lastError?.message });
      }
    }

    throw lastError ?? this.unavailable(`${url} failed after retries`, { url });
  }

  private async parseBody<T extends z.ZodTypeAny>(response: Response, schema: T, url: string): Promise<z.output<T>> {
    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw this.unavailable(`Platform returned a non-JSON body (HTTP ${response.status})`, { url, statusCode: response.status });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw this.unavailable(
        `Platform response failed validation at ${issue ? issue.path.join('.') || '(root)' : '(root)'}: ${issue?.message ?? 'invalid'}`,
        { url },
      );
    }
    return parsed.data;
  }

  private unavailable(message: string, details: Record<string, unknown>): ReaperError {
    return new ReaperError(platformUnavailableError(maskSecretsInMessage(message, [this.options.token]), details));
  }
}
