/**
 * LDAP directory transport.
 *
 * Binds over TLS with a service account and runs subtree searches carrying
 * an RFC 2696 paged-results control. The control is built and read by hand
 * (not via the client's auto-paging) so that a server ignoring it surfaces
 * as a missing control instead of a silently short result.
 *
 * Referrals are reported by the client as searchReference events and are
 * not followed.
 */

import * as ldap from 'ldapjs';
import { ReaperError, describeThrown, directoryUnavailableError, maskSecretsInMessage } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import {
  DirectoryCursor,
  DirectoryEntry,
  DirectoryPage,
  DirectorySession,
  DirectoryTransport,
  PagingControl,
} from './transport';

// The runtime exports this control; the published typings omit it.
declare module 'ldapjs' {
  class PagedResultsControl {
    constructor(options: { criticality?: boolean; value: { size: number; cookie: Buffer } });
    readonly type: string;
  }
}

interface BindWaiter {
  resolve(): void;
  reject(err: unknown): void;
}

/** OID of the simple paged results control. */
export const PAGED_RESULTS_OID = '1.2.840.113556.1.4.319';

export interface LdapTransportOptions {
  url: string;
  baseDn: string;
  bindDn: string;
  bindPassword: string;
  searchFilter: string;
  searchAttributes: readonly string[];
  pageSize: number;
  /** Socket connect timeout. Default: 10s. */
  connectTimeoutMs?: number;
  /** Per-operation timeout. Default: 120s. */
  operationTimeoutMs?: number;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Find the paged-results control among response controls.
 * Returns null when the server did not echo one.
 */
export function readPagingControl(controls: readonly unknown[]): PagingControl | null {
  for (const control of controls) {
    if (!isRecord(control) || control.type !== PAGED_RESULTS_OID) continue;
    const cookie = isRecord(control.value) ? control.value.cookie : undefined;
    if (Buffer.isBuffer(cookie) && cookie.length > 0) {
      return { cursor: cookie.toString('base64') };
    }
    return { cursor: '' };
  }
  return null;
}

/** Convert a search entry's attribute object, dropping the dn and controls. */
export function toDirectoryEntry(object: Record<string, unknown>): DirectoryEntry {
  const entry: DirectoryEntry = {};
  for (const [name, value] of Object.entries(object)) {
    if (name === 'dn' || name === 'controls') continue;
    if (typeof value === 'string') {
      entry[name] = value;
    } else if (Array.isArray(value)) {
      entry[name] = value.filter((v): v is string => typeof v === 'string');
    }
  }
  return entry;
}

export class LdapDirectoryTransport implements DirectoryTransport {
  private readonly log: Logger;

  constructor(private readonly options: LdapTransportOptions) {
    this.log = (options.logger ?? rootLogger).child({ module: 'ldap' });
  }

  async connect(): Promise<DirectorySession> {
    const client = ldap.createClient({
      url: this.options.url,
      tlsOptions: { rejectUnauthorized: true },
      connectTimeout: this.options.connectTimeoutMs ?? 10_000,
      timeout: this.options.operationTimeoutMs ?? 120_000,
    });

    // Registered before bind and never removed: an 'error' emission without a
    // listener would throw out of the event loop. While the bind is pending the
    // first failure rejects it; anything later is only logged.
    let pendingBind: BindWaiter | undefined;
    const onConnectionFailure = (err: unknown) => {
      const waiter = pendingBind;
      if (waiter) {
        pendingBind = undefined;
        waiter.reject(err);
        return;
      }
      this.log.warn('Directory connection error', { error: this.mask(describeThrown(err)) });
    };
    client.on('error', onConnectionFailure);
    client.on('connectError', onConnectionFailure);
    client.on('connectTimeout', (err: unknown) => onConnectionFailure(err ?? new Error('connection timed out')));

    try {
      await new Promise<void>((resolve, reject) => {
        pendingBind = { resolve: () => resolve(), reject };
        client.bind(this.options.bindDn, this.options.bindPassword, (err) => {
          const waiter = pendingBind;
          if (!waiter) return;
          pendingBind = undefined;
          if (err) waiter.reject(err);
          else waiter.resolve();
        });
      });
    } catch (err) {
      client.destroy();
      throw this.unavailable('Directory bind failed', err);
    }

    return {
      searchPage: (cursor) => this.searchPage(client, cursor),
      close: () =>
        new Promise<void>((resolve, reject) => {
          client.unbind((err) => {
            client.destroy();
            if (err) reject(err);
            else resolve();
          });
        }),
    };
  }

  private searchPage(client: ldap.Client, cursor: DirectoryCursor): Promise<DirectoryPage> {
    const control = new ldap.PagedResultsControl({
      value: { size: this.options.pageSize, cookie: Buffer.from(cursor, 'base64') },
    });
    const searchOptions: ldap.SearchOptions = {
      scope: 'sub',
      filter: this.options.searchFilter,
      attributes: [...this.options.searchAttributes],
    };

    return new Promise<DirectoryPage>((resolve, reject) => {
      client.search(this.options.baseDn, searchOptions, control, (err, res) => {
        if (err) {
          reject(this.unavailable('Directory search failed', err));
          return;
        }
        const entries: DirectoryEntry[] = [];
        res.on('searchEntry', (entry) => {
          entries.push(toDirectoryEntry(entry.object));
        });
        res.on('error', (searchErr) => {
          reject(this.unavailable('Directory search failed', searchErr));
        });
        res.on('end', (result) => {
          const controls: readonly unknown[] = result?.controls ?? [];
          resolve({ entries, paging: readPagingControl(controls) });
        });
      });
    });
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, [this.options.bindPassword]);
  }

  private unavailable(context: string, err: unknown): ReaperError {
    return new ReaperError(
      directoryUnavailableError(this.mask(`${context}: ${describeThrown(err)}`), { url: this.options.url }),
    );
  }
}
