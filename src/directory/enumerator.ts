/**
 * Directory enumerator.
 *
 * Walks the directory page by page and returns the complete set of active
 * member identities. The result is all-or-nothing: any protocol violation or
 * transport failure aborts with a typed error instead of returning the pages
 * collected so far, because a truncated member list would make real members
 * look absent.
 */

import {
  ReaperError,
  describeThrown,
  directoryUnavailableError,
  isReaperError,
  pagingUnsupportedError,
} from '../domain/errors';
import { DirectoryIdentity, normalizeEmail } from '../domain/identity';
import { Logger, logger as rootLogger } from '../logger';
import { DirectoryCursor, DirectoryEntry, DirectoryPage, DirectorySession, DirectoryTransport } from './transport';

export interface DirectoryEnumeratorOptions {
  /** Attribute holding the member's email. */
  emailAttribute: string;
  logger?: Logger;
}

/** Read the first non-blank value of an attribute, matching the name case-insensitively. */
export function readAttribute(entry: DirectoryEntry, attribute: string): string | undefined {
  const wanted = attribute.toLowerCase();
  for (const [name, value] of Object.entries(entry)) {
    if (name.toLowerCase() !== wanted || value === undefined) continue;
    const first = Array.isArray(value) ? value[0] : value;
    if (first !== undefined && first.trim() !== '') return first;
  }
  return undefined;
}

export class DirectoryEnumerator {
  private readonly emailAttribute: string;
  private readonly log: Logger;

  constructor(
    private readonly transport: DirectoryTransport,
    options: DirectoryEnumeratorOptions,
  ) {
    this.emailAttribute = options.emailAttribute;
    this.log = (options.logger ?? rootLogger).child({ module: 'directory' });
  }

  /** Enumerate every active member. */
  async fetchActiveMembers(): Promise<Set<DirectoryIdentity>> {
    let session: DirectorySession;
    try {
      session = await this.transport.connect();
    } catch (err) {
      throw asDirectoryError(err, 'Directory connection failed');
    }

    try {
      return await this.walk(session);
    } finally {
      await session.close().catch((err: unknown) => {
        this.log.warn('Directory session close failed', { error: describeThrown(err) });
      });
    }
  }

  private async walk(session: DirectorySession): Promise<Set<DirectoryIdentity>> {
    const members = new Set<DirectoryIdentity>();
    const seenCursors = new Set<DirectoryCursor>();
    let cursor: DirectoryCursor = '';
    let pages = 0;
    let skipped = 0;

    for (;;) {
      let page: DirectoryPage;
      try {
        page = await session.searchPage(cursor);
      } catch (err) {
        throw asDirectoryError(err, 'Directory search failed', { pages });
      }
      pages++;

      for (const entry of page.entries) {
        const raw = readAttribute(entry, this.emailAttribute);
        if (raw === undefined) {
          skipped++;
          continue;
        }
        members.add(normalizeEmail(raw));
      }

      if (page.paging === null) {
        throw new ReaperError(pagingUnsupportedError({ pages }));
      }
      if (page.paging.cursor === '') break;

      if (seenCursors.has(page.paging.cursor)) {
        throw new ReaperError(
          directoryUnavailableError('Directory returned a paging cursor it already returned; enumeration is not progressing', { pages }),
        );
      }
      seenCursors.add(page.paging.cursor);
      cursor = page.paging.cursor;
    }

    this.log.info('Directory enumerated', { pages, members: members.size, skippedEntries: skipped });
    return members;
  }
}

function asDirectoryError(err: unknown, context: string, details?: Record<string, unknown>): ReaperError {
  if (isReaperError(err, 'DIRECTORY.UNAVAILABLE', 'DIRECTORY.PAGING_UNSUPPORTED')) return err;
  return new ReaperError(directoryUnavailableError(`${context}: ${describeThrown(err)}`, details));
}
