/**
 * Directory transport boundary.
 *
 * The enumerator only needs a cursor-paged search. Concrete transports
 * (LDAP over TLS in production, in-memory fakes in tests) implement this
 * interface and report failures as DIRECTORY.UNAVAILABLE ReaperErrors.
 */

/** Opaque continuation token. The empty string means "first page" on requests and "no more pages" on responses. */
export type DirectoryCursor = string;

/** Attribute map of one search entry. Multi-valued attributes arrive as arrays. */
export type DirectoryEntry = Record<string, string | string[] | undefined>;

/** Paging control echoed by the server. */
export interface PagingControl {
  cursor: DirectoryCursor;
}

export interface DirectoryPage {
  entries: DirectoryEntry[];
  /** Null when the server answered without a paging control. */
  paging: PagingControl | null;
}

/** A bound connection that can run paged searches. */
export interface DirectorySession {
  searchPage(cursor: DirectoryCursor): Promise<DirectoryPage>;
  close(): Promise<void>;
}

export interface DirectoryTransport {
  /** Open and authenticate a session. */
  connect(): Promise<DirectorySession>;
}
