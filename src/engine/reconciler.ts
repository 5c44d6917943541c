/**
 * Reconciler — decides which platform accounts lose access this cycle.
 *
 * Pure function of the platform snapshot and the directory set. The
 * failsafe ratio is checked against the complete candidate list before the
 * caller can act on any of it: a directory read that came back empty or
 * truncated looks exactly like a mass departure, and the ratio bound is what
 * tells the two apart.
 */

import {
  ABSENT_FROM_DIRECTORY_REASON,
  PlatformAccount,
  RevocationCandidate,
  isActive,
  isBot,
} from '../domain/account';
import { ReaperError, emptySnapshotError, failsafeExceededError } from '../domain/errors';
import { DirectoryIdentity } from '../domain/identity';

export interface ReconcileInput {
  accounts: readonly PlatformAccount[];
  directory: ReadonlySet<DirectoryIdentity>;
  guestIds: ReadonlySet<string>;
  botEmailSuffix: string;
  /** Largest fraction of accounts that may be revoked in one cycle, in [0, 1]. */
  maxDeleteFailsafe: number;
}

export interface ReconcileResult {
  candidates: RevocationCandidate[];
  /** candidates / accounts */
  ratio: number;
}

/** Select the candidates without applying the failsafe. */
export function selectCandidates(
  input: Pick<ReconcileInput, 'accounts' | 'directory' | 'guestIds' | 'botEmailSuffix'>,
): RevocationCandidate[] {
  const candidates: RevocationCandidate[] = [];
  for (const account of input.accounts) {
    if (!isActive(account)) continue;
    if (input.guestIds.has(account.id)) continue;
    if (isBot(account, input.botEmailSuffix)) continue;
    if (input.directory.has(account.email)) continue;
    candidates.push({ id: account.id, email: account.email, reason: ABSENT_FROM_DIRECTORY_REASON });
  }
  return candidates;
}

/**
 * Compute this cycle's revocation candidates.
 *
 * @throws ReaperError RECONCILE.EMPTY_SNAPSHOT when there are no accounts,
 *   RECONCILE.FAILSAFE_EXCEEDED when the ratio is above the bound.
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
  if (input.accounts.length === 0) {
    throw new ReaperError(emptySnapshotError());
  }

  const candidates = selectCandidates(input);
  const ratio = candidates.length / input.accounts.length;

  if (ratio > input.maxDeleteFailsafe) {
    throw new ReaperError(
      failsafeExceededError(candidates.length, input.accounts.length, ratio, input.maxDeleteFailsafe),
    );
  }

  return { candidates, ratio };
}
