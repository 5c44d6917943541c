/**
 * Account revoker.
 *
 * With full capability the platform deactivates the account (which also
 * expires its sessions) and owners are told. With limited capability there
 * is no revoke call at all: owners are told the account must be disabled by
 * hand. Sessions of such accounts stay valid until someone does.
 */

import { RevocationCandidate, WorkspaceOwner } from '../domain/account';
import { TypedError, describeThrown, revokeFailedError } from '../domain/errors';
import { RevokeMode } from '../config';
import { Logger, logger as rootLogger } from '../logger';
import { PlatformClient } from '../platform/client';
import { OwnerNotifier } from '../notifications/owner-notifier';

export type RevokeResult =
  | {
      success: true;
      /** `revoked` when the platform call was made, `flagged` when owners must act. */
      action: 'revoked' | 'flagged';
      candidate: RevocationCandidate;
      notifyFailures: TypedError<'ACCOUNT.NOTIFY_FAILED'>[];
    }
  | {
      success: false;
      candidate: RevocationCandidate;
      error: TypedError<'ACCOUNT.REVOKE_FAILED'>;
    };

export interface RevokeTally {
  revoked: number;
  flagged: number;
  failed: number;
  notifyFailures: number;
  results: RevokeResult[];
}

export function revokedMessage(candidate: RevocationCandidate): string {
  return (
    `id: ${candidate.id}  email: ${candidate.email}  ` +
    `This user has had their sessions expired and is disabled because they are ${candidate.reason}.`
  );
}

export function manualActionMessage(candidate: RevocationCandidate): string {
  return (
    `id: ${candidate.id}  email: ${candidate.email}  ` +
    `This user is invalid because they are ${candidate.reason}. ` +
    'Revoke support is not available, so they have to be disabled manually.'
  );
}

export class AccountRevoker {
  private readonly log: Logger;

  constructor(
    private readonly client: PlatformClient,
    private readonly notifier: OwnerNotifier,
    private readonly mode: RevokeMode,
    logger?: Logger,
  ) {
    this.log = (logger ?? rootLogger).child({ module: 'revoker', mode });
  }

  async revoke(candidate: RevocationCandidate, owners: readonly WorkspaceOwner[]): Promise<RevokeResult> {
    let message: string;
    let action: 'revoked' | 'flagged';

    if (this.mode === 'full') {
      try {
        await this.client.revokeUser(candidate.id);
      } catch (err) {
        const error = revokeFailedError(candidate.id, describeThrown(err), { email: candidate.email });
        this.log.error('Revoke failed', { accountId: candidate.id, email: candidate.email, error: error.message });
        return { success: false, candidate, error };
      }
      message = revokedMessage(candidate);
      action = 'revoked';
    } else {
      message = manualActionMessage(candidate);
      action = 'flagged';
    }

    this.log.info(message, { accountId: candidate.id, action });
    const notified = await this.notifier.notifyOwners(message, owners);
    return { success: true, action, candidate, notifyFailures: notified.failures };
  }

  /** Act on every candidate in order. One candidate's failure never stops the rest. */
  async revokeAll(candidates: readonly RevocationCandidate[], owners: readonly WorkspaceOwner[]): Promise<RevokeTally> {
    const tally: RevokeTally = { revoked: 0, flagged: 0, failed: 0, notifyFailures: 0, results: [] };
    for (const candidate of candidates) {
      const result = await this.revoke(candidate, owners);
      tally.results.push(result);
      if (!result.success) {
        tally.failed++;
        continue;
      }
      if (result.action === 'revoked') tally.revoked++;
      else tally.flagged++;
      tally.notifyFailures += result.notifyFailures.length;
    }
    return tally;
  }
}
