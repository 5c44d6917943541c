/**
 * Platform inventory.
 *
 * Reads the workspace account list once per cycle and normalizes it to
 * PlatformAccount, whichever listing produced it. Guest and owner sets are
 * derived from that snapshot on demand and never cached between cycles.
 *
 * The member-only listing keeps deactivated accounts and flags them
 * `deleted`; those are marked inactive here rather than taken as active, so
 * an already-deactivated account never becomes a candidate.
 */

import { PlatformAccount, WorkspaceOwner, isGuest, isOwner } from '../domain/account';
import { ReaperError, describeThrown, isReaperError, platformUnavailableError } from '../domain/errors';
import { normalizeEmail } from '../domain/identity';
import { ListingMode } from '../config';
import { Logger, logger as rootLogger } from '../logger';
import { PlatformClient } from './client';
import { WorkspaceMember, primaryEmail } from './schemas';

/** One cycle's view of the platform. */
export interface PlatformSnapshot {
  accounts: PlatformAccount[];
  guestIds: Set<string>;
  ownerIds: Set<string>;
  owners: WorkspaceOwner[];
}

export interface PlatformInventoryOptions {
  listingMode: ListingMode;
  logger?: Logger;
}

function isGuestMember(member: WorkspaceMember): boolean {
  return member.is_restricted === true || member.is_ultra_restricted === true;
}

export class PlatformInventory {
  private readonly listingMode: ListingMode;
  private readonly log: Logger;

  constructor(
    private readonly client: PlatformClient,
    options: PlatformInventoryOptions,
  ) {
    this.listingMode = options.listingMode;
    this.log = (options.logger ?? rootLogger).child({ module: 'inventory' });
  }

  /** Fetch every account, normalized. Accounts without any email are left out. */
  async listAllAccounts(): Promise<PlatformAccount[]> {
    const members = await this.guard(() => this.client.listMembers());
    if (this.listingMode === 'legacy') {
      return this.fromMembers(members);
    }
    const users = await this.guard(() => this.client.listProvisionedUsers());
    const flags = new Map(members.map((member) => [member.id, member]));

    const accounts: PlatformAccount[] = [];
    let withoutEmail = 0;
    for (const user of users) {
      const email = primaryEmail(user);
      if (email === undefined || email.trim() === '') {
        withoutEmail++;
        continue;
      }
      const member = flags.get(user.id);
      accounts.push({
        id: user.id,
        email: normalizeEmail(email),
        active: user.active,
        isGuest: member ? isGuestMember(member) : false,
        isOwner: member?.is_owner === true,
      });
    }
    this.reportWithoutEmail(withoutEmail);
    return accounts;
  }

  classifyGuests(accounts: readonly PlatformAccount[]): Set<string> {
    return new Set(accounts.filter(isGuest).map((account) => account.id));
  }

  classifyOwners(accounts: readonly PlatformAccount[]): Set<string> {
    return new Set(accounts.filter(isOwner).map((account) => account.id));
  }

  /** List accounts once and derive the guest and owner sets from that listing. */
  async takeSnapshot(): Promise<PlatformSnapshot> {
    const accounts = await this.listAllAccounts();
    const guestIds = this.classifyGuests(accounts);
    const ownerIds = this.classifyOwners(accounts);
    const owners = accounts
      .filter((account) => ownerIds.has(account.id))
      .map((account) => ({ id: account.id, email: account.email }));
    this.log.info('Platform snapshot taken', {
      mode: this.listingMode,
      accounts: accounts.length,
      guests: guestIds.size,
      owners: owners.length,
    });
    return { accounts, guestIds, ownerIds, owners };
  }

  /** Current owners, read fresh. Used for escalation outside a cycle's snapshot. */
  async listOwners(): Promise<WorkspaceOwner[]> {
    const accounts = await this.listAllAccounts();
    return accounts.filter(isOwner).map((account) => ({ id: account.id, email: account.email }));
  }

  private fromMembers(members: WorkspaceMember[]): PlatformAccount[] {
    const accounts: PlatformAccount[] = [];
    let withoutEmail = 0;
    for (const member of members) {
      const email = member.profile.email;
      if (email === undefined || email.trim() === '') {
        withoutEmail++;
        continue;
      }
      // Deactivated members stay in this listing, flagged as deleted.
      accounts.push({
        id: member.id,
        email: normalizeEmail(email),
        active: member.deleted !== true,
        isGuest: isGuestMember(member),
        isOwner: member.is_owner === true,
      });
    }
    this.reportWithoutEmail(withoutEmail);
    return accounts;
  }

  private reportWithoutEmail(count: number): void {
    if (count > 0) {
      this.log.warn('Accounts without an email were left out of the snapshot', { count, mode: this.listingMode });
    }
  }

  private async guard<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (isReaperError(err, 'PLATFORM.UNAVAILABLE')) throw err;
      throw new ReaperError(platformUnavailableError(`Platform listing failed: ${describeThrown(err)}`));
    }
  }
}
