/**
 * Platform account model and classification predicates.
 */

/** One workspace account as read from the platform. `email` is already normalized. */
export interface PlatformAccount {
  id: string;
  email: string;
  active: boolean;
  isGuest: boolean;
  isOwner: boolean;
}

/** An account selected for revocation in the current cycle. */
export interface RevocationCandidate {
  id: string;
  email: string;
  reason: string;
}

/** A workspace owner who receives revocation and escalation messages. */
export interface WorkspaceOwner {
  id: string;
  email: string;
}

export const ABSENT_FROM_DIRECTORY_REASON = 'absent from directory';

export function isActive(account: PlatformAccount): boolean {
  return account.active === true;
}

export function isGuest(account: PlatformAccount): boolean {
  return account.isGuest === true;
}

export function isOwner(account: PlatformAccount): boolean {
  return account.isOwner === true;
}

/** Bot accounts are recognized by their provisioning email domain. */
export function isBot(account: PlatformAccount, botEmailSuffix: string): boolean {
  return botEmailSuffix.length > 0 && account.email.endsWith(botEmailSuffix.toLowerCase());
}
