/**
 * Directory identity.
 *
 * A directory member is identified by a normalized email. Normalization
 * happens once, where data enters the process; comparisons downstream are
 * plain string equality.
 */

/** Lower-cased, trimmed email of one active directory member. */
export type DirectoryIdentity = string;

/** Normalize a raw email for identity comparison. */
export function normalizeEmail(raw: string): DirectoryIdentity {
  return raw.trim().toLowerCase();
}

/** Build a membership set from raw emails, dropping blanks. */
export function toIdentitySet(rawEmails: Iterable<string>): Set<DirectoryIdentity> {
  const members = new Set<DirectoryIdentity>();
  for (const raw of rawEmails) {
    const email = normalizeEmail(raw);
    if (email.length > 0) members.add(email);
  }
  return members;
}
