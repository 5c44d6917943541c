/**
 * Platform client boundary.
 *
 * The inventory, revoker and notifier depend on this interface only; the
 * Slack-style HTTP implementation lives in slack-client.ts and tests provide
 * in-memory fakes.
 */

import { ScimUser, WorkspaceMember } from './schemas';

/** Display options for direct messages. */
export interface MessageOptions {
  username: string;
  iconEmoji: string;
}

export interface PlatformClient {
  /** Provisioning listing: every user with identity-provider email and active flag. */
  listProvisionedUsers(): Promise<ScimUser[]>;
  /** Member listing: every account with guest, owner and profile email fields. */
  listMembers(): Promise<WorkspaceMember[]>;
  /** Deactivate an account and expire its sessions. Revoking an already revoked account succeeds. */
  revokeUser(id: string): Promise<void>;
  /** Send a direct message addressed by account id. */
  sendDirectMessage(recipientId: string, text: string, options: MessageOptions): Promise<void>;
}
