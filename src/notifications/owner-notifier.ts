/**
 * Owner Notification Service.
 *
 * Fans a message out to every workspace owner as a direct message. Delivery
 * is best-effort: a rejected recipient is recorded and the remaining owners
 * are still attempted.
 */

import { WorkspaceOwner } from '../domain/account';
import { TypedError, describeThrown, notifyFailedError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { MessageOptions, PlatformClient } from '../platform/client';

/** Result of one fan-out. */
export interface NotifyResult {
  delivered: string[];
  failures: TypedError<'ACCOUNT.NOTIFY_FAILED'>[];
}

/** Owners read messages as preformatted text. */
export function formatOwnerMessage(message: string): string {
  return '```' + message + '```';
}

export class OwnerNotifier {
  private readonly log: Logger;

  constructor(
    private readonly client: PlatformClient,
    private readonly messageOptions: MessageOptions,
    logger?: Logger,
  ) {
    this.log = (logger ?? rootLogger).child({ module: 'notifier' });
  }

  async notifyOwners(message: string, owners: readonly WorkspaceOwner[]): Promise<NotifyResult> {
    const text = formatOwnerMessage(message);
    const result: NotifyResult = { delivered: [], failures: [] };

    if (owners.length === 0) {
      this.log.warn('No workspace owners to notify', { message });
      return result;
    }

    for (const owner of owners) {
      try {
        await this.client.sendDirectMessage(owner.id, text, this.messageOptions);
        result.delivered.push(owner.id);
      } catch (err) {
        const failure = notifyFailedError(owner.id, describeThrown(err));
        this.log.error('Owner notification failed', { recipientId: owner.id, error: failure.message });
        result.failures.push(failure);
      }
    }

    return result;
  }
}
