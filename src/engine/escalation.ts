/**
 * Escalation cadence for consecutive cycle failures.
 *
 * Owners hear about a failure once it has persisted for four cycles, then
 * every 48 cycles after that (daily on an hourly interval): 4, 52, 100, ...
 */

export const ESCALATION_FIRST_AT = 4;
export const ESCALATION_PERIOD = 48;

export function shouldEscalate(consecutiveFailures: number): boolean {
  return consecutiveFailures > 0 && consecutiveFailures % ESCALATION_PERIOD === ESCALATION_FIRST_AT;
}

export function escalationMessage(consecutiveFailures: number, error: { code: string; message: string }): string {
  return (
    `Workspace reconciliation has failed ${consecutiveFailures} times in a row; ` +
    `no accounts are being revoked until it recovers. Latest failure [${error.code}]: ${error.message}`
  );
}
