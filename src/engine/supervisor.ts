/**
 * Supervisor loop — drives one reconciliation cycle per interval.
 *
 * A cycle is: platform snapshot, directory enumeration, reconciliation,
 * revocation. Any cycle-level failure aborts the cycle before the first
 * revocation, bumps the consecutive-failure counter, and on the escalation
 * cadence sends owners a single summary. Success resets the counter. The
 * loop itself never ends on error; only stop() (wired to process signals)
 * ends it, after the current cycle or sleep.
 */

import { v4 as uuid } from 'uuid';
import { WorkspaceOwner } from '../domain/account';
import { CycleOutcome, CycleSummary, SupervisorState, SupervisorStatus } from '../domain/cycle';
import {
  CycleErrorCode,
  ReaperError,
  TypedError,
  isCycleErrorCode,
  maskSecretsInMessage,
  unexpectedError,
} from '../domain/errors';
import { DirectoryEnumerator } from '../directory/enumerator';
import { Logger, logger as rootLogger } from '../logger';
import { OwnerNotifier } from '../notifications/owner-notifier';
import { PlatformInventory } from '../platform/inventory';
import { escalationMessage, shouldEscalate } from './escalation';
import { reconcile } from './reconciler';
import { AccountRevoker } from './revoker';
import { transitionSupervisorState } from './state-machine';

export interface SupervisorDeps {
  inventory: PlatformInventory;
  enumerator: DirectoryEnumerator;
  revoker: AccountRevoker;
  notifier: OwnerNotifier;
}

export interface SupervisorOptions {
  intervalMs: number;
  maxDeleteFailsafe: number;
  botEmailSuffix: string;
  /** Values masked out of logged and escalated error messages. */
  secrets?: readonly string[];
  /** Replaces the interruptible timer between cycles (tests). */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** Map any thrown value to a cycle-level typed error. */
export function classifyFailure(err: unknown): TypedError<CycleErrorCode> {
  if (err instanceof ReaperError) {
    const typed = err.typedError;
    if (isCycleErrorCode(typed.code)) {
      return { ...typed, code: typed.code };
    }
  }
  return unexpectedError(err);
}

/** How loudly a failure is logged. Protocol violations and the failsafe point at something an operator must fix. */
export function failureSeverity(code: CycleErrorCode): 'warn' | 'error' {
  switch (code) {
    case 'DIRECTORY.UNAVAILABLE':
    case 'PLATFORM.UNAVAILABLE':
    case 'RECONCILE.EMPTY_SNAPSHOT':
      return 'warn';
    case 'DIRECTORY.PAGING_UNSUPPORTED':
    case 'RECONCILE.FAILSAFE_EXCEEDED':
    case 'SYSTEM.UNEXPECTED':
      return 'error';
    default: {
      const unhandled: never = code;
      throw new Error(`Unhandled failure code: ${String(unhandled)}`);
    }
  }
}

function formatMinutes(ms: number): string {
  return String(Math.round((ms / 60_000) * 100) / 100);
}

export class SupervisorLoop {
  private state = SupervisorState.Idle;
  private looping = false;
  private consecutiveFailures = 0;
  private cyclesRun = 0;
  private lastOutcome?: CycleOutcome;
  private wake?: () => void;
  private readonly log: Logger;
  private readonly secrets: readonly string[];

  constructor(
    private readonly deps: SupervisorDeps,
    private readonly options: SupervisorOptions,
  ) {
    this.log = (options.logger ?? rootLogger).child({ module: 'supervisor' });
    this.secrets = options.secrets ?? [];
  }

  getStatus(): SupervisorStatus {
    return {
      state: this.state,
      looping: this.looping,
      consecutiveFailures: this.consecutiveFailures,
      cyclesRun: this.cyclesRun,
      lastOutcome: this.lastOutcome,
    };
  }

  /** Run cycles until stop() is called. */
  async start(): Promise<void> {
    if (this.looping) return;
    this.looping = true;
    this.log.info('Supervisor started', {
      intervalMs: this.options.intervalMs,
      maxDeleteFailsafe: this.options.maxDeleteFailsafe,
    });

    while (this.looping) {
      await this.runCycle();
      if (!this.looping) break;
      this.log.info(`Sleeping for ${formatMinutes(this.options.intervalMs)} minutes`);
      await this.pause(this.options.intervalMs);
    }

    this.log.info('Supervisor stopped', { cyclesRun: this.cyclesRun });
  }

  /** End the loop after the current cycle, or immediately if it is sleeping. */
  stop(): void {
    this.looping = false;
    this.wake?.();
  }

  /** Run exactly one cycle. Never throws for cycle failures; they are returned as the outcome. */
  async runCycle(): Promise<CycleOutcome> {
    this.moveTo(SupervisorState.Running);
    const cycleId = `cyc_${uuid()}`;
    const log = this.log.child({ cycleId });
    const startedAt = new Date().toISOString();
    let outcome: CycleOutcome;

    try {
      log.info('Looking for accounts to revoke that are absent from the directory');
      const summary = await this.reconcileOnce(log);
      this.consecutiveFailures = 0;
      outcome = { status: 'succeeded', cycleId, startedAt, finishedAt: new Date().toISOString(), summary };
      log.info('Cycle succeeded', { ...summary });
    } catch (err) {
      const failure = classifyFailure(err);
      const error: TypedError<CycleErrorCode> = { ...failure, message: maskSecretsInMessage(failure.message, this.secrets) };
      this.consecutiveFailures++;
      log[failureSeverity(error.code)]('Cycle failed', {
        code: error.code,
        error: error.message,
        details: error.details,
        consecutiveFailures: this.consecutiveFailures,
      });

      const escalated = shouldEscalate(this.consecutiveFailures) ? await this.escalate(error, log) : false;
      outcome = {
        status: 'failed',
        cycleId,
        startedAt,
        finishedAt: new Date().toISOString(),
        error,
        consecutiveFailures: this.consecutiveFailures,
        escalated,
      };
    } finally {
      this.moveTo(SupervisorState.Idle);
    }

    this.cyclesRun++;
    this.lastOutcome = outcome;
    return outcome;
  }

  private async reconcileOnce(log: Logger): Promise<CycleSummary> {
    const snapshot = await this.deps.inventory.takeSnapshot();
    const directory = await this.deps.enumerator.fetchActiveMembers();

    const { candidates, ratio } = reconcile({
      accounts: snapshot.accounts,
      directory,
      guestIds: snapshot.guestIds,
      botEmailSuffix: this.options.botEmailSuffix,
      maxDeleteFailsafe: this.options.maxDeleteFailsafe,
    });
    log.info('Reconciliation computed', { candidates: candidates.length, ratio });

    const tally = await this.deps.revoker.revokeAll(candidates, snapshot.owners);
    return {
      accountCount: snapshot.accounts.length,
      directoryCount: directory.size,
      candidateCount: candidates.length,
      ratio,
      revoked: tally.revoked,
      flagged: tally.flagged,
      failed: tally.failed,
      notifyFailures: tally.notifyFailures,
    };
  }

  /** Send one escalation message. Returns whether any owner received it. */
  private async escalate(error: TypedError<CycleErrorCode>, log: Logger): Promise<boolean> {
    let owners: WorkspaceOwner[];
    try {
      owners = await this.deps.inventory.listOwners();
    } catch (err) {
      log.error('Escalation skipped: owners could not be listed', { error: maskSecretsInMessage(classifyFailure(err).message, this.secrets) });
      return false;
    }
    const result = await this.deps.notifier.notifyOwners(escalationMessage(this.consecutiveFailures, error), owners);
    log.warn('Escalated persistent failure to owners', {
      consecutiveFailures: this.consecutiveFailures,
      delivered: result.delivered.length,
      failed: result.failures.length,
    });
    return result.delivered.length > 0;
  }

  private moveTo(target: SupervisorState): void {
    const result = transitionSupervisorState(this.state, target);
    if (!result.success || result.newStatus === undefined) {
      throw new ReaperError(result.error ?? unexpectedError(new Error(`Cannot move supervisor to ${target}`)));
    }
    this.state = result.newStatus;
  }

  private pause(ms: number): Promise<void> {
    if (this.options.sleep) return this.options.sleep(ms);
    return new Promise((resolve) => {
      const timer = setTimeout(() => done(), ms);
      const done = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
      this.wake = done;
    });
  }
}
