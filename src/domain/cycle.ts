/**
 * Reconciliation cycle outcome and supervisor status types.
 */

import { CycleErrorCode, TypedError } from './errors';

/** Supervisor states. The loop alternates between them until the process ends. */
export enum SupervisorState {
  Idle = 'idle',
  Running = 'running',
}

/** Valid supervisor state transitions. */
export const VALID_SUPERVISOR_TRANSITIONS: Record<SupervisorState, SupervisorState[]> = {
  [SupervisorState.Idle]: [SupervisorState.Running],
  [SupervisorState.Running]: [SupervisorState.Idle],
};

/** Counts produced by a successful cycle. */
export interface CycleSummary {
  accountCount: number;
  directoryCount: number;
  candidateCount: number;
  ratio: number;
  revoked: number;
  flagged: number;
  failed: number;
  notifyFailures: number;
}

export type CycleOutcome =
  | {
      status: 'succeeded';
      cycleId: string;
      startedAt: string;
      finishedAt: string;
      summary: CycleSummary;
    }
  | {
      status: 'failed';
      cycleId: string;
      startedAt: string;
      finishedAt: string;
      error: TypedError<CycleErrorCode>;
      consecutiveFailures: number;
      escalated: boolean;
    };

/** Read-only view of the supervisor, served by the status API. */
export interface SupervisorStatus {
  state: SupervisorState;
  looping: boolean;
  consecutiveFailures: number;
  cyclesRun: number;
  lastOutcome?: CycleOutcome;
}
