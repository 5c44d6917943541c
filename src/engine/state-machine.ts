/**
 * Supervisor state machine.
 *
 * The supervisor only alternates between Idle and Running; any other move
 * (starting a cycle while one runs, finishing one that never started) is a
 * programming error and is reported as a typed error.
 */

import { SupervisorState, VALID_SUPERVISOR_TRANSITIONS } from '../domain/cycle';
import { TypedError, unexpectedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError<'SYSTEM.UNEXPECTED'>;
}

/** Attempt a supervisor state transition. */
export function transitionSupervisorState(
  current: SupervisorState,
  target: SupervisorState,
): TransitionResult<SupervisorState> {
  const validTargets = VALID_SUPERVISOR_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    const error = unexpectedError(new Error(`Invalid supervisor state transition: ${current} -> ${target}`));
    error.details = { current, target, validTargets };
    return { success: false, error };
  }
  return { success: true, newStatus: target };
}
