import { transitionSupervisorState } from '../../src/engine/state-machine';
import { SupervisorState } from '../../src/domain/cycle';

describe('Supervisor State Machine', () => {
  test('valid transition: idle -> running', () => {
    const result = transitionSupervisorState(SupervisorState.Idle, SupervisorState.Running);
    expect(result.success).toBe(true);
    expect(result.newStatus).toBe(SupervisorState.Running);
  });

  test('valid transition: running -> idle', () => {
    const result = transitionSupervisorState(SupervisorState.Running, SupervisorState.Idle);
    expect(result.success).toBe(true);
    expect(result.newStatus).toBe(SupervisorState.Idle);
  });

  test('invalid transition: running -> running', () => {
    const result = transitionSupervisorState(SupervisorState.Running, SupervisorState.Running);
    expect(result.success).toBe(false);
    expect(result.newStatus).toBeUndefined();
    expect(result.error?.code).toBe('SYSTEM.UNEXPECTED');
    expect(result.error?.message).toBe('Invalid supervisor state transition: running -> running');
    expect(result.error?.details).toEqual({ current: 'running', target: 'running', validTargets: ['idle'] });
  });

  test('invalid transition: idle -> idle', () => {
    const result = transitionSupervisorState(SupervisorState.Idle, SupervisorState.Idle);
    expect(result.success).toBe(false);
  });
});
