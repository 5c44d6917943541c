import { ESCALATION_FIRST_AT, ESCALATION_PERIOD, escalationMessage, shouldEscalate } from '../../src/engine/escalation';

describe('shouldEscalate', () => {
  test('fires at 4, 52 and 100 consecutive failures', () => {
    const fired = Array.from({ length: 120 }, (_, i) => i).filter(shouldEscalate);
    expect(fired).toEqual([4, 52, 100]);
  });

  test('never fires for zero failures', () => {
    expect(shouldEscalate(0)).toBe(false);
  });

  test('cadence constants', () => {
    expect(ESCALATION_FIRST_AT).toBe(4);
    expect(ESCALATION_PERIOD).toBe(48);
  });
});

describe('escalationMessage', () => {
  test('names the count and the latest failure', () => {
    expect(escalationMessage(4, { code: 'DIRECTORY.UNAVAILABLE', message: 'Directory bind failed: timeout' })).toBe(
      'Workspace reconciliation has failed 4 times in a row; no accounts are being revoked until it recovers. ' +
        'Latest failure [DIRECTORY.UNAVAILABLE]: Directory bind failed: timeout',
    );
  });
});
