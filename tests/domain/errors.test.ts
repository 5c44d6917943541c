import {
  ReaperError,
  createTypedError,
  directoryUnavailableError,
  emptySnapshotError,
  failsafeExceededError,
  isCycleErrorCode,
  isReaperError,
  notifyFailedError,
  pagingUnsupportedError,
  platformUnavailableError,
  revokeFailedError,
  unexpectedError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError fills defaults', () => {
    const error = createTypedError({ code: 'SYSTEM.UNEXPECTED', message: 'boom' });
    expect(error).toEqual({
      code: 'SYSTEM.UNEXPECTED',
      message: 'boom',
      retryable: false,
      details: undefined,
      suggestedFixes: [],
    });
  });

  test('directoryUnavailableError is retryable', () => {
    const error = directoryUnavailableError('bind failed', { url: 'ldaps://dir.example.test' });
    expect(error.code).toBe('DIRECTORY.UNAVAILABLE');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ url: 'ldaps://dir.example.test' });
  });

  test('pagingUnsupportedError is not retryable', () => {
    const error = pagingUnsupportedError({ pages: 1 });
    expect(error.code).toBe('DIRECTORY.PAGING_UNSUPPORTED');
    expect(error.retryable).toBe(false);
  });

  test('platformUnavailableError suggests checking the token on 401', () => {
    const error = platformUnavailableError('denied', { statusCode: 401 });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes[0].type).toBe('CHECK_API_TOKEN');
  });

  test('platformUnavailableError treats network failures and 5xx as retryable', () => {
    expect(platformUnavailableError('reset').retryable).toBe(true);
    expect(platformUnavailableError('bad gateway', { statusCode: 502 }).retryable).toBe(true);
  });

  test('failsafeExceededError reports the ratio and bound', () => {
    const error = failsafeExceededError(10, 10, 1, 0.2);
    expect(error.code).toBe('RECONCILE.FAILSAFE_EXCEEDED');
    expect(error.message).toBe(
      'The failsafe threshold for revoking too many accounts was reached (10/10 = 1.000 > 0.2). No accounts were revoked.',
    );
    expect(error.details).toEqual({ candidateCount: 10, accountCount: 10, ratio: 1, maxDeleteFailsafe: 0.2 });
  });

  test('per-candidate errors carry the affected id', () => {
    expect(revokeFailedError('U1', 'timeout').message).toBe('Failed to revoke U1: timeout');
    expect(notifyFailedError('U2', 'channel_not_found').details).toEqual({ recipientId: 'U2' });
  });

  test('unexpectedError keeps the thrown message', () => {
    expect(unexpectedError(new TypeError('x is undefined')).message).toBe('x is undefined');
    expect(unexpectedError('plain').message).toBe('plain');
    expect(unexpectedError(42).message).toBe('unknown error');
  });
});

describe('error classification', () => {
  test('cycle-level codes', () => {
    expect(isCycleErrorCode('DIRECTORY.UNAVAILABLE')).toBe(true);
    expect(isCycleErrorCode('DIRECTORY.PAGING_UNSUPPORTED')).toBe(true);
    expect(isCycleErrorCode('PLATFORM.UNAVAILABLE')).toBe(true);
    expect(isCycleErrorCode('RECONCILE.FAILSAFE_EXCEEDED')).toBe(true);
    expect(isCycleErrorCode('RECONCILE.EMPTY_SNAPSHOT')).toBe(true);
    expect(isCycleErrorCode('SYSTEM.UNEXPECTED')).toBe(true);
  });

  test('per-candidate and startup codes are not cycle-level', () => {
    expect(isCycleErrorCode('ACCOUNT.REVOKE_FAILED')).toBe(false);
    expect(isCycleErrorCode('ACCOUNT.NOTIFY_FAILED')).toBe(false);
    expect(isCycleErrorCode('CONFIG.INVALID')).toBe(false);
  });

  test('isReaperError filters by code', () => {
    const err = new ReaperError(emptySnapshotError());
    expect(isReaperError(err)).toBe(true);
    expect(isReaperError(err, 'RECONCILE.EMPTY_SNAPSHOT')).toBe(true);
    expect(isReaperError(err, 'DIRECTORY.UNAVAILABLE', 'PLATFORM.UNAVAILABLE')).toBe(false);
    expect(isReaperError(new Error('plain'))).toBe(false);
  });

  test('ReaperError exposes the typed error', () => {
    const err = new ReaperError(pagingUnsupportedError());
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ReaperError');
    expect(err.code).toBe('DIRECTORY.PAGING_UNSUPPORTED');
    expect(err.message).toBe(err.typedError.message);
  });
});
