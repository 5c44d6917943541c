/**
 * Typed error model.
 *
 * Every failure the reaper can observe maps to one code in a closed union,
 * so the supervisor can decide how to react with an exhaustive switch
 * instead of inspecting arbitrary exceptions.
 */

/** Closed set of error codes. */
export type ReaperErrorCode =
  | 'DIRECTORY.UNAVAILABLE'
  | 'DIRECTORY.PAGING_UNSUPPORTED'
  | 'PLATFORM.UNAVAILABLE'
  | 'RECONCILE.FAILSAFE_EXCEEDED'
  | 'RECONCILE.EMPTY_SNAPSHOT'
  | 'ACCOUNT.REVOKE_FAILED'
  | 'ACCOUNT.NOTIFY_FAILED'
  | 'SYSTEM.UNEXPECTED'
  | 'CONFIG.INVALID';

/** Codes that abort a whole reconciliation cycle. */
export type CycleErrorCode = Extract<
  ReaperErrorCode,
  | 'DIRECTORY.UNAVAILABLE'
  | 'DIRECTORY.PAGING_UNSUPPORTED'
  | 'PLATFORM.UNAVAILABLE'
  | 'RECONCILE.FAILSAFE_EXCEEDED'
  | 'RECONCILE.EMPTY_SNAPSHOT'
  | 'SYSTEM.UNEXPECTED'
>;

/** Typed suggested fix an operator can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure carried in logs, outcomes and the status API. */
export interface TypedError<C extends ReaperErrorCode = ReaperErrorCode> {
  /** Namespaced error code (e.g., "DIRECTORY.UNAVAILABLE"). */
  code: C;
  /** Human-readable error message. */
  message: string;
  /** Whether the next cycle is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError<C extends ReaperErrorCode>(params: {
  code: C;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError<C> {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Thrown wrapper around a TypedError. */
export class ReaperError<C extends ReaperErrorCode = ReaperErrorCode> extends Error {
  constructor(public readonly typedError: TypedError<C>) {
    super(typedError.message);
    this.name = 'ReaperError';
  }

  get code(): C {
    return this.typedError.code;
  }
}

/** Narrow an unknown thrown value to a ReaperError carrying one of the given codes. */
export function isReaperError<C extends ReaperErrorCode>(
  err: unknown,
  ...codes: C[]
): err is ReaperError<C> {
  if (!(err instanceof ReaperError)) return false;
  const actual: ReaperErrorCode = err.code;
  return codes.length === 0 || codes.some((code) => code === actual);
}

const CYCLE_ERROR_CODES: ReadonlySet<ReaperErrorCode> = new Set<CycleErrorCode>([
  'DIRECTORY.UNAVAILABLE',
  'DIRECTORY.PAGING_UNSUPPORTED',
  'PLATFORM.UNAVAILABLE',
  'RECONCILE.FAILSAFE_EXCEEDED',
  'RECONCILE.EMPTY_SNAPSHOT',
  'SYSTEM.UNEXPECTED',
]);

export function isCycleErrorCode(code: ReaperErrorCode): code is CycleErrorCode {
  return CYCLE_ERROR_CODES.has(code);
}

/** Extract a message from anything that was thrown. */
export function describeThrown(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'unknown error';
}

// --- Factory functions ---

export function directoryUnavailableError(message: string, details?: Record<string, unknown>): TypedError<'DIRECTORY.UNAVAILABLE'> {
  return createTypedError({
    code: 'DIRECTORY.UNAVAILABLE',
    message,
    retryable: true,
    details,
    suggestedFixes: [
      { type: 'CHECK_DIRECTORY_CONNECTIVITY', params: {}, description: 'Verify the directory URL, TLS trust and bind credentials.' },
    ],
  });
}

export function pagingUnsupportedError(details?: Record<string, unknown>): TypedError<'DIRECTORY.PAGING_UNSUPPORTED'> {
  return createTypedError({
    code: 'DIRECTORY.PAGING_UNSUPPORTED',
    message: 'Directory ignored the paged results control; refusing to use a possibly truncated member list',
    retryable: false,
    details,
    suggestedFixes: [
      { type: 'ENABLE_PAGED_RESULTS', params: {}, description: 'Use a directory server that honors RFC 2696 paged results.' },
    ],
  });
}

export function platformUnavailableError(message: string, details?: Record<string, unknown>): TypedError<'PLATFORM.UNAVAILABLE'> {
  const statusCode = typeof details?.statusCode === 'number' ? details.statusCode : undefined;
  const fixes: SuggestedFix[] = [];
  if (statusCode === 401 || statusCode === 403) {
    fixes.push({ type: 'CHECK_API_TOKEN', params: { statusCode }, description: 'Verify the platform token and its scopes.' });
  } else {
    fixes.push({ type: 'WAIT_AND_RETRY', params: {}, description: 'Platform unreachable; the next cycle retries.' });
  }
  return createTypedError({
    code: 'PLATFORM.UNAVAILABLE',
    message,
    retryable: statusCode === undefined || statusCode === 429 || statusCode >= 500,
    details,
    suggestedFixes: fixes,
  });
}

export function failsafeExceededError(
  candidateCount: number,
  accountCount: number,
  ratio: number,
  maxDeleteFailsafe: number,
): TypedError<'RECONCILE.FAILSAFE_EXCEEDED'> {
  return createTypedError({
    code: 'RECONCILE.FAILSAFE_EXCEEDED',
    message:
      `The failsafe threshold for revoking too many accounts was reached ` +
      `(${candidateCount}/${accountCount} = ${ratio.toFixed(3)} > ${maxDeleteFailsafe}). No accounts were revoked.`,
    retryable: false,
    details: { candidateCount, accountCount, ratio, maxDeleteFailsafe },
    suggestedFixes: [
      { type: 'VERIFY_DIRECTORY_FILTER', params: {}, description: 'Check that the directory search returns every active member.' },
    ],
  });
}

export function emptySnapshotError(): TypedError<'RECONCILE.EMPTY_SNAPSHOT'> {
  return createTypedError({
    code: 'RECONCILE.EMPTY_SNAPSHOT',
    message: 'Platform returned no accounts; refusing to evaluate the failsafe ratio against an empty snapshot',
    retryable: true,
  });
}

export function revokeFailedError(accountId: string, message: string, details?: Record<string, unknown>): TypedError<'ACCOUNT.REVOKE_FAILED'> {
  return createTypedError({
    code: 'ACCOUNT.REVOKE_FAILED',
    message: `Failed to revoke ${accountId}: ${message}`,
    retryable: true,
    details: { accountId, ...details },
  });
}

export function notifyFailedError(recipientId: string, message: string, details?: Record<string, unknown>): TypedError<'ACCOUNT.NOTIFY_FAILED'> {
  return createTypedError({
    code: 'ACCOUNT.NOTIFY_FAILED',
    message: `Failed to notify ${recipientId}: ${message}`,
    retryable: true,
    details: { recipientId, ...details },
  });
}

export function unexpectedError(err: unknown): TypedError<'SYSTEM.UNEXPECTED'> {
  return createTypedError({
    code: 'SYSTEM.UNEXPECTED',
    message: describeThrown(err),
    retryable: true,
    details: err instanceof Error && err.stack ? { stack: err.stack } : undefined,
  });
}

export function configInvalidError(message: string, issues: string[]): TypedError<'CONFIG.INVALID'> {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message,
    retryable: false,
    details: { issues },
    suggestedFixes: issues.map((issue) => ({ type: 'FIX_ENVIRONMENT', params: {}, description: issue })),
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with their
 * masked form.
 */
export function maskSecretsInMessage(message: string, secrets: readonly string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}
