// ============================================================
// Error Types
// ============================================================

/**
 * A value outside a closed enum (trend class, direction, pattern bias).
 * This is a contract violation by the caller, never a recoverable state.
 */
export class InvalidEnumError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    public readonly allowed: readonly string[],
  ) {
    super(`Invalid ${field}: ${JSON.stringify(value)} (expected one of ${allowed.join(', ')})`);
    this.name = 'InvalidEnumError';
  }
}

/** Raised by the candidate loader when an input record fails validation. */
export class CandidateValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[],
  ) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message);
    this.name = 'CandidateValidationError';
  }
}

/** Type guard for a closed string enum; throws InvalidEnumError when the value is outside it. */
export function assertOneOf<T extends string>(
  field: string,
  value: unknown,
  allowed: readonly T[],
): asserts value is T {
  if (typeof value !== 'string' || !allowed.some((a) => a === value)) {
    throw new InvalidEnumError(field, value, allowed);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
