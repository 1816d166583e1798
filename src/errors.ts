// Error types for text layout and panel composition

/**
 * Ensure a value is an Error instance.
 * Converts non-Error values to Error with String representation.
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export type PanetextErrorCode = 'UNIMPLEMENTED_POLICY' | 'INVALID_POLICY';

export class PanetextError extends Error {
  constructor(message: string, public readonly code: PanetextErrorCode) {
    super(message);
    this.name = 'PanetextError';
  }
}

/**
 * Raised for wrap policies that are declared but have no layout algorithm.
 * Callers that want to branch instead of catch use isWrapPolicySupported().
 */
export class UnimplementedPolicyError extends PanetextError {
  constructor(public readonly policy: string) {
    super(`Wrap policy "${policy}" is not implemented`, 'UNIMPLEMENTED_POLICY');
    this.name = 'UnimplementedPolicyError';
  }
}

export class InvalidPolicyError extends PanetextError {
  constructor(public readonly value: string, validPolicies: readonly string[]) {
    super(`Unknown wrap policy "${value}". Valid policies: ${validPolicies.join(', ')}`, 'INVALID_POLICY');
    this.name = 'InvalidPolicyError';
  }
}
