import type { ErrorKind } from './guard-types.js';

// Custom error types for the structuring pipeline
export abstract class GuardError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
  }
}

/** Prompt layout not recognised, or a history turn could not be parsed */
export class SegmentationError extends GuardError {
  readonly kind = 'SegmentationError' as const;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'SegmentationError';
  }
}

/** Malformed identity marker or record inside an otherwise parsed turn */
export class IdentityResolutionError extends GuardError {
  readonly kind = 'IdentityResolutionError' as const;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'IdentityResolutionError';
  }
}

export class ConfigurationError extends GuardError {
  readonly kind = 'ConfigurationError' as const;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigurationError';
  }
}

export function isGuardError(error: unknown): error is GuardError {
  return error instanceof GuardError;
}
