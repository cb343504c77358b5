// Engine error kinds. Nothing in the engine retries: every error reaches the caller.

export type BondErrorKind = 'InvalidInput' | 'Domain' | 'Convergence';

export abstract class BondEngineError extends Error {
  abstract readonly kind: BondErrorKind;
}

/** Malformed bond terms, shocks, prices or configuration. */
export class InvalidInputError extends BondEngineError {
  readonly kind = 'InvalidInput';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * A value outside the model's domain: a per-period discount base
 * `1 + y/f` at or below zero, or a non-positive inflation index ratio.
 */
export class DomainError extends BondEngineError {
  readonly kind = 'Domain';

  constructor(
    message: string,
    public readonly value: number,
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export type ConvergenceFailure =
  | 'max-iterations'
  | 'flat-derivative'
  | 'domain'
  | 'no-bracket';

/** A root-find that stopped without meeting its tolerance. */
export class ConvergenceError extends BondEngineError {
  readonly kind = 'Convergence';

  constructor(
    message: string,
    public readonly reason: ConvergenceFailure,
    public readonly iterations: number,
    public readonly lastEstimate: number,
  ) {
    super(message);
    this.name = 'ConvergenceError';
  }
}

export function isBondEngineError(err: unknown): err is BondEngineError {
  return err instanceof BondEngineError;
}

export function assertFinite(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${field} must be a finite number (got ${value})`, field);
  }
}
