/**
 * Error types shared by the math core and the subgraph client.
 */

export type DomainErrorKind = "degenerate-range" | "non-invertible";

/**
 * Raised when a formula hits an algebraic singularity (zero-width range,
 * vanishing solver denominator). Out-of-range prices are clamped, never
 * reported through this error.
 */
export class DomainError extends Error {
  readonly kind: DomainErrorKind;

  constructor(kind: DomainErrorKind, message: string) {
    super(message);
    this.name = "DomainError";
    this.kind = kind;
  }
}

export class SubgraphError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SubgraphError";
    this.attempts = attempts;
  }
}

export class NotFoundError extends Error {
  readonly entity: "pool" | "position";
  readonly id: string;

  constructor(entity: "pool" | "position", id: string) {
    super(`${entity} not found: ${id}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Non-fatal quality signal: two derivations of the same quantity disagree
 * by more than the accepted relative tolerance.
 */
export interface PrecisionWarning {
  quantity: string;
  expected: number;
  actual: number;
  relativeError: number;
  tolerance: number;
}
