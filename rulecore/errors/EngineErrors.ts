// rulecore/errors/EngineErrors.ts
//
// Error kinds raised by the core. Game-rule failures (misses, bad targets,
// "no matching action") are never thrown; they come back as ExecutionResult
// data. These classes cover malformed input and real faults.

export type EngineErrorKind =
  | "ValidationError"
  | "ExecutionFailure"
  | "StateInvariantViolation"
  | "TransactionConflict"
  | "DuplicateRegistrationError"
  | "DuplicateConceptError"
  | "ConceptNotFoundError";

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends EngineError {
  readonly kind = "ValidationError";

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

export class DiceExpressionError extends ValidationError {
  constructor(readonly expression: string, reason: string) {
    super(`Invalid dice expression "${expression}": ${reason}`, [reason]);
  }
}

/** A game function threw while computing its result. */
export class ExecutionFailure extends EngineError {
  readonly kind = "ExecutionFailure";

  constructor(readonly functionName: string, cause: unknown) {
    super(
      `Function "${functionName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class StateInvariantViolation extends EngineError {
  readonly kind = "StateInvariantViolation";

  constructor(readonly violations: string[]) {
    super(`State invariant violated: ${violations.join("; ")}`);
  }
}

/** A second transaction was opened on a GameState that already has one. */
export class TransactionConflict extends EngineError {
  readonly kind = "TransactionConflict";

  constructor(readonly sessionId: string, readonly openTransactionId: string) {
    super(`Session ${sessionId} already has open transaction ${openTransactionId}`);
  }
}

export class DuplicateRegistrationError extends EngineError {
  readonly kind = "DuplicateRegistrationError";

  constructor(readonly functionName: string) {
    super(`Function "${functionName}" is already registered`);
  }
}

export class DuplicateConceptError extends EngineError {
  readonly kind = "DuplicateConceptError";

  constructor(readonly conceptType: string, readonly conceptName: string) {
    super(`Concept ${conceptType}:"${conceptName}" already exists`);
  }
}

export class ConceptNotFoundError extends EngineError {
  readonly kind = "ConceptNotFoundError";

  constructor(readonly conceptName: string, readonly conceptType?: string) {
    super(
      conceptType
        ? `Concept ${conceptType}:"${conceptName}" does not exist`
        : `Concept "${conceptName}" does not exist`,
    );
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
