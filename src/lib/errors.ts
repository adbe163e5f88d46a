/**
 * Grader Error Taxonomy
 * Every error raised while parsing, evaluating or grading a submission.
 *
 * Student-facing errors carry a message that is shown verbatim; ConfigError
 * marks an authoring mistake and is never turned into student feedback.
 */

// =============================================================================
// KINDS
// =============================================================================

export type ErrorKind =
  | "ParseError"
  | "UnknownIdentifier"
  | "DomainError"
  | "OverflowError"
  | "ZeroDivisionError"
  | "ShapeError"
  | "InvalidInput"
  | "InputType"
  | "ConfigError";

/** Why a parse failed */
export type ParseFailure =
  | "unbalanced_brackets"
  | "empty_expression"
  | "invalid_character"
  | "missing_operand"
  | "missing_operator"
  | "function_call";

// =============================================================================
// ERROR CLASSES
// =============================================================================

export abstract class GraderError extends Error {
  abstract readonly kind: ErrorKind;

  /** Whether the message may be shown to a student as-is */
  get studentFacing(): boolean {
    return true;
  }
}

export class ParseError extends GraderError {
  readonly kind = "ParseError";

  constructor(
    message: string,
    readonly reason: ParseFailure,
    readonly start: number,
    readonly end: number = start + 1,
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/** Which role an unknown name was interpreted in */
export type IdentifierRole = "variable" | "function" | "suffix";

export class UnknownIdentifierError extends GraderError {
  readonly kind = "UnknownIdentifier";

  constructor(
    message: string,
    readonly role: IdentifierRole,
    readonly names: string[],
  ) {
    super(message);
    this.name = "UnknownIdentifierError";
  }
}

export class DomainError extends GraderError {
  readonly kind = "DomainError";

  constructor(message: string) {
    super(message);
    this.name = "DomainError";
  }
}

export class OverflowError extends GraderError {
  readonly kind = "OverflowError";

  constructor(
    message = "Numerical overflow occurred. Does your expression generate very large numbers?",
  ) {
    super(message);
    this.name = "OverflowError";
  }
}

export class ZeroDivisionError extends GraderError {
  readonly kind = "ZeroDivisionError";

  constructor(message = "Division by zero occurred. Check your input's denominators.") {
    super(message);
    this.name = "ZeroDivisionError";
  }
}

export class ShapeError extends GraderError {
  readonly kind = "ShapeError";

  constructor(message: string) {
    super(message);
    this.name = "ShapeError";
  }
}

export class InvalidInputError extends GraderError {
  readonly kind = "InvalidInput";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/** An integral that cannot be computed, as opposed to an integrand that cannot be evaluated */
export class IntegrationError extends InvalidInputError {
  constructor(message: string) {
    super(message);
    this.name = "IntegrationError";
  }
}

export class SummationError extends InvalidInputError {
  constructor(message: string) {
    super(message);
    this.name = "SummationError";
  }
}

/** A submission of the wrong type or shape for the comparison being made */
export class InputTypeError extends GraderError {
  readonly kind = "InputType";

  constructor(message: string) {
    super(message);
    this.name = "InputTypeError";
  }
}

export class ConfigError extends GraderError {
  readonly kind = "ConfigError";

  override get studentFacing(): boolean {
    return false;
  }

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isGraderError(error: unknown): error is GraderError {
  return error instanceof GraderError;
}

/** Errors a student expression may legitimately raise during one trial */
export function isEvaluationError(error: unknown): error is GraderError {
  return isGraderError(error) && error.kind !== "ConfigError" && error.kind !== "ParseError";
}

/** Extract a message from any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
