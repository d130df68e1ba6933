/**
 * Evaluation error definitions.
 *
 * Every failure the evaluator can report carries a kind and the minimal
 * context needed to diagnose it. Evaluation halts at the first error.
 *
 * @module
 */
import type { Value, ValueKind } from "../terms/value.js";

export type EvaluationErrorKind =
  | "UnboundVariable"
  | "TypeMismatch"
  | "DivisionByZero"
  | "IndexOutOfRange"
  | "ApplyNonFunction"
  | "NonTermination"
  | "NonBooleanCondition";

export interface EvaluationErrorContext {
  /** Name of the operator being applied, e.g. `Add`. */
  operator?: string;
  expected?: ValueKind;
  actual?: ValueKind;
  /** The offending operand value. */
  value?: Value;
  /** The variable id that had no binding. */
  id?: bigint;
  /** The iteration budget that ran out. */
  limit?: number;
}

export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly kind: EvaluationErrorKind,
    public readonly context: EvaluationErrorContext = {},
  ) {
    super(message);
    this.name = "EvaluationError";
  }
}

export const typeMismatch = (
  operator: string,
  expected: ValueKind,
  value: Value,
): EvaluationError =>
  new EvaluationError(
    `${operator} expected ${expected} but received ${value.kind}`,
    "TypeMismatch",
    { operator, expected, actual: value.kind, value },
  );
