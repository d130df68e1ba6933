/**
 * Terminal values of the language.
 *
 * A value is the result of fully evaluating an expression: a string, a
 * boolean or a 64-bit signed integer. Values are immutable once built.
 *
 * @module
 */

export interface StringValue {
  kind: "string";
  value: string;
}

export interface BooleanValue {
  kind: "boolean";
  value: boolean;
}

/**
 * A 64-bit signed integer. Constructors wrap their input to int64.
 */
export interface IntegerValue {
  kind: "integer";
  value: bigint;
}

export type Value = StringValue | BooleanValue | IntegerValue;

export type ValueKind = Value["kind"];

export const mkString = (value: string): StringValue => ({
  kind: "string",
  value,
});

export const mkBoolean = (value: boolean): BooleanValue => ({
  kind: "boolean",
  value,
});

export const mkInteger = (value: bigint | number): IntegerValue => ({
  kind: "integer",
  value: BigInt.asIntN(64, BigInt(value)),
});

export const valuesEqual = (lft: Value, rgt: Value): boolean =>
  lft.kind === rgt.kind && lft.value === rgt.value;

/**
 * Renders a value for humans: decimal integers, JSON-quoted strings and
 * `true`/`false`.
 */
export const prettyPrintValue = (value: Value): string => {
  switch (value.kind) {
    case "string":
      return JSON.stringify(value.value);
    case "boolean":
      return value.value ? "true" : "false";
    case "integer":
      return value.value.toString();
  }
};
