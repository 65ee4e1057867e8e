import { randomUUID } from "node:crypto";

/** Any caller-owned value able to compare itself with another value. */
export interface Equatable {
  equals(other: unknown): boolean;
}

/**
 * Symbolic parameter expression. Evaluation and binding live outside the node
 * layer; nodes only compare expressions through {@link Equatable.equals}.
 */
export interface ParameterExpression extends Equatable {
  readonly isParameterExpression: true;
  toString(): string;
}

/** Parameter attached to an instruction. */
export type Param =
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "expression"; readonly expression: ParameterExpression }
  | { readonly kind: "object"; readonly value: Equatable };

/** Values accepted wherever a parameter is expected. */
export type ParamLike = Param | number | ParameterExpression | Equatable;

/** Minimal free symbol. Two symbols are equal when name and uuid match. */
export class SymbolicParameter implements ParameterExpression {
  readonly isParameterExpression = true as const;

  constructor(
    readonly name: string,
    readonly uuid: string = randomUUID(),
  ) {}

  equals(other: unknown): boolean {
    return other instanceof SymbolicParameter && other.name === this.name && other.uuid === this.uuid;
  }

  toString(): string {
    return this.name;
  }
}

export function floatParam(value: number): Param {
  return { kind: "float", value };
}

export function expressionParam(expression: ParameterExpression): Param {
  return { kind: "expression", expression };
}

export function objectParam(value: Equatable): Param {
  return { kind: "object", value };
}

function isTaggedParam(value: Exclude<ParamLike, number>): value is Param {
  if (!("kind" in value)) {
    return false;
  }
  switch (value.kind) {
    case "float":
      return "value" in value && typeof value.value === "number";
    case "expression":
      return "expression" in value;
    case "object":
      return "value" in value;
    default:
      return false;
  }
}

function isParameterExpression(value: Equatable): value is ParameterExpression {
  return "isParameterExpression" in value && value.isParameterExpression === true;
}

/** Wraps a plain number, expression or opaque object into a {@link Param}. */
export function toParam(value: ParamLike): Param {
  if (typeof value === "number") {
    return floatParam(value);
  }
  if (isTaggedParam(value)) {
    return value;
  }
  if (isParameterExpression(value)) {
    return expressionParam(value);
  }
  return objectParam(value);
}

/**
 * Relative floating point comparison: exact matches and differences within
 * machine epsilon are equal, otherwise the difference must stay within
 * `maxRelative` times the larger magnitude. Infinities only equal themselves
 * and NaN only equals NaN, which keeps node equality reflexive.
 */
export function relativeEq(a: number, b: number, maxRelative: number): boolean {
  if (a === b || Object.is(a, b)) {
    return true;
  }
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    return false;
  }
  const diff = Math.abs(a - b);
  if (diff <= Number.EPSILON) {
    return true;
  }
  const largest = Math.max(Math.abs(a), Math.abs(b));
  return diff <= largest * maxRelative;
}

/**
 * Compares two parameters of the same slot. Floats use {@link relativeEq},
 * expressions and opaque objects delegate to their own equality, and
 * mismatched kinds are never equal (a float is not equal to an expression
 * bound to the same value).
 */
export function paramEquals(a: Param, b: Param, tolerance: number): boolean {
  if (a.kind === "float" && b.kind === "float") {
    return relativeEq(a.value, b.value, tolerance);
  }
  if (a.kind === "expression" && b.kind === "expression") {
    return a.expression.equals(b.expression);
  }
  if (a.kind === "object" && b.kind === "object") {
    return a.value.equals(b.value);
  }
  return false;
}

/** Pairwise {@link paramEquals}; lists of different length are unequal. */
export function paramsEqual(a: readonly Param[], b: readonly Param[], tolerance: number): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((param, index) => {
    const other = b[index];
    return other !== undefined && paramEquals(param, other, tolerance);
  });
}

/** True when at least one parameter is a symbolic expression. */
export function isParameterized(params: readonly Param[]): boolean {
  return params.some((param) => param.kind === "expression");
}

export function describeParam(param: Param): string {
  switch (param.kind) {
    case "float":
      return String(param.value);
    case "expression":
      return param.expression.toString();
    case "object":
      return String(param.value);
  }
}
