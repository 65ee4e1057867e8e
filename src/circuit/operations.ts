import { z } from "zod";

import { OperationTypeError } from "../dag/errors.js";
import {
  copyMatrix,
  Gate,
  Instruction,
  matricesEqual,
  StandardGate,
  StandardInstruction,
  UnitaryGate,
  type ComplexMatrix,
  type OperationObject,
} from "./instruction.js";
import { toParam, type Param } from "./parameters.js";
import {
  standardGateSpec,
  standardInstructionSpec,
  type StandardGateName,
  type StandardInstructionName,
} from "./standard.js";

/**
 * Compact descriptor stored by an operation node. Fixed catalog entries are
 * plain values; generic and opaque operations keep a shared reference to the
 * caller's object; unitaries keep their matrix.
 */
export type PackedOperation =
  | { readonly kind: "standard-gate"; readonly gate: StandardGateName }
  | {
      readonly kind: "standard-instruction";
      readonly instruction: StandardInstructionName;
      readonly numQubits: number;
    }
  | { readonly kind: "gate"; readonly object: Gate }
  | { readonly kind: "instruction"; readonly object: Instruction }
  | { readonly kind: "operation"; readonly object: OperationObject }
  | { readonly kind: "unitary"; readonly matrix: ComplexMatrix };

export type PackedOperationKind = PackedOperation["kind"];

/** Result of {@link extractOperation}. */
export interface ExtractedOperation {
  readonly operation: PackedOperation;
  readonly params: Param[];
  readonly label: string | null;
}

const isFunction = (value: unknown): value is (...args: never[]) => unknown => typeof value === "function";

/** Structural shape accepted for opaque, caller-defined operation objects. */
const OperationObjectSchema = z
  .object({
    name: z.string().min(1, "operation name must not be empty"),
    numQubits: z.number().int().nonnegative(),
    numClbits: z.number().int().nonnegative(),
    params: z
      .array(z.union([z.number(), z.custom<object>((value) => typeof value === "object" && value !== null)]))
      .optional(),
    label: z.string().nullable().optional(),
    equals: z.custom<OperationObject["equals"]>(isFunction, "equals() must be a function"),
    clone: z.custom<OperationObject["clone"]>(isFunction, "clone() must be a function"),
  })
  .passthrough();

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

/** True when the value can be wrapped as an opaque operation. */
export function isOperationObject(value: unknown): value is OperationObject {
  return OperationObjectSchema.safeParse(value).success;
}

/**
 * Converts a live operation value into its packed descriptor, parameters and
 * label. Catalog objects whose name still matches their catalog entry become
 * fixed descriptors; other objects are kept by reference.
 *
 * @throws OperationTypeError when the value is not a recognised operation shape.
 */
export function extractOperation(value: unknown): ExtractedOperation {
  if (value instanceof StandardGate && value.name === value.gate) {
    return { operation: { kind: "standard-gate", gate: value.gate }, params: [...value.params], label: value.label };
  }
  if (value instanceof StandardInstruction && value.name === value.instruction) {
    return {
      operation: { kind: "standard-instruction", instruction: value.instruction, numQubits: value.numQubits },
      params: [...value.params],
      label: value.label,
    };
  }
  if (value instanceof UnitaryGate && value.name === "unitary") {
    return { operation: { kind: "unitary", matrix: value.matrix }, params: [], label: value.label };
  }
  if (value instanceof Gate) {
    return { operation: { kind: "gate", object: value }, params: [...value.params], label: value.label };
  }
  if (value instanceof Instruction) {
    return { operation: { kind: "instruction", object: value }, params: [...value.params], label: value.label };
  }

  if (!isOperationObject(value)) {
    const parsed = OperationObjectSchema.safeParse(value);
    const issues = parsed.success
      ? []
      : parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new OperationTypeError(
      `expected an operation object, received ${describeValue(value)}`,
      issues,
      "pass an Instruction, a Gate or an object exposing name, numQubits, numClbits, equals() and clone()",
    );
  }
  return {
    operation: { kind: "operation", object: value },
    params: (value.params ?? []).map(toParam),
    label: value.label ?? null,
  };
}

/** Object held by a generic or opaque descriptor, `null` for the others. */
function heldObject(operation: PackedOperation): OperationObject | null {
  switch (operation.kind) {
    case "gate":
    case "instruction":
    case "operation":
      return operation.object;
    default:
      return null;
  }
}

export function operationName(operation: PackedOperation): string {
  switch (operation.kind) {
    case "standard-gate":
      return operation.gate;
    case "standard-instruction":
      return operation.instruction;
    case "unitary":
      return "unitary";
    case "gate":
    case "instruction":
    case "operation":
      return operation.object.name;
  }
}

export function operationNumQubits(operation: PackedOperation): number {
  switch (operation.kind) {
    case "standard-gate":
      return standardGateSpec(operation.gate).numQubits;
    case "standard-instruction":
      return operation.numQubits;
    case "unitary":
      return Math.log2(operation.matrix.length);
    case "gate":
    case "instruction":
    case "operation":
      return operation.object.numQubits;
  }
}

export function operationNumClbits(operation: PackedOperation): number {
  switch (operation.kind) {
    case "standard-gate":
    case "unitary":
      return 0;
    case "standard-instruction":
      return standardInstructionSpec(operation.instruction).numClbits;
    case "gate":
    case "instruction":
    case "operation":
      return operation.object.numClbits;
  }
}

/** Fixed catalog descriptors, whose parameters nodes compare themselves. */
export function isFixedOperation(operation: PackedOperation): boolean {
  return operation.kind === "standard-gate" || operation.kind === "standard-instruction";
}

export function isDirectiveOperation(operation: PackedOperation): boolean {
  switch (operation.kind) {
    case "standard-instruction":
      return standardInstructionSpec(operation.instruction).directive;
    default:
      return heldObject(operation)?.isDirective === true;
  }
}

export function isControlFlowOperation(operation: PackedOperation): boolean {
  return heldObject(operation)?.isControlFlow === true;
}

export function isControlledOperation(operation: PackedOperation): boolean {
  switch (operation.kind) {
    case "standard-gate":
      return standardGateSpec(operation.gate).controlled;
    default:
      return heldObject(operation)?.isControlled === true;
  }
}

/**
 * Descriptor-level equality. Fixed descriptors compare their catalog entry
 * only (their parameters are checked by the caller); generic and opaque
 * descriptors delegate to the object's own `equals`, which covers their
 * parameters; unitaries compare matrices with the given tolerance.
 */
export function operationsEqual(a: PackedOperation, b: PackedOperation, tolerance: number): boolean {
  switch (a.kind) {
    case "standard-gate":
      return b.kind === "standard-gate" && a.gate === b.gate;
    case "standard-instruction":
      return b.kind === "standard-instruction" && a.instruction === b.instruction && a.numQubits === b.numQubits;
    case "unitary":
      return b.kind === "unitary" && matricesEqual(a.matrix, b.matrix, tolerance);
    case "gate":
    case "instruction":
    case "operation":
      return b.kind === a.kind && a.object.equals(b.object);
  }
}

/**
 * Rebuilds a descriptor with no backing state shared with the source. Fixed
 * descriptors are immutable values and are returned as they are.
 */
export function duplicateOperation(operation: PackedOperation): PackedOperation {
  switch (operation.kind) {
    case "standard-gate":
    case "standard-instruction":
      return operation;
    case "unitary":
      return { kind: "unitary", matrix: copyMatrix(operation.matrix) };
    case "gate":
      return { kind: "gate", object: operation.object.clone() };
    case "instruction":
      return { kind: "instruction", object: operation.object.clone() };
    case "operation":
      return { kind: "operation", object: operation.object.clone() };
  }
}

/**
 * Builds the operation object a caller sees for a descriptor. Generic and
 * opaque descriptors hand back the stored object itself.
 */
export function materializeOperation(
  operation: PackedOperation,
  params: readonly Param[],
  label: string | null,
): OperationObject {
  switch (operation.kind) {
    case "standard-gate":
      return new StandardGate(operation.gate, params, label);
    case "standard-instruction":
      return new StandardInstruction(operation.instruction, { numQubits: operation.numQubits, params, label });
    case "unitary":
      return new UnitaryGate(operation.matrix, label);
    case "gate":
    case "instruction":
    case "operation":
      return operation.object;
  }
}

/** Applies a new name to a live operation object. */
export function renameOperation(object: OperationObject, name: string): void {
  if (typeof name !== "string" || name.length === 0) {
    throw new OperationTypeError("operation name must be a non-empty string", [], "pass a non-empty name");
  }
  object.name = name;
}

/**
 * Operation object that nothing else references: a clone of the held object
 * for generic and opaque descriptors, a fresh materialisation otherwise.
 */
export function ownedOperationObject(
  operation: PackedOperation,
  params: readonly Param[],
  label: string | null,
): OperationObject {
  const held = heldObject(operation);
  return held === null ? materializeOperation(operation, params, label) : held.clone();
}

/**
 * Parameter count fixed by the catalog entry behind a descriptor, including
 * renamed catalog objects. `null` when the descriptor takes any count.
 */
export function expectedParamCount(operation: PackedOperation): number | null {
  switch (operation.kind) {
    case "standard-gate":
      return standardGateSpec(operation.gate).numParams;
    case "standard-instruction":
      return standardInstructionSpec(operation.instruction).numParams;
    case "unitary":
      return 0;
    case "gate":
      if (operation.object instanceof StandardGate) {
        return standardGateSpec(operation.object.gate).numParams;
      }
      return operation.object instanceof UnitaryGate ? 0 : null;
    case "instruction":
      return operation.object instanceof StandardInstruction
        ? standardInstructionSpec(operation.object.instruction).numParams
        : null;
    case "operation":
      return null;
  }
}

/**
 * Descriptor carrying new parameters and label. Generic objects are cloned
 * and the clone updated, leaving the original untouched for whoever else
 * holds it. Fixed and unitary descriptors carry neither and come back as
 * they are. Opaque objects keep their own parameters and label read-only.
 */
export function withPayload(
  operation: PackedOperation,
  params: readonly Param[],
  label: string | null,
): PackedOperation {
  switch (operation.kind) {
    case "gate": {
      const object = operation.object.clone();
      object.params = [...params];
      object.label = label;
      return { kind: "gate", object };
    }
    case "instruction": {
      const object = operation.object.clone();
      object.params = [...params];
      object.label = label;
      return { kind: "instruction", object };
    }
    case "operation":
      throw new OperationTypeError(
        `opaque operation '${operation.object.name}' does not accept new parameters or labels`,
        [],
        "assign a new operation object through op instead",
      );
    default:
      return operation;
  }
}

/**
 * Matrix of the operation when one is available without synthesis: the
 * stored matrix of a unitary, or whatever a generic object reports. Fixed
 * catalog gates report `null`.
 */
export function operationMatrix(operation: PackedOperation): ComplexMatrix | null {
  switch (operation.kind) {
    case "unitary":
      return operation.matrix;
    default:
      return heldObject(operation)?.toMatrix?.() ?? null;
  }
}
