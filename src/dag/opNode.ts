import { getNodeConfig } from "../config/nodeConfig.js";
import type { ComplexMatrix, OperationObject } from "../circuit/instruction.js";
import {
  duplicateOperation,
  expectedParamCount,
  extractOperation,
  isOperationObject,
  isControlFlowOperation,
  isControlledOperation,
  isDirectiveOperation,
  isFixedOperation,
  materializeOperation,
  operationMatrix,
  operationName,
  operationNumClbits,
  operationNumQubits,
  operationsEqual,
  ownedOperationObject,
  renameOperation,
  withPayload,
  type ExtractedOperation,
  type PackedOperation,
} from "../circuit/operations.js";
import { isParameterized, paramsEqual, toParam, type Param, type ParamLike } from "../circuit/parameters.js";
import { wiresEqual, type Wire } from "../circuit/wires.js";
import { ERROR_CODES } from "../types.js";
import { NodeValidationError } from "./errors.js";
import { NodeHasher } from "./hash.js";
import { NodeHandle } from "./identity.js";
import { getNodeLogger } from "./log.js";
import type { DagNodeBehaviour, OperationNodeSnapshot } from "./types.js";

/**
 * Instruction payload carried by an operation node. The envelope belongs to
 * one node; the wires, generic operation objects and parameter objects it
 * references may be shared with other nodes.
 */
export interface CircuitInstruction {
  readonly operation: PackedOperation;
  readonly qubits: readonly Wire[];
  readonly clbits: readonly Wire[];
  readonly params: readonly Param[];
  readonly label: string | null;
  /** Operation object already materialised for this payload, if any. */
  readonly cachedOperation?: OperationObject;
}

export interface DeepCopyOptions {
  /** Rebuild the operation descriptor so nothing mutable is shared. */
  readonly deepcopy?: boolean;
}

/** Wraps a prepared payload so the constructor can skip extraction. */
class PreparedInstruction {
  constructor(readonly instruction: CircuitInstruction) {}
}

function copyInstruction(instruction: CircuitInstruction, deepcopy: boolean): CircuitInstruction {
  const copy: CircuitInstruction = {
    operation: deepcopy ? duplicateOperation(instruction.operation) : instruction.operation,
    qubits: [...instruction.qubits],
    clbits: [...instruction.clbits],
    params: [...instruction.params],
    label: instruction.label,
  };
  // A deep copy drops the cache so the next read materialises from the new descriptor.
  if (deepcopy || instruction.cachedOperation === undefined) {
    return copy;
  }
  return { ...copy, cachedOperation: instruction.cachedOperation };
}

/** Graph vertex wrapping an instruction. */
export class OperationNode implements DagNodeBehaviour {
  readonly kind = "op" as const;
  readonly handle: NodeHandle;

  private operation: PackedOperation;
  private qubits: readonly Wire[];
  private clbits: readonly Wire[];
  private parameters: readonly Param[];
  private instructionLabel: string | null;
  /** Lazily materialised operation object, reset by deep copies. */
  private cachedOperation: OperationObject | undefined;

  /**
   * Builds a detached node.
   *
   * @param op operation value converted through {@link extractOperation}
   * @throws OperationTypeError when `op` is not a recognised operation shape
   */
  constructor(op: unknown, qargs: Iterable<Wire> = [], cargs: Iterable<Wire> = []) {
    this.handle = new NodeHandle();
    if (op instanceof PreparedInstruction) {
      const { instruction } = op;
      this.operation = instruction.operation;
      this.qubits = instruction.qubits;
      this.clbits = instruction.clbits;
      this.parameters = instruction.params;
      this.instructionLabel = instruction.label;
      this.cachedOperation = instruction.cachedOperation;
      return;
    }
    const extracted = this.extract(op);
    this.operation = extracted.operation;
    this.qubits = Array.from(qargs);
    this.clbits = Array.from(cargs);
    this.parameters = extracted.params;
    this.instructionLabel = extracted.label;
    this.cachedOperation = isOperationObject(op) ? op : undefined;
  }

  /**
   * Builds a detached node from an instruction payload. With `deepcopy` the
   * descriptor is rebuilt and the cached operation object is dropped.
   */
  static fromInstruction(instruction: CircuitInstruction, options: DeepCopyOptions = {}): OperationNode {
    const deepcopy = options.deepcopy ?? false;
    if (deepcopy) {
      getNodeLogger().debug("op_node_deep_copy", {
        name: operationName(instruction.operation),
        kind: instruction.operation.kind,
      });
    }
    return new OperationNode(new PreparedInstruction(copyInstruction(instruction, deepcopy)));
  }

  /** Rebuilds a node from its snapshot, restoring the recorded index. */
  static fromSnapshot(snapshot: OperationNodeSnapshot): OperationNode {
    const [op, qargs, cargs] = snapshot.args;
    const node = new OperationNode(op, qargs, cargs);
    node.handle.restoreRawIndex(snapshot.index);
    return node;
  }

  /** Payload view of this node. With `deepcopy` nothing mutable is shared. */
  toCircuitInstruction(options: DeepCopyOptions = {}): CircuitInstruction {
    return copyInstruction(this.currentInstruction(), options.deepcopy ?? false);
  }

  /** Detached copy of this node, see {@link fromInstruction}. */
  duplicate(options: { readonly deep?: boolean } = {}): OperationNode {
    return OperationNode.fromInstruction(this.currentInstruction(), { deepcopy: options.deep ?? false });
  }

  /** Operation object for this node, materialised on first access. */
  get op(): OperationObject {
    if (this.cachedOperation === undefined) {
      this.cachedOperation = materializeOperation(this.operation, this.parameters, this.instructionLabel);
    }
    return this.cachedOperation;
  }

  /**
   * Replaces the operation. Parameters and label are refreshed from the new
   * value and the shape is validated again.
   */
  set op(value: unknown) {
    const extracted = this.extract(value);
    getNodeLogger().debug("op_node_operation_replaced", {
      index: this.handle.rawIndex,
      from: operationName(this.operation),
      to: operationName(extracted.operation),
    });
    this.operation = extracted.operation;
    this.parameters = extracted.params;
    this.instructionLabel = extracted.label;
    this.cachedOperation = isOperationObject(value) ? value : undefined;
  }

  /** Packed descriptor, mostly useful to graph passes and tests. */
  get descriptor(): PackedOperation {
    return this.operation;
  }

  get name(): string {
    return operationName(this.operation);
  }

  /**
   * Renames the operation. The new name is applied to an operation object
   * this node alone holds, which is then extracted again; the caller's object
   * and nodes sharing it keep their name. A renamed catalog gate no longer
   * matches its catalog entry and becomes a generic gate.
   */
  set name(newName: string) {
    const previous = this.name;
    const renamed = ownedOperationObject(this.operation, this.parameters, this.instructionLabel);
    renameOperation(renamed, newName);
    const extracted = this.extract(renamed);
    this.operation = extracted.operation;
    this.cachedOperation = renamed;
    getNodeLogger().debug("op_node_renamed", { index: this.handle.rawIndex, from: previous, to: newName });
  }

  get qargs(): readonly Wire[] {
    return this.qubits;
  }

  set qargs(value: Iterable<Wire>) {
    this.qubits = Array.from(value);
  }

  get cargs(): readonly Wire[] {
    return this.clbits;
  }

  set cargs(value: Iterable<Wire>) {
    this.clbits = Array.from(value);
  }

  get params(): readonly Param[] {
    return this.parameters;
  }

  /**
   * Replaces the parameters. Catalog operations must receive exactly the
   * count their entry declares; generic objects are updated on a private
   * clone.
   *
   * @throws NodeValidationError when the count does not fit the catalog entry
   * @throws OperationTypeError when the operation is an opaque object
   */
  set params(value: readonly ParamLike[]) {
    const params = value.map(toParam);
    const expected = expectedParamCount(this.operation);
    if (expected !== null && params.length !== expected) {
      getNodeLogger().warn("op_node_params_rejected", {
        index: this.handle.rawIndex,
        name: this.name,
        expected,
        received: params.length,
      });
      throw new NodeValidationError(
        ERROR_CODES.NODE_INVALID_PARAMS,
        `operation '${this.name}' takes ${expected} parameter(s), received ${params.length}`,
        { name: this.name, expected, received: params.length },
        "pass one value per parameter declared by the catalog entry",
      );
    }
    this.operation = this.repack(params, this.instructionLabel);
    this.parameters = params;
    this.cachedOperation = undefined;
  }

  get label(): string | null {
    return this.instructionLabel;
  }

  set label(value: string | null) {
    this.operation = this.repack(this.parameters, value);
    this.instructionLabel = value;
    this.cachedOperation = undefined;
  }

  get numQubits(): number {
    return operationNumQubits(this.operation);
  }

  get numClbits(): number {
    return operationNumClbits(this.operation);
  }

  /** Matrix reported by the descriptor, `null` when none is available. */
  get matrix(): ComplexMatrix | null {
    return operationMatrix(this.operation);
  }

  isStandardGate(): boolean {
    return this.operation.kind === "standard-gate";
  }

  isControlledGate(): boolean {
    return isControlledOperation(this.operation);
  }

  isDirective(): boolean {
    return isDirectiveOperation(this.operation);
  }

  isControlFlow(): boolean {
    return isControlFlowOperation(this.operation);
  }

  isParameterized(): boolean {
    return isParameterized(this.parameters);
  }

  /**
   * Identity-biased equality used for container membership, not semantic
   * equivalence. Two operation nodes are equal when:
   *
   * 1. their raw indices match (detached never equals attached);
   * 2. their descriptors are equal;
   * 3. for fixed catalog descriptors only, their parameters match pairwise
   *    (floats within the configured relative tolerance, expressions and
   *    objects through their own equality, mixed kinds never). Generic
   *    descriptors already compared their parameters in step 2;
   * 4. their qargs and cargs match element-wise.
   *
   * Tolerant float comparison makes this relation non-transitive.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof OperationNode)) {
      return false;
    }
    if (this.handle.rawIndex !== other.handle.rawIndex) {
      return false;
    }
    const tolerance = getNodeConfig().parameterTolerance;
    if (!operationsEqual(this.operation, other.operation, tolerance)) {
      return false;
    }
    if (isFixedOperation(this.operation) && !paramsEqual(this.parameters, other.parameters, tolerance)) {
      return false;
    }
    return wiresEqual(this.qubits, other.qubits) && wiresEqual(this.clbits, other.clbits);
  }

  /**
   * Hash over the raw index and the operation name only, coarser than
   * {@link equals}. Equal nodes always share index and name. Parameters must
   * stay out: tolerant float comparison equates values that hash apart.
   */
  hashCode(): number {
    return new NodeHasher().writeIndex(this.handle.rawIndex).writeString(this.name).finish();
  }

  snapshot(): OperationNodeSnapshot {
    return { kind: "op", args: [this.op, [...this.qubits], [...this.clbits]], index: this.handle.rawIndex };
  }

  toString(): string {
    const qargs = this.qubits.map(String).join(", ");
    const cargs = this.clbits.map(String).join(", ");
    return `OperationNode(op=${this.op.toString()}, qargs=[${qargs}], cargs=[${cargs}])`;
  }

  private currentInstruction(): CircuitInstruction {
    const base: CircuitInstruction = {
      operation: this.operation,
      qubits: this.qubits,
      clbits: this.clbits,
      params: this.parameters,
      label: this.instructionLabel,
    };
    return this.cachedOperation === undefined ? base : { ...base, cachedOperation: this.cachedOperation };
  }

  private repack(params: readonly Param[], label: string | null): PackedOperation {
    try {
      return withPayload(this.operation, params, label);
    } catch (error) {
      getNodeLogger().warn("op_node_payload_rejected", {
        index: this.handle.rawIndex,
        name: this.name,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private extract(value: unknown): ExtractedOperation {
    try {
      return extractOperation(value);
    } catch (error) {
      getNodeLogger().warn("op_node_operation_rejected", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
