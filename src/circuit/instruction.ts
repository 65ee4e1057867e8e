import { getNodeConfig } from "../config/nodeConfig.js";
import {
  describeParam,
  paramsEqual,
  relativeEq,
  toParam,
  type Equatable,
  type Param,
  type ParamLike,
} from "./parameters.js";
import {
  standardGateSpec,
  standardInstructionSpec,
  type StandardGateName,
  type StandardInstructionName,
} from "./standard.js";

export interface Complex {
  readonly re: number;
  readonly im: number;
}

/** Square complex matrix stored row-major. */
export type ComplexMatrix = ReadonlyArray<ReadonlyArray<Complex>>;

/**
 * Protocol every operation object honours. The bundled classes below
 * implement it; callers may hand any other object with the same surface to
 * an operation node, which then treats it as opaque.
 */
export interface OperationObject extends Equatable {
  name: string;
  readonly numQubits: number;
  readonly numClbits: number;
  readonly params?: readonly ParamLike[];
  readonly label?: string | null;
  readonly isDirective?: boolean;
  readonly isControlFlow?: boolean;
  readonly isControlled?: boolean;
  clone(): OperationObject;
  toMatrix?(): ComplexMatrix | null;
  toString(): string;
}

function assertCount(value: number, what: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${what} must be a non-negative integer (received ${value})`);
  }
}

/** Generic instruction acting on qubits and clbits. */
export class Instruction implements OperationObject {
  name: string;
  readonly numQubits: number;
  readonly numClbits: number;
  params: Param[];
  label: string | null;

  constructor(
    name: string,
    numQubits: number,
    numClbits: number,
    params: readonly ParamLike[] = [],
    label: string | null = null,
  ) {
    if (name.length === 0) {
      throw new RangeError("instruction name must not be empty");
    }
    assertCount(numQubits, "numQubits");
    assertCount(numClbits, "numClbits");
    this.name = name;
    this.numQubits = numQubits;
    this.numClbits = numClbits;
    this.params = params.map(toParam);
    this.label = label;
  }

  get isDirective(): boolean {
    return false;
  }

  /**
   * Same class, name, widths and parameters. Labels do not take part.
   * Float parameters use the configured relative tolerance.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Instruction) || other.constructor !== this.constructor) {
      return false;
    }
    return (
      other.name === this.name &&
      other.numQubits === this.numQubits &&
      other.numClbits === this.numClbits &&
      paramsEqual(this.params, other.params, getNodeConfig().parameterTolerance)
    );
  }

  clone(): Instruction {
    return new Instruction(this.name, this.numQubits, this.numClbits, this.params, this.label);
  }

  toString(): string {
    const params = this.params.map(describeParam).join(", ");
    return `Instruction(name='${this.name}', num_qubits=${this.numQubits}, num_clbits=${this.numClbits}, params=[${params}])`;
  }
}

/** Generic unitary gate: an instruction without classical bits. */
export class Gate extends Instruction {
  constructor(name: string, numQubits: number, params: readonly ParamLike[] = [], label: string | null = null) {
    super(name, numQubits, 0, params, label);
  }

  override clone(): Gate {
    return new Gate(this.name, this.numQubits, this.params, this.label);
  }

  toMatrix(): ComplexMatrix | null {
    return null;
  }

  override toString(): string {
    const params = this.params.map(describeParam).join(", ");
    return `Gate(name='${this.name}', num_qubits=${this.numQubits}, params=[${params}])`;
  }
}

/** Gate from the fixed catalog in {@link STANDARD_GATES}. */
export class StandardGate extends Gate {
  readonly gate: StandardGateName;

  constructor(gate: StandardGateName, params: readonly ParamLike[] = [], label: string | null = null) {
    const spec = standardGateSpec(gate);
    if (params.length !== spec.numParams) {
      throw new RangeError(`gate '${gate}' takes ${spec.numParams} parameter(s), received ${params.length}`);
    }
    super(gate, spec.numQubits, params, label);
    this.gate = gate;
  }

  get isControlled(): boolean {
    return standardGateSpec(this.gate).controlled;
  }

  override clone(): StandardGate {
    const copy = new StandardGate(this.gate, this.params, this.label);
    copy.name = this.name;
    return copy;
  }
}

export interface StandardInstructionOptions {
  /** Width of a barrier. Ignored by fixed-width instructions. */
  readonly numQubits?: number;
  readonly params?: readonly ParamLike[];
  readonly label?: string | null;
}

/** Non-unitary instruction from the fixed catalog (measure, reset, barrier, delay). */
export class StandardInstruction extends Instruction {
  readonly instruction: StandardInstructionName;

  constructor(instruction: StandardInstructionName, options: StandardInstructionOptions = {}) {
    const spec = standardInstructionSpec(instruction);
    const params = options.params ?? [];
    if (params.length !== spec.numParams) {
      throw new RangeError(
        `instruction '${instruction}' takes ${spec.numParams} parameter(s), received ${params.length}`,
      );
    }
    const numQubits = spec.numQubits ?? options.numQubits;
    if (numQubits === undefined) {
      throw new RangeError(`instruction '${instruction}' requires an explicit numQubits`);
    }
    super(instruction, numQubits, spec.numClbits, params, options.label ?? null);
    this.instruction = instruction;
  }

  override get isDirective(): boolean {
    return standardInstructionSpec(this.instruction).directive;
  }

  override clone(): StandardInstruction {
    const copy = new StandardInstruction(this.instruction, {
      numQubits: this.numQubits,
      params: this.params,
      label: this.label,
    });
    copy.name = this.name;
    return copy;
  }
}

function matrixDimension(matrix: ComplexMatrix): number {
  const size = matrix.length;
  if (size === 0 || (size & (size - 1)) !== 0) {
    throw new RangeError(`unitary dimension must be a power of two (received ${size})`);
  }
  for (const row of matrix) {
    if (row.length !== size) {
      throw new RangeError("unitary matrix must be square");
    }
  }
  return size;
}

export function copyMatrix(matrix: ComplexMatrix): ComplexMatrix {
  return matrix.map((row) => row.map((entry) => ({ re: entry.re, im: entry.im })));
}

/** Entry-wise comparison of two matrices with a relative tolerance per component. */
export function matricesEqual(a: ComplexMatrix, b: ComplexMatrix, tolerance: number): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((row, i) => {
    const otherRow = b[i];
    if (!otherRow || otherRow.length !== row.length) {
      return false;
    }
    return row.every((entry, j) => {
      const other = otherRow[j];
      return (
        other !== undefined && relativeEq(entry.re, other.re, tolerance) && relativeEq(entry.im, other.im, tolerance)
      );
    });
  });
}

/** Gate defined by an explicit unitary matrix. */
export class UnitaryGate extends Gate {
  readonly matrix: ComplexMatrix;

  constructor(matrix: ComplexMatrix, label: string | null = null) {
    const dimension = matrixDimension(matrix);
    super("unitary", Math.log2(dimension), [], label);
    this.matrix = matrix;
  }

  override equals(other: unknown): boolean {
    return (
      other instanceof UnitaryGate &&
      other.name === this.name &&
      matricesEqual(this.matrix, other.matrix, getNodeConfig().parameterTolerance)
    );
  }

  override clone(): UnitaryGate {
    const copy = new UnitaryGate(copyMatrix(this.matrix), this.label);
    copy.name = this.name;
    return copy;
  }

  override toMatrix(): ComplexMatrix {
    return this.matrix;
  }

  override toString(): string {
    return `UnitaryGate(num_qubits=${this.numQubits})`;
  }
}
