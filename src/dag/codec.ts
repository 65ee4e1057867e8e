import { z } from "zod";

import {
  Gate,
  Instruction,
  StandardGate,
  StandardInstruction,
  UnitaryGate,
  type ComplexMatrix,
  type OperationObject,
} from "../circuit/instruction.js";
import {
  SymbolicParameter,
  toParam,
  type Equatable,
  type Param,
  type ParamLike,
  type ParameterExpression,
} from "../circuit/parameters.js";
import {
  isStandardGateName,
  isStandardInstructionName,
  type StandardGateName,
  type StandardInstructionName,
} from "../circuit/standard.js";
import { Bit, type Wire } from "../circuit/wires.js";
import { ERROR_CODES } from "../types.js";
import { NodeSnapshotError } from "./errors.js";
import { getNodeLogger } from "./log.js";
import type { DagNode } from "./node.js";
import { restoreNode, snapshotNode } from "./snapshot.js";
import type { NodeSnapshot } from "./types.js";

/** Version written into every serialized snapshot. */
export const SNAPSHOT_FORMAT_VERSION = 1;

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

/** Converts wires to and from their JSON form. */
export interface WireCodec {
  encode(wire: Wire): JsonValue;
  decode(value: JsonValue): Wire;
}

/**
 * Caller hook for values the codec has no structural encoding for.
 * `encode` returns `undefined` to decline a value.
 */
export interface CustomCodec<T> {
  encode(value: T): JsonValue | undefined;
  decode(data: JsonValue): T;
}

export interface SnapshotCodecOptions {
  /** Defaults to {@link bitWireCodec}. */
  readonly wires?: WireCodec;
  /** Expressions other than {@link SymbolicParameter}. */
  readonly expressions?: CustomCodec<ParameterExpression>;
  /** Opaque object parameters. */
  readonly objects?: CustomCodec<Equatable>;
  /** Operation objects outside the bundled classes. */
  readonly operations?: CustomCodec<OperationObject>;
}

const NON_FINITE = ["NaN", "Infinity", "-Infinity"] as const;

const SerializedFloatSchema = z.union([z.number().finite(), z.enum(NON_FINITE)]);

const SerializedParamSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("float"), value: SerializedFloatSchema }).strict(),
  z.object({ type: z.literal("symbol"), name: z.string().min(1), uuid: z.string().min(1) }).strict(),
  z.object({ type: z.literal("expression"), data: JsonValueSchema }).strict(),
  z.object({ type: z.literal("object"), data: JsonValueSchema }).strict(),
]);

const NameSchema = z.string().min(1);
const WidthSchema = z.number().int().nonnegative();
const LabelSchema = z.string().nullable();
const ParamsSchema = z.array(SerializedParamSchema);

const StandardGateNameSchema = z.custom<StandardGateName>(
  (value) => typeof value === "string" && isStandardGateName(value),
  "unknown standard gate",
);
const StandardInstructionNameSchema = z.custom<StandardInstructionName>(
  (value) => typeof value === "string" && isStandardInstructionName(value),
  "unknown standard instruction",
);

const SerializedOperationSchema = z.discriminatedUnion("type", [
  z
    .object({
      type: z.literal("standard-gate"),
      gate: StandardGateNameSchema,
      name: NameSchema,
      params: ParamsSchema,
      label: LabelSchema,
    })
    .strict(),
  z
    .object({
      type: z.literal("standard-instruction"),
      instruction: StandardInstructionNameSchema,
      name: NameSchema,
      numQubits: WidthSchema,
      params: ParamsSchema,
      label: LabelSchema,
    })
    .strict(),
  z
    .object({
      type: z.literal("unitary"),
      name: NameSchema,
      matrix: z.array(z.array(z.tuple([SerializedFloatSchema, SerializedFloatSchema]))),
      label: LabelSchema,
    })
    .strict(),
  z
    .object({ type: z.literal("gate"), name: NameSchema, numQubits: WidthSchema, params: ParamsSchema, label: LabelSchema })
    .strict(),
  z
    .object({
      type: z.literal("instruction"),
      name: NameSchema,
      numQubits: WidthSchema,
      numClbits: WidthSchema,
      params: ParamsSchema,
      label: LabelSchema,
    })
    .strict(),
  z.object({ type: z.literal("custom"), data: JsonValueSchema }).strict(),
]);

const IndexSchema = z.number().int().min(-1).max(Number.MAX_SAFE_INTEGER);

const SerializedNodeSnapshotSchema = z.discriminatedUnion("kind", [
  z
    .object({
      version: z.literal(SNAPSHOT_FORMAT_VERSION),
      kind: z.literal("op"),
      args: z.tuple([SerializedOperationSchema, z.array(JsonValueSchema), z.array(JsonValueSchema)]),
      index: IndexSchema,
    })
    .strict(),
  z
    .object({
      version: z.literal(SNAPSHOT_FORMAT_VERSION),
      kind: z.literal("in"),
      args: z.tuple([JsonValueSchema]),
      index: IndexSchema,
    })
    .strict(),
  z
    .object({
      version: z.literal(SNAPSHOT_FORMAT_VERSION),
      kind: z.literal("out"),
      args: z.tuple([JsonValueSchema]),
      index: IndexSchema,
    })
    .strict(),
]);

export type SerializedFloat = z.infer<typeof SerializedFloatSchema>;
export type SerializedParam = z.infer<typeof SerializedParamSchema>;
export type SerializedOperation = z.infer<typeof SerializedOperationSchema>;
/** JSON-safe node snapshot: `{ version, kind, args, index }`. */
export type SerializedNodeSnapshot = z.infer<typeof SerializedNodeSnapshotSchema>;

const BitSchema = z
  .object({ kind: z.enum(["qubit", "clbit"]), register: z.string().nullable(), index: WidthSchema })
  .strict();

/** Default wire codec, limited to {@link Bit} wires. */
export const bitWireCodec: WireCodec = {
  encode(wire) {
    if (!(wire instanceof Bit)) {
      throw new NodeSnapshotError(
        ERROR_CODES.SNAPSHOT_UNSUPPORTED,
        `cannot encode wire ${wire.toString()}`,
        "/",
        "provide a WireCodec for custom wires",
      );
    }
    return { kind: wire.kind, register: wire.register, index: wire.index };
  },
  decode(value) {
    const parsed = BitSchema.safeParse(value);
    if (!parsed.success) {
      throw invalid(parsed.error);
    }
    return new Bit(parsed.data.kind, parsed.data.register, parsed.data.index);
  },
};

function joinPath(prefix: string, suffix: string): string {
  if (suffix === "/" || suffix === "") {
    return prefix;
  }
  return prefix === "/" ? suffix : `${prefix}${suffix}`;
}

function invalid(error: z.ZodError, prefix = "/"): NodeSnapshotError {
  const [issue] = error.issues;
  const path = issue && issue.path.length > 0 ? `/${issue.path.join("/")}` : "/";
  return new NodeSnapshotError(
    ERROR_CODES.SNAPSHOT_INVALID,
    issue ? `malformed snapshot: ${issue.message}` : "malformed snapshot",
    joinPath(prefix, path),
  );
}

function unsupported(message: string, path: string, hint?: string): NodeSnapshotError {
  return new NodeSnapshotError(ERROR_CODES.SNAPSHOT_UNSUPPORTED, message, path, hint);
}

/**
 * Runs a step of the codec at `path`. Snapshot errors raised below get the
 * path prefixed; other errors (constructor range checks, hook failures)
 * become INVALID errors located at `path`.
 */
function at<T>(path: string, step: () => T): T {
  try {
    return step();
  } catch (error) {
    if (error instanceof NodeSnapshotError) {
      throw new NodeSnapshotError(error.code, error.message, joinPath(path, error.path), error.hint);
    }
    if (error instanceof Error) {
      throw new NodeSnapshotError(ERROR_CODES.SNAPSHOT_INVALID, error.message, path);
    }
    throw error;
  }
}

function encodeFloat(value: number): SerializedFloat {
  if (Number.isNaN(value)) {
    return "NaN";
  }
  if (value === Infinity) {
    return "Infinity";
  }
  if (value === -Infinity) {
    return "-Infinity";
  }
  return value;
}

function decodeFloat(value: SerializedFloat): number {
  switch (value) {
    case "NaN":
      return Number.NaN;
    case "Infinity":
      return Infinity;
    case "-Infinity":
      return -Infinity;
    default:
      return value;
  }
}

function encodeParam(param: Param, options: SnapshotCodecOptions, path: string): SerializedParam {
  switch (param.kind) {
    case "float":
      return { type: "float", value: encodeFloat(param.value) };
    case "expression": {
      const { expression } = param;
      if (expression instanceof SymbolicParameter) {
        return { type: "symbol", name: expression.name, uuid: expression.uuid };
      }
      const data = options.expressions?.encode(expression);
      if (data === undefined) {
        throw unsupported(`cannot encode expression ${expression.toString()}`, path, "provide an expressions codec");
      }
      return { type: "expression", data };
    }
    case "object": {
      const data = options.objects?.encode(param.value);
      if (data === undefined) {
        throw unsupported("cannot encode opaque parameter", path, "provide an objects codec");
      }
      return { type: "object", data };
    }
  }
}

function decodeParam(param: SerializedParam, options: SnapshotCodecOptions, path: string): Param {
  switch (param.type) {
    case "float":
      return { kind: "float", value: decodeFloat(param.value) };
    case "symbol":
      return { kind: "expression", expression: new SymbolicParameter(param.name, param.uuid) };
    case "expression": {
      const hook = options.expressions;
      if (!hook) {
        throw unsupported("no codec registered for expression parameters", path);
      }
      const { data } = param;
      return { kind: "expression", expression: at(`${path}/data`, () => hook.decode(data)) };
    }
    case "object": {
      const hook = options.objects;
      if (!hook) {
        throw unsupported("no codec registered for opaque parameters", path);
      }
      const { data } = param;
      return { kind: "object", value: at(`${path}/data`, () => hook.decode(data)) };
    }
  }
}

function encodeParams(params: readonly ParamLike[], options: SnapshotCodecOptions, path: string): SerializedParam[] {
  return params.map((param, index) => encodeParam(toParam(param), options, `${path}/${index}`));
}

function decodeParams(params: readonly SerializedParam[], options: SnapshotCodecOptions, path: string): Param[] {
  return params.map((param, index) => decodeParam(param, options, `${path}/${index}`));
}

function encodeMatrix(matrix: ComplexMatrix): [SerializedFloat, SerializedFloat][][] {
  return matrix.map((row) => row.map((entry) => [encodeFloat(entry.re), encodeFloat(entry.im)]));
}

function encodeOperation(op: OperationObject, options: SnapshotCodecOptions, path: string): SerializedOperation {
  if (op instanceof StandardGate) {
    const params = encodeParams(op.params, options, `${path}/params`);
    return { type: "standard-gate", gate: op.gate, name: op.name, params, label: op.label };
  }
  if (op instanceof StandardInstruction) {
    const params = encodeParams(op.params, options, `${path}/params`);
    return {
      type: "standard-instruction",
      instruction: op.instruction,
      name: op.name,
      numQubits: op.numQubits,
      params,
      label: op.label,
    };
  }
  if (op instanceof UnitaryGate) {
    return { type: "unitary", name: op.name, matrix: encodeMatrix(op.matrix), label: op.label };
  }
  if (op instanceof Gate && op.constructor === Gate) {
    const params = encodeParams(op.params, options, `${path}/params`);
    return { type: "gate", name: op.name, numQubits: op.numQubits, params, label: op.label };
  }
  if (op instanceof Instruction && op.constructor === Instruction) {
    const params = encodeParams(op.params, options, `${path}/params`);
    return {
      type: "instruction",
      name: op.name,
      numQubits: op.numQubits,
      numClbits: op.numClbits,
      params,
      label: op.label,
    };
  }
  const data = options.operations?.encode(op);
  if (data === undefined) {
    throw unsupported(`cannot encode operation '${op.name}'`, path, "provide an operations codec");
  }
  return { type: "custom", data };
}

function decodeOperation(op: SerializedOperation, options: SnapshotCodecOptions, path: string): OperationObject {
  switch (op.type) {
    case "standard-gate": {
      const params = decodeParams(op.params, options, `${path}/params`);
      const gate = at(path, () => new StandardGate(op.gate, params, op.label));
      gate.name = op.name;
      return gate;
    }
    case "standard-instruction": {
      const params = decodeParams(op.params, options, `${path}/params`);
      const instruction = at(
        path,
        () => new StandardInstruction(op.instruction, { numQubits: op.numQubits, params, label: op.label }),
      );
      instruction.name = op.name;
      return instruction;
    }
    case "unitary": {
      const matrix = op.matrix.map((row) => row.map(([re, im]) => ({ re: decodeFloat(re), im: decodeFloat(im) })));
      const unitary = at(`${path}/matrix`, () => new UnitaryGate(matrix, op.label));
      unitary.name = op.name;
      return unitary;
    }
    case "gate": {
      const params = decodeParams(op.params, options, `${path}/params`);
      return at(path, () => new Gate(op.name, op.numQubits, params, op.label));
    }
    case "instruction": {
      const params = decodeParams(op.params, options, `${path}/params`);
      return at(path, () => new Instruction(op.name, op.numQubits, op.numClbits, params, op.label));
    }
    case "custom": {
      const hook = options.operations;
      if (!hook) {
        throw unsupported("no codec registered for custom operations", path);
      }
      const { data } = op;
      return at(`${path}/data`, () => hook.decode(data));
    }
  }
}

function encodeWires(wires: readonly Wire[], codec: WireCodec, path: string): JsonValue[] {
  return wires.map((wire, index) => at(`${path}/${index}`, () => codec.encode(wire)));
}

function decodeWires(wires: readonly JsonValue[], codec: WireCodec, path: string): Wire[] {
  return wires.map((wire, index) => at(`${path}/${index}`, () => codec.decode(wire)));
}

function logged<T>(event: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof NodeSnapshotError) {
      getNodeLogger().warn(event, { code: error.code, path: error.path, message: error.message });
    }
    throw error;
  }
}

/** Converts a live snapshot into its JSON-safe form. */
export function encodeSnapshot(snapshot: NodeSnapshot, options: SnapshotCodecOptions = {}): SerializedNodeSnapshot {
  const wires = options.wires ?? bitWireCodec;
  return logged<SerializedNodeSnapshot>("node_snapshot_encode_failed", () => {
    switch (snapshot.kind) {
      case "op": {
        const [op, qargs, cargs] = snapshot.args;
        return {
          version: SNAPSHOT_FORMAT_VERSION,
          kind: "op",
          args: [
            encodeOperation(op, options, "/args/0"),
            encodeWires(qargs, wires, "/args/1"),
            encodeWires(cargs, wires, "/args/2"),
          ],
          index: snapshot.index,
        };
      }
      case "in":
      case "out": {
        const [wire] = snapshot.args;
        const encoded = at("/args/0", () => wires.encode(wire));
        return snapshot.kind === "in"
          ? { version: SNAPSHOT_FORMAT_VERSION, kind: "in", args: [encoded], index: snapshot.index }
          : { version: SNAPSHOT_FORMAT_VERSION, kind: "out", args: [encoded], index: snapshot.index };
      }
    }
  });
}

const VersionProbeSchema = z.object({ version: z.number() });

/**
 * Validates a serialized snapshot and rebuilds the live snapshot. The
 * result can be handed to {@link restoreNode}.
 *
 * @throws NodeSnapshotError `E-NODE-SNAPSHOT-INVALID` for malformed input,
 * `E-NODE-SNAPSHOT-UNSUPPORTED` for another format version or a value kind
 * with no registered hook.
 */
export function decodeSnapshot(value: unknown, options: SnapshotCodecOptions = {}): NodeSnapshot {
  const wires = options.wires ?? bitWireCodec;
  return logged<NodeSnapshot>("node_snapshot_decode_failed", () => {
    const probe = VersionProbeSchema.safeParse(value);
    if (probe.success && probe.data.version !== SNAPSHOT_FORMAT_VERSION) {
      throw unsupported(`unsupported snapshot version ${probe.data.version}`, "/version");
    }
    const parsed = SerializedNodeSnapshotSchema.safeParse(value);
    if (!parsed.success) {
      throw invalid(parsed.error);
    }
    const serialized = parsed.data;
    switch (serialized.kind) {
      case "op": {
        const [op, qargs, cargs] = serialized.args;
        return {
          kind: "op",
          args: [
            decodeOperation(op, options, "/args/0"),
            decodeWires(qargs, wires, "/args/1"),
            decodeWires(cargs, wires, "/args/2"),
          ],
          index: serialized.index,
        };
      }
      case "in": {
        const [wire] = serialized.args;
        return { kind: "in", args: [at("/args/0", () => wires.decode(wire))], index: serialized.index };
      }
      case "out": {
        const [wire] = serialized.args;
        return { kind: "out", args: [at("/args/0", () => wires.decode(wire))], index: serialized.index };
      }
    }
  });
}

/** Snapshots and encodes a node in one step. */
export function serializeNode(node: DagNode, options: SnapshotCodecOptions = {}): SerializedNodeSnapshot {
  return encodeSnapshot(snapshotNode(node), options);
}

/** Decodes and restores a node in one step. The node keeps its recorded index. */
export function deserializeNode(value: unknown, options: SnapshotCodecOptions = {}): DagNode {
  return restoreNode(decodeSnapshot(value, options));
}
