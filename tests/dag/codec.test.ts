import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import {
  Gate,
  Instruction,
  StandardGate,
  StandardInstruction,
  UnitaryGate,
  type OperationObject,
} from "../../src/circuit/instruction.js";
import { SymbolicParameter, type Equatable } from "../../src/circuit/parameters.js";
import { clbit, qubit, type Wire } from "../../src/circuit/wires.js";
import { BoundaryNode, inputNode } from "../../src/dag/boundaryNode.js";
import {
  SNAPSHOT_FORMAT_VERSION,
  decodeSnapshot,
  deserializeNode,
  encodeSnapshot,
  serializeNode,
  type SnapshotCodecOptions,
} from "../../src/dag/codec.js";
import { NodeSnapshotError } from "../../src/dag/errors.js";
import { configureNodeLogger } from "../../src/dag/log.js";
import { OperationNode } from "../../src/dag/opNode.js";
import { ERROR_CODES } from "../../src/types.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

class Oracle implements OperationObject {
  constructor(
    public name: string,
    readonly numQubits: number,
    readonly numClbits = 0,
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Oracle && other.name === this.name && other.numQubits === this.numQubits;
  }

  clone(): Oracle {
    return new Oracle(this.name, this.numQubits, this.numClbits);
  }

  toString(): string {
    return `Oracle(${this.name})`;
  }
}

class Duration implements Equatable {
  constructor(readonly nanoseconds: number) {}

  equals(other: unknown): boolean {
    return other instanceof Duration && other.nanoseconds === this.nanoseconds;
  }
}

class LabelledWire implements Wire {
  constructor(readonly id: string) {}

  equals(other: unknown): boolean {
    return other instanceof LabelledWire && other.id === this.id;
  }

  hashCode(): number {
    return this.id.length;
  }

  toString(): string {
    return `LabelledWire(${this.id})`;
  }
}

const OracleDataSchema = z.object({ name: z.string(), numQubits: z.number() });

const hooks: SnapshotCodecOptions = {
  operations: {
    encode: (op) => (op instanceof Oracle ? { name: op.name, numQubits: op.numQubits } : undefined),
    decode: (data) => {
      const parsed = OracleDataSchema.parse(data);
      return new Oracle(parsed.name, parsed.numQubits);
    },
  },
  objects: {
    encode: (value) => (value instanceof Duration ? value.nanoseconds : undefined),
    decode: (data) => new Duration(z.number().parse(data)),
  },
};

function jsonRoundTrip(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

function expectSnapshotError(run: () => unknown, code: string, path: string): NodeSnapshotError {
  try {
    run();
  } catch (error) {
    expect(error).to.be.instanceOf(NodeSnapshotError);
    if (error instanceof NodeSnapshotError) {
      expect(error.code).to.equal(code);
      expect(error.path).to.equal(path);
      return error;
    }
  }
  return expect.fail("expected NodeSnapshotError");
}

describe("dag/codec portable snapshots", () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
    configureNodeLogger(logger);
  });

  afterEach(() => {
    configureNodeLogger(new RecordingLogger());
  });

  describe("encoding", () => {
    it("encodes a catalog gate node", () => {
      const node = new OperationNode(new StandardGate("rz", [0.25]), [qubit(0)]);
      node.handle.attach(3);

      expect(serializeNode(node)).to.deep.equal({
        version: SNAPSHOT_FORMAT_VERSION,
        kind: "op",
        args: [
          { type: "standard-gate", gate: "rz", name: "rz", params: [{ type: "float", value: 0.25 }], label: null },
          [{ kind: "qubit", register: "q", index: 0 }],
          [],
        ],
        index: 3,
      });
    });

    it("encodes boundary nodes", () => {
      const node = BoundaryNode.attached("out", 2, clbit(1));
      expect(serializeNode(node)).to.deep.equal({
        version: 1,
        kind: "out",
        args: [{ kind: "clbit", register: "c", index: 1 }],
        index: 2,
      });
    });

    it("encodes non-finite floats as strings", () => {
      const node = new OperationNode(new Gate("g", 1, [Number.NaN, Infinity, -Infinity]), [qubit(0)]);
      const encoded = serializeNode(node);
      expect(encoded.args[0]).to.deep.equal({
        type: "gate",
        name: "g",
        numQubits: 1,
        params: [
          { type: "float", value: "NaN" },
          { type: "float", value: "Infinity" },
          { type: "float", value: "-Infinity" },
        ],
        label: null,
      });
    });

    it("encodes symbols and unitaries structurally", () => {
      const symbol = new OperationNode(new StandardGate("rx", [new SymbolicParameter("theta", "uuid-1")]), [
        qubit(0),
      ]);
      expect(serializeNode(symbol).args[0]).to.deep.equal({
        type: "standard-gate",
        gate: "rx",
        name: "rx",
        params: [{ type: "symbol", name: "theta", uuid: "uuid-1" }],
        label: null,
      });

      const unitary = new OperationNode(
        new UnitaryGate(
          [
            [
              { re: 0, im: 0 },
              { re: 1, im: 0 },
            ],
            [
              { re: 1, im: 0 },
              { re: 0, im: 0 },
            ],
          ],
          "flip",
        ),
        [qubit(0)],
      );
      expect(serializeNode(unitary).args[0]).to.deep.equal({
        type: "unitary",
        name: "unitary",
        matrix: [
          [
            [0, 0],
            [1, 0],
          ],
          [
            [1, 0],
            [0, 0],
          ],
        ],
        label: "flip",
      });
    });

    it("refuses opaque operations without a hook", () => {
      const node = new OperationNode(new Oracle("oracle", 2), [qubit(0), qubit(1)]);
      const error = expectSnapshotError(() => serializeNode(node), ERROR_CODES.SNAPSHOT_UNSUPPORTED, "/args/0");
      expect(error.message).to.equal("cannot encode operation 'oracle'");
      expect(logger.messages("warn")).to.deep.equal(["node_snapshot_encode_failed"]);
    });

    it("refuses opaque parameters without a hook", () => {
      const node = new OperationNode(new Gate("wait", 1, [new Duration(20)]), [qubit(0)]);
      expectSnapshotError(() => serializeNode(node), ERROR_CODES.SNAPSHOT_UNSUPPORTED, "/args/0/params/0");
    });

    it("refuses wires the default wire codec does not know", () => {
      const node = inputNode(new LabelledWire("a"));
      expectSnapshotError(() => serializeNode(node), ERROR_CODES.SNAPSHOT_UNSUPPORTED, "/args/0");

      const op = new OperationNode(new StandardGate("x"), [new LabelledWire("b")]);
      expectSnapshotError(() => serializeNode(op), ERROR_CODES.SNAPSHOT_UNSUPPORTED, "/args/1/0");
    });
  });

  describe("round trips through JSON", () => {
    const cases: Array<[string, () => OperationNode]> = [
      ["catalog gate", () => new OperationNode(new StandardGate("u", [0.1, 0.2, 0.3]), [qubit(0)])],
      [
        "catalog instruction",
        () => new OperationNode(new StandardInstruction("measure", { label: "m0" }), [qubit(0)], [clbit(0)]),
      ],
      ["barrier", () => new OperationNode(new StandardInstruction("barrier", { numQubits: 3 }), [qubit(0), qubit(1), qubit(2)])],
      ["generic gate", () => new OperationNode(new Gate("my_gate", 2, [1.25, Infinity]), [qubit(0), qubit(1)])],
      ["generic instruction", () => new OperationNode(new Instruction("save", 1, 1, [4]), [qubit(0)], [clbit(0)])],
      [
        "symbolic gate",
        () => new OperationNode(new StandardGate("rz", [new SymbolicParameter("phi", "uuid-2")]), [qubit(0)]),
      ],
    ];

    for (const [title, build] of cases) {
      it(`restores a ${title}`, () => {
        const node = build();
        node.handle.attach(6);
        const restored = deserializeNode(jsonRoundTrip(serializeNode(node)));
        expect(restored.equals(node)).to.equal(true);
        expect(restored.handle.rawIndex).to.equal(6);
      });
    }

    it("keeps the name of a renamed catalog gate", () => {
      const node = new OperationNode(new StandardGate("rz", [0.5]), [qubit(0)]);
      node.name = "my_rz";

      const restored = deserializeNode(jsonRoundTrip(serializeNode(node)));
      expect(restored.kind).to.equal("op");
      if (restored instanceof OperationNode) {
        expect(restored.name).to.equal("my_rz");
        expect(restored.descriptor.kind).to.equal("gate");
      }
      expect(restored.equals(node)).to.equal(true);
    });

    it("restores detached boundary nodes", () => {
      const node = inputNode(qubit(4, "anc"));
      const restored = deserializeNode(jsonRoundTrip(serializeNode(node)));
      expect(restored.kind).to.equal("in");
      expect(restored.handle.index).to.equal(null);
      expect(restored.equals(node)).to.equal(true);
    });

    it("routes opaque values through the caller hooks", () => {
      const node = new OperationNode(new Oracle("oracle", 2), [qubit(0), qubit(1)]);
      const encoded = serializeNode(node, hooks);
      expect(encoded.args[0]).to.deep.equal({ type: "custom", data: { name: "oracle", numQubits: 2 } });
      expect(deserializeNode(jsonRoundTrip(encoded), hooks).equals(node)).to.equal(true);

      const wait = new OperationNode(new Gate("wait", 1, [new Duration(20)]), [qubit(0)]);
      const restored = deserializeNode(jsonRoundTrip(serializeNode(wait, hooks)), hooks);
      expect(restored.equals(wait)).to.equal(true);
    });

    it("decodes into a live snapshot that can be encoded again", () => {
      const encoded = serializeNode(new OperationNode(new StandardGate("cx"), [qubit(0), qubit(1)]));
      const snapshot = decodeSnapshot(jsonRoundTrip(encoded));
      expect(snapshot.kind).to.equal("op");
      expect(encodeSnapshot(snapshot)).to.deep.equal(encoded);
    });
  });

  describe("decoding errors", () => {
    const validInput = { version: 1, kind: "in", args: [{ kind: "qubit", register: "q", index: 0 }], index: 0 };

    it("accepts the reference input", () => {
      expect(deserializeNode(validInput).equals(BoundaryNode.attached("in", 0, qubit(0)))).to.equal(true);
    });

    it("reports another format version as unsupported", () => {
      expectSnapshotError(
        () => decodeSnapshot({ ...validInput, version: 2 }),
        ERROR_CODES.SNAPSHOT_UNSUPPORTED,
        "/version",
      );
      expect(logger.messages("warn")).to.deep.equal(["node_snapshot_decode_failed"]);
    });

    it("rejects values that are not snapshots", () => {
      expectSnapshotError(() => decodeSnapshot("nope"), ERROR_CODES.SNAPSHOT_INVALID, "/");
    });

    it("rejects indices below the detached sentinel", () => {
      expectSnapshotError(() => decodeSnapshot({ ...validInput, index: -2 }), ERROR_CODES.SNAPSHOT_INVALID, "/index");
    });

    it("locates malformed wires", () => {
      expectSnapshotError(
        () => decodeSnapshot({ ...validInput, args: [{ kind: "qubit", register: "q", index: -1 }] }),
        ERROR_CODES.SNAPSHOT_INVALID,
        "/args/0/index",
      );
    });

    it("rejects gates outside the catalog", () => {
      const error = expectSnapshotError(
        () =>
          decodeSnapshot({
            version: 1,
            kind: "op",
            args: [{ type: "standard-gate", gate: "nope", name: "nope", params: [], label: null }, [], []],
            index: -1,
          }),
        ERROR_CODES.SNAPSHOT_INVALID,
        "/args/0/gate",
      );
      expect(error.message).to.equal("malformed snapshot: unknown standard gate");
    });

    it("reports catalog gates with the wrong parameter count", () => {
      const error = expectSnapshotError(
        () =>
          decodeSnapshot({
            version: 1,
            kind: "op",
            args: [{ type: "standard-gate", gate: "rz", name: "rz", params: [], label: null }, [], []],
            index: -1,
          }),
        ERROR_CODES.SNAPSHOT_INVALID,
        "/args/0",
      );
      expect(error.message).to.equal("gate 'rz' takes 1 parameter(s), received 0");
    });

    it("reports custom values decoded without a hook as unsupported", () => {
      expectSnapshotError(
        () =>
          decodeSnapshot({
            version: 1,
            kind: "op",
            args: [{ type: "custom", data: { name: "oracle" } }, [], []],
            index: -1,
          }),
        ERROR_CODES.SNAPSHOT_UNSUPPORTED,
        "/args/0",
      );
    });

    it("wraps hook failures as malformed input", () => {
      expectSnapshotError(
        () =>
          decodeSnapshot(
            {
              version: 1,
              kind: "op",
              args: [{ type: "custom", data: { name: 7 } }, [], []],
              index: -1,
            },
            hooks,
          ),
        ERROR_CODES.SNAPSHOT_INVALID,
        "/args/0/data",
      );
    });
  });
});
