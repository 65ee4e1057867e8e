/**
 * Shared type definitions of the node layer. Keeping them in a leaf module
 * lets the node classes and the snapshot protocol reference each other's
 * shapes without runtime import cycles.
 */
import type { OperationObject } from "../circuit/instruction.js";
import type { Wire } from "../circuit/wires.js";
import type { NodeHandle } from "./identity.js";

/** Tag of every node variant. */
export type DagNodeKind = "op" | "in" | "out";

/** Tag of the two boundary variants. */
export type BoundaryKind = "in" | "out";

/** Portable form of an operation node: constructor arguments plus raw index. */
export interface OperationNodeSnapshot {
  readonly kind: "op";
  readonly args: readonly [op: OperationObject, qargs: readonly Wire[], cargs: readonly Wire[]];
  /** Raw index, `-1` for a detached node. */
  readonly index: number;
}

/** Portable form of an input or output boundary node. */
export interface BoundaryNodeSnapshot<K extends BoundaryKind = BoundaryKind> {
  readonly kind: K;
  readonly args: readonly [wire: Wire];
  readonly index: number;
}

export type NodeSnapshot = OperationNodeSnapshot | BoundaryNodeSnapshot<"in"> | BoundaryNodeSnapshot<"out">;

/** Shape common to every snapshot variant. */
export interface SnapshotEnvelope {
  readonly kind: DagNodeKind;
  readonly args: readonly unknown[];
  readonly index: number;
}

/**
 * Capability shared by every node variant. Variants embed a {@link NodeHandle}
 * instead of inheriting from a common base.
 */
export interface DagNodeBehaviour {
  readonly kind: DagNodeKind;
  readonly handle: NodeHandle;
  /** Index and payload comparison; `false` against any other variant. */
  equals(other: unknown): boolean;
  /** Hash consistent with {@link equals}. */
  hashCode(): number;
  snapshot(): SnapshotEnvelope;
  /** Detached copy of the payload. */
  duplicate(options?: { readonly deep?: boolean }): DagNodeBehaviour;
  toString(): string;
}
