import { BoundaryNode, type InputNode, type OutputNode } from "./boundaryNode.js";
import { getNodeLogger } from "./log.js";
import type { DagNode } from "./node.js";
import { OperationNode } from "./opNode.js";
import type { BoundaryNodeSnapshot, NodeSnapshot, OperationNodeSnapshot } from "./types.js";

/**
 * Captures a node as `(kind, constructor arguments, raw index)`. The result
 * references no live graph structure.
 */
export function snapshotNode(node: OperationNode): OperationNodeSnapshot;
export function snapshotNode(node: InputNode): BoundaryNodeSnapshot<"in">;
export function snapshotNode(node: OutputNode): BoundaryNodeSnapshot<"out">;
export function snapshotNode(node: DagNode): NodeSnapshot;
export function snapshotNode(node: DagNode): NodeSnapshot {
  return node.snapshot();
}

/**
 * Replays the detached constructor recorded in the snapshot, then sets the
 * raw index directly. The restored node is not inserted into any graph; the
 * caller reconciles the index against a real graph when rebuilding one.
 */
export function restoreNode(snapshot: OperationNodeSnapshot): OperationNode;
export function restoreNode(snapshot: BoundaryNodeSnapshot<"in">): InputNode;
export function restoreNode(snapshot: BoundaryNodeSnapshot<"out">): OutputNode;
export function restoreNode(snapshot: NodeSnapshot): DagNode;
export function restoreNode(snapshot: NodeSnapshot): DagNode {
  getNodeLogger().debug("node_snapshot_restored", { kind: snapshot.kind, index: snapshot.index });
  if (snapshot.kind === "op") {
    return OperationNode.fromSnapshot(snapshot);
  }
  if (snapshot.kind === "in") {
    return BoundaryNode.fromSnapshot(snapshot);
  }
  return BoundaryNode.fromSnapshot(snapshot);
}
