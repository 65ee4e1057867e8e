import { BoundaryNode, type InputNode, type OutputNode } from "./boundaryNode.js";
import { OperationNode } from "./opNode.js";

/** Every vertex kind of the circuit graph. */
export type DagNode = OperationNode | InputNode | OutputNode;

export function isDagNode(value: unknown): value is DagNode {
  return value instanceof OperationNode || value instanceof BoundaryNode;
}

export function isOperationNode(node: DagNode): node is OperationNode {
  return node.kind === "op";
}

export function isInputNode(node: DagNode): node is InputNode {
  return node.kind === "in";
}

export function isOutputNode(node: DagNode): node is OutputNode {
  return node.kind === "out";
}

/** Variant-aware equality; nodes of unrelated variants are never equal. */
export function nodesEqual(a: DagNode, b: unknown): boolean {
  return a.equals(b);
}

export function hashNode(node: DagNode): number {
  return node.hashCode();
}

/**
 * Orders nodes by raw index, detached nodes first. Suitable for
 * `Array.prototype.sort`; ties between nodes of the same index keep their
 * relative order.
 */
export function compareNodes(a: DagNode, b: DagNode): number {
  return a.handle.rawIndex - b.handle.rawIndex;
}

export function sortNodes<T extends DagNode>(nodes: Iterable<T>): T[] {
  return Array.from(nodes).sort(compareNodes);
}
