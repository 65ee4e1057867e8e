import type { Wire } from "../circuit/wires.js";
import { NodeHasher } from "./hash.js";
import { NodeHandle } from "./identity.js";
import type { BoundaryKind, BoundaryNodeSnapshot, DagNodeBehaviour } from "./types.js";

/**
 * Source (`in`) or sink (`out`) of a wire's lifetime in the graph. Both tags
 * carry the same payload; only their topological role differs.
 */
export class BoundaryNode<K extends BoundaryKind = BoundaryKind> implements DagNodeBehaviour {
  readonly handle: NodeHandle;

  constructor(
    readonly kind: K,
    readonly wire: Wire,
  ) {
    this.handle = new NodeHandle();
  }

  /** Builds a node already bound to a graph index. Reserved to graph engines. */
  static attached<K extends BoundaryKind>(kind: K, index: number, wire: Wire): BoundaryNode<K> {
    const node = new BoundaryNode(kind, wire);
    node.handle.attach(index);
    return node;
  }

  static fromSnapshot<K extends BoundaryKind>(snapshot: BoundaryNodeSnapshot<K>): BoundaryNode<K> {
    const [wire] = snapshot.args;
    const node = new BoundaryNode(snapshot.kind, wire);
    node.handle.restoreRawIndex(snapshot.index);
    return node;
  }

  /**
   * Raw index and wire equality. The tag is not compared: an input and an
   * output node sharing index and wire are equal. Within one graph indices
   * are unique, so the two can only meet across graphs.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof BoundaryNode)) {
      return false;
    }
    return this.handle.rawIndex === other.handle.rawIndex && this.wire.equals(other.wire);
  }

  hashCode(): number {
    return new NodeHasher().writeIndex(this.handle.rawIndex).writeHashCode(this.wire.hashCode()).finish();
  }

  snapshot(): BoundaryNodeSnapshot<K> {
    return { kind: this.kind, args: [this.wire], index: this.handle.rawIndex };
  }

  /** Detached node with the same tag and wire. */
  duplicate(): BoundaryNode<K> {
    return new BoundaryNode(this.kind, this.wire);
  }

  toString(): string {
    return `${this.kind === "in" ? "InputNode" : "OutputNode"}(wire=${this.wire.toString()})`;
  }
}

export type InputNode = BoundaryNode<"in">;
export type OutputNode = BoundaryNode<"out">;

export function inputNode(wire: Wire): InputNode {
  return new BoundaryNode("in", wire);
}

export function outputNode(wire: Wire): OutputNode {
  return new BoundaryNode("out", wire);
}
