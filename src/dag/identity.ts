import { ERROR_CODES } from "../types.js";
import { NodeValidationError } from "./errors.js";
import { getNodeLogger } from "./log.js";

/** Raw index exposed by a node that has not been placed in any graph. */
export const DETACHED_INDEX = -1;

/**
 * Validates a raw index coming from a caller. Returns `null` for the detached
 * sentinel, the index otherwise.
 */
function parseRawIndex(nid: number): number | null {
  if (nid === DETACHED_INDEX) {
    return null;
  }
  if (!Number.isSafeInteger(nid) || nid < 0) {
    getNodeLogger().warn("node_index_rejected", { index: String(nid) });
    throw new NodeValidationError(
      ERROR_CODES.NODE_INVALID_INDEX,
      "Invalid node index, must be -1 or a non-negative integer",
      { index: nid },
      "pass -1 to detach the node",
    );
  }
  return nid;
}

/**
 * Positional identity embedded in every node kind. A handle is either
 * detached (`index === null`) or attached to exactly one graph index.
 *
 * The graph engine owns the transitions: it calls {@link attach} when the node
 * is inserted. The snapshot protocol restores historical indices through
 * {@link restoreRawIndex} without involving any graph.
 */
export class NodeHandle {
  private nodeIndex: number | null;

  constructor() {
    this.nodeIndex = null;
  }

  /** Builds a handle from a raw index, `-1` meaning detached. */
  static fromRawIndex(nid: number): NodeHandle {
    const handle = new NodeHandle();
    handle.setRawIndex(nid);
    return handle;
  }

  /**
   * Total order on raw indices with detached handles first. Only meant to give
   * containers a deterministic order.
   */
  static compare(a: NodeHandle, b: NodeHandle): number {
    return a.rawIndex - b.rawIndex;
  }

  /** Graph index, `null` while detached. */
  get index(): number | null {
    return this.nodeIndex;
  }

  /** Graph index or {@link DETACHED_INDEX}. */
  get rawIndex(): number {
    return this.nodeIndex ?? DETACHED_INDEX;
  }

  get isAttached(): boolean {
    return this.nodeIndex !== null;
  }

  /**
   * Sets the raw index. `-1` detaches the handle, any other negative or
   * non-integer value raises {@link NodeValidationError}.
   */
  setRawIndex(nid: number): void {
    this.nodeIndex = parseRawIndex(nid);
  }

  /** Binds the handle to a graph index. The detached sentinel is refused. */
  attach(index: number): this {
    if (index === DETACHED_INDEX) {
      getNodeLogger().warn("node_attach_rejected", { index });
      throw new NodeValidationError(
        ERROR_CODES.NODE_INVALID_INDEX,
        "Cannot attach a node to the detached sentinel index",
        { index },
        "call detach() instead",
      );
    }
    this.nodeIndex = parseRawIndex(index);
    return this;
  }

  detach(): this {
    this.nodeIndex = null;
    return this;
  }

  /**
   * Restores an index recorded by a snapshot. The value is trusted and not
   * checked against any graph; `null` and `-1` both restore a detached handle.
   */
  restoreRawIndex(state: number | null): void {
    this.nodeIndex = state === null || state === DETACHED_INDEX ? null : state;
  }

  lessThan(other: NodeHandle): boolean {
    return this.rawIndex < other.rawIndex;
  }

  greaterThan(other: NodeHandle): boolean {
    return this.rawIndex > other.rawIndex;
  }

  /** Hash of the bare identity: the raw index itself. */
  hashCode(): number {
    return this.rawIndex;
  }

  clone(): NodeHandle {
    const copy = new NodeHandle();
    copy.nodeIndex = this.nodeIndex;
    return copy;
  }
}
