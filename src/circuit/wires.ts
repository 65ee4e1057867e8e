import type { Equatable } from "./parameters.js";

/**
 * Opaque identifier of a quantum or classical data line. Nodes hold wires as
 * non-owning references and only rely on equality and hashing.
 */
export interface Wire extends Equatable {
  hashCode(): number;
  toString(): string;
}

/** Kind of data line carried by a {@link Bit}. */
export type BitKind = "qubit" | "clbit";

/**
 * Default wire implementation: a bit identified by its kind, an optional
 * register name and its position in that register. Anonymous bits
 * (`register === null`) compare by their position alone.
 */
export class Bit implements Wire {
  constructor(
    readonly kind: BitKind,
    readonly register: string | null,
    readonly index: number,
  ) {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new RangeError(`bit index must be a non-negative integer (received ${index})`);
    }
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Bit &&
      other.kind === this.kind &&
      other.register === this.register &&
      other.index === this.index
    );
  }

  hashCode(): number {
    // 31-based fold over the identifying fields, kept in the int32 range.
    let hash = this.kind === "qubit" ? 1 : 2;
    for (const char of this.register ?? "") {
      hash = (Math.imul(hash, 31) + (char.codePointAt(0) ?? 0)) | 0;
    }
    return (Math.imul(hash, 31) + this.index) | 0;
  }

  toString(): string {
    const prefix = this.kind === "qubit" ? "Qubit" : "Clbit";
    return this.register === null ? `${prefix}(${this.index})` : `${prefix}(${this.register}, ${this.index})`;
  }
}

export function qubit(index: number, register: string | null = "q"): Bit {
  return new Bit("qubit", register, index);
}

export function clbit(index: number, register: string | null = "c"): Bit {
  return new Bit("clbit", register, index);
}

/** Element-wise wire equality over two ordered tuples. */
export function wiresEqual(a: readonly Wire[], b: readonly Wire[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((wire, index) => {
    const other = b[index];
    return other !== undefined && wire.equals(other);
  });
}
