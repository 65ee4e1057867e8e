import { Buffer } from "node:buffer";
import { createHash, type Hash } from "node:crypto";

/** Digest used to fold node fields into a hash code. */
const NODE_HASH_ALGORITHM = "sha1";

/**
 * Incremental hasher folding node fields into a non-negative 48-bit integer.
 * Every field is written with a type prefix so `("a", 1)` and `("a1")` never
 * collide by construction. The result fits a safe integer and can be used as
 * a `Map` key by graph containers.
 */
export class NodeHasher {
  private readonly hash: Hash = createHash(NODE_HASH_ALGORITHM);

  /** Writes a raw node index (the detached sentinel included). */
  writeIndex(rawIndex: number): this {
    const buffer = Buffer.alloc(9);
    buffer.writeUInt8(0x01, 0);
    buffer.writeDoubleLE(rawIndex, 1);
    this.hash.update(buffer);
    return this;
  }

  /** Writes a UTF-8 string, length-prefixed. */
  writeString(value: string): this {
    const bytes = Buffer.from(value, "utf8");
    const header = Buffer.alloc(5);
    header.writeUInt8(0x02, 0);
    header.writeUInt32LE(bytes.length, 1);
    this.hash.update(header);
    this.hash.update(bytes);
    return this;
  }

  /** Writes a hash code produced by another object (e.g. a wire). */
  writeHashCode(value: number): this {
    const buffer = Buffer.alloc(9);
    buffer.writeUInt8(0x03, 0);
    buffer.writeDoubleLE(value, 1);
    this.hash.update(buffer);
    return this;
  }

  /** Finalises the digest. The hasher must not be reused afterwards. */
  finish(): number {
    return this.hash.digest().readUIntBE(0, 6);
  }
}
