// src/otbm/escape.ts
import type { ByteSource } from "./byteSource.js";
import { NODE_END, NODE_ESCAPE, NODE_START } from "./constants.js";
import { ResourceLimitExceededError, StructuralCorruptionError } from "./errors.js";

export function isMarker(b: number): boolean {
  return b === NODE_START || b === NODE_END || b === NODE_ESCAPE;
}

export function escapedLength(logical: Uint8Array): number {
  let n = logical.length;
  for (const b of logical) if (isMarker(b)) n++;
  return n;
}

export function escapeBytes(logical: Uint8Array): Uint8Array {
  const out = new Uint8Array(escapedLength(logical));
  let j = 0;
  for (const b of logical) {
    if (isMarker(b)) out[j++] = NODE_ESCAPE;
    out[j++] = b;
  }
  return out;
}

/** Inverse of escapeBytes. The input must be one payload region with no structural markers. */
export function unescapeBytes(wire: Uint8Array, baseOffset = 0): Uint8Array {
  const out = new Uint8Array(wire.length);
  let j = 0;
  for (let i = 0; i < wire.length; i++) {
    const b = wire[i]!;
    if (b === NODE_ESCAPE) {
      if (i + 1 >= wire.length) {
        throw new StructuralCorruptionError("Dangling escape byte", baseOffset + i);
      }
      out[j++] = wire[++i]!;
    } else if (b === NODE_START || b === NODE_END) {
      throw new StructuralCorruptionError(
        `Unescaped marker 0x${b.toString(16)} inside payload`,
        baseOffset + i,
      );
    } else {
      out[j++] = b;
    }
  }
  return out.subarray(0, j);
}

/**
 * Decoding cursor over a wire stream. Escapes are resolved as bytes are
 * consumed; unescaped START/END bytes are left in the source.
 */
export class EscapedCursor {
  private largest = 0;

  public constructor(
    private readonly source: ByteSource,
    private readonly nodePath: () => string = () => "",
  ) {}

  public get offset(): number {
    return this.source.offset;
  }

  /** Size of the largest field or payload tail materialized so far. */
  public get largestRead(): number {
    return this.largest;
  }

  /** True when the next wire byte is an unescaped START or END (or end of stream). */
  public atBoundary(): boolean {
    const b = this.source.peek();
    return b === -1 || b === NODE_START || b === NODE_END;
  }

  /** Reads exactly `n` logical bytes; a boundary before that is a truncated field. */
  public readLogical(n: number): Uint8Array {
    if (n > this.largest) this.largest = n;
    const out = new Uint8Array(n);
    for (let i = 0; i < n; i++) {
      const b = this.nextLogical();
      if (b < 0) {
        throw this.corrupt(`Truncated field: needed ${n} bytes, got ${i}`);
      }
      out[i] = b;
    }
    return out;
  }

  /** Returns the next logical byte, or -1 when a boundary is reached. */
  public nextLogical(): number {
    const b = this.source.peek();
    if (b === -1 || b === NODE_START || b === NODE_END) return -1;
    this.source.next();
    if (b !== NODE_ESCAPE) return b;

    const lit = this.source.next();
    if (lit === -1) throw this.corrupt("Dangling escape byte at end of stream");
    return lit;
  }

  /**
   * Reads logical bytes up to (not including) the next structural marker.
   * More than `maxBytes` logical bytes is a corrupt or hostile payload.
   */
  public readUntilMarker(maxBytes = Number.MAX_SAFE_INTEGER): Uint8Array {
    const chunks: number[] = [];
    for (;;) {
      const b = this.nextLogical();
      if (b < 0) break;
      if (chunks.length >= maxBytes) {
        throw new ResourceLimitExceededError("payload bytes", chunks.length + 1, maxBytes);
      }
      chunks.push(b);
    }
    if (chunks.length > this.largest) this.largest = chunks.length;
    if (this.source.peek() === -1) throw this.corrupt("Unexpected end of stream inside node");
    return Uint8Array.from(chunks);
  }

  /** Discards logical bytes up to the next structural marker. */
  public skipUntilMarker(): number {
    let n = 0;
    while (this.nextLogical() >= 0) n++;
    if (this.source.peek() === -1) throw this.corrupt("Unexpected end of stream inside node");
    return n;
  }

  public corrupt(message: string): StructuralCorruptionError {
    return new StructuralCorruptionError(message, this.source.offset, this.nodePath());
  }
}
