// src/otbm/binary.ts
import type { Position } from "./model.js";
import type { TextEncoding } from "./text.js";
import { decodeText, encodeText } from "./text.js";

/**
 * Little-endian field decoding on top of a single primitive, `take(n)`.
 * Shared by the in-memory reader and the streaming node payload.
 */
export abstract class FieldReader {
  protected constructor(protected readonly encoding: TextEncoding) {}

  protected abstract take(n: number): Uint8Array;

  public readU8(): number {
    return this.take(1)[0]!;
  }

  public readU16LE(): number {
    const b = this.take(2);
    return b[0]! | (b[1]! << 8);
  }

  public readI16LE(): number {
    const v = this.readU16LE();
    return v >= 0x8000 ? v - 0x10000 : v;
  }

  public readU32LE(): number {
    const b = this.take(4);
    return (b[0]! | (b[1]! << 8) | (b[2]! << 16) | (b[3]! << 24)) >>> 0;
  }

  public readBytes(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid read length: ${n}`);
    return this.take(n);
  }

  /** u16 length prefix, then text bytes. */
  public readString(): string {
    return decodeText(this.readBytes(this.readU16LE()), this.encoding);
  }

  public readPosition(): Position {
    const x = this.readU16LE();
    const y = this.readU16LE();
    const z = this.readU8();
    return { x, y, z };
  }
}

export class BinaryReader extends FieldReader {
  private offset = 0;

  public constructor(
    private readonly buf: Uint8Array,
    encoding: TextEncoding = "cp1252",
  ) {
    super(encoding);
  }

  public get position(): number {
    return this.offset;
  }

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  /** Everything not read yet, consuming it. */
  public readRest(): Uint8Array {
    return this.take(this.remaining());
  }

  protected take(n: number): Uint8Array {
    if (this.offset + n > this.buf.length) {
      throw new Error(`Unexpected EOF: need ${n} bytes, have ${this.remaining()}`);
    }
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }
}

/** Growable little-endian buffer for building one logical node payload. */
export class BinaryWriter {
  private buf = new Uint8Array(64);
  private len = 0;

  public constructor(private readonly encoding: TextEncoding = "cp1252") {}

  public get length(): number {
    return this.len;
  }

  public writeU8(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new Error(`U8 out of range: ${v}`);
    this.reserve(1)[this.len++] = v;
    return this;
  }

  public writeU16LE(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0xffff) throw new Error(`U16 out of range: ${v}`);
    const b = this.reserve(2);
    b[this.len++] = v & 0xff;
    b[this.len++] = v >>> 8;
    return this;
  }

  public writeI16LE(v: number): this {
    if (!Number.isInteger(v) || v < -0x8000 || v > 0x7fff) throw new Error(`I16 out of range: ${v}`);
    return this.writeU16LE(v < 0 ? v + 0x10000 : v);
  }

  public writeU32LE(v: number): this {
    if (!Number.isInteger(v) || v < 0 || v > 0xffffffff) throw new Error(`U32 out of range: ${v}`);
    const b = this.reserve(4);
    b[this.len++] = v & 0xff;
    b[this.len++] = (v >>> 8) & 0xff;
    b[this.len++] = (v >>> 16) & 0xff;
    b[this.len++] = v >>> 24;
    return this;
  }

  public writeBytes(bytes: Uint8Array): this {
    this.reserve(bytes.length).set(bytes, this.len);
    this.len += bytes.length;
    return this;
  }

  public writeString(text: string): this {
    const bytes = encodeText(text, this.encoding);
    if (bytes.length > 0xffff) throw new Error(`String too long: ${bytes.length} bytes`);
    return this.writeU16LE(bytes.length).writeBytes(bytes);
  }

  public writePosition(p: Readonly<Position>): this {
    return this.writeU16LE(p.x).writeU16LE(p.y).writeU8(p.z);
  }

  public toBytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }

  public reset(): void {
    this.len = 0;
  }

  private reserve(n: number): Uint8Array {
    if (this.len + n > this.buf.length) {
      let cap = this.buf.length * 2;
      while (cap < this.len + n) cap *= 2;
      const next = new Uint8Array(cap);
      next.set(this.buf.subarray(0, this.len));
      this.buf = next;
    }
    return this.buf;
  }
}
