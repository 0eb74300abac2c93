// src/otbm/nodeReader.ts
import { FieldReader } from "./binary.js";
import type { ByteSource } from "./byteSource.js";
import { NODE_END, NODE_START, nodeTypeName } from "./constants.js";
import { EscapedCursor } from "./escape.js";
import { ResourceLimitExceededError, StructuralCorruptionError } from "./errors.js";
import type { TextEncoding } from "./text.js";

export type NodeReaderOptions = Readonly<{
  maxDepth?: number;
  maxFieldBytes?: number;
  encoding?: TextEncoding;
  // Node names used in error paths; defaults to the OTBM node names.
  typeName?: (type: number) => string;
}>;

export type NodeOpenEvent = Readonly<{
  kind: "open";
  type: number;
  depth: number;
  offset: number;
  payload: NodePayload;
}>;

export type NodeCloseEvent = Readonly<{
  kind: "close";
  type: number;
  depth: number;
}>;

export type NodeEvent = NodeOpenEvent | NodeCloseEvent;

type Frame = { type: number; offset: number };

/**
 * The attribute bytes of one open node, decoded on demand. A payload is only
 * valid until the next call to NodeReader.read(); bytes not consumed by then
 * are skipped.
 */
export class NodePayload extends FieldReader {
  private retired = false;
  private recording: Uint8Array[] | null = null;

  public constructor(
    private readonly cursor: EscapedCursor,
    private readonly maxFieldBytes: number,
    encoding: TextEncoding,
  ) {
    super(encoding);
  }

  public get offset(): number {
    return this.cursor.offset;
  }

  /** True when every payload byte has been consumed. */
  public atEnd(): boolean {
    this.ensureLive();
    return this.cursor.atBoundary();
  }

  /** Consumes and returns all remaining payload bytes. */
  public rest(): Uint8Array {
    this.ensureLive();
    return this.cursor.readUntilMarker(this.maxFieldBytes);
  }

  /** Reads a u32 length prefix and that many bytes. */
  public readLongBytes(): Uint8Array {
    return this.readBytes(this.readU32LE());
  }

  public corrupt(message: string): StructuralCorruptionError {
    return this.cursor.corrupt(message);
  }

  /** Starts keeping a copy of every byte read, until endRecord(). */
  public beginRecord(): void {
    this.recording = [];
  }

  public endRecord(): Uint8Array {
    const parts = this.recording ?? [];
    this.recording = null;
    return concatBytes(parts);
  }

  protected take(n: number): Uint8Array {
    this.ensureLive();
    if (n > this.maxFieldBytes) {
      throw new ResourceLimitExceededError("field bytes", n, this.maxFieldBytes);
    }
    const bytes = this.cursor.readLogical(n);
    this.recording?.push(bytes);
    return bytes;
  }

  /** @internal */
  public retire(): void {
    if (this.retired) return;
    this.retired = true;
    this.cursor.skipUntilMarker();
  }

  private ensureLive(): void {
    if (this.retired) throw new Error("Node payload read after the reader moved on");
  }
}

/**
 * Pull parser for the marker-delimited node tree. Open nodes are tracked on
 * an explicit stack, so nesting depth never touches the call stack.
 */
export class NodeReader {
  private readonly stack: Frame[] = [];
  private readonly cursor: EscapedCursor;
  private readonly maxDepth: number;
  private readonly maxFieldBytes: number;
  private readonly encoding: TextEncoding;
  private readonly typeName: (type: number) => string;
  private payload: NodePayload | null = null;
  private peak = 0;
  private started = false;
  private finished = false;

  public constructor(
    private readonly source: ByteSource,
    options: NodeReaderOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? 64;
    this.maxFieldBytes = options.maxFieldBytes ?? 1024 * 1024;
    this.encoding = options.encoding ?? "cp1252";
    this.typeName = options.typeName ?? nodeTypeName;
    this.cursor = new EscapedCursor(source, () => this.path());
  }

  public get depth(): number {
    return this.stack.length;
  }

  public get offset(): number {
    return this.source.offset;
  }

  /** Deepest nesting seen so far. */
  public get peakDepth(): number {
    return this.peak;
  }

  /** Largest single field or payload tail decoded so far, in bytes. */
  public get peakFieldBytes(): number {
    return this.cursor.largestRead;
  }

  /** Node types of the open frames joined root first, e.g. "ROOT/MAP_DATA/TILE_AREA". */
  public path(): string {
    return this.stack.map((f) => this.typeName(f.type)).join("/");
  }

  public read(): NodeEvent | null {
    this.retirePayload();
    if (this.finished) return null;

    const at = this.source.offset;
    const b = this.source.next();

    if (b === -1) {
      if (!this.started) throw this.corrupt("Empty node stream", at);
      throw this.corrupt(`Truncated stream: ${this.stack.length} node(s) still open`, at);
    }

    if (b === NODE_START) {
      if (this.started && this.stack.length === 0) {
        throw this.corrupt("Second root node", at);
      }
      const type = this.source.next();
      if (type === -1) throw this.corrupt("Truncated stream: missing node type", at + 1);
      if (this.stack.length >= this.maxDepth) {
        throw new ResourceLimitExceededError("node depth", this.stack.length + 1, this.maxDepth);
      }

      this.started = true;
      this.stack.push({ type, offset: at });
      if (this.stack.length > this.peak) this.peak = this.stack.length;
      const payload = new NodePayload(this.cursor, this.maxFieldBytes, this.encoding);
      this.payload = payload;
      return { kind: "open", type, depth: this.stack.length - 1, offset: at, payload };
    }

    if (b === NODE_END) {
      const frame = this.stack.pop();
      if (!frame) throw this.corrupt("Unmatched node end", at);
      if (this.stack.length === 0) this.finishRoot();
      return { kind: "close", type: frame.type, depth: this.stack.length };
    }

    throw this.corrupt(`Expected node start or end, found 0x${b.toString(16).padStart(2, "0")}`, at);
  }

  /**
   * Discards the node opened by the last read() together with all of its
   * children. Its close event is consumed and not returned.
   */
  public skipSubtree(): void {
    const target = this.stack.length - 1;
    if (target < 0) throw new Error("skipSubtree() called with no open node");
    for (;;) {
      const ev = this.read();
      if (ev === null) throw this.corrupt("Truncated stream while skipping node", this.offset);
      if (ev.kind === "close" && ev.depth === target) return;
    }
  }

  private retirePayload(): void {
    const p = this.payload;
    if (p === null) return;
    this.payload = null;
    p.retire();
  }

  private finishRoot(): void {
    this.finished = true;
    if (this.source.peek() !== -1) {
      throw this.corrupt("Trailing bytes after root node", this.source.offset);
    }
  }

  private corrupt(message: string, offset: number): StructuralCorruptionError {
    return new StructuralCorruptionError(message, offset, this.path());
  }
}

export function concatBytes(parts: ReadonlyArray<Uint8Array>): Uint8Array {
  let n = 0;
  for (const p of parts) n += p.length;
  const out = new Uint8Array(n);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

/** Reads the 4-byte file identifier. Identifiers never contain marker bytes. */
export function readIdentifier(source: ByteSource): Uint8Array {
  const out = new Uint8Array(4);
  for (let i = 0; i < 4; i++) {
    const b = source.next();
    if (b === -1) throw new StructuralCorruptionError("File too short for identifier", i);
    out[i] = b;
  }
  return out;
}
