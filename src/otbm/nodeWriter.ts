// src/otbm/nodeWriter.ts
import { closeSync, writeSync } from "node:fs";

import { NODE_END, NODE_START } from "./constants.js";
import { escapeBytes, isMarker } from "./escape.js";

export interface ByteSink {
  readonly bytesWritten: number;
  write(bytes: Uint8Array): void;
  flush(): void;
}

export class BufferSink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private total = 0;

  public get bytesWritten(): number {
    return this.total;
  }

  public write(bytes: Uint8Array): void {
    this.chunks.push(bytes);
    this.total += bytes.length;
  }

  public flush(): void {}

  public toBytes(): Uint8Array {
    const out = new Uint8Array(this.total);
    let o = 0;
    for (const c of this.chunks) {
      out.set(c, o);
      o += c.length;
    }
    return out;
  }
}

export const FILE_FLUSH_BYTES = 64 * 1024;

/** Buffers writes to an open descriptor and flushes whenever the buffer fills. */
export class FileSink implements ByteSink {
  private readonly buf: Uint8Array;
  private used = 0;
  private total = 0;

  public constructor(
    private readonly fd: number,
    flushBytes = FILE_FLUSH_BYTES,
  ) {
    this.buf = new Uint8Array(flushBytes);
  }

  public get bytesWritten(): number {
    return this.total;
  }

  public write(bytes: Uint8Array): void {
    this.total += bytes.length;
    if (bytes.length >= this.buf.length) {
      this.flush();
      this.writeFully(bytes);
      return;
    }
    if (this.used + bytes.length > this.buf.length) this.flush();
    this.buf.set(bytes, this.used);
    this.used += bytes.length;
  }

  public flush(): void {
    if (this.used === 0) return;
    this.writeFully(this.buf.subarray(0, this.used));
    this.used = 0;
  }

  public close(): void {
    this.flush();
    closeSync(this.fd);
  }

  private writeFully(bytes: Uint8Array): void {
    let off = 0;
    while (off < bytes.length) {
      off += writeSync(this.fd, bytes, off, bytes.length - off);
    }
  }
}

/**
 * Emits a node tree as wire bytes. Payload bytes are escaped on the way out;
 * open() and close() must balance before finish().
 */
export class NodeWriter {
  private readonly frames: number[] = [];

  public constructor(private readonly sink: ByteSink) {}

  public get depth(): number {
    return this.frames.length;
  }

  /** Writes raw identifier bytes before the root node. */
  public writeIdentifier(id: Uint8Array): void {
    if (this.frames.length > 0 || this.sink.bytesWritten > 0) {
      throw new Error("Identifier must be written first");
    }
    this.sink.write(id);
  }

  public open(type: number, payload?: Uint8Array): void {
    if (!Number.isInteger(type) || type < 0 || type > 0xff) {
      throw new Error(`Node type out of range: ${type}`);
    }
    this.sink.write(Uint8Array.of(NODE_START, type));
    this.frames.push(type);
    if (payload && payload.length > 0) this.writePayload(payload);
  }

  public writePayload(logical: Uint8Array): void {
    if (this.frames.length === 0) throw new Error("writePayload() outside of a node");
    this.sink.write(logical.some(isMarker) ? escapeBytes(logical) : logical);
  }

  public close(): void {
    if (this.frames.pop() === undefined) throw new Error("close() with no open node");
    this.sink.write(Uint8Array.of(NODE_END));
  }

  /** Convenience for a node with no children. */
  public leaf(type: number, payload?: Uint8Array): void {
    this.open(type, payload);
    this.close();
  }

  public finish(): void {
    if (this.frames.length > 0) {
      throw new Error(`finish() with ${this.frames.length} node(s) still open`);
    }
    this.sink.flush();
  }
}
