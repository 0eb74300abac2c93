// src/otbm/byteSource.ts
import { closeSync, fstatSync, openSync, readSync } from "node:fs";

/** Forward-only byte stream with one byte of lookahead. Returns -1 at end. */
export interface ByteSource {
  readonly offset: number;
  peek(): number;
  next(): number;
  close(): void;
}

export class BufferByteSource implements ByteSource {
  private pos: number;

  public constructor(
    private readonly buf: Uint8Array,
    start = 0,
  ) {
    this.pos = start;
  }

  public get offset(): number {
    return this.pos;
  }

  public peek(): number {
    return this.pos < this.buf.length ? this.buf[this.pos]! : -1;
  }

  public next(): number {
    if (this.pos >= this.buf.length) return -1;
    return this.buf[this.pos++]!;
  }

  public close(): void {}
}

export const FILE_WINDOW_BYTES = 64 * 1024;

/**
 * Reads a file through a fixed window so memory stays constant whatever the
 * file size. The descriptor is owned by the source; call close() when done.
 */
export class FileByteSource implements ByteSource {
  private readonly fd: number;
  private readonly window: Buffer;
  private windowStart = 0;
  private windowLen = 0;
  private pos = 0;
  private closed = false;

  public readonly size: number;

  public constructor(filePath: string, windowBytes = FILE_WINDOW_BYTES) {
    this.fd = openSync(filePath, "r");
    this.size = fstatSync(this.fd).size;
    this.window = Buffer.allocUnsafe(windowBytes);
  }

  public get offset(): number {
    return this.pos;
  }

  public get windowBytes(): number {
    return this.window.length;
  }

  public peek(): number {
    if (!this.fill()) return -1;
    return this.window[this.pos - this.windowStart]!;
  }

  public next(): number {
    if (!this.fill()) return -1;
    const b = this.window[this.pos - this.windowStart]!;
    this.pos++;
    return b;
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    closeSync(this.fd);
  }

  private fill(): boolean {
    if (this.pos < this.windowStart + this.windowLen) return true;
    if (this.closed) throw new Error("FileByteSource used after close");
    this.windowStart = this.pos;
    this.windowLen = readSync(this.fd, this.window, 0, this.window.length, this.pos);
    return this.windowLen > 0;
  }
}
