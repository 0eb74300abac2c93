import { describe, expect, it } from "vitest";

import { BufferByteSource } from "../src/otbm/byteSource.js";
import { ResourceLimitExceededError } from "../src/otbm/errors.js";
import type { NodeEvent } from "../src/otbm/nodeReader.js";
import { NodeReader, readIdentifier } from "../src/otbm/nodeReader.js";
import { BufferSink, NodeWriter } from "../src/otbm/nodeWriter.js";
import { hex, toHex } from "./helpers.js";

function events(bytes: Uint8Array): string[] {
  const reader = new NodeReader(new BufferByteSource(bytes));
  const out: string[] = [];
  for (let ev: NodeEvent | null = reader.read(); ev !== null; ev = reader.read()) {
    out.push(ev.kind === "open" ? `open ${ev.type}@${ev.depth}` : `close ${ev.type}@${ev.depth}`);
  }
  return out;
}

describe("NodeReader", () => {
  it("emits open and close events in document order", () => {
    expect(events(hex("fe 00 fe 02 fe 04 ff ff fe 0c ff ff"))).toEqual([
      "open 0@0",
      "open 2@1",
      "open 4@2",
      "close 4@2",
      "close 2@1",
      "open 12@1",
      "close 12@1",
      "close 0@0",
    ]);
  });

  it("decodes escaped payload fields", () => {
    const reader = new NodeReader(new BufferByteSource(hex("fe 05 fd ff fd fe 03 00 41 42 43 ff")));
    const ev = reader.read();
    if (ev === null || ev.kind !== "open") throw new Error("expected open event");
    expect(ev.payload.readU16LE()).toBe(0xfeff);
    expect(ev.payload.readString()).toBe("ABC");
    expect(ev.payload.atEnd()).toBe(true);
    expect(reader.read()).toMatchObject({ kind: "close", type: 5 });
    expect(reader.read()).toBeNull();
  });

  it("skips unread payload bytes when moving on", () => {
    const reader = new NodeReader(new BufferByteSource(hex("fe 00 01 02 03 fe 06 09 ff ff")));
    reader.read();
    const child = reader.read();
    expect(child).toMatchObject({ kind: "open", type: 6, depth: 1 });
  });

  it("skips a whole subtree", () => {
    const reader = new NodeReader(new BufferByteSource(hex("fe 00 fe 04 fe 05 fe 06 ff ff ff fe 0f ff ff")));
    reader.read();
    reader.read();
    reader.skipSubtree();
    expect(reader.read()).toMatchObject({ kind: "open", type: 15, depth: 1 });
  });

  it("names the open path in corruption errors", () => {
    const reader = new NodeReader(new BufferByteSource(hex("fe 00 fe 02 fe 04")));
    reader.read();
    reader.read();
    reader.read();
    expect(() => reader.read()).toThrow(
      "Unexpected end of stream inside node (offset 6, node ROOT/MAP_DATA/TILE_AREA)",
    );
  });

  it("reports how many nodes a truncated stream left open", () => {
    const reader = new NodeReader(new BufferByteSource(hex("fe 00 fe 02 ff")));
    reader.read();
    reader.read();
    reader.read();
    expect(() => reader.read()).toThrow("Truncated stream: 1 node(s) still open (offset 5, node ROOT)");
  });

  it("rejects streams that do not form one balanced tree", () => {
    expect(() => events(hex(""))).toThrow(/Empty node stream/);
    expect(() => events(hex("ff"))).toThrow(/Unmatched node end/);
    expect(() => events(hex("41"))).toThrow(/Expected node start or end, found 0x41/);
    expect(() => events(hex("fe 00 ff fe 00 ff"))).toThrow(/Trailing bytes after root node/);
    expect(() => events(hex("fe 00 ff 00"))).toThrow(/Trailing bytes after root node/);
  });

  it("enforces the nesting limit without recursion", () => {
    const deep = new Uint8Array(2 * 200 + 200);
    for (let i = 0; i < 200; i++) {
      deep[i * 2] = 0xfe;
      deep[i * 2 + 1] = 0x06;
    }
    deep.fill(0xff, 400);
    const reader = new NodeReader(new BufferByteSource(deep), { maxDepth: 100 });
    expect(() => {
      while (reader.read() !== null) {
        // drain
      }
    }).toThrow(ResourceLimitExceededError);
  });

  it("reads a deep but permitted tree", () => {
    const depth = 500;
    const deep = new Uint8Array(depth * 3);
    for (let i = 0; i < depth; i++) {
      deep[i * 2] = 0xfe;
      deep[i * 2 + 1] = 0x06;
    }
    deep.fill(0xff, depth * 2);
    const reader = new NodeReader(new BufferByteSource(deep), { maxDepth: depth });
    let closes = 0;
    for (let ev = reader.read(); ev !== null; ev = reader.read()) if (ev.kind === "close") closes++;
    expect(closes).toBe(depth);
  });

  it("reads the four identifier bytes", () => {
    const src = new BufferByteSource(hex("4f 54 42 4d fe"));
    expect(toHex(readIdentifier(src))).toBe("4f 54 42 4d");
    expect(src.offset).toBe(4);
    expect(() => readIdentifier(new BufferByteSource(hex("4f 54")))).toThrow(/File too short for identifier/);
  });
});

describe("NodeWriter", () => {
  it("escapes payloads and balances markers", () => {
    const sink = new BufferSink();
    const w = new NodeWriter(sink);
    w.writeIdentifier(hex("00 00 00 00"));
    w.open(0, hex("ff 01"));
    w.leaf(6, hex("fd"));
    w.close();
    w.finish();
    expect(toHex(sink.toBytes())).toBe("00 00 00 00 fe 00 fd ff 01 fe 06 fd fd ff ff");
    expect(sink.bytesWritten).toBe(15);
  });

  it("refuses to finish with open nodes", () => {
    const w = new NodeWriter(new BufferSink());
    w.open(0);
    expect(() => w.finish()).toThrow("finish() with 1 node(s) still open");
    w.close();
    expect(() => w.close()).toThrow("close() with no open node");
  });

  it("produces what the reader consumes", () => {
    const sink = new BufferSink();
    const w = new NodeWriter(sink);
    w.open(0, hex("fe fe"));
    w.open(2);
    w.leaf(12, hex("01 fd 02"));
    w.close();
    w.close();
    w.finish();

    const reader = new NodeReader(new BufferByteSource(sink.toBytes()));
    const root = reader.read();
    if (root === null || root.kind !== "open") throw new Error("expected root");
    expect(toHex(root.payload.rest())).toBe("fe fe");
    reader.read();
    const town = reader.read();
    if (town === null || town.kind !== "open") throw new Error("expected child");
    expect(toHex(town.payload.rest())).toBe("01 fd 02");
  });
});
