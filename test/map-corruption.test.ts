import { describe, expect, it } from "vitest";

import type { FormatContext } from "../src/otbm/context.js";
import type { MapFormatError } from "../src/otbm/errors.js";
import { StructuralCorruptionError, VersionUnsupportedError } from "../src/otbm/errors.js";
import type { LoadResult } from "../src/otbm/mapLoader.js";
import { loadMap } from "../src/otbm/mapLoader.js";
import { getTile } from "../src/otbm/model.js";
import { ascii, bytes, hex, node, otbmFile, u16 } from "./helpers.js";

const SCENARIO_A = hex(`
  4f 54 42 4d
  fe 00 02 00 00 00 64 00 64 00 03 00 00 00 39 00 00 00
  fe 02 fe 04 00 00 00 00 07 fe 05 00 00 09 64 00 ff ff ff ff
`);

function loadFail(input: Uint8Array, ctx: FormatContext = {}): MapFormatError {
  const result: LoadResult = loadMap(input, ctx);
  if (result.ok) throw new Error("expected the load to fail");
  expect(result.report.success).toBe(false);
  return result.error;
}

function area(tiles: number[][]): number[] {
  return node(4, [0, 0, 0, 0, 7], tiles);
}

function groundTile(x: number, y: number, id = 100): number[] {
  return node(5, [x, y, 0x09, ...u16(id)]);
}

describe("structural corruption", () => {
  it("fails on an unescaped END byte inside a header field", () => {
    const broken = SCENARIO_A.slice();
    broken[10] = 0xff; // low byte of the width
    const err = loadFail(broken);
    expect(err).toBeInstanceOf(StructuralCorruptionError);
    expect(err.message).toBe("Truncated field: needed 2 bytes, got 0 (offset 10, node ROOT)");
  });

  it("fails on an unescaped END byte inside an item id", () => {
    const broken = SCENARIO_A.slice();
    broken[36] = 0xff; // low byte of the ground id
    const err = loadFail(broken);
    expect(err.kind).toBe("StructuralCorruption");
    expect(err.message).toBe(
      "Truncated field: needed 2 bytes, got 0 (offset 36, node ROOT/MAP_DATA/TILE_AREA/TILE)",
    );
  });

  it("fails on a foreign identifier", () => {
    const broken = SCENARIO_A.slice();
    broken[3] = 0x58;
    expect(loadFail(broken).message).toBe('Not an OTBM file: identifier "OTBX" (offset 0)');
    expect(loadFail(Uint8Array.from(ascii('{"name": "x"}'))).message).toMatch(/looks like json/);
  });

  it("fails on a stream cut short", () => {
    expect(loadFail(SCENARIO_A.subarray(0, SCENARIO_A.length - 2)).message).toBe(
      "Truncated stream: 2 node(s) still open (offset 40, node ROOT/MAP_DATA)",
    );
    expect(loadFail(new Uint8Array(0)).message).toBe("File too short for identifier (offset 0)");
  });

  it("fails on an escape byte with nothing after it", () => {
    expect(loadFail(hex("4f 54 42 4d fe 00 fd")).message).toMatch(/^Dangling escape byte at end of stream/);
  });

  it("fails on bytes after the root node", () => {
    expect(loadFail(bytes(Array.from(SCENARIO_A), [0])).message).toMatch(/^Trailing bytes after root node/);
  });

  it("fails on a root node of another type", () => {
    const broken = SCENARIO_A.slice();
    broken[5] = 0x02;
    expect(loadFail(broken).message).toBe("Unexpected root node type 2 (offset 4)");
  });

  it("names the version it does not support", () => {
    const newer = SCENARIO_A.slice();
    newer[6] = 7;
    const err = loadFail(newer);
    expect(err).toBeInstanceOf(VersionUnsupportedError);
    expect(err.message).toBe("Unsupported OTBM version 7 (this engine supports 0..6)");
  });
});

describe("recoverable anomalies", () => {
  it("skips nodes it does not know", () => {
    const file = otbmFile({ version: 2, width: 64, height: 64 }, [], [
      node(0x30, [1, 2, 3], [node(5, [0, 0])]),
      area([groundTile(1, 1)]),
    ]);
    const result = loadMap(file);
    if (!result.ok) throw result.error;
    expect(result.map.tiles.size).toBe(1);
    expect(result.report.warnings.map((w) => [w.code, w.offset])).toEqual([["unexpected_node", 24]]);
  });

  it("keeps the last of two tiles at one position", () => {
    const file = otbmFile({ version: 2, width: 64, height: 64 }, [], [area([groundTile(1, 1, 100), groundTile(1, 1, 101)])]);
    const result = loadMap(file);
    if (!result.ok) throw result.error;
    expect(getTile(result.map, { x: 1, y: 1, z: 7 })?.ground).toEqual({ id: 101 });
    expect(result.report.warnings).toEqual([
      {
        code: "duplicate_tile",
        severity: "warning",
        message: "Tile (1,1,7) appears more than once; keeping the last",
        position: { x: 1, y: 1, z: 7 },
      },
    ]);
  });

  it("drops tiles whose offset runs past the coordinate range", () => {
    const file = otbmFile({ version: 2, width: 64, height: 64 }, [], [
      area([groundTile(0, 1, 100)]),
      node(4, [0xff, 0xff, 0, 0, 7], [groundTile(1, 0, 101)]),
    ]);
    const result = loadMap(file);
    if (!result.ok) throw result.error;
    expect(result.map.tiles.size).toBe(1);
    expect(getTile(result.map, { x: 0, y: 1, z: 7 })?.ground).toEqual({ id: 100 });
    expect(result.report.warnings).toEqual([
      {
        code: "invalid_position",
        severity: "warning",
        message: "Tile (65536,0,7) lies past the coordinate range; dropped",
        position: { x: 65536, y: 0, z: 7 },
      },
    ]);
  });

  it("keeps tiles outside the declared size with a warning", () => {
    const file = otbmFile({ version: 2, width: 64, height: 64 }, [], [area([groundTile(70, 5)])]);
    const result = loadMap(file);
    if (!result.ok) throw result.error;
    expect(result.map.tiles.size).toBe(1);
    expect(result.report.warnings.map((w) => w.message)).toEqual(["Tile (70,5,7) is outside the 64x64 map"]);
  });

  it("caps repeated issues per code", () => {
    const file = otbmFile({ version: 2, width: 8, height: 8 }, [], [
      area([groundTile(10, 1), groundTile(11, 1), groundTile(12, 1)]),
    ]);
    const result = loadMap(file, { issueCap: 1 });
    if (!result.ok) throw result.error;
    expect(result.report.warnings).toHaveLength(1);
    expect(result.report.suppressed).toEqual({ out_of_bounds: 2 });
  });
});

describe("resource limits", () => {
  it("refuses inputs larger than the byte limit before decoding", () => {
    const err = loadFail(SCENARIO_A, { limits: { maxFileBytes: 10 } });
    expect(err.kind).toBe("ResourceLimitExceeded");
    expect(err.message).toBe("Resource limit exceeded: file bytes 42 > 10");
  });

  it("stops at the tile limit", () => {
    const file = otbmFile({ version: 2, width: 64, height: 64 }, [], [area([groundTile(1, 1), groundTile(2, 2)])]);
    expect(loadFail(file, { limits: { maxTiles: 1 } }).message).toBe("Resource limit exceeded: tiles 2 > 1");
  });

  it("counts compact ground items against the item limit", () => {
    const file = otbmFile({ version: 2, width: 64, height: 64 }, [], [area([groundTile(1, 1), groundTile(2, 2)])]);
    expect(loadFail(file, { limits: { maxItems: 1 } }).message).toBe("Resource limit exceeded: items 2 > 1");
  });

  it("stops at the nesting limit", () => {
    expect(loadFail(SCENARIO_A, { limits: { maxDepth: 3 } }).message).toBe(
      "Resource limit exceeded: node depth 4 > 3",
    );
  });

  it("rejects limit values that are not positive integers", () => {
    expect(() => loadMap(SCENARIO_A, { limits: { maxTiles: 0 } })).toThrow(
      "Invalid limit maxTiles: expected positive integer, got 0",
    );
  });
});

describe("cancellation", () => {
  it("stops when the signal is aborted", () => {
    const controller = new AbortController();
    controller.abort();
    const err = loadFail(SCENARIO_A, { signal: controller.signal });
    expect(err.kind).toBe("Cancelled");
    expect(err.message).toBe("Load cancelled");
  });
});
