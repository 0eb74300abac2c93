import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { analyzeConversion, runConvertTool } from "../src/otbm/convertTool.js";
import { formatForVersion } from "../src/otbm/formatVersion.js";
import { ItemGroup, readItemDatabase } from "../src/otbm/itemDatabase.js";
import { mapToJsonV1, stringifyMapJsonV1 } from "../src/otbm/mapJsonV1.js";
import { loadMap } from "../src/otbm/mapLoader.js";
import { saveMap } from "../src/otbm/mapSaver.js";
import type { GameMap } from "../src/otbm/model.js";
import { createGameMap, createItem, createTile, getTile, setTile } from "../src/otbm/model.js";
import { buildItemsOtb } from "./helpers.js";

const ITEMS_OTB = buildItemsOtb([
  { serverId: 100, clientId: 5000, group: ItemGroup.GROUND },
  { serverId: 1987, clientId: 4987, group: ItemGroup.CONTAINER },
]);
const DB = readItemDatabase(ITEMS_OTB);

function mapWith(ids: number[]): GameMap {
  const map = createGameMap({ width: 64, height: 64 });
  const [ground, ...rest] = ids;
  setTile(map, {
    ...createTile({ x: 4, y: 4, z: 7 }),
    ...(ground !== undefined ? { ground: createItem(ground) } : {}),
    items: rest.map((id) => createItem(id)),
  });
  return map;
}

async function loadVersion(file: string): Promise<{ version: number; groundId: number | undefined }> {
  const result = loadMap(new Uint8Array(await readFile(file)), { itemDatabase: DB });
  if (!result.ok) throw result.error;
  return { version: result.map.header.version, groundId: getTile(result.map, { x: 4, y: 4, z: 7 })?.ground?.id };
}

describe("analyzeConversion", () => {
  it("accepts a map whose ids all have client ids", () => {
    const check = analyzeConversion(mapWith([100, 1987]), { otbmVersion: 5 }, { itemDatabase: DB });
    expect(check.ok).toBe(true);
    expect(check.format.usesClientIds).toBe(true);
  });

  it("names the ids a client id target cannot hold", () => {
    const check = analyzeConversion(mapWith([100, 555]), { otbmVersion: 6 }, { itemDatabase: DB });
    if (check.ok) throw new Error("expected a failed check");
    expect(check.error.kind).toBe("UnmappableId");
    expect(check.error.message).toBe("Unmappable server id: 555 at (4,4,7)");
  });

  it("needs an item database for client id targets", () => {
    const check = analyzeConversion(mapWith([100]), { otbmVersion: 5 });
    if (check.ok) throw new Error("expected a failed check");
    expect(check.error.kind).toBe("ItemDatabaseRequired");
  });
});

describe("runConvertTool", () => {
  let root = "";
  let itemsPath = "";

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    root = await mkdtemp(path.join(os.tmpdir(), "otbm-convert-"));
    itemsPath = path.join(root, "items.otb");
    await writeFile(itemsPath, ITEMS_OTB);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("writes a copy beside the input by default", async () => {
    const input = path.join(root, "world.otbm");
    await writeFile(input, saveMap(mapWith([100]), formatForVersion(2)).bytes);

    const summary = await runConvertTool(input, { target: { otbmVersion: 5 }, itemsPath });
    expect(summary).toEqual({ processed: 1, written: 1, skipped: 0, failed: 0 });
    expect(await loadVersion(path.join(root, "world.v5.otbm"))).toEqual({ version: 5, groundId: 100 });
  });

  it("skips an existing output unless told to overwrite", async () => {
    const input = path.join(root, "world.otbm");
    await writeFile(input, saveMap(mapWith([100]), formatForVersion(2)).bytes);
    await writeFile(path.join(root, "world.v1.otbm"), "keep");

    expect(await runConvertTool(input, { target: { otbmVersion: 1 } })).toEqual({
      processed: 1,
      written: 0,
      skipped: 1,
      failed: 0,
    });
    expect(await readFile(path.join(root, "world.v1.otbm"), "utf8")).toBe("keep");

    await runConvertTool(input, { target: { otbmVersion: 1 }, overwrite: true });
    expect(await loadVersion(path.join(root, "world.v1.otbm"))).toEqual({ version: 1, groundId: 100 });
  });

  it("writes nothing on a dry run", async () => {
    const input = path.join(root, "world.otbm");
    await writeFile(input, saveMap(mapWith([100]), formatForVersion(2)).bytes);
    const summary = await runConvertTool(input, { target: { otbmVersion: 3 }, dryRun: true });
    expect(summary).toEqual({ processed: 1, written: 0, skipped: 0, failed: 0 });
    expect((await readdir(root)).sort()).toEqual(["items.otb", "world.otbm"]);
  });

  it("converts in place and keeps a backup", async () => {
    const input = path.join(root, "world.otbm");
    const before = saveMap(mapWith([100]), formatForVersion(2)).bytes;
    await writeFile(input, before);

    await runConvertTool(input, { target: { otbmVersion: 5 }, inPlace: true, backup: true, itemsPath });
    expect(new Uint8Array(await readFile(`${input}.bak`))).toEqual(before);
    expect(await loadVersion(input)).toEqual({ version: 5, groundId: 100 });
  });

  it("reads JSON documents", async () => {
    const input = path.join(root, "export.json");
    await writeFile(input, stringifyMapJsonV1(mapToJsonV1(mapWith([100, 1987]))));
    const out = path.join(root, "out", "from-json.otbm");

    await runConvertTool(input, { target: { otbmVersion: 6 }, out, itemsPath });
    expect(await loadVersion(out)).toEqual({ version: 6, groundId: 100 });
  });

  it("does not convert its own output inside a relative input directory", async () => {
    const maps = path.join(root, "maps");
    await mkdir(maps, { recursive: true });
    await writeFile(path.join(maps, "good.otbm"), saveMap(mapWith([100]), formatForVersion(2)).bytes);
    const relMaps = path.relative(process.cwd(), maps);
    const relOut = path.join(relMaps, "out");

    const first = await runConvertTool(relMaps, { target: { otbmVersion: 3 }, out: relOut, recursive: true });
    expect(first).toEqual({ processed: 1, written: 1, skipped: 0, failed: 0 });

    const again = await runConvertTool(relMaps, {
      target: { otbmVersion: 3 },
      out: relOut,
      recursive: true,
      overwrite: true,
    });
    expect(again).toEqual({ processed: 1, written: 1, skipped: 0, failed: 0 });
    expect(await readdir(path.join(maps, "out"))).toEqual(["good.otbm"]);
  });

  it("counts failures per file in directory mode", async () => {
    const maps = path.join(root, "maps");
    await mkdir(path.join(maps, "nested"), { recursive: true });
    await writeFile(path.join(maps, "good.otbm"), saveMap(mapWith([100]), formatForVersion(2)).bytes);
    await writeFile(path.join(maps, "unmapped.otbm"), saveMap(mapWith([100, 555]), formatForVersion(2)).bytes);
    await writeFile(path.join(maps, "broken.otbm"), "OTBM not really");
    await writeFile(path.join(maps, "notes.txt"), "ignored");
    await writeFile(path.join(maps, "nested", "deep.otbm"), saveMap(mapWith([100]), formatForVersion(2)).bytes);

    const out = path.join(root, "converted");
    const summary = await runConvertTool(maps, { target: { otbmVersion: 5 }, out, itemsPath });
    expect(summary).toEqual({ processed: 3, written: 1, skipped: 0, failed: 2 });
    expect(await readdir(out)).toEqual(["good.otbm"]);

    const deep = await runConvertTool(maps, { target: { otbmVersion: 5 }, out, itemsPath, recursive: true });
    expect(deep).toEqual({ processed: 4, written: 1, skipped: 1, failed: 2 });
    expect(await loadVersion(path.join(out, "nested", "deep.otbm"))).toEqual({ version: 5, groundId: 100 });
  });
});
