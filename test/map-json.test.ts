import { describe, expect, it } from "vitest";

import { AttrMapType } from "../src/otbm/constants.js";
import { formatForVersion } from "../src/otbm/formatVersion.js";
import { attributeMapValue } from "../src/otbm/itemCodec.js";
import { loadMap } from "../src/otbm/mapLoader.js";
import { saveMap } from "../src/otbm/mapSaver.js";
import type { MapJsonV1 } from "../src/otbm/mapJsonV1.js";
import { MAP_JSON_SCHEMA, mapFromJsonV1, mapToJsonV1, parseMapJsonV1, stringifyMapJsonV1 } from "../src/otbm/mapJsonV1.js";
import type { GameMap } from "../src/otbm/model.js";
import { createGameMap, createItem, createTile, setTile } from "../src/otbm/model.js";

function sampleMap(): GameMap {
  const map = createGameMap({ width: 512, height: 512, description: "JSON sample" });
  setTile(map, { ...createTile({ x: 20, y: 10, z: 7 }), ground: createItem(100), flags: 1 });
  setTile(map, {
    ...createTile({ x: 10, y: 10, z: 7 }),
    ground: createItem(100),
    houseId: 3,
    zones: [4],
    items: [
      createItem(1987, { contents: [createItem(2160, { count: 7 })] }),
      createItem(3000, {
        attributeMap: [{ key: "weight", type: AttrMapType.INTEGER, value: Uint8Array.of(0xfe, 0xff, 0xff, 0xff) }],
        opaque: Uint8Array.of(0x50, 1),
      }),
    ],
  });
  map.houses.set(3, { id: 3, name: "Test House", townId: 1, rent: 100, tiles: [{ x: 10, y: 10, z: 7 }], guildhall: true });
  map.towns.set(1, { id: 1, name: "Testville", templePosition: { x: 10, y: 11, z: 7 } });
  map.waypoints.set("Temple", { name: "Temple", position: { x: 10, y: 12, z: 7 } });
  map.spawns.push({ center: { x: 15, y: 15, z: 7 }, radius: 2, creatures: [{ name: "Rat", offset: { dx: 1, dy: -1 }, interval: 60 }] });
  return map;
}

describe("mapToJsonV1", () => {
  it("writes tiles in position order and omits empty fields", () => {
    const doc = mapToJsonV1(sampleMap());
    expect(doc.schema).toBe(MAP_JSON_SCHEMA);
    expect(doc.header).toEqual({
      version: 2,
      width: 512,
      height: 512,
      itemsMajor: 3,
      itemsMinor: 57,
      description: "JSON sample",
    });
    expect(doc.tiles.map((t) => t.position.x)).toEqual([10, 20]);
    expect(doc.tiles[1]).toEqual({ position: { x: 20, y: 10, z: 7 }, ground: { id: 100 }, flags: 1 });
    expect(doc.tiles[0]?.items?.[1]).toEqual({
      id: 3000,
      attributeMap: [{ key: "weight", type: 2, value: { encoding: "base64", dataBase64: "/v///w==" } }],
      opaque: { encoding: "base64", dataBase64: "UAE=" },
    });
    expect(doc.houses).toEqual([
      { id: 3, name: "Test House", townId: 1, rent: 100, guildhall: true },
    ]);
    expect(doc.spawns).toEqual([{ center: { x: 15, y: 15, z: 7 }, radius: 2, creatures: [{ name: "Rat", dx: 1, dy: -1, interval: 60 }] }]);
  });

  it("ends the text form with a newline", () => {
    const text = stringifyMapJsonV1(mapToJsonV1(createGameMap()));
    expect(text.endsWith("}\n")).toBe(true);
    expect(text.startsWith('{\n  "schema": "otbmtools.map.json.v1",')).toBe(true);
  });
});

describe("mapFromJsonV1", () => {
  it("rebuilds the same map from the text form", () => {
    const original = sampleMap();
    const text = stringifyMapJsonV1(mapToJsonV1(original));
    const rebuilt = mapFromJsonV1(parseMapJsonV1(JSON.parse(text)));
    expect(rebuilt).toEqual(original);
  });

  it("gives the same binary file as the map it came from", () => {
    const original = sampleMap();
    const rebuilt = mapFromJsonV1(parseMapJsonV1(JSON.parse(stringifyMapJsonV1(mapToJsonV1(original)))));
    const format = formatForVersion(2, { embedSpawns: true });
    expect(saveMap(rebuilt, format).bytes).toEqual(saveMap(original, format).bytes);

    const loaded = loadMap(saveMap(rebuilt, format).bytes, { houses: [...rebuilt.houses.values()] });
    if (!loaded.ok) throw loaded.error;
    expect(mapToJsonV1(loaded.map)).toEqual(mapToJsonV1(original));
  });

  it("refuses two tiles at one position", () => {
    const doc: MapJsonV1 = {
      schema: MAP_JSON_SCHEMA,
      header: { version: 2, width: 8, height: 8, itemsMajor: 3, itemsMinor: 57 },
      tiles: [{ position: { x: 1, y: 1, z: 7 } }, { position: { x: 1, y: 1, z: 7 } }],
    };
    expect(() => mapFromJsonV1(doc)).toThrow("Invalid tiles[1]: duplicate tile at (1,1,7)");
  });

  it("checks attribute value sizes", () => {
    const doc: MapJsonV1 = {
      schema: MAP_JSON_SCHEMA,
      header: { version: 2, width: 8, height: 8, itemsMajor: 3, itemsMinor: 57 },
      tiles: [
        {
          position: { x: 1, y: 1, z: 7 },
          items: [{ id: 5, attributeMap: [{ key: "k", type: 4, value: { encoding: "base64", dataBase64: "AAA=" } }] }],
        },
      ],
    };
    expect(() => mapFromJsonV1(doc)).toThrow("Invalid tiles[0].items[0].attributeMap[0].value: type 4 needs 1 bytes, got 2");
  });

  it("drops zone 0 and duplicate zones", () => {
    const map = mapFromJsonV1({
      schema: MAP_JSON_SCHEMA,
      header: { version: 2, width: 8, height: 8, itemsMajor: 3, itemsMinor: 57 },
      tiles: [{ position: { x: 1, y: 1, z: 7 }, zones: [5, 0, 2, 5] }, { position: { x: 2, y: 1, z: 7 }, zones: [0] }],
    });
    expect([...map.tiles.values()].map((t) => t.zones)).toEqual([[2, 5], undefined]);
  });
});

describe("parseMapJsonV1", () => {
  it("rejects other schemas", () => {
    expect(() => parseMapJsonV1({ schema: "something.else", header: {}, tiles: [] })).toThrow("Invalid schema");
  });

  it("names the offending field", () => {
    const input = {
      schema: MAP_JSON_SCHEMA,
      header: { version: 2, width: 8, height: 8, itemsMajor: 3, itemsMinor: 57 },
      tiles: [{ position: { x: 1, y: 1, z: 7 }, ground: { id: 70000 } }],
    };
    expect(() => parseMapJsonV1(input)).toThrow("Invalid tiles[0].ground.id: expected integer in [0, 65535]");
  });

  it("rejects a malformed base64 blob", () => {
    const input = {
      schema: MAP_JSON_SCHEMA,
      header: { version: 2, width: 8, height: 8, itemsMajor: 3, itemsMinor: 57, opaque: { encoding: "hex", dataBase64: "00" } },
      tiles: [],
    };
    expect(() => parseMapJsonV1(input)).toThrow('Invalid header.opaque.encoding (expected "base64")');
  });
});

describe("attributeMapValue", () => {
  it("decodes values by type", () => {
    expect(attributeMapValue({ key: "w", type: AttrMapType.INTEGER, value: Uint8Array.of(0xfe, 0xff, 0xff, 0xff) })).toBe(-2);
    expect(attributeMapValue({ key: "s", type: AttrMapType.STRING, value: Uint8Array.of(0x68, 0x69) })).toBe("hi");
    expect(attributeMapValue({ key: "b", type: AttrMapType.BOOLEAN, value: Uint8Array.of(0) })).toBe(false);
    expect(attributeMapValue({ key: "n", type: AttrMapType.NONE, value: new Uint8Array(0) })).toBeNull();
    expect(attributeMapValue({ key: "f", type: AttrMapType.FLOAT, value: Uint8Array.of(0, 0, 0xc0, 0x3f) })).toBe(1.5);
  });
});
