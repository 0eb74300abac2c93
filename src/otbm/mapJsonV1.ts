// src/otbm/mapJsonV1.ts
import type { AttrMapTypeValue } from "./constants.js";
import { attrMapType, attributeValueSize } from "./itemCodec.js";
import type { AttributeMapEntry, GameMap, House, Item, MapHeader, Position, SpawnArea, Tile } from "./model.js";
import { createGameMap, positionKey } from "./model.js";

export const MAP_JSON_SCHEMA = "otbmtools.map.json.v1";

export type Base64Blob = {
  encoding: "base64";
  dataBase64: string;
};

export type PositionJson = { x: number; y: number; z: number };

export type ItemJsonV1 = {
  id: number;
  count?: number;
  charges?: number;
  actionId?: number;
  uniqueId?: number;
  text?: string;
  description?: string;
  destination?: PositionJson;
  depotId?: number;
  houseDoorId?: number;
  duration?: number;
  decayState?: number;
  writtenDate?: number;
  writtenBy?: string;
  attributeMap?: Array<{ key: string; type: number; value: Base64Blob }>;
  contents?: ItemJsonV1[];
  rawUnknownId?: number;
  opaque?: Base64Blob;
};

export type TileJsonV1 = {
  position: PositionJson;
  ground?: ItemJsonV1;
  items?: ItemJsonV1[];
  flags?: number; // u32
  houseId?: number;
  zones?: number[];
  opaque?: Base64Blob;
};

export type MapJsonV1 = {
  schema: typeof MAP_JSON_SCHEMA;

  header: {
    version: number;
    width: number;
    height: number;
    itemsMajor: number;
    itemsMinor: number;
    description?: string;
    spawnFile?: string;
    houseFile?: string;
    npcSpawnFile?: string;
    zoneFile?: string;
    // map-data attributes this engine does not decode
    opaque?: Base64Blob;
  };

  tiles: TileJsonV1[];
  houses?: Array<{
    id: number;
    name: string;
    townId: number;
    rent: number;
    entry?: PositionJson;
    guildhall?: boolean;
  }>;
  towns?: Array<{ id: number; name: string; templePosition: PositionJson }>;
  waypoints?: Array<{ name: string; position: PositionJson }>;
  spawns?: Array<{
    center: PositionJson;
    radius: number;
    creatures: Array<{ name: string; dx: number; dy: number; interval: number }>;
  }>;
};

function toBase64(bytes: Uint8Array): Base64Blob {
  return { encoding: "base64", dataBase64: Buffer.from(bytes).toString("base64") };
}

function fromBase64(blob: Base64Blob): Uint8Array {
  return new Uint8Array(Buffer.from(blob.dataBase64, "base64"));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseBase64Blob(v: unknown, name: string): Base64Blob {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  const enc = v.encoding;
  const data = v.dataBase64;

  if (enc !== "base64") throw new Error(`Invalid ${name}.encoding (expected "base64")`);
  if (typeof data !== "string") throw new Error(`Invalid ${name}.dataBase64 (expected string)`);

  return { encoding: "base64", dataBase64: data };
}

function parseInteger(v: unknown, name: string, min: number, max: number): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
    throw new Error(`Invalid ${name}: expected integer in [${min}, ${max}]`);
  }
  return v;
}

function parseOptionalInt(
  input: Record<string, unknown>,
  key: string,
  name: string,
  min: number,
  max: number,
): number | undefined {
  const v = input[key];
  if (v === undefined) return undefined;
  return parseInteger(v, `${name}.${key}`, min, max);
}

function parseString(v: unknown, name: string): string {
  if (typeof v !== "string") throw new Error(`Invalid ${name}: expected string`);
  return v;
}

function parseOptionalString(input: Record<string, unknown>, key: string, name: string): string | undefined {
  const v = input[key];
  if (v === undefined) return undefined;
  return parseString(v, `${name}.${key}`);
}

function parseArray(v: unknown, name: string): unknown[] {
  if (!Array.isArray(v)) throw new Error(`Invalid ${name}: expected array`);
  return v;
}

function parsePosition(v: unknown, name: string): PositionJson {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  return {
    x: parseInteger(v.x, `${name}.x`, 0, 0xffff),
    y: parseInteger(v.y, `${name}.y`, 0, 0xffff),
    z: parseInteger(v.z, `${name}.z`, 0, 0xff),
  };
}

type ItemIntKey =
  | "count"
  | "charges"
  | "actionId"
  | "uniqueId"
  | "depotId"
  | "houseDoorId"
  | "duration"
  | "decayState"
  | "writtenDate"
  | "rawUnknownId";

const ITEM_INT_FIELDS: ReadonlyArray<readonly [ItemIntKey, number]> = [
  ["count", 0xff],
  ["charges", 0xffff],
  ["actionId", 0xffff],
  ["uniqueId", 0xffff],
  ["depotId", 0xffff],
  ["houseDoorId", 0xff],
  ["duration", 0xffffffff],
  ["decayState", 0xff],
  ["writtenDate", 0xffffffff],
  ["rawUnknownId", 0xffff],
];

const ITEM_STRING_FIELDS = ["text", "description", "writtenBy"] as const;

function parseItem(v: unknown, name: string): ItemJsonV1 {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  const out: ItemJsonV1 = { id: parseInteger(v.id, `${name}.id`, 0, 0xffff) };

  for (const [key, max] of ITEM_INT_FIELDS) {
    const n = parseOptionalInt(v, key, name, 0, max);
    if (n !== undefined) out[key] = n;
  }
  for (const key of ITEM_STRING_FIELDS) {
    const s = parseOptionalString(v, key, name);
    if (s !== undefined) out[key] = s;
  }
  if (v.destination !== undefined) out.destination = parsePosition(v.destination, `${name}.destination`);

  if (v.attributeMap !== undefined) {
    out.attributeMap = parseArray(v.attributeMap, `${name}.attributeMap`).map((e, i) => {
      const en = `${name}.attributeMap[${i}]`;
      if (!isRecord(e)) throw new Error(`Invalid ${en}: expected object`);
      return {
        key: parseString(e.key, `${en}.key`),
        type: parseInteger(e.type, `${en}.type`, 0, 0xff),
        value: parseBase64Blob(e.value, `${en}.value`),
      };
    });
  }
  if (v.contents !== undefined) {
    out.contents = parseArray(v.contents, `${name}.contents`).map((c, i) => parseItem(c, `${name}.contents[${i}]`));
  }
  if (v.opaque !== undefined) out.opaque = parseBase64Blob(v.opaque, `${name}.opaque`);
  return out;
}

function parseTile(v: unknown, name: string): TileJsonV1 {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  const out: TileJsonV1 = { position: parsePosition(v.position, `${name}.position`) };
  if (v.ground !== undefined) out.ground = parseItem(v.ground, `${name}.ground`);
  if (v.items !== undefined) {
    out.items = parseArray(v.items, `${name}.items`).map((it, i) => parseItem(it, `${name}.items[${i}]`));
  }
  const flags = parseOptionalInt(v, "flags", name, 0, 0xffffffff);
  if (flags !== undefined) out.flags = flags;
  const houseId = parseOptionalInt(v, "houseId", name, 0, 0xffffffff);
  if (houseId !== undefined) out.houseId = houseId;
  if (v.zones !== undefined) {
    out.zones = parseArray(v.zones, `${name}.zones`).map((z, i) => parseInteger(z, `${name}.zones[${i}]`, 0, 0xffff));
  }
  if (v.opaque !== undefined) out.opaque = parseBase64Blob(v.opaque, `${name}.opaque`);
  return out;
}

export function parseMapJsonV1(input: unknown): MapJsonV1 {
  if (!isRecord(input)) throw new Error("Invalid JSON: expected object");
  if (input.schema !== MAP_JSON_SCHEMA) throw new Error("Invalid schema");

  const h = input.header;
  if (!isRecord(h)) throw new Error("Invalid header: expected object");
  const header: MapJsonV1["header"] = {
    version: parseInteger(h.version, "header.version", 0, 0xffffffff),
    width: parseInteger(h.width, "header.width", 0, 0xffff),
    height: parseInteger(h.height, "header.height", 0, 0xffff),
    itemsMajor: parseInteger(h.itemsMajor, "header.itemsMajor", 0, 0xffffffff),
    itemsMinor: parseInteger(h.itemsMinor, "header.itemsMinor", 0, 0xffffffff),
  };
  for (const key of ["description", "spawnFile", "houseFile", "npcSpawnFile", "zoneFile"] as const) {
    const s = parseOptionalString(h, key, "header");
    if (s !== undefined) header[key] = s;
  }
  if (h.opaque !== undefined) header.opaque = parseBase64Blob(h.opaque, "header.opaque");

  const out: MapJsonV1 = {
    schema: MAP_JSON_SCHEMA,
    header,
    tiles: parseArray(input.tiles, "tiles").map((t, i) => parseTile(t, `tiles[${i}]`)),
  };

  if (input.houses !== undefined) {
    out.houses = parseArray(input.houses, "houses").map((v, i) => {
      const name = `houses[${i}]`;
      if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
      const house: NonNullable<MapJsonV1["houses"]>[number] = {
        id: parseInteger(v.id, `${name}.id`, 0, 0xffffffff),
        name: parseString(v.name, `${name}.name`),
        townId: parseInteger(v.townId, `${name}.townId`, 0, 0xffffffff),
        rent: parseInteger(v.rent, `${name}.rent`, 0, 0xffffffff),
      };
      if (v.entry !== undefined) house.entry = parsePosition(v.entry, `${name}.entry`);
      if (v.guildhall !== undefined) {
        if (typeof v.guildhall !== "boolean") throw new Error(`Invalid ${name}.guildhall: expected boolean`);
        house.guildhall = v.guildhall;
      }
      return house;
    });
  }

  if (input.towns !== undefined) {
    out.towns = parseArray(input.towns, "towns").map((v, i) => {
      const name = `towns[${i}]`;
      if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
      return {
        id: parseInteger(v.id, `${name}.id`, 0, 0xffffffff),
        name: parseString(v.name, `${name}.name`),
        templePosition: parsePosition(v.templePosition, `${name}.templePosition`),
      };
    });
  }

  if (input.waypoints !== undefined) {
    out.waypoints = parseArray(input.waypoints, "waypoints").map((v, i) => {
      const name = `waypoints[${i}]`;
      if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
      return { name: parseString(v.name, `${name}.name`), position: parsePosition(v.position, `${name}.position`) };
    });
  }

  if (input.spawns !== undefined) {
    out.spawns = parseArray(input.spawns, "spawns").map((v, i) => {
      const name = `spawns[${i}]`;
      if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
      return {
        center: parsePosition(v.center, `${name}.center`),
        radius: parseInteger(v.radius, `${name}.radius`, 0, 0xffff),
        creatures: parseArray(v.creatures, `${name}.creatures`).map((c, j) => {
          const cn = `${name}.creatures[${j}]`;
          if (!isRecord(c)) throw new Error(`Invalid ${cn}: expected object`);
          return {
            name: parseString(c.name, `${cn}.name`),
            dx: parseInteger(c.dx, `${cn}.dx`, -0x8000, 0x7fff),
            dy: parseInteger(c.dy, `${cn}.dy`, -0x8000, 0x7fff),
            interval: parseInteger(c.interval, `${cn}.interval`, 0, 0xffffffff),
          };
        }),
      };
    });
  }

  return out;
}

export function stringifyMapJsonV1(doc: MapJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

// GameMap -> document

function itemToJson(item: Readonly<Item>): ItemJsonV1 {
  const out: ItemJsonV1 = { id: item.id };
  for (const [key] of ITEM_INT_FIELDS) {
    const n = item[key];
    if (n !== undefined) out[key] = n;
  }
  for (const key of ITEM_STRING_FIELDS) {
    const s = item[key];
    if (s !== undefined) out[key] = s;
  }
  if (item.destination) out.destination = { ...item.destination };
  if (item.attributeMap) {
    out.attributeMap = item.attributeMap.map((e) => ({ key: e.key, type: e.type, value: toBase64(e.value) }));
  }
  if (item.contents) out.contents = item.contents.map(itemToJson);
  if (item.opaque) out.opaque = toBase64(item.opaque);
  return out;
}

function tileToJson(tile: Readonly<Tile>): TileJsonV1 {
  const out: TileJsonV1 = { position: { ...tile.position } };
  if (tile.ground) out.ground = itemToJson(tile.ground);
  if (tile.items.length > 0) out.items = tile.items.map(itemToJson);
  if (tile.flags !== 0) out.flags = tile.flags;
  if (tile.houseId !== undefined) out.houseId = tile.houseId;
  if (tile.zones && tile.zones.length > 0) out.zones = [...tile.zones];
  if (tile.opaque) out.opaque = toBase64(tile.opaque);
  return out;
}

/** Tiles are emitted in position-key order so equal maps give equal documents. */
export function mapToJsonV1(map: Readonly<GameMap>): MapJsonV1 {
  const h = map.header;
  const header: MapJsonV1["header"] = {
    version: h.version,
    width: h.width,
    height: h.height,
    itemsMajor: h.itemsMajor,
    itemsMinor: h.itemsMinor,
  };
  for (const key of ["description", "spawnFile", "houseFile", "npcSpawnFile", "zoneFile"] as const) {
    const s = h[key];
    if (s !== undefined) header[key] = s;
  }
  if (h.opaque) header.opaque = toBase64(h.opaque);

  const keys = [...map.tiles.keys()].sort((a, b) => a - b);
  const tiles: TileJsonV1[] = [];
  for (const k of keys) {
    const tile = map.tiles.get(k);
    if (tile) tiles.push(tileToJson(tile));
  }

  const out: MapJsonV1 = { schema: MAP_JSON_SCHEMA, header, tiles };

  if (map.houses.size > 0) {
    out.houses = [...map.houses.values()]
      .sort((a, b) => a.id - b.id)
      .map((house) => {
        const hj: NonNullable<MapJsonV1["houses"]>[number] = {
          id: house.id,
          name: house.name,
          townId: house.townId,
          rent: house.rent,
        };
        if (house.entry) hj.entry = { ...house.entry };
        if (house.guildhall) hj.guildhall = true;
        return hj;
      });
  }
  if (map.towns.size > 0) {
    out.towns = [...map.towns.values()]
      .sort((a, b) => a.id - b.id)
      .map((t) => ({ id: t.id, name: t.name, templePosition: { ...t.templePosition } }));
  }
  if (map.waypoints.size > 0) {
    out.waypoints = [...map.waypoints.values()].map((w) => ({ name: w.name, position: { ...w.position } }));
  }
  if (map.spawns.length > 0) {
    out.spawns = map.spawns.map((s) => ({
      center: { ...s.center },
      radius: s.radius,
      creatures: s.creatures.map((c) => ({ name: c.name, dx: c.offset.dx, dy: c.offset.dy, interval: c.interval })),
    }));
  }
  return out;
}

// document -> GameMap

function attributeEntryFromJson(e: { key: string; type: number; value: Base64Blob }, name: string): AttributeMapEntry {
  const type: AttrMapTypeValue | undefined = attrMapType(e.type);
  if (type === undefined) throw new Error(`Invalid ${name}.type: unknown attribute value type ${e.type}`);
  const value = fromBase64(e.value);
  const size = attributeValueSize(type);
  if (size !== null && value.length !== size) {
    throw new Error(`Invalid ${name}.value: type ${type} needs ${size} bytes, got ${value.length}`);
  }
  return { key: e.key, type, value };
}

function itemFromJson(j: ItemJsonV1, name: string): Item {
  const out: Item = { id: j.id };
  for (const [key] of ITEM_INT_FIELDS) {
    const n = j[key];
    if (n !== undefined) out[key] = n;
  }
  for (const key of ITEM_STRING_FIELDS) {
    const s = j[key];
    if (s !== undefined) out[key] = s;
  }
  if (j.destination) out.destination = { ...j.destination };
  if (j.attributeMap && j.attributeMap.length > 0) {
    out.attributeMap = j.attributeMap.map((e, i) => attributeEntryFromJson(e, `${name}.attributeMap[${i}]`));
  }
  if (j.contents) out.contents = j.contents.map((c, i) => itemFromJson(c, `${name}.contents[${i}]`));
  if (j.opaque) out.opaque = fromBase64(j.opaque);
  return out;
}

/**
 * Builds a GameMap from a parsed document. House tile lists are rebuilt from
 * the tiles, as they are on load.
 */
export function mapFromJsonV1(doc: MapJsonV1): GameMap {
  if (doc.schema !== MAP_JSON_SCHEMA) throw new Error(`Unsupported schema: ${doc.schema}`);

  const dh = doc.header;
  const header: Partial<MapHeader> = {
    version: dh.version,
    width: dh.width,
    height: dh.height,
    itemsMajor: dh.itemsMajor,
    itemsMinor: dh.itemsMinor,
  };
  for (const key of ["description", "spawnFile", "houseFile", "npcSpawnFile", "zoneFile"] as const) {
    const s = dh[key];
    if (s !== undefined) header[key] = s;
  }
  if (dh.opaque) header.opaque = fromBase64(dh.opaque);
  const map = createGameMap(header);

  for (const hj of doc.houses ?? []) {
    const house: House = { id: hj.id, name: hj.name, townId: hj.townId, rent: hj.rent, tiles: [], guildhall: hj.guildhall === true };
    if (hj.entry) house.entry = { ...hj.entry };
    map.houses.set(house.id, house);
  }

  doc.tiles.forEach((tj, i) => {
    const name = `tiles[${i}]`;
    const position: Position = { ...tj.position };
    const key = positionKey(position);
    if (map.tiles.has(key)) throw new Error(`Invalid ${name}: duplicate tile at (${position.x},${position.y},${position.z})`);

    const tile: Tile = {
      position,
      items: (tj.items ?? []).map((it, j) => itemFromJson(it, `${name}.items[${j}]`)),
      flags: tj.flags ?? 0,
    };
    if (tj.ground) tile.ground = itemFromJson(tj.ground, `${name}.ground`);
    if (tj.houseId !== undefined) {
      tile.houseId = tj.houseId;
      map.houses.get(tj.houseId)?.tiles.push({ ...position });
    }
    const zones = [...new Set(tj.zones ?? [])].filter((z) => z !== 0).sort((a, b) => a - b);
    if (zones.length > 0) tile.zones = zones;
    if (tj.opaque) tile.opaque = fromBase64(tj.opaque);
    map.tiles.set(key, tile);
  });

  for (const t of doc.towns ?? []) {
    map.towns.set(t.id, { id: t.id, name: t.name, templePosition: { ...t.templePosition } });
  }
  for (const w of doc.waypoints ?? []) {
    map.waypoints.set(w.name, { name: w.name, position: { ...w.position } });
  }
  for (const s of doc.spawns ?? []) {
    const spawn: SpawnArea = {
      center: { ...s.center },
      radius: s.radius,
      creatures: s.creatures.map((c) => ({ name: c.name, offset: { dx: c.dx, dy: c.dy }, interval: c.interval })),
    };
    map.spawns.push(spawn);
  }
  return map;
}
