// src/otbm/mapDataCodec.ts
import type { BinaryWriter } from "./binary.js";
import { Attr } from "./constants.js";
import { readAttributes } from "./itemCodec.js";
import type { MapHeader, SpawnArea, SpawnCreature, Town, Waypoint } from "./model.js";
import type { NodePayload } from "./nodeReader.js";
import type { ReportBuilder } from "./report.js";

export type RootHeader = Readonly<{
  version: number;
  width: number;
  height: number;
  itemsMajor: number;
  itemsMinor: number;
}>;

export function decodeRootHeader(p: NodePayload): RootHeader {
  const version = p.readU32LE();
  const width = p.readU16LE();
  const height = p.readU16LE();
  const itemsMajor = p.readU32LE();
  const itemsMinor = p.readU32LE();
  return { version, width, height, itemsMajor, itemsMinor };
}

export function encodeRootHeader(h: RootHeader, w: BinaryWriter): void {
  w.writeU32LE(h.version)
    .writeU16LE(h.width)
    .writeU16LE(h.height)
    .writeU32LE(h.itemsMajor)
    .writeU32LE(h.itemsMinor);
}

type FileRefKey = "spawnFile" | "houseFile" | "npcSpawnFile" | "zoneFile";

const FILE_REFS: ReadonlyArray<readonly [number, FileRefKey]> = [
  [Attr.EXT_SPAWN_FILE, "spawnFile"],
  [Attr.EXT_HOUSE_FILE, "houseFile"],
  [Attr.EXT_SPAWN_NPC_FILE, "npcSpawnFile"],
  [Attr.EXT_ZONE_FILE, "zoneFile"],
];

/** Fills description, external file references and the opaque remainder of `header`. */
export function decodeMapDataPayload(p: NodePayload, header: MapHeader, report: ReportBuilder): void {
  const descriptions: string[] = [];
  const opaque = readAttributes(
    p,
    (tag) => {
      if (tag === Attr.DESCRIPTION) {
        descriptions.push(p.readString());
        return true;
      }
      for (const [refTag, key] of FILE_REFS) {
        if (tag === refTag) {
          header[key] = p.readString();
          return true;
        }
      }
      return false;
    },
    (code, message) => report.warn(code, `Map data: ${message}`, { offset: p.offset }),
  );
  if (descriptions.length > 0) header.description = descriptions.join("\n");
  if (opaque) header.opaque = opaque;
}

export function encodeMapDataPayload(header: Readonly<MapHeader>, w: BinaryWriter): void {
  if (header.description !== undefined && header.description !== "") {
    w.writeU8(Attr.DESCRIPTION).writeString(header.description);
  }
  for (const [tag, key] of FILE_REFS) {
    const v = header[key];
    if (v !== undefined && v !== "") w.writeU8(tag).writeString(v);
  }
  if (header.opaque) w.writeBytes(header.opaque);
}

export function decodeTown(p: NodePayload): Town {
  const id = p.readU32LE();
  const name = p.readString();
  const templePosition = p.readPosition();
  return { id, name, templePosition };
}

export function encodeTown(t: Readonly<Town>, w: BinaryWriter): void {
  w.writeU32LE(t.id).writeString(t.name).writePosition(t.templePosition);
}

export function decodeWaypoint(p: NodePayload): Waypoint {
  const name = p.readString();
  const position = p.readPosition();
  return { name, position };
}

export function encodeWaypoint(wp: Readonly<Waypoint>, w: BinaryWriter): void {
  w.writeString(wp.name).writePosition(wp.position);
}

export function decodeSpawnArea(p: NodePayload): SpawnArea {
  const center = p.readPosition();
  const radius = p.readU16LE();
  return { center, radius, creatures: [] };
}

export function encodeSpawnArea(s: Readonly<SpawnArea>, w: BinaryWriter): void {
  w.writePosition(s.center).writeU16LE(s.radius);
}

export function decodeSpawnCreature(p: NodePayload): SpawnCreature {
  const name = p.readString();
  const dx = p.readI16LE();
  const dy = p.readI16LE();
  const interval = p.readU32LE();
  return { name, offset: { dx, dy }, interval };
}

export function encodeSpawnCreature(c: Readonly<SpawnCreature>, w: BinaryWriter): void {
  w.writeString(c.name).writeI16LE(c.offset.dx).writeI16LE(c.offset.dy).writeU32LE(c.interval);
}
