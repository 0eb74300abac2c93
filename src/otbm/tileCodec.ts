// src/otbm/tileCodec.ts
import type { BinaryWriter } from "./binary.js";
import { AREA_MASK, Attr, NodeType } from "./constants.js";
import type { ItemCodecContext } from "./itemCodec.js";
import { isSimpleItem, readAttributes, resolveLoadedId, storedItemId } from "./itemCodec.js";
import type { Item, Position, Tile } from "./model.js";
import { createTile } from "./model.js";
import type { NodePayload } from "./nodeReader.js";
import type { ReportBuilder } from "./report.js";

export function areaBaseOf(p: Readonly<Position>): Position {
  return { x: p.x & AREA_MASK, y: p.y & AREA_MASK, z: p.z };
}

export function decodeAreaPayload(p: NodePayload): Position {
  return p.readPosition();
}

export function encodeAreaPayload(base: Readonly<Position>, w: BinaryWriter): void {
  w.writePosition(base);
}

export function decodeTilePayload(
  p: NodePayload,
  type: number,
  base: Readonly<Position>,
  ctx: ItemCodecContext,
  report: ReportBuilder,
): Tile {
  const ox = p.readU8();
  const oy = p.readU8();
  const tile = createTile({ x: base.x + ox, y: base.y + oy, z: base.z });
  if (type === NodeType.HOUSETILE) tile.houseId = p.readU32LE();

  const opaque = readAttributes(
    p,
    (tag) => {
      if (tag === Attr.TILE_FLAGS) {
        tile.flags = p.readU32LE();
        return true;
      }
      if (tag === Attr.ITEM) {
        const item = resolveLoadedId(p.readU16LE(), ctx, report, tile.position);
        if (tile.ground === undefined) tile.ground = item;
        else tile.items.push(item);
        return true;
      }
      return false;
    },
    (code, message) => report.warn(code, `Tile: ${message}`, { position: tile.position }),
  );
  if (opaque) tile.opaque = opaque;
  return tile;
}

/** Versions before 2 always store ground as a child ITEM node. */
export function storesGroundInline(ground: Readonly<Item>, ctx: ItemCodecContext): boolean {
  return ctx.version >= 2 && isSimpleItem(ground);
}

/**
 * Writes a tile payload and returns the items that must follow as ITEM
 * child nodes. Ground is stored inline when it carries nothing but an id.
 */
export function encodeTilePayload(
  tile: Readonly<Tile>,
  base: Readonly<Position>,
  ctx: ItemCodecContext,
  w: BinaryWriter,
): Item[] {
  const { x, y } = tile.position;
  w.writeU8(x - base.x).writeU8(y - base.y);
  if (tile.houseId !== undefined) w.writeU32LE(tile.houseId);
  if (tile.flags !== 0) w.writeU8(Attr.TILE_FLAGS).writeU32LE(tile.flags);

  const children: Item[] = [];
  if (tile.ground) {
    if (storesGroundInline(tile.ground, ctx)) w.writeU8(Attr.ITEM).writeU16LE(storedItemId(tile.ground, ctx));
    else children.push(tile.ground);
  }
  if (tile.opaque) w.writeBytes(tile.opaque);
  children.push(...tile.items);
  return children;
}

export function tileNodeType(tile: Readonly<Tile>): number {
  return tile.houseId !== undefined ? NodeType.HOUSETILE : NodeType.TILE;
}

/** Zone ids, sorted and without duplicates; zone 0 means none. */
export function decodeZonePayload(p: NodePayload): number[] {
  const n = p.readU16LE();
  const out = new Set<number>();
  for (let i = 0; i < n; i++) {
    const id = p.readU16LE();
    if (id !== 0) out.add(id);
  }
  return [...out].sort((a, b) => a - b);
}

export function encodeZonePayload(zones: ReadonlyArray<number>, w: BinaryWriter): void {
  const ids = [...new Set(zones)].filter((z) => z !== 0).sort((a, b) => a - b);
  w.writeU16LE(ids.length);
  for (const id of ids) w.writeU16LE(id);
}
