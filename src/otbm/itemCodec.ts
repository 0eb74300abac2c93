// src/otbm/itemCodec.ts
import type { BinaryWriter } from "./binary.js";
import { BinaryReader } from "./binary.js";
import type { AttrMapTypeValue } from "./constants.js";
import { Attr, AttrMapType } from "./constants.js";
import type { IdTranslator } from "./idTranslator.js";
import type { ItemDatabase } from "./itemDatabase.js";
import type { AttributeMapEntry, Item, Position } from "./model.js";
import type { NodePayload } from "./nodeReader.js";
import { concatBytes } from "./nodeReader.js";
import type { ReportBuilder } from "./report.js";

export type ItemCodecContext = Readonly<{
  version: number;
  usesClientIds: boolean;
  translator?: IdTranslator;
  itemDatabase?: ItemDatabase;
}>;

/** Raised by attribute readers for content that is well framed but not understood. */
class MalformedAttribute extends Error {}

type ItemAttributeCodec = Readonly<{
  tag: number;
  read: (p: NodePayload, item: Item) => void;
  // Writes tag and value when the item carries the field.
  write: (item: Readonly<Item>, w: BinaryWriter, inlineCount: boolean) => void;
}>;

export function attrMapType(n: number): AttrMapTypeValue | undefined {
  switch (n) {
    case AttrMapType.NONE:
    case AttrMapType.STRING:
    case AttrMapType.INTEGER:
    case AttrMapType.FLOAT:
    case AttrMapType.BOOLEAN:
    case AttrMapType.DOUBLE:
      return n;
    default:
      return undefined;
  }
}

function readAttributeMap(p: NodePayload): AttributeMapEntry[] {
  const n = p.readU16LE();
  const out: AttributeMapEntry[] = [];
  for (let i = 0; i < n; i++) {
    const key = p.readString();
    const raw = p.readU8();
    const type = attrMapType(raw);
    if (type === undefined) {
      throw new MalformedAttribute(`Unknown attribute map value type ${raw} for key '${key}'`);
    }
    const size = attributeValueSize(type);
    const value = size === null ? p.readLongBytes() : p.readBytes(size);
    out.push({ key, type, value });
  }
  return out;
}

export function attributeValueSize(type: AttrMapTypeValue): number | null {
  switch (type) {
    case AttrMapType.NONE:
      return 0;
    case AttrMapType.STRING:
      return null;
    case AttrMapType.INTEGER:
    case AttrMapType.FLOAT:
      return 4;
    case AttrMapType.BOOLEAN:
      return 1;
    case AttrMapType.DOUBLE:
      return 8;
  }
}

function writeAttributeMap(entries: ReadonlyArray<AttributeMapEntry>, w: BinaryWriter): void {
  if (entries.length > 0xffff) throw new Error(`Too many attribute map entries: ${entries.length}`);
  w.writeU16LE(entries.length);
  for (const e of entries) {
    w.writeString(e.key);
    w.writeU8(e.type);
    const size = attributeValueSize(e.type);
    if (size === null) {
      w.writeU32LE(e.value.length);
    } else if (e.value.length !== size) {
      throw new Error(`Attribute '${e.key}' needs ${size} value bytes, has ${e.value.length}`);
    }
    w.writeBytes(e.value);
  }
}

/** Decoded value of an attribute map entry, for display and validation. */
export function attributeMapValue(e: Readonly<AttributeMapEntry>): string | number | boolean | null {
  const r = new BinaryReader(e.value);
  switch (e.type) {
    case AttrMapType.NONE:
      return null;
    case AttrMapType.STRING:
      return new TextDecoder("utf-8").decode(e.value);
    case AttrMapType.INTEGER:
      return r.readU32LE() | 0;
    case AttrMapType.FLOAT:
      return Buffer.from(e.value).readFloatLE(0);
    case AttrMapType.BOOLEAN:
      return r.readU8() !== 0;
    case AttrMapType.DOUBLE:
      return Buffer.from(e.value).readDoubleLE(0);
  }
}

function u8Field(tag: number, key: "count" | "houseDoorId" | "decayState"): ItemAttributeCodec {
  return {
    tag,
    read: (p, item) => {
      item[key] = p.readU8();
    },
    write: (item, w) => {
      const v = item[key];
      if (v !== undefined) w.writeU8(tag).writeU8(v);
    },
  };
}

function u16Field(tag: number, key: "actionId" | "uniqueId" | "depotId"): ItemAttributeCodec {
  return {
    tag,
    read: (p, item) => {
      item[key] = p.readU16LE();
    },
    write: (item, w) => {
      const v = item[key];
      if (v !== undefined) w.writeU8(tag).writeU16LE(v);
    },
  };
}

function u32Field(tag: number, key: "duration" | "writtenDate"): ItemAttributeCodec {
  return {
    tag,
    read: (p, item) => {
      item[key] = p.readU32LE();
    },
    write: (item, w) => {
      const v = item[key];
      if (v !== undefined) w.writeU8(tag).writeU32LE(v);
    },
  };
}

function stringField(tag: number, key: "text" | "description" | "writtenBy"): ItemAttributeCodec {
  return {
    tag,
    read: (p, item) => {
      item[key] = p.readString();
    },
    write: (item, w) => {
      const v = item[key];
      if (v !== undefined) w.writeU8(tag).writeString(v);
    },
  };
}

// Write order follows this list; reading accepts any order.
const ITEM_ATTRIBUTES: ReadonlyArray<ItemAttributeCodec> = [
  {
    ...u8Field(Attr.COUNT, "count"),
    write: (item, w, inlineCount) => {
      if (item.count !== undefined && !inlineCount) w.writeU8(Attr.COUNT).writeU8(item.count);
    },
  },
  {
    tag: Attr.RUNE_CHARGES,
    read: (p, item) => {
      item.charges = p.readU8();
    },
    write: (item, w) => {
      if (item.charges !== undefined && item.charges <= 0xff) {
        w.writeU8(Attr.RUNE_CHARGES).writeU8(item.charges);
      }
    },
  },
  {
    tag: Attr.CHARGES,
    read: (p, item) => {
      item.charges = p.readU16LE();
    },
    write: (item, w) => {
      if (item.charges !== undefined && item.charges > 0xff) {
        w.writeU8(Attr.CHARGES).writeU16LE(item.charges);
      }
    },
  },
  u16Field(Attr.ACTION_ID, "actionId"),
  u16Field(Attr.UNIQUE_ID, "uniqueId"),
  stringField(Attr.TEXT, "text"),
  u32Field(Attr.WRITTENDATE, "writtenDate"),
  stringField(Attr.WRITTENBY, "writtenBy"),
  stringField(Attr.DESC, "description"),
  {
    tag: Attr.TELE_DEST,
    read: (p, item) => {
      item.destination = p.readPosition();
    },
    write: (item, w) => {
      if (item.destination) w.writeU8(Attr.TELE_DEST).writePosition(item.destination);
    },
  },
  u16Field(Attr.DEPOT_ID, "depotId"),
  u8Field(Attr.HOUSEDOORID, "houseDoorId"),
  u32Field(Attr.DURATION, "duration"),
  u8Field(Attr.DECAYING_STATE, "decayState"),
  {
    tag: Attr.ATTRIBUTE_MAP,
    read: (p, item) => {
      const entries = readAttributeMap(p);
      if (entries.length > 0) item.attributeMap = entries;
    },
    write: (item, w) => {
      if (item.attributeMap && item.attributeMap.length > 0) {
        w.writeU8(Attr.ATTRIBUTE_MAP);
        writeAttributeMap(item.attributeMap, w);
      }
    },
  },
];

const ITEM_ATTRIBUTES_BY_TAG = new Map<number, ItemAttributeCodec>(
  ITEM_ATTRIBUTES.map((c) => [c.tag, c]),
);

/**
 * Reads tag/value pairs until the payload ends. The first unknown tag, or a
 * value this engine cannot interpret, ends decoding: that tag and every byte
 * after it are returned for verbatim re-emission.
 */
export function readAttributes(
  p: NodePayload,
  readOne: (tag: number) => boolean,
  onAnomaly: (code: "unknown_attribute" | "malformed_attribute", message: string) => void,
): Uint8Array | undefined {
  while (!p.atEnd()) {
    p.beginRecord();
    const tag = p.readU8();
    let known: boolean;
    try {
      known = readOne(tag);
    } catch (e: unknown) {
      if (!(e instanceof MalformedAttribute)) throw e;
      onAnomaly("malformed_attribute", e.message);
      return concatBytes([p.endRecord(), p.rest()]);
    }
    if (!known) {
      onAnomaly("unknown_attribute", `Unknown attribute 0x${tag.toString(16).padStart(2, "0")}`);
      return concatBytes([p.endRecord(), p.rest()]);
    }
    p.endRecord();
  }
  return undefined;
}

export function isSimpleItem(item: Readonly<Item>): boolean {
  for (const key of Object.keys(item)) {
    if (key !== "id") return false;
  }
  return true;
}

function placeholder(rawId: number): Item {
  return { id: 0, rawUnknownId: rawId };
}

/**
 * Maps an id read from disk into ServerID space. Unresolvable ids become
 * placeholders and are reported as recoverable errors.
 */
export function resolveLoadedId(
  rawId: number,
  ctx: ItemCodecContext,
  report: ReportBuilder,
  position: Position | undefined,
): Item {
  const where = position ? { position } : {};
  if (ctx.usesClientIds) {
    const serverId = ctx.translator?.tryClientToServer(rawId);
    if (serverId === undefined) {
      report.error("missing_client_id_mapping", `No server id for client id ${rawId}`, { ...where, id: rawId });
      return placeholder(rawId);
    }
    return { id: serverId };
  }
  if (ctx.itemDatabase && rawId !== 0 && !ctx.itemDatabase.has(rawId)) {
    report.error("unknown_item_id", `Unknown item id ${rawId}`, { ...where, id: rawId });
    return placeholder(rawId);
  }
  return { id: rawId };
}

/** The id written to disk for an in-memory item. Callers validate mappability first. */
export function storedItemId(item: Readonly<Item>, ctx: ItemCodecContext): number {
  if (!ctx.usesClientIds) return item.id;
  if (!ctx.translator) throw new Error("ClientID target without a translator");
  return ctx.translator.serverToClient(item.id);
}

function hasInlineCount(id: number, ctx: ItemCodecContext): boolean {
  return ctx.version === 0 && ctx.itemDatabase !== undefined && ctx.itemDatabase.hasSubtype(id);
}

export function decodeItemPayload(
  p: NodePayload,
  ctx: ItemCodecContext,
  report: ReportBuilder,
  position: Position | undefined,
): Item {
  const item = resolveLoadedId(p.readU16LE(), ctx, report, position);

  if (hasInlineCount(item.id, ctx) && !p.atEnd()) item.count = p.readU8();

  const opaque = readAttributes(
    p,
    (tag) => {
      const codec = ITEM_ATTRIBUTES_BY_TAG.get(tag);
      if (!codec) return false;
      codec.read(p, item);
      return true;
    },
    (code, message) => {
      report.warn(code, `Item ${item.rawUnknownId ?? item.id}: ${message}`, position ? { position } : {});
    },
  );
  if (opaque) item.opaque = opaque;
  return item;
}

export function encodeItemPayload(item: Readonly<Item>, ctx: ItemCodecContext, w: BinaryWriter): void {
  w.writeU16LE(storedItemId(item, ctx));

  const inline = hasInlineCount(item.id, ctx);
  if (inline) w.writeU8(item.count ?? 1);

  for (const codec of ITEM_ATTRIBUTES) codec.write(item, w, inline);
  if (item.opaque) w.writeBytes(item.opaque);
}
