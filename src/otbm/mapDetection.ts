// src/otbm/mapDetection.ts
import { open } from "node:fs/promises";

import { NODE_START } from "./constants.js";

export type MapKind = "otbm" | "otmm" | "json" | "xml" | "unknown";

export type MapDetection = Readonly<{
  kind: MapKind;
  reason: string;
}>;

const SNIFF_BYTES = 512;

function ascii(bytes: Uint8Array, start: number, end: number): string {
  return String.fromCharCode(...bytes.subarray(start, end));
}

/** Classifies a file by its leading bytes, ignoring the file name. */
export function sniffMapKind(head: Uint8Array): MapDetection {
  if (head.length >= 4) {
    const magic = ascii(head, 0, 4);
    if (magic === "OTBM") return { kind: "otbm", reason: "OTBM identifier" };
    if (magic === "OTMM") return { kind: "otmm", reason: "OTMM identifier" };
    if (magic === "\0\0\0\0" && head[4] === NODE_START) {
      return { kind: "otbm", reason: "wildcard identifier followed by a node" };
    }
  }

  let i = 0;
  // UTF-8 byte order mark
  if (head[0] === 0xef && head[1] === 0xbb && head[2] === 0xbf) i = 3;
  while (i < head.length && (head[i] === 0x20 || head[i] === 0x09 || head[i] === 0x0a || head[i] === 0x0d)) {
    i++;
  }
  if (head[i] === 0x7b) return { kind: "json", reason: "text starting with '{'" };
  if (head[i] === 0x3c) return { kind: "xml", reason: "text starting with '<'" };

  if (head.length < 4) return { kind: "unknown", reason: `only ${head.length} bytes` };
  return { kind: "unknown", reason: `unexpected leading bytes ${JSON.stringify(ascii(head, 0, 4))}` };
}

export async function detectMapFile(filePath: string): Promise<MapDetection> {
  const fh = await open(filePath, "r");
  try {
    const buf = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await fh.read(buf, 0, SNIFF_BYTES, 0);
    return sniffMapKind(buf.subarray(0, bytesRead));
  } finally {
    await fh.close();
  }
}
