import { describe, expect, it } from "vitest";

import { BufferByteSource } from "../src/otbm/byteSource.js";
import { EscapedCursor, escapeBytes, escapedLength, unescapeBytes } from "../src/otbm/escape.js";
import { ResourceLimitExceededError, StructuralCorruptionError } from "../src/otbm/errors.js";
import { hex, toHex } from "./helpers.js";

describe("escapeBytes / unescapeBytes", () => {
  it("leaves payloads without markers untouched", () => {
    const plain = hex("00 01 7f 80 fc");
    expect(toHex(escapeBytes(plain))).toBe("00 01 7f 80 fc");
    expect(escapedLength(plain)).toBe(5);
  });

  it("prefixes every marker byte with the escape byte", () => {
    const logical = hex("fd 10 fe fe ff");
    expect(toHex(escapeBytes(logical))).toBe("fd fd 10 fd fe fd fe fd ff");
    expect(escapedLength(logical)).toBe(9);
  });

  it("decodes escaped payloads back to the logical bytes", () => {
    for (const logical of [hex(""), hex("fd"), hex("ff ff ff"), hex("01 fe 02 fd 03 ff")]) {
      const wire = escapeBytes(logical);
      expect(toHex(unescapeBytes(wire))).toBe(toHex(logical));
      expect(toHex(escapeBytes(unescapeBytes(wire)))).toBe(toHex(wire));
    }
  });

  it("rejects a trailing escape byte", () => {
    expect(() => unescapeBytes(hex("01 fd"), 10)).toThrow("Dangling escape byte (offset 11)");
  });

  it("rejects an unescaped marker inside a payload", () => {
    const err = (() => {
      try {
        unescapeBytes(hex("01 02 ff 03"));
      } catch (e: unknown) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(StructuralCorruptionError);
    expect(err).toMatchObject({ offset: 2, kind: "StructuralCorruption" });
  });
});

describe("EscapedCursor", () => {
  it("reads logical bytes across escapes and stops at structural markers", () => {
    const c = new EscapedCursor(new BufferByteSource(hex("41 fd fe 42 ff")));
    expect(toHex(c.readUntilMarker())).toBe("41 fe 42");
    expect(c.offset).toBe(4);
    expect(c.atBoundary()).toBe(true);
  });

  it("reports a field cut short by a marker", () => {
    const c = new EscapedCursor(new BufferByteSource(hex("01 02 fe")), () => "ROOT/TILE");
    expect(() => c.readLogical(4)).toThrow("Truncated field: needed 4 bytes, got 2 (offset 2, node ROOT/TILE)");
  });

  it("reports an escape at the very end of the stream", () => {
    const c = new EscapedCursor(new BufferByteSource(hex("01 fd")));
    expect(() => c.readLogical(2)).toThrow(/Dangling escape byte at end of stream/);
  });

  it("refuses payloads longer than the cap", () => {
    const c = new EscapedCursor(new BufferByteSource(hex("01 02 03 04 ff")));
    expect(() => c.readUntilMarker(3)).toThrow(ResourceLimitExceededError);
  });

  it("treats a payload running into end of stream as corruption", () => {
    const c = new EscapedCursor(new BufferByteSource(hex("01 02")));
    expect(() => c.skipUntilMarker()).toThrow(/Unexpected end of stream inside node/);
  });
});
