import { describe, expect, it } from "vitest";

import { VersionUnsupportedError } from "../src/otbm/errors.js";
import {
  describeFormat,
  formatForVersion,
  resolveFormat,
  usesClientIds,
  versionForClient,
} from "../src/otbm/formatVersion.js";
import { parseProjectMetadata } from "../src/otbm/project.js";

const DB_1310 = { major: 3, minor: 65, build: 62, description: "OTB 3.65.62-13.10" };

describe("resolveFormat", () => {
  it("uses the file header when nothing overrides it", () => {
    expect(resolveFormat({ headerVersion: 2 })).toEqual({
      version: 2,
      usesClientIds: false,
      clientVersion: 0,
      versionSource: "header",
      clientVersionSource: "unknown",
      notes: [],
    });
  });

  it("falls back to the default version with a note", () => {
    const f = resolveFormat({});
    expect(f.version).toBe(2);
    expect(f.versionSource).toBe("default");
    expect(f.notes).toEqual(["No version hint; assuming OTBM version 2"]);
  });

  it("lets an explicit version win over the header and says so", () => {
    const f = resolveFormat({ explicitVersion: 5, headerVersion: 2 });
    expect(f.version).toBe(5);
    expect(f.usesClientIds).toBe(true);
    expect(f.notes).toEqual(["File header says version 2; using 5 from explicit"]);
  });

  it("takes the client version from project metadata", () => {
    const project = parseProjectMetadata({ engine: "Canary", client_version: 1310 });
    const f = resolveFormat({ project, headerVersion: 6 });
    expect(f.clientVersion).toBe(1310);
    expect(f.clientVersionSource).toBe("project");
    expect(f.version).toBe(6);
  });

  it("derives the structural version from a client version alone", () => {
    const f = resolveFormat({ explicitClientVersion: 860 });
    expect(f.version).toBe(2);
    expect(f.versionSource).toBe("clientVersion");
  });

  it("reads the client version from the item database header", () => {
    const f = resolveFormat({ headerVersion: 5, itemDatabase: DB_1310, itemsPath: "data/items.otb" });
    expect(f.clientVersion).toBe(1310);
    expect(f.clientVersionSource).toBe("itemDatabase");
    expect(f.itemsPath).toBe("data/items.otb");
  });

  it("notes an item database built for another client", () => {
    const f = resolveFormat({ headerVersion: 2, explicitClientVersion: 860, itemDatabase: DB_1310 });
    expect(f.notes).toEqual(["Item database is for client 1310, expected 860"]);
  });

  it("refuses versions newer than the engine", () => {
    expect(() => resolveFormat({ headerVersion: 7 })).toThrow(VersionUnsupportedError);
    expect(() => resolveFormat({ headerVersion: 7 })).toThrow("Unsupported OTBM version 7 (this engine supports 0..6)");
  });
});

describe("version tables", () => {
  it("maps client releases to structural versions", () => {
    expect(versionForClient(760)).toBe(0);
    expect(versionForClient(792)).toBe(1);
    expect(versionForClient(860)).toBe(2);
    expect(versionForClient(1098)).toBe(3);
    expect(versionForClient(1310)).toBe(5);
  });

  it("switches to client ids from version 5", () => {
    expect(usesClientIds(4)).toBe(false);
    expect(usesClientIds(5)).toBe(true);
    expect(usesClientIds(6)).toBe(true);
  });

  it("describes a format in one line", () => {
    expect(describeFormat(resolveFormat({ headerVersion: 2 }))).toBe("OTBM v2 (ServerID; version from header)");
    expect(describeFormat(formatForVersion(5, { clientVersion: 1310 }))).toBe(
      "OTBM v5 (ClientID, client 1310; version from explicit)",
    );
  });

  it("carries the spawn embedding choice of a save target", () => {
    expect(formatForVersion(2, { embedSpawns: true }).embedSpawns).toBe(true);
    expect(formatForVersion(2).embedSpawns).toBeUndefined();
  });
});
