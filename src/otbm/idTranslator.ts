// src/otbm/idTranslator.ts
import { UnmappableIdError } from "./errors.js";
import type { ItemDatabase } from "./itemDatabase.js";

export type IdPair = Readonly<{ serverId: number; clientId: number }>;

export type TranslatorBuildReport = Readonly<{
  pairs: number;
  // Entries dropped because one side was already mapped to something else.
  conflicts: ReadonlyArray<IdPair>;
}>;

/**
 * Bidirectional ServerID <-> ClientID mapping. Built once and read-only
 * afterwards; both directions are kept consistent so every mapped id
 * round-trips.
 */
export class IdTranslator {
  private readonly s2c = new Map<number, number>();
  private readonly c2s = new Map<number, number>();
  private readonly conflicts: IdPair[] = [];

  private constructor(pairs: Iterable<IdPair>) {
    for (const p of pairs) this.add(p);
  }

  public static fromPairs(pairs: Iterable<IdPair>): IdTranslator {
    return new IdTranslator(pairs);
  }

  public static fromDatabase(db: ItemDatabase): IdTranslator {
    const pairs: IdPair[] = [];
    for (const t of db.types()) pairs.push({ serverId: t.serverId, clientId: t.clientId });
    return new IdTranslator(pairs);
  }

  public get size(): number {
    return this.s2c.size;
  }

  public get buildReport(): TranslatorBuildReport {
    return { pairs: this.s2c.size, conflicts: this.conflicts.slice() };
  }

  public tryServerToClient(serverId: number): number | undefined {
    return this.s2c.get(serverId);
  }

  public tryClientToServer(clientId: number): number | undefined {
    return this.c2s.get(clientId);
  }

  public serverToClient(serverId: number): number {
    const v = this.s2c.get(serverId);
    if (v === undefined) {
      throw new UnmappableIdError("serverToClient", [{ id: serverId, positions: [], reason: "unmapped" }]);
    }
    return v;
  }

  public clientToServer(clientId: number): number {
    const v = this.c2s.get(clientId);
    if (v === undefined) {
      throw new UnmappableIdError("clientToServer", [{ id: clientId, positions: [], reason: "unmapped" }]);
    }
    return v;
  }

  public pairs(): IdPair[] {
    return [...this.s2c].map(([serverId, clientId]) => ({ serverId, clientId }));
  }

  private add(p: IdPair): void {
    // Client id 0 marks items with no client appearance.
    if (p.clientId === 0) return;
    const haveClient = this.s2c.get(p.serverId);
    const haveServer = this.c2s.get(p.clientId);
    if (haveClient === p.clientId && haveServer === p.serverId) return;
    if (haveClient !== undefined || haveServer !== undefined) {
      this.conflicts.push(p);
      return;
    }
    this.s2c.set(p.serverId, p.clientId);
    this.c2s.set(p.clientId, p.serverId);
  }
}
