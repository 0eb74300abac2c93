// src/otbm/report.ts
import type { FormatDescriptor } from "./formatVersion.js";
import type { Position } from "./model.js";

export type IssueSeverity = "warning" | "recoverable";

export type IssueCode =
  | "unknown_attribute"
  | "malformed_attribute"
  | "unexpected_node"
  | "unknown_item_id"
  | "missing_client_id_mapping"
  | "missing_house"
  | "out_of_bounds"
  | "duplicate_tile"
  | "invalid_position"
  | "legacy_spawns"
  | "translator_conflicts"
  | "project_metadata";

export type ReportIssue = Readonly<{
  code: IssueCode;
  severity: IssueSeverity;
  message: string;
  position?: Position;
  id?: number;
  offset?: number;
}>;

export type IssueContext = Omit<ReportIssue, "code" | "severity" | "message">;

export type LoadStats = {
  tiles: number;
  items: number;
  houses: number;
  towns: number;
  waypoints: number;
  spawns: number;
  bytes: number;
  // Reader working set: deepest open node stack and largest field held at once.
  peakDepth: number;
  peakFieldBytes: number;
};

export type LoadReport = Readonly<{
  success: boolean;
  warnings: ReadonlyArray<ReportIssue>;
  recoverableErrors: ReadonlyArray<ReportIssue>;
  // Issues dropped once a code reached its cap, by code.
  suppressed: Readonly<Partial<Record<IssueCode, number>>>;
  stats: Readonly<LoadStats>;
  format?: FormatDescriptor;
}>;

export type SaveStats = {
  tiles: number;
  items: number;
  areas: number;
  bytes: number;
};

export type SaveReport = Readonly<{
  success: boolean;
  warnings: ReadonlyArray<ReportIssue>;
  stats: Readonly<SaveStats>;
  format: FormatDescriptor;
  path?: string;
}>;

export const DEFAULT_ISSUE_CAP = 200;

export function emptyLoadStats(): LoadStats {
  return { tiles: 0, items: 0, houses: 0, towns: 0, waypoints: 0, spawns: 0, bytes: 0, peakDepth: 0, peakFieldBytes: 0 };
}

/** Collects issues during one load; each code keeps at most `cap` entries. */
export class ReportBuilder {
  private readonly warnings: ReportIssue[] = [];
  private readonly recoverable: ReportIssue[] = [];
  private readonly perCode = new Map<IssueCode, number>();
  private readonly suppressed: Partial<Record<IssueCode, number>> = {};

  public readonly stats: LoadStats = emptyLoadStats();
  public format: FormatDescriptor | undefined;

  public constructor(private readonly cap = DEFAULT_ISSUE_CAP) {}

  public warn(code: IssueCode, message: string, extra: IssueContext = {}): void {
    this.push({ code, severity: "warning", message, ...extra });
  }

  public error(code: IssueCode, message: string, extra: IssueContext = {}): void {
    this.push({ code, severity: "recoverable", message, ...extra });
  }

  public count(code: IssueCode): number {
    return (this.perCode.get(code) ?? 0) + (this.suppressed[code] ?? 0);
  }

  public build(success: boolean): LoadReport {
    const out: {
      success: boolean;
      warnings: ReportIssue[];
      recoverableErrors: ReportIssue[];
      suppressed: Partial<Record<IssueCode, number>>;
      stats: LoadStats;
      format?: FormatDescriptor;
    } = {
      success,
      warnings: this.warnings.slice(),
      recoverableErrors: this.recoverable.slice(),
      suppressed: { ...this.suppressed },
      stats: { ...this.stats },
    };
    if (this.format) out.format = this.format;
    return out;
  }

  private push(issue: ReportIssue): void {
    const n = this.perCode.get(issue.code) ?? 0;
    if (n >= this.cap) {
      this.suppressed[issue.code] = (this.suppressed[issue.code] ?? 0) + 1;
      return;
    }
    this.perCode.set(issue.code, n + 1);
    if (issue.severity === "warning") this.warnings.push(issue);
    else this.recoverable.push(issue);
  }
}

export function formatIssue(issue: ReportIssue): string {
  const at = issue.position ? ` at (${issue.position.x},${issue.position.y},${issue.position.z})` : "";
  const off = issue.offset !== undefined ? ` [offset ${issue.offset}]` : "";
  return `${issue.severity}: ${issue.code}: ${issue.message}${at}${off}`;
}
