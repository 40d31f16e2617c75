import { auditTransfers, type TransferAudit, type TransferRecord } from "../text/rich-text";
import { logInfo, logWarn } from "../utils";

export type IssueKind = "unresolved" | "placeholder" | "entity-failed" | "description-degraded";

export interface ConversionIssue {
  kind: IssueKind;
  entity: string;
  type: string | null;
  message: string;
}

export interface AbilitySummary {
  level: number;
  expected: number;
  converted: number;
  missing: string[];
  extra: string[];
  passed: boolean;
  summary: string;
}

export interface ConversionReport {
  heroName: string;
  level: number;
  itemCount: number;
  catalogBacked: number;
  placeholders: number;
  abilities: AbilitySummary;
  skills: string[];
  languages: string[];
  transfers: TransferAudit;
  issues: ConversionIssue[];
  summary: string;
}

export interface ReportTotals {
  heroName: string;
  level: number;
  itemCount: number;
  catalogBacked: number;
  placeholders: number;
  abilities: AbilitySummary;
  skills: string[];
  languages: string[];
}

/**
 * Compares the class abilities that should be present with those that were produced.
 * Names are compared as given; both lists are reported sorted.
 */
export function summarizeAbilities(
  level: number,
  expected: readonly string[],
  converted: readonly string[],
): AbilitySummary {
  const expectedSet = new Set(expected);
  const convertedSet = new Set(converted);
  const missing = [...expectedSet].filter((name) => !convertedSet.has(name)).sort();
  const extra = [...convertedSet].filter((name) => !expectedSet.has(name)).sort();
  const passed = missing.length === 0 && extra.length === 0;

  const parts = [`Converted ${convertedSet.size}/${expectedSet.size} abilities (level ${level})`];
  if (missing.length) parts.push(`missing: ${missing.join(", ")}`);
  if (extra.length) parts.push(`extra: ${extra.join(", ")}`);
  parts.push(passed ? "PASS" : "FAIL");

  return {
    level,
    expected: expectedSet.size,
    converted: convertedSet.size,
    missing,
    extra,
    passed,
    summary: parts.join(" | "),
  };
}

/** Collects per-entity issues and description transfers while one hero converts. */
export class ReportBuilder {
  #issues: ConversionIssue[] = [];
  #transfers: TransferRecord[] = [];

  addIssue(kind: IssueKind, entity: string, type: string | null, message: string): void {
    this.#issues.push({ kind, entity, type, message });
    if (kind !== "placeholder") {
      logWarn(`${entity}${type ? ` (${type})` : ""}: ${message}`);
    }
  }

  addTransfer(record: TransferRecord): void {
    this.#transfers.push(record);
  }

  get issues(): readonly ConversionIssue[] {
    return this.#issues;
  }

  build(totals: ReportTotals): ConversionReport {
    const transfers = auditTransfers(this.#transfers);
    const failures = this.#issues.filter((issue) => issue.kind === "unresolved" || issue.kind === "entity-failed");
    const summary = [
      `${totals.heroName}: ${totals.itemCount} items (${totals.catalogBacked} from catalog, ${totals.placeholders} synthesized)`,
      totals.abilities.summary,
      `${failures.length} entity error(s)`,
    ].join("; ");

    logInfo(summary);

    return {
      ...totals,
      transfers,
      issues: [...this.#issues],
      summary,
    };
  }
}
