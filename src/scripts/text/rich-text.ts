import CONSTANTS from "../module/constants";
import { MARKUP_SAFELIST } from "../module/config";
import { readPathString, type JsonRecord } from "../helpers/records";
import type { SourceEntity } from "../models/source";
import { normalize, validateRoundTrip } from "./normalizer";
import { logDebug, logWarn } from "../utils";

const CATALOG_DESCRIPTION_PATHS = ["description", "system.description.value", "system.effect.before"] as const;

const ABILITY_HEADERS = ["Trigger", "Effect", "Special"] as const;

const VOID_TAGS = new Set(["br"]);

const TAG_PATTERN = /<(\/?)([a-zA-Z][a-zA-Z0-9]*)\b[^>]*?(\/?)>/g;

export type ItemKind = "ability" | "feature" | "item";

function escapeHtml(value: string): string {
  return value.replace(/&(?![a-zA-Z]+;|#\d+;)/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function isLikelyHtml(value: string, safelist: readonly string[]): boolean {
  const pattern = new RegExp(`</?(?:${safelist.join("|")})\\b`, "i");
  return pattern.test(value);
}

function applyInlineMarkdown(value: string): string {
  const bold = value.replace(/\*\*([^*]+?)\*\*/g, "<strong>$1</strong>");
  return bold.replace(/(^|[^*])\*(?!\s)([^*]+?)\*/g, (_match, prefix: string, content: string) => {
    return `${prefix}<em>${content}</em>`;
  });
}

function formatAbilityHeaderLine(line: string): string {
  for (const header of ABILITY_HEADERS) {
    const pattern = new RegExp(`^${header}:\\s*`);
    if (pattern.test(line)) {
      return line.replace(pattern, `<strong>${header}:</strong> `);
    }
  }
  return line;
}

function buildParagraph(lines: string[]): string {
  return `<p>${lines.join("<br />")}</p>`;
}

/**
 * Picks the narrative text for one item: catalog description shapes first,
 * then the source entity's description, then its `text` sections, then the sentinel.
 * The result is normalized and has its markup balanced.
 */
export function resolveDescription(
  source: SourceEntity | null,
  catalogRecord: JsonRecord | null = null,
  safelist: readonly string[] = MARKUP_SAFELIST,
): string {
  if (catalogRecord) {
    for (const path of CATALOG_DESCRIPTION_PATHS) {
      const candidate = normalize(readPathString(catalogRecord, path) ?? "");
      if (candidate) {
        return preserveFormatting(candidate, safelist);
      }
    }
  }

  if (source) {
    const own = normalize(source.description);
    if (own) {
      return preserveFormatting(own, safelist);
    }

    const sectionText = normalize(
      source.sections
        .filter((section) => section.type === "text")
        .map((section) => section.text)
        .filter((text) => text.trim().length > 0)
        .join(" "),
    );
    if (sectionText) {
      return preserveFormatting(sectionText, safelist);
    }
  }

  return CONSTANTS.NO_DESCRIPTION;
}

/**
 * Balances safelisted tags. Unmatched closing tags are dropped and tags left open
 * are closed at the end, innermost first. Never throws.
 */
export function preserveFormatting(text: string, safelist: readonly string[] = MARKUP_SAFELIST): string {
  if (!text || !text.includes("<")) {
    return text;
  }

  const allowed = new Set(safelist.map((tag) => tag.toLowerCase()));
  const open: string[] = [];
  let dropped = 0;

  const repaired = text.replace(TAG_PATTERN, (match, closing: string, rawName: string, selfClosing: string) => {
    const name = rawName.toLowerCase();
    if (!allowed.has(name) || VOID_TAGS.has(name) || selfClosing) {
      return match;
    }

    if (!closing) {
      open.push(name);
      return match;
    }

    const index = open.lastIndexOf(name);
    if (index === -1) {
      dropped += 1;
      return "";
    }
    open.splice(index, 1);
    return match;
  });

  if (!open.length && !dropped) {
    return text;
  }

  const closers = [...open].reverse().map((name) => `</${name}>`).join("");
  logDebug(`Repaired markup: closed ${open.length} tag(s), dropped ${dropped} stray closing tag(s)`);
  return `${repaired}${closers}`;
}

/**
 * Upgrades plain text to paragraph markup with bold/italic from a markdown subset.
 * Text that already carries markup is only balanced, so the function is idempotent.
 */
export function enhance(
  text: string,
  kind: ItemKind = "feature",
  safelist: readonly string[] = MARKUP_SAFELIST,
): string {
  const raw = text.trim();
  if (!raw) {
    return "";
  }

  if (isLikelyHtml(raw, safelist)) {
    return preserveFormatting(raw, safelist);
  }

  const blocks: string[] = [];
  let paragraph: string[] = [];

  const flushParagraph = () => {
    if (!paragraph.length) return;
    blocks.push(buildParagraph(paragraph));
    paragraph = [];
  };

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      flushParagraph();
      continue;
    }

    let formatted = applyInlineMarkdown(escapeHtml(line));
    if (kind === "ability") {
      formatted = formatAbilityHeaderLine(formatted);
    }
    paragraph.push(formatted);
  }

  flushParagraph();
  return blocks.join("");
}

export type TransferProblem = "empty" | "truncated" | "encoding";

export function assessTransfer(original: string, transferred: string): TransferProblem | null {
  if (original.trim() && !transferred.trim()) {
    return "empty";
  }
  if (transferred.length < original.length * 0.5) {
    return "truncated";
  }
  if (!validateRoundTrip(transferred)) {
    return "encoding";
  }
  return null;
}

/** False when the transferred text lost its content, was truncated, or does not round-trip. */
export function validateTransfer(original: string, transferred: string): boolean {
  const problem = assessTransfer(original, transferred);
  if (problem) {
    logWarn(`Description transfer ${problem}: ${original.length} -> ${transferred.length} characters`);
    return false;
  }
  return true;
}

export interface TransferRecord {
  name: string;
  original: string;
  transferred: string;
}

export interface TransferAudit {
  total: number;
  successful: number;
  empty: number;
  truncated: number;
  encodingUnsafe: number;
  failures: string[];
}

export function auditTransfers(records: readonly TransferRecord[]): TransferAudit {
  const audit: TransferAudit = {
    total: records.length,
    successful: 0,
    empty: 0,
    truncated: 0,
    encodingUnsafe: 0,
    failures: [],
  };

  for (const record of records) {
    const problem = assessTransfer(record.original, record.transferred);
    switch (problem) {
      case null:
        audit.successful += 1;
        continue;
      case "empty":
        audit.empty += 1;
        break;
      case "truncated":
        audit.truncated += 1;
        break;
      case "encoding":
        audit.encodingUnsafe += 1;
        break;
    }
    audit.failures.push(`${record.name}: ${problem}`);
  }

  return audit;
}
