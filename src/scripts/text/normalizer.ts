import { SPELLING_VARIANTS } from "../module/config";
import { logDebug, logWarn } from "../utils";

const CHARACTER_MAP: Readonly<Record<string, string>> = {
  "\u201C": '"',
  "\u201D": '"',
  "\u2018": "'",
  "\u2019": "'",
  "\u2013": "-",
  "\u2014": "-",
  "\u2026": "...",
  "\uFFFD": "",
  // Combining grave and Cyrillic capital A break name matching against catalog entries.
  "\u0300": "",
  "\u0410": "",
};

const CHARACTER_PATTERN = new RegExp(`[${Object.keys(CHARACTER_MAP).join("")}]`, "gu");

const PRESERVED_CHARACTERS = new Set(["\n", "\t", " ", "!", "?", ".", ",", ";", ":", "(", ")", "[", "]"]);

// Control, format, surrogate, private-use, unassigned and separator code points.
const NON_PRINTABLE_PATTERN = /[\p{C}\p{Z}]/gu;

const LOOKUP_PUNCTUATION = /[,.!?;:"'()[\]]/g;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

function toUtf8(value: string): string {
  try {
    return utf8Decoder.decode(utf8Encoder.encode(value));
  } catch (error) {
    logWarn("UTF-8 normalization failed, degrading to ASCII", error);
    return value.replace(/[^\x00-\x7F]/g, "");
  }
}

function stripNonPrintable(value: string): string {
  return value.replace(NON_PRINTABLE_PATTERN, (char) => {
    if (PRESERVED_CHARACTERS.has(char)) {
      return char;
    }
    logDebug(`Removed non-printable character U+${codePointHex(char)}`);
    return "";
  });
}

function codePointHex(char: string): string {
  return (char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0");
}

/**
 * Canonicalizes text for the target document: typographic substitutions,
 * encoding artifacts removed, control characters stripped, outer whitespace trimmed.
 * Applying it to its own output returns the same string.
 */
export function normalize(text: string): string {
  if (!text) {
    return text;
  }

  // Lone surrogates are dropped first so the UTF-8 pass below never sees them.
  let next = text.replace(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g, "");
  next = toUtf8(next);
  next = next.replace(CHARACTER_PATTERN, (char) => CHARACTER_MAP[char] ?? char);
  next = stripNonPrintable(next).trim();

  if (next !== text) {
    logDebug(`Text normalization applied: '${text.slice(0, 50)}' -> '${next.slice(0, 50)}'`);
  }

  return next;
}

function matchCase(source: string, replacement: string): string {
  if (source === source.toUpperCase()) {
    return replacement.toUpperCase();
  }
  if (source[0] === source[0]?.toUpperCase()) {
    return replacement[0].toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

/**
 * Builds the key used to compare a name against catalog names. Never shown to users.
 */
export function sanitizeForLookup(
  name: string,
  spellingVariants: Readonly<Record<string, string>> = SPELLING_VARIANTS,
): string {
  if (!name) {
    return name;
  }

  let key = normalize(name);
  for (const [british, american] of Object.entries(spellingVariants)) {
    const pattern = new RegExp(british, "gi");
    key = key.replace(pattern, (match) => matchCase(match, american));
  }

  return key.replace(LOOKUP_PUNCTUATION, "").replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * True when the text survives serialization to JSON, UTF-8 encoding and back unchanged.
 */
export function validateRoundTrip(text: string): boolean {
  try {
    const serialized = JSON.stringify(text);
    const decoded = utf8Decoder.decode(utf8Encoder.encode(serialized));
    const parsed: unknown = JSON.parse(decoded);
    // Lone surrogates are escaped by JSON.stringify, so the raw text is checked on its own as well.
    return parsed === text && utf8Decoder.decode(utf8Encoder.encode(text)) === text;
  } catch (error) {
    logWarn("JSON round-trip validation failed", error);
    return false;
  }
}

export interface TextChangeSummary {
  originalLength: number;
  normalizedLength: number;
  lengthDifference: number;
  charactersRemoved: string[];
  hasNonAscii: boolean;
  roundTripSafe: boolean;
}

export function summarizeTextChanges(original: string, normalized: string): TextChangeSummary {
  const kept = new Set(normalized);
  const removed = [...new Set(original)].filter((char) => !kept.has(char));

  return {
    originalLength: original.length,
    normalizedLength: normalized.length,
    lengthDifference: normalized.length - original.length,
    charactersRemoved: removed,
    hasNonAscii: /[^\x00-\x7F]/.test(original),
    roundTripSafe: validateRoundTrip(normalized),
  };
}
