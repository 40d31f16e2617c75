import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const DATA_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../data");

export interface ConverterConfig {
  /** Escalate a total catalog miss to an error for that entity instead of synthesizing a placeholder. */
  strict: boolean;
  /** Overrides level detection when set. */
  level: number | null;
  /** Recursion bound for item grants, on top of the visited set. */
  maxGrantDepth: number;
  /** Source action usage (lower-cased) to target action type. */
  actionTypes: Readonly<Record<string, string>>;
  /** Target skill key to skill group, consulted for group-based skill advancements. */
  skillGroups: Readonly<Record<string, string>>;
  /** British spelling to American spelling, used only for lookup keys. */
  spellingVariants: Readonly<Record<string, string>>;
  /** Catalog identifiers of the actions every hero has. */
  basicAbilityIds: ReadonlySet<string>;
  /** Source names that resolve straight to a catalog key. */
  nameAliases: Readonly<Record<string, string>>;
  /** Markup tags whose balance is repaired during description transfer. */
  markupSafelist: readonly string[];
  /** Display names for skills whose camel-cased key is irregular. */
  skillKeyOverrides: Readonly<Record<string, string>>;
}

export const ACTION_TYPES: Readonly<Record<string, string>> = Object.freeze({
  maneuver: "maneuver",
  "main action": "main",
  "move action": "move",
  "triggered action": "triggered",
  "free action": "free",
  reaction: "reaction",
  main: "main",
  move: "move",
  triggered: "triggered",
  free: "free",
});

export const SPELLING_VARIANTS: Readonly<Record<string, string>> = Object.freeze({
  travelling: "traveling",
  travelled: "traveled",
  traveller: "traveler",
  colour: "color",
  honour: "honor",
  favour: "favor",
  armour: "armor",
  behaviour: "behavior",
  flavour: "flavor",
  rumour: "rumor",
  savour: "savor",
  valour: "valor",
  vigour: "vigor",
});

export const BASIC_ABILITY_IDS: ReadonlySet<string> = new Set([
  "aid-attack",
  "catch-breath",
  "charge",
  "defend",
  "escape-grab",
  "grab",
  "heal",
  "knockback",
  "melee-free-strike",
  "ranged-free-strike",
  "stand-up",
  "advance",
  "disengage",
  "ride",
]);

export const NAME_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  Clarity: "clarity-and-strain",
  "Glowing Eyes": "glowing-eyes",
  "Psionic Bolt": "psionic-bolt",
});

export const MARKUP_SAFELIST = Object.freeze([
  "p",
  "strong",
  "em",
  "i",
  "b",
  "u",
  "ul",
  "ol",
  "li",
  "br",
  "div",
  "span",
] as const);

export const SKILL_KEY_OVERRIDES: Readonly<Record<string, string>> = Object.freeze({
  "Read Person": "readPerson",
  "Aid Attack": "aidAttack",
  "Catch Breath": "catchBreath",
  "Escape Grab": "escapeGrab",
  "Melee Free Strike": "meleeFreeStrike",
  "Ranged Free Strike": "rangedFreeStrike",
  "Stand Up": "standUp",
  "Handle Animals": "handleAnimals",
});

function readStringTable(fileName: string): Readonly<Record<string, string>> {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(DATA_ROOT, fileName), "utf8"));
  const table: Record<string, string> = {};
  if (raw && typeof raw === "object" && !Array.isArray(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === "string") {
        table[key] = value;
      }
    }
  }
  return Object.freeze(table);
}

export const SKILL_GROUPS = readStringTable("skill-groups.json");

export const DEFAULT_CONVERTER_CONFIG: Readonly<ConverterConfig> = Object.freeze({
  strict: false,
  level: null,
  maxGrantDepth: 8,
  actionTypes: ACTION_TYPES,
  skillGroups: SKILL_GROUPS,
  spellingVariants: SPELLING_VARIANTS,
  basicAbilityIds: BASIC_ABILITY_IDS,
  nameAliases: NAME_ALIASES,
  markupSafelist: MARKUP_SAFELIST,
  skillKeyOverrides: SKILL_KEY_OVERRIDES,
});

export function resolveConverterConfig(overrides: Partial<ConverterConfig> = {}): Readonly<ConverterConfig> {
  const merged: ConverterConfig = { ...DEFAULT_CONVERTER_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    Object.assign(merged, { [key]: value });
  }
  if (!Number.isInteger(merged.maxGrantDepth) || merged.maxGrantDepth < 1) {
    throw new Error(`maxGrantDepth must be a positive integer, received ${String(merged.maxGrantDepth)}`);
  }
  return Object.freeze(merged);
}

/**
 * Maps a source action usage onto the target vocabulary, case-insensitively.
 * Unknown usages fall through lower-cased.
 */
export function mapActionType(usage: string, table: Readonly<Record<string, string>> = ACTION_TYPES): string {
  const key = usage.trim().toLowerCase();
  return table[key] ?? key;
}
