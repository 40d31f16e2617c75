import CONSTANTS from "../module/constants";
import { validate, formatError } from "../helpers/validation";
import {
  isRecord,
  readArray,
  readNumber,
  readPathString,
  readRecord,
  readString,
  readStringArray,
  readTrimmedString,
  type JsonRecord,
} from "../helpers/records";
import { logDebug, logInfo, logWarn } from "../utils";

export interface ItemGrantAdvancement {
  kind: "itemGrant";
  id: string;
  name: string | null;
  /** Pool references as written in the catalog, usually document UUIDs. */
  pool: string[];
  /** Number of pool entries the player picks; null when the whole pool is granted. */
  chooseN: number | null;
  /** Minimum character level for the grant; null when ungated. */
  level: number | null;
}

export interface SkillAdvancement {
  kind: "skill";
  id: string;
  choices: string[];
  groups: string[];
}

export interface LanguageAdvancement {
  kind: "language";
  id: string;
  choices: string[];
}

export type Advancement = ItemGrantAdvancement | SkillAdvancement | LanguageAdvancement;

export interface CatalogEntry {
  /** Identifier the entry is stored under, normally `system._dsid`. */
  key: string;
  id: string | null;
  dsid: string | null;
  name: string;
  type: string;
  category: string | null;
  actionType: string | null;
  sourceId: string | null;
  advancements: Advancement[];
  /** The catalog record itself. Never mutated; materialize through a clone. */
  raw: Readonly<JsonRecord>;
}

function decodeAdvancement(id: string, value: unknown): Advancement | null {
  if (!isRecord(value)) return null;

  switch (readString(value, "type")) {
    case "itemGrant": {
      const pool: string[] = [];
      for (const reference of readArray(value, "pool")) {
        if (typeof reference === "string" && reference.trim()) {
          pool.push(reference.trim());
        } else if (isRecord(reference)) {
          const uuid = readTrimmedString(reference, "uuid");
          if (uuid) pool.push(uuid);
        }
      }
      const requirements = readRecord(value, "requirements");
      return {
        kind: "itemGrant",
        id,
        name: readTrimmedString(value, "name"),
        pool,
        chooseN: readNumber(value, "chooseN"),
        level: requirements ? readNumber(requirements, "level") : null,
      };
    }
    case "skill": {
      const skills = readRecord(value, "skills") ?? {};
      return {
        kind: "skill",
        id,
        choices: readStringArray(skills, "choices"),
        groups: readStringArray(skills, "groups"),
      };
    }
    case "language": {
      const languages = readRecord(value, "languages") ?? value;
      return { kind: "language", id, choices: readStringArray(languages, "choices") };
    }
    default:
      return null;
  }
}

function decodeAdvancements(system: JsonRecord | null): Advancement[] {
  const advancements = system ? readRecord(system, "advancements") : null;
  if (!advancements) return [];

  const decoded: Advancement[] = [];
  for (const [id, value] of Object.entries(advancements)) {
    const advancement = decodeAdvancement(id, value);
    if (advancement) decoded.push(advancement);
  }
  return decoded;
}

export function decodeCatalogEntry(key: string, raw: JsonRecord): CatalogEntry | null {
  const name = readTrimmedString(raw, "name");
  const type = readTrimmedString(raw, "type");
  if (!name || !type) {
    return null;
  }

  const system = readRecord(raw, "system");
  return {
    key,
    id: readTrimmedString(raw, "_id"),
    dsid: system ? readTrimmedString(system, "_dsid") : null,
    name,
    type,
    category: system ? readTrimmedString(system, "category") : null,
    actionType: system ? readTrimmedString(system, "type") : null,
    sourceId: readPathString(raw, `flags.${CONSTANTS.SYSTEM_ID}.sourceId`),
    advancements: decodeAdvancements(system),
    raw,
  };
}

/**
 * Read-only identifier to entry mapping. Iteration is always in key order so
 * first-match searches resolve ties the same way on every run.
 */
export class Catalog {
  #entries: Map<string, CatalogEntry>;
  #ordered: readonly CatalogEntry[];
  #byId = new Map<string, CatalogEntry>();
  #bySourceId = new Map<string, CatalogEntry>();

  constructor(entries: Iterable<CatalogEntry>) {
    this.#entries = new Map();
    for (const entry of entries) {
      this.#entries.set(entry.key, entry);
    }

    this.#ordered = Object.freeze(
      [...this.#entries.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0)),
    );

    for (const entry of this.#ordered) {
      if (entry.id && !this.#byId.has(entry.id)) {
        this.#byId.set(entry.id, entry);
      }
      if (entry.sourceId && !this.#bySourceId.has(entry.sourceId)) {
        this.#bySourceId.set(entry.sourceId, entry);
      }
    }
  }

  /** Wraps an already-keyed mapping. Records that fail the catalog schema are skipped. */
  static fromMap(records: Readonly<Record<string, unknown>>): Catalog {
    const entries: CatalogEntry[] = [];
    for (const [key, raw] of Object.entries(records)) {
      const entry = toEntry(key, raw);
      if (entry) entries.push(entry);
    }
    return new Catalog(entries);
  }

  get size(): number {
    return this.#entries.size;
  }

  get(key: string): CatalogEntry | undefined {
    return this.#entries.get(key);
  }

  getById(id: string): CatalogEntry | undefined {
    return this.#byId.get(id);
  }

  getBySourceId(sourceId: string): CatalogEntry | undefined {
    return this.#bySourceId.get(sourceId);
  }

  entries(): readonly CatalogEntry[] {
    return this.#ordered;
  }
}

function toEntry(key: string, raw: unknown): CatalogEntry | null {
  const result = validate("catalogEntry", raw);
  if (!result.ok || !isRecord(raw)) {
    const reason = result.ok ? "not an object" : result.errors.map(formatError).join("; ");
    logWarn(`Skipping catalog record ${key}: ${reason}`);
    return null;
  }
  return decodeCatalogEntry(key, raw);
}

function lowerAbilityActionType(raw: JsonRecord): JsonRecord {
  const system = readRecord(raw, "system");
  const actionType = system ? readString(system, "type") : null;
  if (raw.type !== "ability" || !system || actionType === null || actionType === actionType.toLowerCase()) {
    return raw;
  }
  return { ...raw, system: { ...system, type: actionType.toLowerCase() } };
}

/**
 * Keys a flat list of catalog records by `system._dsid`. A standard record
 * replaces a `heroic` one with the same identifier and type; a record whose
 * identifier is taken by a different type is keyed by its `_id` instead.
 * Ability action types are lower-cased.
 */
export function buildCatalog(records: Iterable<unknown>): Catalog {
  const keyed = new Map<string, CatalogEntry>();
  let skipped = 0;

  for (const record of records) {
    if (!isRecord(record)) {
      skipped += 1;
      continue;
    }

    const raw = lowerAbilityActionType(record);
    const system = readRecord(raw, "system");
    const dsid = system ? readTrimmedString(system, "_dsid") : null;
    const id = readTrimmedString(raw, "_id");
    const key = dsid ?? id;
    if (!key) {
      skipped += 1;
      continue;
    }

    const entry = toEntry(key, raw);
    if (!entry) {
      skipped += 1;
      continue;
    }

    const existing = keyed.get(key);
    if (!existing) {
      keyed.set(key, entry);
      continue;
    }

    if (existing.type !== entry.type) {
      if (id && !keyed.has(id)) {
        keyed.set(id, { ...entry, key: id });
        logDebug(`Catalog key ${key} shared by ${existing.type} and ${entry.type}; keyed ${entry.name} by ${id}`);
      } else {
        skipped += 1;
      }
      continue;
    }

    if (existing.category === "heroic" && entry.category !== "heroic") {
      logDebug(`Duplicate ${key}: preferring ${entry.name} over heroic variant`);
      keyed.set(key, entry);
    }
  }

  if (skipped) {
    logInfo(`Catalog built with ${keyed.size} entries (${skipped} record(s) skipped)`);
  }

  return new Catalog(keyed.values());
}
