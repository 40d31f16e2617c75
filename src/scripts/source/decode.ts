import {
  CULTURE_SECTIONS,
  MODIFIER_FEATURE_TYPES,
  SELECTION_CONTAINER_TYPES,
  type LevelBucket,
  type ModifierFeatureType,
  type SelectionContainerType,
  type SourceAbility,
  type SourceAncestry,
  type SourceCareer,
  type SourceCharacteristicValue,
  type SourceClass,
  type SourceCulture,
  type SourceDocument,
  type SourceEntity,
  type SourceFeature,
  type SourceKit,
  type SourceSection,
  type SourceState,
  type SourceSubclass,
} from "../models/source";
import {
  isRecord,
  readArray,
  readNumber,
  readRecord,
  readString,
  readStringArray,
  readTrimmedString,
  type JsonRecord,
} from "../helpers/records";
import { logDebug } from "../utils";

function isModifierType(value: string): value is ModifierFeatureType {
  return (MODIFIER_FEATURE_TYPES as readonly string[]).includes(value);
}

function isSelectionContainerType(value: string): value is SelectionContainerType {
  return (SELECTION_CONTAINER_TYPES as readonly string[]).includes(value);
}

function decodeSections(record: JsonRecord): SourceSection[] {
  let raw = readArray(record, "sections");
  if (!raw.length) {
    const nested = readRecord(readRecord(record, "data") ?? {}, "ability");
    raw = nested ? readArray(nested, "sections") : [];
  }

  const sections: SourceSection[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const type = readString(entry, "type") ?? "";
    const text = readString(entry, "text") ?? "";
    sections.push({ type, text });
  }
  return sections;
}

export function decodeEntity(raw: unknown): SourceEntity | null {
  if (!isRecord(raw)) {
    return null;
  }

  const name = readTrimmedString(raw, "name");
  if (!name) {
    return null;
  }

  return {
    id: readTrimmedString(raw, "id"),
    name,
    description: readString(raw, "description") ?? "",
    sections: decodeSections(raw),
  };
}

export function decodeAbility(raw: unknown): SourceAbility | null {
  const base = decodeEntity(raw);
  if (!base || !isRecord(raw)) {
    return null;
  }

  const usageSource = readRecord(raw, "type");
  const minLevel = readNumber(raw, "minLevel") ?? readNumber(raw, "level") ?? 1;

  return {
    ...base,
    usage: usageSource ? readTrimmedString(usageSource, "usage") : null,
    keywords: readStringArray(raw, "keywords"),
    characteristics: readStringArray(raw, "characteristic"),
    minLevel,
  };
}

function decodeKit(raw: unknown): SourceKit | null {
  const base = decodeEntity(raw);
  if (!base || !isRecord(raw)) {
    return null;
  }
  return { ...base, speed: readNumber(raw, "speed") ?? 0 };
}

function decodeList<T>(values: unknown[], decoder: (value: unknown) => T | null): T[] {
  const decoded: T[] = [];
  for (const value of values) {
    const entry = decoder(value);
    if (entry) decoded.push(entry);
  }
  return decoded;
}

/**
 * Decodes one builder feature into its variant by `type`.
 * Unknown types decode as plain text features so they still convert directly.
 */
export function decodeFeature(raw: unknown): SourceFeature | null {
  if (!isRecord(raw)) {
    return null;
  }

  const rawType = readTrimmedString(raw, "type") ?? "Text";
  const data = readRecord(raw, "data") ?? {};
  const nestedAbility = readRecord(data, "ability");

  // Ability children of "Multiple Features" sometimes carry only the nested ability; its name stands in.
  const base = decodeEntity(raw) ?? (nestedAbility ? decodeEntity(nestedAbility) : null);
  if (!base) {
    logDebug(`Skipping unnamed ${rawType} feature`);
    return null;
  }

  switch (rawType) {
    case "Ability": {
      const ability = decodeAbility(nestedAbility ?? raw);
      if (!ability) return null;
      return { ...base, kind: "ability", rawType, ability };
    }
    case "Choice":
      return { ...base, kind: "choice", rawType, selected: decodeList(readArray(data, "selected"), decodeFeature) };
    case "Multiple Features":
      return { ...base, kind: "multiple", rawType, features: decodeList(readArray(data, "features"), decodeFeature) };
    case "Skill Choice":
      return { ...base, kind: "skillChoice", rawType, selected: readStringArray(data, "selected") };
    case "Language Choice":
      return { ...base, kind: "languageChoice", rawType, selected: readStringArray(data, "selected") };
    case "Class Ability":
      return { ...base, kind: "classAbility", rawType, selectedIds: readStringArray(data, "selectedIDs") };
    case "Kit":
      return { ...base, kind: "kit", rawType, selected: decodeList(readArray(data, "selected"), decodeKit) };
    case "Characteristic Bonus":
      return {
        ...base,
        kind: "characteristicBonus",
        rawType,
        characteristic: (readString(data, "characteristic") ?? "").toLowerCase(),
        value: readNumber(data, "value") ?? 0,
      };
    case "Speed":
      return { ...base, kind: "speed", rawType, speed: readNumber(data, "speed") ?? 0 };
    default:
      break;
  }

  if (isSelectionContainerType(rawType)) {
    return {
      ...base,
      kind: "selection",
      rawType,
      container: rawType,
      selected: decodeList(readArray(data, "selected"), decodeEntity),
    };
  }

  if (isModifierType(rawType)) {
    return { ...base, kind: "modifier", rawType, modifier: rawType };
  }

  return { ...base, kind: "text", rawType };
}

function decodeFeatures(record: JsonRecord, key: string): SourceFeature[] {
  return decodeList(readArray(record, key), decodeFeature);
}

function decodeLevels(record: JsonRecord): LevelBucket[] {
  const buckets: LevelBucket[] = [];
  for (const entry of readArray(record, "featuresByLevel")) {
    if (!isRecord(entry)) continue;
    buckets.push({
      level: readNumber(entry, "level") ?? 1,
      features: decodeFeatures(entry, "features"),
    });
  }
  return buckets.sort((a, b) => a.level - b.level);
}

function decodeAncestry(raw: unknown): SourceAncestry | null {
  const base = decodeEntity(raw);
  if (!base || !isRecord(raw)) return null;
  return { ...base, features: decodeFeatures(raw, "features") };
}

function decodeCulture(raw: unknown): SourceCulture | null {
  const base = decodeEntity(raw);
  if (!base || !isRecord(raw)) return null;

  const aspects: SourceCulture["aspects"] = {};
  for (const section of CULTURE_SECTIONS) {
    const feature = decodeFeature(raw[section]);
    if (feature) {
      aspects[section] = feature;
    }
  }

  return { ...base, aspects, languages: readStringArray(raw, "languages") };
}

function decodeCareer(raw: unknown): SourceCareer | null {
  const base = decodeEntity(raw);
  if (!base || !isRecord(raw)) return null;
  return { ...base, features: decodeFeatures(raw, "features") };
}

function decodeSubclass(raw: unknown): SourceSubclass | null {
  const base = decodeEntity(raw);
  if (!base || !isRecord(raw)) return null;
  return { ...base, featuresByLevel: decodeLevels(raw) };
}

function decodeCharacteristicValues(record: JsonRecord): SourceCharacteristicValue[] | null {
  if (!Array.isArray(record.characteristics)) {
    return null;
  }

  const values: SourceCharacteristicValue[] = [];
  for (const entry of record.characteristics) {
    if (!isRecord(entry)) continue;
    const characteristic = readTrimmedString(entry, "characteristic");
    if (!characteristic) continue;
    values.push({
      characteristic: characteristic.toLowerCase(),
      value: readNumber(entry, "value") ?? 0,
      skills: readStringArray(entry, "skills"),
    });
  }
  return values;
}

function decodeClass(raw: unknown): SourceClass | null {
  const base = decodeEntity(raw);
  if (!base || !isRecord(raw)) return null;

  let subclass: SourceSubclass | null = null;
  for (const candidate of readArray(raw, "subclasses")) {
    if (isRecord(candidate) && candidate.selected === true) {
      subclass = decodeSubclass(candidate);
      break;
    }
  }

  return {
    ...base,
    level: readNumber(raw, "level"),
    recoveries: readNumber(raw, "recoveries"),
    primaryCharacteristics: readStringArray(raw, "primaryCharacteristics").map((entry) => entry.toLowerCase()),
    characteristics: decodeCharacteristicValues(raw),
    featuresByLevel: decodeLevels(raw),
    abilities: decodeList(readArray(raw, "abilities"), decodeAbility),
    subclass,
  };
}

function decodeState(raw: unknown): SourceState {
  const record = isRecord(raw) ? raw : {};
  return {
    staminaDamage: readNumber(record, "staminaDamage") ?? 0,
    staminaTemp: readNumber(record, "staminaTemp") ?? 0,
    surges: readNumber(record, "surges") ?? 0,
    xp: readNumber(record, "xp") ?? 0,
    victories: readNumber(record, "victories") ?? 0,
    renown: readNumber(record, "renown") ?? 0,
    wealth: readNumber(record, "wealth") ?? 0,
    inventory: decodeList(readArray(record, "inventory"), decodeEntity),
  };
}

/**
 * Decodes a structurally valid hero record. Run `ensureValidSource` first;
 * this function narrows field by field and never throws.
 */
export function decodeSourceDocument(raw: JsonRecord): SourceDocument {
  return {
    name: readTrimmedString(raw, "name") ?? "Unnamed Hero",
    ancestry: decodeAncestry(raw.ancestry),
    culture: decodeCulture(raw.culture),
    career: decodeCareer(raw.career),
    class: decodeClass(raw.class),
    complication: decodeEntity(raw.complication),
    features: decodeFeatures(raw, "features"),
    state: decodeState(raw.state),
  };
}
