import CONSTANTS from "../module/constants";
import { mapActionType, type ConverterConfig } from "../module/config";
import { clone, isRecord, readArray, readRecord, readString, readTrimmedString, type JsonRecord } from "../helpers/records";
import { UnresolvedEntityError, type CatalogMatcher } from "../catalog/catalog-resolver";
import type { CatalogEntry } from "../catalog/catalog";
import type { SourceAbility, SourceEntity } from "../models/source";
import type { PlaceholderProvenance, TargetItem, TargetItemStats, TargetItemType } from "../models/target";
import { normalize } from "../text/normalizer";
import { assessTransfer, enhance, preserveFormatting, resolveDescription, type ItemKind } from "../text/rich-text";
import type { ReportBuilder } from "./report";
import { logDebug } from "../utils";

export interface ConvertedItem {
  item: TargetItem;
  /** Catalog entry the item was copied from; null for placeholders. */
  entry: CatalogEntry | null;
}

export interface ConvertOptions {
  /** Ability details for ability-typed sources; drives action type and placeholder power data. */
  ability?: SourceAbility | null;
  selected?: boolean;
  sourceLevel?: number | null;
}

type ItemConverterConfig = Pick<ConverterConfig, "strict" | "actionTypes" | "markupSafelist">;

function createStats(existing: unknown, compendiumSource: string | null): TargetItemStats {
  const stats = isRecord(existing) ? existing : {};
  return {
    compendiumSource,
    duplicateSource: readString(stats, "duplicateSource"),
    exportSource: readString(stats, "exportSource"),
    coreVersion: readString(stats, "coreVersion") ?? CONSTANTS.CORE_VERSION,
    systemId: readString(stats, "systemId") ?? CONSTANTS.SYSTEM_ID,
    systemVersion: readString(stats, "systemVersion") ?? CONSTANTS.SYSTEM_VERSION,
    lastModifiedBy: readString(stats, "lastModifiedBy"),
  };
}

function sourceText(source: SourceEntity): string {
  if (source.description.trim()) {
    return source.description;
  }
  return source.sections
    .filter((section) => section.type === "text")
    .map((section) => section.text)
    .join(" ");
}

/** Normalizes and balances a copied catalog description in place. False when the copy has no text. */
function cleanCatalogDescription(system: JsonRecord, safelist: readonly string[]): boolean {
  const description = readRecord(system, "description");
  const value = description ? normalize(readString(description, "value") ?? "") : "";
  if (!description || !value) {
    return false;
  }
  description.value = preserveFormatting(value, safelist);
  return true;
}

/**
 * Deep-copies a catalog record into the target item shape. The catalog record
 * itself is never touched; embedded-document metadata is reset.
 */
export function materializeEntry(entry: CatalogEntry, type: TargetItemType): TargetItem {
  const raw = clone(entry.raw);
  const stats = raw._stats;
  const existingSource = isRecord(stats) ? readTrimmedString(stats, "compendiumSource") : null;

  const item: TargetItem = {
    name: normalize(entry.name),
    type,
    img: readTrimmedString(raw, "img") ?? CONSTANTS.DEFAULT_IMAGE,
    system: readRecord(raw, "system") ?? {},
    effects: readArray(raw, "effects"),
    flags: readRecord(raw, "flags") ?? {},
    _stats: createStats(stats, entry.sourceId ?? existingSource),
    folder: null,
    sort: 0,
    ownership: { default: 0 },
  };

  if (entry.id) {
    item._id = entry.id;
  }
  return item;
}

/**
 * Converts single source entities into target items: copy-and-patch of the
 * matched catalog entry, or a synthesized placeholder with provenance flags.
 */
export class ItemConverter {
  #matcher: CatalogMatcher;
  #config: ItemConverterConfig;
  #report: ReportBuilder;

  constructor(matcher: CatalogMatcher, config: ItemConverterConfig, report: ReportBuilder) {
    this.#matcher = matcher;
    this.#config = config;
    this.#report = report;
  }

  convert(source: SourceEntity, declaredType: TargetItemType, options: ConvertOptions = {}): ConvertedItem {
    const name = normalize(source.name);
    const entry = this.#matcher.find(name, declaredType);

    if (entry) {
      return { item: this.#patch(entry, source, declaredType, options), entry };
    }

    if (this.#config.strict) {
      throw new UnresolvedEntityError(name, declaredType);
    }

    this.#report.addIssue("placeholder", name, declaredType, "no catalog match; synthesized placeholder");
    return { item: this.#placeholder(source, name, declaredType, options), entry: null };
  }

  convertAbility(ability: SourceAbility, selected: boolean): ConvertedItem {
    return this.convert(ability, "ability", { ability, selected, sourceLevel: ability.minLevel });
  }

  /** Materializes a granted catalog entry. Grants always become abilities. */
  materializeGrant(entry: CatalogEntry): TargetItem {
    const item = materializeEntry(entry, "ability");
    const actionType = readString(item.system, "type");
    if (actionType !== null) {
      item.system.type = mapActionType(actionType, this.#config.actionTypes);
    }
    const safelist = this.#config.markupSafelist;
    if (!cleanCatalogDescription(item.system, safelist)) {
      item.system.description = {
        value: enhance(resolveDescription(null, entry.raw, safelist), "ability", safelist),
        director: "",
      };
    }
    return item;
  }

  #patch(entry: CatalogEntry, source: SourceEntity, type: TargetItemType, options: ConvertOptions): TargetItem {
    const item = materializeEntry(entry, type);

    if (options.ability?.usage) {
      item.system.type = mapActionType(options.ability.usage, this.#config.actionTypes);
    }

    if (!cleanCatalogDescription(item.system, this.#config.markupSafelist)) {
      const existing = readRecord(item.system, "description");
      item.system.description = {
        value: this.#describe(source, entry.raw, options.ability ? "ability" : "feature"),
        director: (existing && readString(existing, "director")) ?? "",
      };
    }

    logDebug(`Converted ${type} "${item.name}" from catalog entry ${entry.key}`);
    return item;
  }

  #placeholder(source: SourceEntity, name: string, type: TargetItemType, options: ConvertOptions): TargetItem {
    const ability = options.ability ?? null;
    const description = this.#describe(source, null, ability ? "ability" : "feature");

    const system: JsonRecord = {
      _dsid: source.id,
      description: { value: description, director: "" },
    };

    if (ability) {
      Object.assign(system, {
        keywords: [...ability.keywords],
        type: mapActionType(ability.usage ?? "main", this.#config.actionTypes),
        distance: { type: "melee", primary: 1, secondary: null, tertiary: null },
        target: { type: "creature", value: 1 },
        effect: { before: normalize(ability.description) || description, after: "" },
        power: {
          roll: { formula: "@chr", characteristics: [...ability.characteristics] },
          effects: {},
        },
      });
    }

    const provenance: PlaceholderProvenance = {
      synthesized: true,
      sourceId: source.id,
      sourceLevel: options.sourceLevel ?? null,
      selected: options.selected ?? false,
    };

    return {
      name,
      type,
      img: CONSTANTS.DEFAULT_IMAGE,
      system,
      effects: [],
      flags: { [CONSTANTS.MODULEID]: { provenance } },
      _stats: createStats(null, null),
      folder: null,
      sort: 0,
      ownership: { default: 0 },
    };
  }

  #describe(source: SourceEntity, catalogRecord: JsonRecord | null, kind: ItemKind): string {
    const safelist = this.#config.markupSafelist;
    if (catalogRecord) {
      const fromCatalog = resolveDescription(null, catalogRecord, safelist);
      if (fromCatalog !== CONSTANTS.NO_DESCRIPTION) {
        return enhance(fromCatalog, kind, safelist);
      }
    }

    const resolved = resolveDescription(source, null, safelist);
    const transferred = enhance(resolved, kind, safelist) || CONSTANTS.NO_DESCRIPTION;
    const original = sourceText(source);

    this.#report.addTransfer({ name: source.name, original, transferred });
    const problem = assessTransfer(original, transferred);
    if (problem) {
      this.#report.addIssue("description-degraded", normalize(source.name), null, `description transfer ${problem}`);
    }
    return transferred;
  }
}
