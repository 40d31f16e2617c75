import CONSTANTS from "../module/constants";
import { resolveConverterConfig, type ConverterConfig } from "../module/config";
import { formatError, validate } from "../helpers/validation";
import { ensureValidSource } from "../validation/ensure-valid";
import { decodeSourceDocument } from "../source/decode";
import type { Catalog, CatalogEntry } from "../catalog/catalog";
import { CatalogMatcher, UnresolvedEntityError } from "../catalog/catalog-resolver";
import { GrantExpander } from "../catalog/grant-expander";
import type { SourceDocument, SourceEntity } from "../models/source";
import type { TargetActor, TargetItem, TargetItemType } from "../models/target";
import { normalize } from "../text/normalizer";
import { planClassAbilities, resolveBasicAbilities } from "./abilities";
import { collectKits, planFeatures, planLevels, type PlannedItem } from "./features";
import { createHeroSystem, detectLevel } from "./hero-stats";
import { ItemConverter, type ConvertedItem, type ConvertOptions } from "./item";
import { postProcess } from "./post-process";
import { ReportBuilder, summarizeAbilities, type AbilitySummary, type ConversionReport } from "./report";
import { logDebug, logError, logInfo } from "../utils";

export interface ConversionResult {
  actor: TargetActor;
  report: ConversionReport;
}

function itemKey(item: Pick<TargetItem, "name" | "type">): string {
  return `${item.type}\u0000${item.name}`;
}

/** Keeps the first item of every `(name, type)` pair. */
export function dedupeItems<T extends { item: TargetItem }>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  return items.filter(({ item }) => {
    const key = itemKey(item);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Converts one decoded hero. Holds the items produced so far; one instance per run.
 */
class CharacterConversion {
  readonly #source: SourceDocument;
  readonly #level: number;
  readonly #catalog: Catalog;
  readonly #config: Readonly<ConverterConfig>;
  readonly #report = new ReportBuilder();
  readonly #converter: ItemConverter;
  readonly #expander: GrantExpander;
  readonly #items: ConvertedItem[] = [];
  readonly #keys = new Set<string>();
  readonly #materialized = new Set<string>();

  constructor(source: SourceDocument, catalog: Catalog, config: Readonly<ConverterConfig>) {
    this.#source = source;
    this.#catalog = catalog;
    this.#config = config;
    this.#level = detectLevel(source, config.level);
    this.#converter = new ItemConverter(new CatalogMatcher(catalog, config), config, this.#report);
    this.#expander = new GrantExpander(catalog, { level: this.#level, maxGrantDepth: config.maxGrantDepth });
  }

  run(): ConversionResult {
    const source = this.#source;
    const level = this.#level;
    logInfo(`Converting ${source.name} at level ${level}`);

    const actor: TargetActor = {
      name: normalize(source.name),
      type: "hero",
      img: CONSTANTS.DEFAULT_IMAGE,
      system: createHeroSystem(source, level),
      items: [],
    };

    this.#convertAncestry();

    if (source.culture) {
      this.#convertEntity(source.culture, "culture");
    }

    const heroClass = source.class;
    if (heroClass) {
      const converted = this.#convertEntity(heroClass, "class");
      if (converted) converted.item.system.level = level;
      this.#convertPlanned(planLevels(heroClass.featuresByLevel, "class", level));
    }

    if (source.career) {
      this.#convertEntity(source.career, "career");
      this.#convertPlanned(planFeatures(source.career.features, "career", level));
    }

    const subclass = heroClass?.subclass ?? null;
    if (subclass) {
      this.#convertEntity(subclass, "subclass");
      this.#convertPlanned(planLevels(subclass.featuresByLevel, "subclass", level));
    }

    if (source.complication) {
      this.#convertEntity(source.complication, "complication");
    }

    this.#convertPlanned(planFeatures(source.features, "hero", level));

    if (heroClass) {
      const kits = [...collectKits(heroClass.featuresByLevel, level), ...collectKits(subclass?.featuresByLevel ?? [], level)];
      for (const kit of kits) {
        const converted = this.#convertEntity(kit, "kit");
        if (converted?.entry) this.#addGrants(this.#expander.expand(converted.entry, this.#materialized));
      }
    }

    this.#addGrants(resolveBasicAbilities(this.#catalog, this.#config.basicAbilityIds));

    const abilitySummary = this.#convertClassAbilities();

    for (const entity of source.state.inventory) {
      this.#convertEntity(entity, "treasure");
    }

    actor.items = this.#items.map(({ item }) => item);
    const { skills, languages } = postProcess(actor, this.#items, source, level, this.#config);

    const kept = new Set(actor.items);
    const finalItems = dedupeItems(this.#items.filter(({ item }) => kept.has(item))).filter(({ item }) =>
      this.#checkItem(item),
    );
    actor.items = finalItems.map(({ item }) => item);

    const report = this.#report.build({
      heroName: actor.name,
      level,
      itemCount: actor.items.length,
      catalogBacked: finalItems.filter(({ entry }) => entry !== null).length,
      placeholders: finalItems.filter(({ entry }) => entry === null).length,
      abilities: abilitySummary,
      skills,
      languages,
    });

    return { actor, report };
  }

  #convertAncestry(): void {
    const ancestry = this.#source.ancestry;
    if (!ancestry) return;

    const converted = this.#convertEntity(ancestry, "ancestry");
    // Ancestries listing their traits get them from the feature walk; otherwise the catalog grants them.
    if (converted?.entry && ancestry.features.length === 0) {
      this.#addGrants(this.#expander.expand(converted.entry, this.#materialized));
    }

    this.#convertPlanned(planFeatures(ancestry.features, "ancestry", this.#level));
  }

  #convertClassAbilities(): AbilitySummary {
    const heroClass = this.#source.class;
    const plan = heroClass ? planClassAbilities(heroClass, this.#level) : { included: [], expectedNames: [] };
    const convertedNames: string[] = [];

    for (const ability of plan.included) {
      const converted = this.#guard(ability, "ability", () => this.#converter.convertAbility(ability, true));
      if (!converted) continue;
      convertedNames.push(normalize(ability.name));
      this.#add(converted);
    }

    return summarizeAbilities(this.#level, plan.expectedNames, convertedNames);
  }

  #convertPlanned(plan: readonly PlannedItem[]): void {
    for (const planned of plan) {
      const options: ConvertOptions = {
        ability: planned.ability,
        selected: true,
        sourceLevel: planned.ability?.minLevel ?? planned.level,
      };
      const converted = this.#convertEntity(planned.source, planned.type, options);
      if (!converted?.entry) continue;

      const grants = planned.choiceSelections
        ? this.#expander.expandChoice(converted.entry, planned.choiceSelections, this.#materialized)
        : this.#expander.expand(converted.entry, this.#materialized);
      this.#addGrants(grants);
    }
  }

  #convertEntity(source: SourceEntity, type: TargetItemType, options: ConvertOptions = {}): ConvertedItem | null {
    const converted = this.#guard(source, type, () => this.#converter.convert(source, type, options));
    if (!converted) return null;
    this.#add(converted);
    return converted;
  }

  #guard(source: SourceEntity, type: TargetItemType, convert: () => ConvertedItem): ConvertedItem | null {
    const name = normalize(source.name);
    try {
      return convert();
    } catch (error) {
      if (error instanceof UnresolvedEntityError) {
        this.#report.addIssue("unresolved", name, type, error.message);
        return null;
      }
      logError(`Failed to convert ${type} "${name}"`, error);
      const message = error instanceof Error ? error.message : String(error);
      this.#report.addIssue("entity-failed", name, type, message);
      return null;
    }
  }

  #addGrants(entries: readonly CatalogEntry[]): void {
    for (const entry of entries) {
      this.#materialized.add(entry.key);
      this.#add({ item: this.#converter.materializeGrant(entry), entry });
    }
  }

  #add(converted: ConvertedItem): void {
    const key = itemKey(converted.item);
    if (converted.entry) {
      this.#materialized.add(converted.entry.key);
    }
    if (this.#keys.has(key)) {
      logDebug(`Skipping duplicate ${converted.item.type} "${converted.item.name}"`);
      return;
    }
    this.#keys.add(key);
    this.#items.push(converted);
  }

  #checkItem(item: TargetItem): boolean {
    const result = validate("targetItem", item);
    if (result.ok) return true;
    this.#report.addIssue("entity-failed", item.name, item.type, result.errors.map(formatError).join("; "));
    return false;
  }
}

/**
 * Converts a raw hero document into a tabletop actor plus a conversion report.
 * Throws `DocumentStructureError` when the document is structurally malformed;
 * every per-entity failure is recorded in the report instead.
 */
export function convertCharacter(
  rawSource: unknown,
  catalog: Catalog,
  overrides: Partial<ConverterConfig> = {},
): ConversionResult {
  const config = resolveConverterConfig(overrides);
  const source = decodeSourceDocument(ensureValidSource(rawSource));
  return new CharacterConversion(source, catalog, config).run();
}
