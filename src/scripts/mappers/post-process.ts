import CONSTANTS from "../module/constants";
import type { ConverterConfig } from "../module/config";
import { readRecord, readString } from "../helpers/records";
import type { SourceDocument, SourceFeature } from "../models/source";
import { CULTURE_SECTIONS } from "../models/source";
import type { TargetActor, TargetItem, TargetItemType } from "../models/target";
import type { CatalogEntry } from "../catalog/catalog";
import { activeBuckets, flattenFeatures } from "./features";
import { logDebug } from "../utils";

const ADVANCEMENT_ITEM_TYPES = new Set<TargetItemType>(["ancestry", "culture", "career", "class", "subclass"]);

export type LanguageOrigin = "ancestry" | "culture" | "career" | "class" | "hero";

/** Everything the player picked that is expressed through advancement selections. */
export interface SelectionSet {
  skills: string[];
  languages: Record<LanguageOrigin, string[]>;
}

/** Builder skill display name to the target's camel-cased key. */
export function normalizeSkillName(name: string, overrides: Readonly<Record<string, string>>): string {
  const trimmed = name.trim();
  if (!trimmed) return trimmed;

  const override = overrides[trimmed];
  if (override) return override;

  const [first, ...rest] = trimmed.split(/\s+/);
  return first.toLowerCase() + rest.map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()).join("");
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

function selectedFrom(features: Iterable<SourceFeature>, kind: "skillChoice" | "languageChoice"): string[] {
  const names: string[] = [];
  for (const feature of features) {
    if (feature.kind === kind) names.push(...feature.selected);
  }
  return names;
}

function* cultureAspects(source: SourceDocument): Generator<SourceFeature> {
  const culture = source.culture;
  if (!culture) return;
  for (const section of CULTURE_SECTIONS) {
    const aspect = culture.aspects[section];
    if (aspect) yield* flattenFeatures([aspect]);
  }
}

function* leveledFeatures(source: SourceDocument, level: number): Generator<SourceFeature> {
  const heroClass = source.class;
  if (!heroClass) return;
  for (const bucket of activeBuckets(heroClass.featuresByLevel, level)) {
    yield* flattenFeatures(bucket.features);
  }
  for (const bucket of activeBuckets(heroClass.subclass?.featuresByLevel ?? [], level)) {
    yield* flattenFeatures(bucket.features);
  }
}

/**
 * Gathers skill and language picks from ancestry, culture, career, class and
 * subclass (levels at or below `level`) and the top-level features.
 */
export function collectSelections(
  source: SourceDocument,
  level: number,
  skillKeyOverrides: Readonly<Record<string, string>>,
): SelectionSet {
  const normalizeName = (name: string) => normalizeSkillName(name, skillKeyOverrides);
  const ancestryFeatures = [...flattenFeatures(source.ancestry?.features ?? [])];
  const careerFeatures = [...flattenFeatures(source.career?.features ?? [])];
  const heroFeatures = [...flattenFeatures(source.features)];
  const classFeatures = [...leveledFeatures(source, level)];
  const culture = [...cultureAspects(source)];

  const characteristicSkills = (source.class?.characteristics ?? []).flatMap((entry) => entry.skills);
  const skills = unique(
    [
      ...characteristicSkills,
      ...selectedFrom(ancestryFeatures, "skillChoice"),
      ...selectedFrom(culture, "skillChoice"),
      ...selectedFrom(careerFeatures, "skillChoice"),
      ...selectedFrom(classFeatures, "skillChoice"),
      ...selectedFrom(heroFeatures, "skillChoice"),
    ]
      .map(normalizeName)
      .filter(Boolean),
  );

  const languages = (names: string[]) => unique(names.map(normalizeName).filter(Boolean));

  return {
    skills,
    languages: {
      ancestry: languages(selectedFrom(ancestryFeatures, "languageChoice")),
      culture: languages([...selectedFrom(culture, "languageChoice"), ...(source.culture?.languages ?? [])]),
      career: languages(selectedFrom(careerFeatures, "languageChoice")),
      class: languages(selectedFrom(classFeatures, "languageChoice")),
      hero: languages(selectedFrom(heroFeatures, "languageChoice")),
    },
  };
}

function languageOrigin(type: TargetItemType): LanguageOrigin | null {
  switch (type) {
    case "culture":
    case "career":
    case "class":
      return type;
    default:
      return null;
  }
}

function advancementFlags(item: TargetItem): Record<string, unknown> {
  const scope = readRecord(item.flags, CONSTANTS.SYSTEM_ID) ?? {};
  const advancement = readRecord(scope, "advancement") ?? {};
  scope.advancement = advancement;
  item.flags[CONSTANTS.SYSTEM_ID] = scope;
  return advancement;
}

/**
 * Pass 1: writes `flags[system].advancement[id] = { selected }` on origin items
 * for skill and language advancements the player resolved.
 */
export function applyAdvancementSelections(
  items: readonly { item: TargetItem; entry: CatalogEntry | null }[],
  selections: SelectionSet,
  skillGroups: Readonly<Record<string, string>>,
): void {
  const groupOf = new Map(Object.entries(skillGroups).map(([skill, group]) => [skill.toLowerCase(), group]));
  const chosen = new Set(selections.skills);

  for (const { item, entry } of items) {
    if (!entry || !ADVANCEMENT_ITEM_TYPES.has(item.type)) continue;

    for (const advancement of entry.advancements) {
      let selected: string[] = [];

      if (advancement.kind === "skill") {
        const fromChoices = advancement.choices.filter((choice) => chosen.has(choice));
        const groups = new Set(advancement.groups);
        const fromGroups = selections.skills.filter((skill) => {
          const group = groupOf.get(skill.toLowerCase());
          return group !== undefined && groups.has(group);
        });
        selected = unique([...fromChoices, ...fromGroups]);
      } else if (advancement.kind === "language") {
        const origin = languageOrigin(item.type);
        selected = origin ? [...selections.languages[origin]].sort() : [];
      } else {
        continue;
      }

      if (selected.length) {
        advancementFlags(item)[advancement.id] = { selected };
        logDebug(`Selected ${selected.join(", ")} for ${advancement.kind} advancement ${advancement.id} on ${item.name}`);
      }
    }
  }
}

/** Pass 2: the actor's skill list, deduplicated in first-seen order. */
export function aggregateSkills(actor: TargetActor, selections: SelectionSet): string[] {
  const skills = unique([...actor.system.hero.skills, ...selections.skills]);
  actor.system.hero.skills = skills;
  return skills;
}

/**
 * Pass 3: languages stay on item advancements only, so the actor-level list is
 * emptied and generic "Language" feature items are removed.
 */
export function aggregateLanguages(actor: TargetActor, selections: SelectionSet): string[] {
  const { ancestry, culture, career, class: fromClass, hero } = selections.languages;
  const languages = unique([...culture, ...ancestry, ...career, ...fromClass, ...hero]);

  actor.system.biography.languages = [];
  const before = actor.items.length;
  actor.items = actor.items.filter((item) => !(item.type === "feature" && item.name.includes("Language")));
  if (actor.items.length !== before) {
    logDebug(`Removed ${before - actor.items.length} language placeholder item(s)`);
  }
  return languages;
}

/** Pass 4: features whose action type is `triggered` become abilities. */
export function reclassifyTriggered(items: TargetItem[]): number {
  let changed = 0;
  for (const item of items) {
    if (item.type === "feature" && readString(item.system, "type") === "triggered") {
      item.type = "ability";
      changed += 1;
      logDebug(`Reclassified "${item.name}" as ability`);
    }
  }
  return changed;
}

export interface PostProcessResult {
  skills: string[];
  languages: string[];
}

export function postProcess(
  actor: TargetActor,
  items: readonly { item: TargetItem; entry: CatalogEntry | null }[],
  source: SourceDocument,
  level: number,
  config: Pick<ConverterConfig, "skillGroups" | "skillKeyOverrides">,
): PostProcessResult {
  const selections = collectSelections(source, level, config.skillKeyOverrides);
  applyAdvancementSelections(items, selections, config.skillGroups);
  const skills = aggregateSkills(actor, selections);
  const languages = aggregateLanguages(actor, selections);
  reclassifyTriggered(actor.items);
  return { skills, languages };
}
