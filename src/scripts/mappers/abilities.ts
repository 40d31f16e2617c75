import type { SourceAbility, SourceClass } from "../models/source";
import type { Catalog, CatalogEntry } from "../catalog/catalog";
import { normalize } from "../text/normalizer";
import { activeBuckets, flattenFeatures } from "./features";
import { logDebug, logInfo } from "../utils";

/** Ability ids picked through `Class Ability` features at or below the character level. */
export function collectSelectedAbilityIds(heroClass: SourceClass, characterLevel: number): Set<string> {
  const selected = new Set<string>();
  for (const bucket of activeBuckets(heroClass.featuresByLevel, characterLevel)) {
    for (const feature of flattenFeatures(bucket.features)) {
      if (feature.kind === "classAbility") {
        for (const id of feature.selectedIds) selected.add(id);
      }
    }
  }
  return selected;
}

export interface ClassAbilityPlan {
  included: SourceAbility[];
  /** Normalized names of the included abilities, for the conversion summary. */
  expectedNames: string[];
}

/**
 * An ability is included only when the player selected it and its minimum
 * level does not exceed the character level.
 */
export function planClassAbilities(heroClass: SourceClass, characterLevel: number): ClassAbilityPlan {
  const selected = collectSelectedAbilityIds(heroClass, characterLevel);
  const included: SourceAbility[] = [];

  for (const ability of heroClass.abilities) {
    if (ability.minLevel > characterLevel) {
      logDebug(`Skipping ability "${ability.name}" (level ${ability.minLevel}) above character level ${characterLevel}`);
      continue;
    }
    if (!ability.id || !selected.has(ability.id)) {
      logDebug(`Skipping ability "${ability.name}": not selected`);
      continue;
    }
    included.push(ability);
  }

  logInfo(`Selected ${included.length} of ${heroClass.abilities.length} class abilities for level ${characterLevel}`);
  return { included, expectedNames: included.map((ability) => normalize(ability.name)) };
}

/** Catalog entries for the actions every hero has, in configured order. Missing ids are skipped. */
export function resolveBasicAbilities(catalog: Catalog, basicAbilityIds: ReadonlySet<string>): CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  for (const id of basicAbilityIds) {
    const entry = catalog.get(id);
    if (entry) {
      entries.push(entry);
    } else {
      logDebug(`Basic ability ${id} is not in the catalog`);
    }
  }
  return entries;
}
