import type {
  LevelBucket,
  SelectionContainerType,
  SourceAbility,
  SourceEntity,
  SourceFeature,
  SourceKit,
} from "../models/source";
import type { TargetItemType } from "../models/target";
import { logDebug } from "../utils";

/** Where in the hero document a feature list lives. */
export type FeatureOrigin = "ancestry" | "class" | "subclass" | "career" | "hero";

export type FeatureDisposition =
  | { action: "skip"; reason: string }
  | { action: "convert"; type: TargetItemType }
  | { action: "unwrap" };

/** One target item the orchestrator should produce. */
export interface PlannedItem {
  source: SourceEntity;
  type: TargetItemType;
  ability: SourceAbility | null;
  /** Level bucket the feature came from; null outside leveled lists. */
  level: number | null;
  /** Player-picked names from this item's choice grant pool; null when its grants apply in full. */
  choiceSelections: string[] | null;
}

const ALWAYS_SKIPPED_KINDS = new Set<SourceFeature["kind"]>([
  "skillChoice",
  "languageChoice",
  "classAbility",
  "modifier",
  "characteristicBonus",
  "speed",
  "kit",
]);

// Builder features whose names mark them as slots rather than content.
const CONTAINER_NAME_PATTERNS: Partial<Record<FeatureOrigin, readonly string[]>> = {
  class: ["pt Ability", "Signature Ability", "Kit", "1st-Level", "4th-Level", "5th-Level", "7th-Level", "9th-Level"],
  career: ["Skill", "Language", "Feature"],
};

const SELECTION_TARGET_TYPES: Record<SelectionContainerType, TargetItemType> = {
  "Domain Feature": "ability",
  Perk: "perk",
  Project: "project",
};

/**
 * Decides what happens to one builder feature. All name-based container
 * detection lives here.
 */
export function classifyFeature(feature: SourceFeature, origin: FeatureOrigin): FeatureDisposition {
  if (ALWAYS_SKIPPED_KINDS.has(feature.kind)) {
    return { action: "skip", reason: `${feature.rawType} is handled outside the item list` };
  }

  if (feature.kind === "selection" || feature.kind === "choice") {
    return { action: "unwrap" };
  }

  const pattern = CONTAINER_NAME_PATTERNS[origin]?.find((candidate) => feature.name.includes(candidate));
  if (pattern) {
    return { action: "skip", reason: `container name matches "${pattern}"` };
  }

  if (feature.kind === "multiple") {
    return { action: "unwrap" };
  }

  if (origin === "ancestry") {
    return { action: "convert", type: "ancestryTrait" };
  }

  return { action: "convert", type: feature.kind === "ability" ? "ability" : "feature" };
}

function planned(
  source: SourceEntity,
  type: TargetItemType,
  level: number | null,
  ability: SourceAbility | null = null,
  choiceSelections: string[] | null = null,
): PlannedItem {
  return { source, type, ability, level, choiceSelections };
}

function planDirect(feature: SourceFeature, type: TargetItemType, level: number | null): PlannedItem {
  if (feature.kind === "ability" && type === "ability") {
    return planned(feature.ability, type, level, feature.ability);
  }
  return planned(feature, type, level);
}

function unwrapFeature(feature: SourceFeature, origin: FeatureOrigin, level: number | null): PlannedItem[] {
  switch (feature.kind) {
    case "selection": {
      const type = SELECTION_TARGET_TYPES[feature.container];
      return feature.selected.map((entity) => planned(entity, type, level));
    }
    case "choice": {
      const items: PlannedItem[] = [];
      for (const option of feature.selected) {
        if (origin === "ancestry") {
          const selections = option.kind === "choice" ? option.selected.map((entry) => entry.name) : null;
          items.push(planned(option, "ancestryTrait", level, null, selections));
          continue;
        }
        if (option.kind === "modifier" || option.kind === "characteristicBonus") {
          continue;
        }
        items.push(planDirect(option, option.kind === "ability" ? "ability" : "feature", level));
      }
      return items;
    }
    case "multiple":
      return feature.features.flatMap((child) =>
        child.kind === "ability" ? [planned(child.ability, "ability", level, child.ability)] : [],
      );
    default:
      return [];
  }
}

/**
 * Plans the items for a flat feature list. Abilities whose own minimum level
 * exceeds `characterLevel` are dropped.
 */
export function planFeatures(
  features: readonly SourceFeature[],
  origin: FeatureOrigin,
  characterLevel: number,
  level: number | null = null,
): PlannedItem[] {
  const items: PlannedItem[] = [];

  for (const feature of features) {
    const disposition = classifyFeature(feature, origin);
    switch (disposition.action) {
      case "skip":
        logDebug(`Skipping ${origin} feature "${feature.name}": ${disposition.reason}`);
        break;
      case "convert":
        items.push(planDirect(feature, disposition.type, level));
        break;
      case "unwrap":
        items.push(...unwrapFeature(feature, origin, level));
        break;
    }
  }

  return items.filter((item) => {
    if (item.ability && item.ability.minLevel > characterLevel) {
      logDebug(`Dropping "${item.source.name}": requires level ${item.ability.minLevel}`);
      return false;
    }
    return true;
  });
}

export function activeBuckets(buckets: readonly LevelBucket[], characterLevel: number): LevelBucket[] {
  return buckets.filter((bucket) => bucket.level <= characterLevel);
}

/** Plans every bucket at or below the character level, in level order. */
export function planLevels(
  buckets: readonly LevelBucket[],
  origin: FeatureOrigin,
  characterLevel: number,
): PlannedItem[] {
  return activeBuckets(buckets, characterLevel).flatMap((bucket) =>
    planFeatures(bucket.features, origin, characterLevel, bucket.level),
  );
}

/** Yields every feature in the list together with the children of `Multiple Features` and `Choice`. */
export function* flattenFeatures(features: readonly SourceFeature[]): Generator<SourceFeature> {
  for (const feature of features) {
    yield feature;
    if (feature.kind === "multiple") {
      yield* flattenFeatures(feature.features);
    } else if (feature.kind === "choice") {
      yield* flattenFeatures(feature.selected);
    }
  }
}

export function collectKits(buckets: readonly LevelBucket[], characterLevel: number): SourceKit[] {
  const kits: SourceKit[] = [];
  for (const bucket of activeBuckets(buckets, characterLevel)) {
    for (const feature of flattenFeatures(bucket.features)) {
      if (feature.kind === "kit") kits.push(...feature.selected);
    }
  }
  return kits;
}
