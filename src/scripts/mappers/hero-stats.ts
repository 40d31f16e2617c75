import {
  CHARACTERISTICS,
  type Characteristic,
  type DamageType,
  type HeroSystem,
} from "../models/target";
import type { SourceDocument, SourceFeature } from "../models/source";
import { activeBuckets, collectKits } from "./features";
import { logDebug } from "../utils";

export const BASE_STAMINA = 20;
export const BASE_SPEED = 5;
export const DEFAULT_RECOVERIES = 8;
export const MAX_LEVEL = 10;

function isCharacteristic(value: string): value is Characteristic {
  return (CHARACTERISTICS as readonly string[]).includes(value);
}

/** Level override when given, else the class level, clamped to 1..10. */
export function detectLevel(source: SourceDocument, override: number | null = null): number {
  const raw = override ?? source.class?.level ?? 1;
  const level = Math.min(MAX_LEVEL, Math.max(1, Math.floor(raw)));
  if (level !== raw) {
    logDebug(`Clamped level ${raw} to ${level}`);
  }
  return level;
}

/** Top-level ancestry features plus the options chosen inside ancestry `Choice` features. */
function ancestryTraits(source: SourceDocument): SourceFeature[] {
  const traits: SourceFeature[] = [];
  for (const feature of source.ancestry?.features ?? []) {
    if (feature.kind === "choice") {
      traits.push(...feature.selected);
    } else {
      traits.push(feature);
    }
  }
  return traits;
}

export function computeStability(source: SourceDocument): number {
  return ancestryTraits(source).filter((feature) => feature.name === "Grounded").length;
}

/** Ancestry speed (last `Speed` feature wins, base 5) plus the best kit speed bonus. */
export function computeMovement(source: SourceDocument, level: number): number {
  let speed = BASE_SPEED;
  for (const feature of ancestryTraits(source)) {
    if (feature.kind === "speed" && feature.speed > 0) {
      speed = feature.speed;
    }
  }

  const heroClass = source.class;
  const kits = heroClass
    ? [...collectKits(heroClass.featuresByLevel, level), ...collectKits(heroClass.subclass?.featuresByLevel ?? [], level)]
    : [];
  const kitBonus = kits.reduce((best, kit) => Math.max(best, kit.speed), 0);

  return speed + kitBonus;
}

/**
 * Explicit characteristic values when the builder recorded them; otherwise
 * primaries start at 2 and `Characteristic Bonus` features up to `level` add on.
 */
export function computeCharacteristics(source: SourceDocument, level: number): Record<Characteristic, number> {
  const values: Record<Characteristic, number> = { might: 0, agility: 0, reason: 0, intuition: 0, presence: 0 };
  const heroClass = source.class;
  if (!heroClass) return values;

  if (heroClass.characteristics) {
    for (const entry of heroClass.characteristics) {
      if (isCharacteristic(entry.characteristic)) values[entry.characteristic] = entry.value;
    }
    return values;
  }

  for (const name of heroClass.primaryCharacteristics) {
    if (isCharacteristic(name)) values[name] = 2;
  }
  for (const bucket of activeBuckets(heroClass.featuresByLevel, level)) {
    for (const feature of bucket.features) {
      if (feature.kind === "characteristicBonus" && isCharacteristic(feature.characteristic)) {
        values[feature.characteristic] += feature.value;
      }
    }
  }
  return values;
}

function zeroDamageTable(): Record<DamageType, number> {
  return { all: 0, acid: 0, cold: 0, corruption: 0, fire: 0, holy: 0, lightning: 0, poison: 0, psychic: 0, sonic: 0 };
}

export function createHeroSystem(source: SourceDocument, level: number): HeroSystem {
  const { state } = source;
  const characteristics = computeCharacteristics(source, level);

  return {
    stamina: { value: BASE_STAMINA - state.staminaDamage, temporary: state.staminaTemp },
    characteristics: {
      might: { value: characteristics.might },
      agility: { value: characteristics.agility },
      reason: { value: characteristics.reason },
      intuition: { value: characteristics.intuition },
      presence: { value: characteristics.presence },
    },
    combat: {
      save: { threshold: 6, bonus: "" },
      size: { value: 1, letter: "M" },
      stability: computeStability(source),
      turns: 1,
    },
    biography: {
      value: "",
      director: "",
      languages: [],
      height: { units: "in", value: null },
      weight: { units: "lb", value: null },
    },
    movement: { value: computeMovement(source, level), types: ["walk"], hover: false, disengage: 1 },
    damage: { immunities: zeroDamageTable(), weaknesses: zeroDamageTable() },
    recoveries: { value: source.class?.recoveries ?? DEFAULT_RECOVERIES, max: 0 },
    hero: {
      primary: { value: 0 },
      epic: { value: 0 },
      surges: state.surges,
      xp: state.xp,
      victories: state.victories,
      renown: state.renown,
      wealth: state.wealth,
      skills: [],
      preferredKit: null,
    },
  };
}
