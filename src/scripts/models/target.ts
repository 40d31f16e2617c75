import type { JsonRecord } from "../helpers/records";

export const TARGET_ITEM_TYPES = [
  "ability",
  "feature",
  "ancestry",
  "ancestryTrait",
  "culture",
  "career",
  "class",
  "subclass",
  "kit",
  "perk",
  "project",
  "complication",
  "treasure",
] as const;
export type TargetItemType = (typeof TARGET_ITEM_TYPES)[number];

export interface TargetItemStats {
  compendiumSource: string | null;
  duplicateSource: string | null;
  exportSource: string | null;
  coreVersion: string;
  systemId: string;
  systemVersion: string;
  lastModifiedBy: string | null;
}

export interface TargetItem {
  _id?: string;
  name: string;
  type: TargetItemType;
  img: string;
  system: JsonRecord;
  effects: unknown[];
  flags: JsonRecord;
  _stats: TargetItemStats;
  folder: string | null;
  sort: number;
  ownership: Record<string, number>;
}

/** Provenance written on synthesized items under the module's flag scope. */
export interface PlaceholderProvenance {
  synthesized: true;
  sourceId: string | null;
  sourceLevel: number | null;
  selected: boolean;
}

export const CHARACTERISTICS = ["might", "agility", "reason", "intuition", "presence"] as const;
export type Characteristic = (typeof CHARACTERISTICS)[number];

export const DAMAGE_TYPES = [
  "all",
  "acid",
  "cold",
  "corruption",
  "fire",
  "holy",
  "lightning",
  "poison",
  "psychic",
  "sonic",
] as const;
export type DamageType = (typeof DAMAGE_TYPES)[number];

export interface ValueField<T> {
  value: T;
}

export interface MeasuredField {
  units: string;
  value: number | null;
}

export interface HeroSystem {
  stamina: { value: number; temporary: number };
  characteristics: Record<Characteristic, ValueField<number>>;
  combat: {
    save: { threshold: number; bonus: string };
    size: { value: number; letter: string };
    stability: number;
    turns: number;
  };
  biography: {
    value: string;
    director: string;
    languages: string[];
    height: MeasuredField;
    weight: MeasuredField;
  };
  movement: {
    value: number;
    types: string[];
    hover: boolean;
    disengage: number;
  };
  damage: {
    immunities: Record<DamageType, number>;
    weaknesses: Record<DamageType, number>;
  };
  recoveries: { value: number; max: number };
  hero: {
    primary: ValueField<number>;
    epic: ValueField<number>;
    surges: number;
    xp: number;
    victories: number;
    renown: number;
    wealth: number;
    skills: string[];
    preferredKit: string | null;
  };
}

export interface TargetActor {
  name: string;
  type: "hero";
  img: string;
  system: HeroSystem;
  items: TargetItem[];
}
