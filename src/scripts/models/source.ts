/**
 * Decoded view of a hero document produced by the character builder.
 * Raw JSON is turned into these shapes by `source/decode.ts`; nothing downstream probes raw fields.
 */

export interface SourceSection {
  type: string;
  text: string;
}

/** Anything with a name and narrative text that can become one target item. */
export interface SourceEntity {
  id: string | null;
  name: string;
  description: string;
  sections: SourceSection[];
}

export interface SourceAbility extends SourceEntity {
  /** Action usage as written by the builder, e.g. "Main Action". */
  usage: string | null;
  keywords: string[];
  characteristics: string[];
  minLevel: number;
}

export interface SourceKit extends SourceEntity {
  speed: number;
}

export const MODIFIER_FEATURE_TYPES = ["Bonus", "Ability Damage", "Heroic Resource Gain"] as const;
export type ModifierFeatureType = (typeof MODIFIER_FEATURE_TYPES)[number];

export const SELECTION_CONTAINER_TYPES = ["Domain Feature", "Perk", "Project"] as const;
export type SelectionContainerType = (typeof SELECTION_CONTAINER_TYPES)[number];

interface FeatureVariant<TKind extends string> extends SourceEntity {
  kind: TKind;
  /** The builder's feature type string, kept for logging. */
  rawType: string;
}

export type TextFeature = FeatureVariant<"text">;

export interface AbilityFeature extends FeatureVariant<"ability"> {
  ability: SourceAbility;
}

export interface ChoiceFeature extends FeatureVariant<"choice"> {
  selected: SourceFeature[];
}

export interface MultipleFeature extends FeatureVariant<"multiple"> {
  features: SourceFeature[];
}

export interface SkillChoiceFeature extends FeatureVariant<"skillChoice"> {
  selected: string[];
}

export interface LanguageChoiceFeature extends FeatureVariant<"languageChoice"> {
  selected: string[];
}

export interface ClassAbilityFeature extends FeatureVariant<"classAbility"> {
  selectedIds: string[];
}

export interface SelectionFeature extends FeatureVariant<"selection"> {
  container: SelectionContainerType;
  selected: SourceEntity[];
}

export interface KitFeature extends FeatureVariant<"kit"> {
  selected: SourceKit[];
}

export interface CharacteristicBonusFeature extends FeatureVariant<"characteristicBonus"> {
  characteristic: string;
  value: number;
}

export interface SpeedFeature extends FeatureVariant<"speed"> {
  speed: number;
}

export interface ModifierFeature extends FeatureVariant<"modifier"> {
  modifier: ModifierFeatureType;
}

export type SourceFeature =
  | TextFeature
  | AbilityFeature
  | ChoiceFeature
  | MultipleFeature
  | SkillChoiceFeature
  | LanguageChoiceFeature
  | ClassAbilityFeature
  | SelectionFeature
  | KitFeature
  | CharacteristicBonusFeature
  | SpeedFeature
  | ModifierFeature;

export type SourceFeatureKind = SourceFeature["kind"];

export interface LevelBucket {
  level: number;
  features: SourceFeature[];
}

export interface SourceAncestry extends SourceEntity {
  features: SourceFeature[];
}

export const CULTURE_SECTIONS = ["language", "environment", "organization", "upbringing"] as const;
export type CultureSectionName = (typeof CULTURE_SECTIONS)[number];

export interface SourceCulture extends SourceEntity {
  aspects: Partial<Record<CultureSectionName, SourceFeature>>;
  languages: string[];
}

export interface SourceCareer extends SourceEntity {
  features: SourceFeature[];
}

export interface SourceSubclass extends SourceEntity {
  featuresByLevel: LevelBucket[];
}

export interface SourceCharacteristicValue {
  characteristic: string;
  value: number;
  skills: string[];
}

export interface SourceClass extends SourceEntity {
  level: number | null;
  recoveries: number | null;
  primaryCharacteristics: string[];
  /** Explicit characteristic values; null when the builder only recorded primaries. */
  characteristics: SourceCharacteristicValue[] | null;
  featuresByLevel: LevelBucket[];
  abilities: SourceAbility[];
  subclass: SourceSubclass | null;
}

export interface SourceState {
  staminaDamage: number;
  staminaTemp: number;
  surges: number;
  xp: number;
  victories: number;
  renown: number;
  wealth: number;
  inventory: SourceEntity[];
}

export interface SourceDocument {
  name: string;
  ancestry: SourceAncestry | null;
  culture: SourceCulture | null;
  career: SourceCareer | null;
  class: SourceClass | null;
  complication: SourceEntity | null;
  features: SourceFeature[];
  state: SourceState;
}
