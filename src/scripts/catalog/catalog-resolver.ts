import { DEFAULT_CONVERTER_CONFIG, type ConverterConfig } from "../module/config";
import { normalize, sanitizeForLookup } from "../text/normalizer";
import type { Catalog, CatalogEntry } from "./catalog";
import { logDebug } from "../utils";

export type MatchTier = "alias" | "exact" | "substring" | "name" | "quoted" | "sanitized";

export interface CatalogMatch {
  entry: CatalogEntry;
  tier: MatchTier;
}

/** Raised in strict mode when no tier resolves an entity. Caught at the entity boundary. */
export class UnresolvedEntityError extends Error {
  public readonly entityName: string;
  public readonly declaredType: string | null;

  constructor(entityName: string, declaredType: string | null) {
    super(`No catalog entry matches ${declaredType ?? "entity"} "${entityName}"`);
    this.name = "UnresolvedEntityError";
    this.entityName = entityName;
    this.declaredType = declaredType;
  }
}

function sameType(entry: CatalogEntry, declaredType: string): boolean {
  return entry.type.toLowerCase() === declaredType.toLowerCase();
}

/**
 * Resolves source names against the catalog through a fixed sequence of tiers.
 * The first tier with a hit wins; within a tier the lowest catalog key wins.
 */
export class CatalogMatcher {
  #catalog: Catalog;
  #config: Pick<ConverterConfig, "nameAliases" | "spellingVariants">;
  #sanitized = new Map<string, string>();

  constructor(
    catalog: Catalog,
    config: Pick<ConverterConfig, "nameAliases" | "spellingVariants"> = DEFAULT_CONVERTER_CONFIG,
  ) {
    this.#catalog = catalog;
    this.#config = config;
  }

  find(name: string, declaredType?: string | null): CatalogEntry | null {
    return this.match(name, declaredType)?.entry ?? null;
  }

  match(name: string, declaredType?: string | null): CatalogMatch | null {
    const query = normalize(name);
    if (!query) {
      return null;
    }

    const type = declaredType?.trim() || null;
    const lower = query.toLowerCase();
    const entries = this.#catalog.entries();

    const aliasKey = this.#config.nameAliases[query];
    const aliased = aliasKey ? this.#catalog.get(aliasKey) : undefined;
    if (aliased) {
      return this.#hit(query, aliased, "alias");
    }

    if (type) {
      const exact = entries.find((entry) => entry.name.toLowerCase() === lower && sameType(entry, type));
      if (exact) return this.#hit(query, exact, "exact");

      const partial = entries.find((entry) => entry.name.toLowerCase().includes(lower) && sameType(entry, type));
      if (partial) return this.#hit(query, partial, "substring");
    }

    const byName = entries.find((entry) => entry.name.toLowerCase() === lower);
    if (byName) return this.#hit(query, byName, "name");

    const quoted = `"${lower}"`;
    const byQuoted = entries.find((entry) => entry.name.toLowerCase() === quoted);
    if (byQuoted) return this.#hit(query, byQuoted, "quoted");

    const key = this.#sanitize(query);
    if (key) {
      const bySanitized = entries.find(
        (entry) => this.#sanitize(entry.name) === key || this.#sanitize(entry.key) === key,
      );
      if (bySanitized) return this.#hit(query, bySanitized, "sanitized");
    }

    logDebug(`No catalog match for ${type ?? "entity"} "${query}"`);
    return null;
  }

  #sanitize(value: string): string {
    let key = this.#sanitized.get(value);
    if (key === undefined) {
      key = sanitizeForLookup(value, this.#config.spellingVariants);
      this.#sanitized.set(value, key);
    }
    return key;
  }

  #hit(query: string, entry: CatalogEntry, tier: MatchTier): CatalogMatch {
    logDebug(`Matched "${query}" to ${entry.key} (${tier})`);
    return { entry, tier };
  }
}
