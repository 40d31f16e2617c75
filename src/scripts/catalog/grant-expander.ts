import { normalize } from "../text/normalizer";
import type { Catalog, CatalogEntry, ItemGrantAdvancement } from "./catalog";
import { logDebug, logWarn } from "../utils";

export interface GrantExpanderOptions {
  /** Character level; grants that require a higher level are skipped. */
  level: number;
  maxGrantDepth: number;
}

function itemGrants(entry: CatalogEntry): ItemGrantAdvancement[] {
  return entry.advancements.filter((advancement): advancement is ItemGrantAdvancement => advancement.kind === "itemGrant");
}

function isChoicePool(advancement: ItemGrantAdvancement): boolean {
  return advancement.chooseN !== null && advancement.chooseN < advancement.pool.length;
}

/**
 * Walks `itemGrant` advancements and returns the catalog entries they grant,
 * in discovery order. `alreadyMaterialized` holds catalog keys already on the
 * actor; it is updated as entries are granted so nothing is granted twice.
 */
export class GrantExpander {
  #catalog: Catalog;
  #options: GrantExpanderOptions;

  constructor(catalog: Catalog, options: GrantExpanderOptions) {
    this.#catalog = catalog;
    this.#options = options;
  }

  /** Resolves a pool reference by `_id` (last UUID segment), catalog key, then source UUID. */
  resolveReference(reference: string): CatalogEntry | null {
    const segment = reference.split(".").pop() ?? reference;
    return (
      this.#catalog.getById(segment) ??
      this.#catalog.get(segment) ??
      this.#catalog.getBySourceId(reference) ??
      null
    );
  }

  expand(entry: CatalogEntry, alreadyMaterialized: Set<string>): CatalogEntry[] {
    const granted: CatalogEntry[] = [];
    this.#walk(entry, alreadyMaterialized, new Set([entry.key]), new Set([entry.key]), 1, granted);
    return granted;
  }

  /**
   * Grants only the pool members whose names the player selected, then expands
   * those members fully.
   */
  expandChoice(entry: CatalogEntry, selectedNames: readonly string[], alreadyMaterialized: Set<string>): CatalogEntry[] {
    const wanted = new Set(selectedNames.map((name) => normalize(name).toLowerCase()).filter(Boolean));
    const granted: CatalogEntry[] = [];
    const expanded = new Set([entry.key]);

    for (const advancement of this.#activeGrants(entry)) {
      for (const reference of advancement.pool) {
        const target = this.resolveReference(reference);
        if (!target || !wanted.has(normalize(target.name).toLowerCase())) continue;
        if (expanded.has(target.key)) continue;

        expanded.add(target.key);
        this.#grant(target, alreadyMaterialized, granted);
        this.#walk(target, alreadyMaterialized, new Set([entry.key, target.key]), expanded, 2, granted);
      }
    }

    return granted;
  }

  #activeGrants(entry: CatalogEntry): ItemGrantAdvancement[] {
    return itemGrants(entry).filter((advancement) => {
      if (advancement.level !== null && advancement.level > this.#options.level) {
        logDebug(`Skipping grant ${advancement.id} on ${entry.name}: requires level ${advancement.level}`);
        return false;
      }
      return true;
    });
  }

  #grant(target: CatalogEntry, alreadyMaterialized: Set<string>, granted: CatalogEntry[]): void {
    if (alreadyMaterialized.has(target.key)) return;
    alreadyMaterialized.add(target.key);
    granted.push(target);
  }

  /** `path` holds the keys from the root down to `entry`; `expanded` every key walked so far. */
  #walk(
    entry: CatalogEntry,
    alreadyMaterialized: Set<string>,
    path: Set<string>,
    expanded: Set<string>,
    depth: number,
    granted: CatalogEntry[],
  ): void {
    if (depth > this.#options.maxGrantDepth) {
      logWarn(`Grant chain below ${entry.name} exceeds depth ${this.#options.maxGrantDepth}; stopping`);
      return;
    }

    for (const advancement of this.#activeGrants(entry)) {
      if (isChoicePool(advancement)) {
        logDebug(`Skipping choice pool ${advancement.id} on ${entry.name}; granted only through selections`);
        continue;
      }

      for (const reference of advancement.pool) {
        const target = this.resolveReference(reference);
        if (!target) {
          logWarn(`Grant ${reference} on ${entry.name} does not resolve to a catalog entry`);
          continue;
        }
        if (path.has(target.key)) {
          logWarn(`Grant cycle detected: ${entry.name} -> ${target.name}`);
          continue;
        }
        if (expanded.has(target.key)) {
          logDebug(`${target.name} already expanded in this grant chain; skipping`);
          continue;
        }

        expanded.add(target.key);
        this.#grant(target, alreadyMaterialized, granted);
        path.add(target.key);
        this.#walk(target, alreadyMaterialized, path, expanded, depth + 1, granted);
        path.delete(target.key);
      }
    }
  }
}
