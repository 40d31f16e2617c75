import assert from "node:assert/strict";
import { test } from "node:test";

import { buildCatalog, type Catalog } from "../src/scripts/catalog/catalog";
import { GrantExpander } from "../src/scripts/catalog/grant-expander";
import { LogLevel, addLogSink, setLogLevel } from "../src/scripts/utils";
import { loadCatalogFixture } from "./helpers/fixtures";

function grant(pool: string[], extra: Record<string, unknown> = {}) {
  return { type: "itemGrant", pool: pool.map((uuid) => ({ uuid })), ...extra };
}

function requireEntry(catalog: Catalog, key: string) {
  const entry = catalog.get(key);
  assert.ok(entry, `missing catalog entry ${key}`);
  return entry;
}

const chainCatalog = buildCatalog([
  {
    _id: "rootId",
    name: "Root Trait",
    type: "ancestryTrait",
    system: {
      _dsid: "root",
      advancements: {
        direct: grant(["Compendium.ds.abilities.Item.childId"]),
        late: grant(["Compendium.ds.abilities.Item.lateId"], { requirements: { level: 5 } }),
        pick: grant(["Compendium.ds.abilities.Item.optAId", "Compendium.ds.abilities.Item.optBId"], { chooseN: 1 }),
        dangling: grant(["Compendium.ds.abilities.Item.ghostId"]),
      },
    },
  },
  {
    _id: "childId",
    name: "Child Ability",
    type: "ability",
    system: { _dsid: "child", advancements: { next: grant(["Compendium.ds.abilities.Item.grandId"]) } },
  },
  { _id: "grandId", name: "Grand Ability", type: "ability", system: { _dsid: "grand" } },
  { _id: "lateId", name: "Late Ability", type: "ability", system: { _dsid: "late" } },
  {
    _id: "optAId",
    name: "Option A",
    type: "ability",
    system: { _dsid: "opt-a", advancements: { extra: grant(["Compendium.ds.abilities.Item.grandId"]) } },
  },
  { _id: "optBId", name: "Option B", type: "ability", system: { _dsid: "opt-b" } },
]);

test("a trait grant pool referencing an ability by UUID yields that ability", () => {
  const catalog = loadCatalogFixture();
  const expander = new GrantExpander(catalog, { level: 1, maxGrantDepth: 8 });

  const granted = expander.expand(requireEntry(catalog, "psionic-gift"), new Set());
  assert.deepEqual(
    granted.map((entry) => entry.key),
    ["mind-spike"],
  );
});

test("expand walks nested grants depth-first and skips level-gated and choice pools", () => {
  const expander = new GrantExpander(chainCatalog, { level: 1, maxGrantDepth: 8 });
  const materialized = new Set<string>();

  const granted = expander.expand(requireEntry(chainCatalog, "root"), materialized);

  assert.deepEqual(
    granted.map((entry) => entry.key),
    ["child", "grand"],
  );
  assert.deepEqual([...materialized], ["child", "grand"]);
});

test("level requirements at or below the character level are granted", () => {
  const expander = new GrantExpander(chainCatalog, { level: 5, maxGrantDepth: 8 });
  const granted = expander.expand(requireEntry(chainCatalog, "root"), new Set());

  assert.deepEqual(
    granted.map((entry) => entry.key),
    ["child", "grand", "late"],
  );
});

test("entries already on the actor are not granted again", () => {
  const expander = new GrantExpander(chainCatalog, { level: 1, maxGrantDepth: 8 });
  const granted = expander.expand(requireEntry(chainCatalog, "root"), new Set(["child"]));

  assert.deepEqual(
    granted.map((entry) => entry.key),
    ["grand"],
  );
});

test("expandChoice grants only the selected pool members and their own grants", () => {
  const expander = new GrantExpander(chainCatalog, { level: 1, maxGrantDepth: 8 });
  const granted = expander.expandChoice(requireEntry(chainCatalog, "root"), ["option a"], new Set());

  assert.deepEqual(
    granted.map((entry) => entry.key),
    ["opt-a", "grand"],
  );
});

test("cycles terminate", () => {
  const catalog = buildCatalog([
    { _id: "aId", name: "Loop A", type: "ability", system: { _dsid: "a", advancements: { g: grant(["X.Item.bId"]) } } },
    { _id: "bId", name: "Loop B", type: "ability", system: { _dsid: "b", advancements: { g: grant(["X.Item.aId"]) } } },
  ]);
  const expander = new GrantExpander(catalog, { level: 1, maxGrantDepth: 8 });

  assert.deepEqual(
    expander.expand(requireEntry(catalog, "a"), new Set()).map((entry) => entry.key),
    ["b"],
  );
});

function warningsDuring(run: () => void): string[] {
  const warnings: string[] = [];
  const remove = addLogSink((record) => {
    if (record.level === LogLevel.Warn) warnings.push(record.message);
  });
  setLogLevel(LogLevel.Warn);
  try {
    run();
  } finally {
    remove();
    setLogLevel(LogLevel.Silent);
  }
  return warnings;
}

test("an entry reached through two branches is granted once without a cycle warning", () => {
  const catalog = buildCatalog([
    {
      _id: "topId",
      name: "Top",
      type: "ancestryTrait",
      system: { _dsid: "top", advancements: { g: grant(["X.Item.leftId", "X.Item.rightId"]) } },
    },
    { _id: "leftId", name: "Left", type: "ability", system: { _dsid: "left", advancements: { g: grant(["X.Item.sharedId"]) } } },
    { _id: "rightId", name: "Right", type: "ability", system: { _dsid: "right", advancements: { g: grant(["X.Item.sharedId"]) } } },
    { _id: "sharedId", name: "Shared", type: "ability", system: { _dsid: "shared" } },
  ]);
  const expander = new GrantExpander(catalog, { level: 1, maxGrantDepth: 8 });
  let keys: string[] = [];

  const warnings = warningsDuring(() => {
    keys = expander.expand(requireEntry(catalog, "top"), new Set()).map((entry) => entry.key);
  });

  assert.deepEqual(keys, ["left", "shared", "right"]);
  assert.deepEqual(warnings, []);
});

test("a grant back to an ancestor is reported as a cycle", () => {
  const catalog = buildCatalog([
    { _id: "aId", name: "Loop A", type: "ability", system: { _dsid: "a", advancements: { g: grant(["X.Item.bId"]) } } },
    { _id: "bId", name: "Loop B", type: "ability", system: { _dsid: "b", advancements: { g: grant(["X.Item.aId"]) } } },
  ]);
  const expander = new GrantExpander(catalog, { level: 1, maxGrantDepth: 8 });

  const warnings = warningsDuring(() => {
    expander.expand(requireEntry(catalog, "a"), new Set());
  });

  assert.deepEqual(warnings, ["Grant cycle detected: Loop B -> Loop A"]);
});

test("the depth bound stops long chains", () => {
  const records = Array.from({ length: 6 }, (_, index) => ({
    _id: `n${index}`,
    name: `Link ${index}`,
    type: "ability",
    system: {
      _dsid: `link-${index}`,
      advancements: index < 5 ? { g: grant([`X.Item.n${index + 1}`]) } : {},
    },
  }));
  const catalog = buildCatalog(records);
  const expander = new GrantExpander(catalog, { level: 1, maxGrantDepth: 2 });

  assert.deepEqual(
    expander.expand(requireEntry(catalog, "link-0"), new Set()).map((entry) => entry.key),
    ["link-1", "link-2"],
  );
});

test("resolveReference tries _id, catalog key, then source UUID", () => {
  const catalog = loadCatalogFixture();
  const expander = new GrantExpander(catalog, { level: 1, maxGrantDepth: 8 });

  assert.equal(expander.resolveReference("Compendium.draw-steel.abilities.Item.ablCharge0000001")?.key, "charge");
  assert.equal(expander.resolveReference("grab")?.key, "grab");
  assert.equal(expander.resolveReference("Compendium.draw-steel.origins.Item.ancHuman00000001")?.key, "human");
  assert.equal(expander.resolveReference("Compendium.draw-steel.abilities.Item.unknown"), null);
});
