import assert from "node:assert/strict";
import { test } from "node:test";

import { buildCatalog, Catalog, decodeCatalogEntry } from "../src/scripts/catalog/catalog";
import { loadCatalogFixture, loadCatalogRecords } from "./helpers/fixtures";

test("buildCatalog keys records by _dsid and iterates in key order", () => {
  const catalog = loadCatalogFixture();

  assert.equal(catalog.size, 19);
  assert.equal(catalog.get("human")?.name, "Human");
  const keys = catalog.entries().map((entry) => entry.key);
  assert.deepEqual(keys, [...keys].sort());
  assert.equal(keys[0], "advance");
});

test("buildCatalog lower-cases ability action types without touching the input", () => {
  const records = loadCatalogRecords();
  const catalog = buildCatalog(records);

  assert.equal(catalog.get("strike-now")?.actionType, "main");
  assert.equal(catalog.get("grab")?.actionType, "maneuver");
  const source = records.find((record) => record._id === "ablStrikeNow0001");
  assert.deepEqual(source?.system, {
    _dsid: "strike-now",
    type: "Main",
    description: { value: "<p>Strike before they act.</p>", director: "" },
  });
});

test("a standard record replaces a heroic one with the same identifier", () => {
  const catalog = buildCatalog([
    { _id: "a1", name: "Heroic Lucky", type: "perk", system: { _dsid: "lucky", category: "heroic" } },
    { _id: "a2", name: "Lucky", type: "perk", system: { _dsid: "lucky", category: "exploration" } },
    { _id: "a3", name: "Lucky Again", type: "perk", system: { _dsid: "lucky", category: "heroic" } },
  ]);

  assert.equal(catalog.size, 1);
  assert.equal(catalog.get("lucky")?.name, "Lucky");
});

test("a record sharing an identifier with another type is keyed by its _id", () => {
  const catalog = buildCatalog([
    { _id: "ftr1", name: "Shared", type: "feature", system: { _dsid: "shared" } },
    { _id: "abl1", name: "Shared", type: "ability", system: { _dsid: "shared" } },
  ]);

  assert.equal(catalog.get("shared")?.type, "feature");
  assert.equal(catalog.get("abl1")?.type, "ability");
  assert.equal(catalog.get("abl1")?.key, "abl1");
});

test("records without identifiers or failing the schema are skipped", () => {
  const catalog = buildCatalog([
    { name: "No Id", type: "feature", system: {} },
    { _id: "x1", type: "feature" },
    "not a record",
    { _id: "ok1", name: "Fallback Key", type: "feature" },
  ]);

  assert.equal(catalog.size, 1);
  assert.equal(catalog.get("ok1")?.name, "Fallback Key");
});

test("catalog lookups by _id and source id", () => {
  const catalog = loadCatalogFixture();

  assert.equal(catalog.getById("trtPsionic000001")?.key, "psionic-gift");
  assert.equal(catalog.getBySourceId("Compendium.draw-steel.origins.Item.ancHuman00000001")?.key, "human");
  assert.equal(catalog.getById("missing"), undefined);
});

test("decodeCatalogEntry reads advancements", () => {
  const entry = decodeCatalogEntry("wanderer", {
    name: "Wanderer",
    type: "culture",
    system: {
      advancements: {
        lang: { type: "language", languages: { choices: ["caelian"] } },
        skills: { type: "skill", skills: { choices: ["sneak"], groups: ["exploration"] } },
        grant: {
          type: "itemGrant",
          pool: [{ uuid: "Compendium.x.Item.abc" }, "Compendium.x.Item.def", { nope: true }],
          chooseN: 1,
          requirements: { level: 4 },
        },
        unknown: { type: "characteristic" },
      },
    },
  });

  assert.deepEqual(entry?.advancements, [
    { kind: "language", id: "lang", choices: ["caelian"] },
    { kind: "skill", id: "skills", choices: ["sneak"], groups: ["exploration"] },
    {
      kind: "itemGrant",
      id: "grant",
      name: null,
      pool: ["Compendium.x.Item.abc", "Compendium.x.Item.def"],
      chooseN: 1,
      level: 4,
    },
  ]);
});

test("Catalog.fromMap keeps the given keys and skips invalid records", () => {
  const catalog = Catalog.fromMap({
    "custom-key": { name: "Custom", type: "feature" },
    broken: { name: "" },
  });

  assert.equal(catalog.size, 1);
  assert.equal(catalog.get("custom-key")?.name, "Custom");
});
