import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";

import { loadCatalogDirectory, parsePackFile } from "../src/scripts/catalog/loader";
import "./helpers/fixtures";

const QUICK_STEP_YAML = `- _id: ablQuickStep0001
  name: Quick Step
  type: ability
  system:
    _dsid: quick-step
    type: Move
    description:
      value: "<p>You step aside.</p>"
- _id: prkKeen000000001
  name: Keen Eye
  type: perk
  system:
    _dsid: keen-eye
`;

async function withPackDirectory(run: (directory: string) => Promise<void>): Promise<void> {
  const directory = await mkdtemp(path.join(os.tmpdir(), "catalog-packs-"));
  try {
    await run(directory);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}

test("loadCatalogDirectory walks pack files recursively in sorted order", async () => {
  await withPackDirectory(async (directory) => {
    await writeFile(path.join(directory, "abilities.yml"), QUICK_STEP_YAML);
    await writeFile(path.join(directory, "notes.txt"), "not a pack");
    await mkdir(path.join(directory, "nested"));
    await writeFile(
      path.join(directory, "nested", "late.json"),
      JSON.stringify([
        { _id: "ablQuickStep0002", name: "Quick Step (Late)", type: "ability", system: { _dsid: "quick-step" } },
        { _id: "trsRope000000001", name: "Rope", type: "treasure", system: { _dsid: "rope" } },
      ]),
    );

    const { catalog, filesRead, failures } = await loadCatalogDirectory(directory);

    assert.equal(filesRead, 2);
    assert.deepEqual(failures, []);
    assert.deepEqual(
      catalog.entries().map((entry) => [entry.key, entry.name]),
      [
        ["keen-eye", "Keen Eye"],
        ["quick-step", "Quick Step"],
        ["rope", "Rope"],
      ],
    );
    assert.equal(catalog.get("quick-step")?.actionType, "move");
  });
});

test("unreadable pack files are listed as failures without aborting the load", async () => {
  await withPackDirectory(async (directory) => {
    const broken = path.join(directory, "broken.json");
    await writeFile(broken, "{ not json");
    await writeFile(path.join(directory, "rope.json"), JSON.stringify({ _id: "trsRope000000001", name: "Rope", type: "treasure" }));

    const { catalog, filesRead, failures } = await loadCatalogDirectory(directory);

    assert.equal(filesRead, 1);
    assert.equal(failures.length, 1);
    assert.ok(failures[0]?.startsWith(`${broken}: `), failures[0]);
    assert.equal(catalog.get("trsRope000000001")?.name, "Rope");
  });
});

test("parsePackFile accepts a list, a single record or an empty document", () => {
  assert.equal(parsePackFile("pack.yaml", QUICK_STEP_YAML).length, 2);
  assert.deepEqual(parsePackFile("single.json", '{"name":"Rope","type":"treasure"}'), [{ name: "Rope", type: "treasure" }]);
  assert.deepEqual(parsePackFile("empty.yml", ""), []);
});
