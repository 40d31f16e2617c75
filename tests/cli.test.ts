import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";

import { parseCliArgs, runCli } from "../src/scripts/cli";
import { FIXTURE_ROOT, loadHeroFixture } from "./helpers/fixtures";

test("parseCliArgs reads positionals and flags", () => {
  assert.deepEqual(parseCliArgs(["hero.json", "actor.json", "-c", "packs", "--level", "4", "--strict"]), {
    input: "hero.json",
    output: "actor.json",
    catalog: "packs",
    report: null,
    strict: true,
    verbose: false,
    level: 4,
  });
});

test("parseCliArgs rejects missing arguments and non-integer levels", () => {
  assert.throws(() => parseCliArgs(["hero.json", "actor.json"]), /^Error: Usage: convert/);
  assert.throws(
    () => parseCliArgs(["hero.json", "actor.json", "-c", "packs", "-l", "4.5"]),
    { message: '--level expects an integer, received "4.5"' },
  );
});

test("runCli writes the actor and report, and returns 1 for a malformed document", async () => {
  const directory = await mkdtemp(path.join(os.tmpdir(), "hero-cli-"));
  try {
    const input = path.join(directory, "hero.json");
    const output = path.join(directory, "actor.json");
    const reportFile = path.join(directory, "report.json");
    await writeFile(input, JSON.stringify(loadHeroFixture()));

    const catalog = path.join(FIXTURE_ROOT, "catalog.json");
    assert.equal(await runCli([input, output, "--catalog", catalog, "--report", reportFile, "--level", "7"]), 0);

    const actor: unknown = JSON.parse(await readFile(output, "utf8"));
    const report: unknown = JSON.parse(await readFile(reportFile, "utf8"));
    assert.ok(actor && typeof actor === "object" && "name" in actor);
    assert.equal(actor.name, "Korva Ashfall");
    assert.ok(report && typeof report === "object" && "level" in report);
    assert.equal(report.level, 7);

    await writeFile(input, JSON.stringify({ name: "No Class" }));
    assert.equal(await runCli([input, output, "--catalog", catalog]), 1);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
});
