import assert from "node:assert/strict";
import { test } from "node:test";
import { formatError, formatErrorPath, validate } from "../src/scripts/helpers/validation";
import {
  DocumentStructureError,
  ensureValid,
  ensureValidSource,
} from "../src/scripts/validation/ensure-valid";
import { cloneFixture, loadCatalogRecords, loadHeroFixture } from "./helpers/fixtures";

const heroFixture = loadHeroFixture();

test("canonical fixtures validate against their schemas", () => {
  assert.deepStrictEqual(validate("sourceDocument", cloneFixture(heroFixture)), { ok: true });

  for (const record of loadCatalogRecords()) {
    assert.deepStrictEqual(validate("catalogEntry", record), { ok: true }, `${String(record.name)} should be a catalog entry`);
  }
});

test("missing class produces a required-property error", () => {
  const hero = cloneFixture(heroFixture);
  delete hero.class;

  const result = validate("sourceDocument", hero);
  assert.equal(result.ok, false);
  if (!result.ok) {
    const [error] = result.errors;
    assert.equal(formatErrorPath(error), "class");
    assert.equal(formatError(error), "class: must have required property 'class'");
  }
});

test("nested errors are reported with dotted paths", () => {
  const hero = cloneFixture(heroFixture);
  hero.class = { name: "Fury", featuresByLevel: [{ level: 0 }] };

  const result = validate("sourceDocument", hero);
  assert.equal(result.ok, false);
  if (!result.ok) {
    const messages = result.errors.map((error) => formatError(error));
    assert.deepEqual(messages, ["class.featuresByLevel.0.level: must be >= 1"]);
  }
});

test("target items must use the closed type vocabulary and carry a description", () => {
  const result = validate("targetItem", {
    name: "Odd Item",
    type: "spell",
    img: "icons/svg/mystery-man.svg",
    system: { description: { value: "" } },
  });

  assert.equal(result.ok, false);
  if (!result.ok) {
    const messages = result.errors.map((error) => formatError(error));
    assert.deepEqual(messages, [
      "type: must be equal to one of the allowed values",
      "system.description.value: must NOT have fewer than 1 characters",
    ]);
  }
});

test("ensureValidSource returns the record unchanged when it is valid", () => {
  const hero = cloneFixture(heroFixture);
  assert.equal(ensureValidSource(hero), hero);
});

test("ensureValidSource throws a DocumentStructureError with diagnostics", () => {
  assert.throws(
    () => ensureValidSource({ class: { name: "Fury", featuresByLevel: [] } }),
    (error: unknown) => {
      assert.ok(error instanceof DocumentStructureError);
      assert.equal(error.message, "Hero document failed validation: name: must have required property 'name'");
      assert.equal(error.diagnostics.key, "sourceDocument");
      assert.deepEqual(error.diagnostics.messages, ["name: must have required property 'name'"]);
      return true;
    },
  );
});

test("ensureValid rejects non-object payloads", () => {
  assert.throws(() => ensureValid("catalogEntry", "not a record", "Catalog record"), {
    name: "DocumentStructureError",
    message: "Catalog record failed validation: (root): must be object",
  });
});
