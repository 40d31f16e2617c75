import assert from "node:assert/strict";
import { test } from "node:test";

import {
  normalize,
  sanitizeForLookup,
  summarizeTextChanges,
  validateRoundTrip,
} from "../src/scripts/text/normalizer";

test("normalize replaces typographic dashes and ellipses", () => {
  assert.equal(normalize("Em—dash…text"), "Em-dash...text");
  assert.equal(normalize("en–dash"), "en-dash");
});

test("normalize straightens curly quotes", () => {
  assert.equal(normalize("\u201CStrike Now!\u201D"), '"Strike Now!"');
  assert.equal(normalize("the hero\u2019s blade"), "the hero's blade");
});

test("normalize drops replacement characters, stray combining marks and control characters", () => {
  assert.equal(normalize("Bro\uFFFDken"), "Broken");
  assert.equal(normalize("Gla\u0300ive"), "Glaive");
  assert.equal(normalize("Zero\u200Bwidth\u0007bell"), "Zerowidthbell");
});

test("normalize keeps newlines and tabs but trims the outer whitespace", () => {
  assert.equal(normalize("  line one\n\tline two  "), "line one\n\tline two");
});

test("normalize drops lone surrogates", () => {
  assert.equal(normalize("half\uD83D pair"), "half pair");
});

test("normalize leaves empty input untouched", () => {
  assert.equal(normalize(""), "");
});

test("normalize is a fixed point on its own output", () => {
  const samples = [
    "Em—dash…text",
    "  \u201CQuoted\u201D\u00A0name ",
    "Trigger: an enemy moves.\nEffect: you strike.",
    "Plain text",
  ];
  for (const sample of samples) {
    const once = normalize(sample);
    assert.equal(normalize(once), once, `normalize is not idempotent for ${JSON.stringify(sample)}`);
  }
});

test("sanitizeForLookup removes punctuation, collapses whitespace and lower-cases", () => {
  assert.equal(sanitizeForLookup("Strike  Now!"), "strike now");
  assert.equal(sanitizeForLookup("\u201CClarity\u201D (and Strain)"), "clarity and strain");
});

test("sanitizeForLookup rewrites British spellings", () => {
  assert.equal(sanitizeForLookup("Travelling Armour"), "traveling armor");
  assert.equal(sanitizeForLookup("Colour of Honour", { colour: "color" }), "color of honour");
});

test("validateRoundTrip accepts normal text and rejects lone surrogates", () => {
  assert.equal(validateRoundTrip("<p>Plain été text</p>"), true);
  assert.equal(validateRoundTrip("broken \uD800 text"), false);
});

test("summarizeTextChanges reports removed characters and lengths", () => {
  const original = "Em—dash";
  const summary = summarizeTextChanges(original, normalize(original));

  assert.deepEqual(summary, {
    originalLength: 7,
    normalizedLength: 7,
    lengthDifference: 0,
    charactersRemoved: ["—"],
    hasNonAscii: true,
    roundTripSafe: true,
  });
});
