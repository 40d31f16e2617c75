import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { buildCatalog, type Catalog } from "../../src/scripts/catalog/catalog";
import type { JsonRecord } from "../../src/scripts/helpers/records";
import { LogLevel, setLogLevel } from "../../src/scripts/utils";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const FIXTURE_ROOT = path.resolve(__dirname, "../fixtures");

// Warnings from deliberately broken inputs would otherwise flood the test output.
setLogLevel(LogLevel.Silent);

export function loadFixture<T>(name: string): T {
  const filePath = path.join(FIXTURE_ROOT, name);
  const raw = fs.readFileSync(filePath, "utf8");
  return JSON.parse(raw) as T;
}

export function cloneFixture<T>(value: T): T {
  return JSON.parse(JSON.stringify(value)) as T;
}

export function loadCatalogRecords(): JsonRecord[] {
  return loadFixture<JsonRecord[]>("catalog.json");
}

export function loadCatalogFixture(): Catalog {
  return buildCatalog(loadCatalogRecords());
}

export function loadHeroFixture(): JsonRecord {
  return loadFixture<JsonRecord>("hero.json");
}
