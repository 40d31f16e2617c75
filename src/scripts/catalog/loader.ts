import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { buildCatalog, type Catalog } from "./catalog";
import { logDebug, logInfo, logWarn } from "../utils";

const PACK_EXTENSIONS = new Set([".json", ".yml", ".yaml"]);

export interface CatalogLoadResult {
  catalog: Catalog;
  filesRead: number;
  failures: string[];
}

async function listPackFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listPackFiles(fullPath)));
    } else if (entry.isFile() && PACK_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
      files.push(fullPath);
    }
  }
  return files;
}

export function parsePackFile(fileName: string, contents: string): unknown[] {
  const extension = path.extname(fileName).toLowerCase();
  const parsed: unknown = extension === ".json" ? JSON.parse(contents) : yaml.load(contents);
  if (parsed === undefined || parsed === null) {
    return [];
  }
  return Array.isArray(parsed) ? parsed : [parsed];
}

/**
 * Reads every pack file below `directory` (sorted, recursive) and builds the catalog.
 * Unreadable files are logged and listed in `failures`; they never abort the load.
 */
export async function loadCatalogDirectory(directory: string): Promise<CatalogLoadResult> {
  const files = await listPackFiles(directory);
  const records: unknown[] = [];
  const failures: string[] = [];

  for (const file of files) {
    try {
      const contents = await readFile(file, "utf8");
      records.push(...parsePackFile(file, contents));
      logDebug(`Read catalog file ${file}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logWarn(`Could not read catalog file ${file}: ${message}`);
      failures.push(`${file}: ${message}`);
    }
  }

  const catalog = buildCatalog(records);
  logInfo(`Loaded ${catalog.size} catalog entries from ${files.length} file(s) in ${directory}`);
  return { catalog, filesRead: files.length - failures.length, failures };
}
