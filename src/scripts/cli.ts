import { readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { buildCatalog, type Catalog } from "./catalog/catalog";
import { loadCatalogDirectory, parsePackFile } from "./catalog/loader";
import { convertCharacter } from "./mappers/actor";
import { DocumentStructureError } from "./validation/ensure-valid";
import { LogLevel, logError, logInfo, setLogLevel } from "./utils";

export interface CliOptions {
  input: string;
  output: string;
  catalog: string;
  report: string | null;
  strict: boolean;
  verbose: boolean;
  level: number | null;
}

const USAGE = "Usage: convert <input.json> <output.json> --catalog <dir|file> [--report <file>] [--level <n>] [--strict] [--verbose]";

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      catalog: { type: "string", short: "c" },
      report: { type: "string", short: "r" },
      level: { type: "string", short: "l" },
      strict: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
    },
  });

  const [input, output] = positionals;
  if (!input || !output || !values.catalog) {
    throw new Error(USAGE);
  }

  let level: number | null = null;
  if (values.level !== undefined) {
    level = Number(values.level);
    if (!Number.isInteger(level)) {
      throw new Error(`--level expects an integer, received "${values.level}"`);
    }
  }

  return {
    input,
    output,
    catalog: values.catalog,
    report: values.report ?? null,
    strict: values.strict ?? false,
    verbose: values.verbose ?? false,
    level,
  };
}

async function loadCatalog(location: string): Promise<Catalog> {
  const info = await stat(location);
  if (info.isDirectory()) {
    const { catalog, failures } = await loadCatalogDirectory(location);
    if (failures.length) {
      logInfo(`${failures.length} catalog file(s) could not be read`);
    }
    return catalog;
  }
  return buildCatalog(parsePackFile(location, await readFile(location, "utf8")));
}

export async function runCli(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.verbose) {
    setLogLevel(LogLevel.Debug);
  }

  const catalog = await loadCatalog(options.catalog);
  const raw: unknown = JSON.parse(await readFile(options.input, "utf8"));

  try {
    const { actor, report } = convertCharacter(raw, catalog, { strict: options.strict, level: options.level });
    await writeFile(options.output, `${JSON.stringify(actor, null, 2)}\n`, "utf8");
    if (options.report) {
      await writeFile(options.report, `${JSON.stringify(report, null, 2)}\n`, "utf8");
    }
    logInfo(`Wrote ${path.resolve(options.output)}`);
    return 0;
  } catch (error) {
    if (error instanceof DocumentStructureError) {
      logError(error.message);
      return 1;
    }
    throw error;
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logError(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
