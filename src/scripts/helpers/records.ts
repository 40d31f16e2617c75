export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function clone<T>(value: T): T {
  if (typeof structuredClone === "function") {
    return structuredClone(value);
  }

  return JSON.parse(JSON.stringify(value)) as T;
}

export function readRecord(source: JsonRecord, key: string): JsonRecord | null {
  const value = source[key];
  return isRecord(value) ? value : null;
}

export function readArray(source: JsonRecord, key: string): unknown[] {
  const value = source[key];
  return Array.isArray(value) ? value : [];
}

export function readString(source: JsonRecord, key: string): string | null {
  const value = source[key];
  return typeof value === "string" ? value : null;
}

export function readTrimmedString(source: JsonRecord, key: string): string | null {
  const value = readString(source, key)?.trim();
  return value ? value : null;
}

export function readNumber(source: JsonRecord, key: string): number | null {
  const value = source[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readStringArray(source: JsonRecord, key: string): string[] {
  return readArray(source, key)
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Reads a dotted path such as `system.description.value`. */
export function readPath(source: JsonRecord, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function readPathString(source: JsonRecord, path: string): string | null {
  const value = readPath(source, path);
  return typeof value === "string" ? value : null;
}
