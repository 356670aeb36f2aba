export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readRecord(record: JsonRecord | null, key: string): JsonRecord | null {
  const value = record?.[key];
  return isRecord(value) ? value : null;
}

export function readArray(record: JsonRecord | null, key: string): unknown[] {
  const value = record?.[key];
  return Array.isArray(value) ? value : [];
}

export function readString(record: JsonRecord | null, key: string): string | null {
  const value = record?.[key];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function readNumber(record: JsonRecord | null, key: string): number | null {
  const value = record?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function readInt(record: JsonRecord | null, key: string): number | null {
  const value = readNumber(record, key);
  return value !== null && Number.isInteger(value) ? value : null;
}

export function readNames(record: JsonRecord | null, key: string): string[] {
  const names: string[] = [];
  for (const item of readArray(record, key)) {
    const name = typeof item === "string" ? item.trim() : readString(isRecord(item) ? item : null, "name");
    if (name) names.push(name);
  }
  return names;
}
