import { isLosslessNumber } from "lossless-json";

export type JsonRecord = Record<string, unknown>;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(node: JsonRecord, key: string): string | undefined {
  const value = node[key];
  return typeof value === "string" ? value : undefined;
}

/** Swap lossless numbers for plain ones, the way `JSON.parse` would read them. */
export function toPlainJson(raw: unknown): unknown {
  if (isLosslessNumber(raw)) {
    return Number.parseFloat(raw.value);
  }
  if (Array.isArray(raw)) {
    return raw.map(toPlainJson);
  }
  if (isJsonRecord(raw)) {
    return Object.fromEntries(Object.entries(raw).map(([key, value]) => [key, toPlainJson(value)]));
  }
  return raw;
}
