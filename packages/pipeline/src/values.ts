import { formatTimestamp } from "./dates.js";

const BLANK_TOKENS = new Set(["", "nan", "nat", "none", "null", "undefined"]);

export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "number") return Number.isNaN(value);
  if (typeof value === "string") return BLANK_TOKENS.has(value.trim().toLowerCase());
  return false;
}

/** Flattens a raw cell into trimmed text; blanks become "". */
export function toText(value: unknown, fallback = ""): string {
  if (isBlank(value)) return fallback;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? fallback : formatTimestamp(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : fallback;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return String(value).trim();
  }
  return fallback;
}

function toFiniteNumber(value: unknown): number | null {
  if (isBlank(value)) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value !== "string") return null;
  const parsed = Number(value.trim().replace(/,/g, ""));
  return Number.isFinite(parsed) ? parsed : null;
}

export function toInteger(value: unknown, fallback: number): number {
  const parsed = toFiniteNumber(value);
  return parsed === null ? fallback : Math.trunc(parsed);
}

export function toNumber(value: unknown, fallback: number): number {
  return toFiniteNumber(value) ?? fallback;
}

/** Reference ids exported as floats ("4521.0") keep only their integral part. */
export function toIdentifier(value: unknown): string {
  if (typeof value === "number" && Number.isInteger(value)) {
    return String(value);
  }
  return toText(value).replace(/^(-?\d+)\.0+$/, "$1");
}

const TRUTHY_FLAGS = new Set(["1", "yes", "true", "y"]);

export function toFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  return TRUTHY_FLAGS.has(toText(value).toLowerCase());
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((total, value) => total + value, 0) / values.length;
}
