import type { ScanEvent } from "./job.js";
import { parseTimestamp } from "./dates.js";
import { isBlank, toText } from "./values.js";

export type ScanSummary = {
  events: ScanEvent[];
  count: number;
  lastUser: string;
  lastTime: string | null;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Returns the top-level keys of a JSON object in the order they appear in the
 * text. `JSON.parse` moves integer-like keys (box serials) to the front in
 * ascending order, which loses the export's ordering.
 */
export function topLevelKeyOrder(text: string): string[] {
  const keys: string[] = [];
  const seen = new Set<string>();
  let depth = 0;
  let inString = false;
  let escaped = false;
  let start = -1;
  let candidate: string | null = null;

  for (let index = 0; index < text.length; index++) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
        candidate = depth === 1 ? text.slice(start, index + 1) : null;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      start = index;
      continue;
    }

    if (char === ":" && depth === 1 && candidate !== null) {
      const key: unknown = JSON.parse(candidate);
      if (typeof key === "string" && !seen.has(key)) {
        seen.add(key);
        keys.push(key);
      }
    } else if (char === "{" || char === "[") {
      depth++;
    } else if (char === "}" || char === "]") {
      depth--;
    }

    if (!/\s/.test(char)) {
      candidate = null;
    }
  }

  return keys;
}

function toScanEvent(serial: string, details: Record<string, unknown>): ScanEvent {
  const manual = details.manual;
  return {
    serial_number: serial,
    username: toText(details.username, "Unknown"),
    timestamp: toText(details.timestamp),
    manual: manual === 1 || manual === "1" || manual === true,
    latitude: toText(details.latitude),
    longitude: toText(details.longitude)
  };
}

/**
 * Decodes an embedded scan log (`{ "<serial>": { username, timestamp, ... } }`).
 * Malformed input yields no events.
 */
export function parseScanLog(raw: unknown): ScanEvent[] {
  if (isBlank(raw)) return [];

  let parsed: unknown;
  let text: string;
  if (typeof raw === "string") {
    text = raw;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      console.warn(`[normalizer] Unable to parse scan log: ${raw.slice(0, 50)}...`, error);
      return [];
    }
  } else if (isPlainObject(raw)) {
    text = JSON.stringify(raw);
    parsed = raw;
  } else {
    return [];
  }

  if (!isPlainObject(parsed)) {
    return [];
  }

  const ordered = topLevelKeyOrder(text);
  const keys = ordered.length === Object.keys(parsed).length ? ordered : Object.keys(parsed);

  const events: ScanEvent[] = [];
  for (const serial of keys) {
    const details = parsed[serial];
    if (isPlainObject(details)) {
      events.push(toScanEvent(serial, details));
    }
  }
  return events;
}

/** Scan count plus the user and time of the final entry in encounter order. */
export function summarizeScans(events: ScanEvent[]): ScanSummary {
  const last = events.at(-1);
  if (!last) return { events: [], count: 0, lastUser: "", lastTime: null };
  return {
    events,
    count: events.length,
    lastUser: last.username,
    lastTime: parseTimestamp(last.timestamp)
  };
}
