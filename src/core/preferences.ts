import { HeaderParseError } from "./errors.js";

// =============================================================================
// TYPES & CONSTANTS
// =============================================================================

export const PREF_PREFIX = "user_pref(";

export type PreferenceEntry = {
  key: string;
  value: string;
};

export type PreferenceSource = "base" | "overrides";

export type ExtractResult =
  | { ok: true; entry: PreferenceEntry }
  | { ok: false; reason: string };

// =============================================================================
// PREFERENCE SET
// =============================================================================

/**
 * Ordered key/value store for preference declarations. Re-setting a key keeps
 * the position of its first appearance, so serialization order depends only on
 * the order documents were applied.
 */
export class PreferenceSet {
  private readonly entries = new Map<string, string>();

  set(key: string, value: string): void {
    this.entries.set(key, value);
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  addAll(entries: Iterable<PreferenceEntry>): void {
    for (const entry of entries) {
      this.set(entry.key, entry.value);
    }
  }

  toEntries(): PreferenceEntry[] {
    return Array.from(this.entries, ([key, value]) => ({ key, value }));
  }

  serialize(): string[] {
    return this.toEntries().map(formatPreference);
  }
}

export function formatPreference(entry: PreferenceEntry): string {
  return `user_pref("${entry.key}", ${entry.value});`;
}

// =============================================================================
// PARSING
// =============================================================================

export function isPreferenceLine(line: string): boolean {
  return line.startsWith(PREF_PREFIX);
}

/**
 * Splits `user_pref("key", value);` into its key and raw value text.
 * Parentheses and commas inside string literals do not end the key or value.
 */
export function extractPreference(line: string): ExtractResult {
  if (!isPreferenceLine(line)) {
    return { ok: false, reason: `expected line to start with ${PREF_PREFIX}` };
  }

  const body = line.slice(PREF_PREFIX.length);
  const close = findUnquoted(body, ")", 0);
  if (close === -1) {
    return { ok: false, reason: "missing closing parenthesis" };
  }

  const args = body.slice(0, close);
  const comma = findUnquoted(args, ",", 0);
  if (comma === -1) {
    return { ok: false, reason: "missing comma between key and value" };
  }

  const key = stripQuotes(args.slice(0, comma).trim()).trim();
  const value = args.slice(comma + 1).trim();
  return { ok: true, entry: { key, value } };
}

/**
 * Collects every declaration in a document, in order. A malformed declaration
 * fails the whole document so a partial merge is never produced.
 */
export function parsePreferences(text: string, source: PreferenceSource): PreferenceEntry[] {
  const entries: PreferenceEntry[] = [];

  splitLines(text).forEach((line, index) => {
    if (!isPreferenceLine(line)) return;

    const result = extractPreference(line);
    if (!result.ok) {
      throw new HeaderParseError(
        `Malformed preference on ${source} line ${index + 1} (${result.reason}): ${line}`,
      );
    }
    entries.push(result.entry);
  });

  return entries;
}

export function splitLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

// =============================================================================
// INTERNALS
// =============================================================================

function findUnquoted(text: string, target: string, from: number): number {
  let quote: string | null = null;

  for (let i = from; i < text.length; i += 1) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") {
        i += 1;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === target) {
      return i;
    }
  }

  return -1;
}

function stripQuotes(value: string): string {
  return value.replace(/^["']+/, "").replace(/["']+$/, "");
}
