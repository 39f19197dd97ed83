import { parsePreferences, PreferenceSet, splitLines } from "./preferences.js";

/** Length of the upstream comment banner kept verbatim at the top of a merged file. */
export const HEADER_BLOCK_LINES = 76;

export type BuildMode = "merge" | "append";

export type MergeOptions = {
  headerLines?: number;
};

// =============================================================================
// MERGE MODE
// =============================================================================

/**
 * Combines the upstream script with the user's overrides. The banner is copied
 * as-is; after it only `user_pref` declarations survive, base order first, with
 * override values replacing base values for the same key.
 */
export function mergePreferences(
  baseText: string,
  overrideText: string,
  options: MergeOptions = {},
): string {
  const headerLines = options.headerLines ?? HEADER_BLOCK_LINES;
  const header = splitLines(baseText).slice(0, headerLines).join("\n");

  const prefs = new PreferenceSet();
  prefs.addAll(parsePreferences(baseText, "base"));
  prefs.addAll(parsePreferences(overrideText, "overrides"));

  return `${header}\n\n${prefs.serialize().join("\n")}`;
}

// =============================================================================
// APPEND MODE
// =============================================================================

export function appendOverrides(candidateText: string, overrideText: string): string {
  const candidate = candidateText.endsWith("\n") ? candidateText : `${candidateText}\n`;
  return `${candidate}\n${overrideText}`;
}

export function buildCandidate(
  mode: BuildMode,
  candidateText: string,
  overrideText: string,
  options: MergeOptions = {},
): string {
  return mode === "merge"
    ? mergePreferences(candidateText, overrideText, options)
    : appendOverrides(candidateText, overrideText);
}
