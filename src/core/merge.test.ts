import { describe, expect, it } from "vitest";

import { HeaderParseError } from "./errors.js";
import { appendOverrides, buildCandidate, HEADER_BLOCK_LINES, mergePreferences } from "./merge.js";

function banner(lineCount: number): string[] {
  return Array.from({ length: lineCount }, (_, index) => `* banner line ${index + 1}`);
}

describe("mergePreferences", () => {
  it("keeps the first 76 lines verbatim and re-serializes declarations after them", () => {
    const header = banner(HEADER_BLOCK_LINES);
    const base = [
      ...header,
      "/* section */",
      'user_pref("a.b", true);',
      "// comment between prefs",
      'user_pref("c.d", 1);',
      "",
    ].join("\n");

    const merged = mergePreferences(base, "");

    expect(merged.startsWith(header.join("\n"))).toBe(true);
    expect(merged).toBe(
      `${header.join("\n")}\n\nuser_pref("a.b", true);\nuser_pref("c.d", 1);`,
    );
  });

  it("lets overrides win, keeps base-only keys and appends override-only keys", () => {
    const base = ["/* header */", 'user_pref("a.b", true);', 'user_pref("c.d", 1);'].join("\n");
    const overrides = ['user_pref("c.d", 2);', "// mine", 'user_pref("e.f", "x");'].join("\n");

    const merged = mergePreferences(base, overrides, { headerLines: 1 });

    expect(merged).toBe(
      [
        "/* header */",
        "",
        'user_pref("a.b", true);',
        'user_pref("c.d", 2);',
        'user_pref("e.f", "x");',
      ].join("\n"),
    );
  });

  it("uses the last override when a key repeats within the overrides", () => {
    const base = ["/* header */", 'user_pref("a.b", 1);'].join("\n");
    const overrides = ['user_pref("a.b", 2);', 'user_pref("a.b", 3);'].join("\n");

    expect(mergePreferences(base, overrides, { headerLines: 1 })).toBe(
      '/* header */\n\nuser_pref("a.b", 3);',
    );
  });

  it("is stable when merged with an empty overrides document", () => {
    const base = ["/* header */", 'user_pref("a.b",true);', 'user_pref( "c.d" , "v, w" );'].join(
      "\n",
    );

    const once = mergePreferences(base, "", { headerLines: 1 });
    expect(once).toBe('/* header */\n\nuser_pref("a.b", true);\nuser_pref("c.d", "v, w");');
    expect(mergePreferences(once, "", { headerLines: 1 })).toBe(once);
  });

  it("emits the header and an empty section when there are no declarations", () => {
    expect(mergePreferences("/* a */\n/* b */\n", "", { headerLines: 2 })).toBe("/* a */\n/* b */\n\n");
  });

  it("fails on a malformed override declaration", () => {
    expect(() => mergePreferences("/* header */", 'user_pref("a.b" true);', { headerLines: 1 })).toThrow(
      HeaderParseError,
    );
  });
});

describe("appendOverrides", () => {
  it("separates the overrides from the candidate with a blank line", () => {
    expect(appendOverrides("upstream\n", "mine\n")).toBe("upstream\n\nmine\n");
    expect(appendOverrides("upstream", "mine")).toBe("upstream\n\nmine");
  });
});

describe("buildCandidate", () => {
  it("selects the builder for the mode", () => {
    const base = '/* header */\nuser_pref("a.b", 1);\n';
    const overrides = 'user_pref("a.b", 2);\n';

    expect(buildCandidate("append", base, overrides)).toBe(`${base}\n${overrides}`);
    expect(buildCandidate("merge", base, overrides, { headerLines: 1 })).toBe(
      '/* header */\n\nuser_pref("a.b", 2);',
    );
  });
});
