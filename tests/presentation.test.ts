import { describe, test, expect } from "vitest";
import {
  groupKey,
  groupProfiles,
  hiddenHint,
  isHidden,
  matchesFilter,
  shortName,
  statusFilter,
  type ProfileSummary,
} from "../src/presentation.js";

function entry(name: string, builtIn = false): ProfileSummary {
  return { name, description: "", builtIn, customized: false };
}

describe("naming helpers", () => {
  test("hidden when any segment starts with an underscore", () => {
    expect(isHidden("_scratch")).toBe(true);
    expect(isHidden("team/_draft")).toBe(true);
    expect(isHidden("_archive/old")).toBe(true);
    expect(isHidden("team/back_end")).toBe(false);
  });

  test("group key is everything before the last slash", () => {
    expect(groupKey("a/b/c")).toBe("a/b");
    expect(groupKey("plain")).toBeUndefined();
    expect(shortName("a/b/c")).toBe("c");
    expect(shortName("plain")).toBe("plain");
  });
});

describe("groupProfiles", () => {
  test("sorts entries and groups", () => {
    const grouped = groupProfiles(
      [entry("zeta"), entry("team/web"), entry("alpha"), entry("lang/rust"), entry("team/api")],
      { showAll: false },
    );
    expect(grouped.user.ungrouped.map((e) => e.name)).toEqual(["alpha", "zeta"]);
    expect(grouped.user.groups.map((g) => [g.name, g.entries.map((e) => e.shortName)])).toEqual([
      ["lang", ["rust"]],
      ["team", ["api", "web"]],
    ]);
  });

  test("hidden user profiles are counted unless showAll", () => {
    const entries = [entry("_a"), entry("team/_b"), entry("visible")];
    expect(groupProfiles(entries, { showAll: false }).hiddenCount).toBe(2);
    const all = groupProfiles(entries, { showAll: true });
    expect(all.hiddenCount).toBe(0);
    expect(all.user.ungrouped.map((e) => e.name)).toEqual(["_a", "visible"]);
  });

  test("hidden built-ins are counted and shown with showAll", () => {
    const entries = [entry("_internal", true), entry("default", true)];
    const hidden = groupProfiles(entries, { showAll: false });
    expect(hidden.hiddenCount).toBe(1);
    expect(hidden.builtIn.ungrouped.map((e) => e.name)).toEqual(["default"]);

    const all = groupProfiles(entries, { showAll: true });
    expect(all.hiddenCount).toBe(0);
    expect(all.builtIn.ungrouped.map((e) => e.name)).toEqual(["_internal", "default"]);
  });
});

describe("hiddenHint", () => {
  test("pluralizes", () => {
    expect(hiddenHint(0)).toBeUndefined();
    expect(hiddenHint(1)).toBe("(1 hidden profile not shown, use --all to include them)");
    expect(hiddenHint(2)).toBe("(2 hidden profiles not shown, use --all to include them)");
  });
});

describe("statusFilter", () => {
  test("picks one filter", () => {
    expect(statusFilter({})).toBe("all");
    expect(statusFilter({ enabled: true })).toBe("enabled");
    expect(statusFilter({ disabled: true })).toBe("disabled");
  });

  test("both flags are rejected", () => {
    expect(() => statusFilter({ enabled: true, disabled: true })).toThrow("--enabled and --disabled are mutually exclusive");
  });

  test("matchesFilter", () => {
    expect(matchesFilter("all", false)).toBe(true);
    expect(matchesFilter("enabled", true)).toBe(true);
    expect(matchesFilter("enabled", false)).toBe(false);
    expect(matchesFilter("disabled", false)).toBe(true);
  });
});
