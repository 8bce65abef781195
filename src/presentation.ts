import { MutuallyExclusiveFlagsError } from "./errors.js";

export interface ProfileSummary {
  name: string;
  description: string;
  builtIn: boolean;
  customized: boolean;
}

export interface DisplayEntry extends ProfileSummary {
  /** Last path segment, shown under its group header. */
  shortName: string;
}

export interface ProfileGroup {
  name: string;
  entries: DisplayEntry[];
}

export interface ProfileSection {
  ungrouped: DisplayEntry[];
  groups: ProfileGroup[];
}

export interface GroupedProfiles {
  builtIn: ProfileSection;
  user: ProfileSection;
  /** Entries left out because they are hidden and showAll was off. */
  hiddenCount: number;
}

export function isHidden(name: string): boolean {
  return name.split("/").some((segment) => segment.startsWith("_"));
}

export function groupKey(name: string): string | undefined {
  const idx = name.lastIndexOf("/");
  return idx >= 0 ? name.slice(0, idx) : undefined;
}

export function shortName(name: string): string {
  return name.slice(name.lastIndexOf("/") + 1);
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function section(entries: ProfileSummary[]): ProfileSection {
  const ungrouped: DisplayEntry[] = [];
  const groups = new Map<string, DisplayEntry[]>();

  for (const entry of [...entries].sort(byName)) {
    const display = { ...entry, shortName: shortName(entry.name) };
    const key = groupKey(entry.name);
    if (key === undefined) {
      ungrouped.push(display);
      continue;
    }
    const members = groups.get(key) ?? [];
    members.push(display);
    groups.set(key, members);
  }

  return {
    ungrouped,
    groups: [...groups.entries()].map(([name, members]) => ({ name, entries: members })).sort(byName),
  };
}

/**
 * Splits summaries into the built-in and user sections. Profiles with a
 * `_` segment, built-in or not, are dropped and counted unless `showAll`
 * is set.
 */
export function groupProfiles(entries: ProfileSummary[], opts: { showAll: boolean }): GroupedProfiles {
  const builtIn: ProfileSummary[] = [];
  const user: ProfileSummary[] = [];
  let hiddenCount = 0;

  for (const entry of entries) {
    if (!opts.showAll && isHidden(entry.name)) {
      hiddenCount++;
    } else if (entry.builtIn) {
      builtIn.push(entry);
    } else {
      user.push(entry);
    }
  }

  return { builtIn: section(builtIn), user: section(user), hiddenCount };
}

export function hiddenHint(count: number): string | undefined {
  if (count === 0) return undefined;
  return `(${count} hidden profile${count === 1 ? "" : "s"} not shown, use --all to include them)`;
}

export type StatusFilter = "all" | "enabled" | "disabled";

/** Checked before any listing work is done. */
export function statusFilter(opts: { enabled?: boolean; disabled?: boolean }): StatusFilter {
  if (opts.enabled && opts.disabled) {
    throw new MutuallyExclusiveFlagsError("--enabled", "--disabled");
  }
  if (opts.enabled) return "enabled";
  if (opts.disabled) return "disabled";
  return "all";
}

export function matchesFilter(filter: StatusFilter, enabled: boolean): boolean {
  return filter === "all" || (filter === "enabled") === enabled;
}
