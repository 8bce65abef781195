import { Command } from "commander";
import type { DisplayEntry, ProfileSection } from "../presentation.js";
import { hiddenHint } from "../presentation.js";
import { SCOPES } from "../profiles.js";
import { resolveActive } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { info, warn, heading, blank, muted, columns, cmd } from "../ui.js";

function nameWidth(sections: ProfileSection[]): number {
  let width = 20;
  for (const section of sections) {
    for (const entry of section.ungrouped) width = Math.max(width, entry.shortName.length);
    for (const group of section.groups) {
      for (const entry of group.entries) width = Math.max(width, entry.shortName.length);
    }
  }
  return width;
}

function printSection(section: ProfileSection, width: number, label: (entry: DisplayEntry) => string): void {
  for (const entry of section.ungrouped) {
    info(columns(entry.shortName, label(entry), width));
  }
  section.groups.forEach((group, i) => {
    if (section.ungrouped.length > 0 || i > 0) blank();
    info(`${group.name}/`);
    for (const entry of group.entries) {
      info(`  ${columns(entry.shortName, label(entry), width)}`);
    }
  });
}

export function profileListCommand(rt: Runtime): Command {
  return new Command("list")
    .description("List built-in and user profiles")
    .option("-a, --all", "Include hidden profiles (any path segment starting with _)")
    .action((opts: { all?: boolean }) => {
      const { repo, store } = rt.context();
      const result = repo.list(opts.all === true);
      for (const w of result.warnings) warn(w);

      const active = resolveActive(store, rt.workingDir());
      const label = (entry: DisplayEntry): string => {
        let text = entry.description;
        if (entry.customized) text += ` ${muted("(customized)")}`;
        const scopes = SCOPES.filter((s) => active[s] === entry.name);
        if (scopes.length > 0) text += ` ${muted(`(active: ${scopes.join(", ")})`)}`;
        return text;
      };

      const hasBuiltIn = result.builtIn.ungrouped.length > 0 || result.builtIn.groups.length > 0;
      const hasUser = result.user.ungrouped.length > 0 || result.user.groups.length > 0;
      const hint = hiddenHint(result.hiddenCount);

      if (!hasBuiltIn && !hasUser && !hint) {
        info("No profiles found.");
        info(`Create one with: ${cmd("loadout profile save <name>")}`);
        return;
      }

      const width = nameWidth([result.builtIn, result.user]);
      if (hasBuiltIn) {
        heading("Built-in profiles");
        blank();
        printSection(result.builtIn, width, label);
      }
      if (hasUser) {
        heading("Your profiles");
        blank();
        printSection(result.user, width, label);
      }
      if (hint) {
        blank();
        info(muted(hint));
      }
      blank();
    });
}
