import { Command } from "commander";
import { NotFoundError } from "../errors.js";
import { parseCategory } from "../extensions.js";
import { matchesFilter, statusFilter } from "../presentation.js";
import { EXTENSION_CATEGORIES } from "../profiles.js";
import type { Runtime } from "../runtime.js";
import { info, warn, success, heading, blank, muted, styled } from "../ui.js";

function listCommand(rt: Runtime): Command {
  return new Command("list")
    .description("List extensions in the library")
    .argument("[category]", `One of ${EXTENSION_CATEGORIES.join(", ")}`)
    .option("--enabled", "Only show enabled items")
    .option("--disabled", "Only show disabled items")
    .action((category: string | undefined, opts: { enabled?: boolean; disabled?: boolean }) => {
      const filter = statusFilter(opts);
      const categories = category === undefined ? EXTENSION_CATEGORIES : [parseCategory(category)];
      const { library, registry } = rt.context();

      let shown = 0;
      for (const c of categories) {
        const items = library.items(c).filter((item) => matchesFilter(filter, item.enabled));
        if (items.length === 0) continue;
        const counts = registry.counts(c, library.listItems(c));
        heading(`${c} ${muted(`(${counts.enabled}/${counts.total} enabled)`)}`);
        for (const item of items) {
          const mark = item.enabled ? styled("✓", { color: "green" }) : muted("·");
          info(`  ${mark} ${item.name}`);
          shown++;
        }
      }

      if (shown === 0) info(filter === "all" ? "No extensions in the library." : "No matching extensions.");
      blank();
    });
}

function toggleCommand(rt: Runtime, name: "enable" | "disable"): Command {
  return new Command(name)
    .description(`${name === "enable" ? "Enable" : "Disable"} extensions by name or wildcard`)
    .argument("<category>", `One of ${EXTENSION_CATEGORIES.join(", ")}`)
    .argument("<patterns...>", "Item names or wildcards: *, group/*, prefix*")
    .action((category: string, patterns: string[]) => {
      const c = parseCategory(category);
      const { library } = rt.context();
      const result = name === "enable" ? library.enable(c, patterns) : library.disable(c, patterns);
      if (result.changed.length === 0) {
        throw new NotFoundError(c, result.notFound.join(", "), `Run 'loadout extensions list ${c}' to see what is available`);
      }
      for (const item of result.changed) success(`${name === "enable" ? "Enabled" : "Disabled"} ${c}/${item}`);
      for (const pattern of result.notFound) warn(`No ${c} matched ${pattern}`);
    });
}

export function extensionsCommand(rt: Runtime): Command {
  return new Command("extensions")
    .description("Manage file-based extensions (agents, commands, skills, hooks, rules, output styles)")
    .addCommand(listCommand(rt))
    .addCommand(toggleCommand(rt, "enable"))
    .addCommand(toggleCommand(rt, "disable"));
}
