import { Command } from "commander";
import type { PointerChanges } from "../repository.js";
import type { Runtime } from "../runtime.js";
import { info, success } from "../ui.js";

function reportPointers(changes: PointerChanges, verb: string): void {
  for (const scope of changes.scopes) {
    if (scope === "project" && changes.projectFile) info(`${verb} project pointer (${changes.projectFile})`);
    else if (scope === "local") info(`${verb} local pointer for ${changes.localPaths.join(", ")}`);
    else info(`${verb} ${scope} pointer`);
  }
}

export function profileDeleteCommand(rt: Runtime): Command {
  return new Command("delete")
    .description("Delete a user profile")
    .argument("<name>", "Profile name")
    .option("-y, --yes", "Skip confirmation prompt")
    .action(async (name: string, opts: { yes?: boolean }) => {
      const { repo } = rt.context();
      if (!opts.yes && !repo.isBuiltIn(name) && repo.exists(name) && !(await rt.confirm(`Delete profile ${name}?`))) {
        info("Skipped.");
        return;
      }
      const changes = repo.delete(name, { workingDir: rt.workingDir() });
      success(`Deleted ${name}`);
      reportPointers(changes, "Cleared");
    });
}

export function profileRestoreCommand(rt: Runtime): Command {
  return new Command("restore")
    .description("Remove your customizations of a built-in profile")
    .argument("<name>", "Built-in profile name")
    .option("-y, --yes", "Skip confirmation prompt")
    .action(async (name: string, opts: { yes?: boolean }) => {
      const { repo } = rt.context();
      if (!opts.yes && repo.isCustomized(name) && !(await rt.confirm(`Discard your changes to ${name}?`))) {
        info("Skipped.");
        return;
      }
      repo.restore(name);
      success(`Restored built-in profile ${name}`);
    });
}

export function profileRenameCommand(rt: Runtime): Command {
  return new Command("rename")
    .description("Rename a user profile, moving any pointers to it")
    .argument("<old>", "Current name")
    .argument("<new>", "New name")
    .action((from: string, to: string) => {
      const { repo } = rt.context();
      const changes = repo.rename(from, to, { workingDir: rt.workingDir() });
      success(`Renamed ${from} to ${to}`);
      reportPointers(changes, "Moved");
    });
}
