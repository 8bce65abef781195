import { Command } from "commander";
import { apply, describeAction, type ApplyResult } from "../apply.js";
import { ApplyFailedError } from "../errors.js";
import { parseScope } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { formatSource } from "./profile-show.js";
import { info, warn, error, success, heading, blank, muted } from "../ui.js";

interface ApplyFlags {
  scope?: string;
  dryRun?: boolean;
  install: boolean;
  yes?: boolean;
}

function printPlan(result: ApplyResult): void {
  for (const w of result.warnings) warn(w);
  if (!result.changed) return;
  for (const action of result.actions) info(`  + ${describeAction(action)}`);
}

function printSecrets(result: ApplyResult): void {
  if (result.secrets.length === 0) return;
  heading("Secrets required");
  for (const secret of result.secrets) {
    const sources = secret.sources.map(formatSource).join(", ");
    info(`  ${secret.name} for ${secret.server} ${muted(`(${sources || "no sources"})`)}`);
  }
}

export function profileApplyCommand(rt: Runtime): Command {
  return new Command("apply")
    .description("Apply a profile at a scope ('current' re-syncs the active one)")
    .argument("<name>", "Profile name")
    .option("-s, --scope <scope>", "user, project or local")
    .option("--dry-run", "Show the changes without making them")
    .option("--no-install", "Write settings without fetching marketplaces or plugins")
    .option("-y, --yes", "Skip confirmation prompt")
    .action(async (name: string, opts: ApplyFlags) => {
      const scope = opts.scope === undefined ? undefined : parseScope(opts.scope);
      const ctx = rt.context();
      const workingDir = rt.workingDir();
      const preview = apply(ctx, name, scope, { workingDir, dryRun: true, install: opts.install });

      heading(`Applying ${preview.profile} (${preview.scope} scope)`);
      blank();
      printPlan(preview);

      if (opts.dryRun) {
        if (!preview.changed) success("No changes needed");
        printSecrets(preview);
        blank();
        info("(dry-run) Nothing was changed.");
        blank();
        return;
      }

      if (preview.changed && !opts.yes) {
        blank();
        const confirmed = await rt.confirm(`Apply ${preview.actions.length} change(s)?`);
        if (!confirmed) {
          info("Skipped.");
          return;
        }
      }

      const result = apply(ctx, name, scope, { workingDir, install: opts.install });
      if (!result.changed) success("No changes needed");
      for (const e of result.errors) error(e);
      printSecrets(result);
      blank();

      if (result.previous && result.previous !== result.profile) {
        success(`Switched ${result.scope} scope from ${result.previous} to ${result.profile}`);
      } else {
        success(`Profile ${result.profile} is active at ${result.scope} scope`);
      }
      blank();

      if (result.errors.length > 0) throw new ApplyFailedError(result.profile, result.errors.length);
    });
}
