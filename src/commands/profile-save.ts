import { Command } from "commander";
import { parseMarketplaceArg, type Profile } from "../profiles.js";
import { CURRENT } from "../repository.js";
import { parseScope } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { snapshot } from "../snapshot.js";
import { info, warn, success, cmd } from "../ui.js";

function warnReserved(name: string): void {
  if (name === CURRENT) {
    warn(`"${CURRENT}" is reserved for the active profile; 'profile apply ${CURRENT}' will not select this one.`);
  }
}

export function profileSaveCommand(rt: Runtime): Command {
  return new Command("save")
    .description("Save the live configuration of a scope as a profile")
    .argument("<name>", "Profile name")
    .option("-s, --scope <scope>", "Scope to capture", "user")
    .option("-d, --description <text>", "Profile description")
    .option("-y, --yes", "Overwrite an existing profile without asking")
    .action(async (name: string, opts: { scope: string; description?: string; yes?: boolean }) => {
      const scope = parseScope(opts.scope);
      const ctx = rt.context();
      warnReserved(name);

      let overwrite = false;
      if (ctx.repo.exists(name) && !ctx.repo.isBuiltIn(name)) {
        overwrite = opts.yes === true || (await rt.confirm(`Profile ${name} exists. Overwrite?`));
        if (!overwrite) {
          info("Skipped.");
          return;
        }
      }

      const profile = snapshot(ctx, name, scope, rt.workingDir());
      if (opts.description) profile.description = opts.description;
      else if (ctx.repo.exists(name)) profile.description = ctx.repo.get(name).description;

      const file = ctx.repo.save(profile, { overwrite });
      success(`Saved ${name} from ${scope} scope`);
      info(`File: ${file}`);
      if (ctx.repo.isBuiltIn(name)) {
        info(`This customizes a built-in profile. Undo with: ${cmd(`loadout profile restore ${name}`)}`);
      }
    });
}

export function profileCreateCommand(rt: Runtime): Command {
  return new Command("create")
    .description("Create a profile from flags or by copying another")
    .argument("<name>", "Profile name")
    .option("-d, --description <text>", "Profile description")
    .option("--from <profile>", "Copy an existing profile")
    .option("--marketplace <source...>", "Marketplace repo (owner/name) or git URL")
    .option("--plugin <id...>", "Plugin id (plugin@marketplace)")
    .action((name: string, opts: { description?: string; from?: string; marketplace?: string[]; plugin?: string[] }) => {
      const { repo } = rt.context();
      warnReserved(name);

      if (opts.from) {
        repo.clone(opts.from, name, opts.description);
        success(`Created ${name} from ${opts.from}`);
        return;
      }

      const plugins = opts.plugin ?? [];
      const profile: Profile = {
        name,
        description: opts.description ?? "",
        marketplaces: (opts.marketplace ?? []).map(parseMarketplaceArg),
        perScope: plugins.length > 0 ? { user: { plugins, mcpServers: [] } } : {},
        extensions: {},
      };
      repo.create(profile);
      success(`Created ${name}`);
      info(`Apply it with: ${cmd(`loadout profile apply ${name}`)}`);
    });
}
