import { Command } from "commander";
import { SCOPES } from "../profiles.js";
import { effectiveProfile, resolveActive } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { info, heading, blank, muted, columns, cmd } from "../ui.js";

export function profileStatusCommand(rt: Runtime): Command {
  return new Command("status")
    .description("Show the active profile at each scope and which one is in effect")
    .action(() => {
      const { store } = rt.context();
      const dir = rt.workingDir();
      const active = resolveActive(store, dir);

      heading("Active profiles");
      blank();
      for (const scope of SCOPES) {
        let detail = active[scope] ?? muted("(none)");
        if (scope === "local" && !active.local && active.project && store.localProfile(dir)) {
          detail = muted("(ignored: project config present)");
        }
        info(columns(scope, detail, 10));
      }

      blank();
      const effective = effectiveProfile(active);
      if (effective) {
        info(`Effective: ${effective.name} ${muted(`(${effective.scope} scope)`)}`);
      } else {
        info(`No profile active. Run: ${cmd("loadout profile apply <name>")}`);
      }
      blank();
    });
}
