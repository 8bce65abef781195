import { Command } from "commander";
import { SCOPES, type Scope } from "../profiles.js";
import { activeForScope, parseScope } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { enabledPlugins, readSettings, scopeFiles } from "../settings.js";
import { info, heading, blank, muted, columns } from "../ui.js";

function printScope(rt: Runtime, scope: Scope, name: string | undefined): void {
  const { store } = rt.context();
  const files = scopeFiles(scope, store.paths.claudeDir, store.projectRoot(rt.workingDir()));
  const plugins = Object.values(enabledPlugins(readSettings(files.settings))).filter(Boolean).length;
  const servers = Object.keys(readSettings(files.mcp).mcpServers ?? {}).length;

  heading(`${scope} scope`);
  info(columns("Profile", name ?? muted("(none)"), 10));
  info(columns("Settings", files.settings, 10));
  if (files.mcp !== files.settings) info(columns("MCP", files.mcp, 10));
  info(columns("Plugins", `${plugins} enabled`, 10));
  info(columns("Servers", `${servers} configured`, 10));
}

export function scopeCommand(rt: Runtime): Command {
  const list = new Command("list")
    .description("Show each scope's active profile and settings files")
    .option("-s, --scope <scope>", "Only show one scope")
    .action((opts: { scope?: string }) => {
      const { store } = rt.context();
      const dir = rt.workingDir();

      if (opts.scope !== undefined) {
        const query = activeForScope(store, dir, parseScope(opts.scope));
        if (query.notice) {
          info(query.notice);
          return;
        }
        printScope(rt, query.scope, query.name);
        blank();
        return;
      }

      for (const scope of SCOPES) printScope(rt, scope, activeForScope(store, dir, scope).name);
      blank();
    });

  return new Command("scope").description("Inspect configuration scopes").addCommand(list);
}
