import { Command } from "commander";
import { matchesFilter, statusFilter } from "../presentation.js";
import { listPluginViews, loadInstalledPlugins, type PluginStatus } from "../plugins.js";
import { SCOPES } from "../profiles.js";
import { parseScope } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { enabledPlugins, readSettings, scopeFiles, writeSettings } from "../settings.js";
import { info, success, heading, blank, muted, styled, type Color } from "../ui.js";

const STATUS_COLORS: Record<PluginStatus, Color> = {
  enabled: "green",
  disabled: "yellow",
  stale: "red",
  local: "cyan",
  cached: "dim",
};

interface ListFlags {
  scope?: string;
  enabled?: boolean;
  disabled?: boolean;
}

function listCommand(rt: Runtime): Command {
  return new Command("list")
    .description("List installed plugins and their status")
    .option("-s, --scope <scope>", "Only show plugins installed at this scope")
    .option("--enabled", "Only show enabled plugins")
    .option("--disabled", "Only show plugins that are not enabled")
    .action((opts: ListFlags) => {
      const filter = statusFilter(opts);
      const scope = opts.scope === undefined ? undefined : parseScope(opts.scope);
      const { store } = rt.context();
      const root = store.projectRoot(rt.workingDir());

      const enabledFor = (s: string): Record<string, boolean> => {
        const known = SCOPES.find((candidate) => candidate === s);
        return known ? enabledPlugins(readSettings(scopeFiles(known, store.paths.claudeDir, root).settings)) : {};
      };
      const views = listPluginViews(loadInstalledPlugins(store.paths.claudeDir), enabledFor).filter(
        (v) => (scope === undefined || v.scope === scope) && matchesFilter(filter, v.status === "enabled"),
      );

      if (views.length === 0) {
        info(filter === "all" && scope === undefined ? "No plugins installed." : "No matching plugins.");
        return;
      }

      heading("Plugins");
      blank();
      const width = Math.max(20, ...views.map((v) => v.id.length));
      for (const v of views) {
        info(`${v.id.padEnd(width)} ${v.scope.padEnd(8)} ${styled(v.status, { color: STATUS_COLORS[v.status] })} ${muted(v.version)}`);
      }
      blank();
      const enabled = views.filter((v) => v.status === "enabled").length;
      info(muted(`${views.length} shown, ${enabled} enabled`));
    });
}

function toggleCommand(rt: Runtime, name: "enable" | "disable"): Command {
  const value = name === "enable";
  return new Command(name)
    .description(`${value ? "Enable" : "Disable"} a plugin in a scope's settings`)
    .argument("<id>", "Plugin id (plugin@marketplace)")
    .option("-s, --scope <scope>", "Settings scope", "user")
    .action((id: string, opts: { scope: string }) => {
      const scope = parseScope(opts.scope);
      const { store } = rt.context();
      const file = scopeFiles(scope, store.paths.claudeDir, store.projectRoot(rt.workingDir())).settings;
      const doc = readSettings(file);
      if (enabledPlugins(doc)[id] === value) {
        info(`${id} is already ${name}d at ${scope} scope`);
        return;
      }
      doc.enabledPlugins = { ...doc.enabledPlugins, [id]: value };
      writeSettings(file, doc);
      success(`${value ? "Enabled" : "Disabled"} ${id} at ${scope} scope`);
    });
}

export function pluginCommand(rt: Runtime): Command {
  return new Command("plugin")
    .description("Inspect and toggle installed plugins")
    .addCommand(listCommand(rt))
    .addCommand(toggleCommand(rt, "enable"))
    .addCommand(toggleCommand(rt, "disable"));
}
