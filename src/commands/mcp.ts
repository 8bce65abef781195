import { Command } from "commander";
import { matchesFilter, statusFilter } from "../presentation.js";
import { SCOPES } from "../profiles.js";
import { MCP_SERVERS } from "../registry.js";
import { parseScope } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { readSettings, scopeFiles } from "../settings.js";
import { info, success, heading, blank, muted, styled } from "../ui.js";

function listCommand(rt: Runtime): Command {
  return new Command("list")
    .description("List configured MCP servers")
    .option("-s, --scope <scope>", "Only show one scope")
    .option("--enabled", "Only show enabled servers")
    .option("--disabled", "Only show disabled servers")
    .action((opts: { scope?: string; enabled?: boolean; disabled?: boolean }) => {
      const filter = statusFilter(opts);
      const scopes = opts.scope === undefined ? SCOPES : [parseScope(opts.scope)];
      const { store, registry } = rt.context();
      const root = store.projectRoot(rt.workingDir());

      let shown = 0;
      for (const scope of scopes) {
        const file = scopeFiles(scope, store.paths.claudeDir, root).mcp;
        const servers = readSettings(file).mcpServers ?? {};
        const names = Object.keys(servers)
          .sort()
          .filter((name) => matchesFilter(filter, registry.isEnabled(MCP_SERVERS, name)));
        if (names.length === 0) continue;

        heading(`${scope} scope ${muted(`(${file})`)}`);
        for (const name of names) {
          const def = servers[name];
          const state = registry.isEnabled(MCP_SERVERS, name)
            ? styled("enabled", { color: "green" })
            : styled("disabled", { color: "yellow" });
          info(`  ${name.padEnd(20)} ${state} ${muted([def.command, ...(def.args ?? [])].join(" "))}`);
          shown++;
        }
      }

      if (shown === 0) info("No MCP servers configured.");
      blank();
    });
}

function toggleCommand(rt: Runtime, name: "enable" | "disable"): Command {
  const value = name === "enable";
  return new Command(name)
    .description(`${value ? "Enable" : "Disable"} an MCP server`)
    .argument("<server>", "Server name")
    .action((server: string) => {
      rt.context().registry.setEnabled(MCP_SERVERS, server, value);
      success(`${value ? "Enabled" : "Disabled"} MCP server ${server}`);
    });
}

export function mcpCommand(rt: Runtime): Command {
  return new Command("mcp")
    .description("Inspect and toggle MCP servers")
    .addCommand(listCommand(rt))
    .addCommand(toggleCommand(rt, "enable"))
    .addCommand(toggleCommand(rt, "disable"));
}
