import type { Context } from "./context.js";
import { knownAsMarketplaces, loadKnownMarketplaces } from "./plugins.js";
import { EXTENSION_CATEGORIES, type Extensions, type McpServer, type PerScope, type Profile, type Scope } from "./profiles.js";
import { enabledPlugins, readSettings, scopeFiles } from "./settings.js";

/**
 * Captures what is live at `scope` as a profile: known marketplaces,
 * enabled plugins and MCP servers of the scope's documents, and the
 * enabled extensions.
 */
export function snapshot(ctx: Context, name: string, scope: Scope, workingDir: string): Profile {
  const { store, registry, library } = ctx;
  const files = scopeFiles(scope, store.paths.claudeDir, store.projectRoot(workingDir));

  const live = enabledPlugins(readSettings(files.settings));
  const plugins = Object.keys(live)
    .filter((id) => live[id])
    .sort();

  const servers = readSettings(files.mcp).mcpServers ?? {};
  const mcpServers: McpServer[] = Object.keys(servers)
    .sort()
    .map((serverName) => {
      const def = servers[serverName];
      const server: McpServer = { name: serverName, command: def.command };
      if (def.args && def.args.length > 0) server.args = def.args;
      return server;
    });

  const extensions: Extensions = {};
  for (const category of EXTENSION_CATEGORIES) {
    const enabled = library.listItems(category).filter((item) => registry.isEnabled(category, item));
    if (enabled.length > 0) extensions[category] = enabled;
  }

  const perScope: PerScope = {};
  perScope[scope] = { plugins, mcpServers };

  return {
    name,
    description: "",
    marketplaces: knownAsMarketplaces(loadKnownMarketplaces(store.paths.claudeDir)),
    perScope,
    extensions,
  };
}
