import type { Context } from "./context.js";
import { matchWildcard } from "./extensions.js";
import { loadInstalledPlugins, findInstall, knownMarketplaceKeys, loadKnownMarketplaces } from "./plugins.js";
import {
  EXTENSION_CATEGORIES,
  marketplaceKey,
  settingsForScope,
  type ExtensionCategory,
  type Marketplace,
  type McpServer,
  type Profile,
  type Scope,
  type SecretSource,
} from "./profiles.js";
import { MCP_SERVERS, type RegistryData } from "./registry.js";
import { resolveActive, resolveProfileName } from "./resolver.js";
import {
  definitionsEqual,
  enabledPlugins,
  readSettings,
  scopeFiles,
  toDefinition,
  writeSettings,
  type McpDefinition,
  type ScopeFiles,
  type Settings,
} from "./settings.js";
import { debug } from "./ui.js";

export type Action =
  | { kind: "add-marketplace"; marketplace: Marketplace }
  | { kind: "install-plugin"; plugin: string }
  | { kind: "enable-plugin"; plugin: string }
  | { kind: "disable-plugin"; plugin: string }
  | { kind: "write-mcp-server"; server: string; definition: McpDefinition }
  | { kind: "enable-mcp-server"; server: string }
  | { kind: "remove-mcp-server"; server: string }
  | { kind: "enable-extension"; category: ExtensionCategory; item: string };

export interface SecretRequirement {
  server: string;
  name: string;
  description?: string;
  sources: SecretSource[];
}

export interface Plan {
  profile: Profile;
  scope: Scope;
  projectRoot: string;
  files: ScopeFiles;
  actions: Action[];
  secrets: SecretRequirement[];
  warnings: string[];
}

export interface ApplyResult {
  profile: string;
  scope: Scope;
  changed: boolean;
  dryRun: boolean;
  actions: Action[];
  secrets: SecretRequirement[];
  errors: string[];
  warnings: string[];
  previous?: string;
}

export function describeAction(action: Action): string {
  switch (action.kind) {
    case "add-marketplace":
      return `Add marketplace ${marketplaceKey(action.marketplace)}`;
    case "install-plugin":
      return `Install plugin ${action.plugin}`;
    case "enable-plugin":
      return `Enable plugin ${action.plugin}`;
    case "disable-plugin":
      return `Disable plugin ${action.plugin}`;
    case "write-mcp-server":
      return `Configure MCP server ${action.server}`;
    case "enable-mcp-server":
      return `Enable MCP server ${action.server}`;
    case "remove-mcp-server":
      return `Remove MCP server ${action.server}`;
    case "enable-extension":
      return `Enable ${action.category}/${action.item}`;
  }
}

export function secretRequirements(servers: McpServer[]): SecretRequirement[] {
  const requirements: SecretRequirement[] = [];
  for (const server of [...servers].sort((a, b) => a.name.localeCompare(b.name))) {
    const secrets = server.secrets ?? {};
    for (const name of Object.keys(secrets).sort()) {
      const ref = secrets[name];
      requirements.push({ server: server.name, name, description: ref.description, sources: ref.sources });
    }
  }
  return requirements;
}

function unique<T>(items: T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const k = key(item);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

/**
 * Diffs the profile's declared state for `scope` against what is on disk.
 * Reads only; running it twice without an execute in between yields the
 * same actions.
 */
export function plan(
  ctx: Context,
  profile: Profile,
  scope: Scope,
  workingDir: string,
  opts: { install?: boolean } = {},
): Plan {
  const install = opts.install !== false;
  const { store, registry, library } = ctx;
  const claudeDir = store.paths.claudeDir;
  const projectRoot = store.projectRoot(workingDir);
  const files = scopeFiles(scope, claudeDir, projectRoot);
  const actions: Action[] = [];
  const warnings: string[] = [];

  const known = knownMarketplaceKeys(loadKnownMarketplaces(claudeDir));
  for (const marketplace of unique(profile.marketplaces, marketplaceKey)) {
    const key = marketplaceKey(marketplace);
    if (install && key && !known.has(key)) actions.push({ kind: "add-marketplace", marketplace });
  }

  const declared = settingsForScope(profile, scope);
  if (declared) {
    const installed = loadInstalledPlugins(claudeDir);
    const live = enabledPlugins(readSettings(files.settings));
    const plugins = [...new Set(declared.plugins)];

    for (const plugin of plugins) {
      if (install && !findInstall(installed, plugin, scope, projectRoot)) actions.push({ kind: "install-plugin", plugin });
    }
    for (const plugin of plugins) {
      if (live[plugin] !== true) actions.push({ kind: "enable-plugin", plugin });
    }
    for (const plugin of Object.keys(live).sort()) {
      if (live[plugin] && !plugins.includes(plugin)) actions.push({ kind: "disable-plugin", plugin });
    }

    const liveServers = readSettings(files.mcp).mcpServers ?? {};
    const servers = unique(declared.mcpServers, (s) => s.name);
    for (const server of servers) {
      const definition = toDefinition(server);
      const current = Object.hasOwn(liveServers, server.name) ? liveServers[server.name] : undefined;
      if (!current || !definitionsEqual(current, definition)) {
        actions.push({ kind: "write-mcp-server", server: server.name, definition });
      }
      if (!registry.isEnabled(MCP_SERVERS, server.name)) {
        actions.push({ kind: "enable-mcp-server", server: server.name });
      }
    }
    const names = new Set(servers.map((s) => s.name));
    for (const server of Object.keys(liveServers).sort()) {
      if (!names.has(server)) actions.push({ kind: "remove-mcp-server", server });
    }
  }

  for (const category of EXTENSION_CATEGORIES) {
    const patterns = profile.extensions[category] ?? [];
    if (patterns.length === 0) continue;
    const available = library.listItems(category);
    const items = new Set<string>();
    for (const pattern of patterns) {
      const matched = matchWildcard(pattern, available);
      if (matched.length === 0) {
        warnings.push(`Extension ${category}/${pattern} not found in library`);
        if (!pattern.includes("*")) items.add(pattern);
      }
      for (const item of matched) items.add(item);
    }
    for (const item of [...items].sort()) {
      if (!registry.isEnabled(category, item)) actions.push({ kind: "enable-extension", category, item });
    }
  }

  return {
    profile,
    scope,
    projectRoot,
    files,
    actions,
    secrets: secretRequirements(declared?.mcpServers ?? []),
    warnings,
  };
}

/**
 * Carries out a plan. Host failures are collected, not thrown; each
 * touched document is written once.
 */
export function execute(ctx: Context, p: Plan): string[] {
  const errors: string[] = [];
  const docs = new Map<string, Settings>();
  const doc = (file: string): Settings => {
    let loaded = docs.get(file);
    if (!loaded) {
      loaded = readSettings(file);
      docs.set(file, loaded);
    }
    return loaded;
  };
  const registryChanges: RegistryData = {};
  const linkCategories = new Set<ExtensionCategory>();

  for (const action of p.actions) {
    debug(describeAction(action));
    switch (action.kind) {
      case "add-marketplace": {
        const result = ctx.host.addMarketplace(action.marketplace);
        if (!result.ok) errors.push(`marketplace ${marketplaceKey(action.marketplace)}: ${result.message ?? "failed"}`);
        break;
      }
      case "install-plugin": {
        const result = ctx.host.installPlugin(action.plugin, p.scope, p.projectRoot);
        if (!result.ok) errors.push(`plugin ${action.plugin}: ${result.message ?? "failed"}`);
        break;
      }
      case "enable-plugin":
      case "disable-plugin": {
        const settings = doc(p.files.settings);
        settings.enabledPlugins = { ...settings.enabledPlugins, [action.plugin]: action.kind === "enable-plugin" };
        break;
      }
      case "write-mcp-server": {
        const settings = doc(p.files.mcp);
        settings.mcpServers = { ...settings.mcpServers, [action.server]: action.definition };
        break;
      }
      case "remove-mcp-server": {
        const settings = doc(p.files.mcp);
        const servers = { ...settings.mcpServers };
        delete servers[action.server];
        settings.mcpServers = servers;
        break;
      }
      case "enable-mcp-server":
        registryChanges[MCP_SERVERS] = { ...registryChanges[MCP_SERVERS], [action.server]: true };
        break;
      case "enable-extension":
        registryChanges[action.category] = { ...registryChanges[action.category], [action.item]: true };
        linkCategories.add(action.category);
        break;
    }
  }

  for (const [file, settings] of docs) writeSettings(file, settings);
  ctx.registry.updateAll(registryChanges);
  for (const category of linkCategories) ctx.library.link(category);
  return errors;
}

/** Points `scope` at `name`. The project file is only rewritten when the name differs. */
export function movePointer(ctx: Context, scope: Scope, name: string, projectRoot: string): void {
  switch (scope) {
    case "user":
      if (ctx.store.userProfile() !== name) ctx.store.setUserProfile(name);
      break;
    case "project":
      ctx.store.setProjectProfile(projectRoot, name);
      break;
    case "local":
      ctx.store.setLocalProfile(projectRoot, name);
      break;
  }
}

export interface ApplyOptions {
  workingDir: string;
  dryRun?: boolean;
  /** When false, marketplaces and plugins are not fetched; settings are still written. */
  install?: boolean;
}

/**
 * Applies a profile at a scope. With no scope given, `current` re-applies
 * at the scope it is active at and any other name targets user scope.
 */
export function apply(ctx: Context, name: string, scope: Scope | undefined, opts: ApplyOptions): ApplyResult {
  const resolved = resolveProfileName(ctx.store, opts.workingDir, name);
  const target = scope ?? resolved.scope ?? "user";
  const profile = ctx.repo.get(resolved.name);
  const previous = resolveActive(ctx.store, opts.workingDir)[target];
  const p = plan(ctx, profile, target, opts.workingDir, { install: opts.install });

  if (target === "local") {
    const project = ctx.store.projectProfile(opts.workingDir);
    if (project) p.warnings.push(`Project config ${project.file} takes precedence over the local profile`);
  }

  const result: ApplyResult = {
    profile: profile.name,
    scope: target,
    changed: p.actions.length > 0,
    dryRun: opts.dryRun === true,
    actions: p.actions,
    secrets: p.secrets,
    errors: [],
    warnings: p.warnings,
    previous,
  };
  if (opts.dryRun) return result;

  result.errors = execute(ctx, p);
  movePointer(ctx, target, profile.name, p.projectRoot);
  return result;
}
