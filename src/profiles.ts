import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { InvalidProfileError, errorMessage } from "./errors.js";
import { formatIssues } from "./json.js";

export const SCOPES = ["user", "project", "local"] as const;
export type Scope = (typeof SCOPES)[number];

export const EXTENSION_CATEGORIES = ["agents", "commands", "skills", "hooks", "rules", "output-styles"] as const;
export type ExtensionCategory = (typeof EXTENSION_CATEGORIES)[number];

export const SecretSourceSchema = z.object({
  type: z.string(),
  key: z.string().optional(),
  ref: z.string().optional(),
  service: z.string().optional(),
  account: z.string().optional(),
});

export const SecretRefSchema = z.object({
  description: z.string().optional(),
  sources: z.array(SecretSourceSchema).default([]),
});

export const McpServerSchema = z.object({
  name: z.string().min(1),
  command: z.string(),
  args: z.array(z.string()).optional(),
  scope: z.string().optional(),
  secrets: z.record(z.string(), SecretRefSchema).optional(),
});

export const MarketplaceSchema = z.object({
  source: z.string(),
  repo: z.string().optional(),
  url: z.string().optional(),
});

export const ScopeSettingsSchema = z.object({
  plugins: z.array(z.string()).default([]),
  mcpServers: z.array(McpServerSchema).default([]),
});

const ExtensionsSchema = z
  .object({
    agents: z.array(z.string()),
    commands: z.array(z.string()),
    skills: z.array(z.string()),
    hooks: z.array(z.string()),
    rules: z.array(z.string()),
    "output-styles": z.array(z.string()),
  })
  .partial();

/** Accepts both the flat legacy layout and the per-scope layout. */
export const ProfileFileSchema = z.object({
  name: z.string().optional(),
  description: z.string().default(""),
  marketplaces: z.array(MarketplaceSchema).default([]),
  plugins: z.array(z.string()).optional(),
  mcpServers: z.array(McpServerSchema).optional(),
  perScope: z
    .object({
      user: ScopeSettingsSchema.optional(),
      project: ScopeSettingsSchema.optional(),
      local: ScopeSettingsSchema.optional(),
    })
    .optional(),
  extensions: ExtensionsSchema.default({}),
});

export type SecretSource = z.infer<typeof SecretSourceSchema>;
export type SecretRef = z.infer<typeof SecretRefSchema>;
export type McpServer = z.infer<typeof McpServerSchema>;
export type Marketplace = z.infer<typeof MarketplaceSchema>;
export type ScopeSettings = z.infer<typeof ScopeSettingsSchema>;
export type Extensions = z.infer<typeof ExtensionsSchema>;
export type PerScope = Partial<Record<Scope, ScopeSettings>>;

/** A profile after loading. Only the per-scope layout exists past this point. */
export interface Profile {
  name: string;
  description: string;
  marketplaces: Marketplace[];
  perScope: PerScope;
  extensions: Extensions;
}

export function marketplaceKey(m: Marketplace): string {
  return m.repo || m.url || "";
}

export function validateProfileName(name: string): void {
  const fail = (reason: string): never => {
    throw new InvalidProfileError(`name "${name}"`, reason);
  };
  if (name.trim() === "") fail("name is empty");
  if (name.includes("\\") || name.includes("\0")) fail("name contains an invalid character");
  if (name.startsWith("/") || name.endsWith("/")) fail("name cannot start or end with '/'");
  for (const segment of name.split("/")) {
    if (segment === "" || segment === "." || segment === "..") fail(`invalid path segment "${segment}"`);
  }
}

/**
 * Validates a raw profile document and folds the legacy flat fields into
 * `perScope.user`. A document that uses both layouts is rejected.
 */
export function parseProfile(raw: unknown, name: string, source: string): Profile {
  const parsed = ProfileFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidProfileError(source, formatIssues(parsed.error));
  }
  const doc = parsed.data;
  const legacyPlugins = doc.plugins ?? [];
  const legacyServers = doc.mcpServers ?? [];
  const hasLegacy = legacyPlugins.length > 0 || legacyServers.length > 0;

  if (hasLegacy && doc.perScope) {
    throw new InvalidProfileError(source, "cannot combine top-level plugins/mcpServers with perScope");
  }

  let perScope: PerScope = {};
  if (doc.perScope) {
    for (const scope of SCOPES) {
      const settings = doc.perScope[scope];
      if (settings) perScope[scope] = settings;
    }
  } else if (hasLegacy) {
    perScope = { user: { plugins: legacyPlugins, mcpServers: legacyServers } };
  }

  return {
    name,
    description: doc.description,
    marketplaces: doc.marketplaces,
    perScope,
    extensions: doc.extensions,
  };
}

export function loadProfileFile(file: string, name: string): Profile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err: unknown) {
    throw new InvalidProfileError(file, errorMessage(err));
  }
  return parseProfile(raw, name, file);
}

/** The on-disk document. Always the per-scope layout, empty fields left out. */
export function serializeProfile(profile: Profile): Record<string, unknown> {
  const doc: Record<string, unknown> = { name: profile.name };
  if (profile.description) doc.description = profile.description;
  if (profile.marketplaces.length > 0) doc.marketplaces = profile.marketplaces;

  const perScope: Record<string, Record<string, unknown>> = {};
  for (const scope of SCOPES) {
    const settings = profile.perScope[scope];
    if (!settings) continue;
    const entry: Record<string, unknown> = {};
    if (settings.plugins.length > 0) entry.plugins = settings.plugins;
    if (settings.mcpServers.length > 0) entry.mcpServers = settings.mcpServers;
    perScope[scope] = entry;
  }
  if (Object.keys(perScope).length > 0) doc.perScope = perScope;

  const extensions: Record<string, string[]> = {};
  for (const category of EXTENSION_CATEGORIES) {
    const items = profile.extensions[category];
    if (items && items.length > 0) extensions[category] = items;
  }
  if (Object.keys(extensions).length > 0) doc.extensions = extensions;
  return doc;
}

export function profilesEqual(a: Profile, b: Profile): boolean {
  return JSON.stringify(serializeProfile({ ...a, name: "" })) === JSON.stringify(serializeProfile({ ...b, name: "" }));
}

/**
 * Settings the profile declares for `scope`. A profile that only declares
 * user settings has them applied at whatever scope it targets.
 */
export function settingsForScope(profile: Profile, scope: Scope): ScopeSettings | undefined {
  const own = profile.perScope[scope];
  if (own) return own;
  const declared = SCOPES.filter((s) => profile.perScope[s] !== undefined);
  if (declared.length === 1 && declared[0] === "user") return profile.perScope.user;
  return undefined;
}

export function allPlugins(profile: Profile): string[] {
  const seen = new Set<string>();
  for (const scope of SCOPES) {
    for (const plugin of profile.perScope[scope]?.plugins ?? []) seen.add(plugin);
  }
  return [...seen].sort();
}

export function allMcpServers(profile: Profile): McpServer[] {
  const byName = new Map<string, McpServer>();
  for (const scope of SCOPES) {
    for (const server of profile.perScope[scope]?.mcpServers ?? []) byName.set(server.name, server);
  }
  return [...byName.values()].sort((a, b) => a.name.localeCompare(b.name));
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** "1 marketplace, 3 plugins, 2 MCP servers", used when a profile has no description. */
export function summarize(profile: Profile): string {
  const parts: string[] = [];
  const marketplaces = profile.marketplaces.length;
  const plugins = allPlugins(profile).length;
  const servers = allMcpServers(profile).length;
  const extensions = EXTENSION_CATEGORIES.reduce((n, c) => n + (profile.extensions[c]?.length ?? 0), 0);
  if (marketplaces > 0) parts.push(plural(marketplaces, "marketplace"));
  if (plugins > 0) parts.push(plural(plugins, "plugin"));
  if (servers > 0) parts.push(plural(servers, "MCP server"));
  if (extensions > 0) parts.push(plural(extensions, "extension"));
  return parts.length > 0 ? parts.join(", ") : "Empty profile";
}

export function displayDescription(profile: Profile): string {
  return profile.description || summarize(profile);
}

/** Directory holding the bundled profiles, found from the installed package root. */
export function builtinProfilesDir(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return path.join(dir, "profiles");
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error("Cannot locate the bundled profiles directory");
    dir = parent;
  }
}

/** `owner/repo` is a GitHub marketplace; anything URL-shaped is a git one. */
export function parseMarketplaceArg(value: string): Marketplace {
  if (value.includes("://") || value.startsWith("git@")) return { source: "git", url: value };
  return { source: "github", repo: value };
}
