import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { readJson } from "./json.js";
import type { Marketplace, Scope } from "./profiles.js";

const InstallRecordSchema = z.object({
  scope: z.string().default("user"),
  version: z.string().default(""),
  installPath: z.string().default(""),
  gitCommitSha: z.string().optional(),
  isLocal: z.boolean().default(false),
  installedAt: z.string().optional(),
  lastUpdated: z.string().optional(),
  projectPath: z.string().optional(),
});

const InstalledV2Schema = z.object({
  version: z.literal(2),
  plugins: z.record(z.string(), z.array(InstallRecordSchema)).default({}),
});

/** Older layout: one record per plugin and no scope. */
const InstalledV1Schema = z.object({
  version: z.literal(1).optional(),
  plugins: z.record(z.string(), InstallRecordSchema.omit({ scope: true, projectPath: true })).default({}),
});

const InstalledFileSchema = z.union([InstalledV2Schema, InstalledV1Schema]);

export type InstallRecord = z.infer<typeof InstallRecordSchema>;
export type InstalledPlugins = z.infer<typeof InstalledV2Schema>;

const KnownMarketplacesSchema = z.record(
  z.string(),
  z
    .object({
      source: z.object({
        source: z.string().default("github"),
        repo: z.string().optional(),
        url: z.string().optional(),
      }),
      installLocation: z.string().optional(),
    })
    .passthrough(),
);

export type KnownMarketplaces = z.infer<typeof KnownMarketplacesSchema>;

export function installedPluginsFile(claudeDir: string): string {
  return path.join(claudeDir, "plugins", "installed_plugins.json");
}

export function knownMarketplacesFile(claudeDir: string): string {
  return path.join(claudeDir, "plugins", "known_marketplaces.json");
}

/** Always returns the version 2 layout; a version 1 file is upgraded in memory. */
export function loadInstalledPlugins(claudeDir: string): InstalledPlugins {
  const data = readJson(installedPluginsFile(claudeDir), InstalledFileSchema);
  if (!data) return { version: 2, plugins: {} };
  if (data.version === 2) return data;

  const plugins: InstalledPlugins["plugins"] = {};
  for (const [id, record] of Object.entries(data.plugins)) {
    plugins[id] = [{ ...record, scope: "user" }];
  }
  return { version: 2, plugins };
}

export function loadKnownMarketplaces(claudeDir: string): KnownMarketplaces {
  return readJson(knownMarketplacesFile(claudeDir), KnownMarketplacesSchema) ?? {};
}

/** Repo or URL of every marketplace the assistant already knows. */
export function knownMarketplaceKeys(known: KnownMarketplaces): Set<string> {
  const keys = new Set<string>();
  for (const entry of Object.values(known)) {
    const key = entry.source.repo || entry.source.url;
    if (key) keys.add(key);
  }
  return keys;
}

export function knownAsMarketplaces(known: KnownMarketplaces): Marketplace[] {
  return Object.keys(known)
    .sort()
    .map((name) => {
      const { source, repo, url } = known[name].source;
      const m: Marketplace = { source };
      if (repo) m.repo = repo;
      if (url) m.url = url;
      return m;
    });
}

/** The record installing `id` at `scope`. Project and local records must match the project. */
export function findInstall(
  installed: InstalledPlugins,
  id: string,
  scope: Scope,
  projectRoot: string,
): InstallRecord | undefined {
  return (installed.plugins[id] ?? []).find((record) => {
    if (record.scope !== scope) return false;
    if (scope === "user" || record.projectPath === undefined) return true;
    return path.resolve(record.projectPath) === path.resolve(projectRoot);
  });
}

export type PluginStatus = "enabled" | "disabled" | "stale" | "local" | "cached";

/**
 * Derived, never stored. A missing install path wins over anything the
 * settings say.
 */
export function pluginStatus(record: InstallRecord, enabled: Record<string, boolean>, id: string): PluginStatus {
  if (!record.installPath || !fs.existsSync(record.installPath)) return "stale";
  const setting = enabled[id];
  if (setting !== undefined) return setting ? "enabled" : "disabled";
  return record.isLocal ? "local" : "cached";
}

export interface PluginView {
  id: string;
  scope: string;
  version: string;
  status: PluginStatus;
}

export function listPluginViews(
  installed: InstalledPlugins,
  enabledFor: (scope: string) => Record<string, boolean>,
): PluginView[] {
  const views: PluginView[] = [];
  for (const id of Object.keys(installed.plugins).sort()) {
    for (const record of installed.plugins[id]) {
      views.push({
        id,
        scope: record.scope,
        version: record.version,
        status: pluginStatus(record, enabledFor(record.scope), id),
      });
    }
  }
  return views;
}
