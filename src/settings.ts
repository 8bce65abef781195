import * as path from "path";
import { z } from "zod";
import { readJson, writeJsonAtomic } from "./json.js";
import type { McpServer, Scope } from "./profiles.js";

export const MCP_JSON_FILE = ".mcp.json";

/** Keys written first, in this order; the rest follow alphabetically. */
const KEY_ORDER = ["$schema", "includeCoAuthoredBy", "permissions", "hooks", "statusLine", "enabledPlugins"];

const McpDefinitionSchema = z
  .object({
    command: z.string(),
    args: z.array(z.string()).optional(),
    env: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

/**
 * The assistant's settings files are owned by the assistant. Only the keys
 * loadout manages are typed; everything else passes through untouched.
 */
export const SettingsSchema = z
  .object({
    enabledPlugins: z.record(z.string(), z.boolean()).optional(),
    mcpServers: z.record(z.string(), McpDefinitionSchema).optional(),
  })
  .passthrough();

export type Settings = z.infer<typeof SettingsSchema>;
export type McpDefinition = z.infer<typeof McpDefinitionSchema>;

export interface ScopeFiles {
  settings: string;
  /** Document holding MCP server definitions for the scope. */
  mcp: string;
}

export function scopeFiles(scope: Scope, claudeDir: string, projectRoot: string): ScopeFiles {
  switch (scope) {
    case "user": {
      const settings = path.join(claudeDir, "settings.json");
      return { settings, mcp: settings };
    }
    case "project":
      return {
        settings: path.join(projectRoot, ".claude", "settings.json"),
        mcp: path.join(projectRoot, MCP_JSON_FILE),
      };
    case "local": {
      const settings = path.join(projectRoot, ".claude", "settings.local.json");
      return { settings, mcp: settings };
    }
  }
}

export function readSettings(file: string): Settings {
  return readJson(file, SettingsSchema) ?? {};
}

export function orderKeys(doc: Record<string, unknown>): Record<string, unknown> {
  const ordered: Record<string, unknown> = {};
  for (const key of KEY_ORDER) {
    if (key in doc) ordered[key] = doc[key];
  }
  for (const key of Object.keys(doc).sort()) {
    if (!KEY_ORDER.includes(key)) ordered[key] = doc[key];
  }
  return ordered;
}

export function writeSettings(file: string, doc: Settings): void {
  writeJsonAtomic(file, orderKeys(doc));
}

export function enabledPlugins(doc: Settings): Record<string, boolean> {
  return doc.enabledPlugins ?? {};
}

/** Secrets become `${NAME}` references the assistant expands at run time. */
export function toDefinition(server: McpServer): McpDefinition {
  const def: McpDefinition = { command: server.command };
  if (server.args && server.args.length > 0) def.args = server.args;
  const names = Object.keys(server.secrets ?? {}).sort();
  if (names.length > 0) {
    def.env = Object.fromEntries(names.map((name) => [name, `\${${name}}`]));
  }
  return def;
}

export function definitionsEqual(a: McpDefinition, b: McpDefinition): boolean {
  return JSON.stringify(normalize(a)) === JSON.stringify(normalize(b));
}

function normalize(def: McpDefinition): unknown {
  const env = def.env ?? {};
  return {
    command: def.command,
    args: def.args ?? [],
    env: Object.fromEntries(Object.keys(env).sort().map((k) => [k, env[k]])),
  };
}
