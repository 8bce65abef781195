import { z } from "zod";
import { readJson, writeJsonAtomic } from "./json.js";

export const PLUGINS = "plugins";
export const MCP_SERVERS = "mcpServers";

const RegistrySchema = z.record(z.string(), z.record(z.string(), z.boolean()));

export type RegistryData = z.infer<typeof RegistrySchema>;

/** Plugins and MCP servers are on unless switched off; extensions are off unless switched on. */
export function defaultEnabled(category: string): boolean {
  return category === PLUGINS || category === MCP_SERVERS;
}

function own<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Per-category on/off switches persisted in enabled.json. Reads go to disk
 * every time; each mutation is one atomic write.
 */
export class EnabledRegistry {
  readonly file: string;

  constructor(file: string) {
    this.file = file;
  }

  load(): RegistryData {
    return readJson(this.file, RegistrySchema) ?? {};
  }

  isEnabled(category: string, item: string): boolean {
    const entries = own(this.load(), category) ?? {};
    return own(entries, item) ?? defaultEnabled(category);
  }

  setEnabled(category: string, item: string, value: boolean): void {
    this.update(category, { [item]: value });
  }

  update(category: string, changes: Record<string, boolean>): void {
    this.updateAll({ [category]: changes });
  }

  /** Applies changes across categories in a single write. */
  updateAll(changes: RegistryData): void {
    const categories = Object.keys(changes).filter((c) => Object.keys(changes[c]).length > 0);
    if (categories.length === 0) return;
    const data = this.load();
    for (const category of categories) {
      data[category] = { ...own(data, category), ...changes[category] };
    }
    writeJsonAtomic(this.file, data);
  }

  /** Counts over the known items plus anything the registry lists. */
  counts(category: string, known: string[] = []): { total: number; enabled: number } {
    const entries = own(this.load(), category) ?? {};
    const names = new Set([...known, ...Object.keys(entries)]);
    let enabled = 0;
    for (const name of names) {
      if (own(entries, name) ?? defaultEnabled(category)) enabled++;
    }
    return { total: names.size, enabled };
  }

  enabledItems(category: string): string[] {
    const entries = own(this.load(), category) ?? {};
    return Object.keys(entries)
      .filter((name) => entries[name])
      .sort();
  }
}
