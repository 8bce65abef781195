import * as fs from "fs";
import * as path from "path";
import { InvalidCategoryError } from "./errors.js";
import { EXTENSION_CATEGORIES, type ExtensionCategory } from "./profiles.js";
import type { EnabledRegistry } from "./registry.js";
import { debug } from "./ui.js";

export function parseCategory(value: string): ExtensionCategory {
  const found = EXTENSION_CATEGORIES.find((c) => c === value);
  if (!found) throw new InvalidCategoryError(value, EXTENSION_CATEGORIES);
  return found;
}

function skip(name: string): boolean {
  return name.startsWith(".") || name === "CLAUDE.md";
}

/**
 * Items matched by a selection pattern:
 * `*` everything, `group/*` one directory, `prefix*` by base name,
 * anything else an exact name.
 */
export function matchWildcard(pattern: string, items: string[]): string[] {
  let matched: string[];
  if (pattern === "*") {
    matched = [...items];
  } else if (pattern.endsWith("/*")) {
    const prefix = pattern.slice(0, -1);
    matched = items.filter((item) => item.startsWith(prefix));
  } else if (pattern.endsWith("*")) {
    const prefix = pattern.slice(0, -1);
    matched = items.filter((item) => item.slice(item.lastIndexOf("/") + 1).startsWith(prefix));
  } else {
    matched = items.filter((item) => item === pattern);
  }
  return matched.sort();
}

export interface SelectionResult {
  changed: string[];
  notFound: string[];
}

export interface ExtensionItem {
  name: string;
  enabled: boolean;
}

/**
 * The extension library under `<home>/ext/<category>`. Enabled items are
 * linked into the assistant's directory of the same category.
 */
export class ExtensionLibrary {
  readonly libraryDir: string;
  readonly targetDir: string;
  private readonly registry: EnabledRegistry;

  constructor(libraryDir: string, targetDir: string, registry: EnabledRegistry) {
    this.libraryDir = libraryDir;
    this.targetDir = targetDir;
    this.registry = registry;
  }

  /** Agents may be grouped one level deep as `group/name.md`. */
  listItems(category: ExtensionCategory): string[] {
    const dir = path.join(this.libraryDir, category);
    if (!fs.existsSync(dir)) return [];
    const items: string[] = [];
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (skip(entry.name)) continue;
      if (category === "agents") {
        if (entry.isDirectory()) {
          for (const child of fs.readdirSync(path.join(dir, entry.name))) {
            if (!skip(child) && child.endsWith(".md")) items.push(`${entry.name}/${child}`);
          }
        } else if (entry.name.endsWith(".md")) {
          items.push(entry.name);
        }
        continue;
      }
      items.push(entry.name);
    }
    return items.sort();
  }

  items(category: ExtensionCategory): ExtensionItem[] {
    return this.listItems(category).map((name) => ({ name, enabled: this.registry.isEnabled(category, name) }));
  }

  enable(category: ExtensionCategory, patterns: string[]): SelectionResult {
    return this.select(category, patterns, true);
  }

  disable(category: ExtensionCategory, patterns: string[]): SelectionResult {
    return this.select(category, patterns, false);
  }

  private select(category: ExtensionCategory, patterns: string[], value: boolean): SelectionResult {
    const all = this.listItems(category);
    const changes: Record<string, boolean> = {};
    const notFound: string[] = [];

    for (const pattern of patterns) {
      const matched = matchWildcard(pattern, all);
      if (matched.length === 0) {
        notFound.push(pattern);
        continue;
      }
      for (const item of matched) changes[item] = value;
    }

    this.registry.update(category, changes);
    this.link(category);
    return { changed: Object.keys(changes).sort(), notFound };
  }

  /**
   * Brings the links under the target directory in line with the registry:
   * enabled library items get a symlink, links to disabled items are removed.
   */
  link(category: ExtensionCategory): void {
    const source = path.join(this.libraryDir, category);
    const target = path.join(this.targetDir, category);
    for (const item of this.listItems(category)) {
      const linkPath = path.join(target, item);
      const present = isSymlink(linkPath);
      if (this.registry.isEnabled(category, item)) {
        if (present) continue;
        fs.mkdirSync(path.dirname(linkPath), { recursive: true });
        fs.symlinkSync(path.join(source, item), linkPath);
        debug(`linked ${category}/${item}`);
      } else if (present) {
        fs.unlinkSync(linkPath);
        debug(`unlinked ${category}/${item}`);
      }
    }
  }
}

function isSymlink(file: string): boolean {
  try {
    return fs.lstatSync(file).isSymbolicLink();
  } catch {
    return false;
  }
}
