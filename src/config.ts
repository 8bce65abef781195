import * as path from "path";
import * as os from "os";
import { z } from "zod";
import { InvalidConfigError } from "./errors.js";
import { readJson, writeJsonAtomic } from "./json.js";

export const CONFIG_FILE = "config.json";
export const PROJECTS_FILE = "projects.json";
export const ENABLED_FILE = "enabled.json";
export const PROJECT_CONFIG_FILE = ".loadout.json";
export const CONFIG_VERSION = "1";

export interface Paths {
  /** Where loadout keeps profiles, pointers and the extension library. */
  home: string;
  /** The assistant's own configuration directory. */
  claudeDir: string;
}

export function resolvePaths(env: NodeJS.ProcessEnv = process.env): Paths {
  const home = env.LOADOUT_HOME ?? path.join(os.homedir(), ".loadout");
  if (!path.isAbsolute(home)) {
    throw new InvalidConfigError("LOADOUT_HOME", `must be an absolute path, got "${home}"`);
  }
  const claudeDir = env.CLAUDE_CONFIG_DIR ?? path.join(os.homedir(), ".claude");
  return { home, claudeDir: path.resolve(claudeDir) };
}

export const GlobalConfigSchema = z
  .object({
    preferences: z
      .object({
        activeProfile: z.string().optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

const ProjectEntrySchema = z.object({
  profile: z.string(),
  appliedAt: z.string().optional(),
});

export const ProjectsRegistrySchema = z.object({
  version: z.string().default(CONFIG_VERSION),
  projects: z.record(z.string(), ProjectEntrySchema).default({}),
});

export type ProjectsRegistry = z.infer<typeof ProjectsRegistrySchema>;

export const ProjectConfigSchema = z.object({
  version: z.string().default(CONFIG_VERSION),
  profile: z.string(),
  appliedAt: z.string().optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export function loadGlobalConfig(file: string): GlobalConfig {
  return readJson(file, GlobalConfigSchema) ?? { preferences: {} };
}

export function loadProjectsRegistry(file: string): ProjectsRegistry {
  return readJson(file, ProjectsRegistrySchema) ?? { version: CONFIG_VERSION, projects: {} };
}

export function saveProjectsRegistry(file: string, registry: ProjectsRegistry): void {
  writeJsonAtomic(file, { version: CONFIG_VERSION, projects: registry.projects });
}

/** Walks from `dir` up to the filesystem root looking for a project config. */
export function findProjectConfig(dir: string): { file: string; config: ProjectConfig } | undefined {
  let current = path.resolve(dir);
  for (;;) {
    const file = path.join(current, PROJECT_CONFIG_FILE);
    const config = readJson(file, ProjectConfigSchema);
    if (config) return { file, config };
    const parent = path.dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}

/**
 * Handle on the persisted pointers. Nothing is cached: every accessor reads
 * the files again, so a command always sees the state on disk.
 */
export class ConfigStore {
  readonly paths: Paths;
  private readonly now: () => Date;

  constructor(paths: Paths, now: () => Date = () => new Date()) {
    this.paths = paths;
    this.now = now;
  }

  get profilesDir(): string {
    return path.join(this.paths.home, "profiles");
  }

  get extDir(): string {
    return path.join(this.paths.home, "ext");
  }

  get enabledFile(): string {
    return path.join(this.paths.home, ENABLED_FILE);
  }

  get globalFile(): string {
    return path.join(this.paths.home, CONFIG_FILE);
  }

  get projectsFile(): string {
    return path.join(this.paths.home, PROJECTS_FILE);
  }

  timestamp(): string {
    return this.now().toISOString();
  }

  userProfile(): string | undefined {
    return loadGlobalConfig(this.globalFile).preferences.activeProfile;
  }

  setUserProfile(name: string | undefined): void {
    const config = loadGlobalConfig(this.globalFile);
    const preferences = { ...config.preferences };
    if (name === undefined) delete preferences.activeProfile;
    else preferences.activeProfile = name;
    writeJsonAtomic(this.globalFile, { ...config, preferences });
  }

  projectProfile(dir: string): { root: string; file: string; profile: string } | undefined {
    const found = findProjectConfig(dir);
    if (!found) return undefined;
    return { root: path.dirname(found.file), file: found.file, profile: found.config.profile };
  }

  /** Rewrites the project config only when it names a different profile. */
  setProjectProfile(root: string, name: string): boolean {
    const file = path.join(root, PROJECT_CONFIG_FILE);
    const existing = readJson(file, ProjectConfigSchema);
    if (existing?.profile === name) return false;
    writeJsonAtomic(file, { version: CONFIG_VERSION, profile: name, appliedAt: this.timestamp() });
    return true;
  }

  /** The registry entry for `dir` or its nearest registered ancestor. */
  localProfile(dir: string): { root: string; profile: string } | undefined {
    const registry = loadProjectsRegistry(this.projectsFile);
    let current = path.resolve(dir);
    for (;;) {
      const entry = registry.projects[current];
      if (entry) return { root: current, profile: entry.profile };
      const parent = path.dirname(current);
      if (parent === current) return undefined;
      current = parent;
    }
  }

  setLocalProfile(root: string, name: string): void {
    const registry = loadProjectsRegistry(this.projectsFile);
    registry.projects[path.resolve(root)] = { profile: name, appliedAt: this.timestamp() };
    saveProjectsRegistry(this.projectsFile, registry);
  }

  /** Replaces every registry entry naming `from`. Returns the affected paths. */
  replaceLocalEntries(from: string, to: string | undefined): string[] {
    const registry = loadProjectsRegistry(this.projectsFile);
    const touched: string[] = [];
    for (const [projectPath, entry] of Object.entries(registry.projects)) {
      if (entry.profile !== from) continue;
      touched.push(projectPath);
      if (to === undefined) delete registry.projects[projectPath];
      else registry.projects[projectPath] = { ...entry, profile: to };
    }
    if (touched.length > 0) saveProjectsRegistry(this.projectsFile, registry);
    return touched.sort();
  }

  /**
   * The directory project and local scope files live in: the nearest
   * project config, else the nearest registered project, else `dir`.
   */
  projectRoot(dir: string): string {
    return this.projectProfile(dir)?.root ?? this.localProfile(dir)?.root ?? path.resolve(dir);
  }
}
