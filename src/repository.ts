import * as fs from "fs";
import * as path from "path";
import type { ConfigStore } from "./config.js";
import {
  AlreadyExistsError,
  CannotDeleteError,
  NoCustomizationError,
  NotBuiltInError,
  NotFoundError,
  errorMessage,
} from "./errors.js";
import { writeJsonAtomic } from "./json.js";
import { groupProfiles, type GroupedProfiles, type ProfileSummary } from "./presentation.js";
import {
  builtinProfilesDir,
  displayDescription,
  loadProfileFile,
  serializeProfile,
  validateProfileName,
  type Profile,
  type Scope,
} from "./profiles.js";

/** Refers to the effective active profile wherever a profile name is taken. */
export const CURRENT = "current";

interface TableEntry {
  builtin?: Profile;
  overlay?: Profile;
  overlayFile?: string;
}

export interface ListResult extends GroupedProfiles {
  warnings: string[];
}

export interface PointerChanges {
  scopes: Scope[];
  /** Project config file removed or rewritten, when one named the profile. */
  projectFile?: string;
  localPaths: string[];
}

function collectJsonFiles(dir: string, base: string, out: string[]): void {
  if (!fs.existsSync(dir)) return;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith(".")) continue;
    const rel = base ? `${base}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      collectJsonFiles(path.join(dir, entry.name), rel, out);
    } else if (entry.isFile() && entry.name.endsWith(".json")) {
      out.push(rel);
    }
  }
}

/**
 * Built-in profiles ship with the package and are read-only. A user file
 * under the same name is an overlay: it wins on `get` and is what
 * `restore` removes. Every call re-reads both directories.
 */
export class ProfileRepository {
  private readonly store: ConfigStore;
  private readonly builtinDir: string;

  constructor(store: ConfigStore, builtinDir: string = builtinProfilesDir()) {
    this.store = store;
    this.builtinDir = builtinDir;
  }

  private table(warnings: string[] = []): Map<string, TableEntry> {
    const table = new Map<string, TableEntry>();

    const builtinFiles: string[] = [];
    collectJsonFiles(this.builtinDir, "", builtinFiles);
    for (const rel of builtinFiles) {
      const name = rel.slice(0, -".json".length);
      try {
        table.set(name, { builtin: loadProfileFile(path.join(this.builtinDir, rel), name) });
      } catch (err: unknown) {
        warnings.push(`Skipping built-in profile ${name}: ${errorMessage(err)}`);
      }
    }

    const userFiles: string[] = [];
    collectJsonFiles(this.store.profilesDir, "", userFiles);
    for (const rel of userFiles) {
      const name = rel.slice(0, -".json".length);
      const file = path.join(this.store.profilesDir, rel);
      if (name === CURRENT) {
        warnings.push(`Profile "${CURRENT}" uses a reserved name. Rename it with 'loadout profile rename ${CURRENT} <new-name>'`);
      }
      try {
        const entry = table.get(name) ?? {};
        table.set(name, { ...entry, overlay: loadProfileFile(file, name), overlayFile: file });
      } catch (err: unknown) {
        warnings.push(`Skipping invalid profile ${name}: ${errorMessage(err)}`);
      }
    }

    return table;
  }

  private fileFor(name: string): string {
    return path.join(this.store.profilesDir, `${name}.json`);
  }

  summaries(warnings: string[] = []): ProfileSummary[] {
    return [...this.table(warnings).entries()].map(([name, entry]) => {
      const effective = entry.overlay ?? entry.builtin;
      return {
        name,
        description: effective ? displayDescription(effective) : "",
        builtIn: entry.builtin !== undefined,
        customized: entry.builtin !== undefined && entry.overlay !== undefined,
      };
    });
  }

  list(includeHidden: boolean): ListResult {
    const warnings: string[] = [];
    const grouped = groupProfiles(this.summaries(warnings), { showAll: includeHidden });
    return { ...grouped, warnings };
  }

  exists(name: string): boolean {
    return this.isBuiltIn(name) || fs.existsSync(this.fileFor(name));
  }

  /** Overlay if present, else the built-in. A file that fails to load is an error, never a fallback. */
  get(name: string): Profile {
    validateProfileName(name);
    const overlay = this.fileFor(name);
    if (fs.existsSync(overlay)) return loadProfileFile(overlay, name);
    if (this.isBuiltIn(name)) return this.getBuiltIn(name);
    throw new NotFoundError("profile", name);
  }

  /** The shipped definition, ignoring any overlay. */
  getBuiltIn(name: string): Profile {
    const file = path.join(this.builtinDir, `${name}.json`);
    if (!fs.existsSync(file)) throw new NotBuiltInError(name);
    return loadProfileFile(file, name);
  }

  isBuiltIn(name: string): boolean {
    return fs.existsSync(path.join(this.builtinDir, `${name}.json`));
  }

  isCustomized(name: string): boolean {
    return this.isBuiltIn(name) && fs.existsSync(this.fileFor(name));
  }

  /**
   * Writes the profile atomically. Saving under a built-in's name writes
   * its overlay; replacing an existing user profile needs `overwrite`.
   */
  save(profile: Profile, opts: { overwrite?: boolean } = {}): string {
    validateProfileName(profile.name);
    const file = this.fileFor(profile.name);
    if (!opts.overwrite && !this.isBuiltIn(profile.name) && fs.existsSync(file)) {
      throw new AlreadyExistsError("profile", profile.name);
    }
    writeJsonAtomic(file, serializeProfile(profile));
    return file;
  }

  /** Fails on any existing name, built-in or not. */
  create(profile: Profile): string {
    validateProfileName(profile.name);
    if (this.exists(profile.name)) {
      throw new AlreadyExistsError("profile", profile.name, `Use 'loadout profile show ${profile.name}' to inspect it`);
    }
    return this.save(profile);
  }

  clone(from: string, to: string, description?: string): Profile {
    const source = this.get(from);
    const copy: Profile = { ...source, name: to, description: description ?? source.description };
    this.create(copy);
    return copy;
  }

  delete(name: string, opts: { workingDir: string }): PointerChanges {
    if (this.isBuiltIn(name)) {
      if (this.isCustomized(name)) {
        throw new CannotDeleteError(
          `profile "${name}" is a customized built-in profile. Use 'loadout profile restore ${name}' instead`,
        );
      }
      throw new CannotDeleteError(`profile "${name}" is a built-in profile and cannot be deleted`);
    }
    const file = this.fileFor(name);
    if (!fs.existsSync(file)) throw new NotFoundError("profile", name);

    this.removeFile(file);
    return this.repoint(name, undefined, opts.workingDir);
  }

  /** Drops the overlay so the shipped definition is in effect again. */
  restore(name: string): void {
    if (!this.isBuiltIn(name)) throw new NotBuiltInError(name);
    const file = this.fileFor(name);
    if (!fs.existsSync(file)) throw new NoCustomizationError(name);
    this.removeFile(file);
  }

  rename(from: string, to: string, opts: { workingDir: string }): PointerChanges {
    if (this.isBuiltIn(from)) {
      throw new CannotDeleteError(
        `profile "${from}" is a built-in profile and cannot be renamed. Use 'loadout profile create ${to} --from ${from}' instead`,
      );
    }
    validateProfileName(to);
    const file = this.fileFor(from);
    if (!fs.existsSync(file)) throw new NotFoundError("profile", from);
    if (this.exists(to)) throw new AlreadyExistsError("profile", to);

    const profile = loadProfileFile(file, from);
    this.save({ ...profile, name: to });
    this.removeFile(file);
    return this.repoint(from, to, opts.workingDir);
  }

  private removeFile(file: string): void {
    fs.rmSync(file);
    // prune directories left empty by nested names
    let dir = path.dirname(file);
    const root = path.resolve(this.store.profilesDir);
    while (path.resolve(dir) !== root && fs.readdirSync(dir).length === 0) {
      fs.rmdirSync(dir);
      dir = path.dirname(dir);
    }
  }

  /** Moves (or clears, when `to` is undefined) every pointer naming `from`. */
  private repoint(from: string, to: string | undefined, workingDir: string): PointerChanges {
    const changes: PointerChanges = { scopes: [], localPaths: [] };

    if (this.store.userProfile() === from) {
      this.store.setUserProfile(to);
      changes.scopes.push("user");
    }

    const project = this.store.projectProfile(workingDir);
    if (project && project.profile === from) {
      if (to === undefined) fs.rmSync(project.file);
      else this.store.setProjectProfile(project.root, to);
      changes.scopes.push("project");
      changes.projectFile = project.file;
    }

    changes.localPaths = this.store.replaceLocalEntries(from, to);
    if (changes.localPaths.length > 0) changes.scopes.push("local");

    return changes;
  }
}
