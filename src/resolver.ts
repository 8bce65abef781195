import type { ConfigStore } from "./config.js";
import { InvalidScopeError, NotFoundError } from "./errors.js";
import { SCOPES, type Scope } from "./profiles.js";
import { CURRENT } from "./repository.js";

export type ActiveProfiles = Partial<Record<Scope, string>>;

export interface EffectiveProfile {
  name: string;
  scope: Scope;
}

/** Highest precedence first. */
export const PRECEDENCE: readonly Scope[] = ["project", "local", "user"];

export function parseScope(value: string): Scope {
  const scope = SCOPES.find((s) => s === value);
  if (!scope) throw new InvalidScopeError(value);
  return scope;
}

/**
 * Reads every pointer for `workingDir` from disk. The registry entry only
 * counts as the local pointer when no project config is found.
 */
export function resolveActive(store: ConfigStore, workingDir: string): ActiveProfiles {
  const active: ActiveProfiles = {};
  const user = store.userProfile();
  if (user) active.user = user;

  const project = store.projectProfile(workingDir);
  if (project) {
    active.project = project.profile;
  } else {
    const local = store.localProfile(workingDir);
    if (local) active.local = local.profile;
  }
  return active;
}

export function effectiveProfile(active: ActiveProfiles): EffectiveProfile | undefined {
  for (const scope of PRECEDENCE) {
    const name = active[scope];
    if (name) return { name, scope };
  }
  return undefined;
}

export interface ScopeQuery {
  scope: Scope;
  name?: string;
  /** Set when nothing is active at the scope. No other scope is consulted. */
  notice?: string;
}

export function activeForScope(store: ConfigStore, workingDir: string, scope: Scope): ScopeQuery {
  const name = resolveActive(store, workingDir)[scope];
  if (name) return { scope, name };
  return { scope, notice: `No profile active at ${scope} scope` };
}

/** Turns the reserved name into the effective profile; other names pass through. */
export function resolveProfileName(store: ConfigStore, workingDir: string, name: string): { name: string; scope?: Scope } {
  if (name !== CURRENT) return { name };
  const effective = effectiveProfile(resolveActive(store, workingDir));
  if (!effective) {
    throw new NotFoundError("profile", CURRENT, "No profile is active. Apply one with 'loadout profile apply <name>'");
  }
  return effective;
}
