import * as path from "path";
import type { PluginHost } from "./adapters/base.js";
import { ConfigStore, type Paths } from "./config.js";
import { ExtensionLibrary } from "./extensions.js";
import { EnabledRegistry } from "./registry.js";
import { ProfileRepository } from "./repository.js";

/** Everything an operation needs, built once per command. */
export interface Context {
  store: ConfigStore;
  repo: ProfileRepository;
  registry: EnabledRegistry;
  library: ExtensionLibrary;
  host: PluginHost;
}

export function createContext(
  paths: Paths,
  host: PluginHost,
  opts: { builtinDir?: string; now?: () => Date } = {},
): Context {
  const store = new ConfigStore(paths, opts.now);
  const registry = new EnabledRegistry(store.enabledFile);
  return {
    store,
    repo: new ProfileRepository(store, opts.builtinDir),
    registry,
    library: new ExtensionLibrary(store.extDir, path.resolve(paths.claudeDir), registry),
    host,
  };
}
