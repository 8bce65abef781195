import type { Marketplace, Scope } from "../profiles.js";
import { PluginHost, type HostResult } from "./base.js";

/** Selected with LOADOUT_HOST=none. Every fetch reports success without doing anything. */
export class NoopHost extends PluginHost {
  isAvailable(): boolean {
    return true;
  }

  addMarketplace(_marketplace: Marketplace): HostResult {
    return { ok: true, message: "skipped" };
  }

  installPlugin(_id: string, _scope: Scope, _projectRoot: string): HostResult {
    return { ok: true, message: "skipped" };
  }

  get displayName(): string {
    return "none";
  }
}
