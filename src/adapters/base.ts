import type { Marketplace, Scope } from "../profiles.js";

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface HostResult {
  ok: boolean;
  /** Failure detail, or a note such as "already installed". */
  message?: string;
}

/**
 * The assistant-side collaborator that downloads and registers things.
 * Settings files are written by loadout itself; only fetching goes here.
 */
export abstract class PluginHost {
  abstract isAvailable(): boolean;
  abstract addMarketplace(marketplace: Marketplace): HostResult;
  abstract installPlugin(id: string, scope: Scope, projectRoot: string): HostResult;
  abstract get displayName(): string;
}
