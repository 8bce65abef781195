import type { PluginHost } from "./base.js";
import { ClaudeCliHost } from "./claude.js";
import { NoopHost } from "./noop.js";

export { PluginHost, type HostResult, type RunResult } from "./base.js";
export { ClaudeCliHost } from "./claude.js";
export { NoopHost } from "./noop.js";

export function createHost(config: { type: string; bin?: string }): PluginHost {
  switch (config.type) {
    case "claude":
      return new ClaudeCliHost(config.bin);
    case "none":
      return new NoopHost();
    default:
      throw new Error(`Unknown host type: ${config.type}`);
  }
}
