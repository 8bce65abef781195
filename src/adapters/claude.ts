import { spawnSync } from "child_process";
import { marketplaceKey, type Marketplace, type Scope } from "../profiles.js";
import { debug } from "../ui.js";
import { PluginHost, type HostResult, type RunResult } from "./base.js";

const ALREADY_DONE = /already (installed|exists|added)/i;

/** Drives the assistant's own `plugin` subcommands. */
export class ClaudeCliHost extends PluginHost {
  private readonly bin: string;

  constructor(bin = "claude") {
    super();
    this.bin = bin;
  }

  isAvailable(): boolean {
    return this.run(["--version"]).exitCode === 0;
  }

  run(args: string[], cwd?: string): RunResult {
    debug(`$ ${this.bin} ${args.join(" ")}`);
    const result = spawnSync(this.bin, args, { encoding: "utf-8", cwd });
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? (result.error ? result.error.message : ""),
      exitCode: result.status ?? 1,
    };
  }

  addMarketplace(marketplace: Marketplace): HostResult {
    return this.outcome(this.run(["plugin", "marketplace", "add", marketplaceKey(marketplace)]));
  }

  installPlugin(id: string, scope: Scope, projectRoot: string): HostResult {
    return this.outcome(this.run(["plugin", "install", "--scope", scope, id], projectRoot));
  }

  private outcome(result: RunResult): HostResult {
    const output = `${result.stdout}\n${result.stderr}`.trim();
    if (result.exitCode === 0) return { ok: true };
    if (ALREADY_DONE.test(output)) return { ok: true, message: "already installed" };
    return { ok: false, message: output || `${this.bin} exited with code ${result.exitCode}` };
  }

  get displayName(): string {
    return this.bin;
  }
}
