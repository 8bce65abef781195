import * as path from "path";
import * as clack from "@clack/prompts";
import { createHost, type PluginHost } from "./adapters/index.js";
import { resolvePaths } from "./config.js";
import { createContext, type Context } from "./context.js";

/** What commands reach for at action time; tests swap the pieces. */
export interface Runtime {
  context(): Context;
  workingDir(): string;
  confirm(message: string): Promise<boolean>;
}

export interface RuntimeOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  host?: PluginHost;
  builtinDir?: string;
  confirm?: (message: string) => Promise<boolean>;
}

async function promptConfirm(message: string): Promise<boolean> {
  const answer = await clack.confirm({ message, initialValue: false });
  return !clack.isCancel(answer) && answer === true;
}

export function createRuntime(opts: RuntimeOptions, directory: () => string | undefined): Runtime {
  const env = opts.env ?? process.env;
  let ctx: Context | undefined;
  return {
    context() {
      ctx ??= createContext(
        resolvePaths(env),
        opts.host ?? createHost({ type: env.LOADOUT_HOST ?? "claude", bin: env.LOADOUT_CLAUDE_BIN }),
        { builtinDir: opts.builtinDir },
      );
      return ctx;
    },
    workingDir() {
      return path.resolve(opts.cwd ?? process.cwd(), directory() ?? ".");
    },
    confirm: opts.confirm ?? promptConfirm,
  };
}
