import { Command, CommanderError } from "commander";
import { extensionsCommand } from "./commands/extensions.js";
import { mcpCommand } from "./commands/mcp.js";
import { pluginCommand } from "./commands/plugin.js";
import { profileCommand } from "./commands/profile.js";
import { scopeCommand } from "./commands/scope.js";
import { errorMessage } from "./errors.js";
import { createRuntime, type RuntimeOptions } from "./runtime.js";
import { error, setVerbose } from "./ui.js";

export const VERSION = "0.1.0";

interface GlobalOptions {
  verbose?: boolean;
  directory?: string;
}

function throwInsteadOfExit(command: Command): void {
  command.exitOverride();
  for (const sub of command.commands) throwInsteadOfExit(sub);
}

export function createProgram(opts: RuntimeOptions = {}): Command {
  const program = new Command();
  const rt = createRuntime(opts, () => program.opts<GlobalOptions>().directory);

  program
    .name("loadout")
    .description("Declarative profiles for coding assistant plugins, MCP servers and extensions")
    .version(VERSION, "-V, --version", "Output the version number")
    .option("-v, --verbose", "Verbose output")
    .option("-C, --directory <dir>", "Run as if started in <dir>")
    .hook("preAction", () => {
      setVerbose(program.opts<GlobalOptions>().verbose === true);
    });

  program.addCommand(profileCommand(rt));
  program.addCommand(scopeCommand(rt));
  program.addCommand(pluginCommand(rt));
  program.addCommand(extensionsCommand(rt));
  program.addCommand(mcpCommand(rt));

  throwInsteadOfExit(program);
  return program;
}

/** Runs one command line and returns the exit code. */
export async function run(args: string[], opts: RuntimeOptions = {}): Promise<number> {
  const program = createProgram(opts);
  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (err: unknown) {
    // commander has already printed its own usage errors
    if (err instanceof CommanderError) return err.exitCode;
    error(errorMessage(err));
    return 1;
  }
}
