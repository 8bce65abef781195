import { Command } from "commander";
import { createTwoFilesPatch } from "diff";
import { profilesEqual, serializeProfile } from "../profiles.js";
import { NoCustomizationError } from "../errors.js";
import { resolveProfileName } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { info, styled } from "../ui.js";

function colorize(line: string): string {
  if (line.startsWith("+") && !line.startsWith("+++")) return styled(line, { color: "green" });
  if (line.startsWith("-") && !line.startsWith("---")) return styled(line, { color: "red" });
  if (line.startsWith("@@")) return styled(line, { color: "cyan" });
  return line;
}

export function profileDiffCommand(rt: Runtime): Command {
  return new Command("diff")
    .description("Compare a customized built-in profile with the version that ships")
    .argument("<name>", "Built-in profile name ('current' for the active one)")
    .action((name: string) => {
      const { repo, store } = rt.context();
      const resolved = resolveProfileName(store, rt.workingDir(), name).name;
      const original = repo.getBuiltIn(resolved);
      if (!repo.isCustomized(resolved)) throw new NoCustomizationError(resolved);

      const customized = repo.get(resolved);
      if (profilesEqual(original, customized)) {
        info("No differences from the built-in version");
        return;
      }

      const patch = createTwoFilesPatch(
        `built-in/${resolved}.json`,
        `profiles/${resolved}.json`,
        JSON.stringify(serializeProfile(original), null, 2) + "\n",
        JSON.stringify(serializeProfile(customized), null, 2) + "\n",
      );
      for (const line of patch.trimEnd().split("\n")) console.log(colorize(line));
    });
}
