import { Command } from "commander";
import {
  EXTENSION_CATEGORIES,
  SCOPES,
  displayDescription,
  marketplaceKey,
  type McpServer,
  type SecretSource,
} from "../profiles.js";
import { resolveProfileName } from "../resolver.js";
import type { Runtime } from "../runtime.js";
import { info, heading, blank, list, muted, styled } from "../ui.js";

export function formatSource(source: SecretSource): string {
  const detail = source.key ?? source.ref ?? [source.service, source.account].filter(Boolean).join("/");
  return detail ? `${source.type}:${detail}` : source.type;
}

export function formatServer(server: McpServer): string {
  return [server.command, ...(server.args ?? [])].join(" ");
}

export function profileShowCommand(rt: Runtime): Command {
  return new Command("show")
    .description("Show what a profile declares ('current' for the active one)")
    .argument("<name>", "Profile name")
    .action((name: string) => {
      const { repo, store } = rt.context();
      const resolved = resolveProfileName(store, rt.workingDir(), name);
      const profile = repo.get(resolved.name);

      const tags: string[] = [];
      if (repo.isBuiltIn(profile.name)) tags.push("built-in");
      if (repo.isCustomized(profile.name)) tags.push("customized");
      if (resolved.scope) tags.push(`active at ${resolved.scope} scope`);

      heading(`Profile: ${profile.name}${tags.length > 0 ? ` ${muted(`(${tags.join(", ")})`)}` : ""}`);
      info(displayDescription(profile));

      if (profile.marketplaces.length > 0) {
        heading("Marketplaces");
        list(profile.marketplaces.map((m) => `${marketplaceKey(m)} ${muted(`(${m.source})`)}`));
      }

      for (const scope of SCOPES) {
        const settings = profile.perScope[scope];
        if (!settings) continue;
        if (settings.plugins.length > 0) {
          heading(`Plugins (${scope})`);
          list(settings.plugins);
        }
        if (settings.mcpServers.length > 0) {
          heading(`MCP servers (${scope})`);
          for (const server of settings.mcpServers) {
            info(`  - ${styled(server.name, { bold: true })}: ${formatServer(server)}`);
            const secrets = server.secrets ?? {};
            for (const secret of Object.keys(secrets).sort()) {
              const sources = secrets[secret].sources.map(formatSource).join(", ");
              info(`      ${secret} ${muted(`(${sources || "no sources"})`)}`);
            }
          }
        }
      }

      const categories = EXTENSION_CATEGORIES.filter((c) => (profile.extensions[c] ?? []).length > 0);
      if (categories.length > 0) {
        heading("Extensions");
        for (const category of categories) {
          info(`  ${category}: ${(profile.extensions[category] ?? []).join(", ")}`);
        }
      }
      blank();
    });
}
