import type { Command } from "../Command";
import type { VersionInfo } from "../config";

export function renderVersion(version: VersionInfo): string {
  const note = version.message ? `\n📝 ${version.message}` : "";
  return [
    "🔧 **Bot version**",
    `• Commit: \`${version.sha.slice(0, 7)}\` (${version.ref})`,
    `• Author: ${version.author}`,
    `• Build: ${version.time}${note}`,
  ].join("\n");
}

export function renderStartupNotice(version: VersionInfo): string {
  return renderVersion(version).replace("🔧 **Bot version**", "🚀 **Bot started or updated**");
}

export const Version: Command = {
  name: "version",
  description: "Show the running bot version",
  build: async (_args, { config }) => renderVersion(config.version),
};
