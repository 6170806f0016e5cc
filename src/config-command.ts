/**
 * `cliai config [--init] [--profile name]`
 *
 * Shows where configuration lives, the profiles in both scopes and the
 * settings a chat would start with. --init writes the global defaults.
 */

import chalk from "chalk";
import type { CliConfig } from "./cli.js";
import {
  configExists,
  getLocalConfigPath,
  listProfiles,
  loadConfig,
  loadLocalConfig,
  resolveSettings,
  writeDefaultConfig,
  type ProfileScope,
} from "./profile-config.js";
import { CONFIG_FILE } from "./config.js";
import { maskCredential } from "./logger.js";

/**
 * Format a scope badge for display
 */
function scopeBadge(scope: ProfileScope, shadowed?: boolean): string {
  if (scope === "local") {
    return chalk.magenta("[local]");
  }
  if (shadowed) {
    return chalk.dim("[global, shadowed]");
  }
  return chalk.dim("[global]");
}

export async function configCommand(cli: CliConfig): Promise<void> {
  if (cli.init) {
    if (writeDefaultConfig()) {
      console.log(chalk.green(`Created ${CONFIG_FILE}`));
    } else {
      console.log(`${CONFIG_FILE} already exists; leaving it unchanged.`);
    }
  }

  const localPath = getLocalConfigPath();
  const global = loadConfig();
  const local = loadLocalConfig();

  console.log(chalk.bold("\nConfiguration files"));
  console.log(`  Global: ${CONFIG_FILE} ${configExists() ? "" : chalk.dim("(missing)")}`);
  console.log(`  Local:  ${localPath} ${local ? "" : chalk.dim("(missing)")}`);

  const profiles = listProfiles(global, local);
  console.log(chalk.bold("\nProfiles"));
  if (profiles.length === 0) {
    console.log(chalk.gray("  No profiles. Run 'cliai config --init' to create one."));
  }
  for (const p of profiles) {
    const marker = p.isDefault ? chalk.green("*") : " ";
    const target = [p.settings.model, p.settings.endpoint].filter(Boolean).join(" @ ");
    console.log(`  ${marker} ${chalk.bold(p.name)} ${scopeBadge(p.scope, p.shadowed)} ${chalk.gray(target)}`);
  }

  const settings = resolveSettings({ global, local, env: process.env, cli: cli.overrides });
  const { profile, allowlist, retry, redact } = settings;
  console.log(chalk.bold(`\nEffective settings (profile '${settings.profileName}')`));
  console.log(`  Endpoint:    ${profile.endpoint}`);
  console.log(`  Model:       ${profile.model}`);
  console.log(`  API key:     ${profile.apiKey ? maskCredential(profile.apiKey) : "(none)"}`);
  console.log(`  Streaming:   ${profile.stream ? "yes" : "no"}`);
  console.log(`  Timeout:     ${profile.timeoutMs}ms`);
  console.log(`  Retry:       ${retry.maxAttempts} attempt(s), base ${retry.baseDelayMs}ms, max ${retry.maxDelayMs}ms`);
  console.log(
    `  Allowlist:   ${allowlist.enforced ? "enforced" : "off"} (${allowlist.allowedHosts.join(", ") || "empty"})`
  );
  console.log(`  Redaction:   ${redact.enabled ? "on" : "off"} (${Object.keys(redact.terms).length} custom term(s))`);
  if (settings.interceptorPath) {
    console.log(`  Interceptor: ${settings.interceptorPath}`);
  }
  console.log("");
}
