import pc from "picocolors";
import { loadConfig, type GamelistConfig } from "../../config";

/** Loads and validates the config, printing every problem and exiting on failure. */
export function requireConfig(configPath?: string): GamelistConfig {
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    console.error(pc.red(`❌ Invalid config file: ${result.path}`));
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }
  return result.config;
}
