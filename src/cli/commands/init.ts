import fs from "node:fs";
import path from "node:path";
import pc from "picocolors";
import { loadConfig, resolveConfigPath } from "../../config";
import { closeDb, initDb } from "../../storage/db";

const CONFIG_TEMPLATE_URL = new URL("../../../config.example.jsonc", import.meta.url);

export interface InitReport {
  configPath: string;
  wroteTemplate: boolean;
  /** Set once the database exists and is migrated. */
  databasePath?: string;
  errors: string[];
}

export function initializeWorkspace(
  configPath: string,
  options: { reset?: boolean } = {},
): InitReport {
  let wroteTemplate = false;
  if (options.reset || !fs.existsSync(configPath)) {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.copyFileSync(CONFIG_TEMPLATE_URL, configPath);
    wroteTemplate = true;
  }

  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    return { configPath, wroteTemplate, errors: result.errors ?? [] };
  }

  const databasePath = result.config.paths?.database;
  if (!databasePath) {
    return { configPath, wroteTemplate, errors: ["paths.database is not set"] };
  }
  initDb(databasePath);
  closeDb();
  return { configPath, wroteTemplate, databasePath, errors: [] };
}

export async function runInit(options: { config?: string; reset?: boolean }): Promise<void> {
  const report = initializeWorkspace(resolveConfigPath(options.config), options);

  if (report.wroteTemplate) {
    console.log(pc.dim(`  Wrote configuration template to ${report.configPath}`));
  } else {
    console.log(pc.dim(`  Using configuration at ${report.configPath}`));
  }

  if (report.errors.length > 0) {
    console.log(pc.yellow("\n⚠️  The configuration is not complete yet:"));
    for (const error of report.errors) {
      console.log(`- ${error}`);
    }
    console.log(pc.dim("\nFill it in, then run `gamelist init` again to create the database."));
    return;
  }

  console.log(pc.green(`✅ Database ready at ${report.databasePath}`));
}
