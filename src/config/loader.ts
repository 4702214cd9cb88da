import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { GamelistConfigSchema, type GamelistConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: GamelistConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("~")) {
    return raw;
  }
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env.GAMELIST_CONFIG;
  if (customPath) {
    return path.resolve(customPath);
  }
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), ".gamelist", "config.jsonc");
}

export function applyConfigDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  const paths = isRecord(obj.paths) ? { ...obj.paths } : {};
  const baseDir =
    typeof paths.baseDir === "string" && paths.baseDir.trim()
      ? expandHomePath(paths.baseDir)
      : path.join(os.homedir(), ".gamelist");
  paths.baseDir = baseDir;
  paths.database =
    typeof paths.database === "string"
      ? expandHomePath(paths.database)
      : path.join(baseDir, "gamelist.db");
  obj.paths = paths;

  if (isRecord(obj.sheet) && typeof obj.sheet.credentialsFile === "string") {
    obj.sheet = { ...obj.sheet, credentialsFile: expandHomePath(obj.sheet.credentialsFile) };
  }

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
  } else if (isRecord(obj.logging) && !Object.hasOwn(obj.logging, "level")) {
    obj.logging = { ...obj.logging, level: "info" };
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const configDir = path.dirname(resolvedPath);
  for (const envFile of [".env", ".env.var"]) {
    const envPath = path.join(configDir, envFile);
    if (!fs.existsSync(envPath)) {
      continue;
    }
    const result = loadDotEnv({ path: envPath, override: false, quiet: true });
    if (result.error) {
      throw result.error;
    }
  }
}

function parseConfigText(raw: string): unknown {
  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    const first = parseErrors[0];
    throw new Error(`Invalid JSONC (${printParseErrorCode(first.error)} at offset ${first.offset})`);
  }
  return parsed;
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    let config = parseConfigText(fs.readFileSync(resolvedPath, "utf-8"));
    config = replaceEnvVars(config);
    config = applyConfigDefaults(config);

    const result = GamelistConfigSchema.safeParse(config);
    if (!result.success) {
      const errors = result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      );
      return { success: false, errors, path: resolvedPath };
    }

    return { success: true, config: result.data, path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}
