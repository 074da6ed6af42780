import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { ParlorConfigSchema, type ParlorConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: ParlorConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env.PARLOR_CONFIG;
  if (customPath) {
    return path.resolve(customPath);
  }
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), ".parlor", "config.jsonc");
}

export function applyConfigDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
  } else if (isRecord(obj.logging) && !Object.hasOwn(obj.logging, "level")) {
    obj.logging = { ...obj.logging, level: "info" };
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
}

export function parseConfigText(raw: string, source: string): ConfigLoadResult {
  const parseErrors: ParseError[] = [];
  let config: unknown = parseJsonc(raw, parseErrors, {
    allowTrailingComma: true,
    allowEmptyContent: true,
  });
  if (parseErrors.length > 0) {
    return {
      success: false,
      errors: parseErrors.map(
        (error) => `offset ${error.offset}: ${printParseErrorCode(error.error)}`,
      ),
      path: source,
    };
  }

  config = replaceEnvVars(config ?? {});
  config = applyConfigDefaults(config);

  const result = ParlorConfigSchema.safeParse(config);
  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    return { success: false, errors, path: source };
  }

  return { success: true, config: result.data, path: source };
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
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    return parseConfigText(raw, resolvedPath);
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}
