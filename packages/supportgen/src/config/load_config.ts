import fs from "node:fs";
import defaults from "./defaults.json";
import { ConfigError } from "../errors";
import { GeneratorConfigSchema, type GeneratorConfig } from "./schema";

export type ConfigOverrides = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/** Objects merge key by key; arrays and scalars in `override` replace. */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfig(base[key], value);
  }
  return merged;
}

export function parseConfig(raw: unknown): GeneratorConfig {
  const result = GeneratorConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid generator configuration (${issues.length} issue(s))`, issues);
  }
  return result.data;
}

export function loadDefaultConfig(): GeneratorConfig {
  return parseConfig(defaults);
}

function readConfigFile(configPath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${String(err)}`);
  }
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${String(err)}`);
  }
}

/**
 * Defaults, then the optional JSON file, then explicit overrides.
 */
export function loadConfig(configPath?: string, overrides: ConfigOverrides = {}): GeneratorConfig {
  let raw: unknown = defaults;
  if (configPath) {
    raw = mergeConfig(raw, readConfigFile(configPath));
  }
  return parseConfig(mergeConfig(raw, overrides));
}
