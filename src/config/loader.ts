import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));
export const ENV_PREFIX = "TRIAGE_";

export type RawConfig = Record<string, unknown>;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Parse a YAML layer. A missing file is an empty layer; a non-mapping document is an error. */
export function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`${filePath}: top level must be a mapping`);
  }
  return parsed;
}

/** "true"/"false" become booleans, numerals become numbers, anything else stays a string. */
export function coerceEnvValue(value: string): string | number | boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

/**
 * Apply TRIAGE_ prefixed overrides. `__` separates nesting levels:
 * TRIAGE_LLM__MAX_CALLS_PER_RUN=3 sets llm.max_calls_per_run.
 */
export function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let override: RawConfig = { [segments[segments.length - 1]]: coerceEnvValue(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      override = { [segments[i]]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

export type LoadOptions = {
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: base.yaml ← <env>.yaml ← environment variables.
 * The result is unvalidated; see `loadValidatedConfig`.
 */
export function loadConfig(options: LoadOptions = {}): RawConfig {
  const dir = options.configDir ?? CONFIG_DIR;
  const basePath = path.join(dir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    throw new Error(`base configuration not found: ${basePath}`);
  }

  let merged = loadYaml(basePath);
  if (options.envName) {
    const envPath = path.join(dir, `${options.envName}.yaml`);
    if (!fs.existsSync(envPath)) {
      throw new Error(`environment configuration not found: ${envPath}`);
    }
    merged = deepMerge(merged, loadYaml(envPath));
  }

  return applyEnvOverrides(merged, options.env ?? process.env);
}

/** Environment names available in a config directory (every YAML file but base). */
export function listEnvironments(configDir: string = CONFIG_DIR): string[] {
  if (!fs.existsSync(configDir)) return [];
  return fs
    .readdirSync(configDir)
    .filter((f) => f.endsWith(".yaml") && f !== "base.yaml")
    .map((f) => f.replace(/\.yaml$/, ""))
    .sort();
}
