import fs from "node:fs";
import path from "node:path";
import { listEnvironments } from "../config/loader.js";
import { loadValidatedConfig } from "../config/validator.js";
import { createRegistry, SCHEMA_DIR, type SchemaRegistry } from "../schema/registry.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult = { ok: true; checked: string[] } | { ok: false; errors: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/**
 * Validate the merged configuration for base alone and for base layered with
 * each environment file (or only `envName` when given). Environment files are
 * partial, so they are never validated on their own.
 */
export async function validateAll(opts: {
  configDir: string;
  envName?: string;
  schemaDir?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const configDir = path.resolve(opts.configDir);
  const schemaDir = opts.schemaDir ? path.resolve(opts.schemaDir) : SCHEMA_DIR;

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }
  if (!fs.existsSync(schemaDir)) {
    return { ok: false, errors: [diag("error", "SCHEMA_DIR_MISSING", `Schema directory not found: ${schemaDir}`)] };
  }

  let registry: SchemaRegistry;
  try {
    registry = await createRegistry(schemaDir);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, errors: [diag("error", "SCHEMA_LOAD_FAILED", `Failed to load schemas: ${message}`, { path: schemaDir })] };
  }
  if (!registry.names().includes("config")) {
    const schemaPath = path.join(schemaDir, "config.schema.json");
    return { ok: false, errors: [diag("error", "SCHEMA_MISSING", `Missing schema: ${schemaPath}`, { path: schemaPath })] };
  }

  const layers: (string | undefined)[] = opts.envName ? [opts.envName] : [undefined, ...listEnvironments(configDir)];
  const errors: Diagnostic[] = [];
  const checked: string[] = [];

  for (const envName of layers) {
    const label = envName ? `base.yaml + ${envName}.yaml` : "base.yaml";
    const result = await loadValidatedConfig({ configDir, envName, env: opts.env }, registry);
    checked.push(label);
    if (!result.valid) {
      errors.push(
        diag("error", "CONFIG_INVALID", `Config invalid (${label}): ${result.errors}`, {
          path: path.join(configDir, envName ? `${envName}.yaml` : "base.yaml"),
        }),
      );
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, checked };
}
