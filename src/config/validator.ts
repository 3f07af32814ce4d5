import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { TriageConfig } from "../types/config.js";
import { loadConfig, type LoadOptions } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: TriageConfig }
  | { valid: false; errors: string };

/** Validate a merged config against schemas/config.schema.json. */
export async function validateConfig(
  config: unknown,
  registry?: SchemaRegistry,
): Promise<ConfigValidationResult> {
  const schemas = registry ?? (await createRegistry());
  const check = schemas.check<TriageConfig>("config", config);
  return check.valid ? { valid: true, config: check.value } : { valid: false, errors: check.errors };
}

/** Load every layer and validate the result. Load failures are reported like schema errors. */
export async function loadValidatedConfig(
  options: LoadOptions = {},
  registry?: SchemaRegistry,
): Promise<ConfigValidationResult> {
  let raw: unknown;
  try {
    raw = loadConfig(options);
  } catch (err) {
    return { valid: false, errors: err instanceof Error ? err.message : String(err) };
  }
  return validateConfig(raw, registry);
}
