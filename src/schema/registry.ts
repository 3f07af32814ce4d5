import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvInstance } from "./ajv.js";

export const SCHEMA_DIR = fileURLToPath(new URL("../../schemas", import.meta.url));

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Version from an explicit `version` field or an `$id` ending in `@x.y.z`. */
function extractVersion(schema: unknown): string | null {
  if (!isRecord(schema)) return null;
  if (typeof schema.version === "string") return schema.version;
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

/**
 * Loads every `*.schema.json` in a directory and compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string = SCHEMA_DIR) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"))) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "pr-records.schema.json" → "pr-records"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }

    const ajv = await loadAjv();
    for (const entry of this.entries.values()) ajv.addSchema(entry.schema, entry.name);
    this.ajv = ajv;
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) result[name] = entry.version;
    return result;
  }

  /**
   * Validate data against a named schema. The caller names the type the
   * schema describes; the schema, not the compiler, is what guarantees it.
   */
  check<T>(name: string, data: unknown): SchemaCheck<T> {
    const ajv = this.ajv;
    if (!ajv) throw new Error("Schema registry used before load()");
    if (!this.entries.has(name)) throw new Error(`Schema not found: ${name}`);
    const validate = ajv.getSchema<T>(name);
    if (!validate) throw new Error(`Schema not compiled: ${name}`);
    if (validate(data)) return { valid: true, value: data };
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir);
  await registry.load();
  return registry;
}
