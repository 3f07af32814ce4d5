import { describe, expect, it, beforeAll } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";
import { tmpDir } from "./fakes.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual(["config", "pr-records"]);
  });

  it("reads versions from the schema $id", () => {
    expect(registry.versions()).toEqual({ config: "1.0.0", "pr-records": "1.0.0" });
  });

  describe("pr-records schema", () => {
    it("accepts valid records", () => {
      const data = [{ number: 4, files_changed: ["a.c"], merged_at: "2026-02-09T10:00:00Z" }];
      expect(registry.check("pr-records", data)).toEqual({ valid: true, value: data });
    });

    it("rejects records missing required fields", () => {
      const result = registry.check("pr-records", [{ number: 4 }]);
      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.errors).toContain("must have required property 'files_changed'");
    });
  });

  it("throws for unknown schemas", () => {
    expect(() => registry.check("missing", {})).toThrow("Schema not found: missing");
  });

  it("must be loaded before use", () => {
    expect(() => new SchemaRegistry(SCHEMA_DIR).check("config", {})).toThrow("Schema registry used before load()");
  });

  it("fails to load a missing directory", async () => {
    const missing = path.join(tmpDir(), "none");
    await expect(createRegistry(missing)).rejects.toThrow(`Schema directory not found: ${missing}`);
  });

  it("falls back to 1.0.0 when a schema carries no version", async () => {
    const dir = tmpDir();
    fs.writeFileSync(path.join(dir, "plain.schema.json"), JSON.stringify({ type: "object" }));
    const plain = await createRegistry(dir);
    expect(plain.versions()).toEqual({ plain: "1.0.0" });
  });
});
