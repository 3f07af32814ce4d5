import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { validateAll } from "../src/commands/validate.js";
import { tmpDir } from "./fakes.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

function copyConfig(): string {
  const dir = tmpDir();
  for (const file of fs.readdirSync(CONFIG_DIR)) {
    fs.copyFileSync(path.join(CONFIG_DIR, file), path.join(dir, file));
  }
  return dir;
}

describe("triagectl validate", () => {
  it("checks base and every environment layer", async () => {
    const res = await validateAll({ configDir: CONFIG_DIR, env: {} });
    expect(res).toEqual({ ok: true, checked: ["base.yaml", "base.yaml + llm.yaml", "base.yaml + strict.yaml"] });
  });

  it("checks a single layer when asked", async () => {
    const res = await validateAll({ configDir: CONFIG_DIR, envName: "strict", env: {} });
    expect(res).toEqual({ ok: true, checked: ["base.yaml + strict.yaml"] });
  });

  it("fails when config dir missing", async () => {
    const missing = path.join(tmpDir(), "definitely-not-exist");
    const res = await validateAll({ configDir: missing });
    expect(res).toEqual({
      ok: false,
      errors: [{ level: "error", code: "CONFIG_DIR_MISSING", message: `Config directory not found: ${missing}` }],
    });
  });

  it("fails when the schema directory has no config schema", async () => {
    const schemaDir = tmpDir();
    const res = await validateAll({ configDir: CONFIG_DIR, schemaDir, env: {} });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors[0].code).toBe("SCHEMA_MISSING");
    expect(res.errors[0].path).toBe(path.join(schemaDir, "config.schema.json"));
  });

  it("reports the layer that breaks validation", async () => {
    const dir = copyConfig();
    fs.writeFileSync(path.join(dir, "broken.yaml"), "conflict_resolution:\n  brace_style: gnu\n");
    const res = await validateAll({ configDir: dir, env: {} });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors).toHaveLength(1);
    expect(res.errors[0].code).toBe("CONFIG_INVALID");
    expect(res.errors[0].path).toBe(path.join(dir, "broken.yaml"));
    expect(res.errors[0].message.startsWith("Config invalid (base.yaml + broken.yaml): ")).toBe(true);
  });
});
