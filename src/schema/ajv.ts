import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  addSchema: (schema: unknown, key: string) => unknown;
  getSchema: <T = unknown>(key: string) => AjvValidateFn<T> | undefined;
  errorsText: (errors: unknown) => string;
};

/** Draft 2020-12 validator with formats (date-time for PR merge times). */
export async function loadAjv(): Promise<AjvInstance> {
  // ESM interop: both packages publish their constructor as a CommonJS default
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}
