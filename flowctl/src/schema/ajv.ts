import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

/** A compiled schema that narrows its input; errorsText() describes the last failure. */
export type SchemaGuard<T> = ((data: unknown) => data is T) & { errorsText: () => string };

let shared: AjvInstance | null = null;

function loadAjv(): AjvInstance {
  if (shared) return shared;
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);
  shared = ajv;
  return ajv;
}

export function compileGuard<T>(schema: object): SchemaGuard<T> {
  const ajv = loadAjv();
  const validate = ajv.compile(schema);
  const guard = (data: unknown): data is T => validate(data);
  return Object.assign(guard, { errorsText: () => ajv.errorsText(validate.errors) });
}
