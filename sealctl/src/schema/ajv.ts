import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { separator?: string; dataVar?: string }) => string;
};

let shared: AjvInstance | null = null;

export function loadAjv(): AjvInstance {
  if (shared) return shared;
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}

export type Validator<T> = {
  /** Narrowing check. */
  is(data: unknown): data is T;
  /** Errors of the last failed `is` call, as one line. */
  lastErrors(): string;
};

/** Compile a JSON Schema into a type guard for `T`. */
export function compileValidator<T>(schema: object, dataVar = "data"): Validator<T> {
  const ajv = loadAjv();
  const validate = ajv.compile(schema);
  let last = "";
  return {
    is(data: unknown): data is T {
      const ok = validate(data);
      last = ok ? "" : ajv.errorsText(validate.errors, { separator: "; ", dataVar });
      return ok;
    },
    lastErrors: () => last,
  };
}
