import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvError = {
  instancePath: string;
  keyword: string;
  message?: string;
  params: Record<string, unknown>;
};

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: AjvError[] | null };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
  removeSchema: (schema: unknown) => unknown;
};

export async function loadAjv(): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}

/** Render Ajv errors as `"<path>: <message>"`, root path shown as `/`. */
export function formatAjvErrors(errors: AjvError[] | null | undefined): string[] {
  if (!errors) return [];
  return errors.map((e) => {
    const where = e.instancePath || "/";
    const extra = typeof e.params.additionalProperty === "string" ? ` '${e.params.additionalProperty}'` : "";
    return `${where}: ${e.message ?? e.keyword}${extra}`;
  });
}
