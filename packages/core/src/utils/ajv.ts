// pattern: Functional Core
import { Ajv } from "ajv";
import ajvErrors from "ajv-errors";
import ajvFormats from "ajv-formats";

// Both plugins are CommonJS; the callable lives on `default` under NodeNext
const addErrors = ajvErrors.default;
const addFormats = ajvFormats.default;

// Shared AJV instance for the typebox schemas of settings and recordings
const ajv = new Ajv({
  // TypeBox adds Symbol-keyed attributes
  strict: false,
  allowUnionTypes: true,
  // Required for ajv-errors
  allErrors: true,
});

addFormats(ajv, ["date-time", "uri"]);
addErrors(ajv);

/**
 * `path: message` lines for the errors of the last validation
 */
export function formatValidationErrors(
  errors: ReadonlyArray<{ instancePath: string; message?: string }> | null | undefined
): string[] {
  return (errors ?? []).map(err => `${err.instancePath || "root"}: ${err.message ?? "is invalid"}`);
}

export { ajv };
