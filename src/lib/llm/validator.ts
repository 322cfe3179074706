import Ajv, { type ErrorObject, type JSONSchemaType } from "ajv";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  coerceTypes: true,
  useDefaults: true,
  removeAdditional: "failing",
});

export type SchemaValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

/**
 * Validates (and, through ajv's coercion options, lightly repairs) a payload.
 * Compiled validators are cached by ajv per schema object.
 */
export function validateWithSchema<T>(
  schema: JSONSchemaType<T>,
  payload: unknown
): SchemaValidationResult<T> {
  const validator = ajv.compile<T>(schema);

  if (validator(payload)) {
    return {
      success: true,
      data: payload,
    };
  }

  return {
    success: false,
    errors: formatAjvErrors(validator.errors),
  };
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors?.length) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath ? error.instancePath : error.schemaPath.replace("#/", "");
    return `${path || "(root)"} ${error.message ?? ""}`.trim();
  });
}
