import { z } from "zod";

type ZodSchemaShape = z.ZodRawShape;

/**
 * Reads every variable the schema names from `process.env` (or `source`),
 * coercing the raw strings to the field's type so the schema can validate them.
 */
export function buildDynamic(
  schema: z.ZodObject<ZodSchemaShape>,
  source: Record<string, string | undefined> = process.env
) {
  const envVarsToParse: Record<string, unknown> = {};
  for (const key of Object.keys(schema.shape)) {
    envVarsToParse[key] = coerceValue(key, source[key], schema);
  }
  return envVarsToParse;
}

function coerceValue(
  key: string,
  value: string | undefined,
  schema: z.ZodObject<ZodSchemaShape>
) {
  if (value === undefined || value === "") return undefined;

  let fieldSchema: z.ZodTypeAny = schema.shape[key];

  // Unwrap ZodDefault, ZodOptional and refinements to get the underlying type
  while (
    fieldSchema instanceof z.ZodDefault ||
    fieldSchema instanceof z.ZodOptional ||
    fieldSchema instanceof z.ZodEffects
  ) {
    fieldSchema =
      fieldSchema instanceof z.ZodEffects
        ? fieldSchema.innerType()
        : fieldSchema._def.innerType;
  }

  if (fieldSchema instanceof z.ZodNumber) {
    return Number(value);
  } else if (fieldSchema instanceof z.ZodBoolean) {
    return value.toLowerCase() === "true";
  } else if (fieldSchema instanceof z.ZodArray) {
    try {
      return JSON.parse(value);
    } catch {
      return value.split(",").map((item) => item.trim());
    }
  }

  return value;
}

/**
 * Defers validation until the variables are first read, so importing a module
 * never throws; the parsed result is memoized.
 */
export function lazilyValidate<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  environmentMap: Record<string, unknown>
): () => z.infer<z.ZodObject<T>> {
  let _variables: z.infer<z.ZodObject<T>> | null = null;

  return function validateEnvironment() {
    if (_variables) return _variables;

    const parsed = schema.safeParse(environmentMap);

    if (!parsed.success) {
      const invalid = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`Missing or invalid environment variables: ${invalid}`);
    }

    _variables = parsed.data;
    return _variables;
  };
}
