import { z } from "zod";

type ZodSchemaShape = z.ZodRawShape;

/**
 * Collect the variables named by `schema` from `source`, coercing each raw
 * string to the type its field expects so the schema can validate it.
 */
export function buildDynamic(
  schema: z.ZodObject<ZodSchemaShape>,
  source: NodeJS.ProcessEnv = process.env,
) {
  return Object.keys(schema.shape).reduce<Record<string, unknown>>(
    (acc, key) => {
      acc[key] = coerceValue(key, source[key], schema);
      return acc;
    },
    {},
  );
}

function coerceValue(
  key: string,
  value: string | undefined,
  schema: z.ZodObject<ZodSchemaShape>,
) {
  if (value === undefined || value === "") return undefined;

  let fieldSchema: z.ZodTypeAny = schema.shape[key];

  // Unwrap ZodDefault and ZodOptional to get the underlying type
  while (
    fieldSchema instanceof z.ZodDefault ||
    fieldSchema instanceof z.ZodOptional
  ) {
    fieldSchema = fieldSchema._def.innerType;
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

// Lazy validation utility for environment variables
export function lazilyValidate<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  environmentMap: Record<string, unknown>,
): z.infer<z.ZodObject<T>> {
  let _variables: z.infer<z.ZodObject<T>> | null = null;

  function validateEnvironment() {
    if (_variables) return _variables;

    const parsed = schema.safeParse(environmentMap);

    if (!parsed.success) {
      throw new Error(
        `Missing or invalid environment variables: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} (${issue.message})`)
          .join(", ")}`,
      );
    }

    _variables = parsed.data;
    return _variables;
  }

  const target: z.infer<z.ZodObject<T>> = Object.create(null);
  return new Proxy(target, {
    get(_target, prop) {
      return Reflect.get(validateEnvironment(), prop);
    },
  });
}

export const pinoLevels = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

const environmentSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).optional(),
  LOG_LEVEL: z.enum(pinoLevels).optional(),
});

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema),
);
