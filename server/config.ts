import { z } from "zod";

// Blank entries in .env ("KEY=") count as unset.
const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().trim().optional());

const envFlag = (defaultValue: boolean) =>
  z.preprocess(
    blankAsUndefined,
    z
      .enum(["true", "false", "1", "0", "yes", "no"])
      .optional()
      .transform((value) => (value === undefined ? defaultValue : ["true", "1", "yes"].includes(value)))
  );

const envNumber = (defaultValue: number, schema: z.ZodNumber = z.number()) =>
  z.preprocess(blankAsUndefined, z.coerce.number().pipe(schema).default(defaultValue));

export const envSchema = z.object({
  NODE_ENV: z.preprocess(blankAsUndefined, z.enum(["development", "production", "test"]).default("development")),
  PORT: envNumber(5000, z.number().int().min(1).max(65535)),

  DATABASE_URL: optionalString,
  USE_IN_MEMORY_DB: envFlag(false),

  OPENAI_API_KEY: optionalString,
  DEEPSEEK_API_KEY: optionalString,
  LLM_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  LLM_MODEL: optionalString,
  LLM_TEMPERATURE: envNumber(0.7, z.number().min(0).max(2)),
  LLM_MAX_TOKENS: envNumber(6000, z.number().int().positive()),
  LLM_STREAMING: envFlag(true),
  LLM_TIMEOUT_MS: envNumber(120_000, z.number().int().positive()),

  AMAP_API_KEY: optionalString,
  AMAP_SECURITY_KEY: optionalString,
  MAPBOX_ACCESS_TOKEN: optionalString,
  LOCATION_CACHE_TTL_MINUTES: envNumber(60, z.number().positive()),
  LOCATION_TIMEOUT_MS: envNumber(10_000, z.number().int().positive()),

  NOTE_API_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
});

export type AppConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      "Invalid environment configuration: " +
        issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`).join("; ")
    );
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return parsed.data;
}

let cached: AppConfig | null = null;

/** Process-wide config, parsed on first use. */
export function getConfig(): AppConfig {
  cached ??= loadConfig();
  return cached;
}
