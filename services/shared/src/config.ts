/**
 * Runtime Configuration & Validation
 * Uses Zod schemas to validate environment variables at startup.
 * Callers use `loadConfig()` and get typed, validated config or a clear error.
 *
 * Credentials are deliberately optional here: their presence is checked per
 * run, so a missing secret fails that run rather than the process.
 */
import { z } from "zod";
import { CREDENTIAL_ENV_NAMES, type CredentialInput } from "./types.js";

// ─── Schema Definitions ───────────────────────────────────────────────

const appSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const DEFAULT_SCHEDULE = "0 23 * * 0"; // Sundays 23:00 UTC (7 PM US Eastern, standard time)
export const DEFAULT_COMMAND = "python main.py";
export const DEFAULT_SETUP = "python -m pip install --upgrade pip;pip install -r requirements.txt";

const jobSchema = z.object({
  JOB_SCHEDULE: z.string().trim().min(1, "JOB_SCHEDULE must not be empty").default(DEFAULT_SCHEDULE),
  JOB_TIMEZONE: z.string().trim().min(1).default("UTC"),
  JOB_COMMAND: z.string().trim().min(1, "JOB_COMMAND must not be empty").default(DEFAULT_COMMAND),
  JOB_SETUP: z
    .string()
    .default(DEFAULT_SETUP)
    .transform((v) =>
      v
        .split(";")
        .map((step) => step.trim())
        .filter((step) => step.length > 0)
    ),
  JOB_CWD: z.string().trim().min(1).optional(),
});

export const credentialsEnvSchema = z.object({
  [CREDENTIAL_ENV_NAMES.webhookUrl]: z.string().optional(),
  [CREDENTIAL_ENV_NAMES.aiApiKey]: z.string().optional(),
  [CREDENTIAL_ENV_NAMES.newsApiKey]: z.string().optional(),
});

// ─── Full Config Schema ───────────────────────────────────────────────

export const configSchema = appSchema.merge(jobSchema).merge(credentialsEnvSchema);

export type TriggerConfig = z.infer<typeof configSchema>;

// ─── Partial Schemas (for commands that only need a subset) ───────────

export const scheduleConfigSchema = appSchema.merge(jobSchema.pick({ JOB_SCHEDULE: true, JOB_TIMEZONE: true }));
export type ScheduleConfig = z.infer<typeof scheduleConfigSchema>;

// ─── Loader ───────────────────────────────────────────────────────────

/**
 * Validate and load config from an environment map (default `process.env`).
 * Pass a specific schema for command-level validation, or omit for full config.
 */
export function loadConfig(): TriggerConfig;
export function loadConfig<T extends z.ZodTypeAny>(schema: T, env?: NodeJS.ProcessEnv): z.infer<T>;
export function loadConfig(schema?: z.ZodTypeAny, env: NodeJS.ProcessEnv = process.env): unknown {
  const target = schema ?? configSchema;
  const result = target.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`[JobConfig] Invalid configuration:\n${errors}`);
  }

  return result.data;
}

/**
 * Lift the three secrets out of an environment map into a credential struct.
 * Nothing is checked here; `startRun` decides whether they are usable.
 */
export function readCredentials(env: NodeJS.ProcessEnv = process.env): CredentialInput {
  return {
    webhookUrl: env[CREDENTIAL_ENV_NAMES.webhookUrl],
    aiApiKey: env[CREDENTIAL_ENV_NAMES.aiApiKey],
    newsApiKey: env[CREDENTIAL_ENV_NAMES.newsApiKey],
  };
}
