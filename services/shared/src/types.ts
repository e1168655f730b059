/**
 * Shared Type Definitions
 * Everything a run carries, from trigger to terminal status.
 */

// ─── Credentials ──────────────────────────────────────────────────────

export interface Credentials {
  webhookUrl: string;
  aiApiKey: string;
  newsApiKey: string;
}

/** Environment variable each credential is exposed under to the script. */
export const CREDENTIAL_ENV_NAMES = {
  webhookUrl: "DISCORD_WEBHOOK_URL",
  aiApiKey: "OPENAI_API_KEY",
  newsApiKey: "NEWS_API_KEY",
} as const satisfies Record<keyof Credentials, string>;

export type CredentialEnvName = (typeof CREDENTIAL_ENV_NAMES)[keyof Credentials];

/** Raw credential input, as read from the environment; validated per run. */
export type CredentialInput = Partial<Record<keyof Credentials, string | undefined>>;

// ─── Schedule ─────────────────────────────────────────────────────────

export interface ScheduleDefinition {
  pattern: string; // 5-field cron expression
  timezone: string; // IANA zone name
}

// ─── Runs ─────────────────────────────────────────────────────────────

export type TriggerReason = "schedule" | "manual";

export type RunState = "idle" | "provisioning" | "executing" | "terminated";

export type FailureKind = "configuration" | "setup" | "script";

/** Terminal status of the external script. */
export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface RunResult {
  runId: string;
  trigger: TriggerReason;
  ok: boolean;
  exitCode: number;
  failure?: FailureKind;
  message?: string;
  startedAt: string;
  finishedAt: string;
  states: RunState[];
}

export interface RunHandle {
  runId: string;
  trigger: TriggerReason;
  result: Promise<RunResult>;
}
