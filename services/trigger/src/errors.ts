/**
 * Run failures. Each is terminal for its run and carries the process exit
 * code the core reports for it.
 */
import type { FailureKind } from "../../shared/src/types.js";

export const EXIT_CODES = {
  success: 0,
  configuration: 78, // EX_CONFIG
  setup: 69, // EX_UNAVAILABLE
  signal: 1,
} as const;

export abstract class RunFailure extends Error {
  abstract readonly kind: FailureKind;
  abstract readonly exitCode: number;
}

/** A required credential is missing or empty; nothing external was called. */
export class ConfigurationFailure extends RunFailure {
  readonly kind = "configuration";
  readonly exitCode = EXIT_CODES.configuration;
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required credentials: ${missing.join(", ")}`);
    this.name = "ConfigurationFailure";
    this.missing = missing;
  }
}

/** A provisioning step failed; the script was never started. */
export class SetupFailure extends RunFailure {
  readonly kind = "setup";
  readonly exitCode = EXIT_CODES.setup;
  readonly step: string;
  readonly stepExitCode: number | null;

  constructor(step: string, stepExitCode: number | null, detail?: string) {
    super(
      `Setup step failed (${stepExitCode === null ? "did not exit" : `exit ${stepExitCode}`}): ${step}` +
        (detail ? `; ${detail}` : "")
    );
    this.name = "SetupFailure";
    this.step = step;
    this.stepExitCode = stepExitCode;
  }
}

/** The script exited non-zero or was killed. Its own exit code is propagated. */
export class ScriptFailure extends RunFailure {
  readonly kind = "script";
  readonly exitCode: number;
  readonly signal: NodeJS.Signals | null;

  constructor(code: number | null, signal: NodeJS.Signals | null = null, detail?: string) {
    super(detail ?? (signal ? `Script terminated by ${signal}` : `Script exited with code ${code ?? "unknown"}`));
    this.name = "ScriptFailure";
    this.exitCode = code !== null && code !== 0 ? code : EXIT_CODES.signal;
    this.signal = signal;
  }
}

export function isRunFailure(e: unknown): e is RunFailure {
  return e instanceof RunFailure;
}
