/**
 * One run of the job, from trigger to terminal status.
 *
 *   idle → provisioning → executing → terminated
 *
 * A configuration failure jumps idle → terminated and a setup failure jumps
 * provisioning → terminated. Nothing leaves `terminated`; every run builds a
 * fresh machine, so a failed run leaves nothing behind for the next one.
 */
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { createLogger } from "../../shared/src/logger.js";
import {
  CREDENTIAL_ENV_NAMES,
  type CredentialInput,
  type Credentials,
  type ExitStatus,
  type RunResult,
  type RunState,
  type TriggerReason,
} from "../../shared/src/types.js";
import {
  ConfigurationFailure,
  EXIT_CODES,
  isRunFailure,
  ScriptFailure,
  SetupFailure,
  type RunFailure,
} from "./errors.js";
import type { Provisioner } from "./provisioner.js";
import type { ExecutableTask } from "./task.js";

const log = createLogger("trigger:run");

// ─── State Machine ──────────────────────────────────────────────────

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ["provisioning", "terminated"],
  provisioning: ["executing", "terminated"],
  executing: ["terminated"],
  terminated: [],
};

export class RunStateMachine {
  private _state: RunState = "idle";
  private _history: RunState[] = ["idle"];

  constructor(
    readonly runId: string,
    private onTransition?: (from: RunState, to: RunState) => void
  ) {}

  get state(): RunState {
    return this._state;
  }

  get history(): readonly RunState[] {
    return this._history;
  }

  transition(to: RunState): void {
    const from = this._state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`[Run ${this.runId}] Illegal transition ${from} -> ${to}`);
    }
    this._state = to;
    this._history.push(to);
    this.onTransition?.(from, to);
  }
}

// ─── Credentials ────────────────────────────────────────────────────

const requiredSecret = z.string().trim().min(1);

const credentialsSchema = z.object({
  webhookUrl: requiredSecret,
  aiApiKey: requiredSecret,
  newsApiKey: requiredSecret,
});

function isCredentialField(value: unknown): value is keyof Credentials {
  return typeof value === "string" && value in CREDENTIAL_ENV_NAMES;
}

/**
 * Every credential must be a non-empty string once trimmed.
 * Throws a ConfigurationFailure naming the missing environment variables.
 */
export function validateCredentials(input: CredentialInput): Credentials {
  const result = credentialsSchema.safeParse(input);
  if (result.success) return result.data;

  const missing = new Set<string>();
  for (const issue of result.error.issues) {
    const field = issue.path[0];
    if (isCredentialField(field)) missing.add(CREDENTIAL_ENV_NAMES[field]);
  }
  throw new ConfigurationFailure([...missing]);
}

// ─── Run ────────────────────────────────────────────────────────────

export interface RunDependencies {
  provisioner: Provisioner;
  task: ExecutableTask;
  now?: () => Date;
}

export interface RunOptions {
  trigger: TriggerReason;
  runId?: string;
  onTransition?: (from: RunState, to: RunState) => void;
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Execute one run. Resolves with a binary outcome; every failure is mapped
 * onto one of the three run failures and never retried.
 */
export async function executeRun(
  input: CredentialInput,
  deps: RunDependencies,
  options: RunOptions
): Promise<RunResult> {
  const runId = options.runId ?? randomUUID();
  const now = deps.now ?? (() => new Date());
  const trigger = options.trigger;
  const startedAt = now().toISOString();

  const machine = new RunStateMachine(runId, (from, to) => {
    log.transition(runId, from, to, { trigger });
    options.onTransition?.(from, to);
  });

  const finish = (failure?: RunFailure): RunResult => {
    machine.transition("terminated");
    return {
      runId,
      trigger,
      ok: failure === undefined,
      exitCode: failure?.exitCode ?? EXIT_CODES.success,
      ...(failure && { failure: failure.kind, message: failure.message }),
      startedAt,
      finishedAt: now().toISOString(),
      states: [...machine.history],
    };
  };

  log.info("Starting run", { runId, trigger });

  try {
    const credentials = validateCredentials(input);

    machine.transition("provisioning");
    try {
      await deps.provisioner.provision(runId);
    } catch (e) {
      throw e instanceof SetupFailure ? e : new SetupFailure("provision", null, messageOf(e));
    }

    machine.transition("executing");
    let status: ExitStatus;
    try {
      status = await deps.task(credentials, { runId });
    } catch (e) {
      throw new ScriptFailure(null, null, `Script task failed: ${messageOf(e)}`);
    }
    if (status.code !== 0 || status.signal !== null) {
      throw new ScriptFailure(status.code, status.signal);
    }

    const result = finish();
    log.info("Run completed", { runId, trigger, exitCode: result.exitCode });
    return result;
  } catch (e) {
    if (!isRunFailure(e)) throw e;
    const result = finish(e);
    log.error(`Run failed (${e.kind})`, {
      runId,
      trigger,
      failure: e.kind,
      exitCode: e.exitCode,
      reason: e.message,
    });
    return result;
  }
}
