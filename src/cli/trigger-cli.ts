/**
 * Trigger CLI — run the job now, serve the weekly schedule, or inspect it.
 *
 * Usage:
 *   outlook-trigger run [--skip-setup] [--env-file .env]
 *   outlook-trigger serve
 *   outlook-trigger check --at 2026-02-15T23:00:00Z [--env-file .env]
 *   outlook-trigger next --count 4 [--env-file .env]
 */
import { existsSync, readFileSync } from "node:fs";
import { InvalidArgumentError, type Command } from "commander";
import * as dotenv from "dotenv";
import {
  createTriggerFromEnv,
  startScheduler,
  type TriggerFromEnvOptions,
} from "../../infra/jobs/src/index.js";
import {
  createLogger,
  defineSchedule,
  evaluateSchedule,
  loadConfig,
  nextFireTimes,
  scheduleConfigSchema,
} from "../../services/shared/src/index.js";
import type { JobTrigger } from "../../services/trigger/src/index.js";

const log = createLogger("cli");

export interface TriggerCliDeps {
  env?: NodeJS.ProcessEnv;
  createTrigger?: (env: NodeJS.ProcessEnv, options: TriggerFromEnvOptions) => JobTrigger;
}

type RunOptions = { skipSetup: boolean; envFile?: string };
type ServeOptions = { envFile?: string };
type CheckOptions = { at?: Date; envFile?: string };
type NextOptions = { count: number; envFile?: string };

function parseInstant(value: string): Date {
  const at = new Date(value);
  if (Number.isNaN(at.getTime())) {
    throw new InvalidArgumentError("Not an ISO 8601 instant.");
  }
  return at;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

/**
 * Load a .env file into `env` without overriding what is already set.
 * An explicit path must exist; the default `.env` is optional.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv, path?: string): boolean {
  const target = path ?? ".env";
  if (!existsSync(target)) {
    if (path) throw new Error(`[JobConfig] Env file not found: ${path}`);
    log.info("Using runner environment variables");
    return false;
  }
  const parsed = dotenv.parse(readFileSync(target));
  for (const [name, value] of Object.entries(parsed)) {
    if (env[name] === undefined) env[name] = value;
  }
  log.info("Using local env file", { path: target, variables: Object.keys(parsed).length });
  return true;
}

export function registerTriggerCli(program: Command, deps: TriggerCliDeps = {}) {
  const env = deps.env ?? process.env;
  const createTrigger = deps.createTrigger ?? createTriggerFromEnv;

  program
    .command("run")
    .description("Run the job once now, regardless of the schedule")
    .option("--skip-setup", "Skip the dependency install steps", false)
    .option("--env-file <path>", "Load variables from a .env file")
    .action(async (opts: RunOptions) => {
      loadEnvFile(env, opts.envFile);
      const trigger = createTrigger(env, { skipSetup: opts.skipSetup });

      const handle = trigger.triggerManual();
      const result = await handle.result;

      if (result.ok) {
        log.info("Job completed", { runId: result.runId });
      } else {
        log.error("Job failed", { runId: result.runId, failure: result.failure, exitCode: result.exitCode });
      }
      process.exitCode = result.exitCode;
    });

  program
    .command("serve")
    .description("Stay up and run the job whenever the schedule matches")
    .option("--env-file <path>", "Load variables from a .env file")
    .action(async (opts: ServeOptions) => {
      loadEnvFile(env, opts.envFile);
      const trigger = createTrigger(env, {});
      const scheduler = startScheduler(trigger, {
        onResult: (result) => {
          log.info("Scheduled run finished", { runId: result.runId, ok: result.ok, exitCode: result.exitCode });
        },
      });

      await new Promise<void>((resolve) => {
        const shutdown = (signal: NodeJS.Signals) => {
          log.info("Shutting down", { signal });
          scheduler.stop();
          resolve();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
      });
    });

  program
    .command("check")
    .description("Print whether the schedule matches an instant")
    .option("--at <iso>", "Instant to evaluate (default: now)", parseInstant)
    .option("--env-file <path>", "Load variables from a .env file")
    .action((opts: CheckOptions) => {
      loadEnvFile(env, opts.envFile);
      const config = loadConfig(scheduleConfigSchema, env);
      const schedule = defineSchedule(config.JOB_SCHEDULE, config.JOB_TIMEZONE);
      const at = opts.at ?? new Date();
      const verdict = evaluateSchedule(at, schedule) ? "matches" : "does not match";
      console.log(`${at.toISOString()} ${verdict} "${schedule.pattern}" (${schedule.timezone})`);
    });

  program
    .command("next")
    .description("Print the next fire times of the schedule")
    .option("--count <n>", "How many fire times to print", parsePositiveInt, 3)
    .option("--env-file <path>", "Load variables from a .env file")
    .action((opts: NextOptions) => {
      loadEnvFile(env, opts.envFile);
      const config = loadConfig(scheduleConfigSchema, env);
      const schedule = defineSchedule(config.JOB_SCHEDULE, config.JOB_TIMEZONE);
      for (const at of nextFireTimes(schedule, opts.count)) {
        console.log(at.toISOString());
      }
    });
}
