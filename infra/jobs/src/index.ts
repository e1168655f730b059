/**
 * Jobs — wires the trigger from the environment and drives it off the clock
 */
import { Cron } from "croner";
import {
  configSchema,
  createLogger,
  defineSchedule,
  loadConfig,
  readCredentials,
  type RunResult,
} from "../../../services/shared/src/index.js";
import {
  createScriptTask,
  JobTrigger,
  noopProvisioner,
  ShellProvisioner,
} from "../../../services/trigger/src/index.js";

const log = createLogger("jobs");

export interface TriggerFromEnvOptions {
  /** Skip the install steps, for environments prepared out of band. */
  skipSetup?: boolean;
}

export function createTriggerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: TriggerFromEnvOptions = {}
): JobTrigger {
  const config = loadConfig(configSchema, env);
  const schedule = defineSchedule(config.JOB_SCHEDULE, config.JOB_TIMEZONE);

  const provisioner = options.skipSetup
    ? noopProvisioner
    : new ShellProvisioner(config.JOB_SETUP, { cwd: config.JOB_CWD, env });
  const task = createScriptTask({ command: config.JOB_COMMAND, cwd: config.JOB_CWD, env });

  return new JobTrigger({ schedule, provisioner, task, credentials: readCredentials(env) });
}

export function describeSchedule(trigger: JobTrigger, count = 3, from: Date = new Date()): Date[] {
  const upcoming = trigger.nextFireTimes(count, from);
  log.info("Schedule context", {
    pattern: trigger.schedule.pattern,
    timezone: trigger.schedule.timezone,
    next: upcoming.map((d) => d.toISOString()),
  });
  return upcoming;
}

export interface SchedulerHandle {
  nextRun(): Date | null;
  stop(): void;
}

export interface SchedulerOptions {
  onResult?: (result: RunResult) => void;
}

/**
 * Arm a timer on the trigger's schedule. Each tick goes through
 * `fireScheduled`, so a late tick outside the matching minute is dropped
 * rather than run off-calendar. Ticks missed while the process was down
 * are never replayed.
 */
export function startScheduler(trigger: JobTrigger, options: SchedulerOptions = {}): SchedulerHandle {
  const cron = new Cron(
    trigger.schedule.pattern,
    { timezone: trigger.schedule.timezone },
    () => {
      const handle = trigger.fireScheduled(new Date());
      if (!handle) return;
      void handle.result.then(
        (result) => options.onResult?.(result),
        (e: unknown) => log.error("Scheduled run crashed", { runId: handle.runId, error: String(e) })
      );
    }
  );

  log.info("Scheduler started", {
    pattern: trigger.schedule.pattern,
    timezone: trigger.schedule.timezone,
    nextRun: cron.nextRun()?.toISOString() ?? null,
  });

  return {
    nextRun: () => cron.nextRun(),
    stop: () => {
      cron.stop();
      log.info("Scheduler stopped");
    },
  };
}
