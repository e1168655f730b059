/**
 * JobTrigger — decides when a run starts and starts it.
 * Two reasons exist: the weekly calendar matched, or someone asked.
 * Runs are independent; overlapping runs are allowed and only logged.
 */
import { randomUUID } from "node:crypto";
import { createLogger } from "../../shared/src/logger.js";
import { evaluateSchedule, nextFireTimes } from "../../shared/src/schedule.js";
import type {
  CredentialInput,
  RunHandle,
  RunResult,
  ScheduleDefinition,
  TriggerReason,
} from "../../shared/src/types.js";
import type { Provisioner } from "./provisioner.js";
import { executeRun } from "./run.js";
import type { ExecutableTask } from "./task.js";

const log = createLogger("trigger");

export interface JobTriggerConfig {
  schedule: ScheduleDefinition;
  provisioner: Provisioner;
  task: ExecutableTask;
  /** Secrets handed to every run this trigger starts. */
  credentials: CredentialInput;
  now?: () => Date;
}

export class JobTrigger {
  readonly schedule: ScheduleDefinition;
  private provisioner: Provisioner;
  private task: ExecutableTask;
  private credentials: CredentialInput;
  private now: () => Date;
  private active = new Set<string>();

  constructor(config: JobTriggerConfig) {
    this.schedule = config.schedule;
    this.provisioner = config.provisioner;
    this.task = config.task;
    this.credentials = { ...config.credentials };
    this.now = config.now ?? (() => new Date());
    log.info("JobTrigger initialized", {
      pattern: this.schedule.pattern,
      timezone: this.schedule.timezone,
    });
  }

  /** Number of runs started by this trigger that have not terminated yet. */
  get activeRuns(): number {
    return this.active.size;
  }

  /** True iff `time` matches the calendar pattern. */
  evaluateSchedule(time: Date = this.now()): boolean {
    return evaluateSchedule(time, this.schedule);
  }

  nextFireTimes(count = 1, from: Date = this.now()): Date[] {
    return nextFireTimes(this.schedule, count, from);
  }

  /** Start a run regardless of the calendar. */
  triggerManual(): RunHandle {
    return this.launch("manual");
  }

  /**
   * Calendar path: start a run if `now` matches, otherwise skip.
   * A window that passed without a call is not made up later.
   */
  fireScheduled(now: Date = this.now()): RunHandle | null {
    if (!this.evaluateSchedule(now)) {
      log.debug("Schedule does not match, skipping", { at: now.toISOString() });
      return null;
    }
    return this.launch("schedule");
  }

  /** Run once with explicit credentials, outside any trigger bookkeeping. */
  startRun(credentials: CredentialInput, trigger: TriggerReason = "manual"): Promise<RunResult> {
    return executeRun(
      credentials,
      { provisioner: this.provisioner, task: this.task, now: this.now },
      { trigger }
    );
  }

  private launch(trigger: TriggerReason): RunHandle {
    const runId = randomUUID();

    if (this.active.size > 0) {
      log.warn("Run starting while another is active", { runId, trigger, active: this.active.size });
    }

    this.active.add(runId);
    const result = executeRun(
      this.credentials,
      { provisioner: this.provisioner, task: this.task, now: this.now },
      { trigger, runId }
    ).finally(() => {
      this.active.delete(runId);
    });

    return { runId, trigger, result };
  }
}
