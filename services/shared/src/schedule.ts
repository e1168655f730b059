/**
 * Schedule Awareness
 * Decides whether an instant falls on the job's calendar pattern.
 * Pure: no timers are armed here, so every answer is a function of its inputs.
 */
import { Cron } from "croner";
import type { ScheduleDefinition } from "./types.js";

const MINUTE_MS = 60_000;

function assertTimezone(timezone: string): void {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
  } catch {
    throw new Error(`[Schedule] Unknown timezone "${timezone}"`);
  }
}

// A Cron built without a callback never schedules itself.
function evaluator(schedule: ScheduleDefinition): Cron {
  return new Cron(schedule.pattern, { timezone: schedule.timezone });
}

/**
 * Validate a cron pattern and timezone into a schedule definition.
 * Throws with a `[Schedule]` prefix on either being unusable.
 */
export function defineSchedule(pattern: string, timezone = "UTC"): ScheduleDefinition {
  assertTimezone(timezone);
  const schedule: ScheduleDefinition = { pattern: pattern.trim(), timezone };
  // Minute granularity: a seconds or year field would never line up with evaluateSchedule.
  const fields = schedule.pattern.split(/\s+/).length;
  if (fields !== 5) {
    throw new Error(`[Schedule] Invalid cron pattern "${pattern}": expected 5 fields, got ${fields}`);
  }
  try {
    evaluator(schedule);
  } catch (e) {
    throw new Error(`[Schedule] Invalid cron pattern "${pattern}": ${e instanceof Error ? e.message : String(e)}`);
  }
  return Object.freeze(schedule);
}

/**
 * True iff `time` lies inside a minute the pattern matches.
 * Seconds are ignored; the neighbouring minutes never match.
 */
export function evaluateSchedule(time: Date, schedule: ScheduleDefinition): boolean {
  const minuteStart = Math.floor(time.getTime() / MINUTE_MS) * MINUTE_MS;
  // nextRun() is strictly after its argument, so step back one second.
  const candidate = evaluator(schedule).nextRun(new Date(minuteStart - 1000));
  return candidate !== null && candidate.getTime() === minuteStart;
}

/**
 * The next `count` fire times after `from`. Missed windows before `from`
 * are never included.
 */
export function nextFireTimes(
  schedule: ScheduleDefinition,
  count = 1,
  from: Date = new Date()
): Date[] {
  return evaluator(schedule).nextRuns(count, from);
}
