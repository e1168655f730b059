/**
 * Tests for JobTrigger — calendar path, manual path, run bookkeeping
 */
import { describe, it, expect, vi } from "vitest";
import { JobTrigger } from "../../services/trigger/src/service.js";
import { defineSchedule } from "../../services/shared/src/schedule.js";
import type { ExecutableTask } from "../../services/trigger/src/task.js";
import type { CredentialInput, ExitStatus } from "../../services/shared/src/types.js";

// ─── Helpers ────────────────────────────────────────────────────────

const SUNDAY_23 = new Date("2026-02-15T23:00:00Z");
const WEDNESDAY = new Date("2026-02-11T09:00:00Z");

const CREDENTIALS: CredentialInput = {
  webhookUrl: "https://example.test/webhook",
  aiApiKey: "test-ai-key",
  newsApiKey: "test-news-key",
};

function makeTrigger(opts: { now?: Date; credentials?: CredentialInput; task?: ExecutableTask } = {}) {
  const provision = vi.fn(async (_runId: string): Promise<void> => {});
  const task = vi.fn<ExecutableTask>(opts.task ?? (async () => ({ code: 0, signal: null })));
  const now = opts.now ?? WEDNESDAY;
  const trigger = new JobTrigger({
    schedule: defineSchedule("0 23 * * 0"),
    provisioner: { provision },
    task,
    credentials: opts.credentials ?? CREDENTIALS,
    now: () => now,
  });
  return { trigger, provision, task };
}

// ─── Schedule ───────────────────────────────────────────────────────

describe("JobTrigger schedule", () => {
  it("should evaluate against its schedule", () => {
    const { trigger } = makeTrigger();
    expect(trigger.evaluateSchedule(SUNDAY_23)).toBe(true);
    expect(trigger.evaluateSchedule(new Date("2026-02-15T23:01:00Z"))).toBe(false);
  });

  it("should evaluate the injected clock by default", () => {
    expect(makeTrigger({ now: SUNDAY_23 }).trigger.evaluateSchedule()).toBe(true);
    expect(makeTrigger({ now: WEDNESDAY }).trigger.evaluateSchedule()).toBe(false);
  });

  it("should list next fire times from the injected clock", () => {
    const { trigger } = makeTrigger({ now: WEDNESDAY });
    expect(trigger.nextFireTimes(1)[0]?.toISOString()).toBe("2026-02-15T23:00:00.000Z");
  });
});

// ─── Triggers ───────────────────────────────────────────────────────

describe("JobTrigger triggers", () => {
  it("should start a manual run when the schedule does not match", async () => {
    const { trigger, task } = makeTrigger({ now: WEDNESDAY });
    expect(trigger.evaluateSchedule()).toBe(false);

    const handle = trigger.triggerManual();
    const result = await handle.result;

    expect(handle.trigger).toBe("manual");
    expect(result.trigger).toBe("manual");
    expect(result.runId).toBe(handle.runId);
    expect(result.ok).toBe(true);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("should start a manual run when the schedule matches too", async () => {
    const { trigger, task } = makeTrigger({ now: SUNDAY_23 });
    const result = await trigger.triggerManual().result;

    expect(result.ok).toBe(true);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("should skip a scheduled fire outside the matching minute", () => {
    const { trigger, task, provision } = makeTrigger();

    expect(trigger.fireScheduled(new Date("2026-02-15T22:59:00Z"))).toBeNull();
    expect(task).not.toHaveBeenCalled();
    expect(provision).not.toHaveBeenCalled();
  });

  it("should start a scheduled run inside the matching minute", async () => {
    const { trigger, task } = makeTrigger();
    const handle = trigger.fireScheduled(new Date("2026-02-15T23:00:05Z"));

    expect(handle).not.toBeNull();
    expect(handle?.trigger).toBe("schedule");
    const result = await handle?.result;
    expect(result?.ok).toBe(true);
    expect(result?.trigger).toBe("schedule");
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("should hand the configured credentials to the task", async () => {
    const { trigger, task } = makeTrigger();
    const handle = trigger.triggerManual();
    await handle.result;

    expect(task).toHaveBeenCalledWith(CREDENTIALS, { runId: handle.runId });
  });

  it("should fail a manual run with missing credentials without calling the task", async () => {
    const { trigger, task, provision } = makeTrigger({ credentials: { ...CREDENTIALS, webhookUrl: "" } });
    const result = await trigger.triggerManual().result;

    expect(result.failure).toBe("configuration");
    expect(result.exitCode).toBe(78);
    expect(provision).toHaveBeenCalledTimes(0);
    expect(task).toHaveBeenCalledTimes(0);
  });

  it("should surface a failing script as a non-zero result", async () => {
    const { trigger } = makeTrigger({ task: async () => ({ code: 2, signal: null }) });
    const result = await trigger.triggerManual().result;

    expect(result.ok).toBe(false);
    expect(result.failure).toBe("script");
    expect(result.exitCode).toBe(2);
  });
});

// ─── Run bookkeeping ────────────────────────────────────────────────

describe("JobTrigger runs", () => {
  it("should track active runs until they terminate", async () => {
    let release: (status: ExitStatus) => void = () => {};
    const pending = new Promise<ExitStatus>((resolve) => {
      release = resolve;
    });
    const { trigger } = makeTrigger({ task: () => pending });

    const handle = trigger.triggerManual();
    expect(trigger.activeRuns).toBe(1);

    release({ code: 0, signal: null });
    await handle.result;
    expect(trigger.activeRuns).toBe(0);
  });

  it("should allow overlapping runs and keep them independent", async () => {
    const { trigger, task } = makeTrigger();

    const first = trigger.triggerManual();
    const second = trigger.fireScheduled(SUNDAY_23);
    expect(trigger.activeRuns).toBe(2);

    const [a, b] = await Promise.all([first.result, second?.result]);

    expect(first.runId).not.toBe(second?.runId);
    expect(a.ok).toBe(true);
    expect(b?.ok).toBe(true);
    expect(task).toHaveBeenCalledTimes(2);
  });

  it("should start a direct run with explicit credentials", async () => {
    const { trigger, task } = makeTrigger({ credentials: {} });
    const result = await trigger.startRun(CREDENTIALS);

    expect(result.ok).toBe(true);
    expect(result.trigger).toBe("manual");
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("should not carry a failed run's outcome into the next", async () => {
    const { trigger } = makeTrigger();

    const failed = await trigger.startRun({ ...CREDENTIALS, newsApiKey: "" }, "schedule");
    const next = await trigger.startRun(CREDENTIALS, "schedule");

    expect(failed.ok).toBe(false);
    expect(next.ok).toBe(true);
    expect(next.states).toEqual(["idle", "provisioning", "executing", "terminated"]);
  });
});
