/**
 * Tests for the structured logger and secret redaction
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, redact, REDACTED } from "../../services/shared/src/logger.js";

function lastJson(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const calls = spy.mock.calls;
  const line = calls[calls.length - 1]?.[0];
  if (typeof line !== "string") throw new Error("no log line captured");
  return JSON.parse(line);
}

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should emit one JSON line with service and level", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new Logger("trigger", "info").info("Starting run", { runId: "run-1" });

    const entry = lastJson(spy);
    expect(entry["level"]).toBe("info");
    expect(entry["service"]).toBe("trigger");
    expect(entry["message"]).toBe("Starting run");
    expect(entry["data"]).toEqual({ runId: "run-1" });
  });

  it("should redact secret fields before writing", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new Logger("trigger", "info").info("env", { OPENAI_API_KEY: "test-ai-key", runId: "run-1" });

    expect(lastJson(spy)["data"]).toEqual({ OPENAI_API_KEY: REDACTED, runId: "run-1" });
  });

  it("should drop entries below the minimum level", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new Logger("trigger", "info").debug("noise");
    expect(spy).not.toHaveBeenCalled();
  });

  it("should route errors and warnings to their console streams", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger("trigger", "debug");

    logger.error("Run failed (setup)");
    logger.warn("overlap");

    expect(lastJson(err)["message"]).toBe("Run failed (setup)");
    expect(lastJson(warn)["message"]).toBe("overlap");
  });

  it("should prefix child service names", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new Logger("trigger", "info").child("run").info("hi");
    expect(lastJson(spy)["service"]).toBe("trigger:run");
  });

  it("should log state transitions", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new Logger("trigger", "info").transition("run-1", "idle", "provisioning", { trigger: "manual" });

    const entry = lastJson(spy);
    expect(entry["message"]).toBe("RUN_STATE: idle -> provisioning");
    expect(entry["data"]).toEqual({ trigger: "manual", runId: "run-1", from: "idle", to: "provisioning" });
  });
});

describe("redact", () => {
  it("should recurse into nested objects and keep arrays", () => {
    expect(
      redact({
        env: { NEWS_API_KEY: "test-news-key", PATH: "/bin" },
        missing: ["OPENAI_API_KEY"],
        webhookUrl: "https://example.test/webhook",
      })
    ).toEqual({
      env: { NEWS_API_KEY: REDACTED, PATH: "/bin" },
      missing: ["OPENAI_API_KEY"],
      webhookUrl: REDACTED,
    });
  });
});
