/**
 * Shared — Barrel exports
 */
export * from "./types.js";
export * from "./config.js";
export { defineSchedule, evaluateSchedule, nextFireTimes } from "./schedule.js";
export { Logger, createLogger, redact, REDACTED, type LogLevel, type LogEntry } from "./logger.js";
