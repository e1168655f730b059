/**
 * Child process helpers shared by provisioning and script execution.
 */
import { spawn, type StdioOptions } from "node:child_process";
import { CREDENTIAL_ENV_NAMES } from "../../shared/src/types.js";
import type { ExitStatus } from "../../shared/src/types.js";

const STDERR_TAIL_CHARS = 2000;

export interface CommandOptions {
  cwd?: string;
  env: NodeJS.ProcessEnv;
  /** Keep a tail of stderr for error reporting; stdout always passes through. */
  captureStderr?: boolean;
}

export interface CommandResult extends ExitStatus {
  stderrTail: string;
  spawnError?: Error;
}

/**
 * Copy of an environment map with every credential variable removed, so
 * secrets only reach a child when they are put back explicitly.
 */
export function withoutCredentials(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const clean: NodeJS.ProcessEnv = { ...env };
  for (const name of Object.values(CREDENTIAL_ENV_NAMES)) {
    delete clean[name];
  }
  return clean;
}

/**
 * Run a shell command line to completion. Never rejects: spawn errors are
 * reported on the result so callers can map them to their own failure.
 */
export function runCommand(command: string, options: CommandOptions): Promise<CommandResult> {
  return new Promise((res) => {
    const stdio: StdioOptions = options.captureStderr ? ["ignore", "inherit", "pipe"] : "inherit";
    const proc = spawn(command, {
      cwd: options.cwd,
      env: options.env,
      shell: true,
      stdio,
    });

    let stderr = "";
    let settled = false;

    proc.stderr?.on("data", (d: Buffer) => {
      process.stderr.write(d);
      stderr = (stderr + d.toString()).slice(-STDERR_TAIL_CHARS);
    });

    proc.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      res({ code, signal, stderrTail: stderr.trim() });
    });

    proc.on("error", (err) => {
      if (settled) return;
      settled = true;
      res({ code: null, signal: null, stderrTail: stderr.trim(), spawnError: err });
    });
  });
}
