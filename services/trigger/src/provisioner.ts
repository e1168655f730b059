/**
 * Provisioning — installs the script's declared dependencies before it runs.
 * Steps run in order; the first one that fails aborts the run.
 */
import { createLogger } from "../../shared/src/logger.js";
import { SetupFailure } from "./errors.js";
import { runCommand, withoutCredentials } from "./spawn.js";

const log = createLogger("trigger:provisioner");

export interface Provisioner {
  provision(runId: string): Promise<void>;
}

export interface ShellProvisionerOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ShellProvisioner implements Provisioner {
  readonly steps: readonly string[];
  private cwd: string | undefined;
  private env: NodeJS.ProcessEnv;

  constructor(steps: readonly string[], options: ShellProvisionerOptions = {}) {
    this.steps = [...steps];
    this.cwd = options.cwd;
    // Install steps never see the secrets.
    this.env = withoutCredentials(options.env ?? process.env);
  }

  async provision(runId: string): Promise<void> {
    if (this.steps.length === 0) {
      log.info("No setup steps declared", { runId });
      return;
    }

    for (const [index, step] of this.steps.entries()) {
      log.info("Running setup step", { runId, step, index: index + 1, of: this.steps.length });
      const result = await runCommand(step, { cwd: this.cwd, env: this.env, captureStderr: true });

      if (result.spawnError) {
        throw new SetupFailure(step, null, result.spawnError.message);
      }
      if (result.code !== 0) {
        throw new SetupFailure(step, result.code, result.stderrTail || undefined);
      }
    }

    log.info("Setup complete", { runId, steps: this.steps.length });
  }
}

/** Provisioner for runs whose environment is already prepared. */
export const noopProvisioner: Provisioner = {
  async provision(runId: string): Promise<void> {
    log.info("Setup skipped", { runId });
  },
};
