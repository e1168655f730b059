/**
 * The external script, modelled as an executable task: credentials in,
 * exit status out. Tests swap in a fake with the same signature.
 */
import { createLogger } from "../../shared/src/logger.js";
import { CREDENTIAL_ENV_NAMES, type Credentials, type ExitStatus } from "../../shared/src/types.js";
import { runCommand, withoutCredentials } from "./spawn.js";

const log = createLogger("trigger:task");

export interface TaskContext {
  runId: string;
}

export type ExecutableTask = (credentials: Credentials, context: TaskContext) => Promise<ExitStatus>;

export interface ScriptTaskOptions {
  /** Command line that starts the script. Takes no further arguments. */
  command: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/** Environment for the script: the base env plus the credentials, nothing stale. */
export function scriptEnvironment(base: NodeJS.ProcessEnv, credentials: Credentials): NodeJS.ProcessEnv {
  return {
    ...withoutCredentials(base),
    [CREDENTIAL_ENV_NAMES.webhookUrl]: credentials.webhookUrl,
    [CREDENTIAL_ENV_NAMES.aiApiKey]: credentials.aiApiKey,
    [CREDENTIAL_ENV_NAMES.newsApiKey]: credentials.newsApiKey,
  };
}

export function createScriptTask(options: ScriptTaskOptions): ExecutableTask {
  const base = options.env ?? process.env;

  return async (credentials, { runId }) => {
    log.info("Starting script", { runId, command: options.command, cwd: options.cwd ?? process.cwd() });

    const result = await runCommand(options.command, {
      cwd: options.cwd,
      env: scriptEnvironment(base, credentials),
    });

    if (result.spawnError) {
      // Reported as a non-zero exit, the same as a shell that cannot find the script.
      log.error("Script could not be started", { runId, error: result.spawnError.message });
      return { code: 127, signal: null };
    }

    log.info("Script exited", { runId, code: result.code, signal: result.signal });
    return { code: result.code, signal: result.signal };
  };
}
