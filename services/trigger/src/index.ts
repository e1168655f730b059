/**
 * Trigger — scheduled, credentialed, single-shot job runs
 */
export { JobTrigger, type JobTriggerConfig } from "./service.js";
export { executeRun, validateCredentials, RunStateMachine, type RunDependencies, type RunOptions } from "./run.js";
export { ShellProvisioner, noopProvisioner, type Provisioner, type ShellProvisionerOptions } from "./provisioner.js";
export {
  createScriptTask,
  scriptEnvironment,
  type ExecutableTask,
  type ScriptTaskOptions,
  type TaskContext,
} from "./task.js";
export {
  RunFailure,
  ConfigurationFailure,
  SetupFailure,
  ScriptFailure,
  isRunFailure,
  EXIT_CODES,
} from "./errors.js";
