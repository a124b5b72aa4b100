/**
 * Runtime library for stack programs run by `stack-host-exec`.
 *
 * The host installs settings and configuration here before the program loads; the program
 * reads them synchronously and registers the asynchronous resource operations it starts.
 *
 * @packageDocumentation
 */

export { RunError, isRunError } from "./errors.js";
export { log, type EngineLog } from "./log.js";
export { trackOperation, pendingOperationCount } from "./operations.js";
export { runInStack } from "./stack.js";
export {
  configure,
  getSettings,
  isDryRun,
  getProject,
  getStack,
  getOrganization,
  getParallelism,
  getMonitorAddress,
  getEngineAddress,
  type RuntimeSettings,
} from "./settings.js";
export {
  setConfig,
  setAllConfig,
  getConfig,
  requireConfig,
  isConfigSecret,
  getConfigNamespace,
  listConfigKeys,
} from "./config.js";
