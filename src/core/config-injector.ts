import type { ConfigEnvironment } from "./config-env.js";
import type { RuntimeLibrary } from "./runtime-loader.js";

export type ConfigInjectionPath = "bulk" | "individual";

/**
 * Copies the configuration environment into the runtime's store. Runtimes that expose
 * `setAllConfig` take everything in one call; older ones get one `setConfig` per key.
 */
export function injectConfig(
  runtime: Pick<RuntimeLibrary, "setConfig" | "setAllConfig">,
  environment: ConfigEnvironment,
): ConfigInjectionPath {
  if (runtime.setAllConfig) {
    // Secret markings only apply to keys that carry a value, as on the per-key path.
    const secretKeys = [...environment.secretKeys].filter((key) => key in environment.values);
    runtime.setAllConfig(environment.values, secretKeys);
    return "bulk";
  }

  for (const key of Object.keys(environment.values).sort()) {
    runtime.setConfig(key, environment.values[key], environment.secretKeys.has(key));
  }
  return "individual";
}
