import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";

import { z } from "zod";

import type { RuntimeSettings } from "../runtime/settings.js";

import { EnvironmentMissingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

/** The part of the runtime library the host drives. */
export type RuntimeLibrary = {
  configure(settings: RuntimeSettings): void;
  setConfig(key: string, value: string, secret?: boolean): void;
  setAllConfig?: (config: Readonly<Record<string, string>>, secretKeys: readonly string[]) => void;
  runInStack(work: () => unknown): Promise<void>;
  isRunError(error: unknown): boolean;
  log: { error(message: string): void };
};

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export type LoadRuntimeOptions = {
  specifier?: string;
  /** Directory the program lives in; its node_modules win over the host's own copy. */
  searchFrom: string;
  importModule?: ModuleImporter;
};

export const DEFAULT_RUNTIME_SPECIFIER = "stack-host/runtime";

const isFunction = (value: unknown): boolean => typeof value === "function";

const RuntimeLibrarySchema = z.object({
  configure: z.custom(isFunction),
  setConfig: z.custom(isFunction),
  setAllConfig: z.custom(isFunction).optional(),
  runInStack: z.custom(isFunction),
  isRunError: z.custom(isFunction),
  log: z.object({ error: z.custom(isFunction) }),
});

// =============================================================================
// LOADING
// =============================================================================

export async function loadRuntimeLibrary(opts: LoadRuntimeOptions): Promise<RuntimeLibrary> {
  const specifier = opts.specifier?.trim() || DEFAULT_RUNTIME_SPECIFIER;
  const importModule = opts.importModule ?? defaultImporter;

  let loaded: unknown;
  try {
    loaded = await importModule(resolveRuntimeSpecifier(specifier, opts.searchFrom));
  } catch (err) {
    throw new EnvironmentMissingError(specifier, err);
  }

  if (!isRuntimeLibrary(loaded)) {
    throw new EnvironmentMissingError(
      specifier,
      new Error(`Module "${specifier}" does not expose the runtime library interface.`),
    );
  }

  return loaded;
}

export function isRuntimeLibrary(value: unknown): value is RuntimeLibrary {
  return RuntimeLibrarySchema.safeParse(value).success;
}

/**
 * Resolves a bare specifier from the program's directory so the host and the program share one
 * module instance. Falls back to the specifier itself, which then resolves from the host.
 */
export function resolveRuntimeSpecifier(specifier: string, searchFrom: string): string {
  if (specifier.startsWith("file:")) {
    return specifier;
  }

  if (path.isAbsolute(specifier)) {
    return pathToFileURL(specifier).href;
  }

  const requireFromProgram = createRequire(path.join(path.resolve(searchFrom), "package.json"));
  try {
    return pathToFileURL(requireFromProgram.resolve(specifier)).href;
  } catch {
    return specifier;
  }
}

const defaultImporter: ModuleImporter = (specifier) => import(specifier);
