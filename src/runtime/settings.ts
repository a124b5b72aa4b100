import { RunError } from "./errors.js";

export type RuntimeSettings = Readonly<{
  monitorAddress?: string;
  engineAddress?: string;
  project?: string;
  stack?: string;
  organization?: string;
  parallelism: number;
  dryRun: boolean;
}>;

let current: RuntimeSettings | undefined;

// =============================================================================
// INSTALLATION
// =============================================================================

/** Installs the process-wide settings. Settings are written once, before any program code runs. */
export function configure(settings: RuntimeSettings): void {
  if (current) {
    throw new Error("Runtime settings are already configured for this process.");
  }
  current = Object.freeze({ ...settings });
}

// =============================================================================
// LOOKUPS
// =============================================================================

export function getSettings(): RuntimeSettings {
  if (!current) {
    throw new RunError(
      "Program run without the engine available; re-run it through the engine's CLI.",
    );
  }
  return current;
}

export function isDryRun(): boolean {
  return current?.dryRun ?? false;
}

export function getProject(): string | undefined {
  return current?.project;
}

export function getStack(): string | undefined {
  return current?.stack;
}

export function getOrganization(): string | undefined {
  return current?.organization;
}

export function getParallelism(): number {
  return current?.parallelism ?? 1;
}

export function getMonitorAddress(): string {
  const address = getSettings().monitorAddress;
  if (!address) {
    throw new RunError("No resource monitor address was given to this program.");
  }
  return address;
}

export function getEngineAddress(): string | undefined {
  return current?.engineAddress;
}
