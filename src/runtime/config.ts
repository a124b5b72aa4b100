import { RunError } from "./errors.js";

const values = new Map<string, string>();
const secretKeys = new Set<string>();

// =============================================================================
// INSTALLATION
// =============================================================================

export function setConfig(key: string, value: string, secret = false): void {
  values.set(key, value);
  if (secret) {
    secretKeys.add(key);
  }
}

export function setAllConfig(config: Readonly<Record<string, string>>, secrets: readonly string[]): void {
  for (const [key, value] of Object.entries(config)) {
    values.set(key, value);
  }
  for (const key of secrets) {
    secretKeys.add(key);
  }
}

// =============================================================================
// LOOKUPS
// =============================================================================

export function getConfig(key: string): string | undefined {
  return values.get(key);
}

export function requireConfig(key: string): string {
  const value = values.get(key);
  if (value === undefined) {
    throw new RunError(`Missing required configuration variable '${key}'.`);
  }
  return value;
}

export function isConfigSecret(key: string): boolean {
  return secretKeys.has(key);
}

/** All values under `namespace:`, keyed by the part after the colon. */
export function getConfigNamespace(namespace: string): Record<string, string> {
  const prefix = `${namespace}:`;
  const result: Record<string, string> = {};
  for (const [key, value] of values) {
    if (key.startsWith(prefix)) {
      result[key.slice(prefix.length)] = value;
    }
  }
  return result;
}

export function listConfigKeys(): string[] {
  return [...values.keys()].sort();
}
