/*
Purpose: read the engine-supplied configuration environment exactly once at startup.
Assumptions: STACK_CONFIG holds a JSON object of string values; STACK_CONFIG_SECRET_KEYS a JSON
array of key names. Either may be absent.
*/

import { z } from "zod";

import { ConfigEnvironmentError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

export const CONFIG_ENV_VAR = "STACK_CONFIG";
export const CONFIG_SECRET_KEYS_ENV_VAR = "STACK_CONFIG_SECRET_KEYS";

export type ConfigEnvironment = Readonly<{
  values: Readonly<Record<string, string>>;
  secretKeys: ReadonlySet<string>;
}>;

const ConfigValuesSchema = z.record(z.string());
const SecretKeysSchema = z.array(z.string());

// =============================================================================
// READING
// =============================================================================

export function readConfigEnvironment(env: NodeJS.ProcessEnv = process.env): ConfigEnvironment {
  const rawValues = parseJsonVariable(env, CONFIG_ENV_VAR, ConfigValuesSchema) ?? {};
  const rawSecrets = parseJsonVariable(env, CONFIG_SECRET_KEYS_ENV_VAR, SecretKeysSchema) ?? [];

  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(rawValues)) {
    values[cleanConfigKey(key)] = value;
  }

  return Object.freeze({
    values: Object.freeze(values),
    secretKeys: new Set(rawSecrets.map(cleanConfigKey)),
  });
}

/** Rewrites the legacy `pkg:config:key` form to `pkg:key`; other keys pass through. */
export function cleanConfigKey(key: string): string {
  const parts = key.split(":");
  if (parts.length === 3 && parts[1] === "config") {
    return `${parts[0]}:${parts[2]}`;
  }
  return key;
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseJsonVariable<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T>,
): T | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw configEnvironmentError(name, "is not valid JSON", err);
  }

  const parsed = schema.safeParse(decoded);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid shape";
    throw configEnvironmentError(name, `has an unexpected shape (${detail})`, parsed.error);
  }
  return parsed.data;
}

function configEnvironmentError(name: string, problem: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Configuration environment is malformed.",
    message: `${name} ${problem}.`,
    hint: "The engine sets this variable; re-run the program through the engine.",
    cause: new ConfigEnvironmentError(`${name} ${problem}.`, cause),
  });
}
