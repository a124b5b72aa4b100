import type { Stats } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";

import fse from "fs-extra";

import { ProgramNotFoundError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProgramInvocation = {
  program: string;
  programArgs: readonly string[];
  pwd?: string;
};

/** Process-level effects of starting a program, replaceable in tests. */
export type ProgramRunnerDeps = {
  execPath: string;
  cwd(): string;
  chdir(directory: string): void;
  setArgv(argv: string[]): void;
  importModule(url: string): Promise<unknown>;
};

export const defaultProgramRunnerDeps: ProgramRunnerDeps = {
  execPath: process.execPath,
  cwd: () => process.cwd(),
  chdir: (directory) => {
    process.chdir(directory);
  },
  setArgv: (argv) => {
    process.argv = argv;
  },
  importModule: (url) => import(url),
};

const DIRECTORY_ENTRY_CANDIDATES = ["index.js", "index.mjs", "index.cjs"];

// =============================================================================
// EXECUTION
// =============================================================================

/**
 * Starts the program as if node had been pointed at it directly: working directory first,
 * then `process.argv`, then module evaluation. Resolves once top-level evaluation finishes;
 * operations the program left in flight are the stack supervisor's concern.
 */
export async function runProgram(
  invocation: ProgramInvocation,
  deps: ProgramRunnerDeps = defaultProgramRunnerDeps,
): Promise<void> {
  if (invocation.pwd) {
    deps.chdir(path.resolve(deps.cwd(), invocation.pwd));
  }

  const entry = await resolveProgramEntry(path.resolve(deps.cwd(), invocation.program));
  deps.setArgv([deps.execPath, entry, ...invocation.programArgs]);
  await deps.importModule(pathToFileURL(entry).href);
}

/** Maps a program path to the module file to evaluate. Directories follow package.json `main`. */
export async function resolveProgramEntry(programPath: string): Promise<string> {
  const stat = await statIfExists(programPath);
  if (!stat) {
    throw new ProgramNotFoundError(programPath);
  }

  if (stat.isFile()) {
    return programPath;
  }

  const main = await readPackageMain(programPath);
  const candidates = main ? [main] : DIRECTORY_ENTRY_CANDIDATES;
  for (const candidate of candidates) {
    const entry = path.resolve(programPath, candidate);
    if (await isFile(entry)) {
      return entry;
    }
  }

  throw new ProgramNotFoundError(programPath);
}

// =============================================================================
// HELPERS
// =============================================================================

async function readPackageMain(directory: string): Promise<string | undefined> {
  const manifestPath = path.join(directory, "package.json");
  if (!(await fse.pathExists(manifestPath))) {
    return undefined;
  }

  const manifest: unknown = await fse.readJson(manifestPath);
  if (manifest && typeof manifest === "object" && "main" in manifest) {
    const { main } = manifest;
    if (typeof main === "string" && main.trim()) {
      return main.trim();
    }
  }
  return undefined;
}

async function isFile(filePath: string): Promise<boolean> {
  const stat = await statIfExists(filePath);
  return stat?.isFile() ?? false;
}

async function statIfExists(filePath: string): Promise<Stats | undefined> {
  try {
    return await fse.stat(filePath);
  } catch (err) {
    if (err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return undefined;
    }
    throw err;
  }
}
