import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ProgramNotFoundError } from "./errors.js";
import {
  defaultProgramRunnerDeps,
  resolveProgramEntry,
  runProgram,
  type ProgramRunnerDeps,
} from "./program-runner.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PROGRAM_FIXTURES = path.resolve(__dirname, "../../test/fixtures/programs");
const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

function makeTempDir(prefix: string): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
  tempDirs.push(dir);
  return dir;
}

function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
}

function createRecordingDeps(initialCwd: string) {
  let cwd = initialCwd;
  const events: string[] = [];
  const deps: ProgramRunnerDeps = {
    execPath: "/usr/bin/node",
    cwd: () => cwd,
    chdir: (directory) => {
      events.push(`chdir ${directory}`);
      cwd = directory;
    },
    setArgv: (argv) => {
      events.push(`argv ${argv.join(" ")}`);
    },
    importModule: async (url) => {
      events.push(`import ${url}`);
    },
  };
  return { deps, events };
}

// =============================================================================
// TESTS
// =============================================================================

describe("runProgram", () => {
  it("changes directory, then sets argv, then loads the program", async () => {
    const dir = makeTempDir("runner-file-");
    const entry = path.join(dir, "main.mjs");
    writeFile(entry, "export {};\n");
    const { deps, events } = createRecordingDeps("/elsewhere");

    await runProgram({ program: "main.mjs", programArgs: ["--flag", "x"], pwd: dir }, deps);

    expect(events).toEqual([
      `chdir ${dir}`,
      `argv /usr/bin/node ${entry} --flag x`,
      `import ${pathToFileURL(entry).href}`,
    ]);
  });

  it("resolves the program from the current directory when no override is given", async () => {
    const dir = makeTempDir("runner-cwd-");
    const entry = path.join(dir, "app", "index.js");
    writeFile(entry, "export {};\n");
    const { deps, events } = createRecordingDeps(dir);

    await runProgram({ program: "app", programArgs: [] }, deps);

    expect(events).toEqual([`argv /usr/bin/node ${entry}`, `import ${pathToFileURL(entry).href}`]);
  });

  it("fails before loading anything when the program is missing", async () => {
    const dir = makeTempDir("runner-missing-");
    const { deps, events } = createRecordingDeps(dir);

    await expect(runProgram({ program: "nope.js", programArgs: [] }, deps)).rejects.toBeInstanceOf(
      ProgramNotFoundError,
    );
    expect(events).toEqual([]);
  });
});

describe("runProgram with the process", () => {
  let originalCwd: string;
  let originalArgv: string[];

  beforeEach(() => {
    originalCwd = process.cwd();
    originalArgv = process.argv;
  });

  afterEach(() => {
    process.chdir(originalCwd);
    process.argv = originalArgv;
  });

  it("gives the program its own argv and working directory", async () => {
    const outDir = makeTempDir("runner-probe-");
    const outFile = path.join(outDir, "probe.json");
    const fixtureDir = fs.realpathSync(PROGRAM_FIXTURES);

    await runProgram(
      { program: "argv-probe.mjs", programArgs: [outFile], pwd: PROGRAM_FIXTURES },
      defaultProgramRunnerDeps,
    );

    const probe: unknown = JSON.parse(fs.readFileSync(outFile, "utf8"));
    expect(probe).toEqual({
      argv: [path.join(fixtureDir, "argv-probe.mjs"), outFile],
      cwd: fixtureDir,
    });
  });
});

describe("resolveProgramEntry", () => {
  it("returns files as they are", async () => {
    const dir = makeTempDir("entry-file-");
    const entry = path.join(dir, "stack.cjs");
    writeFile(entry, "");

    await expect(resolveProgramEntry(entry)).resolves.toBe(entry);
  });

  it("follows package.json main for directories", async () => {
    const dir = makeTempDir("entry-main-");
    writeFile(path.join(dir, "package.json"), JSON.stringify({ main: "lib/app.js" }));
    writeFile(path.join(dir, "lib", "app.js"), "");
    writeFile(path.join(dir, "index.js"), "");

    await expect(resolveProgramEntry(dir)).resolves.toBe(path.join(dir, "lib", "app.js"));
  });

  it("falls back to index files when package.json has no main", async () => {
    const dir = makeTempDir("entry-index-");
    writeFile(path.join(dir, "package.json"), JSON.stringify({ name: "stack" }));
    writeFile(path.join(dir, "index.mjs"), "");

    await expect(resolveProgramEntry(dir)).resolves.toBe(path.join(dir, "index.mjs"));
  });

  it("rejects a directory whose main is missing", async () => {
    const dir = makeTempDir("entry-broken-");
    writeFile(path.join(dir, "package.json"), JSON.stringify({ main: "dist/missing.js" }));
    writeFile(path.join(dir, "index.js"), "");

    const error = await resolveProgramEntry(dir).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProgramNotFoundError);
    expect(error).toHaveProperty("message", `No program entry point found at ${dir}.`);
  });
});
