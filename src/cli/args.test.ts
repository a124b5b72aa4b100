import { CommanderError } from "commander";
import { describe, expect, it } from "vitest";

import { parseDryRun, parseInvocationArgs, parseParallelism } from "./args.js";

// =============================================================================
// HELPERS
// =============================================================================

function parse(args: string[]) {
  const errors: string[] = [];
  const run = () =>
    parseInvocationArgs(["node", "stack-host-exec", ...args], {
      output: {
        writeOut: () => undefined,
        writeErr: (text) => {
          errors.push(text);
        },
      },
    });
  return { run, errors };
}

function parseError(args: string[]): { error: CommanderError; output: string } {
  const { run, errors } = parse(args);
  try {
    run();
  } catch (err) {
    if (err instanceof CommanderError) {
      return { error: err, output: errors.join("") };
    }
    throw err;
  }
  throw new Error("expected parsing to fail");
}

// =============================================================================
// TESTS
// =============================================================================

describe("parseInvocationArgs", () => {
  it("parses every flag and the program", () => {
    const args = parse([
      "--project",
      "web",
      "--stack",
      "dev",
      "--organization",
      "acme",
      "--parallel",
      "4",
      "--dry_run",
      "true",
      "--pwd",
      "/work",
      "--monitor",
      "127.0.0.1:5000",
      "--engine",
      "127.0.0.1:5001",
      "--tracing",
      "http://localhost:9411",
      "main.js",
    ]).run();

    expect(args).toEqual({
      project: "web",
      stack: "dev",
      organization: "acme",
      parallelism: 4,
      dryRun: true,
      pwd: "/work",
      monitor: "127.0.0.1:5000",
      engine: "127.0.0.1:5001",
      tracing: "http://localhost:9411",
      program: "main.js",
      programArgs: [],
    });
    expect(Object.isFrozen(args)).toBe(true);
    expect(Object.isFrozen(args.programArgs)).toBe(true);
  });

  it("passes everything after the program through to it", () => {
    const args = parse(["--stack", "dev", "main.js", "--verbose", "up", "--stack", "other"]).run();

    expect(args.stack).toBe("dev");
    expect(args.program).toBe("main.js");
    expect(args.programArgs).toEqual(["--verbose", "up", "--stack", "other"]);
  });

  it("defaults optional values", () => {
    const args = parse(["main.js"]).run();

    expect(args.parallelism).toBe(1);
    expect(args.dryRun).toBe(false);
    expect(args.project).toBeUndefined();
    expect(args.pwd).toBeUndefined();
    expect(args.programArgs).toEqual([]);
  });

  it.each(["false", "", "1", "TRUE", "yes"])("treats --dry_run %j as false", (value) => {
    expect(parse(["--dry_run", value, "main.js"]).run().dryRun).toBe(false);
  });

  it("accepts the --flag=value form", () => {
    const args = parse(["--dry_run=true", "--parallel=8", "main.js"]).run();

    expect(args.dryRun).toBe(true);
    expect(args.parallelism).toBe(8);
  });

  it("rejects a missing program", () => {
    const { error, output } = parseError(["--stack", "dev"]);

    expect(error.code).toBe("commander.missingArgument");
    expect(error.exitCode).toBe(1);
    expect(output).toContain("missing required argument 'program'");
  });

  it.each(["abc", "-1", "4.5", ""])("rejects --parallel %j", (value) => {
    const { error, output } = parseError(["--parallel", value, "main.js"]);

    expect(error.code).toBe("commander.invalidArgument");
    expect(output).toContain("Expected a non-negative integer.");
  });
});

describe("parseParallelism", () => {
  it("parses non-negative integers", () => {
    expect(parseParallelism("0")).toBe(0);
    expect(parseParallelism("16")).toBe(16);
    expect(parseParallelism(" 3 ")).toBe(3);
  });
});

describe("parseDryRun", () => {
  it("enables dry run only for the exact text true", () => {
    expect(parseDryRun("true")).toBe(true);
    expect(parseDryRun(" true")).toBe(false);
    expect(parseDryRun(undefined)).toBe(false);
  });
});
