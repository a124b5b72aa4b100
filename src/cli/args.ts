import { Command, InvalidArgumentError, type OutputConfiguration } from "commander";

// =============================================================================
// TYPES
// =============================================================================

export type InvocationArgs = Readonly<{
  project?: string;
  stack?: string;
  organization?: string;
  parallelism: number;
  dryRun: boolean;
  pwd?: string;
  monitor?: string;
  engine?: string;
  tracing?: string;
  program: string;
  programArgs: readonly string[];
}>;

type RawOptions = {
  project?: string;
  stack?: string;
  organization?: string;
  parallel: number;
  dry_run?: string;
  pwd?: string;
  monitor?: string;
  engine?: string;
  tracing?: string;
};

export type ParseInvocationOptions = {
  /** Where `argv` comes from; "node" skips the executable and script entries. */
  from?: "node" | "user";
  output?: OutputConfiguration;
};

export const HOST_COMMAND_NAME = "stack-host-exec";
const DEFAULT_PARALLELISM = 1;

// =============================================================================
// COMMAND DEFINITION
// =============================================================================

export function buildHostCommand(onParsed: (args: InvocationArgs) => void): Command {
  return new Command(HOST_COMMAND_NAME)
    .description("Run a stack program under supervision and report its outcome to the engine")
    .option("--project <name>", "Project name")
    .option("--stack <name>", "Stack name")
    .option("--organization <name>", "Organization name")
    .option(
      "--parallel <n>",
      `Maximum number of concurrent resource operations (default: ${DEFAULT_PARALLELISM})`,
      parseParallelism,
      DEFAULT_PARALLELISM,
    )
    .option("--dry_run <value>", 'Preview only; enabled solely by the exact value "true"')
    .option("--pwd <path>", "Change into this directory before running the program")
    .option("--monitor <address>", "Resource monitor address")
    .option("--engine <address>", "Engine address")
    .option("--tracing <endpoint>", "Tracing endpoint")
    .argument("<program>", "Program to run")
    .argument("[args...]", "Arguments passed to the program")
    .passThroughOptions()
    .exitOverride()
    .action((program: string, programArgs: string[] | undefined, opts: RawOptions) => {
      onParsed(toInvocationArgs(program, programArgs ?? [], opts));
    });
}

/**
 * Parses the host's invocation. Usage errors surface as commander's `CommanderError` after
 * the usage text has been written to the configured error output.
 */
export function parseInvocationArgs(
  argv: readonly string[],
  options: ParseInvocationOptions = {},
): InvocationArgs {
  const result: { args?: InvocationArgs } = {};
  const command = buildHostCommand((args) => {
    result.args = args;
  });
  if (options.output) {
    command.configureOutput(options.output);
  }

  command.parse([...argv], { from: options.from ?? "node" });

  if (!result.args) {
    throw new InvalidArgumentError("No program was given.");
  }
  return result.args;
}

// =============================================================================
// VALUE PARSERS
// =============================================================================

export function parseParallelism(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(trimmed, 10);
}

/** Only the literal text "true" enables a dry run. */
export function parseDryRun(value: string | undefined): boolean {
  return value === "true";
}

function toInvocationArgs(program: string, programArgs: string[], opts: RawOptions): InvocationArgs {
  return Object.freeze({
    project: opts.project,
    stack: opts.stack,
    organization: opts.organization,
    parallelism: opts.parallel,
    dryRun: parseDryRun(opts.dry_run),
    pwd: opts.pwd,
    monitor: opts.monitor,
    engine: opts.engine,
    tracing: opts.tracing,
    program,
    programArgs: Object.freeze([...programArgs]),
  });
}
