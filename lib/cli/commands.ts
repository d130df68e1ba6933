/**
 * Command-line surface of the `icfp` tool.
 *
 * Argument parsing and command execution live here, apart from the binary,
 * so they can run against any output sink.
 *
 * @module
 */
import { DEFAULT_MAX_ITERATIONS } from "../consts/limits.js";
import { LazyEvaluator } from "../evaluator/lazyEvaluator.js";
import { parseIcfp } from "../parser/icfp.js";
import { prettyPrintExpr } from "../terms/expr.js";
import { serializeExpr } from "../terms/serialization.js";
import { prettyPrintValue } from "../terms/value.js";
import { VERSION } from "../shared/version.js";

export type Command = "parse" | "debug" | "step" | "run";

const COMMANDS: readonly string[] = ["parse", "debug", "step", "run"];

const isCommand = (word: string): word is Command => COMMANDS.includes(word);

export interface CLIOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  maxIterations: number;
  command?: Command;
  inputPath?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Where command output goes. `result` receives the final answer of a
 * command, `line` everything else printed to standard output, `info`
 * diagnostics meant for standard error.
 */
export interface CommandOutput {
  line(text: string): void;
  result(text: string): void;
  info(text: string): void;
}

const parseCount = (flag: string, value: string | undefined): number => {
  if (value === undefined || !/^\d+$/.test(value) || Number(value) < 1) {
    throw new UsageError(`${flag} expects a positive integer`);
  }
  return Number(value);
};

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    help: false,
    version: false,
    verbose: false,
    maxIterations: DEFAULT_MAX_ITERATIONS,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--verbose":
      case "-V":
        options.verbose = true;
        break;
      case "--max-iterations":
      case "-n":
        options.maxIterations = parseCount(arg, args[++i]);
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (options.command === undefined) {
          if (!isCommand(arg)) {
            throw new UsageError(`Unknown command: ${arg}`);
          }
          options.command = arg;
        } else if (options.inputPath === undefined) {
          options.inputPath = arg;
        } else {
          throw new UsageError("Too many arguments.");
        }
        break;
    }
  }

  return options;
}

export const helpText = (): string =>
  `
icfp v${VERSION}

USAGE:
    icfp <command> [file] [OPTIONS]

COMMANDS:
    parse    Print the renamed syntax tree as JSON
    debug    Print the renamed syntax tree in readable form
    step     Print the program and every expression it reduces to
    run      Print the value the program evaluates to

The program is read from [file], or from standard input when omitted.

OPTIONS:
    -h, --help                 Show this help message
    -v, --version              Show version information
    -V, --verbose              Report step and beta-reduction counts
    -n, --max-iterations <N>   Reduction step budget for the run
                               (default ${DEFAULT_MAX_ITERATIONS})
`;

export function runCommand(
  command: Command,
  source: string,
  options: Pick<CLIOptions, "verbose" | "maxIterations">,
  output: CommandOutput,
): void {
  const expr = parseIcfp(source);

  switch (command) {
    case "parse":
      output.result(serializeExpr(expr, 2));
      return;
    case "debug":
      output.result(prettyPrintExpr(expr));
      return;
    case "step":
    case "run": {
      const stepping = command === "step";
      if (stepping) {
        output.line(prettyPrintExpr(expr));
      }
      const evaluator = new LazyEvaluator({
        maxIterations: options.maxIterations,
        trace: stepping
          ? (e) => output.line(`-> ${prettyPrintExpr(e)}`)
          : undefined,
      });
      const value = evaluator.fullyEvaluate(expr);
      if (!stepping) {
        output.result(prettyPrintValue(value));
      }
      if (options.verbose) {
        output.info(
          `[DEBUG] steps=${evaluator.stats.steps}` +
            ` betaReductions=${evaluator.stats.betaReductions}`,
        );
      }
      return;
    }
  }
}
