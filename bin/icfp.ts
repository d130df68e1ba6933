#!/usr/bin/env node

/**
 * icfp: parse, inspect, step and run lazy base-94 programs.
 *
 * Usage:
 *   icfp run program.icfp
 *   echo 'B+ I" I#' | icfp step
 *   icfp parse program.icfp > ast.json
 *   icfp --help
 */

import { readFile } from "node:fs/promises";
import tkexport from "terminal-kit";

import {
  type CommandOutput,
  helpText,
  parseArgs,
  runCommand,
  UsageError,
} from "../lib/cli/commands.js";
import { VERSION } from "../lib/shared/version.js";

const { terminal } = tkexport;

const output: CommandOutput = {
  line: (text) => terminal(text + "\n"),
  result: (text) => terminal.green(text + "\n"),
  info: (text) => terminal.yellow(text + "\n"),
};

function printError(message: string): void {
  terminal.red(message + "\n");
}

async function readSource(path: string | undefined): Promise<string> {
  if (path !== undefined) {
    return readFile(path, "utf8");
  }
  let text = "";
  process.stdin.setEncoding("utf8");
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

async function main(args: string[]): Promise<number> {
  const options = parseArgs(args);

  if (options.help) {
    terminal(helpText());
    return 0;
  }
  if (options.version) {
    terminal(`icfp v${VERSION}\n`);
    return 0;
  }
  if (options.command === undefined) {
    throw new UsageError("Missing command.");
  }

  const source = await readSource(options.inputPath);
  runCommand(options.command, source, options, output);
  return 0;
}

try {
  process.exit(await main(process.argv.slice(2)));
} catch (error: unknown) {
  if (error instanceof UsageError) {
    printError(error.message);
    printError("Use --help for usage information.");
  } else if (error instanceof Error) {
    printError(`${error.name}: ${error.message}`);
  } else {
    printError(String(error));
  }
  process.exit(1);
}
