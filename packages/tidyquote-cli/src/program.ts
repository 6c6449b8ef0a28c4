/**
 * tidyquote command line - run a program and print the value of its last
 * top-level form.
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_DEPTH_LIMIT, QuotationError, Session, formatValue } from 'tidyquote-core';

export interface CliOptions {
  eval?: string;
  variable: string[];
  depthLimit: string;
}

/**
 * Where the command reads and writes; replaced in tests
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(file: string): string;
  exists(file: string): boolean;
}

export const processIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readFile: (file) => fs.readFileSync(file, 'utf-8'),
  exists: (file) => fs.existsSync(file),
};

/**
 * Split `key=value` definitions
 */
export function parseVariables(definitions: string[]): Array<[string, string]> {
  return definitions.map((definition) => {
    const eq = definition.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid variable definition: ${definition} (expected key=value)`);
    }
    return [definition.slice(0, eq), definition.slice(eq + 1)];
  });
}

function parseDepthLimit(text: string): number {
  const limit = Number(text);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid depth limit: ${text}`);
  }
  return limit;
}

function describeError(error: unknown): string {
  if (error instanceof QuotationError) {
    return `Error [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/**
 * Run one program; returns the process exit code
 */
export function runProgram(file: string | undefined, options: CliOptions, io: CliIO = processIO): number {
  try {
    if (options.eval === undefined && (!file || file.trim() === '')) {
      io.stderr('Error: a program file or --eval is required');
      return 1;
    }
    if (options.eval !== undefined && file) {
      io.stderr('Error: give either a program file or --eval, not both');
      return 1;
    }

    let source: string;
    let sourceName: string;
    if (options.eval !== undefined) {
      source = options.eval;
      sourceName = '<eval>';
    } else {
      sourceName = path.resolve(file ?? '');
      if (!io.exists(sourceName)) {
        io.stderr(`Error: Program file not found: ${file}`);
        return 1;
      }
      source = io.readFile(sourceName);
    }

    const session = new Session({ depthLimit: parseDepthLimit(options.depthLimit) });
    for (const [name, value] of parseVariables(options.variable)) {
      session.define(name, value);
    }

    const result = session.run(source, sourceName);
    io.stdout(formatValue(result));
    return 0;
  } catch (error) {
    io.stderr(describeError(error));
    if (process.env.DEBUG && error instanceof Error) {
      io.stderr(error.stack ?? '');
    }
    return 1;
  }
}

export function buildProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('tidyquote')
    .description('Evaluate programs built from quoted, quasiquoted and tidy-evaluated expressions')
    .version('0.1.0', '-v, --version')
    .option('-e, --eval <code>', 'Program text to run instead of a file')
    .option('-V, --variable <key=value...>', 'Define a string variable', [])
    .option(
      '--depth-limit <n>',
      'Maximum evaluation depth',
      process.env.TIDYQUOTE_DEPTH_LIMIT ?? String(DEFAULT_DEPTH_LIMIT),
    )
    .argument('[file]', 'Program file')
    .action((file: string | undefined, options: CliOptions) => {
      process.exitCode = runProgram(file, options, io);
    });

  return program;
}
