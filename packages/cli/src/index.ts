#!/usr/bin/env node

// CLI entry point
// - Command name: `jsonstrata`. Every subcommand reads JSON fragments from
//   disk, runs one @jsonstrata/core operation and prints JSON to stdout
//   (or to --out).
// - Diagnostics go to stderr; failures are rendered through ErrorPresenter
//   and mapped to the error code's exit status.

import { Command, CommanderError } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  isStrataError,
  StrataError,
} from '@jsonstrata/core';

import {
  runAssemble,
  runDiff,
  runGet,
  runInherit,
  runIntersect,
  runMerge,
  runNormalize,
  runValidate,
  type CommandContext,
  type ExitCode,
} from './commands.js';
import type { CliOptions } from './flags.js';
import { createLogger, processIo, type CliIo } from './io.js';
import { renderCLIView } from './render.js';

class InternalError extends StrataError {}

export function reportError(err: unknown, io: CliIo): ExitCode {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: io.colors });

  let error: StrataError;
  if (isStrataError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  io.stderr(`${renderCLIView(presenter.formatForCLI(error))}\n`);
  return error.getExitCode();
}

function withOutput(command: Command): Command {
  return command
    .option('--compact', 'Write JSON on a single line')
    .option('-o, --out <file>', 'Write to a file instead of stdout');
}

function withMergeFlags(command: Command): Command {
  return command
    .option('--copy-meta', 'Take meta from the fragment that wins')
    .option('--ignore-override', 'Treat null as keep and ignore override flags')
    .option('--no-tag-meta', 'Do not record fragment origins in meta')
    .option('--fail-on-invalid', 'Skip fragments with syntax errors');
}

function withSchemaFlags(command: Command): Command {
  return command
    .option('-s, --schema <name>', 'Schema URI, e.g. core:unit#/definitions/stats')
    .option('--schemas <dir>', 'Directory of *.json schemas')
    .option('--scheme <scheme>', 'Scheme used for the directory and bare names')
    .option('--max-ref-depth <n>', 'Maximum chained $ref hops');
}

/**
 * Builds the command tree. `onExit` receives the status of the command that
 * ran; commander's own exits (help, usage errors) surface as CommanderError.
 */
export function createProgram(io: CliIo, onExit: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name('jsonstrata')
    .description('Merge, diff and normalize layered JSON configuration')
    .version('0.1.0')
    .option('-v, --verbose', 'Print debug diagnostics to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  const execute = (command: (ctx: CommandContext) => ExitCode): void => {
    const verbose = program.opts<CliOptions>().verbose === true;
    const ctx: CommandContext = { io, logger: createLogger(io, verbose) };
    try {
      onExit(command(ctx));
    } catch (err: unknown) {
      onExit(reportError(err, io));
    }
  };

  withOutput(withMergeFlags(program.command('merge')))
    .description('Merge fragments in order; later files win')
    .argument('<files...>', 'Fragments, lowest priority first')
    .action((files: string[], options: CliOptions) => {
      execute((ctx) => runMerge(files, options, ctx));
    });

  withOutput(withMergeFlags(program.command('assemble')))
    .description('Merge every copy of one file found under the given roots')
    .argument('<name>', 'File name relative to each root')
    .option('-r, --root <dirs...>', 'Root directories, lowest priority first')
    .action((name: string, options: CliOptions) => {
      execute((ctx) => runAssemble(name, options, ctx));
    });

  withOutput(program.command('inherit'))
    .description('Apply a descendant on top of a copy of its base')
    .argument('<base>', 'Base document')
    .argument('<descendant>', 'Descendant document')
    .action((base: string, descendant: string, options: CliOptions) => {
      execute((ctx) => runInherit(base, descendant, options, ctx));
    });

  withOutput(program.command('diff'))
    .description('Print the patch that turns <base> into <file>')
    .argument('<file>', 'Target document')
    .argument('<base>', 'Base document')
    .action((file: string, base: string, options: CliOptions) => {
      execute((ctx) => runDiff(file, base, options, ctx));
    });

  withOutput(program.command('intersect'))
    .description('Print what all documents have in common')
    .argument('<files...>', 'Documents to intersect')
    .option('--no-prune', 'Keep struct keys whose common part is empty')
    .action((files: string[], options: CliOptions) => {
      execute((ctx) => runIntersect(files, options, ctx));
    });

  withOutput(program.command('get'))
    .description('Print the node at a JSON pointer')
    .argument('<file>', 'Document')
    .argument('[pointer]', 'JSON pointer, e.g. /units/0/name', '')
    .action((file: string, pointer: string, options: CliOptions) => {
      execute((ctx) => runGet(file, pointer, options, ctx));
    });

  withSchemaFlags(program.command('validate'))
    .description('Validate documents against a schema')
    .argument('<files...>', 'Documents to validate')
    .option('--no-formats', 'Do not check "format" keywords')
    .action((files: string[], options: CliOptions) => {
      execute((ctx) => runValidate(files, options, ctx));
    });

  for (const mode of ['minimize', 'maximize'] as const) {
    withOutput(withSchemaFlags(program.command(mode)))
      .description(
        mode === 'minimize'
          ? 'Drop required properties equal to their schema default'
          : 'Fill in schema defaults for missing required properties'
      )
      .argument('<file>', 'Document')
      .action((file: string, options: CliOptions) => {
        execute((ctx) => runNormalize(mode, file, options, ctx));
      });
  }

  return program;
}

/**
 * Runs one command line (without the node and script arguments) and
 * returns its exit status.
 */
export async function run(argv: readonly string[], io: CliIo = processIo): Promise<ExitCode> {
  let exitCode: ExitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode;
    return reportError(err, io);
  }
  return exitCode;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  process.exitCode = await run(argv);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
