import path from 'node:path';

import {
  assembleFromAllSources,
  assembleFromFiles,
  difference,
  ErrorCode,
  getExitCode,
  inherit,
  intersect,
  isErr,
  maximize,
  minimize,
  resolveOptions,
  SchemaValidator,
  tryResolvePointer,
  type AssembleResult,
  type Logger,
  type ResolvedOptions,
} from '@jsonstrata/core';

import { parseStrataOptions, requireOption, type CliOptions } from './flags.js';
import {
  FileFragmentSource,
  loadSchemaDirectory,
  readDocument,
  writeOutput,
  type CliIo,
} from './io.js';

export interface CommandContext {
  io: CliIo;
  logger: Logger;
}

/** Exit status of a command; errors are thrown instead */
export type ExitCode = number;

function resolveFlags(options: CliOptions): ResolvedOptions {
  return resolveOptions(parseStrataOptions(options));
}

function finishAssembly(
  result: AssembleResult,
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  writeOutput(ctx.io, result.node.toJson(options.compact === true), options.out);
  const [first] = result.issues;
  return first ? first.getExitCode() : 0;
}

export function runMerge(
  files: string[],
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  const resolved = resolveFlags(options);
  const result = assembleFromFiles(files, new FileFragmentSource([ctx.io.cwd]), {
    merge: resolved.merge,
    assemble: resolved.assemble,
    logger: ctx.logger,
  });
  return finishAssembly(result, options, ctx);
}

export function runAssemble(
  name: string,
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  const resolved = resolveFlags(options);
  const roots = (options.root ?? ['.']).map((root) => path.resolve(ctx.io.cwd, root));
  const result = assembleFromAllSources(name, new FileFragmentSource(roots), {
    merge: resolved.merge,
    assemble: resolved.assemble,
    logger: ctx.logger,
  });
  return finishAssembly(result, options, ctx);
}

export function runInherit(
  baseFile: string,
  descendantFile: string,
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  const base = readDocument(ctx.io.cwd, baseFile);
  const descendant = readDocument(ctx.io.cwd, descendantFile);
  inherit(descendant, base);
  writeOutput(ctx.io, descendant.toJson(options.compact === true), options.out);
  return 0;
}

export function runDiff(
  file: string,
  baseFile: string,
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  const node = readDocument(ctx.io.cwd, file);
  const base = readDocument(ctx.io.cwd, baseFile);
  writeOutput(ctx.io, difference(node, base).toJson(options.compact === true), options.out);
  return 0;
}

export function runIntersect(
  files: string[],
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  const nodes = files.map((file) => readDocument(ctx.io.cwd, file));
  const common = intersect(nodes, options.prune !== false);
  writeOutput(ctx.io, common.toJson(options.compact === true), options.out);
  return 0;
}

export function runGet(
  file: string,
  pointer: string,
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  const node = readDocument(ctx.io.cwd, file);
  const found = tryResolvePointer(node, pointer);
  if (isErr(found)) throw found.error;
  writeOutput(ctx.io, found.value.toJson(options.compact === true), options.out);
  return 0;
}

export function runValidate(
  files: string[],
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  const { schema } = resolveFlags(options);
  const schemaName = requireOption(options.schema, 'schema');
  const registry = loadSchemaDirectory(
    ctx.io.cwd,
    requireOption(options.schemas, 'schemas'),
    schema.defaultScheme
  );
  const validator = new SchemaValidator(registry, { schema, logger: ctx.logger });

  let failed = 0;
  for (const file of files) {
    const node = readDocument(ctx.io.cwd, file);
    if (validator.validate(node, schemaName, file)) {
      ctx.io.stdout(`${file}: valid\n`);
    } else {
      failed++;
    }
  }

  if (failed > 0) {
    ctx.logger.error(`${failed} of ${files.length} file(s) failed validation`);
    return getExitCode(ErrorCode.VALIDATION_FAILED);
  }
  return 0;
}

export function runNormalize(
  mode: 'minimize' | 'maximize',
  file: string,
  options: CliOptions,
  ctx: CommandContext
): ExitCode {
  const { schema } = resolveFlags(options);
  const schemaName = requireOption(options.schema, 'schema');
  const registry = loadSchemaDirectory(
    ctx.io.cwd,
    requireOption(options.schemas, 'schemas'),
    schema.defaultScheme
  );
  const node = readDocument(ctx.io.cwd, file);

  const normalize = mode === 'minimize' ? minimize : maximize;
  const result = normalize(node, schemaName, registry, schema);
  if (isErr(result)) throw result.error;

  writeOutput(ctx.io, node.toJson(options.compact === true), options.out);
  return 0;
}
