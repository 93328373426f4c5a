/**
 * Builds one document out of several fragments.
 *
 * Reading is delegated to a FragmentSource so the core never touches the
 * file system. Fragments are parsed independently and merged in order, so
 * later fragments override earlier ones.
 */

import { ErrorCode } from '../errors/codes.js';
import { merge } from '../merge/merge.js';
import { JsonNode } from '../node/json-node.js';
import { parseJsonNode } from '../parser/json-parser.js';
import { FragmentError, type StrataError } from '../types/errors.js';
import {
  resolveOptions,
  type AssembleOptions,
  type MergeOptions,
} from '../types/options.js';
import { consoleLogger, type Logger } from '../util/logger.js';

export interface Fragment {
  /** Where the text came from; stored in meta when tagging is on */
  origin: string;
  content: string | Uint8Array;
}

export interface FragmentSource {
  /** The fragment stored under `name`, or undefined when there is none */
  read(name: string): Fragment | undefined;
  /** Every fragment sharing the logical `name`, lowest priority first */
  readAll?(name: string): Fragment[];
}

export interface AssembleResult {
  node: JsonNode;
  isValid: boolean;
  issues: StrataError[];
}

export interface AssembleCallOptions {
  merge?: MergeOptions;
  assemble?: AssembleOptions;
  logger?: Logger;
}

class Assembler {
  private readonly node = new JsonNode();
  private readonly issues: StrataError[] = [];
  private readonly mergeOptions: Required<MergeOptions>;
  private readonly assembleOptions: Required<AssembleOptions>;
  private readonly logger: Logger;

  constructor(options: AssembleCallOptions) {
    const resolved = resolveOptions({
      merge: options.merge,
      assemble: options.assemble,
    });
    this.mergeOptions = resolved.merge;
    this.assembleOptions = resolved.assemble;
    this.logger = options.logger ?? consoleLogger;
  }

  missing(name: string): void {
    const issue = new FragmentError({
      message: `Fragment "${name}" not found`,
      context: { source: name },
    });
    this.logger.warn(issue.message);
    this.issues.push(issue);
  }

  add(fragment: Fragment): void {
    const parsed = parseJsonNode(fragment.content, { sourceName: fragment.origin });

    if (!parsed.isValidSyntax) {
      for (const issue of parsed.issues) this.logger.warn(issue.message);
      this.issues.push(...parsed.issues);
      if (this.assembleOptions.failOnInvalidSyntax) {
        this.issues.push(
          new FragmentError({
            message: `Fragment "${fragment.origin}" skipped: invalid syntax`,
            errorCode: ErrorCode.FRAGMENT_INVALID,
            context: { source: fragment.origin },
          })
        );
        return;
      }
    }

    // a null root would act as a tombstone for everything merged so far
    if (parsed.node.isNull()) return;

    if (this.assembleOptions.tagMeta) parsed.node.setMeta(fragment.origin);
    this.logger.debug(`merging ${fragment.origin}`);
    merge(this.node, parsed.node, this.mergeOptions);
  }

  result(): AssembleResult {
    return {
      node: this.node,
      isValid: this.issues.length === 0,
      issues: this.issues,
    };
  }
}

function listOf(fragment: Fragment | undefined): Fragment[] {
  return fragment === undefined ? [] : [fragment];
}

/**
 * Reads, parses and merges `files` in order. A missing file or a syntax
 * error marks the result invalid without stopping the assembly.
 */
export function assembleFromFiles(
  files: readonly string[],
  source: FragmentSource,
  options: AssembleCallOptions = {}
): AssembleResult {
  const assembler = new Assembler(options);
  for (const name of files) {
    const fragment = source.read(name);
    if (fragment === undefined) {
      assembler.missing(name);
    } else {
      assembler.add(fragment);
    }
  }
  return assembler.result();
}

/**
 * Merges every fragment the source holds under one logical name. Sources
 * without readAll() contribute the single fragment read() returns.
 */
export function assembleFromAllSources(
  name: string,
  source: FragmentSource,
  options: AssembleCallOptions = {}
): AssembleResult {
  const assembler = new Assembler(options);
  const fragments = source.readAll ? source.readAll(name) : listOf(source.read(name));

  if (fragments.length === 0) assembler.missing(name);
  for (const fragment of fragments) assembler.add(fragment);
  return assembler.result();
}
