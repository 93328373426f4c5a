import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigError,
  FragmentError,
  InMemorySchemaRegistry,
  parseJsonNode,
  type Fragment,
  type FragmentSource,
  type JsonNode,
  type Logger,
} from '@jsonstrata/core';

/**
 * Where the CLI reads and writes. Tests pass their own.
 */
export interface CliIo {
  cwd: string;
  colors: boolean;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIo: CliIo = {
  cwd: process.cwd(),
  colors: process.stderr.isTTY === true,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export function createLogger(io: CliIo, verbose: boolean): Logger {
  const write = (message: string): void => io.stderr(`[jsonstrata] ${message}\n`);
  return {
    debug: (message) => {
      if (verbose) write(message);
    },
    info: write,
    warn: write,
    error: write,
  };
}

/**
 * Fragments on disk. `read` takes the first root holding the file;
 * `readAll` collects it from every root, in root order.
 */
export class FileFragmentSource implements FragmentSource {
  constructor(private readonly roots: readonly string[]) {}

  read(name: string): Fragment | undefined {
    for (const root of this.roots) {
      const fragment = readFragment(root, name);
      if (fragment) return fragment;
    }
    return undefined;
  }

  readAll(name: string): Fragment[] {
    const fragments: Fragment[] = [];
    for (const root of this.roots) {
      const fragment = readFragment(root, name);
      if (fragment) fragments.push(fragment);
    }
    return fragments;
  }
}

function readFragment(root: string, name: string): Fragment | undefined {
  const file = path.resolve(root, name);
  if (!fs.existsSync(file) || !fs.statSync(file).isFile()) return undefined;
  return { origin: path.relative(root, file) || name, content: fs.readFileSync(file) };
}

/**
 * Reads and parses one document. Unlike assembly, a missing file or a
 * syntax error is fatal here.
 */
export function readDocument(cwd: string, file: string): JsonNode {
  const fragment = readFragment(cwd, file);
  if (!fragment) {
    throw new FragmentError({
      message: `File "${file}" not found`,
      context: { source: file },
    });
  }

  const { node, issues } = parseJsonNode(fragment.content, { sourceName: file });
  const [first] = issues;
  if (first) throw first;
  return node;
}

/**
 * Registers every `*.json` file of `dir` as `<scheme>:<basename>`
 */
export function loadSchemaDirectory(
  cwd: string,
  dir: string,
  scheme: string
): InMemorySchemaRegistry {
  const root = path.resolve(cwd, dir);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new ConfigError({
      message: `Schema directory "${dir}" does not exist`,
      context: { setting: 'schemas' },
    });
  }

  const registry = new InMemorySchemaRegistry(scheme);
  const files = fs
    .readdirSync(root)
    .filter((entry) => entry.endsWith('.json'))
    .sort();

  for (const file of files) {
    const node = readDocument(root, file);
    registry.register(`${scheme}:${path.basename(file, '.json')}`, node);
  }
  return registry;
}

export function writeOutput(io: CliIo, text: string, out?: string): void {
  if (out === undefined) {
    io.stdout(`${text}\n`);
    return;
  }
  fs.writeFileSync(path.resolve(io.cwd, out), `${text}\n`, 'utf8');
}
