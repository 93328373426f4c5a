import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getExitCode, ErrorCode } from '@jsonstrata/core';
import type { CliIo } from '../io';
import { run } from '../index';
import { stripAnsi } from '../render';

interface Captured {
  io: CliIo;
  stdout: () => string;
  stderr: () => string;
}

function capture(cwd: string): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      cwd,
      colors: false,
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
    },
    stdout: () => out.join(''),
    stderr: () => stripAnsi(err.join('')),
  };
}

let dir: string;

async function write(name: string, content: unknown): Promise<void> {
  const file = path.join(dir, name);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(
    file,
    typeof content === 'string' ? content : JSON.stringify(content),
    'utf8'
  );
}

async function cli(...argv: string[]): Promise<{ code: number; stdout: string; stderr: string }> {
  const captured = capture(dir);
  const code = await run(argv, captured.io);
  return { code, stdout: captured.stdout(), stderr: captured.stderr() };
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'jsonstrata-cli-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('merge', () => {
  it('merges fragments in order', async () => {
    await write('base.json', { hp: 10, speed: 4, abilities: { fly: true } });
    await write('patch.json', { hp: 12, abilities: null });

    const result = await cli('merge', 'base.json', 'patch.json', '--compact');

    expect(result).toEqual({ code: 0, stdout: '{"hp":12,"speed":4}\n', stderr: '' });
  });

  it('pretty-prints by default and honours --out', async () => {
    await write('a.json', { x: 1 });

    const result = await cli('merge', 'a.json', '--out', 'merged.json');

    expect(result.stdout).toBe('');
    expect(await readFile(path.join(dir, 'merged.json'), 'utf8')).toBe('{\n  "x": 1\n}\n');
  });

  it('reports missing fragments but still prints the merge', async () => {
    await write('a.json', { x: 1 });

    const result = await cli('merge', 'missing.json', 'a.json', '--compact');

    expect(result.code).toBe(getExitCode(ErrorCode.FRAGMENT_NOT_FOUND));
    expect(result.stdout).toBe('{"x":1}\n');
    expect(result.stderr).toBe('[jsonstrata] Fragment "missing.json" not found\n');
  });

  it('prints debug lines with --verbose', async () => {
    await write('a.json', { x: 1 });

    const result = await cli('--verbose', 'merge', 'a.json', '--compact');

    expect(result.stderr).toBe('[jsonstrata] merging a.json\n');
  });
});

describe('assemble', () => {
  it('merges the same file from every root', async () => {
    await write('core/config/heroes.json', { knight: { hp: 5, mp: 1 } });
    await write('mod/config/heroes.json', { knight: { hp: 6 } });

    const result = await cli(
      'assemble',
      'config/heroes.json',
      '--root',
      'core',
      'mod',
      '--compact'
    );

    expect(result.code).toBe(0);
    expect(result.stdout).toBe('{"knight":{"hp":6,"mp":1}}\n');
  });
});

describe('tree algebra', () => {
  it('inherit applies the descendant over its base', async () => {
    await write('base.json', { hp: 10, speed: 4 });
    await write('child.json', { speed: 6, flying: true });

    const result = await cli('inherit', 'base.json', 'child.json', '--compact');

    expect(result.stdout).toBe('{"flying":true,"hp":10,"speed":6}\n');
  });

  it('diff prints the patch from base to file', async () => {
    await write('node.json', { a: 1, b: [1, 2] });
    await write('base.json', { a: 1, b: [1], c: true });

    const result = await cli('diff', 'node.json', 'base.json', '--compact');

    expect(result.stdout).toBe('{"b":[1,2],"c":null}\n');
  });

  it('intersect prunes empty keys unless told not to', async () => {
    await write('a.json', { x: 1, y: 2 });
    await write('b.json', { x: 1, y: 3 });

    expect((await cli('intersect', 'a.json', 'b.json', '--compact')).stdout).toBe(
      '{"x":1}\n'
    );
    expect(
      (await cli('intersect', 'a.json', 'b.json', '--no-prune', '--compact')).stdout
    ).toBe('{"x":1,"y":null}\n');
  });
});

describe('get', () => {
  beforeEach(async () => {
    await write('data.json', { units: [{ name: 'imp' }] });
  });

  it('prints the node at a pointer', async () => {
    const result = await cli('get', 'data.json', '/units/0/name');
    expect(result).toEqual({ code: 0, stdout: '"imp"\n', stderr: '' });
  });

  it('prints the whole document without a pointer', async () => {
    const result = await cli('get', 'data.json', '--compact');
    expect(result.stdout).toBe('{"units":[{"name":"imp"}]}\n');
  });

  it('renders unresolved pointers as errors', async () => {
    const result = await cli('get', 'data.json', '/nope');

    expect(result.code).toBe(getExitCode(ErrorCode.POINTER_UNRESOLVED));
    expect(result.stdout).toBe('');
    expect(result.stderr.split('\n')[0]).toBe(
      'Error E200: Cannot resolve "/nope" at "/nope": no such key'
    );
    expect(result.stderr.split('\n')[1]).toBe('Location: path /nope');
  });
});

describe('schema commands', () => {
  beforeEach(async () => {
    await write('schemas/creature.json', {
      type: 'object',
      required: ['name'],
      properties: { hp: { type: 'integer', minimum: 1 } },
    });
    await write('schemas/unit.json', {
      type: 'object',
      required: ['hp', 'name'],
      properties: { hp: { type: 'integer', default: 10 }, name: { type: 'string' } },
    });
  });

  it('validate reports valid files on stdout', async () => {
    await write('imp.json', { name: 'imp', hp: 3 });

    const result = await cli('validate', 'imp.json', '--schema', 'creature', '--schemas', 'schemas');

    expect(result).toEqual({ code: 0, stdout: 'imp.json: valid\n', stderr: '' });
  });

  it('validate logs failures and exits with the validation code', async () => {
    await write('bad.json', { name: 'imp', hp: 0 });

    const result = await cli('validate', 'bad.json', '-s', 'core:creature', '--schemas', 'schemas');

    expect(result.code).toBe(getExitCode(ErrorCode.VALIDATION_FAILED));
    expect(result.stderr).toBe(
      '[jsonstrata] bad.json: /hp must be >= 1\n' +
        '[jsonstrata] 1 of 1 file(s) failed validation\n'
    );
  });

  it('minimize drops defaults and maximize restores them', async () => {
    await write('full.json', { hp: 10, name: 'imp' });
    await write('short.json', { name: 'imp' });

    const minimized = await cli('minimize', 'full.json', '-s', 'unit', '--schemas', 'schemas', '--compact');
    const maximized = await cli('maximize', 'short.json', '-s', 'unit', '--schemas', 'schemas', '--compact');

    expect(minimized.stdout).toBe('{"name":"imp"}\n');
    expect(maximized.stdout).toBe('{"hp":10,"name":"imp"}\n');
  });

  it('an unknown schema is an error', async () => {
    await write('short.json', { name: 'imp' });

    const result = await cli('maximize', 'short.json', '-s', 'dragon', '--schemas', 'schemas');

    expect(result.code).toBe(getExitCode(ErrorCode.SCHEMA_NOT_FOUND));
    expect(result.stdout).toBe('');
  });

  it('the schema option is required', async () => {
    await write('imp.json', { name: 'imp' });

    const result = await cli('validate', 'imp.json', '--schemas', 'schemas');

    expect(result.code).toBe(getExitCode(ErrorCode.CONFIGURATION_ERROR));
    expect(result.stderr.split('\n')[0]).toBe(
      'Error E500: Missing required option --schema'
    );
  });

  it('a missing schema directory is a configuration error', async () => {
    await write('imp.json', { name: 'imp' });

    const result = await cli('validate', 'imp.json', '-s', 'creature', '--schemas', 'nowhere');

    expect(result.code).toBe(getExitCode(ErrorCode.CONFIGURATION_ERROR));
  });
});

describe('input errors', () => {
  it('a missing document is a fragment error', async () => {
    const result = await cli('diff', 'a.json', 'b.json');
    expect(result.code).toBe(getExitCode(ErrorCode.FRAGMENT_NOT_FOUND));
    expect(result.stderr.split('\n')[0]).toBe('Error E600: File "a.json" not found');
  });

  it('a syntax error is a parse error', async () => {
    await write('broken.json', '{"a": [1, 2}');
    await write('ok.json', {});

    const result = await cli('diff', 'broken.json', 'ok.json');

    expect(result.code).toBe(getExitCode(ErrorCode.PARSE_ERROR));
    expect(result.stderr.startsWith('Error E100: broken.json:1:')).toBe(true);
  });
});

describe('commander behaviour', () => {
  it('--help exits with 0', async () => {
    const result = await cli('--help');
    expect(result.code).toBe(0);
    expect(result.stdout.startsWith('Usage: jsonstrata [options] [command]')).toBe(true);
  });

  it('unknown commands exit with 1', async () => {
    const result = await cli('explode');
    expect(result.code).toBe(1);
    expect(result.stderr).toContain("unknown command 'explode'");
  });
});
