import { describe, test, expect, beforeEach, afterEach } from 'vitest';

import { ErrorPresenter } from '../presenter';
import { ErrorCode } from '../codes';
import { ConfigError, FragmentError, SchemaError } from '../../types/errors';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('formatForCLI builds title, location and exit code', () => {
    const error = new SchemaError({
      message: 'Schema "core:x" has no node at "/a"',
      context: { schema: 'core:x', path: '/a' },
    });
    const view = new ErrorPresenter('dev', { terminalWidth: 100 }).formatForCLI(error);

    expect(view.title).toBe('Error E300: Schema "core:x" has no node at "/a"');
    expect(view.code).toBe(ErrorCode.SCHEMA_NOT_FOUND);
    expect(view.exitCode).toBe(30);
    expect(view.location).toBe('Location: path /a, schema core:x');
    expect(view.terminalWidth).toBe(100);
    expect(view.details).toEqual([]);
  });

  test('workaround prefers suggestions over the context suggestion', () => {
    const error = new ConfigError({
      message: 'bad scheme',
      context: { setting: 'schema.defaultScheme', suggestion: 'Use letters' },
    });
    const presenter = new ErrorPresenter('prod', { colors: false });
    expect(presenter.formatForCLI(error).workaround).toBe('Use letters');

    error.suggestions = ['Pass --scheme core'];
    expect(presenter.formatForCLI(error).workaround).toBe('Pass --scheme core');
  });

  test('details and source are carried through', () => {
    const error = new FragmentError({
      message: 'Fragment "a.json" not found',
      context: { source: 'a.json' },
    });
    const view = new ErrorPresenter('dev').formatForCLI(error, ['searched: ./mods']);

    expect(view.source).toBe('a.json');
    expect(view.location).toBeUndefined();
    expect(view.details).toEqual(['searched: ./mods']);
  });

  test('colors follow the environment, then options, then env mode', () => {
    const error = new FragmentError({ message: 'x', context: { source: 'a' } });

    expect(new ErrorPresenter('dev').formatForCLI(error).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(error).colors).toBe(false);
    expect(new ErrorPresenter('prod', { colors: true }).formatForCLI(error).colors).toBe(true);

    process.env.NO_COLOR = '1';
    expect(new ErrorPresenter('dev', { colors: true }).formatForCLI(error).colors).toBe(false);

    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    expect(new ErrorPresenter('prod', { colors: false }).formatForCLI(error).colors).toBe(true);
  });
});
