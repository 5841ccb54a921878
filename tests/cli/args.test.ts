import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../../src/cli/args.js';
import { CliUsageError } from '../../src/cli/errors.js';

describe('parseCliArgs', () => {
  it('defaults everything off', () => {
    expect(parseCliArgs([])).toEqual({ help: false, version: false, debug: false, noColor: false });
  });

  it('enables debug with --debug', () => {
    expect(parseCliArgs(['--debug']).debug).toBe(true);
  });

  it('reads file and config paths from long and short flags', () => {
    const options = parseCliArgs(['-f', 'work.json', '--config', 'cfg.json', '--no-color']);
    expect(options.file).toBe('work.json');
    expect(options.configPath).toBe('cfg.json');
    expect(options.noColor).toBe(true);
  });

  it('does not modify the caller array', () => {
    const argv = ['--debug', '--file', 'x.json'];
    parseCliArgs(argv);
    expect(argv).toEqual(['--debug', '--file', 'x.json']);
  });

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['--file'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--file', '--debug'])).toThrow("Flag '--file' requires a value.");
  });

  it('rejects unknown arguments', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow("Unknown argument '--verbose'.");
  });
});
