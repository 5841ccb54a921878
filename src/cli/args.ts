import { CliUsageError } from './errors.js';
import { extractBooleanFlags, extractFlags } from './flag-utils.js';

export interface CliOptions {
  help: boolean;
  version: boolean;
  debug: boolean;
  noColor: boolean;
  file?: string;
  configPath?: string;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const args = [...argv];
  const booleans = extractBooleanFlags(args, ['--help', '-h', '--version', '-v', '--debug', '--no-color']);
  const values = extractFlags(args, ['--file', '-f', '--config', '-c']);

  const unknown = args[0];
  if (unknown !== undefined) {
    throw new CliUsageError(`Unknown argument '${unknown}'.`);
  }

  const options: CliOptions = {
    help: booleans.has('--help') || booleans.has('-h'),
    version: booleans.has('--version') || booleans.has('-v'),
    debug: booleans.has('--debug'),
    noColor: booleans.has('--no-color'),
  };
  const file = values['--file'] ?? values['-f'];
  const configPath = values['--config'] ?? values['-c'];
  if (file !== undefined) options.file = file;
  if (configPath !== undefined) options.configPath = configPath;
  return options;
}
