#!/usr/bin/env node
import { parseCliArgs } from './cli/args.js';
import { CliUsageError } from './cli/errors.js';
import { printHelp, printVersion } from './cli/help.js';
import { loadConfig, resolveSettings } from './config/loader.js';
import { createFileTaskStore } from './store/task-store.js';
import { runInteractiveTui } from './tui/interactive.js';
import { TerminalSetupError } from './tui/terminal.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  try {
    const options = parseCliArgs(process.argv.slice(2));

    if (options.help) {
      printHelp();
      return;
    }
    if (options.version) {
      printVersion(VERSION);
      return;
    }

    const config = loadConfig(options.configPath);
    const settings = resolveSettings(config, options);

    await runInteractiveTui({
      store: createFileTaskStore(settings.file),
      debug: settings.debug,
      colorsDisabled: settings.colorsDisabled,
    });
  } catch (error) {
    if (error instanceof CliUsageError) {
      printHelp(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof TerminalSetupError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
