import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_STORE_FILE } from '../store/task-store.js';

export const ConfigSchema = z.object({
  file: z.string().min(1).default(DEFAULT_STORE_FILE),
  debug: z.boolean().default(false),
  colors: z
    .object({
      disable: z.boolean().optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.tasktui.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'tasktui', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new Error(`Invalid config file ${pathToLoad}${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

export interface Settings {
  file: string;
  debug: boolean;
  colorsDisabled: boolean;
}

export function resolveSettings(
  config: Config,
  flags: { file?: string; debug?: boolean; noColor?: boolean }
): Settings {
  return {
    file: flags.file ?? config.file,
    debug: (flags.debug ?? false) || config.debug,
    colorsDisabled: (flags.noColor ?? false) || (config.colors?.disable ?? false),
  };
}
