import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from '../analyzer/errors.js';
import { parseSortKey } from '../analyzer/trace-stats.js';
import type { DeadrunConfig, ResolvedConfig } from '../analyzer/types.js';

const CONFIG_FILENAMES = ['deadrun.config.json', 'deadrun.config.yaml', 'deadrun.config.yml'];

/** Environment variable overriding the trace directory */
export const TRACE_DIR_ENV = 'DEADRUN_DIR';

export const DEFAULT_EXCLUDE = ['node_modules/**', 'dist/**', '.git/**', '**/*.d.ts'];

const configFileSchema = z
  .object({
    traceDir: z.string(),
    exclude: z.array(z.string()),
    numlines: z.number(),
    sortBy: z.string(),
    nameWidth: z.number(),
    nodeArgs: z.array(z.string()),
  })
  .partial();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Find the config file in the working directory */
export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_FILENAMES) {
    const path = resolve(cwd, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/** Load config from a file */
export function loadConfigFile(configPath: string): ConfigFile {
  const content = readFileSync(configPath, 'utf-8');

  let data: unknown;
  try {
    data = configPath.endsWith('.yaml') || configPath.endsWith('.yml') ? loadYaml(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Cannot read ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = configFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${configPath}: ${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

/** CLI options that can override config */
export interface CliOptions {
  dir?: string;
  config?: string;
  exclude?: string[];
  numlines?: string;
  sortby?: string;
  nodeArg?: string[];
}

/**
 * Merge CLI options, environment, config file and defaults.
 * Precedence: CLI > DEADRUN_DIR (trace directory only) > file > defaults.
 */
export function resolveConfig(
  cwd: string,
  cliOptions: CliOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const absCwd = resolve(cwd);

  let fileConfig: ConfigFile = {};
  const configPath = cliOptions.config ? resolve(absCwd, cliOptions.config) : findConfigFile(absCwd);
  if (cliOptions.config && configPath && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${cliOptions.config}`);
  }
  if (configPath) {
    fileConfig = loadConfigFile(configPath);
  }

  const traceDir = resolve(
    absCwd,
    cliOptions.dir || env[TRACE_DIR_ENV] || fileConfig.traceDir || '.deadrun'
  );

  // CLI excludes append to defaults + file
  const exclude = [...DEFAULT_EXCLUDE, ...(fileConfig.exclude || []), ...(cliOptions.exclude || [])];

  const numlines = cliOptions.numlines !== undefined ? Number(cliOptions.numlines) : fileConfig.numlines ?? 25;
  if (!Number.isInteger(numlines) || numlines <= 0) {
    throw new ConfigError(`numlines must be a positive integer, got "${cliOptions.numlines ?? fileConfig.numlines}"`);
  }

  const nameWidth = fileConfig.nameWidth ?? 28;
  if (!Number.isInteger(nameWidth) || nameWidth < 4) {
    throw new ConfigError(`nameWidth must be an integer of at least 4, got "${nameWidth}"`);
  }

  const config: DeadrunConfig = {
    traceDir,
    exclude: [...new Set(exclude)],
    numlines,
    sortBy: parseSortKey(cliOptions.sortby || fileConfig.sortBy || 'cumtime'),
    nameWidth,
    nodeArgs: [...(fileConfig.nodeArgs || []), ...(cliOptions.nodeArg || [])],
  };

  return { ...config, cwd: absCwd };
}
