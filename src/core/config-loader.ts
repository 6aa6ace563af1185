import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import JSON5 from 'json5';
import { parse as parseDotenv } from 'dotenv';
import { validateConfigFile } from './schema-validator.js';
import type {
  ConfigSource,
  LoadedConfig,
  PinConfig,
  PinConfigFile,
} from '../types/config.js';

export const CONFIG_FILE = 'pin.config.json';

export const DEFAULT_CONFIG: PinConfig = {
  tool: 'poetry',
  repoRoot: '../..',
  output: 'tools/requirements.txt',
  exclude: ['acme', '*certbot*'],
  stripPathDependencies: true,
};

const ENV_KEYS = {
  tool: 'PIN_TOOL',
  repoRoot: 'PIN_REPO_ROOT',
  output: 'PIN_OUTPUT',
  exclude: 'PIN_EXCLUDE',
} as const;

export class ConfigLoadError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigLoadError';
  }
}

export interface LoadConfigOptions {
  /** Explicit config file; unlike the default one it must exist. */
  configPath?: string;
  envFilePath?: string;
  noEnv?: boolean;
  /** Environment snapshot. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export function parseExcludeList(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

async function readConfigFile(
  path: string,
  required: boolean,
): Promise<PinConfigFile | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (required) {
      throw new ConfigLoadError(`Cannot read config file: ${path}`, err);
    }
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigLoadError(`Invalid JSON5 in config file: ${path}`, err);
  }

  const result = validateConfigFile(parsed);
  if (!result.valid) {
    throw new ConfigLoadError(
      `Invalid config file ${path}:\n` + result.errors.map((e) => `  ${e}`).join('\n'),
    );
  }
  return result.config;
}

async function readEnvFile(path: string): Promise<Record<string, string>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    // No .env file
    return {};
  }
  return parseDotenv(Buffer.from(content));
}

/**
 * Resolve the pin settings for `workDir`.
 * Precedence: .env > process env > config file > defaults.
 */
export async function loadPinConfig(
  workDir: string,
  options: LoadConfigOptions = {},
): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ? resolve(options.configPath)
    : join(workDir, CONFIG_FILE);
  const fileConfig = await readConfigFile(configPath, options.configPath !== undefined);

  const envFileVars: Record<string, string> = options.noEnv
    ? {}
    : await readEnvFile(options.envFilePath ?? join(workDir, '.env'));

  const config: PinConfig = { ...DEFAULT_CONFIG, exclude: [...DEFAULT_CONFIG.exclude] };
  const sources: Record<keyof PinConfig, ConfigSource> = {
    tool: 'default',
    repoRoot: 'default',
    output: 'default',
    exclude: 'default',
    stripPathDependencies: 'default',
  };

  if (fileConfig) {
    if (fileConfig.tool !== undefined) {
      config.tool = fileConfig.tool;
      sources.tool = 'file';
    }
    if (fileConfig.repoRoot !== undefined) {
      config.repoRoot = fileConfig.repoRoot;
      sources.repoRoot = 'file';
    }
    if (fileConfig.output !== undefined) {
      config.output = fileConfig.output;
      sources.output = 'file';
    }
    if (fileConfig.exclude !== undefined) {
      config.exclude = [...fileConfig.exclude];
      sources.exclude = 'file';
    }
    if (fileConfig.stripPathDependencies !== undefined) {
      config.stripPathDependencies = fileConfig.stripPathDependencies;
      sources.stripPathDependencies = 'file';
    }
  }

  const lookup = (name: string): { value: string; source: ConfigSource } | null => {
    if (envFileVars[name] !== undefined) return { value: envFileVars[name], source: 'dotenv' };
    const fromEnv = env[name];
    if (fromEnv !== undefined) return { value: fromEnv, source: 'env' };
    return null;
  };

  const tool = lookup(ENV_KEYS.tool);
  if (tool && tool.value.trim()) {
    config.tool = tool.value.trim();
    sources.tool = tool.source;
  }
  const repoRoot = lookup(ENV_KEYS.repoRoot);
  if (repoRoot && repoRoot.value.trim()) {
    config.repoRoot = repoRoot.value.trim();
    sources.repoRoot = repoRoot.source;
  }
  const output = lookup(ENV_KEYS.output);
  if (output && output.value.trim()) {
    config.output = output.value.trim();
    sources.output = output.source;
  }
  const exclude = lookup(ENV_KEYS.exclude);
  if (exclude && exclude.value.trim()) {
    config.exclude = parseExcludeList(exclude.value);
    sources.exclude = exclude.source;
  }

  return { config, sources, configPath: fileConfig ? configPath : null };
}
