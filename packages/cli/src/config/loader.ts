import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, getErrorMessage, getLanguageProfile } from '@callflow/parser';
import { configFileSchema, type CallflowConfig } from './schema.js';

export const CONFIG_FILENAME = '.callflow.yml';

export interface LoadConfigOptions {
  /** Directory searched for .callflow.yml (defaults to cwd) */
  rootDir?: string;
  /** Explicit config path; unlike the default location it must exist */
  configPath?: string;
}

/**
 * Command-line switches that override the config file
 */
export interface ConfigOverrides {
  abortOnError?: boolean;
  strict?: boolean;
}

/**
 * Parse and validate config file content.
 *
 * @throws {ConfigError} on YAML syntax errors or schema violations
 */
export function parseConfig(content: string, source: string = CONFIG_FILENAME): CallflowConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}: ${getErrorMessage(error)}`, { path: source });
  }

  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const key = issue.path.join('.');
      return key ? `${key}: ${issue.message}` : issue.message;
    });
    throw new ConfigError(`Invalid config in ${source}: ${issues.join('; ')}`, {
      path: source,
      issues,
    });
  }

  const { extensions, ...rest } = result.data;
  return {
    ...rest,
    extensions: extensions ?? [...getLanguageProfile(rest.language).extensions],
  };
}

/**
 * Load configuration, falling back to defaults when no file exists at the
 * default location.
 *
 * @throws {ConfigError} if the file is invalid, or an explicit path cannot be read
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CallflowConfig> {
  const configPath =
    options.configPath ?? path.join(options.rootDir ?? process.cwd(), CONFIG_FILENAME);

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (!options.configPath && (error as NodeJS.ErrnoException).code === 'ENOENT') {
      return parseConfig('', configPath);
    }
    throw new ConfigError(`Cannot read config ${configPath}: ${getErrorMessage(error)}`, {
      path: configPath,
    });
  }

  return parseConfig(content, configPath);
}

/**
 * Apply command-line switches on top of a loaded config
 */
export function applyOverrides(config: CallflowConfig, overrides: ConfigOverrides): CallflowConfig {
  return {
    ...config,
    onLexError: overrides.abortOnError ? 'abort-run' : config.onLexError,
    truncation: overrides.strict ? 'strict' : config.truncation,
  };
}
