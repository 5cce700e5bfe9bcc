/**
 * @arch propweave.core.domain
 */
import * as path from 'node:path';
import { ConfigSchema, type Config, type ConventionsConfig } from './schema.js';
import type { ConventionOptionsInput } from '../conventions/options.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'propweave.config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Builder conventions from the config file's snake_case section.
 */
export function toConventionOptions(conventions: ConventionsConfig): ConventionOptionsInput {
  return {
    fieldPrefixes: conventions.field_prefixes,
    propertySuffixes: conventions.property_suffixes,
    getterPrefixes: conventions.getter_prefixes,
    setterPrefixes: conventions.setter_prefixes,
    ignoreMarker: conventions.ignore_marker,
  };
}
