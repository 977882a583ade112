import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'seedling.config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicitly
 * requested file must exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  const exists = await fileExists(fullPath);

  if (!exists) {
    if (configPath) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, {
        path: fullPath,
      });
    }
    return getDefaultConfig();
  }

  try {
    const config = await loadYamlWithSchema(fullPath, ConfigSchema);
    return resolveFragmentsDirectory(config, path.dirname(fullPath));
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
 * A relative fragments directory is relative to the config file.
 */
function resolveFragmentsDirectory(config: Config, configDir: string): Config {
  const directory = config.fragments.directory;
  if (!directory || path.isAbsolute(directory)) {
    return config;
  }
  return {
    ...config,
    fragments: { ...config.fragments, directory: path.resolve(configDir, directory) },
  };
}
