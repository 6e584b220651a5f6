import { existsSync, readFileSync } from 'fs';

import { load } from 'js-yaml';

import { DEFAULT_CONFIG_FILE } from '../constants';
import { ConfigException } from '../exceptions';
import { isPlainObject } from '../utils/object.util';

/**
 * Reads the raw YAML document. An absent default `config.yaml` yields an
 * empty document; an explicitly requested file must exist.
 */
export function yamlLoader(configPath?: string): Record<string, unknown> {
  const yamlPath = configPath || DEFAULT_CONFIG_FILE;

  if (!configPath && !existsSync(yamlPath)) {
    return {};
  }

  let yamlContent: string;
  try {
    yamlContent = readFileSync(yamlPath, 'utf8');
  } catch (error) {
    throw new ConfigException(
      `Failed to read YAML config file at ${yamlPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  let parsedYaml: unknown;
  try {
    parsedYaml = load(yamlContent);
  } catch (error) {
    throw new ConfigException(
      `Failed to parse YAML config file at ${yamlPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  if (parsedYaml === undefined || parsedYaml === null) {
    return {};
  }

  if (!isPlainObject(parsedYaml)) {
    throw new ConfigException(
      `YAML config file at ${yamlPath} must contain a mapping at the top level`,
    );
  }

  return parsedYaml;
}
