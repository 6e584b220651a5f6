import { Value } from '@sinclair/typebox/value';

import { envValidationSchema } from '../schema';
import { handleValidationError } from '../utils/validation-error.util';

export interface EnvOverrides {
  configFile?: string;
  overrides: Record<string, unknown>;
}

function withoutBlankValues(
  env: NodeJS.ProcessEnv,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Maps the supported environment variables onto configuration paths. Only
 * variables that are set produce an override.
 */
export function envLoader(env: NodeJS.ProcessEnv): EnvOverrides {
  try {
    const parsedEnvs = Value.Parse(envValidationSchema, withoutBlankValues(env));

    const sheet: Record<string, unknown> = {};
    const logger: Record<string, unknown> = {};
    const market: Record<string, unknown> = {};

    if (parsedEnvs.SPREADSHEET_ID !== undefined) {
      sheet.spreadsheetId = parsedEnvs.SPREADSHEET_ID;
    }
    const credentialsFile =
      parsedEnvs.GOOGLE_APPLICATION_CREDENTIALS ?? parsedEnvs.CREDENTIALS_FILE;
    if (credentialsFile !== undefined) {
      sheet.credentialsFile = credentialsFile;
    }
    if (parsedEnvs.LOGGER_LEVEL !== undefined) {
      logger.level = parsedEnvs.LOGGER_LEVEL;
    }
    if (parsedEnvs.LOGGER_PRETTY_ENABLED !== undefined) {
      logger.isPrettyEnabled = parsedEnvs.LOGGER_PRETTY_ENABLED;
    }
    if (parsedEnvs.MARKET_TIMEZONE !== undefined) {
      market.timezone = parsedEnvs.MARKET_TIMEZONE;
    }

    const overrides: Record<string, unknown> = {};
    for (const [key, section] of Object.entries({ sheet, logger, market })) {
      if (Object.keys(section).length > 0) {
        overrides[key] = section;
      }
    }

    return { configFile: parsedEnvs.CONFIG_FILE, overrides };
  } catch (error) {
    handleValidationError(error, 'Failed to load environment variables');
  }
}
