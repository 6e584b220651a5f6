import { Type } from '@sinclair/typebox';

import { LOGGER_LEVELS } from '../constants';
import { booleanFromString, variantsSchema } from '../utils/schema.util';

export const envValidationSchema = Type.Object({
  CONFIG_FILE: Type.Optional(
    Type.String({
      description: 'Path to the YAML configuration file',
    }),
  ),
  SPREADSHEET_ID: Type.Optional(
    Type.String({
      description: 'Identifier of the spreadsheet to update',
    }),
  ),
  GOOGLE_APPLICATION_CREDENTIALS: Type.Optional(
    Type.String({
      description: 'Path to the service account key file',
    }),
  ),
  CREDENTIALS_FILE: Type.Optional(
    Type.String({
      description:
        'Path to the service account key file (used when GOOGLE_APPLICATION_CREDENTIALS is unset)',
    }),
  ),
  LOGGER_LEVEL: Type.Optional(
    variantsSchema(LOGGER_LEVELS, {
      description:
        'Logging level for the application. Controls verbosity of log output.',
      examples: ['error', 'warn', 'info', 'debug'],
    }),
  ),
  LOGGER_PRETTY_ENABLED: Type.Optional(
    booleanFromString({
      description: 'Enable pretty printing for logs',
    }),
  ),
  MARKET_TIMEZONE: Type.Optional(
    Type.String({
      description: 'IANA time zone the exchange trades in',
    }),
  ),
});
