import { TSchema } from '@sinclair/typebox';
import { AssertError, TransformDecodeError } from '@sinclair/typebox/value';

import { ConfigException } from '../exceptions';

function extractDescription(schema: TSchema | undefined): string | undefined {
  if (!schema) return undefined;
  if (typeof schema.description === 'string') return schema.description;

  const variants: unknown = schema.anyOf;
  if (Array.isArray(variants)) {
    for (const variant of variants) {
      if (
        variant &&
        typeof variant === 'object' &&
        'description' in variant &&
        typeof variant.description === 'string'
      ) {
        return variant.description;
      }
    }
  }
  return undefined;
}

function getSchemaHint(path: string): string {
  if (path.startsWith('/sheet/spreadsheetId')) {
    return 'Tip: set SPREADSHEET_ID or sheet.spreadsheetId to the id found in the spreadsheet URL';
  }
  if (path.startsWith('/market')) {
    return 'Tip: market times use HH:mm, trading days use 1 (Monday) to 7 (Sunday), holidays use YYYY-MM-DD';
  }
  if (path.startsWith('/logger')) {
    return 'Tip: logger.level should be one of: error, warn, info, debug, verbose';
  }
  if (path.startsWith('/fetch')) {
    return 'Tip: fetch settings are attempt counts and delays in milliseconds';
  }

  return '';
}

function toFieldName(path: string): string {
  return path ? path.replace(/^\//, '').replace(/\//g, '.') : 'unknown';
}

function handleAssertError(error: AssertError, context: string): never {
  const errorDetails = error.error;

  if (!errorDetails) {
    throw new ConfigException(
      `${context}\nConfiguration validation failed. Please verify your configuration structure.`,
      { cause: error },
    );
  }

  const fieldName = toFieldName(errorDetails.path);
  const valueDisplay =
    errorDetails.value !== undefined
      ? ` (received: ${JSON.stringify(errorDetails.value)})`
      : '';
  const fieldDescription = extractDescription(errorDetails.schema);

  const message = [
    `${context}: ${fieldName}`,
    `Expected: ${errorDetails.message}${valueDisplay}`,
    fieldDescription ? `Description: ${fieldDescription}` : '',
    getSchemaHint(errorDetails.path),
    'See config.example.yaml and .env.example for reference.',
  ]
    .filter(Boolean)
    .join('\n');

  throw new ConfigException(message, { cause: error });
}

function handleDecodeError(error: TransformDecodeError, context: string): never {
  const fieldName = toFieldName(error.path);
  throw new ConfigException(`${context}: ${fieldName}\n${error.message}`, {
    cause: error,
  });
}

export function handleValidationError(error: unknown, context: string): never {
  if (error instanceof ConfigException) {
    throw error;
  }
  if (error instanceof AssertError) {
    handleAssertError(error, context);
  }
  if (error instanceof TransformDecodeError) {
    handleDecodeError(error, context);
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  throw new ConfigException(`${context}\nError: ${errorMessage}`, {
    cause: error,
  });
}
