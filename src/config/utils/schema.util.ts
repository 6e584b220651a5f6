import { TLiteral, TString, TTransform, TUnion, Type } from '@sinclair/typebox';

const TRUE_VALUES = ['true', '1', 'yes'];

export const booleanFromString = (options?: {
  description?: string;
}): TTransform<TString, boolean> =>
  Type.Transform(
    Type.String({
      ...(options?.description && { description: options.description }),
    }),
  )
    .Decode((val) => TRUE_VALUES.includes(val.trim().toLowerCase()))
    .Encode((val) => (val ? 'true' : 'false'));

export const variantsSchema = <T extends readonly string[]>(
  values: T,
  options?: {
    default?: T[number];
    description?: string;
    examples?: string[];
  },
): TUnion<TLiteral<T[number]>[]> =>
  Type.Union(
    values.map((value) => Type.Literal(value)),
    {
      ...(options?.default && { default: options.default }),
      ...(options?.description && { description: options.description }),
      ...(options?.examples && { examples: options.examples }),
    },
  );

export const timeZoneSchema = (
  defaultValue: string,
  options?: { description?: string },
): TTransform<TString, string> =>
  Type.Transform(
    Type.String({
      minLength: 1,
      default: defaultValue,
      ...(options?.description && { description: options.description }),
    }),
  )
    .Decode((value) => {
      try {
        new Intl.DateTimeFormat('en-US', { timeZone: value });
      } catch {
        throw new Error(`Invalid time zone: ${value}`);
      }
      return value;
    })
    .Encode((value) => value);

export const wallClockTimeSchema = (
  defaultValue: string,
  options?: { description?: string },
): TString =>
  Type.String({
    pattern: '^([01][0-9]|2[0-3]):[0-5][0-9]$',
    default: defaultValue,
    examples: ['09:00', '16:00'],
    ...(options?.description && { description: options.description }),
  });

export const a1CellSchema = (
  defaultValue: string,
  options?: { description?: string },
): TString =>
  Type.String({
    pattern: '^[A-Za-z]{1,3}[1-9][0-9]*$',
    default: defaultValue,
    ...(options?.description && { description: options.description }),
  });
