import { Static, Type } from '@sinclair/typebox';

interface CreateSourceSchemaParams {
  rpsDefault: number;
  maxConcurrentDefault?: number;
  timeoutMsDefault?: number;
}

const createSourceSchema = ({
  rpsDefault,
  maxConcurrentDefault = 1,
  timeoutMsDefault = 10000,
}: CreateSourceSchemaParams) =>
  Type.Object(
    {
      enabled: Type.Boolean({
        description: 'Enable or disable this price source',
        default: true,
      }),
      maxConcurrent: Type.Integer({
        minimum: 1,
        description: 'Maximum number of concurrent requests',
        default: maxConcurrentDefault,
      }),
      timeoutMs: Type.Integer({
        minimum: 1000,
        description: 'Request timeout in milliseconds',
        default: timeoutMsDefault,
      }),
      rps: Type.Union(
        [
          Type.Number({
            minimum: 0.0001,
            maximum: 1000,
            description:
              'Requests per second limit to prevent API rate limiting',
          }),
          Type.Null({
            description: 'Disable RPS limiting',
          }),
        ],
        {
          default: rpsDefault,
          description:
            'Requests per second limit to prevent API rate limiting. Set to null to disable limiting',
        },
      ),
      useProxy: Type.Union(
        [
          Type.Boolean({
            description: 'Use global proxy configuration from config.proxy',
          }),
          Type.String({
            description: 'Custom proxy URL for this source',
            pattern: '^https?://.+',
          }),
        ],
        {
          description:
            'Proxy configuration: true/false for global proxy, or URL string for custom proxy',
          default: false,
        },
      ),
      maxRetries: Type.Integer({
        minimum: 0,
        maximum: 10,
        description:
          'Immediate transport-level retries (network errors, 5xx, 429) inside a single fetch attempt',
        default: 0,
      }),
    },
    {
      default: {},
    },
  );

export const yahooFinanceSourceSchema = createSourceSchema({
  rpsDefault: 1,
});

export const frankfurterSourceSchema = createSourceSchema({
  rpsDefault: 10,
});

export const sourcesSchema = Type.Object(
  {
    yahoofinance: yahooFinanceSourceSchema,
    frankfurter: frankfurterSourceSchema,
  },
  { default: {} },
);

export type SourceConfig = Static<typeof yahooFinanceSourceSchema>;
export type SourcesConfig = Static<typeof sourcesSchema>;
