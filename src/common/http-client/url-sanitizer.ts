const SECRET_PARAM_KEYS = new Set([
  'apikey',
  'api_key',
  'access_key',
  'access_token',
  'token',
  'key',
  'secret',
  'signature',
  'sig',
  'crumb',
]);

const REDACTED = 'REDACTED';

/**
 * Renders a request URL for the log: user info is dropped and secret query
 * parameters (matched case-insensitively) are replaced. `params` are the
 * axios request params, which are not part of `url` yet.
 */
export function sanitizeUrlForLogging(
  url: string,
  params?: Record<string, unknown>,
): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return '[invalid-url]';
  }

  for (const [name, value] of Object.entries(params ?? {})) {
    if (value !== undefined && value !== null) {
      parsed.searchParams.append(name, String(value));
    }
  }

  const query = new URLSearchParams();
  parsed.searchParams.forEach((value, name) => {
    query.append(
      name,
      SECRET_PARAM_KEYS.has(name.toLowerCase()) ? REDACTED : value,
    );
  });

  const search = query.toString();
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}${search ? `?${search}` : ''}`;
}
