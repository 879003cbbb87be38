export type HeaderMap = Record<string, string | string[] | undefined>;

/**
 * Read a single response header value, case-insensitively
 *
 * Repeated headers yield their first value.
 */
export function headerValue(headers: HeaderMap, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    const first = Array.isArray(value) ? value[0] : value;
    return first === undefined || first === '' ? undefined : first;
  }
  return undefined;
}
