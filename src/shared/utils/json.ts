/**
 * Parse a stored JSON string, returning undefined when it is not valid JSON
 */
export function parseJson(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return undefined;
  }
}
