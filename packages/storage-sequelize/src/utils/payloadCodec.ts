/**
 * Queue payloads are stored as JSON text so that any producer value,
 * including bare strings and numbers, reads back unchanged.
 */
export function encodePayload(data: unknown): string | null {
  if (data === undefined || data === null) return null;
  return JSON.stringify(data);
}

/**
 * Decode a stored payload. Drivers that hand back a Buffer for TEXT columns
 * are accepted too.
 *
 * Text that is not JSON is returned as-is: the worker then drops the item as
 * malformed instead of failing the claim.
 */
export function decodePayload(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  const text = Buffer.isBuffer(value) ? value.toString('utf8') : value;
  if (typeof text !== 'string') return text;
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) return text;
    throw error;
  }
}
