/**
 * Read one field from an untyped request body
 */
export function readField(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  return Reflect.get(body, key);
}

/**
 * Parse a TCP port given as a number or a numeric string
 */
export function parsePort(value: unknown): number | null {
  let port: number;
  if (typeof value === 'number') {
    port = value;
  } else if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    port = parseInt(value.trim(), 10);
  } else {
    return null;
  }

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return null;
  }
  return port;
}
