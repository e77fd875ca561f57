export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

// Parse a bare decimal port ("8080"); anything else, including signs and
// out-of-range values, yields null
export function parsePort(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const port = parseInt(trimmed, 10);
  return isValidPort(port) ? port : null;
}

export function toUrl(host: string, port: number): string {
  return `http://${host}:${port}`;
}

export function unique<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}

// Append to a list-valued map, creating the entry on first use
export function appendTo(map: Map<string, string[]>, key: string, ...values: string[]): void {
  const existing = map.get(key);
  if (existing) {
    existing.push(...values);
  } else {
    map.set(key, [...values]);
  }
}

export function dedupeEntries(map: Map<string, string[]>): Map<string, string[]> {
  const result = new Map<string, string[]>();
  for (const [key, values] of map) {
    result.set(key, unique(values));
  }
  return result;
}
