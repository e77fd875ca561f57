import type { EndpointMap } from './endpoints.js';
import { appendTo, dedupeEntries, parsePort, toUrl } from './ports.js';

const INDENT_UNIT = 2;
const SERVICE_INDENT = INDENT_UNIT;

type ScanState =
  | { kind: 'top-level' }
  | { kind: 'services' }
  | { kind: 'service'; service: string }
  | { kind: 'ports'; service: string };

// "- 8080:80", "- \"8080:80\"", "- '127.0.0.1:8080:80/tcp'"; captures the host port.
// The long form (target/published keys) is not recognised.
const SHORT_PORT_PATTERN = /^-\s*["']?(?:\d{1,3}(?:\.\d{1,3}){3}:)?(\d+):\d+(?:\/(?:tcp|udp))?["']?\s*(?:#.*)?$/;

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

export function parseShortPortMapping(item: string): number | null {
  const match = item.match(SHORT_PORT_PATTERN);
  return match ? parsePort(match[1]) : null;
}

// Line-scan a compose file for statically configured host ports:
//   services:
//     web:
//       ports:
//         - "8080:80"
// A service whose ports list yields nothing valid is kept with an empty list.
export function parseComposeFile(content: string, host: string): EndpointMap {
  const urls = new Map<string, string[]>();
  let state: ScanState = { kind: 'top-level' };

  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const indent = indentOf(line);
    const isKey = trimmed.endsWith(':') && !trimmed.startsWith('-');

    if (indent === 0) {
      state = trimmed === 'services:' ? { kind: 'services' } : { kind: 'top-level' };
      continue;
    }
    if (state.kind === 'top-level') continue;

    if (indent === SERVICE_INDENT && isKey) {
      state = { kind: 'service', service: trimmed.slice(0, -1) };
      continue;
    }

    if (state.kind === 'ports') {
      if (trimmed.startsWith('-')) {
        const port = parseShortPortMapping(trimmed);
        if (port !== null) appendTo(urls, state.service, toUrl(host, port));
        continue;
      }
      // Any other property closes the ports list
      state = { kind: 'service', service: state.service };
    }

    if (state.kind === 'service' && trimmed === 'ports:') {
      appendTo(urls, state.service);
      state = { kind: 'ports', service: state.service };
    }
  }

  return dedupeEntries(urls);
}
