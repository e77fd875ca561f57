import type { EndpointMap } from './endpoints.js';
import { appendTo, dedupeEntries, parsePort, toUrl } from './ports.js';

const PUBLISHED_MARKER = '->';

// "0.0.0.0:8080->80/tcp" or "[::]:8080->80/tcp"; captures the host port
const PUBLISHED_PORT_PATTERN = /[^\s,]*:(\d+)->/g;

export function extractPublishedPorts(portsColumn: string): number[] {
  const ports: number[] = [];
  for (const match of portsColumn.matchAll(PUBLISHED_PORT_PATTERN)) {
    const port = parsePort(match[1]);
    if (port !== null) ports.push(port);
  }
  return ports;
}

// Parse `docker ps --format 'table {{.Names}}\t{{.Ports}}'` output:
//   NAMES          PORTS
//   myapp-web-1    0.0.0.0:8080->80/tcp, 0.0.0.0:8443->443/tcp
//   myapp-db-1     3306/tcp
export function parseDockerPsTable(output: string, host: string): EndpointMap {
  const urls = new Map<string, string[]>();
  const rows = output
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.length > 0)
    .slice(1);

  for (const row of rows) {
    const tab = row.indexOf('\t');
    if (tab === -1) continue;

    const name = row.slice(0, tab).trim();
    const portsColumn = row.slice(tab + 1).trim();
    if (!name || !portsColumn.includes(PUBLISHED_MARKER)) continue;

    const published = extractPublishedPorts(portsColumn).map((port) => toUrl(host, port));
    if (published.length > 0) {
      appendTo(urls, name, ...published);
    }
  }

  return dedupeEntries(urls);
}
