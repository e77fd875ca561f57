import type { EndpointMap } from './endpoints.js';
import { UNKNOWN_SERVICES } from './endpoints.js';
import { parsePort, toUrl, unique } from './ports.js';

// Parse a newline list of bare listener ports. Container names are unknown
// here, so everything lands under a single synthetic key.
export function parseListenerPorts(output: string, host: string): EndpointMap {
  const ports = unique(
    output
      .split('\n')
      .map(parsePort)
      .filter((port): port is number => port !== null)
  ).sort((a, b) => a - b);

  if (ports.length === 0) {
    return new Map();
  }

  return new Map([[UNKNOWN_SERVICES, ports.map((port) => toUrl(host, port))]]);
}
