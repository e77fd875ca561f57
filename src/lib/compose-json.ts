import { z } from 'zod';
import type { EndpointMap } from './endpoints.js';
import { appendTo, dedupeEntries, isValidPort, toUrl } from './ports.js';

// Field names are matched case-insensitively ("Name", "name", "PublishedPort", "publishedPort")
function lowerCaseKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).map(([key, field]) => [key.toLowerCase(), field]));
}

// Shape of one record from `docker compose ps --format json`, e.g.
// {"Name":"myapp-web-1","Service":"web","Publishers":[{"URL":"","TargetPort":80,"PublishedPort":8080,"Protocol":"tcp"}]}
export const PortPublisherSchema = z.preprocess(
  lowerCaseKeys,
  z.object({
    url: z.string().nullish(),
    targetport: z.number().int().nullish(),
    publishedport: z.number().int(),
    protocol: z.string().nullish(),
  })
);

// Publishers are validated one by one so a bad entry only drops itself
export const ComposeContainerSchema = z.preprocess(
  lowerCaseKeys,
  z.object({
    name: z.string().nullish(),
    service: z.string().nullish(),
    state: z.string().nullish(),
    publishers: z.array(z.unknown()).nullish(),
  })
);

export type PortPublisher = z.infer<typeof PortPublisherSchema>;
export type ComposeContainer = z.infer<typeof ComposeContainerSchema>;

function parseLine(line: string): ComposeContainer[] {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return [];
  }

  // Older compose releases print the whole listing as a single array
  const candidates: unknown[] = Array.isArray(raw) ? raw : [raw];
  return candidates.flatMap((candidate) => {
    const parsed = ComposeContainerSchema.safeParse(candidate);
    return parsed.success ? [parsed.data] : [];
  });
}

function publishedPorts(container: ComposeContainer): number[] {
  return (container.publishers ?? []).flatMap((entry) => {
    const parsed = PortPublisherSchema.safeParse(entry);
    return parsed.success && isValidPort(parsed.data.publishedport) ? [parsed.data.publishedport] : [];
  });
}

// Parse `compose ps --format json` output (one JSON object per line)
export function parseComposeJson(output: string, host: string): EndpointMap {
  const urls = new Map<string, string[]>();

  for (const line of output.split('\n')) {
    if (!line.trim()) continue;

    for (const container of parseLine(line)) {
      if (!container.name) continue;

      const published = publishedPorts(container).map((port) => toUrl(host, port));
      if (published.length > 0) {
        appendTo(urls, container.name, ...published);
      }
    }
  }

  return dedupeEntries(urls);
}
