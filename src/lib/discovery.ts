import type { EndpointMap } from './endpoints.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { RemoteSession } from './remote.js';
import { runRemoteCommand } from './remote.js';
import { parseComposeJson } from './compose-json.js';
import { parseDockerPsTable } from './docker-ps.js';
import { parseComposeFile } from './compose-file.js';
import { parseListenerPorts } from './listeners.js';

export type DiscoveryStrategyName = 'compose-json' | 'docker-ps' | 'compose-file' | 'listeners';

export interface DiscoveryStrategy {
  name: DiscoveryStrategyName;
  command: string;
  parse(output: string, host: string): EndpointMap;
}

export interface DiscoveryOptions {
  host?: string;
  signal?: AbortSignal;
  logger?: Logger;
  composeCommands?: string[];
  composeFiles?: string[];
}

export interface DiscoveryResult {
  strategy: DiscoveryStrategyName | null;
  endpoints: EndpointMap;
}

export const DEFAULT_COMPOSE_COMMANDS = ['docker compose', 'docker-compose'];
export const DEFAULT_COMPOSE_FILES = ['docker-compose.yml', 'docker-compose.yaml'];

const LISTENER_COMMAND =
  "netstat -tlnp 2>/dev/null | grep docker-proxy | awk '{print $4}' | sed 's/.*://' | sort -nu";

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function buildDiscoveryStrategies(
  workingDirectory: string,
  options: Pick<DiscoveryOptions, 'composeCommands' | 'composeFiles'> = {}
): DiscoveryStrategy[] {
  const composeCommands = options.composeCommands ?? DEFAULT_COMPOSE_COMMANDS;
  const composeFiles = options.composeFiles ?? DEFAULT_COMPOSE_FILES;
  const inDir = (command: string) => `cd ${shellQuote(workingDirectory)} && ${command}`;

  const composePs = composeCommands.map((compose) => `${compose} ps --format json`).join(' || ');
  const catFiles = composeFiles
    .map((file) => `cat ${shellQuote(file)} 2>/dev/null`)
    .join(' || ');

  return [
    {
      name: 'compose-json',
      command: inDir(`(${composePs}) 2>/dev/null`),
      parse: parseComposeJson,
    },
    {
      name: 'docker-ps',
      command: inDir("docker ps --format 'table {{.Names}}\\t{{.Ports}}' --no-trunc"),
      parse: parseDockerPsTable,
    },
    {
      name: 'compose-file',
      command: inDir(`(${catFiles})`),
      parse: parseComposeFile,
    },
    {
      name: 'listeners',
      command: inDir(LISTENER_COMMAND),
      parse: parseListenerPorts,
    },
  ];
}

// Try each strategy in order, one remote round trip at a time, and keep the
// first non-empty result
export async function discoverEndpointsDetailed(
  session: RemoteSession,
  workingDirectory: string,
  options: DiscoveryOptions = {}
): Promise<DiscoveryResult> {
  const logger = options.logger ?? silentLogger;
  const host = options.host ?? session.host;

  for (const strategy of buildDiscoveryStrategies(workingDirectory, options)) {
    const result = await runRemoteCommand(session, strategy.command, {
      signal: options.signal,
      logger,
    });
    if (result.exitCode !== 0 || !result.output.trim()) continue;

    const endpoints = strategy.parse(result.output, host);
    if (endpoints.size > 0) {
      logger.debug(`Discovered ${endpoints.size} service(s) via ${strategy.name}`);
      return { strategy: strategy.name, endpoints };
    }
  }

  return { strategy: null, endpoints: new Map() };
}

export async function discoverEndpoints(
  session: RemoteSession,
  workingDirectory: string,
  options: DiscoveryOptions = {}
): Promise<EndpointMap> {
  const { endpoints } = await discoverEndpointsDetailed(session, workingDirectory, options);
  return endpoints;
}
