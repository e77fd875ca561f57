export { showPorts, type PortsOptions } from './commands/ports.js';
export {
  loadConfig,
  parseConfig,
  findConfigFile,
  DEFAULT_CONFIG,
  type RemoteConfig,
  type ParsedConfig,
} from './lib/config.js';
export {
  discoverEndpoints,
  discoverEndpointsDetailed,
  buildDiscoveryStrategies,
  DEFAULT_COMPOSE_COMMANDS,
  DEFAULT_COMPOSE_FILES,
  type DiscoveryOptions,
  type DiscoveryResult,
  type DiscoveryStrategy,
  type DiscoveryStrategyName,
} from './lib/discovery.js';
export {
  runRemoteCommand,
  CommandCancelledError,
  type RemoteSession,
  type CommandResult,
  type ExecOptions,
  type ExecOutput,
} from './lib/remote.js';
export { SshSession, type SshTarget } from './lib/ssh.js';
export { createConsoleLogger, silentLogger, type Logger } from './lib/logger.js';
export { UNKNOWN_SERVICES, endpointsToObject, type EndpointMap } from './lib/endpoints.js';
export { parseComposeJson, type ComposeContainer, type PortPublisher } from './lib/compose-json.js';
export { parseDockerPsTable } from './lib/docker-ps.js';
export { parseComposeFile } from './lib/compose-file.js';
export { parseListenerPorts } from './lib/listeners.js';
export { formatEndpointTable, NO_PORTS_MESSAGE } from './lib/format.js';
