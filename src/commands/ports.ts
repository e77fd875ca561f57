import chalk from 'chalk';
import { loadConfig } from '../lib/config.js';
import { discoverEndpointsDetailed } from '../lib/discovery.js';
import { endpointsToObject } from '../lib/endpoints.js';
import { formatEndpointTable } from '../lib/format.js';
import { createConsoleLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/remote.js';
import { SshSession } from '../lib/ssh.js';

export interface PortsOptions {
  host?: string;
  user?: string;
  deployPath?: string;
  verbose?: boolean;
  json?: boolean;
  signal?: AbortSignal;
}

export async function showPorts(cwd: string, options: PortsOptions = {}): Promise<void> {
  const logger = createConsoleLogger({ verbose: options.verbose });
  const config = await loadConfig(cwd, logger);

  const host = options.host ?? config.host;
  if (!host) {
    console.error(chalk.red('Error: No remote host configured.'));
    console.error(chalk.gray('Set `host` in portscope.config.mjs or pass one explicitly.'));
    process.exit(1);
  }

  const session = new SshSession({
    host,
    user: options.user ?? config.user,
    port: config.sshPort,
    identityFile: config.identityFile,
    connectTimeoutSeconds: config.connectTimeoutSeconds,
  });

  try {
    await session.connect(options.signal);
  } catch (error) {
    console.error(chalk.red(`Error: Could not connect to ${host}: ${errorMessage(error)}`));
    process.exit(1);
  }

  try {
    const deployPath = options.deployPath ?? config.deployPath;
    if (!options.json) {
      console.log(chalk.blue(`Discovering exposed ports on ${host} in ${deployPath}...`));
    }

    const { strategy, endpoints } = await discoverEndpointsDetailed(session, deployPath, {
      signal: options.signal,
      logger,
      composeCommands: config.composeCommands,
      composeFiles: config.composeFiles,
    });

    if (options.json) {
      console.log(JSON.stringify({ strategy, endpoints: endpointsToObject(endpoints) }, null, 2));
      return;
    }

    console.log('');
    console.log(formatEndpointTable(endpoints));
    if (strategy) {
      console.log(chalk.gray(`(source: ${strategy})`));
    }
  } finally {
    session.close();
  }
}
