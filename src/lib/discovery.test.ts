import { describe, it, expect, vi } from 'vitest';
import type { ExecOptions, ExecOutput, RemoteSession } from './remote.js';
import { buildDiscoveryStrategies, discoverEndpoints, discoverEndpointsDetailed, shellQuote } from './discovery.js';

type Responder = (command: string) => ExecOutput;

const ok = (stdout: string): ExecOutput => ({ exitCode: 0, stdout, stderr: '' });
const failed = (stderr = 'error'): ExecOutput => ({ exitCode: 1, stdout: '', stderr });

function fakeSession(respond: Responder) {
  const exec = vi.fn(async (command: string, _options: ExecOptions) => respond(command));
  const session: RemoteSession = { host: 'deploy.example.test', isConnected: true, exec };
  return { session, exec };
}

// Route by the distinguishing part of each strategy's command
function byStrategy(responses: { json?: ExecOutput; table?: ExecOutput; file?: ExecOutput; listeners?: ExecOutput }): Responder {
  return (command) => {
    if (command.includes('--format json')) return responses.json ?? failed();
    if (command.includes('docker ps --format')) return responses.table ?? failed();
    if (command.includes('cat ')) return responses.file ?? failed();
    if (command.includes('netstat')) return responses.listeners ?? failed();
    throw new Error(`unexpected command: ${command}`);
  };
}

const JSON_LINE =
  '{"Name":"app-web-1","Publishers":[{"TargetPort":80,"PublishedPort":8080,"Protocol":"tcp"}]}';

describe('buildDiscoveryStrategies', () => {
  it('builds the four commands in priority order, run from the working directory', () => {
    const commands = buildDiscoveryStrategies('/srv/app').map((strategy) => [strategy.name, strategy.command]);

    expect(commands).toEqual([
      [
        'compose-json',
        "cd '/srv/app' && (docker compose ps --format json || docker-compose ps --format json) 2>/dev/null",
      ],
      ['docker-ps', "cd '/srv/app' && docker ps --format 'table {{.Names}}\\t{{.Ports}}' --no-trunc"],
      [
        'compose-file',
        "cd '/srv/app' && (cat 'docker-compose.yml' 2>/dev/null || cat 'docker-compose.yaml' 2>/dev/null)",
      ],
      [
        'listeners',
        "cd '/srv/app' && netstat -tlnp 2>/dev/null | grep docker-proxy | awk '{print $4}' | sed 's/.*://' | sort -nu",
      ],
    ]);
  });

  it('uses configured compose commands and files', () => {
    const [json, , file] = buildDiscoveryStrategies('app', {
      composeCommands: ['podman compose'],
      composeFiles: ['compose.yaml'],
    });

    expect(json.command).toBe("cd 'app' && (podman compose ps --format json) 2>/dev/null");
    expect(file.command).toBe("cd 'app' && (cat 'compose.yaml' 2>/dev/null)");
  });
});

describe('shellQuote', () => {
  it('escapes embedded single quotes', () => {
    expect(shellQuote("/srv/bob's app")).toBe("'/srv/bob'\\''s app'");
  });
});

describe('discoverEndpoints', () => {
  it('stops after the first strategy that finds something', async () => {
    const { session, exec } = fakeSession(byStrategy({ json: ok(JSON_LINE) }));

    const result = await discoverEndpointsDetailed(session, '/srv/app', { host: 'host' });

    expect(result).toEqual({
      strategy: 'compose-json',
      endpoints: new Map([['app-web-1', ['http://host:8080']]]),
    });
    expect(exec).toHaveBeenCalledTimes(1);
  });

  it('defaults the URL host to the session host', async () => {
    const { session } = fakeSession(byStrategy({ json: ok(JSON_LINE) }));

    const endpoints = await discoverEndpoints(session, '/srv/app');

    expect(endpoints).toEqual(new Map([['app-web-1', ['http://deploy.example.test:8080']]]));
  });

  it('falls through failed and empty strategies to the table listing', async () => {
    const { session, exec } = fakeSession(
      byStrategy({
        json: failed('unknown flag: --format'),
        table: ok('NAMES\tPORTS\napp-web-1\t0.0.0.0:8080->80/tcp\n'),
      })
    );

    const result = await discoverEndpointsDetailed(session, '/srv/app', { host: 'host' });

    expect(result.strategy).toBe('docker-ps');
    expect(result.endpoints).toEqual(new Map([['app-web-1', ['http://host:8080']]]));
    expect(exec).toHaveBeenCalledTimes(2);
  });

  it('treats output that parses to nothing as empty', async () => {
    const { session } = fakeSession(
      byStrategy({
        json: ok('{"Name":"app-db-1","Publishers":[]}\n'),
        table: ok('NAMES\tPORTS\napp-db-1\t5432/tcp\n'),
        file: ok('services:\n  web:\n    ports:\n      - "8080:80"\n'),
      })
    );

    const result = await discoverEndpointsDetailed(session, '/srv/app', { host: 'host' });

    expect(result).toEqual({ strategy: 'compose-file', endpoints: new Map([['web', ['http://host:8080']]]) });
  });

  it('falls back to listener ports as a last resort', async () => {
    const { session, exec } = fakeSession(byStrategy({ listeners: ok('8080\n8443\n') }));

    const result = await discoverEndpointsDetailed(session, '/srv/app', { host: 'host' });

    expect(result).toEqual({
      strategy: 'listeners',
      endpoints: new Map([['unknown-services', ['http://host:8080', 'http://host:8443']]]),
    });
    expect(exec).toHaveBeenCalledTimes(4);
  });

  it('returns an empty map when nothing is found', async () => {
    const { session, exec } = fakeSession(byStrategy({ json: ok('\n'), listeners: ok('') }));

    const result = await discoverEndpointsDetailed(session, '/srv/app');

    expect(result).toEqual({ strategy: null, endpoints: new Map() });
    expect(exec).toHaveBeenCalledTimes(4);
  });

  it('keeps going when a command throws', async () => {
    const { session } = fakeSession((command) => {
      if (command.includes('netstat')) return ok('3000\n');
      throw new Error('connection reset');
    });

    const endpoints = await discoverEndpoints(session, '/srv/app', { host: 'host' });

    expect(endpoints).toEqual(new Map([['unknown-services', ['http://host:3000']]]));
  });

  it('never dispatches once cancelled', async () => {
    const { session, exec } = fakeSession(byStrategy({ json: ok(JSON_LINE) }));
    const controller = new AbortController();
    controller.abort();

    const endpoints = await discoverEndpoints(session, '/srv/app', { signal: controller.signal });

    expect(endpoints.size).toBe(0);
    expect(exec).not.toHaveBeenCalled();
  });

  it('does not touch a disconnected session', async () => {
    const exec = vi.fn(async (_command: string, _options: ExecOptions) => ok(JSON_LINE));
    const session: RemoteSession = { host: 'h', isConnected: false, exec };

    const endpoints = await discoverEndpoints(session, '/srv/app');

    expect(endpoints.size).toBe(0);
    expect(exec).not.toHaveBeenCalled();
  });
});
