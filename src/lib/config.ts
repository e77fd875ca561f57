import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { DEFAULT_COMPOSE_COMMANDS, DEFAULT_COMPOSE_FILES } from './discovery.js';
import { errorMessage } from './remote.js';

export const CONFIG_FILES = ['portscope.config.mjs', 'portscope.config.js'];

export const RemoteConfigSchema = z.object({
  host: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  sshPort: z.number().int().min(1).max(65535).default(22),
  identityFile: z.string().optional(),
  deployPath: z.string().min(1).default('.'),
  composeFiles: z
    .array(z.string().min(1))
    .min(1)
    .default(() => [...DEFAULT_COMPOSE_FILES]),
  composeCommands: z
    .array(z.string().min(1))
    .min(1)
    .default(() => [...DEFAULT_COMPOSE_COMMANDS]),
  connectTimeoutSeconds: z.number().int().positive().default(10),
});

export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;

export const DEFAULT_CONFIG: RemoteConfig = RemoteConfigSchema.parse({});

export interface ParsedConfig {
  config: RemoteConfig;
  issues: string[];
}

// Validate a user-supplied config object; invalid input falls back to defaults
export function parseConfig(raw: unknown): ParsedConfig {
  const parsed = RemoteConfigSchema.safeParse(raw ?? {});
  if (parsed.success) {
    return { config: parsed.data, issues: [] };
  }

  const issues = parsed.error.issues.map(
    (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
  );
  return { config: DEFAULT_CONFIG, issues };
}

export function findConfigFile(projectRoot: string): string | null {
  for (const file of CONFIG_FILES) {
    const configPath = resolve(projectRoot, file);
    if (existsSync(configPath)) return configPath;
  }
  return null;
}

export async function loadConfig(projectRoot: string, logger: Logger = silentLogger): Promise<RemoteConfig> {
  const configPath = findConfigFile(projectRoot);
  if (!configPath) {
    logger.warn('No portscope.config.mjs found, using defaults');
    return DEFAULT_CONFIG;
  }

  let userConfig: unknown;
  try {
    const module: { default?: unknown } = await import(pathToFileURL(configPath).href);
    userConfig = module.default ?? module;
  } catch (error) {
    logger.warn(`Failed to load config from ${configPath}: ${errorMessage(error)}`);
    return DEFAULT_CONFIG;
  }

  const { config, issues } = parseConfig(userConfig);
  for (const issue of issues) {
    logger.warn(`Invalid config in ${configPath}: ${issue}`);
  }
  return config;
}
