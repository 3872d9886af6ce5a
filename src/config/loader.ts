import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Logger } from '../types/logger.js';
import { AgentError } from '../errors/AgentError.js';
import { describeIssues } from '../server/schemas.js';
import { substituteEnvVars, type Environment } from './env.js';
import { agentConfigSchema, DEFAULT_PORT, type AgentConfig, type RawAgentConfig } from './schema.js';

export interface LoadConfigOptions {
  /** Variables used for `${VAR}` substitution (default: process.env). */
  env?: Environment;
  logger?: Logger;
}

/**
 * Read, substitute and validate a YAML configuration file.
 * @throws AgentError with code CONFIG_ERROR when the file is missing,
 *   unreadable, not YAML, or fails validation.
 */
export async function loadConfig(configPath: string, options: LoadConfigOptions = {}): Promise<AgentConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (err) {
    const reason = isMissingFile(err)
      ? 'file not found'
      : err instanceof Error ? err.message : String(err);
    throw AgentError.config(`cannot read ${absolutePath}: ${reason}`, { path: absolutePath });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw AgentError.config(
      `invalid YAML in ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`,
      { path: absolutePath },
    );
  }

  const config = parseConfig(substituteEnvVars(parsed ?? {}, options.env), options.logger);
  options.logger?.('debug', `Loaded configuration from ${absolutePath}`);
  return config;
}

/** Validate an already-decoded configuration object. */
export function parseConfig(input: unknown, logger?: Logger): AgentConfig {
  const result = agentConfigSchema.safeParse(input);
  if (!result.success) {
    throw AgentError.config(describeIssues(result.error));
  }
  return resolveServer(result.data, logger);
}

function resolveServer(raw: RawAgentConfig, logger?: Logger): AgentConfig {
  const port = resolvePort(raw.server.port, logger);
  return {
    ...raw,
    server: {
      host: raw.server.host,
      port,
      path: raw.server.path,
      url: raw.server.url ?? `http://${raw.server.host}:${port}`,
    },
  };
}

/** A missing, malformed or out-of-range port falls back to the default. */
export function resolvePort(value: number | string | undefined, logger?: Logger): number {
  if (value === undefined) return DEFAULT_PORT;

  const port = typeof value === 'number' ? value : /^\d+$/.test(value) ? Number(value) : NaN;
  if (Number.isInteger(port) && port >= 0 && port <= 65535) {
    return port;
  }

  logger?.('warn', `Invalid port value '${value}', using default ${DEFAULT_PORT}`);
  return DEFAULT_PORT;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
