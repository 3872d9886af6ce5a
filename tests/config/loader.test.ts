import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, parseConfig, resolvePort } from '../../src/config/loader.js';
import { AgentError } from '../../src/errors/AgentError.js';
import { ErrorCodes } from '../../src/types/errors.js';

const repoConfig = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../config.yaml');

async function configErrorOf(promise: Promise<unknown>): Promise<AgentError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AgentError) return err;
    throw err;
  }
  throw new Error('expected a configuration error');
}

describe('loadConfig', () => {
  let dir: string;

  async function writeConfig(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, content, 'utf-8');
    return file;
  }

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'echo-agent-config-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads the shipped config.yaml with the port from the environment', async () => {
    const config = await loadConfig(repoConfig, { env: { ECHO_AGENT_PORT: '9001' } });

    expect(config.server).toEqual({ host: 'localhost', port: 9001, path: '/', url: 'http://localhost:9001' });
    expect(config.agent).toEqual({
      name: 'EchoAgent',
      description: 'An echo agent that returns the same message it receives',
      version: '1.0.0',
    });
    expect(config.client).toEqual({ url: 'http://localhost:8000', timeout: 30000 });
    expect(config.logging.level).toBe('info');
  });

  it('falls back to port 8000 with a warning when the variable is unset', async () => {
    const logger = vi.fn();
    const config = await loadConfig(repoConfig, { env: {}, logger });

    expect(config.server.port).toBe(8000);
    expect(logger).toHaveBeenCalledWith('warn', "Invalid port value '${ECHO_AGENT_PORT}', using default 8000");
  });

  it('applies defaults to an empty file', async () => {
    const config = await loadConfig(await writeConfig('empty.yaml', ''), { env: {} });

    expect(config.server).toEqual({ host: 'localhost', port: 8000, path: '/', url: 'http://localhost:8000' });
    expect(config.agent.name).toBe('EchoAgent');
    expect(config.client.timeout).toBe(30000);
    expect(config.logging.level).toBe('info');
  });

  it('keeps an explicit server url', async () => {
    const file = await writeConfig(
      'url.yaml',
      'server:\n  host: 0.0.0.0\n  port: 8080\n  url: https://echo.test/agent\n',
    );
    const config = await loadConfig(file, { env: {} });
    expect(config.server).toEqual({ host: '0.0.0.0', port: 8080, path: '/', url: 'https://echo.test/agent' });
  });

  it('coerces a string timeout from the environment', async () => {
    const file = await writeConfig('timeout.yaml', 'client:\n  timeout: ${TIMEOUT}\n');
    const config = await loadConfig(file, { env: { TIMEOUT: '5000' } });
    expect(config.client.timeout).toBe(5000);
  });

  it('raises CONFIG_ERROR for a missing file', async () => {
    const missing = path.join(dir, 'missing.yaml');
    const err = await configErrorOf(loadConfig(missing));

    expect(err.code).toBe(ErrorCodes.CONFIG_ERROR);
    expect(err.message).toBe(`Configuration error: cannot read ${missing}: file not found`);
    expect(err.data).toEqual({ path: missing });
  });

  it('raises CONFIG_ERROR for invalid YAML', async () => {
    const file = await writeConfig('broken.yaml', 'server: [unclosed\n');
    const err = await configErrorOf(loadConfig(file, { env: {} }));

    expect(err.code).toBe(ErrorCodes.CONFIG_ERROR);
    expect(err.message.startsWith(`Configuration error: invalid YAML in ${file}: `)).toBe(true);
  });

  it('raises CONFIG_ERROR for values of the wrong shape', async () => {
    const file = await writeConfig('bad-level.yaml', 'logging:\n  level: loud\n');
    const err = await configErrorOf(loadConfig(file, { env: {} }));

    expect(err.code).toBe(ErrorCodes.CONFIG_ERROR);
    expect(err.message).toMatch(/^Configuration error: logging\.level: /);
  });
});

describe('parseConfig', () => {
  it('rejects a path that does not start with a slash', () => {
    expect(() => parseConfig({ server: { path: 'rpc' } })).toThrow(AgentError);
  });

  it('rejects a non-object document', () => {
    expect(() => parseConfig('just a string')).toThrow('Configuration error: (root): Expected object, received string');
  });
});

describe('resolvePort', () => {
  it('defaults when no port is given', () => {
    expect(resolvePort(undefined)).toBe(8000);
  });

  it('accepts numbers and numeric strings', () => {
    expect(resolvePort(9000)).toBe(9000);
    expect(resolvePort('9001')).toBe(9001);
    expect(resolvePort(0)).toBe(0);
  });

  it.each(['abc', '80a', '-1', '70000', ''])('falls back to 8000 for %j', (value) => {
    const logger = vi.fn();
    expect(resolvePort(value, logger)).toBe(8000);
    expect(logger).toHaveBeenCalledWith('warn', `Invalid port value '${value}', using default 8000`);
  });

  it('falls back for a fractional or out-of-range number', () => {
    expect(resolvePort(80.5)).toBe(8000);
    expect(resolvePort(65536)).toBe(8000);
  });
});
