#!/usr/bin/env node
/**
 * CLI for running the echo agent server
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { loadConfig, resolvePort } from '../config/loader.js';
import { createConsoleLogger } from '../logging/consoleLogger.js';
import { createEchoAgentCard } from '../agent/echoAgentCard.js';
import { EchoAgent } from '../agent/EchoAgent.js';
import { WELL_KNOWN_PATH } from '../transport/HttpTransport.js';
import { packageVersion } from './version.js';

const program = new Command();

program
  .name('echo-agent-server')
  .description('A2A echo agent server')
  .version(packageVersion())
  .option('--host <host>', 'Host to bind to')
  .option('--port <port>', 'Port to bind to')
  .option('-c, --config <path>', 'Configuration file path', 'config.yaml')
  .action(async (options: { host?: string; port?: string; config: string }) => {
    loadDotenv();
    const bootLogger = createConsoleLogger('info', 'echo-agent-server');

    try {
      const config = await loadConfig(options.config, { logger: bootLogger });
      const logger = createConsoleLogger(config.logging.level, 'echo-agent-server');

      const host = options.host ?? config.server.host;
      const port = options.port !== undefined ? resolvePort(options.port, logger) : config.server.port;
      const url = options.host !== undefined || options.port !== undefined
        ? `http://${host}:${port}`
        : config.server.url;

      const agent = new EchoAgent({
        card: createEchoAgentCard({ url, ...config.agent }),
        host,
        port,
        path: config.server.path,
        logger,
      });
      await agent.start();

      logger('info', `Agent card available at: ${url}${WELL_KNOWN_PATH}`);
      logger('info', `Invoke endpoint: ${url}${config.server.path}`);

      const shutdown = (signal: string): void => {
        logger('info', `Received ${signal}, shutting down`);
        agent.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger('error', 'Error during shutdown', err);
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      bootLogger('error', `Failed to start: ${message}`);
      process.exit(1);
    }
  });

await program.parseAsync();
