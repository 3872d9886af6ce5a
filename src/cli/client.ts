#!/usr/bin/env node
/**
 * CLI client for the echo agent
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { loadConfig } from '../config/loader.js';
import { createConsoleLogger } from '../logging/consoleLogger.js';
import { A2AClient, responseText } from '../client/A2AClient.js';
import { DEFAULT_CAPABILITY } from '../capabilities/builtins.js';
import { packageVersion } from './version.js';

interface GlobalOptions {
  config: string;
  url?: string;
}

const program = new Command();

program
  .name('echo-agent')
  .description('Client for the A2A echo agent')
  .version(packageVersion())
  .option('-c, --config <path>', 'Configuration file path', 'config.yaml')
  .option('--url <url>', 'Agent base URL (overrides client.url from the configuration)');

async function connect(): Promise<A2AClient> {
  loadDotenv();
  const options = program.opts<GlobalOptions>();
  const config = await loadConfig(options.config);
  const logger = createConsoleLogger(config.logging.level, 'echo-agent');
  const client = new A2AClient({
    baseUrl: options.url ?? config.client.url,
    timeout: config.client.timeout,
    logger,
  });

  if (!(await client.checkHealth())) {
    throw new Error('Server is not reachable. Please ensure the server is running.');
  }
  return client;
}

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
}

program
  .command('info')
  .description('Show the agent card')
  .action(async () => {
    try {
      const client = await connect();
      const card = await client.getAgentCard();
      console.log(`Agent Name: ${card.name}`);
      if (card.agentId) console.log(`Agent ID: ${card.agentId}`);
      console.log(`Description: ${card.description}`);
      console.log(`Version: ${card.version}`);
      console.log('\nSkills:');
      for (const skill of card.skills) {
        console.log(`  - ${skill.name}: ${skill.description}`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('echo')
  .description('Send a message to the echo agent')
  .argument('<message>', 'Text to send')
  .option('--capability <name>', 'Capability to use (echo, echo_with_prefix)', DEFAULT_CAPABILITY)
  .option('--prefix <prefix>', 'Prefix for the echo_with_prefix capability')
  .action(async (message: string, options: { capability: string; prefix?: string }) => {
    try {
      const client = await connect();
      const parameters =
        options.capability === 'echo_with_prefix' && options.prefix !== undefined
          ? { prefix: options.prefix }
          : {};
      const task = await client.sendMessage(message, { capability: options.capability, parameters });

      if (task.status.state === 'completed') {
        console.log(`Response: ${responseText(task)}`);
      } else {
        const reason = task.metadata?.error?.message ?? task.status.state;
        fail(`Task ${task.id} ${task.status.state}: ${reason}`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('health')
  .description('Check server health')
  .action(async () => {
    const options = program.opts<GlobalOptions>();
    try {
      loadDotenv();
      const config = await loadConfig(options.config);
      const client = new A2AClient({ baseUrl: options.url ?? config.client.url, timeout: config.client.timeout });
      if (await client.checkHealth()) {
        console.log('Server is healthy');
      } else {
        console.log('Server is not reachable');
        process.exitCode = 1;
      }
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync();
