import { z } from 'zod';

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = 'localhost';

export const DEFAULT_AGENT_DESCRIPTION =
  'An echo agent that returns the same message it receives';

export const agentConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default(DEFAULT_HOST),
      // Validated separately so a bad value falls back to the default with a warning.
      port: z.union([z.number(), z.string()]).optional(),
      url: z.string().url().optional(),
      path: z.string().startsWith('/').default('/'),
    })
    .default({}),
  agent: z
    .object({
      name: z.string().min(1).default('EchoAgent'),
      description: z.string().min(1).default(DEFAULT_AGENT_DESCRIPTION),
      version: z.string().min(1).default('1.0.0'),
    })
    .default({}),
  client: z
    .object({
      url: z.string().url().default(`http://${DEFAULT_HOST}:${DEFAULT_PORT}`),
      timeout: z.coerce.number().int().positive().default(30_000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type RawAgentConfig = z.infer<typeof agentConfigSchema>;

/** Validated configuration with the server port and URL resolved. */
export interface AgentConfig extends Omit<RawAgentConfig, 'server'> {
  server: {
    host: string;
    port: number;
    url: string;
    path: string;
  };
}
