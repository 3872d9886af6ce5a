import type { AgentCard } from '../types/agent-card.js';
import type { Logger } from '../types/logger.js';
import type { TaskStore } from '../types/store.js';
import { CapabilityRegistry } from '../capabilities/CapabilityRegistry.js';
import { InMemoryTaskStore } from '../stores/InMemoryTaskStore.js';
import { TaskExecutor } from '../execution/TaskExecutor.js';
import { RequestHandler } from '../server/RequestHandler.js';
import { HttpTransport } from '../transport/HttpTransport.js';

export interface EchoAgentConfig {
  card: AgentCard;
  /** Port to listen on (default: 8000). 0 picks a free port. */
  port?: number;
  host?: string;
  /** URL path of the JSON-RPC endpoint (default: '/'). */
  path?: string;
  registry?: CapabilityRegistry;
  taskStore?: TaskStore;
  logger?: Logger;
}

/** Wires registry, store, executor, handler and HTTP transport into one agent. */
export class EchoAgent {
  readonly card: AgentCard;
  readonly registry: CapabilityRegistry;
  readonly taskStore: TaskStore;
  readonly executor: TaskExecutor;
  readonly handler: RequestHandler;

  private readonly transport: HttpTransport;
  private readonly logger?: Logger;

  constructor(config: EchoAgentConfig) {
    this.card = config.card;
    this.logger = config.logger;
    this.registry = config.registry ?? CapabilityRegistry.withBuiltins();
    this.taskStore = config.taskStore ?? new InMemoryTaskStore();
    this.executor = new TaskExecutor({
      registry: this.registry,
      taskStore: this.taskStore,
      logger: config.logger,
    });
    this.handler = new RequestHandler({
      executor: this.executor,
      taskStore: this.taskStore,
      logger: config.logger,
    });
    this.transport = new HttpTransport({
      port: config.port,
      host: config.host,
      path: config.path,
      logger: config.logger,
    });
    this.transport.setAgentCard(this.card);
  }

  /** Start listening for HTTP requests. */
  async start(): Promise<void> {
    await this.transport.listen(this.handler);
    this.logger?.('info', `${this.card.name} listening on port ${this.transport.port}`);
  }

  /** Stop the HTTP server. */
  async stop(): Promise<void> {
    await this.transport.close();
  }

  /** The port the server is listening on (undefined if not started). */
  get port(): number | undefined {
    return this.transport.port;
  }
}
