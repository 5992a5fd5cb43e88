import { CardSigner } from '../crypto/CardSigner.js';
import { JsonRpcDispatcher } from '../server/JsonRpcDispatcher.js';
import { RequestHandler, type ConcurrencyPolicy } from '../server/RequestHandler.js';
import { InMemoryTaskStore } from '../stores/InMemoryTaskStore.js';
import { HttpTransport } from '../transport/HttpTransport.js';
import type { AgentCard } from '../types/agent-card.js';
import type { AgentExecutor } from '../types/executor.js';
import type { PrivateKeyHex } from '../types/keys.js';
import type { Logger, TaskStore, TransportPlugin } from '../types/plugin.js';

export interface A2AServerConfig {
  card: AgentCard;
  executor: AgentExecutor;
  /** Default: a fresh InMemoryTaskStore. */
  taskStore?: TaskStore;
  concurrency?: ConcurrencyPolicy;
  /** Sign the card served over HTTP with this key. Served unsigned when absent. */
  signingKey?: PrivateKeyHex;
  logger?: Logger;
}

/** Wires an executor, a task store and any number of transports into a running agent. */
export class A2AServer {
  readonly card: AgentCard;
  readonly handler: RequestHandler;
  readonly dispatcher: JsonRpcDispatcher;

  private readonly signingKey?: PrivateKeyHex;
  private readonly transports: TransportPlugin[] = [];

  constructor(config: A2AServerConfig) {
    this.card = config.card;
    this.signingKey = config.signingKey;
    this.handler = new RequestHandler({
      executor: config.executor,
      taskStore: config.taskStore ?? new InMemoryTaskStore(),
      concurrency: config.concurrency,
      logger: config.logger,
    });
    this.dispatcher = new JsonRpcDispatcher(this.handler, { logger: config.logger });
  }

  /** Register a transport plugin. */
  transport(plugin: TransportPlugin): this {
    this.transports.push(plugin);
    return this;
  }

  /** Start listening on all transports. */
  async start(): Promise<void> {
    for (const tp of this.transports) {
      // HTTP transports also serve the agent card
      if (tp instanceof HttpTransport) {
        tp.setAgentCard(this.signingKey ? CardSigner.sign(this.card, this.signingKey) : this.card);
      }

      if (tp.listen) {
        await tp.listen(this.dispatcher);
      }
    }
  }

  /** Stop all transports. */
  async stop(): Promise<void> {
    for (const tp of this.transports) {
      if (tp.close) {
        await tp.close();
      }
    }
  }
}
