import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import { A2AError } from '../errors/A2AError.js';
import { PayloadValidator } from '../messaging/PayloadValidator.js';
import type { AgentCard, AgentCardVerifier, SignedAgentCard } from '../types/agent-card.js';
import type { JsonRpcRequest, JsonRpcResponse } from '../types/rpc.js';
import type { Logger, RpcHandler, TransportPlugin, TransportSendOptions } from '../types/plugin.js';

export const AGENT_CARD_PATH = '/.well-known/agent.json';

export interface HttpTransportConfig {
  /** Port to listen on (default: 3000). */
  port?: number;
  /** Hostname to bind to (default: '0.0.0.0'). */
  host?: string;
  /** URL path for JSON-RPC requests (default: '/'). */
  path?: string;
  /** URL path the agent card is served at (default: '/.well-known/agent.json'). */
  cardPath?: string;
  /** Request timeout in milliseconds (default: 30000). */
  timeout?: number;
  /** Optional logger for diagnostic events. */
  logger?: Logger;
}

export interface DiscoverOptions {
  /** Required to accept signed cards; without one only bare cards are accepted. */
  verifier?: AgentCardVerifier;
  cardPath?: string;
  timeout?: number;
}

function parseResponse(value: unknown): JsonRpcResponse {
  if (!PayloadValidator.isJsonRpcResponse(value)) {
    throw A2AError.internalError('Malformed JSON-RPC response');
  }
  return value;
}

/** HTTP transport: POST for request-response, POST + SSE for streaming. */
export class HttpTransport implements TransportPlugin {
  readonly name = 'http';

  private readonly config: Required<Omit<HttpTransportConfig, 'logger'>> & { logger?: Logger };
  private server: Server | null = null;
  private handler: RpcHandler | null = null;
  private card: AgentCard | SignedAgentCard | null = null;

  constructor(config?: HttpTransportConfig) {
    this.config = {
      port: config?.port ?? 3000,
      host: config?.host ?? '0.0.0.0',
      path: config?.path ?? '/',
      cardPath: config?.cardPath ?? AGENT_CARD_PATH,
      timeout: config?.timeout ?? 30_000,
      logger: config?.logger,
    };
  }

  /** Send a request and receive a response via HTTP POST. */
  async send(request: JsonRpcRequest, options: TransportSendOptions): Promise<JsonRpcResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      options.timeout ?? this.config.timeout,
    );

    try {
      const response = await fetch(options.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      return parseResponse(await response.json());
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /** Send a request and receive an SSE stream of responses. */
  async *sendStream(
    request: JsonRpcRequest,
    options: TransportSendOptions,
  ): AsyncIterable<JsonRpcResponse> {
    const controller = new AbortController();
    const timeoutMs = options.timeout ?? this.config.timeout;

    const response = await fetch(options.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'text/event-stream',
      },
      body: JSON.stringify(request),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    if (!response.body) {
      throw new Error('Response body is null');
    }

    // Reset timeout on each event
    let timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      yield* this.parseSSE(response.body, () => {
        clearTimeout(timeoutId);
        timeoutId = setTimeout(() => controller.abort(), timeoutMs);
      });
    } finally {
      clearTimeout(timeoutId);
      // Leaving early tells the server the subscriber is gone.
      controller.abort();
    }
  }

  /** Start the HTTP server and hand JSON-RPC requests to `handler`. */
  async listen(handler: RpcHandler): Promise<void> {
    this.handler = handler;
    await this.ensureServer();
  }

  /** Stop the HTTP server. */
  async close(): Promise<void> {
    if (this.server) {
      const server = this.server;
      this.server = null;
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
  }

  /** The port the server is listening on (undefined if not started). */
  get port(): number | undefined {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return undefined;
  }

  /** Set the document served at the card path: a bare card, or one signed by CardSigner. */
  setAgentCard(card: AgentCard | SignedAgentCard): void {
    this.card = card;
  }

  /**
   * Fetch an agent card from its well-known URL. Signed cards are checked by
   * `options.verifier`; a signed card with no verifier is rejected.
   * @param baseUrl The base URL of the agent (e.g., "https://agent.example.com")
   */
  static async discover(baseUrl: string, options?: DiscoverOptions): Promise<AgentCard> {
    const url = baseUrl.replace(/\/$/, '') + (options?.cardPath ?? AGENT_CARD_PATH);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options?.timeout ?? 30_000);

    let document: unknown;
    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new Error(`Discovery failed: HTTP ${response.status} from ${url}`);
      }
      document = await response.json();
    } finally {
      clearTimeout(timeoutId);
    }

    if (options?.verifier) return options.verifier.verify(document);
    if (PayloadValidator.isSignedAgentCard(document)) {
      throw A2AError.agentCardInvalid(`${url} serves a signed card and no verifier was given`);
    }
    return PayloadValidator.parseAgentCard(document);
  }

  private async ensureServer(): Promise<void> {
    if (this.server) return;

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        this.config.logger?.('error', 'HTTP request handler error', err);
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: 'Internal server error' }));
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve) => {
      server.listen(this.config.port, this.config.host, () => resolve());
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Agent card endpoint
    if (req.method === 'GET' && req.url === this.config.cardPath) {
      if (!this.card) {
        res.writeHead(404, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Agent card not configured' }));
        return;
      }
      res.writeHead(200, {
        'Content-Type': 'application/json',
        'Access-Control-Allow-Origin': '*',
        'Cache-Control': 'public, max-age=300',
      });
      res.end(JSON.stringify(this.card));
      return;
    }

    // CORS preflight for the card endpoint
    if (req.method === 'OPTIONS' && req.url === this.config.cardPath) {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type',
        'Access-Control-Max-Age': '86400',
      });
      res.end();
      return;
    }

    if (req.method !== 'POST' || req.url !== this.config.path || !this.handler) {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
      return;
    }

    const body = await this.readBody(req);

    let request: unknown;
    try {
      request = JSON.parse(body);
    } catch {
      res.writeHead(400, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({
        jsonrpc: '2.0',
        id: null,
        error: A2AError.parseError('Malformed JSON').toJSON(),
      }));
      return;
    }

    if (this.handler.isStreaming(request)) {
      await this.stream(this.handler, request, res);
      return;
    }

    // JSON-RPC errors travel in the body with HTTP 200
    const response = await this.handler.handle(request);
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response));
  }

  private async stream(handler: RpcHandler, request: unknown, res: ServerResponse): Promise<void> {
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        this.config.logger?.('debug', 'SSE client disconnected');
        controller.abort();
      }
    };
    res.on('close', onClose);

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    try {
      for await (const response of handler.handleStream(request, controller.signal)) {
        if (controller.signal.aborted) break;
        res.write(`data: ${JSON.stringify(response)}\n\n`);
      }
    } finally {
      res.off('close', onClose);
      res.end();
    }
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
      req.on('error', reject);
    });
  }

  private async *parseSSE(
    body: ReadableStream<Uint8Array>,
    onEvent: () => void,
  ): AsyncIterable<JsonRpcResponse> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const parts = buffer.split('\n\n');
        buffer = parts.pop() ?? '';

        for (const part of parts) {
          const data = this.dataOf(part);
          if (data !== undefined) {
            onEvent();
            yield parseResponse(JSON.parse(data));
          }
        }
      }

      // Handle any remaining data
      const data = this.dataOf(buffer);
      if (data !== undefined) {
        onEvent();
        yield parseResponse(JSON.parse(data));
      }
    } finally {
      reader.releaseLock();
    }
  }

  private dataOf(block: string): string | undefined {
    const dataLine = block
      .split('\n')
      .find((line) => line.startsWith('data: '));
    return dataLine?.slice(6);
  }
}
