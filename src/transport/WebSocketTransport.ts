import { WebSocketServer, WebSocket as WsWebSocket } from 'ws';
import { createServer, type Server as HttpServer } from 'node:http';
import { A2AError } from '../errors/A2AError.js';
import { PayloadValidator } from '../messaging/PayloadValidator.js';
import type { JsonRpcRequest, JsonRpcResponse } from '../types/rpc.js';
import type { Logger, RpcHandler, TransportPlugin, TransportSendOptions } from '../types/plugin.js';

export interface WebSocketTransportConfig {
  /** Port to listen on (default: 8080). */
  port?: number;
  /** Hostname to bind to (default: '0.0.0.0'). */
  host?: string;
  /** Heartbeat interval in ms (default: 30000). Set to 0 to disable. */
  heartbeatInterval?: number;
  /** Request timeout in ms (default: 30000). */
  timeout?: number;
  /** Optional logger for diagnostic events. */
  logger?: Logger;
}

function parseFrame(data: WsWebSocket.RawData): JsonRpcResponse {
  const value: unknown = JSON.parse(data.toString());
  if (!PayloadValidator.isJsonRpcResponse(value)) {
    throw A2AError.internalError('Malformed JSON-RPC response');
  }
  return value;
}

/**
 * WebSocket transport: JSON-RPC frames in both directions. The client opens
 * one connection per call; a streaming call receives one frame per event and
 * the server closes the connection when the stream ends.
 */
export class WebSocketTransport implements TransportPlugin {
  readonly name = 'websocket';

  private readonly config: Required<Omit<WebSocketTransportConfig, 'logger'>> & { logger?: Logger };
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private handler: RpcHandler | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly alive = new WeakMap<WsWebSocket, boolean>();

  constructor(config?: WebSocketTransportConfig) {
    this.config = {
      port: config?.port ?? 8080,
      host: config?.host ?? '0.0.0.0',
      heartbeatInterval: config?.heartbeatInterval ?? 30_000,
      timeout: config?.timeout ?? 30_000,
      logger: config?.logger,
    };
  }

  /** Send a request and wait for a single response. */
  async send(request: JsonRpcRequest, options: TransportSendOptions): Promise<JsonRpcResponse> {
    const ws = await this.connect(options.endpoint);
    const timeout = options.timeout ?? this.config.timeout;

    try {
      return await new Promise<JsonRpcResponse>((resolve, reject) => {
        const timer = setTimeout(() => {
          reject(new Error('WebSocket request timed out'));
        }, timeout);

        const onMessage = (data: WsWebSocket.RawData) => {
          clearTimeout(timer);
          ws.off('message', onMessage);
          try {
            resolve(parseFrame(data));
          } catch (err) {
            reject(err);
          }
        };

        ws.on('message', onMessage);
        ws.on('error', (err) => {
          clearTimeout(timer);
          reject(err);
        });

        ws.send(JSON.stringify(request));
      });
    } finally {
      ws.close();
    }
  }

  /** Send a request and receive a stream of responses until the server closes the connection. */
  async *sendStream(
    request: JsonRpcRequest,
    options: TransportSendOptions,
  ): AsyncIterable<JsonRpcResponse> {
    const ws = await this.connect(options.endpoint);
    const timeout = options.timeout ?? this.config.timeout;

    const queue: JsonRpcResponse[] = [];
    let done = false;
    let error: Error | null = null;
    let resolveWait: (() => void) | null = null;

    const onTimeout = () => {
      error = new Error('WebSocket stream timed out');
      done = true;
      resolveWait?.();
    };
    let timer = setTimeout(onTimeout, timeout);

    ws.on('message', (data: WsWebSocket.RawData) => {
      clearTimeout(timer);
      timer = setTimeout(onTimeout, timeout);
      try {
        queue.push(parseFrame(data));
      } catch (err) {
        error = err instanceof Error ? err : new Error(String(err));
        done = true;
      }
      resolveWait?.();
    });

    ws.on('error', (err) => {
      clearTimeout(timer);
      error = err;
      done = true;
      resolveWait?.();
    });

    ws.on('close', () => {
      clearTimeout(timer);
      done = true;
      resolveWait?.();
    });

    ws.send(JSON.stringify(request));

    try {
      while (true) {
        let next = queue.shift();
        while (next) {
          yield next;
          next = queue.shift();
        }
        if (error) throw error;
        if (done) break;
        await new Promise<void>((r) => { resolveWait = r; });
        resolveWait = null;
      }
    } finally {
      clearTimeout(timer);
      ws.close();
    }
  }

  /** Start the WebSocket server and hand JSON-RPC frames to `handler`. */
  async listen(handler: RpcHandler): Promise<void> {
    this.handler = handler;
    await this.ensureServer();
  }

  /** Stop the WebSocket server. */
  async close(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    if (this.wss) {
      const wss = this.wss;
      this.wss = null;
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    if (this.httpServer) {
      const server = this.httpServer;
      this.httpServer = null;
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
  }

  /** The port the server is listening on (undefined if not started). */
  get port(): number | undefined {
    const addr = this.httpServer?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return undefined;
  }

  private connect(endpoint: string): Promise<WsWebSocket> {
    return new Promise((resolve, reject) => {
      const ws = new WsWebSocket(endpoint);
      ws.once('open', () => resolve(ws));
      ws.once('error', reject);
    });
  }

  private async ensureServer(): Promise<void> {
    if (this.wss) return;

    const httpServer = createServer();
    const wss = new WebSocketServer({ server: httpServer });
    this.httpServer = httpServer;
    this.wss = wss;

    wss.on('connection', (ws) => {
      this.alive.set(ws, true);
      ws.on('pong', () => { this.alive.set(ws, true); });

      const controller = new AbortController();
      ws.on('close', () => controller.abort());

      ws.on('message', (data) => {
        this.handleFrame(ws, data, controller.signal).catch((err) => {
          this.config.logger?.('warn', 'Failed to process WebSocket message', err);
        });
      });
    });

    // Heartbeat
    if (this.config.heartbeatInterval > 0) {
      this.heartbeatTimer = setInterval(() => {
        wss.clients.forEach((ws) => {
          if (this.alive.get(ws) === false) {
            ws.terminate();
            return;
          }
          this.alive.set(ws, false);
          ws.ping();
        });
      }, this.config.heartbeatInterval);
    }

    await new Promise<void>((resolve) => {
      httpServer.listen(this.config.port, this.config.host, () => resolve());
    });
  }

  private async handleFrame(ws: WsWebSocket, data: WsWebSocket.RawData, signal: AbortSignal): Promise<void> {
    const handler = this.handler;
    if (!handler) return;

    let request: unknown;
    try {
      request = JSON.parse(data.toString());
    } catch {
      ws.send(JSON.stringify({ jsonrpc: '2.0', id: null, error: A2AError.parseError('Malformed JSON').toJSON() }));
      return;
    }

    if (handler.isStreaming(request)) {
      for await (const response of handler.handleStream(request, signal)) {
        if (ws.readyState !== WsWebSocket.OPEN) break;
        ws.send(JSON.stringify(response));
      }
      ws.close(1000, 'stream ended');
      return;
    }

    ws.send(JSON.stringify(await handler.handle(request)));
  }
}
