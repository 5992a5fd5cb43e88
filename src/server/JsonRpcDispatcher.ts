import { A2AError } from '../errors/A2AError.js';
import { PayloadValidator, type RequestEnvelope } from '../messaging/PayloadValidator.js';
import type { EventChannel } from '../streaming/EventChannel.js';
import type { StreamEvent, TaskEvent } from '../types/events.js';
import type { Logger, RpcHandler } from '../types/plugin.js';
import type { JsonRpcErrorResponse, JsonRpcId, JsonRpcResponse, MethodName } from '../types/rpc.js';
import type { RequestHandler } from './RequestHandler.js';

const STREAMING_METHODS: ReadonlySet<string> = new Set<MethodName>(['message/stream', 'tasks/resubscribe']);

export interface JsonRpcDispatcherConfig {
  /** Optional logger for diagnostic events. */
  logger?: Logger;
}

function errorResponse(id: JsonRpcId, err: unknown): JsonRpcErrorResponse {
  return { jsonrpc: '2.0', id, error: A2AError.from(err).toJSON() };
}

function streamResponse(id: JsonRpcId, event: StreamEvent): JsonRpcResponse {
  if (event.type === 'error') return { jsonrpc: '2.0', id, error: event.error };
  return { jsonrpc: '2.0', id, result: event };
}

/**
 * JSON-RPC 2.0 front of a RequestHandler. Validates envelopes and params,
 * routes by method, and turns every failure into an error response carrying
 * the request id.
 */
export class JsonRpcDispatcher implements RpcHandler {
  private readonly logger?: Logger;

  constructor(
    private readonly handler: RequestHandler,
    config?: JsonRpcDispatcherConfig,
  ) {
    this.logger = config?.logger;
  }

  isStreaming(request: unknown): boolean {
    try {
      return STREAMING_METHODS.has(PayloadValidator.parseRequest(request).method);
    } catch {
      // Malformed envelopes are answered by handle().
      return false;
    }
  }

  async handle(request: unknown): Promise<JsonRpcResponse> {
    let envelope: RequestEnvelope;
    try {
      envelope = PayloadValidator.parseRequest(request);
    } catch (err) {
      return errorResponse(PayloadValidator.requestId(request), err);
    }

    const { id, method, params } = envelope;
    this.logger?.('debug', 'Dispatching request', { id, method });
    try {
      return { jsonrpc: '2.0', id, result: await this.route(method, params) };
    } catch (err) {
      const response = errorResponse(id, err);
      this.logger?.('debug', 'Request failed', { id, method, error: response.error });
      return response;
    }
  }

  async *handleStream(request: unknown, signal?: AbortSignal): AsyncIterable<JsonRpcResponse> {
    let envelope: RequestEnvelope;
    let channel: EventChannel<TaskEvent>;
    try {
      envelope = PayloadValidator.parseRequest(request);
      channel = await this.open(envelope.method, envelope.params);
    } catch (err) {
      yield errorResponse(PayloadValidator.requestId(request), err);
      return;
    }

    const { id, method } = envelope;
    this.logger?.('debug', 'Streaming request', { id, method });
    const onAbort = () => channel.abort();
    if (signal?.aborted) channel.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      for await (const event of channel) {
        yield streamResponse(id, event);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      channel.abort();
    }
  }

  private route(method: string, params: unknown): Promise<unknown> {
    switch (method) {
      case 'message/send':
        return this.handler.send(PayloadValidator.parseMessageSendParams(params));
      case 'tasks/get':
        return this.handler.getTask(PayloadValidator.parseTaskQueryParams(params));
      case 'tasks/cancel':
        return this.handler.cancel(PayloadValidator.parseTaskIdParams(params));
      case 'message/stream':
      case 'tasks/resubscribe':
        throw A2AError.invalidRequest(`${method} answers with a stream`);
      default:
        throw A2AError.methodNotFound(method);
    }
  }

  private open(method: string, params: unknown): Promise<EventChannel<TaskEvent>> {
    switch (method) {
      case 'message/stream':
        return this.handler.stream(PayloadValidator.parseMessageSendParams(params));
      case 'tasks/resubscribe':
        return this.handler.resubscribe(PayloadValidator.parseTaskIdParams(params));
      default:
        throw isKnown(method)
          ? A2AError.invalidRequest(`${method} does not answer with a stream`)
          : A2AError.methodNotFound(method);
    }
  }
}

function isKnown(method: string): boolean {
  return method === 'message/send' || method === 'tasks/get' || method === 'tasks/cancel';
}
