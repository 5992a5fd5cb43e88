import { A2AError } from '../errors/A2AError.js';
import { PayloadValidator } from '../messaging/PayloadValidator.js';
import type { StreamEvent } from '../types/events.js';
import type { MessageSendParams, SendMessageResult, TaskQueryParams } from '../types/payloads.js';
import type { TransportPlugin, TransportSendOptions } from '../types/plugin.js';
import type { JsonRpcRequest, JsonRpcResponse, MethodName, MethodPayloadMap } from '../types/rpc.js';
import type { Task } from '../types/task.js';

export interface A2AClientOptions {
  /** Per-call timeout in milliseconds; the transport's default applies when absent. */
  timeout?: number;
}

function unwrap(response: JsonRpcResponse): unknown {
  if ('error' in response) {
    throw new A2AError(response.error.code, response.error.message, response.error.data);
  }
  return response.result;
}

function asTask(value: unknown): Task {
  if (!PayloadValidator.isTask(value)) throw A2AError.internalError('Response result is not a task');
  return value;
}

/** Calls an agent's JSON-RPC endpoint through one transport. */
export class A2AClient {
  private nextId = 1;
  private readonly sendOptions: TransportSendOptions;

  constructor(
    private readonly transport: TransportPlugin,
    endpoint: string,
    options?: A2AClientOptions,
  ) {
    this.sendOptions = { endpoint, ...(options?.timeout !== undefined ? { timeout: options.timeout } : {}) };
  }

  /** Send a message/send request. Resolves to the task, or to the agent's bare message. */
  async sendMessage(params: MessageSendParams): Promise<SendMessageResult> {
    const result = unwrap(await this.transport.send(this.request('message/send', params), this.sendOptions));
    if (PayloadValidator.isTask(result) || PayloadValidator.isMessage(result)) return result;
    throw A2AError.internalError('Response result is neither a task nor a message');
  }

  /** Stream a message/stream request. An error response ends the stream with an `error` event. */
  streamMessage(params: MessageSendParams): AsyncIterable<StreamEvent> {
    return this.events(this.request('message/stream', params));
  }

  /** Get a task by ID. */
  async getTask(params: TaskQueryParams): Promise<Task> {
    return asTask(unwrap(await this.transport.send(this.request('tasks/get', params), this.sendOptions)));
  }

  /** Cancel a task. */
  async cancelTask(taskId: string): Promise<Task> {
    return asTask(unwrap(await this.transport.send(this.request('tasks/cancel', { taskId }), this.sendOptions)));
  }

  /** Re-attach to the remaining events of a task. */
  resubscribe(taskId: string): AsyncIterable<StreamEvent> {
    return this.events(this.request('tasks/resubscribe', { taskId }));
  }

  private request<M extends MethodName>(method: M, params: MethodPayloadMap[M]['params']): JsonRpcRequest<M> {
    return { jsonrpc: '2.0', id: this.nextId++, method, params };
  }

  private async *events(request: JsonRpcRequest): AsyncIterable<StreamEvent> {
    for await (const response of this.transport.sendStream(request, this.sendOptions)) {
      if ('error' in response) {
        yield { type: 'error', error: response.error };
        return;
      }
      if (!PayloadValidator.isTaskEvent(response.result)) {
        throw A2AError.internalError('Stream response is not a task event');
      }
      yield response.result;
    }
  }
}
