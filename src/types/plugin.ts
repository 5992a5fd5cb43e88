import type { JsonRpcRequest, JsonRpcResponse } from './rpc.js';
import type { Task } from './task.js';

// ---------- Logger ----------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Logger callback for diagnostic events. */
export type Logger = (level: LogLevel, message: string, data?: unknown) => void;

// ---------- Task Store ----------

/**
 * Persistence boundary for tasks. `save` upserts by `task.id` and must never
 * let a concurrent reader observe a partially written task.
 */
export interface TaskStore {
  get(taskId: string): Promise<Task | undefined>;
  save(task: Task): Promise<void>;
  delete(taskId: string): Promise<void>;
}

// ---------- Transport Plugin ----------

export interface TransportSendOptions {
  endpoint: string;
  timeout?: number;
}

/** Server-side entry point a transport hands inbound requests to. */
export interface RpcHandler {
  /** Whether the request's method answers with a stream of responses. */
  isStreaming(request: unknown): boolean;
  handle(request: unknown): Promise<JsonRpcResponse>;
  /** `signal` aborts when the client disconnects. */
  handleStream(request: unknown, signal?: AbortSignal): AsyncIterable<JsonRpcResponse>;
}

export interface TransportPlugin {
  readonly name: string;
  send(request: JsonRpcRequest, options: TransportSendOptions): Promise<JsonRpcResponse>;
  sendStream(request: JsonRpcRequest, options: TransportSendOptions): AsyncIterable<JsonRpcResponse>;
  listen?(handler: RpcHandler): Promise<void>;
  close?(): Promise<void>;
}
