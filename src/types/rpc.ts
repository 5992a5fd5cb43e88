import type { ErrorObject } from './errors.js';
import type { StreamEvent } from './events.js';
import type { MessageSendParams, SendMessageResult, TaskIdParams, TaskQueryParams } from './payloads.js';
import type { Task } from './task.js';

export type JsonRpcId = string | number | null;

export type MethodName =
  | 'message/send'
  | 'message/stream'
  | 'tasks/get'
  | 'tasks/cancel'
  | 'tasks/resubscribe';

/** Maps method names to their params/result types. */
export interface MethodPayloadMap {
  'message/send': { params: MessageSendParams; result: SendMessageResult };
  'message/stream': { params: MessageSendParams; result: StreamEvent };
  'tasks/get': { params: TaskQueryParams; result: Task };
  'tasks/cancel': { params: TaskIdParams; result: Task };
  'tasks/resubscribe': { params: TaskIdParams; result: StreamEvent };
}

export interface JsonRpcRequest<M extends MethodName = MethodName> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: M;
  params: MethodPayloadMap[M]['params'];
}

export interface JsonRpcSuccessResponse<R = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: R;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: ErrorObject;
}

export type JsonRpcResponse<R = unknown> = JsonRpcSuccessResponse<R> | JsonRpcErrorResponse;
