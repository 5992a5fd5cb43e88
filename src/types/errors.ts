export const ErrorCodes = {
  // JSON-RPC 2.0
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,

  // Task lifecycle
  TASK_NOT_FOUND: -32001,
  INVALID_STATE_TRANSITION: -32002,
  UNSUPPORTED_OPERATION: -32004,
  TASK_BUSY: -32010,
  UPSTREAM_UNAVAILABLE: -32011,
  EXECUTOR_FAILURE: -32012,

  // Discovery
  AGENT_CARD_INVALID: -32020,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Serialized error as carried in a JSON-RPC error response. */
export interface ErrorObject {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}
