import { ErrorCodes, type ErrorObject } from '../types/errors.js';
import type { TaskState } from '../types/task.js';

export class A2AError extends Error {
  readonly code: number;
  readonly data?: Record<string, unknown>;

  constructor(code: number, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'A2AError';
    this.code = code;
    this.data = data;
  }

  toJSON(): ErrorObject {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }

  /** Wrap anything thrown into an A2AError, keeping A2AErrors as they are. */
  static from(err: unknown): A2AError {
    if (err instanceof A2AError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return A2AError.internalError(message);
  }

  static taskNotFound(taskId: string): A2AError {
    return new A2AError(ErrorCodes.TASK_NOT_FOUND, `Task not found: ${taskId}`, { taskId });
  }

  static invalidStateTransition(taskId: string, from: TaskState, to: TaskState | string, reason?: string): A2AError {
    return new A2AError(
      ErrorCodes.INVALID_STATE_TRANSITION,
      reason ?? `Task ${taskId} cannot move from ${from} to ${to}`,
      { taskId, from, to },
    );
  }

  static taskBusy(taskId: string): A2AError {
    return new A2AError(ErrorCodes.TASK_BUSY, `Task is busy: ${taskId}`, { taskId });
  }

  static unsupportedOperation(operation: string): A2AError {
    return new A2AError(ErrorCodes.UNSUPPORTED_OPERATION, `Operation not supported: ${operation}`, { operation });
  }

  static executorFailure(reason: string): A2AError {
    return new A2AError(ErrorCodes.EXECUTOR_FAILURE, `Agent executor failed: ${reason}`);
  }

  static upstreamUnavailable(reason: string): A2AError {
    return new A2AError(ErrorCodes.UPSTREAM_UNAVAILABLE, `Task store unavailable: ${reason}`);
  }

  static parseError(reason: string): A2AError {
    return new A2AError(ErrorCodes.PARSE_ERROR, reason);
  }

  static invalidRequest(reason: string): A2AError {
    return new A2AError(ErrorCodes.INVALID_REQUEST, reason);
  }

  static methodNotFound(method: string): A2AError {
    return new A2AError(ErrorCodes.METHOD_NOT_FOUND, `Method not found: ${method}`, { method });
  }

  static invalidParams(reason: string): A2AError {
    return new A2AError(ErrorCodes.INVALID_PARAMS, reason);
  }

  static internalError(reason: string): A2AError {
    return new A2AError(ErrorCodes.INTERNAL_ERROR, reason);
  }

  static agentCardInvalid(reason: string): A2AError {
    return new A2AError(ErrorCodes.AGENT_CARD_INVALID, `Agent card rejected: ${reason}`);
  }
}
