import type { Message, Task } from './task.js';

// ---------- message/send, message/stream ----------

/**
 * Payload for message/send and message/stream. A continuation carries the
 * existing task's id (and context id) on the message itself.
 */
export interface MessageSendParams {
  message: Message;
  /** Trim the history of a returned task to the last N messages. */
  historyLength?: number;
  metadata?: Record<string, unknown>;
}

/** message/send answers with a task, or with a bare message when no task is modelled. */
export type SendMessageResult = Task | Message;

// ---------- tasks/get ----------

export interface TaskQueryParams {
  taskId: string;
  historyLength?: number;
}

// ---------- tasks/cancel, tasks/resubscribe ----------

export interface TaskIdParams {
  taskId: string;
}
