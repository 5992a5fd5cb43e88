import type { Part } from './part.js';
import type { Artifact } from './artifact.js';

export type TaskState =
  | 'submitted'
  | 'working'
  | 'input_required'
  | 'completed'
  | 'failed'
  | 'canceled';

/** States from which no further transition is accepted. */
export type TerminalTaskState = Extract<TaskState, 'completed' | 'failed' | 'canceled'>;

/** Role of a message within a task conversation. */
export type MessageRole = 'user' | 'agent';

/** A single communication turn within a task. */
export interface Message {
  kind: 'message';
  messageId: string;
  role: MessageRole;
  parts: Part[];
  taskId?: string;
  contextId?: string;
  /** Streaming only: marks the last fragment of one logical reply. */
  final?: boolean;
}

/** Current status of a task. */
export interface TaskStatus {
  state: TaskState;
  /** ISO-8601 time of the last transition. */
  timestamp: string;
  message?: Message;
}

/** A unit of work that may span multiple message turns. */
export interface Task {
  kind: 'task';
  id: string;
  contextId: string;
  status: TaskStatus;
  history: Message[];
  artifacts: Artifact[];
  metadata?: Record<string, unknown>;
}
