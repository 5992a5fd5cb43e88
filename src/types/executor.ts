import type { Artifact } from './artifact.js';
import type { Message, Task, TaskState } from './task.js';

/**
 * A change reported by an executor: the state it wants the task to move to,
 * plus an optional explanatory message and an optional artifact (chunk).
 */
export interface TaskDelta {
  state: TaskState;
  message?: Message;
  artifact?: Artifact;
  /** Extend the parts of an earlier artifact with the same `artifactId`. */
  append?: boolean;
}

/** What an executor sees when it is asked to work on a task. */
export interface ExecutionContext {
  taskId: string;
  contextId: string;
  /** The input that triggered this invocation. */
  userMessage: Message;
  /** Snapshot of the task, history included, as persisted before invocation. */
  task: Task;
  /** Aborted when the task is canceled or the caller goes away. */
  signal: AbortSignal;
}

export type ResubscribeContext = Omit<ExecutionContext, 'userMessage'>;

/**
 * The pluggable unit holding the agent's reasoning. Implementations are chosen
 * when the request handler is constructed.
 */
export interface AgentExecutor {
  /** Handle one turn. A bare `Message` means the turn is not modelled as a task. */
  sendMessage(context: ExecutionContext): Promise<Message | TaskDelta>;

  /** Handle one turn as a finite, ordered sequence of deltas. */
  streamMessage(context: ExecutionContext): AsyncIterable<TaskDelta>;

  /**
   * Stop work on a task. Executors that cannot stop work omit this or throw
   * `A2AError.unsupportedOperation`.
   */
  cancel?(taskId: string): Promise<void>;

  /** Re-attach to the remaining deltas of work that is still running. */
  resubscribe?(context: ResubscribeContext): AsyncIterable<TaskDelta>;
}
