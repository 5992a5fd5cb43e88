import { A2AError } from '../errors/A2AError.js';
import type { Artifact } from '../types/artifact.js';
import type { TaskDelta } from '../types/executor.js';
import type { Message, Task, TaskState, TerminalTaskState } from '../types/task.js';

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['completed', 'failed', 'canceled']);

// `canceled` is reachable only through TaskLifecycle.cancel.
const TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  submitted: ['working', 'input_required', 'completed', 'failed'],
  working: ['working', 'input_required', 'completed', 'failed'],
  input_required: ['working', 'failed'],
  completed: [],
  failed: [],
  canceled: [],
};

export interface CreateTaskInit {
  id: string;
  contextId: string;
  message: Message;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

/**
 * The task state machine. Every function here is pure: it returns a new
 * task and never touches the one it was given, so a sequence of deltas
 * replayed against the same starting task always yields the same result.
 */
export class TaskLifecycle {
  static isTerminal(state: TaskState): state is TerminalTaskState {
    return TERMINAL_STATES.has(state);
  }

  /** Whether a state ends the current call (terminal, or waiting on the client). */
  static isFinal(state: TaskState): boolean {
    return TaskLifecycle.isTerminal(state) || state === 'input_required';
  }

  static canTransition(from: TaskState, to: TaskState): boolean {
    return TRANSITIONS[from].includes(to);
  }

  /** A new task in `submitted`, with the triggering message as its first history entry. */
  static create(init: CreateTaskInit): Task {
    const task: Task = {
      kind: 'task',
      id: init.id,
      contextId: init.contextId,
      status: { state: 'submitted', timestamp: init.timestamp },
      history: [],
      artifacts: [],
      ...(init.metadata !== undefined ? { metadata: { ...init.metadata } } : {}),
    };
    return { ...task, history: [stamp(task, init.message)] };
  }

  /** Fold one executor-reported delta into the task. */
  static apply(task: Task, delta: TaskDelta, timestamp: string): Task {
    const from = task.status.state;
    if (TaskLifecycle.isTerminal(from)) {
      throw A2AError.invalidStateTransition(task.id, from, delta.state, `Task ${task.id} is already ${from}`);
    }
    if (!TaskLifecycle.canTransition(from, delta.state)) {
      const reason = delta.state === 'canceled'
        ? `Task ${task.id} can only be canceled through the cancel operation`
        : undefined;
      throw A2AError.invalidStateTransition(task.id, from, delta.state, reason);
    }
    if (delta.state === 'input_required' && !delta.message) {
      throw A2AError.invalidStateTransition(
        task.id,
        from,
        delta.state,
        `Task ${task.id} cannot require input without a message saying what is needed`,
      );
    }

    const message = delta.message ? stamp(task, delta.message) : undefined;
    return {
      ...task,
      status: {
        state: delta.state,
        timestamp,
        ...(message ? { message } : {}),
      },
      history: message ? [...task.history, message] : [...task.history],
      artifacts: delta.artifact
        ? addArtifact(task, delta.artifact, delta.append ?? false)
        : [...task.artifacts],
    };
  }

  /** Continuation: new client input re-enters `working` on top of the existing history. */
  static receiveInput(task: Task, message: Message, timestamp: string): Task {
    const from = task.status.state;
    if (TaskLifecycle.isTerminal(from)) {
      throw A2AError.invalidStateTransition(task.id, from, 'working', `Task ${task.id} is already ${from}`);
    }
    return {
      ...task,
      status: { state: 'working', timestamp },
      history: [...task.history, stamp(task, message)],
      artifacts: [...task.artifacts],
    };
  }

  static cancel(task: Task, timestamp: string): Task {
    const from = task.status.state;
    if (TaskLifecycle.isTerminal(from)) {
      throw A2AError.invalidStateTransition(task.id, from, 'canceled', `Task ${task.id} is already ${from}`);
    }
    return {
      ...task,
      status: { state: 'canceled', timestamp },
      history: [...task.history],
      artifacts: [...task.artifacts],
    };
  }
}

/** Tie a message to the task it was recorded in. */
function stamp(task: Task, message: Message): Message {
  return { ...message, taskId: task.id, contextId: task.contextId };
}

function addArtifact(task: Task, artifact: Artifact, append: boolean): Artifact[] {
  const index = task.artifacts.findIndex((a) => a.artifactId === artifact.artifactId);
  if (index === -1) {
    return [...task.artifacts, { ...artifact, parts: [...artifact.parts] }];
  }

  const existing = task.artifacts[index];
  if (!append) {
    throw A2AError.invalidParams(`Artifact ${artifact.artifactId} already exists on task ${task.id}`);
  }
  if (existing.lastChunk) {
    throw A2AError.invalidStateTransition(
      task.id,
      task.status.state,
      task.status.state,
      `Artifact ${artifact.artifactId} on task ${task.id} is already complete`,
    );
  }

  const merged: Artifact = {
    ...existing,
    parts: [...existing.parts, ...artifact.parts],
    ...(artifact.lastChunk !== undefined ? { lastChunk: artifact.lastChunk } : {}),
  };
  return task.artifacts.map((a, i) => (i === index ? merged : a));
}
