import type { Artifact } from './artifact.js';
import type { TaskStatus } from './task.js';
import type { ErrorObject } from './errors.js';

/** A task moved to a new state. */
export interface TaskStatusUpdateEvent {
  type: 'status-update';
  taskId: string;
  contextId: string;
  status: TaskStatus;
  /** True on the last event of a call. */
  final: boolean;
}

/** A task produced (a chunk of) an artifact. */
export interface TaskArtifactUpdateEvent {
  type: 'artifact-update';
  taskId: string;
  contextId: string;
  artifact: Artifact;
  lastChunk: boolean;
}

export type TaskEvent = TaskStatusUpdateEvent | TaskArtifactUpdateEvent;

/** Terminal event delivered when the producing side of a stream fails. */
export interface StreamErrorEvent {
  type: 'error';
  error: ErrorObject;
}

export type StreamEvent = TaskEvent | StreamErrorEvent;
