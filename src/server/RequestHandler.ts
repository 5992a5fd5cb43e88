import { randomUUID } from 'node:crypto';
import { KeyedMutex, type Release } from '../concurrency/KeyedMutex.js';
import { A2AError } from '../errors/A2AError.js';
import { TaskLifecycle } from '../lifecycle/TaskLifecycle.js';
import { EventChannel } from '../streaming/EventChannel.js';
import { ErrorCodes } from '../types/errors.js';
import type { TaskEvent, TaskStatusUpdateEvent } from '../types/events.js';
import type { AgentExecutor, ExecutionContext, TaskDelta } from '../types/executor.js';
import type { MessageSendParams, SendMessageResult, TaskIdParams, TaskQueryParams } from '../types/payloads.js';
import type { Logger, LogLevel, TaskStore } from '../types/plugin.js';
import type { Message, Task } from '../types/task.js';

/** What to do with a call for a task that another call is already working on. */
export type ConcurrencyPolicy = 'reject' | 'queue';

export interface RequestHandlerConfig {
  executor: AgentExecutor;
  taskStore: TaskStore;
  /** `reject` answers TaskBusy, `queue` waits for the other call (default: 'reject'). */
  concurrency?: ConcurrencyPolicy;
  /** Events a stream may buffer ahead of a slow consumer (default: 1). */
  channelCapacity?: number;
  /** Optional logger for diagnostic events. */
  logger?: Logger;
  /** Id source for tasks, contexts and agent messages (default: randomUUID). */
  generateId?: () => string;
  /** Clock used for status timestamps (default: the system clock). */
  now?: () => Date;
}

interface FoldResult {
  task: Task;
  /** False when the task had already finished and the delta was discarded. */
  applied: boolean;
  /** The delta actually folded, which differs from the reported one after a rejected transition. */
  delta: TaskDelta;
}

interface StreamRun {
  task: Task;
  source: () => AsyncIterable<TaskDelta>;
  channel: EventChannel<TaskEvent>;
  controller: AbortController;
  release: Release;
  /** Emit the task's current status before the first delta. */
  snapshot: boolean;
}

function isMessage(result: Message | TaskDelta): result is Message {
  return 'kind' in result && result.kind === 'message';
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function withHistoryLength(task: Task, historyLength?: number): Task {
  if (historyLength === undefined) return task;
  return { ...task, history: historyLength === 0 ? [] : task.history.slice(-historyLength) };
}

function statusEvent(task: Task, final: boolean): TaskStatusUpdateEvent {
  return { type: 'status-update', taskId: task.id, contextId: task.contextId, status: task.status, final };
}

async function* noDeltas(): AsyncGenerator<TaskDelta> {}

async function* raising(err: unknown): AsyncGenerator<TaskDelta> {
  throw err;
}

/**
 * Routes the four task operations to the agent executor and drives the task
 * lifecycle from what the executor reports.
 *
 * Two per-task scopes keep mutation ordered: a call scope held by send,
 * stream and resubscribe for their whole duration, and a short write scope
 * around every read-apply-save, which cancel also takes.
 */
export class RequestHandler {
  private readonly executor: AgentExecutor;
  private readonly store: TaskStore;
  private readonly policy: ConcurrencyPolicy;
  private readonly channelCapacity: number;
  private readonly logger?: Logger;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  private readonly calls = new KeyedMutex();
  private readonly writes = new KeyedMutex();
  private readonly runs = new Map<string, AbortController>();

  constructor(config: RequestHandlerConfig) {
    this.executor = config.executor;
    this.store = config.taskStore;
    this.policy = config.concurrency ?? 'reject';
    this.channelCapacity = config.channelCapacity ?? 1;
    this.logger = config.logger;
    this.generateId = config.generateId ?? randomUUID;
    this.now = config.now ?? (() => new Date());
  }

  /** Ids of tasks with a send, stream or resubscribe call in flight. */
  activeTaskIds(): string[] {
    return [...this.runs.keys()];
  }

  async getTask(params: TaskQueryParams): Promise<Task> {
    const task = await this.read(params.taskId);
    if (!task) throw A2AError.taskNotFound(params.taskId);
    return withHistoryLength(task, params.historyLength);
  }

  /**
   * Non-streaming turn. Returns the task after exactly one transition, or
   * the executor's bare message when it does not model the turn as a task.
   */
  async send(params: MessageSendParams): Promise<SendMessageResult> {
    const taskId = params.message.taskId ?? this.generateId();
    const release = await this.acquire(taskId);
    const controller = this.track(taskId);
    try {
      const { task, created } = await this.open(taskId, params);

      let result: Message | TaskDelta;
      try {
        result = await this.executor.sendMessage(this.context(task, params.message, controller.signal));
      } catch (err) {
        result = this.failure(taskId, err);
      }

      if (isMessage(result)) {
        if (created) {
          const discarded = await this.discardProvisional(taskId);
          return discarded ? result : withHistoryLength(await this.require(taskId), params.historyLength);
        }
        result = { state: 'completed', message: result };
      }

      const { task: updated } = await this.fold(taskId, result);
      return withHistoryLength(updated, params.historyLength);
    } finally {
      this.untrack(taskId, controller);
      release();
    }
  }

  /**
   * Streaming turn. Resolves once the task is persisted and the executor is
   * running; events arrive on the returned channel in the order the executor
   * produced them.
   */
  async stream(params: MessageSendParams): Promise<EventChannel<TaskEvent>> {
    const taskId = params.message.taskId ?? this.generateId();
    const release = await this.acquire(taskId);
    const { task } = await this.open(taskId, params).catch((err: unknown) => {
      release();
      throw err;
    });

    const channel = new EventChannel<TaskEvent>({ capacity: this.channelCapacity });
    const controller = this.track(taskId, channel.signal);
    this.start({
      task,
      source: () => this.executor.streamMessage(this.context(task, params.message, controller.signal)),
      channel,
      controller,
      release,
      snapshot: false,
    });
    return channel;
  }

  async cancel(params: TaskIdParams): Promise<Task> {
    const { taskId } = params;
    const canceled = await this.writes.runExclusive(taskId, async () => {
      const current = await this.read(taskId);
      if (!current) throw A2AError.taskNotFound(taskId);
      const next = TaskLifecycle.cancel(current, this.timestamp());
      await this.write(next);
      return next;
    });
    this.log('info', 'Task canceled', { taskId });

    this.runs.get(taskId)?.abort();
    await this.cancelExecutor(taskId);
    return canceled;
  }

  /**
   * Re-attach to a task's remaining events after a dropped stream. Finished
   * tasks answer with their final status; others with the current status
   * followed by whatever the executor still produces.
   */
  async resubscribe(params: TaskIdParams): Promise<EventChannel<TaskEvent>> {
    const { taskId } = params;
    const stored = await this.read(taskId);
    if (!stored) throw A2AError.taskNotFound(taskId);

    const resubscribe = this.executor.resubscribe?.bind(this.executor);
    if (!resubscribe) throw A2AError.unsupportedOperation('tasks/resubscribe');

    const channel = new EventChannel<TaskEvent>({ capacity: this.channelCapacity });
    if (TaskLifecycle.isTerminal(stored.status.state)) {
      this.start({
        task: stored,
        source: noDeltas,
        channel,
        controller: new AbortController(),
        release: () => {},
        snapshot: false,
      });
      return channel;
    }

    const release = await this.acquire(taskId);
    const task = await this.require(taskId).catch((err: unknown) => {
      release();
      throw err;
    });
    if (TaskLifecycle.isTerminal(task.status.state)) {
      // Finished while this call waited for the task.
      this.start({ task, source: noDeltas, channel, controller: new AbortController(), release, snapshot: false });
      return channel;
    }
    const controller = this.track(taskId, channel.signal);
    this.start({
      task,
      source: () => resubscribe({ taskId, contextId: task.contextId, task, signal: controller.signal }),
      channel,
      controller,
      release,
      snapshot: true,
    });
    return channel;
  }

  // --- Call resolution ---

  private async acquire(taskId: string): Promise<Release> {
    if (this.policy === 'queue') return this.calls.lock(taskId);
    const release = this.calls.tryLock(taskId);
    if (!release) throw A2AError.taskBusy(taskId);
    return release;
  }

  /** Create the task, or feed the new input into the existing one. */
  private open(taskId: string, params: MessageSendParams): Promise<{ task: Task; created: boolean }> {
    const { message } = params;
    return this.writes.runExclusive(taskId, async () => {
      const existing = await this.read(taskId);
      const timestamp = this.timestamp();

      if (!existing) {
        const task = TaskLifecycle.create({
          id: taskId,
          contextId: message.contextId ?? this.generateId(),
          message,
          timestamp,
          metadata: params.metadata,
        });
        await this.write(task);
        this.log('info', 'Task created', { taskId, contextId: task.contextId });
        return { task, created: true };
      }

      if (message.contextId !== undefined && message.contextId !== existing.contextId) {
        throw A2AError.invalidParams(
          `Message context ${message.contextId} does not match context ${existing.contextId} of task ${taskId}`,
        );
      }
      const task = TaskLifecycle.receiveInput(existing, message, timestamp);
      await this.write(task);
      this.log('debug', 'Task resumed', { taskId, from: existing.status.state });
      return { task, created: false };
    });
  }

  /** Remove a task created for a turn the executor answered with a bare message. */
  private discardProvisional(taskId: string): Promise<boolean> {
    return this.writes.runExclusive(taskId, async () => {
      const current = await this.read(taskId);
      if (current && TaskLifecycle.isTerminal(current.status.state)) return false;
      await this.guard(() => this.store.delete(taskId));
      return true;
    });
  }

  private context(task: Task, userMessage: Message, signal: AbortSignal): ExecutionContext {
    return { taskId: task.id, contextId: task.contextId, userMessage, task, signal };
  }

  // --- Folding ---

  private fold(taskId: string, delta: TaskDelta): Promise<FoldResult> {
    return this.writes.runExclusive(taskId, async () => {
      const current = await this.require(taskId);
      if (TaskLifecycle.isTerminal(current.status.state)) {
        this.log('debug', 'Discarding delta for finished task', { taskId, state: current.status.state, delta: delta.state });
        return { task: current, applied: false, delta };
      }

      const timestamp = this.timestamp();
      let applied = delta;
      let next: Task;
      try {
        next = TaskLifecycle.apply(current, delta, timestamp);
      } catch (err) {
        if (!(err instanceof A2AError)) throw err;
        this.log('warn', 'Executor reported an invalid delta', { taskId, error: err.message });
        applied = this.failure(taskId, err);
        next = TaskLifecycle.apply(current, applied, timestamp);
      }

      await this.write(next);
      this.log('debug', 'Task transitioned', { taskId, from: current.status.state, to: next.status.state });
      return { task: next, applied: true, delta: applied };
    });
  }

  /** Executor failures become a `failed` transition carrying the reason. */
  private failure(taskId: string, err: unknown): TaskDelta {
    const failure = A2AError.executorFailure(reasonOf(err));
    this.log('warn', 'Executor failed', { taskId, error: failure.message });
    return {
      state: 'failed',
      message: {
        kind: 'message',
        messageId: this.generateId(),
        role: 'agent',
        parts: [{ kind: 'text', text: failure.message }],
      },
    };
  }

  // --- Streaming ---

  private start(run: StreamRun): void {
    this.pump(run).catch((err) => {
      this.log('error', 'Stream pump failed', { taskId: run.task.id, error: reasonOf(err) });
      run.channel.fail(A2AError.from(err));
    });
  }

  private async pump(run: StreamRun): Promise<void> {
    const { task, channel, controller } = run;
    const taskId = task.id;
    let iterator: AsyncIterator<TaskDelta> | undefined;
    let exhausted = false;
    let finished = false;

    try {
      if (run.snapshot) await channel.push(statusEvent(task, false));
      iterator = this.openSource(run.source);

      while (!finished) {
        let step: IteratorResult<TaskDelta> | 'aborted';
        try {
          step = await this.nextDelta(iterator, controller.signal);
        } catch (err) {
          exhausted = true;
          step = { done: false, value: this.failure(taskId, err) };
        }

        if (step === 'aborted') {
          // Canceled (emit the final status) or the consumer left (nothing to emit).
          if (!channel.signal.aborted) {
            await channel.push(statusEvent(await this.require(taskId), true));
            finished = true;
          }
          break;
        }
        if (step.done) {
          exhausted = true;
          break;
        }

        const folded = await this.fold(taskId, step.value);
        if (!folded.applied) {
          await channel.push(statusEvent(folded.task, true));
          finished = true;
          break;
        }
        finished = TaskLifecycle.isFinal(folded.task.status.state);
        await channel.push(this.toEvent(folded, finished));
      }

      if (!finished && !channel.signal.aborted) {
        // The executor stopped without reaching a final state.
        await channel.push(statusEvent(await this.require(taskId), true));
      }
      channel.close();
    } catch (err) {
      const error = A2AError.from(err);
      this.log('error', 'Stream failed', { taskId, error: error.message });
      channel.fail(error);
    } finally {
      if (iterator && !exhausted) this.stopSource(taskId, iterator);
      this.untrack(taskId, controller);
      run.release();
    }
  }

  /** One event per folded delta: its artifact chunk if it carries one, its status otherwise. */
  private toEvent({ task, delta }: FoldResult, final: boolean): TaskEvent {
    if (!delta.artifact) return statusEvent(task, final);
    return {
      type: 'artifact-update',
      taskId: task.id,
      contextId: task.contextId,
      artifact: delta.artifact,
      lastChunk: final || delta.artifact.lastChunk === true,
    };
  }

  /** A source that throws before producing an iterable fails on its first read instead. */
  private openSource(source: () => AsyncIterable<TaskDelta>): AsyncIterator<TaskDelta> {
    try {
      return source()[Symbol.asyncIterator]();
    } catch (err) {
      return raising(err);
    }
  }

  /** Next delta from the executor, or 'aborted' as soon as the run's signal fires. */
  private nextDelta(
    iterator: AsyncIterator<TaskDelta>,
    signal: AbortSignal,
  ): Promise<IteratorResult<TaskDelta> | 'aborted'> {
    if (signal.aborted) return Promise.resolve('aborted');
    return new Promise((resolve, reject) => {
      const onAbort = () => resolve('aborted');
      signal.addEventListener('abort', onAbort, { once: true });
      iterator.next().then(
        (result) => {
          signal.removeEventListener('abort', onAbort);
          resolve(result);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }

  /** Tell an executor we stopped listening; anything it yields afterwards is dropped. */
  private stopSource(taskId: string, iterator: AsyncIterator<TaskDelta>): void {
    if (!iterator.return) return;
    iterator.return().catch((err) => {
      this.log('warn', 'Executor failed to stop its delta stream', { taskId, error: reasonOf(err) });
    });
  }

  // --- Cancellation ---

  private track(taskId: string, consumer?: AbortSignal): AbortController {
    const controller = new AbortController();
    consumer?.addEventListener('abort', () => controller.abort(), { once: true });
    this.runs.set(taskId, controller);
    return controller;
  }

  private untrack(taskId: string, controller: AbortController): void {
    if (this.runs.get(taskId) === controller) this.runs.delete(taskId);
  }

  private async cancelExecutor(taskId: string): Promise<void> {
    if (!this.executor.cancel) return;
    try {
      await this.executor.cancel(taskId);
    } catch (err) {
      if (err instanceof A2AError && err.code === ErrorCodes.UNSUPPORTED_OPERATION) {
        this.log('debug', 'Executor does not support cancel', { taskId });
      } else {
        this.log('warn', 'Executor failed to cancel task', { taskId, error: reasonOf(err) });
      }
    }
  }

  // --- Store access ---

  private read(taskId: string): Promise<Task | undefined> {
    return this.guard(() => this.store.get(taskId));
  }

  private async require(taskId: string): Promise<Task> {
    const task = await this.read(taskId);
    if (!task) throw A2AError.taskNotFound(taskId);
    return task;
  }

  private write(task: Task): Promise<void> {
    return this.guard(() => this.store.save(task));
  }

  /** Store failures surface as UpstreamUnavailable. */
  private async guard<R>(op: () => Promise<R>): Promise<R> {
    try {
      return await op();
    } catch (err) {
      if (err instanceof A2AError) throw err;
      throw A2AError.upstreamUnavailable(reasonOf(err));
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    this.logger?.(level, message, data);
  }
}
