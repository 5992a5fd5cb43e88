import { describe, it, expect } from 'vitest';
import { RequestHandler, type RequestHandlerConfig } from '../../src/server/RequestHandler.js';
import { InMemoryTaskStore } from '../../src/stores/InMemoryTaskStore.js';
import { A2AError } from '../../src/errors/A2AError.js';
import { ErrorCodes } from '../../src/types/errors.js';
import type { StreamEvent } from '../../src/types/events.js';
import type { AgentExecutor } from '../../src/types/executor.js';
import type { LogLevel, TaskStore } from '../../src/types/plugin.js';
import type { Message, Task } from '../../src/types/task.js';
import {
  CurrencyExecutor,
  GatedExecutor,
  HelloWorldExecutor,
  MinimalExecutor,
  ResumableGatedExecutor,
  ScriptedExecutor,
  UncancellableExecutor,
} from '../helpers/executors.js';
import { agentMessage, collect, flush, sequentialIds, steppingClock, textOf, userMessage } from '../helpers/fixtures.js';

type LogEntry = [LogLevel, string, unknown];

function setup(executor: AgentExecutor, overrides: Partial<RequestHandlerConfig> = {}) {
  const store = new InMemoryTaskStore();
  const logs: LogEntry[] = [];
  const handler = new RequestHandler({
    executor,
    taskStore: store,
    generateId: sequentialIds('gen'),
    now: steppingClock(),
    logger: (level, message, data) => logs.push([level, message, data]),
    ...overrides,
  });
  return { handler, store, logs };
}

function asTask(result: Task | Message): Task {
  if (result.kind !== 'task') throw new Error(`expected a task, got ${result.kind}`);
  return result;
}

/** Store whose writes start failing once `failing` is set. */
class FlakyStore implements TaskStore {
  failing = false;
  private readonly inner = new InMemoryTaskStore();

  get(taskId: string): Promise<Task | undefined> {
    return this.inner.get(taskId);
  }

  async save(task: Task): Promise<void> {
    if (this.failing) throw new Error('disk full');
    await this.inner.save(task);
  }

  delete(taskId: string): Promise<void> {
    return this.inner.delete(taskId);
  }
}

describe('RequestHandler', () => {
  describe('send', () => {
    it('creates a task and applies the executor result', async () => {
      const { handler, store } = setup(new HelloWorldExecutor());
      const task = asTask(await handler.send({ message: userMessage('hi') }));

      expect(task.id).toBe('gen-1');
      expect(task.contextId).toBe('gen-2');
      expect(task.status.state).toBe('completed');
      expect(task.status.timestamp).toBe('2025-01-01T00:00:01.000Z');
      expect(textOf(task.status.message)).toBe('Hello World');
      expect(task.status.message?.taskId).toBe('gen-1');
      expect(task.history.map((m) => m.role)).toEqual(['user', 'agent']);
      expect(await store.get('gen-1')).toEqual(task);
    });

    it('returns a bare message and keeps no task when the executor answers without one', async () => {
      const { handler, store } = setup(new HelloWorldExecutor(true));
      const result = await handler.send({ message: userMessage('hi') });

      expect(result).toEqual(agentMessage('Hello World', 'hello-reply'));
      expect(store.size).toBe(0);
    });

    it('adopts a caller-chosen task id and context id', async () => {
      const { handler } = setup(new HelloWorldExecutor());
      const task = asTask(await handler.send({
        message: userMessage('hi', { taskId: 'client-task', contextId: 'client-ctx' }),
      }));
      expect(task.id).toBe('client-task');
      expect(task.contextId).toBe('client-ctx');
    });

    it('hands the executor the persisted task and the triggering message', async () => {
      const executor = new ScriptedExecutor({ send: { state: 'completed' } });
      const { handler } = setup(executor);
      await handler.send({ message: userMessage('hi'), metadata: { trace: 'abc' } });

      const [context] = executor.calls;
      expect(context.taskId).toBe('gen-1');
      expect(context.contextId).toBe('gen-2');
      expect(context.task.status.state).toBe('submitted');
      expect(context.task.metadata).toEqual({ trace: 'abc' });
      expect(textOf(context.userMessage)).toBe('hi');
      expect(context.signal.aborted).toBe(false);
    });

    it('trims returned history to historyLength', async () => {
      const { handler, store } = setup(new HelloWorldExecutor());
      const task = asTask(await handler.send({ message: userMessage('hi'), historyLength: 1 }));
      expect(task.history.map((m) => m.role)).toEqual(['agent']);
      expect((await store.get('gen-1'))?.history).toHaveLength(2);
    });

    it('folds an executor exception into a failed task', async () => {
      const { handler, logs } = setup(new ScriptedExecutor({ send: new Error('boom') }));
      const task = asTask(await handler.send({ message: userMessage('hi') }));

      expect(task.status.state).toBe('failed');
      expect(textOf(task.status.message)).toBe('Agent executor failed: boom');
      expect(logs.some(([level, message]) => level === 'warn' && message === 'Executor failed')).toBe(true);
    });

    it('fails the task when the executor reports a forbidden transition', async () => {
      const { handler } = setup(new ScriptedExecutor({ send: { state: 'canceled' } }));
      const task = asTask(await handler.send({ message: userMessage('hi') }));

      expect(task.status.state).toBe('failed');
      expect(textOf(task.status.message))
        .toBe('Agent executor failed: Task gen-1 can only be canceled through the cancel operation');
    });

    it('fails the task when input is requested without a message', async () => {
      const { handler } = setup(new ScriptedExecutor({ send: { state: 'input_required' } }));
      const task = asTask(await handler.send({ message: userMessage('hi') }));
      expect(task.status.state).toBe('failed');
    });

    it('surfaces store failures as UpstreamUnavailable', async () => {
      const store = new FlakyStore();
      store.failing = true;
      const { handler } = setup(new HelloWorldExecutor(), { taskStore: store });

      await expect(handler.send({ message: userMessage('hi') })).rejects.toMatchObject({
        code: ErrorCodes.UPSTREAM_UNAVAILABLE,
        message: 'Task store unavailable: disk full',
      });
    });
  });

  describe('continuation', () => {
    it('resumes an input_required task with the accumulated history', async () => {
      const { handler } = setup(new CurrencyExecutor());
      const first = asTask(await handler.send({ message: userMessage('convert 100 USD') }));
      expect(first.status.state).toBe('input_required');
      expect(textOf(first.status.message)).toBe('In which currency?');

      const second = asTask(await handler.send({
        message: userMessage('GBP', { taskId: first.id, contextId: first.contextId }),
      }));
      expect(second.id).toBe(first.id);
      expect(second.status.state).toBe('completed');
      expect(textOf(second.status.message)).toBe('100 USD = 79.00 GBP');
      expect(second.history.map((m) => textOf(m))).toEqual([
        'convert 100 USD',
        'In which currency?',
        'GBP',
        '100 USD = 79.00 GBP',
      ]);
      expect(second.artifacts).toEqual([{
        artifactId: 'conversion',
        parts: [{ kind: 'data', data: { from: 'USD', to: 'GBP', amount: 100, result: 79 } }],
        lastChunk: true,
      }]);
    });

    it('folds a bare message on a continued task as completed', async () => {
      const executor = new ScriptedExecutor({ send: { state: 'input_required', message: agentMessage('more?') } });
      const { handler } = setup(executor);
      const first = asTask(await handler.send({ message: userMessage('start') }));

      const replying = new ScriptedExecutor({ send: agentMessage('thanks', 'bye') });
      const { handler: second, store } = setup(replying);
      await store.save(first);

      const task = asTask(await second.send({ message: userMessage('answer', { taskId: first.id }) }));
      expect(task.status.state).toBe('completed');
      expect(textOf(task.status.message)).toBe('thanks');
    });

    it('rejects a mismatched context id', async () => {
      const { handler } = setup(new CurrencyExecutor());
      const first = asTask(await handler.send({ message: userMessage('convert 100 USD') }));

      await expect(handler.send({
        message: userMessage('GBP', { taskId: first.id, contextId: 'other-ctx' }),
      })).rejects.toMatchObject({ code: ErrorCodes.INVALID_PARAMS });
    });

    it('rejects new input for a finished task', async () => {
      const { handler } = setup(new HelloWorldExecutor());
      const task = asTask(await handler.send({ message: userMessage('hi') }));

      await expect(handler.send({ message: userMessage('again', { taskId: task.id }) }))
        .rejects.toThrow('Task gen-1 is already completed');
    });
  });

  describe('getTask', () => {
    it('returns the stored task, trimmed on request', async () => {
      const { handler } = setup(new HelloWorldExecutor());
      await handler.send({ message: userMessage('hi') });

      expect((await handler.getTask({ taskId: 'gen-1' })).history).toHaveLength(2);
      expect((await handler.getTask({ taskId: 'gen-1', historyLength: 0 })).history).toEqual([]);
    });

    it('reports unknown tasks', async () => {
      const { handler } = setup(new HelloWorldExecutor());
      await expect(handler.getTask({ taskId: 'nope' })).rejects.toMatchObject({
        code: ErrorCodes.TASK_NOT_FOUND,
        message: 'Task not found: nope',
      });
    });
  });

  describe('cancel', () => {
    it('cancels a waiting task once', async () => {
      const { handler } = setup(new CurrencyExecutor());
      const task = asTask(await handler.send({ message: userMessage('convert 100 USD') }));

      const canceled = await handler.cancel({ taskId: task.id });
      expect(canceled.status.state).toBe('canceled');
      await expect(handler.cancel({ taskId: task.id })).rejects.toMatchObject({
        code: ErrorCodes.INVALID_STATE_TRANSITION,
      });
    });

    it('reports unknown tasks', async () => {
      const { handler } = setup(new HelloWorldExecutor());
      await expect(handler.cancel({ taskId: 'nope' })).rejects.toMatchObject({ code: ErrorCodes.TASK_NOT_FOUND });
    });

    it('aborts the running call and discards what the executor reports afterwards', async () => {
      const executor = new GatedExecutor();
      const { handler, store } = setup(executor);
      const pending = handler.send({ message: userMessage('slow') });
      await executor.blocked();

      const canceled = await handler.cancel({ taskId: 'gen-1' });
      expect(canceled.status.state).toBe('canceled');
      expect(executor.contexts[0].signal.aborted).toBe(true);
      expect(executor.canceled).toEqual(['gen-1']);

      executor.release({ state: 'completed', message: agentMessage('too late') });
      const result = asTask(await pending);
      expect(result.status.state).toBe('canceled');
      expect((await store.get('gen-1'))?.history).toHaveLength(1);
    });

    it('logs an executor that cannot cancel instead of failing', async () => {
      const { handler, store, logs } = setup(new UncancellableExecutor());
      await store.save({
        kind: 'task', id: 't1', contextId: 'c1',
        status: { state: 'working', timestamp: '2025-01-01T00:00:00.000Z' },
        history: [], artifacts: [],
      });

      await expect(handler.cancel({ taskId: 't1' })).resolves.toMatchObject({ status: { state: 'canceled' } });
      expect(logs).toContainEqual(['debug', 'Executor does not support cancel', { taskId: 't1' }]);
    });
  });

  describe('concurrency', () => {
    it('rejects a second call on a busy task', async () => {
      const executor = new GatedExecutor();
      const { handler } = setup(executor);
      const first = handler.send({ message: userMessage('one', { taskId: 'task-a' }) });
      await executor.blocked();

      await expect(handler.send({ message: userMessage('two', { taskId: 'task-a' }) }))
        .rejects.toMatchObject({ code: ErrorCodes.TASK_BUSY, message: 'Task is busy: task-a' });
      expect(handler.activeTaskIds()).toEqual(['task-a']);

      executor.release({ state: 'completed' });
      await first;
      expect(handler.activeTaskIds()).toEqual([]);
    });

    it('queues a second call on a busy task when configured to', async () => {
      const executor = new GatedExecutor();
      const { handler } = setup(executor, { concurrency: 'queue' });
      const first = handler.send({ message: userMessage('one', { taskId: 'task-q' }) });
      await executor.blocked();

      const second = handler.send({ message: userMessage('two', { taskId: 'task-q' }) });
      await flush();
      expect(executor.contexts).toHaveLength(1);

      executor.release({ state: 'input_required', message: agentMessage('more?') });
      expect(asTask(await first).status.state).toBe('input_required');

      await executor.blocked();
      executor.release({ state: 'completed' });
      const done = asTask(await second);
      expect(done.status.state).toBe('completed');
      expect(executor.contexts[1].task.history.map((m) => m.role)).toEqual(['user', 'agent', 'user']);
    });

    it('lets different tasks run side by side', async () => {
      const { handler } = setup(new HelloWorldExecutor());
      const results = await Promise.all([
        handler.send({ message: userMessage('a', { taskId: 'x' }) }),
        handler.send({ message: userMessage('b', { taskId: 'y' }) }),
      ]);
      expect(results.map((r) => asTask(r).status.state)).toEqual(['completed', 'completed']);
    });
  });

  describe('stream', () => {
    it('emits one event per delta in order, the last one final', async () => {
      const { handler } = setup(new HelloWorldExecutor());
      const events = await collect(await handler.stream({ message: userMessage('hi') }));

      expect(events).toEqual([
        {
          type: 'status-update',
          taskId: 'gen-1',
          contextId: 'gen-2',
          status: {
            state: 'working',
            timestamp: '2025-01-01T00:00:01.000Z',
            message: { ...agentMessage('Hello ', 'hello-1'), taskId: 'gen-1', contextId: 'gen-2' },
          },
          final: false,
        },
        {
          type: 'status-update',
          taskId: 'gen-1',
          contextId: 'gen-2',
          status: {
            state: 'completed',
            timestamp: '2025-01-01T00:00:02.000Z',
            message: { ...agentMessage('World', 'hello-2'), final: true, taskId: 'gen-1', contextId: 'gen-2' },
          },
          final: true,
        },
      ]);
    });

    it('stops at input_required and resumes on the next call', async () => {
      const { handler, store } = setup(new CurrencyExecutor());
      const first = await collect(await handler.stream({ message: userMessage('convert 100 USD') }));
      expect(first.map(stateOf)).toEqual(['working', 'input_required']);
      expect(first.map(finalOf)).toEqual([false, true]);

      const second = await collect(await handler.stream({
        message: userMessage('GBP', { taskId: 'gen-1', contextId: 'gen-2' }),
      }));
      expect(second.map((e) => e.type)).toEqual(['status-update', 'artifact-update']);
      expect(second[1]).toMatchObject({ type: 'artifact-update', lastChunk: true, artifact: { artifactId: 'conversion' } });
      const stored = await store.get('gen-1');
      expect(stored?.status.state).toBe('completed');
      expect(textOf(stored?.status.message)).toBe('100 USD = 79.00 GBP');
    });

    it('maps a delta with an artifact to a single artifact event', async () => {
      const executor = new ScriptedExecutor({
        stream: [
          {
            state: 'working',
            message: agentMessage('drafting', 'draft-note'),
            artifact: { artifactId: 'draft', parts: [{ kind: 'text', text: 'v1' }] },
          },
          {
            state: 'completed',
            artifact: { artifactId: 'report', parts: [{ kind: 'text', text: 'v2' }], lastChunk: true },
          },
        ],
      });
      const { handler, store } = setup(executor);
      const events = await collect(await handler.stream({ message: userMessage('write') }));

      expect(events).toEqual([
        {
          type: 'artifact-update',
          taskId: 'gen-1',
          contextId: 'gen-2',
          artifact: { artifactId: 'draft', parts: [{ kind: 'text', text: 'v1' }] },
          lastChunk: false,
        },
        {
          type: 'artifact-update',
          taskId: 'gen-1',
          contextId: 'gen-2',
          artifact: { artifactId: 'report', parts: [{ kind: 'text', text: 'v2' }], lastChunk: true },
          lastChunk: true,
        },
      ]);
      const stored = await store.get('gen-1');
      expect(stored?.status.state).toBe('completed');
      expect(stored?.history.map((m) => textOf(m))).toEqual(['write', 'drafting']);
      expect(stored?.artifacts.map((a) => a.artifactId)).toEqual(['draft', 'report']);
    });

    it('marks the artifact of a final delta as the last chunk', async () => {
      const executor = new ScriptedExecutor({
        stream: [{ state: 'completed', artifact: { artifactId: 'out', parts: [{ kind: 'text', text: 'x' }] } }],
      });
      const { handler } = setup(executor);
      const events = await collect(await handler.stream({ message: userMessage('go') }));

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'artifact-update', lastChunk: true });
    });

    it('emits one event per delta for appended artifact chunks', async () => {
      const executor = new ScriptedExecutor({
        stream: [
          { state: 'working' },
          { state: 'working', artifact: { artifactId: 'doc', parts: [{ kind: 'text', text: 'a' }] } },
          { state: 'working', append: true, artifact: { artifactId: 'doc', parts: [{ kind: 'text', text: 'b' }] } },
          { state: 'completed' },
        ],
      });
      const { handler, store } = setup(executor);
      const events = await collect(await handler.stream({ message: userMessage('write') }));

      expect(events.map((e) => e.type)).toEqual(['status-update', 'artifact-update', 'artifact-update', 'status-update']);
      expect(events[1]).toMatchObject({ lastChunk: false });
      expect((await store.get('gen-1'))?.artifacts[0].parts).toEqual([
        { kind: 'text', text: 'a' },
        { kind: 'text', text: 'b' },
      ]);
    });

    it('closes with a final status when the executor ends early', async () => {
      const { handler } = setup(new ScriptedExecutor({ stream: [{ state: 'working' }] }));
      const events = await collect(await handler.stream({ message: userMessage('hi') }));
      expect(events.map(stateOf)).toEqual(['working', 'working']);
      expect(events.map(finalOf)).toEqual([false, true]);
    });

    it('turns an executor exception into a final failed event', async () => {
      const { handler } = setup(new ScriptedExecutor({ stream: [{ state: 'working' }, new Error('crashed')] }));
      const events = await collect(await handler.stream({ message: userMessage('hi') }));

      expect(events.map(stateOf)).toEqual(['working', 'failed']);
      const last = events[1];
      expect(last.type === 'status-update' && textOf(last.status.message)).toBe('Agent executor failed: crashed');
      expect(finalOf(last)).toBe(true);
    });

    it('folds a stream that throws before producing deltas into a failed task', async () => {
      const executor: AgentExecutor = {
        sendMessage: async () => ({ state: 'completed' }),
        streamMessage: () => {
          throw new Error('backend unreachable');
        },
      };
      const { handler, store, logs } = setup(executor);
      const events = await collect(await handler.stream({ message: userMessage('hi') }));

      expect(events).toHaveLength(1);
      const [only] = events;
      expect(only).toMatchObject({ type: 'status-update', status: { state: 'failed' }, final: true });
      expect(only.type === 'status-update' && textOf(only.status.message)).toBe('Agent executor failed: backend unreachable');
      expect((await store.get('gen-1'))?.status.state).toBe('failed');
      expect(logs).toContainEqual(['warn', 'Executor failed', { taskId: 'gen-1', error: 'Agent executor failed: backend unreachable' }]);
    });

    it('ends with one error event when the store fails mid-stream', async () => {
      const store = new FlakyStore();
      const executor = new GatedExecutor();
      const { handler } = setup(executor, { taskStore: store });
      const channel = await handler.stream({ message: userMessage('hi') });
      const events = collect(channel);

      await executor.blocked();
      executor.release({ state: 'working' });
      await executor.blocked();
      store.failing = true;
      executor.release({ state: 'completed' });

      const received: StreamEvent[] = await events;
      expect(received.map((e) => e.type)).toEqual(['status-update', 'error']);
      expect(received[1]).toEqual({
        type: 'error',
        error: { code: ErrorCodes.UPSTREAM_UNAVAILABLE, message: 'Task store unavailable: disk full' },
      });
      expect(handler.activeTaskIds()).toEqual([]);
    });

    it('emits a final canceled event when the task is canceled mid-stream', async () => {
      const executor = new GatedExecutor();
      const { handler } = setup(executor);
      const channel = await handler.stream({ message: userMessage('hi') });
      const events = collect(channel);

      await executor.blocked();
      executor.release({ state: 'working' });
      await executor.blocked();
      await handler.cancel({ taskId: 'gen-1' });

      const received = await events;
      expect(received.map(stateOf)).toEqual(['working', 'canceled']);
      expect(finalOf(received[1])).toBe(true);
      expect(executor.contexts[0].signal.aborted).toBe(true);
    });

    it('aborts the executor when the consumer goes away', async () => {
      const executor = new GatedExecutor();
      const { handler } = setup(executor);
      const channel = await handler.stream({ message: userMessage('hi') });

      await executor.blocked();
      executor.release({ state: 'working' });
      for await (const _ of channel) {
        break;
      }
      await flush();

      expect(executor.contexts[0].signal.aborted).toBe(true);
      expect(handler.activeTaskIds()).toEqual([]);
      expect((await handler.getTask({ taskId: 'gen-1' })).status.state).toBe('working');
    });

    it('rejects a stream on a busy task before any event', async () => {
      const executor = new GatedExecutor();
      const { handler } = setup(executor);
      const pending = handler.send({ message: userMessage('hi', { taskId: 'busy' }) });
      await executor.blocked();

      await expect(handler.stream({ message: userMessage('again', { taskId: 'busy' }) }))
        .rejects.toBeInstanceOf(A2AError);
      executor.release({ state: 'completed' });
      await pending;
    });
  });

  describe('resubscribe', () => {
    it('reports unknown tasks', async () => {
      const { handler } = setup(new ScriptedExecutor({}));
      await expect(handler.resubscribe({ taskId: 'nope' })).rejects.toMatchObject({ code: ErrorCodes.TASK_NOT_FOUND });
    });

    it('reports executors that cannot resubscribe', async () => {
      const { handler } = setup(new MinimalExecutor());
      await handler.send({ message: userMessage('hi') });
      await expect(handler.resubscribe({ taskId: 'gen-1' })).rejects.toMatchObject({
        code: ErrorCodes.UNSUPPORTED_OPERATION,
      });
    });

    it('answers a finished task with its final status only', async () => {
      const { handler } = setup(new ScriptedExecutor({ send: { state: 'completed' } }));
      const task = asTask(await handler.send({ message: userMessage('hi') }));

      const events = await collect(await handler.resubscribe({ taskId: task.id }));
      expect(events).toEqual([
        { type: 'status-update', taskId: task.id, contextId: task.contextId, status: task.status, final: true },
      ]);
    });

    it('folds a resubscribe that throws before producing deltas into a failed task', async () => {
      const executor: AgentExecutor = {
        sendMessage: async () => ({ state: 'working' }),
        streamMessage: async function* () {},
        resubscribe: () => {
          throw new Error('session lost');
        },
      };
      const { handler, store } = setup(executor);
      await handler.send({ message: userMessage('hi') });

      const events = await collect(await handler.resubscribe({ taskId: 'gen-1' }));
      expect(events.map(stateOf)).toEqual(['working', 'failed']);
      expect(events.map(finalOf)).toEqual([false, true]);
      expect((await store.get('gen-1'))?.status.state).toBe('failed');
    });

    it('answers with one final event when the task finishes while the call waits', async () => {
      const executor = new ResumableGatedExecutor();
      const { handler } = setup(executor, { concurrency: 'queue' });
      const pending = handler.send({ message: userMessage('hi') });
      await executor.blocked();

      const resubscribing = handler.resubscribe({ taskId: 'gen-1' });
      await flush();
      executor.release({ state: 'completed' });
      await pending;

      const events = await collect(await resubscribing);
      expect(events.map(stateOf)).toEqual(['completed']);
      expect(events.map(finalOf)).toEqual([true]);
    });

    it('sends the current status, then the remaining deltas', async () => {
      const executor = new ScriptedExecutor({
        send: { state: 'working' },
        resubscribe: [{ state: 'working', message: agentMessage('still going') }, { state: 'completed' }],
      });
      const { handler } = setup(executor);
      await handler.send({ message: userMessage('hi') });

      const events = await collect(await handler.resubscribe({ taskId: 'gen-1' }));
      expect(events.map(stateOf)).toEqual(['working', 'working', 'completed']);
      expect(events.map(finalOf)).toEqual([false, false, true]);
    });
  });
});

function stateOf(event: StreamEvent): string {
  return event.type === 'status-update' ? event.status.state : event.type;
}

function finalOf(event: StreamEvent): boolean | undefined {
  return event.type === 'status-update' ? event.final : undefined;
}
