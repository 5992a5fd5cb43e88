import type { Message, Task } from '../../src/types/task.js';

export const START = Date.parse('2025-01-01T00:00:00.000Z');

/** Clock that advances one second per reading, starting at START. */
export function steppingClock(stepMs = 1000): () => Date {
  let next = START;
  return () => {
    const now = new Date(next);
    next += stepMs;
    return now;
  };
}

/** `prefix-1`, `prefix-2`, ... */
export function sequentialIds(prefix = 'id'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function userMessage(text: string, overrides: Partial<Message> = {}): Message {
  return {
    kind: 'message',
    messageId: `um-${text.length}-${text.slice(0, 8)}`,
    role: 'user',
    parts: [{ kind: 'text', text }],
    ...overrides,
  };
}

export function agentMessage(text: string, messageId = `am-${text.slice(0, 8)}`): Message {
  return { kind: 'message', messageId, role: 'agent', parts: [{ kind: 'text', text }] };
}

/** Concatenated text parts of a message. */
export function textOf(message: Message | undefined): string | undefined {
  if (!message) return undefined;
  return message.parts.map((p) => (p.kind === 'text' ? p.text : '')).join('');
}

export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    kind: 'task',
    id,
    contextId: `ctx-${id}`,
    status: { state: 'submitted', timestamp: new Date(START).toISOString() },
    history: [],
    artifacts: [],
    ...overrides,
  };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let every queued promise callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
