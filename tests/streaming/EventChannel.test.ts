import { describe, it, expect } from 'vitest';
import { EventChannel } from '../../src/streaming/EventChannel.js';
import { A2AError } from '../../src/errors/A2AError.js';
import { collect, flush } from '../helpers/fixtures.js';

describe('EventChannel', () => {
  it('delivers pushed events, then ends on close', async () => {
    const channel = new EventChannel<string>({ capacity: 3 });
    await channel.push('a');
    await channel.push('b');
    channel.close();
    expect(await collect(channel)).toEqual(['a', 'b']);
  });

  it('hands events straight to a waiting reader', async () => {
    const channel = new EventChannel<string>();
    const iterator = channel[Symbol.asyncIterator]();
    const next = iterator.next();
    await channel.push('x');
    expect(await next).toEqual({ value: 'x', done: false });
  });

  it('holds the producer once the buffer is full', async () => {
    const channel = new EventChannel<number>({ capacity: 1 });
    await channel.push(1);

    let second = false;
    const pending = channel.push(2).then(() => {
      second = true;
    });
    await flush();
    expect(second).toBe(false);
    expect(channel.pending).toBe(2);

    const iterator = channel[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: 1, done: false });
    await pending;
    expect(second).toBe(true);
  });

  it('makes every push wait for its read at capacity 0', async () => {
    const channel = new EventChannel<number>({ capacity: 0 });
    let done = false;
    const pending = channel.push(1).then(() => {
      done = true;
    });
    await flush();
    expect(done).toBe(false);

    await channel[Symbol.asyncIterator]().next();
    await pending;
    expect(done).toBe(true);
  });

  it('close() takes effect once', () => {
    const channel = new EventChannel<number>();
    expect(channel.close()).toBe(true);
    expect(channel.close()).toBe(false);
    expect(channel.closed).toBe(true);
  });

  it('rejects pushes after close', async () => {
    const channel = new EventChannel<number>();
    channel.close();
    await expect(channel.push(1)).rejects.toThrow('Cannot push to a closed event channel');
  });

  it('fail() delivers one error event and ends the stream', async () => {
    const channel = new EventChannel<string>({ capacity: 2 });
    await channel.push('a');
    expect(channel.fail(A2AError.upstreamUnavailable('disk full'))).toBe(true);
    expect(channel.fail(A2AError.internalError('again'))).toBe(false);

    expect(await collect(channel)).toEqual([
      'a',
      { type: 'error', error: { code: -32011, message: 'Task store unavailable: disk full' } },
    ]);
  });

  it('aborts its signal and releases the producer when the consumer leaves', async () => {
    const channel = new EventChannel<number>({ capacity: 0 });
    const pending = channel.push(1);

    for await (const _ of channel) {
      break;
    }
    await expect(pending).resolves.toBeUndefined();
    expect(channel.signal.aborted).toBe(true);
    // later pushes are dropped
    await expect(channel.push(2)).resolves.toBeUndefined();
    expect(channel.pending).toBe(0);
  });

  it('allows a single consumer', () => {
    const channel = new EventChannel<number>();
    channel[Symbol.asyncIterator]();
    expect(() => channel[Symbol.asyncIterator]()).toThrow('Event channel already has a consumer');
  });
});
