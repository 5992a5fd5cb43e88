import { A2AError } from '../errors/A2AError.js';
import type { StreamErrorEvent } from '../types/events.js';

export interface EventChannelOptions {
  /**
   * Number of events the producer may run ahead of the consumer before
   * `push` starts waiting (default: 1). 0 makes every push wait for its read.
   */
  capacity?: number;
}

interface Entry<T> {
  item: T | StreamErrorEvent;
  release: () => void;
}

type Reader<T> = (result: IteratorResult<T | StreamErrorEvent, undefined>) => void;

/**
 * Ordered single-producer, single-consumer event pipe. The producer pushes,
 * then ends the stream with `close()` or `fail()`; the consumer iterates.
 * When the consumer stops iterating, `signal` aborts and later pushes are
 * dropped.
 */
export class EventChannel<T> implements AsyncIterable<T | StreamErrorEvent> {
  private readonly capacity: number;
  private readonly buffer: Entry<T>[] = [];
  private readonly readers: Reader<T>[] = [];
  private readonly controller = new AbortController();
  private ended = false;
  private iterating = false;

  constructor(options?: EventChannelOptions) {
    this.capacity = Math.max(0, options?.capacity ?? 1);
  }

  /** Aborts when the consumer goes away. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Whether end-of-stream has been signalled (by either side). */
  get closed(): boolean {
    return this.ended;
  }

  /** Number of events pushed but not yet read. */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Hand an event to the consumer. Resolves once the event fits within the
   * channel's capacity; rejects if the producer already closed the channel.
   */
  push(event: T): Promise<void> {
    if (this.controller.signal.aborted) return Promise.resolve();
    if (this.ended) {
      return Promise.reject(A2AError.internalError('Cannot push to a closed event channel'));
    }
    return new Promise<void>((resolve) => this.enqueue(event, resolve));
  }

  /** Signal end-of-stream. Returns false when the stream had already ended. */
  close(): boolean {
    if (this.ended) return false;
    this.ended = true;
    if (this.buffer.length === 0) this.finishReaders();
    return true;
  }

  /** Deliver one terminal error event, then end the stream. */
  fail(error: A2AError): boolean {
    if (this.ended) return false;
    this.enqueue({ type: 'error', error: error.toJSON() }, () => {});
    return this.close();
  }

  /** Consumer side: stop reading, drop anything buffered and abort `signal`. */
  abort(): void {
    this.ended = true;
    if (!this.controller.signal.aborted) this.controller.abort();
    for (const entry of this.buffer.splice(0)) entry.release();
    this.finishReaders();
  }

  [Symbol.asyncIterator](): AsyncIterator<T | StreamErrorEvent, undefined> {
    if (this.iterating) {
      throw A2AError.internalError('Event channel already has a consumer');
    }
    this.iterating = true;
    return {
      next: () => this.read(),
      return: async () => {
        this.abort();
        return { value: undefined, done: true };
      },
    };
  }

  private enqueue(item: T | StreamErrorEvent, release: () => void): void {
    const reader = this.readers.shift();
    if (reader) {
      release();
      reader({ value: item, done: false });
      return;
    }
    this.buffer.push({ item, release });
    if (this.buffer.length <= this.capacity) release();
  }

  private read(): Promise<IteratorResult<T | StreamErrorEvent, undefined>> {
    const entry = this.buffer.shift();
    if (entry) {
      entry.release();
      // Entries that now fit within capacity stop holding their producer.
      for (const waiting of this.buffer.slice(0, this.capacity)) waiting.release();
      return Promise.resolve({ value: entry.item, done: false });
    }
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.readers.push(resolve));
  }

  private finishReaders(): void {
    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
  }
}
