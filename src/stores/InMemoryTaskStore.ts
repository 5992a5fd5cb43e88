import type { Task } from '../types/task.js';
import type { TaskStore } from '../types/plugin.js';

/**
 * In-memory task store backed by a Map. Tasks are cloned on the way in and on
 * the way out, so callers never share a live object with the store.
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();

  async get(taskId: string): Promise<Task | undefined> {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  async save(task: Task): Promise<void> {
    this.tasks.set(task.id, structuredClone(task));
  }

  async delete(taskId: string): Promise<void> {
    this.tasks.delete(taskId);
  }

  /** Returns the number of tasks currently stored. */
  get size(): number {
    return this.tasks.size;
  }

  /** Ids of all stored tasks, in insertion order. */
  ids(): string[] {
    return [...this.tasks.keys()];
  }

  /** Remove all tasks. */
  clear(): void {
    this.tasks.clear();
  }
}
