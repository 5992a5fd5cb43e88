import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { A2AError } from '../errors/A2AError.js';
import { PayloadValidator } from '../messaging/PayloadValidator.js';
import type { Task } from '../types/task.js';
import type { TaskStore } from '../types/plugin.js';

export interface FileTaskStoreConfig {
  /** Directory holding one `<taskId>.json` file per task (default: ".a2a-tasks"). */
  dir?: string;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Task store keeping each task in its own JSON file. Writes go to a temporary
 * file that is renamed over the target, so readers see either the previous or
 * the new version of a task, never a torn one.
 */
export class FileTaskStore implements TaskStore {
  private readonly dir: string;
  private writeSeq = 0;

  constructor(config?: FileTaskStoreConfig) {
    this.dir = config?.dir ?? '.a2a-tasks';
  }

  async get(taskId: string): Promise<Task | undefined> {
    const file = this.fileFor(taskId);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return undefined;
      throw A2AError.upstreamUnavailable(`failed to read ${file}: ${reason(err)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw A2AError.upstreamUnavailable(`corrupt task file ${file}: ${reason(err)}`);
    }
    if (!PayloadValidator.isTask(parsed)) {
      throw A2AError.upstreamUnavailable(`task file ${file} does not hold a task`);
    }
    return parsed;
  }

  async save(task: Task): Promise<void> {
    const file = this.fileFor(task.id);
    const temp = `${file}.${process.pid}.${++this.writeSeq}.tmp`;
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(temp, JSON.stringify(task, null, 2), 'utf8');
      await rename(temp, file);
    } catch (err) {
      throw A2AError.upstreamUnavailable(`failed to write ${file}: ${reason(err)}`);
    }
  }

  async delete(taskId: string): Promise<void> {
    const file = this.fileFor(taskId);
    try {
      await rm(file, { force: true });
    } catch (err) {
      throw A2AError.upstreamUnavailable(`failed to delete ${file}: ${reason(err)}`);
    }
  }

  private fileFor(taskId: string): string {
    const safeId = path.basename(taskId);
    if (safeId !== taskId || taskId === '.' || taskId === '..' || taskId.length === 0) {
      throw A2AError.invalidParams(`Invalid task id for file storage: ${taskId}`);
    }
    return path.join(this.dir, `${safeId}.json`);
  }
}
