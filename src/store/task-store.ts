import fs from 'node:fs';
import { TaskListSchema, type Task } from '../schema/index.js';
import { StoreWriteError } from './errors.js';

export const DEFAULT_STORE_FILE = 'todos.json';

/**
 * Whole-list persistence. `load` never throws; `save` overwrites everything
 * and throws {@link StoreWriteError} on failure.
 */
export interface TaskStore {
  load(): Task[];
  save(tasks: readonly Task[]): void;
}

interface NodeError extends Error {
  code?: string;
}

export function isNodeError(error: unknown): error is NodeError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function parseTaskList(content: string): Task[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return [];
  }
  const result = TaskListSchema.safeParse(raw);
  return result.success ? result.data : [];
}

export function serializeTaskList(tasks: readonly Task[]): string {
  const records = tasks.map(({ text, done }) => ({ text, done }));
  return JSON.stringify(records, null, 2);
}

function createEmptyFile(filePath: string): boolean {
  try {
    fs.writeFileSync(filePath, '', { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch {
    return false;
  }
}

export function readTaskFile(filePath: string): Task[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      createEmptyFile(filePath);
    }
    return [];
  }
  return parseTaskList(content);
}

export function writeTaskFile(filePath: string, tasks: readonly Task[]): void {
  try {
    fs.writeFileSync(filePath, serializeTaskList(tasks), 'utf-8');
  } catch (error) {
    throw new StoreWriteError(filePath, error);
  }
}

export function createFileTaskStore(filePath: string = DEFAULT_STORE_FILE): TaskStore {
  return {
    load: () => readTaskFile(filePath),
    save: (tasks) => writeTaskFile(filePath, tasks),
  };
}
