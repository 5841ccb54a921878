import type { Task } from '../../src/schema/index.js';
import { StoreWriteError } from '../../src/store/errors.js';
import type { TaskStore } from '../../src/store/task-store.js';

export interface MemoryStore extends TaskStore {
  saved: Task[] | null;
  saveCount: number;
  failWith: Error | null;
}

/** In-process stand-in for the file store; `saved` holds deep copies. */
export function createMemoryStore(initial: Task[] = []): MemoryStore {
  const store: MemoryStore = {
    saved: null,
    saveCount: 0,
    failWith: null,
    load: () => initial.map((task) => ({ ...task })),
    save: (tasks) => {
      if (store.failWith) {
        throw new StoreWriteError('memory://todos.json', store.failWith);
      }
      store.saveCount += 1;
      store.saved = tasks.map((task) => ({ ...task }));
    },
  };
  return store;
}
