export const DEBUG_LOG_CAPACITY = 20;
export const DEBUG_PANE_LINES = 6;

export interface DebugLog {
  capacity: number;
  entries: string[];
}

export function createDebugLog(capacity = DEBUG_LOG_CAPACITY): DebugLog {
  return { capacity: Math.max(1, capacity), entries: [] };
}

export function appendDebugLog(log: DebugLog, entry: string): void {
  log.entries.push(entry);
  if (log.entries.length > log.capacity) {
    log.entries.splice(0, log.entries.length - log.capacity);
  }
}

export function tailDebugLog(log: DebugLog, count = DEBUG_PANE_LINES): string[] {
  if (count <= 0) return [];
  return log.entries.slice(-count);
}
