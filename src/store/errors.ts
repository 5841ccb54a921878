export class StoreWriteError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`Could not write ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StoreWriteError';
  }
}
