/**
 * Error types raised outside the retrieval loop.
 * The loop itself never throws; see sync/sync-orchestrator.ts.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${errorMessage(cause)}`, { cause });
    this.name = 'StorageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
