/**
 * The history store could not be opened, read or written.
 * Callers must assume nothing from the failed operation was persisted.
 */
export class StorageFailureError extends Error {
    public readonly operation: string;

    constructor(operation: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`History storage failed during ${operation}: ${detail}`, { cause });
        this.name = 'StorageFailureError';
        this.operation = operation;
    }
}
