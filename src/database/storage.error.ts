/**
 * Raised when the store cannot be reached or rejects a statement
 * (connectivity loss, constraint violation, malformed SQL).
 */
export class StorageError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StorageError';
    }
}
