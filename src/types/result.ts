export type StoreErrorKind = 'not_found' | 'remote_unavailable' | 'invalid_input';

export interface StoreError {
    kind: StoreErrorKind;
    message: string;
    cause?: unknown;
}

export type StoreResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: StoreError };

export function ok<T>(value: T): StoreResult<T> {
    return { ok: true, value };
}

export function fail<T = never>(kind: StoreErrorKind, message: string, cause?: unknown): StoreResult<T> {
    return { ok: false, error: { kind, message, cause } };
}

/**
 * Thrown by the tool layer where a failure has to reach the caller
 * (context lookup for a message that does not exist).
 */
export class StoreOperationError extends Error {
    readonly kind: StoreErrorKind;

    constructor(error: StoreError) {
        super(error.message);
        this.name = 'StoreOperationError';
        this.kind = error.kind;
    }
}
