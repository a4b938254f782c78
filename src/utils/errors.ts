/**
 * Error taxonomy for the sync pipeline.
 *
 * Stale and already-ingested punches are not errors; they are reported as
 * ingest outcomes instead.
 */
export class SyncError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Missing address or credentials. Raised before any remote call. */
export class ConfigurationError extends SyncError {}

/** A failed page request. Records fetched before it are kept. */
export class TransientFetchError extends SyncError {
    constructor(
        message: string,
        readonly page: number,
        readonly fetched: number
    ) {
        super(message);
    }
}

/** A punch that cannot be ingested as-is. It is logged and skipped, never retried. */
export class RecordValidationError extends SyncError {
    constructor(
        message: string,
        readonly subjectCode: string | null
    ) {
        super(message);
    }
}

export class DeviceUnavailableError extends SyncError {}

/**
 * Message of an Error, or of the socket error wrapped by device library
 * errors such as node-zklib's ZKError (`{ err, command, ip }`).
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'object' && error !== null && 'err' in error) {
        return errorMessage(error.err);
    }
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}
