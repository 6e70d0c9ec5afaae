/** Raised when the health data store cannot serve a query or a write. */
export class DataUnavailableError extends Error {
    readonly operation: string;

    constructor(operation: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Health data unavailable during ${operation}: ${detail}`, { cause });
        this.name = 'DataUnavailableError';
        this.operation = operation;
    }
}

/** Raised by the HTTP layer and CLI when caller input is malformed. */
export class RequestValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RequestValidationError';
    }
}
