// src/errors.ts
export type MonitorErrorCode =
    | 'INVALID_ARGUMENT'
    | 'PERSISTENCE_FAILURE'
    | 'STORE_UNAVAILABLE'
    | 'DOCUMENT_REJECTED'

export class MonitorError extends Error {
    readonly code: MonitorErrorCode

    constructor(code: MonitorErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
        this.code = code
    }
}

/**
 * Caller handed over a structurally invalid value (empty name, empty list,
 * malformed record). Never retried.
 */
export class InvalidArgumentError extends MonitorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('INVALID_ARGUMENT', message, options)
    }
}

export class PersistenceError extends MonitorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('PERSISTENCE_FAILURE', message, options)
    }
}

export class ReportStoreUnavailableError extends MonitorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('STORE_UNAVAILABLE', message, options)
    }
}

/** The store is up but refused the document (mapping or parse failure). */
export class DocumentRejectedError extends MonitorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('DOCUMENT_REJECTED', message, options)
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message
    return String(err)
}
