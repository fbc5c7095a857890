/**
 * Centralized error handling for PhyloXML writing
 */

/**
 * Custom error class for writer operations
 */
export class PhyloXmlError extends Error {
    readonly operation: string;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        operation: string,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.name = "PhyloXmlError";
        this.operation = operation;
        this.context = context;
    }
}

/** Code reported when the failing stream gave none */
export const UNKNOWN_ERROR_CODE = "EUNKNOWN";

/**
 * Output stream or file failure. `code` is the system error code
 * (ENOSPC, EPIPE, ENOENT, ...).
 */
export class PhyloXmlWriteError extends PhyloXmlError {
    readonly code: string;

    constructor(
        message: string,
        operation: string,
        code: string,
        cause?: unknown,
        context?: Record<string, unknown>
    ) {
        super(message, operation, context);
        this.name = "PhyloXmlWriteError";
        this.code = code;
        this.cause = cause;
    }
}

/**
 * System error code carried by an error, if any
 */
export function systemErrorCode(error: unknown): string {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return UNKNOWN_ERROR_CODE;
}

/**
 * Wrap an I/O failure into a PhyloXmlWriteError
 */
export function toWriteError(
    operation: string,
    error: unknown,
    context?: Record<string, unknown>
): PhyloXmlWriteError {
    if (error instanceof PhyloXmlWriteError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new PhyloXmlWriteError(message, operation, systemErrorCode(error), error, context);
}

/**
 * Centralized error handler for writer operations.
 * Logs errors consistently; callers rethrow.
 */
export function handleWriterError(
    operation: string,
    error: unknown,
    context?: Record<string, unknown>
): void {
    console.error(`PhyloXmlTreeWriter.${operation}:`, error, context ?? "");
}
