/**
 * Centralized error handling for tree construction
 */

/**
 * Custom error class for tree and column operations
 */
export class PhyloTreeError extends Error {
    readonly operation: string;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        operation: string,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.name = "PhyloTreeError";
        this.operation = operation;
        this.context = context;
    }
}
