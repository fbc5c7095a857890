/**
 * EmissionLedger - names of columns already written to the current document
 *
 * One ledger belongs to one write. It only grows; a column whose name is in
 * the ledger is never emitted again as a generic property. Ignored columns are
 * seeded before the write and are never emitted at all.
 */
export class EmissionLedger {
    private readonly emitted = new Set<string>();
    private readonly ignored: ReadonlySet<string>;

    constructor(ignored: Iterable<string> = []) {
        this.ignored = new Set(ignored);
    }

    /** Whether the column was emitted or ignored */
    has(columnName: string): boolean {
        return this.emitted.has(columnName) || this.ignored.has(columnName);
    }

    isIgnored(columnName: string): boolean {
        return this.ignored.has(columnName);
    }

    /**
     * Record a column as emitted. Returns false if it was already recorded.
     */
    markEmitted(columnName: string): boolean {
        if (this.has(columnName)) return false;
        this.emitted.add(columnName);
        return true;
    }

    /** Emitted names in the order they were recorded */
    names(): string[] {
        return [...this.emitted];
    }

    get size(): number {
        return this.emitted.size;
    }
}
