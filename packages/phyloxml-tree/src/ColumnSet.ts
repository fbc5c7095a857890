/**
 * ColumnSet - the insertion-ordered columns of one scope (nodes or edges)
 */

import { AttributeColumn } from "./AttributeColumn.js";
import { PhyloTreeError } from "./errors.js";
import type { ColumnLookup } from "./types.js";

export type ColumnScope = "node" | "edge";

/**
 * Columns keyed by name. Iteration follows insertion order, so anything
 * serialized from a ColumnSet comes out in the same order on every run.
 */
export class ColumnSet implements ColumnLookup {
    readonly scope: ColumnScope;
    private readonly byName = new Map<string, AttributeColumn>();
    private readonly expectedLength: () => number;

    /**
     * @param expectedLength - current number of nodes or edges in the owning tree
     */
    constructor(scope: ColumnScope, expectedLength: () => number) {
        this.scope = scope;
        this.expectedLength = expectedLength;
    }

    /**
     * Add a column. A column with the same name is replaced in place.
     */
    addColumn(column: AttributeColumn): void {
        const expected = this.expectedLength();
        if (column.length !== expected) {
            throw new PhyloTreeError(
                `Column "${column.name}" has ${column.length} rows but the tree has ${expected} ${this.scope}s`,
                "addColumn",
                { name: column.name, scope: this.scope }
            );
        }
        this.byName.set(column.name, column);
    }

    getColumn(name: string): AttributeColumn | undefined {
        return this.byName.get(name);
    }

    hasColumn(name: string): boolean {
        return this.byName.has(name);
    }

    removeColumn(name: string): boolean {
        return this.byName.delete(name);
    }

    columns(): AttributeColumn[] {
        return [...this.byName.values()];
    }

    get size(): number {
        return this.byName.size;
    }
}
