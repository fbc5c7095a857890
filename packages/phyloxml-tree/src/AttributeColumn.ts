/**
 * AttributeColumn - a named sequence of typed tuples, one per node or edge
 */

import { PhyloTreeError } from "./errors.js";
import type { ColumnReader, RawValueOf, TypedValue, ValueKind } from "./types.js";
import { typedValueFromUnknown } from "./values.js";

/**
 * Options for creating an AttributeColumn
 */
export interface AttributeColumnOptions {
    /** String metadata such as authority, applies_to, unit or type */
    metadata?: Record<string, string>;
}

/**
 * A named column of typed values.
 *
 * Rows are addressed by the positional index of the node or edge they
 * describe. Multi-component columns (e.g. RGB colors) hold one tuple per row.
 */
export class AttributeColumn implements ColumnReader {
    readonly name: string;
    readonly kind: ValueKind;
    readonly numberOfComponents: number;
    private readonly tuples: readonly (readonly TypedValue[])[];
    private readonly metadata: Map<string, string>;

    private constructor(
        name: string,
        kind: ValueKind,
        numberOfComponents: number,
        tuples: readonly (readonly TypedValue[])[],
        options?: AttributeColumnOptions
    ) {
        this.name = name;
        this.kind = kind;
        this.numberOfComponents = numberOfComponents;
        this.tuples = tuples;
        this.metadata = new Map(Object.entries(options?.metadata ?? {}));
    }

    /**
     * Create a single-component column from plain values
     */
    static fromValues<K extends ValueKind>(
        name: string,
        kind: K,
        values: readonly RawValueOf<K>[],
        options?: AttributeColumnOptions
    ): AttributeColumn {
        const tuples = values.map(raw => [typedValueFromUnknown(kind, raw)]);
        return new AttributeColumn(name, kind, 1, tuples, options);
    }

    /**
     * Create a multi-component column. Every tuple must have the same width.
     */
    static fromTuples<K extends ValueKind>(
        name: string,
        kind: K,
        tuples: readonly (readonly RawValueOf<K>[])[],
        options?: AttributeColumnOptions
    ): AttributeColumn {
        const width = tuples.length > 0 ? tuples[0].length : 1;
        if (width === 0) {
            throw new PhyloTreeError("Tuples must have at least one component", "fromTuples", { name });
        }
        const converted = tuples.map((tuple, row) => {
            if (tuple.length !== width) {
                throw new PhyloTreeError(
                    `Row ${row} has ${tuple.length} components, expected ${width}`,
                    "fromTuples",
                    { name, row }
                );
            }
            return tuple.map(raw => typedValueFromUnknown(kind, raw));
        });
        return new AttributeColumn(name, kind, width, converted, options);
    }

    /**
     * Create a column from values that are already typed
     */
    static fromTypedValues(
        name: string,
        kind: ValueKind,
        values: readonly TypedValue[],
        options?: AttributeColumnOptions
    ): AttributeColumn {
        return new AttributeColumn(name, kind, 1, values.map(v => [v]), options);
    }

    /** Number of rows */
    get length(): number {
        return this.tuples.length;
    }

    getTuple(row: number): readonly TypedValue[] {
        const tuple = this.tuples.at(row);
        if (row < 0 || tuple === undefined) {
            throw new PhyloTreeError(
                `Row ${row} is out of range for column "${this.name}"`,
                "getTuple",
                { name: this.name, row, length: this.length }
            );
        }
        return tuple;
    }

    getValue(row: number): TypedValue {
        return this.getTuple(row)[0];
    }

    getMetadata(key: string): string | undefined {
        return this.metadata.get(key);
    }

    setMetadata(key: string, value: string): void {
        this.metadata.set(key, value);
    }

    metadataKeys(): string[] {
        return [...this.metadata.keys()];
    }
}
