/**
 * Public types for phyloxml-tree
 */


// ============================================================================
// Typed Values
// ============================================================================

/**
 * Integer kinds whose payload fits a JS number
 */
export type SmallIntegerKind = "int8" | "uint8" | "int16" | "uint16" | "int32" | "uint32";

/**
 * 64-bit integer kinds, carried as bigint
 */
export type LargeIntegerKind = "int64" | "uint64";

export type FloatKind = "float32" | "float64";

/**
 * Every primitive kind a column can hold.
 * "opaque" is the fallback for values of no recognized kind.
 */
export type ValueKind =
    | SmallIntegerKind
    | LargeIntegerKind
    | FloatKind
    | "boolean"
    | "string"
    | "opaque";

/**
 * Self-describing value read from a column row
 */
export type TypedValue =
    | { kind: SmallIntegerKind | FloatKind; value: number }
    | { kind: LargeIntegerKind; value: bigint }
    | { kind: "boolean"; value: boolean }
    | { kind: "string"; value: string }
    | { kind: "opaque"; value: unknown };

/**
 * JS type accepted when building a value of kind K
 */
export type RawValueOf<K extends ValueKind> =
    K extends LargeIntegerKind ? bigint | number :
    K extends "boolean" ? boolean :
    K extends "string" ? string :
    K extends "opaque" ? unknown :
    number;


// ============================================================================
// Read-only collaborator interfaces
// ============================================================================

/**
 * Read access to one named column
 */
export interface ColumnReader {
    readonly name: string;
    readonly kind: ValueKind;
    readonly numberOfComponents: number;
    readonly length: number;
    /** First component of the row */
    getValue(row: number): TypedValue;
    /** All components of the row */
    getTuple(row: number): readonly TypedValue[];
    /** Metadata value, or undefined if the key is not set */
    getMetadata(key: string): string | undefined;
    metadataKeys(): string[];
}

/**
 * Read access to the columns of one scope (nodes or edges)
 */
export interface ColumnLookup {
    getColumn(name: string): ColumnReader | undefined;
    /** Columns in insertion order */
    columns(): readonly ColumnReader[];
}

/**
 * Read-only view of a rooted tree with attached columns.
 * Nodes are numbered 0..N-1 and edges 0..E-1.
 */
export interface TreeReader {
    readonly nodeData: ColumnLookup;
    readonly edgeData: ColumnLookup;
    /** Root node, or null for an empty tree */
    getRoot(): number | null;
    getNumberOfNodes(): number;
    getNumberOfEdges(): number;
    /** Children in insertion order */
    getChildren(node: number): readonly number[];
    /** Parent node, or null for the root */
    getParent(node: number): number | null;
    /** Edge joining parent to child, or null if there is none */
    getEdgeId(parent: number, child: number): number | null;
}

/**
 * Result of adding a child to the tree
 */
export interface AddedChild {
    node: number;
    edge: number;
}
