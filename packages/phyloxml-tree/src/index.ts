/**
 * phyloxml-tree
 *
 * Rooted trees with typed per-node and per-edge attribute columns
 */

// Main classes
export { PhyloTree } from "./PhyloTree.js";
export { AttributeColumn } from "./AttributeColumn.js";
export type { AttributeColumnOptions } from "./AttributeColumn.js";
export { ColumnSet } from "./ColumnSet.js";
export type { ColumnScope } from "./ColumnSet.js";

// Values
export {
    emptyValue,
    typedValue,
    typedValueFromUnknown,
    VALUE_KINDS,
    valueToNumber,
    valueToString,
    valueTypeName,
} from "./values.js";

// Loro import
export {
    EDGE_KEY_PREFIX,
    inferKind,
    loroDocToTree,
    METADATA_CONTAINER,
    TREE_CONTAINER,
} from "./loroHelpers.js";
export type { LoroImportOptions } from "./loroHelpers.js";

// Error handling
export { PhyloTreeError } from "./errors.js";

// Types
export type {
    AddedChild,
    ColumnLookup,
    ColumnReader,
    FloatKind,
    LargeIntegerKind,
    RawValueOf,
    SmallIntegerKind,
    TreeReader,
    TypedValue,
    ValueKind,
} from "./types.js";
