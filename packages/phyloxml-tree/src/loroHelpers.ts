/**
 * Loro helper functions and constants
 * Reads a tree stored in a Loro CRDT document into a PhyloTree
 */

import type { LoroDoc, LoroTreeNode } from "loro-crdt";
import { AttributeColumn } from "./AttributeColumn.js";
import { PhyloTreeError } from "./errors.js";
import { PhyloTree } from "./PhyloTree.js";
import type { ValueKind } from "./types.js";
import { emptyValue, typedValueFromUnknown } from "./values.js";

/**
 * Default container names
 */
export const TREE_CONTAINER = "tree";
export const METADATA_CONTAINER = "metadata";

/**
 * Node data keys with this prefix describe the edge from the node's parent
 */
export const EDGE_KEY_PREFIX = "edge.";

/**
 * Options for reading a Loro document
 */
export interface LoroImportOptions {
    /** Tree container name (default: "tree") */
    treeContainer?: string;
    /** Map container holding per-column metadata (default: "metadata") */
    metadataContainer?: string;
}

type Row = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * Infer a column kind from the values present in it.
 * Mixed or unrecognized values fall back to "opaque".
 */
export function inferKind(values: readonly unknown[]): ValueKind {
    const present = values.filter(v => v !== undefined && v !== null);
    if (present.length === 0) return "opaque";

    if (present.every(v => typeof v === "boolean")) return "boolean";
    if (present.every(v => typeof v === "string")) return "string";
    if (present.every(v => typeof v === "bigint")) return "int64";
    if (present.every(v => typeof v === "number")) {
        const integral = present.every(
            v => typeof v === "number" && Number.isInteger(v) && v >= INT32_MIN && v <= INT32_MAX
        );
        return integral ? "int32" : "float64";
    }
    return "opaque";
}

/**
 * Column names in order of first appearance.
 * Keys are sorted per row since Loro maps do not keep insertion order.
 */
function collectNames(rows: readonly Row[], include: (key: string) => boolean): string[] {
    const names = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row).sort()) {
            if (include(key)) names.add(key);
        }
    }
    return [...names];
}

function readMetadata(raw: unknown): Map<string, Record<string, string>> {
    const result = new Map<string, Record<string, string>>();
    if (!isRecord(raw)) return result;

    for (const [columnName, entry] of Object.entries(raw)) {
        if (!isRecord(entry)) continue;
        const metadata: Record<string, string> = {};
        for (const [key, value] of Object.entries(entry)) {
            if (typeof value === "string") metadata[key] = value;
        }
        result.set(columnName, metadata);
    }
    return result;
}

function buildColumn(
    name: string,
    rowValues: readonly unknown[],
    metadata: Record<string, string> | undefined
): AttributeColumn {
    const kind = inferKind(rowValues);
    const values = rowValues.map(v =>
        v === undefined || v === null ? emptyValue(kind) : typedValueFromUnknown(kind, v)
    );
    return AttributeColumn.fromTypedValues(name, kind, values, { metadata });
}

/**
 * Read the first root of a Loro tree container, with its descendants, into a
 * PhyloTree. Nodes are numbered in pre-order.
 */
export function loroDocToTree(doc: LoroDoc, options?: LoroImportOptions): PhyloTree {
    const loroTree = doc.getTree(options?.treeContainer ?? TREE_CONTAINER);
    const roots = loroTree.roots();
    if (roots.length === 0) {
        throw new PhyloTreeError("Document has no tree root", "loroDocToTree");
    }

    const tree = new PhyloTree();
    const nodeRows: Row[] = [];
    const edgeRows: Row[] = [];

    function readRow(treeNode: LoroTreeNode): Row {
        const data: unknown = treeNode.data.toJSON();
        return isRecord(data) ? data : {};
    }

    // Pre-order with an explicit stack; children are pushed in reverse.
    const stack: { treeNode: LoroTreeNode; parent: number | null }[] = [
        { treeNode: roots[0], parent: null },
    ];
    while (stack.length > 0) {
        const entry = stack.pop();
        if (!entry) break;

        const row = readRow(entry.treeNode);
        let node: number;
        if (entry.parent === null) {
            node = tree.addRoot();
        } else {
            const added = tree.addChild(entry.parent);
            node = added.node;
            edgeRows[added.edge] = row;
        }
        nodeRows[node] = row;

        const childNodes = entry.treeNode.children() ?? [];
        for (let i = childNodes.length - 1; i >= 0; i--) {
            stack.push({ treeNode: childNodes[i], parent: node });
        }
    }

    const metadata = readMetadata(
        doc.getMap(options?.metadataContainer ?? METADATA_CONTAINER).toJSON()
    );

    const nodeNames = collectNames(nodeRows, key => !key.startsWith(EDGE_KEY_PREFIX));
    for (const name of nodeNames) {
        tree.nodeData.addColumn(buildColumn(name, nodeRows.map(row => row[name]), metadata.get(name)));
    }

    const edgeKeys = collectNames(edgeRows, key => key.startsWith(EDGE_KEY_PREFIX));
    for (const key of edgeKeys) {
        const name = key.slice(EDGE_KEY_PREFIX.length);
        tree.edgeData.addColumn(buildColumn(name, edgeRows.map(row => row[key]), metadata.get(name)));
    }

    return tree;
}
