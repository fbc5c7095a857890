/**
 * Clade elements - one per tree node, nested to mirror the tree
 */

import { type ColumnReader, type TreeReader, valueToNumber, valueToString } from "@phyloxml/tree";
import type { EmissionLedger } from "./EmissionLedger.js";
import { createPropertyElement } from "./property.js";
import { XmlElement } from "./XmlElement.js";

export const CONFIDENCE_COLUMN = "confidence";
export const COLOR_COLUMN = "color";

const COLOR_CHANNELS = ["red", "green", "blue"] as const;

/**
 * Columns resolved from the writer's configuration before the clades are built
 */
export interface CladeColumns {
    /** Edge column holding branch lengths, or null if none was found */
    edgeWeight: ColumnReader | null;
    /** Node column holding clade names, or null if none was found */
    nodeName: ColumnReader | null;
}

/**
 * Set branch_length from the weight of the edge leading into the node.
 * The root has no such edge and gets no attribute.
 */
export function writeBranchLength(
    tree: TreeReader,
    node: number,
    clade: XmlElement,
    weights: ColumnReader | null,
    ledger: EmissionLedger
): void {
    if (!weights || ledger.isIgnored(weights.name)) return;

    const parent = tree.getParent(node);
    if (parent !== null) {
        const edge = tree.getEdgeId(parent, node);
        if (edge !== null) {
            clade.setNumberAttribute("branch_length", valueToNumber(weights.getValue(edge)));
        }
    }

    ledger.markEmitted(weights.name);
}

export function writeName(
    node: number,
    clade: XmlElement,
    names: ColumnReader | null,
    ledger: EmissionLedger
): void {
    if (!names || ledger.isIgnored(names.name)) return;

    const name = valueToString(names.getValue(node));
    if (name !== "") {
        clade.appendChild(new XmlElement("name", name));
    }

    ledger.markEmitted(names.name);
}

/**
 * Write <confidence> from the "confidence" node column, with a type
 * attribute taken from the column's metadata.
 */
export function writeConfidence(
    tree: TreeReader,
    node: number,
    clade: XmlElement,
    ledger: EmissionLedger
): void {
    const column = tree.nodeData.getColumn(CONFIDENCE_COLUMN);
    if (!column || ledger.isIgnored(CONFIDENCE_COLUMN)) return;

    const confidence = valueToString(column.getValue(node));
    if (confidence !== "") {
        const element = new XmlElement("confidence");
        const type = column.getMetadata("type");
        if (type !== undefined && type !== "") {
            element.setAttribute("type", type);
        }
        element.setText(confidence);
        clade.appendChild(element);
    }

    ledger.markEmitted(CONFIDENCE_COLUMN);
}

/**
 * Whether a column can be written as <color>: unsigned bytes, three per row
 */
export function isColorColumn(column: ColumnReader): boolean {
    return column.kind === "uint8" && column.numberOfComponents === COLOR_CHANNELS.length;
}

/**
 * Write <color> from the "color" node column. A column of any other shape is
 * left alone and ends up as an ordinary property.
 */
export function writeColor(
    tree: TreeReader,
    node: number,
    clade: XmlElement,
    ledger: EmissionLedger
): void {
    const column = tree.nodeData.getColumn(COLOR_COLUMN);
    if (!column || !isColorColumn(column) || ledger.isIgnored(COLOR_COLUMN)) return;

    const rgb = column.getTuple(node);
    const color = new XmlElement("color");
    COLOR_CHANNELS.forEach((channel, i) => {
        color.appendChild(new XmlElement(channel, valueToString(rgb[i])));
    });
    clade.appendChild(color);

    ledger.markEmitted(COLOR_COLUMN);
}

/**
 * Write every remaining node column as a property of this clade.
 */
export function writeCladeProperties(
    tree: TreeReader,
    node: number,
    clade: XmlElement,
    columns: CladeColumns,
    ledger: EmissionLedger
): void {
    for (const column of tree.nodeData.columns()) {
        if (column === columns.nodeName || column === columns.edgeWeight) continue;
        if (ledger.has(column.name)) continue;
        clade.appendChild(createPropertyElement(column, node, ledger));
    }
}

/**
 * Build the clade element for one node, without its children
 */
export function createCladeElement(
    tree: TreeReader,
    node: number,
    columns: CladeColumns,
    ledger: EmissionLedger
): XmlElement {
    const clade = new XmlElement("clade");
    writeBranchLength(tree, node, clade, columns.edgeWeight, ledger);
    writeName(node, clade, columns.nodeName, ledger);
    writeConfidence(tree, node, clade, ledger);
    writeColor(tree, node, clade, ledger);
    writeCladeProperties(tree, node, clade, columns, ledger);
    return clade;
}

/**
 * Append the clade of `root` and all its descendants to `parent`.
 *
 * Nodes are visited pre-order with children in tree order. An explicit work
 * stack replaces recursion, so tree depth is limited by heap, not call stack.
 */
export function writeClades(
    tree: TreeReader,
    root: number,
    parent: XmlElement,
    columns: CladeColumns,
    ledger: EmissionLedger
): void {
    const stack: { node: number; parent: XmlElement }[] = [{ node: root, parent }];

    while (stack.length > 0) {
        const entry = stack.pop();
        if (!entry) break;

        const clade = createCladeElement(tree, entry.node, columns, ledger);
        entry.parent.appendChild(clade);

        const children = tree.getChildren(entry.node);
        for (let i = children.length - 1; i >= 0; i--) {
            stack.push({ node: children[i], parent: clade });
        }
    }
}
