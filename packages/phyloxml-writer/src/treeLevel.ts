/**
 * Phylogeny-level elements, sourced from row 0 of "phylogeny."-prefixed node columns
 */

import { type TreeReader, valueToString } from "@phyloxml/tree";
import type { EmissionLedger } from "./EmissionLedger.js";
import { isTreeLevelPropertyColumn, treeLevelColumnName } from "./naming.js";
import { createPropertyElement, TREE_LEVEL } from "./property.js";
import { XmlElement } from "./XmlElement.js";

interface TreeLevelElement {
    element: string;
    /** Attribute copied from the column's metadata when set */
    attribute?: string;
}

/**
 * Optional phylogeny children, in document order
 */
export const TREE_LEVEL_ELEMENTS: readonly TreeLevelElement[] = [
    { element: "name" },
    { element: "description" },
    { element: "confidence", attribute: "type" },
];

/**
 * Append one phylogeny-level element if its column exists.
 * Returns whether an element was written.
 */
export function writeTreeLevelElement(
    tree: TreeReader,
    phylogeny: XmlElement,
    ledger: EmissionLedger,
    definition: TreeLevelElement
): boolean {
    const columnName = treeLevelColumnName(definition.element);
    const column = tree.nodeData.getColumn(columnName);
    if (!column || ledger.isIgnored(columnName)) return false;

    const element = new XmlElement(definition.element, valueToString(column.getValue(0)));
    if (definition.attribute !== undefined) {
        const attributeValue = column.getMetadata(definition.attribute);
        if (attributeValue !== undefined && attributeValue !== "") {
            element.setAttribute(definition.attribute, attributeValue);
        }
    }

    phylogeny.appendChild(element);
    ledger.markEmitted(columnName);
    return true;
}

/**
 * Append every "phylogeny.property." column as a phylogeny-level property
 */
export function writeTreeLevelProperties(
    tree: TreeReader,
    phylogeny: XmlElement,
    ledger: EmissionLedger
): void {
    for (const column of tree.nodeData.columns()) {
        if (isTreeLevelPropertyColumn(column.name) && !ledger.isIgnored(column.name)) {
            phylogeny.appendChild(createPropertyElement(column, TREE_LEVEL, ledger));
        }
    }
}

/**
 * Write the whole phylogeny-level section: name, description, confidence,
 * then properties.
 */
export function writeTreeLevelElements(
    tree: TreeReader,
    phylogeny: XmlElement,
    ledger: EmissionLedger
): void {
    for (const definition of TREE_LEVEL_ELEMENTS) {
        writeTreeLevelElement(tree, phylogeny, ledger, definition);
    }
    writeTreeLevelProperties(tree, phylogeny, ledger);
}
