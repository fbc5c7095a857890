/**
 * Generic PhyloXML property elements
 */

import { type ColumnReader, valueToString } from "@phyloxml/tree";
import { resolvePropertyAttributes } from "./datatype.js";
import type { EmissionLedger } from "./EmissionLedger.js";
import { XmlElement } from "./XmlElement.js";

/**
 * Row sentinel for a phylogeny-level property: the value is read from row 0
 * and the column is recorded in the ledger.
 */
export const TREE_LEVEL = "tree-level";

export type PropertyRow = number | typeof TREE_LEVEL;

/**
 * Create a property element for one row of a column.
 *
 * Clade-level calls do not touch the ledger, so a column yields one property
 * per clade.
 */
export function createPropertyElement(
    column: ColumnReader,
    row: PropertyRow,
    ledger: EmissionLedger
): XmlElement {
    let index: number;
    if (row === TREE_LEVEL) {
        index = 0;
        ledger.markEmitted(column.name);
    } else {
        index = row;
    }

    const value = column.getValue(index);
    const attributes = resolvePropertyAttributes(column, value);

    const element = new XmlElement("property", valueToString(value));
    element.setAttribute("datatype", attributes.datatype);
    element.setAttribute("ref", attributes.ref);
    element.setAttribute("applies_to", attributes.appliesTo);
    if (attributes.unit !== undefined) {
        element.setAttribute("unit", attributes.unit);
    }
    return element;
}
