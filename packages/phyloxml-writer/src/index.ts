/**
 * phyloxml-writer
 *
 * Serializes rooted trees with attribute columns as PhyloXML documents
 */

// Main class
export {
    DEFAULT_EDGE_WEIGHT_COLUMN,
    DEFAULT_NODE_NAME_COLUMN,
    PHYLOXML_CLOSE,
    PHYLOXML_OPEN,
    PhyloXmlTreeWriter,
} from "./PhyloXmlTreeWriter.js";
export type { PhyloXmlDocument, PhyloXmlWriterOptions } from "./PhyloXmlTreeWriter.js";

// Document building blocks
export { escapeXml, XmlElement } from "./XmlElement.js";
export { EmissionLedger } from "./EmissionLedger.js";
export {
    COLOR_COLUMN,
    CONFIDENCE_COLUMN,
    createCladeElement,
    isColorColumn,
    writeClades,
} from "./clade.js";
export type { CladeColumns } from "./clade.js";
export { writeTreeLevelElements, TREE_LEVEL_ELEMENTS } from "./treeLevel.js";
export { createPropertyElement, TREE_LEVEL } from "./property.js";
export type { PropertyRow } from "./property.js";
export {
    DEFAULT_APPLIES_TO,
    DEFAULT_AUTHORITY,
    resolveDatatype,
    resolvePropertyAttributes,
} from "./datatype.js";
export type { PropertyAttributes, XsdDatatype } from "./datatype.js";
export {
    isTreeLevelPropertyColumn,
    PROPERTY_PREFIX,
    propertyLocalName,
    TREE_LEVEL_PREFIX,
    TREE_PROPERTY_PREFIX,
    treeLevelColumnName,
} from "./naming.js";

// Error handling
export {
    handleWriterError,
    PhyloXmlError,
    PhyloXmlWriteError,
    systemErrorCode,
    UNKNOWN_ERROR_CODE,
} from "./errors.js";
