/**
 * Property datatype resolution
 *
 * Maps value kinds to XML Schema datatypes and resolves the remaining
 * attributes of a PhyloXML property element from column metadata.
 */

import type { ColumnReader, TypedValue, ValueKind } from "@phyloxml/tree";
import { propertyLocalName } from "./naming.js";

export type XsdDatatype =
    | "xsd:boolean"
    | "xsd:byte"
    | "xsd:unsignedByte"
    | "xsd:short"
    | "xsd:unsignedShort"
    | "xsd:integer"
    | "xsd:unsignedInt"
    | "xsd:long"
    | "xsd:unsignedLong"
    | "xsd:float"
    | "xsd:double"
    | "xsd:string";

/** Authority used in a property's ref when the column names none */
export const DEFAULT_AUTHORITY = "VTK";

/** applies_to used when the column names none */
export const DEFAULT_APPLIES_TO = "clade";

/**
 * XML Schema datatype for a value kind. Strings and opaque values map to
 * xsd:string.
 */
export function resolveDatatype(kind: ValueKind): XsdDatatype {
    switch (kind) {
        case "boolean": return "xsd:boolean";
        case "int8": return "xsd:byte";
        case "uint8": return "xsd:unsignedByte";
        case "uint16": return "xsd:unsignedShort";
        case "int16": return "xsd:short";
        case "int32": return "xsd:integer";
        case "uint32": return "xsd:unsignedInt";
        case "int64": return "xsd:long";
        case "uint64": return "xsd:unsignedLong";
        case "float32": return "xsd:float";
        case "float64": return "xsd:double";
        case "string":
        case "opaque":
            return "xsd:string";
    }
}

/**
 * Attributes of a property element, in document order
 */
export interface PropertyAttributes {
    datatype: XsdDatatype;
    ref: string;
    appliesTo: string;
    unit?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
    return value === undefined || value === "" ? undefined : value;
}

/**
 * Resolve the attributes of the property element written for a column value
 */
export function resolvePropertyAttributes(column: ColumnReader, value: TypedValue): PropertyAttributes {
    const authority = nonEmpty(column.getMetadata("authority")) ?? DEFAULT_AUTHORITY;
    const appliesTo = nonEmpty(column.getMetadata("applies_to")) ?? DEFAULT_APPLIES_TO;
    const unit = nonEmpty(column.getMetadata("unit"));

    const attributes: PropertyAttributes = {
        datatype: resolveDatatype(value.kind),
        ref: `${authority}:${propertyLocalName(column.name)}`,
        appliesTo,
    };
    if (unit !== undefined) attributes.unit = unit;
    return attributes;
}
