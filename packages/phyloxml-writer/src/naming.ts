/**
 * Column naming conventions for PhyloXML elements
 */

/** Node columns with this prefix describe the whole phylogeny (row 0) */
export const TREE_LEVEL_PREFIX = "phylogeny.";

/** Node columns with this prefix are phylogeny-level property elements */
export const TREE_PROPERTY_PREFIX = "phylogeny.property.";

/** Optional prefix marking a clade-level property column */
export const PROPERTY_PREFIX = "property.";

/**
 * Node column that holds a tree-level element, e.g. "phylogeny.name"
 */
export function treeLevelColumnName(elementName: string): string {
    return `${TREE_LEVEL_PREFIX}${elementName}`;
}

export function isTreeLevelPropertyColumn(columnName: string): boolean {
    return columnName.startsWith(TREE_PROPERTY_PREFIX);
}

/**
 * Local part of a property's ref: the column name without its leading
 * "phylogeny.property." or "property." prefix.
 */
export function propertyLocalName(columnName: string): string {
    if (columnName.startsWith(TREE_PROPERTY_PREFIX)) {
        return columnName.slice(TREE_PROPERTY_PREFIX.length);
    }
    if (columnName.startsWith(PROPERTY_PREFIX)) {
        return columnName.slice(PROPERTY_PREFIX.length);
    }
    return columnName;
}
