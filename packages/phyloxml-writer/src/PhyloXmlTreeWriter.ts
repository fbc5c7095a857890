/**
 * PhyloXmlTreeWriter - serializes a rooted tree with attribute columns as PhyloXML
 */

import { type FileHandle, open } from "fs/promises";
import type { Writable } from "stream";
import type { TreeReader } from "@phyloxml/tree";
import { type CladeColumns, writeClades } from "./clade.js";
import { EmissionLedger } from "./EmissionLedger.js";
import { handleWriterError, PhyloXmlError, toWriteError } from "./errors.js";
import { writeTreeLevelElements } from "./treeLevel.js";
import { XmlElement } from "./XmlElement.js";

export const DEFAULT_EDGE_WEIGHT_COLUMN = "weight";
export const DEFAULT_NODE_NAME_COLUMN = "node name";

export const PHYLOXML_OPEN =
    "<phyloxml xmlns:xsi=\"http://www.w3.org/2001/XMLSchema-instance\"" +
    " xmlns=\"http://www.phyloxml.org\" xsi:schemaLocation=\"" +
    "http://www.phyloxml.org http://www.phyloxml.org/1.10/phyloxml.xsd\">\n";

export const PHYLOXML_CLOSE = "</phyloxml>\n";

/**
 * Options for creating a PhyloXmlTreeWriter
 */
export interface PhyloXmlWriterOptions {
    /** Edge column holding branch lengths (default: "weight", null to disable) */
    edgeWeightColumnName?: string | null;
    /** Node column holding clade names (default: "node name", null to disable) */
    nodeNameColumnName?: string | null;
    /** Columns left out of every document, whatever their name */
    ignoredColumns?: readonly string[];
}

/**
 * A built phylogeny, before serialization
 */
export interface PhyloXmlDocument {
    phylogeny: XmlElement;
    /** Column names consumed by the write, in the order they were emitted */
    emitted: readonly string[];
}

function writeChunk(stream: Writable, chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
        stream.write(chunk, (error) => {
            if (error) reject(error);
            else resolve();
        });
    });
}

function closeStream(stream: Writable): Promise<void> {
    return new Promise((resolve, reject) => {
        stream.once("error", reject);
        stream.once("close", () => resolve());
        stream.end();
    });
}

/**
 * PhyloXmlTreeWriter
 *
 * Each write builds its own emission ledger, so one writer can be reused for
 * any number of trees. Writes are synchronous up to the output stream.
 */
export class PhyloXmlTreeWriter {
    private _edgeWeightColumnName: string | null;
    private _nodeNameColumnName: string | null;
    private readonly _ignoredColumns: Set<string>;

    constructor(options?: PhyloXmlWriterOptions) {
        this._edgeWeightColumnName = options?.edgeWeightColumnName === undefined
            ? DEFAULT_EDGE_WEIGHT_COLUMN
            : options.edgeWeightColumnName;
        this._nodeNameColumnName = options?.nodeNameColumnName === undefined
            ? DEFAULT_NODE_NAME_COLUMN
            : options.nodeNameColumnName;
        this._ignoredColumns = new Set(options?.ignoredColumns ?? []);
    }

    get edgeWeightColumnName(): string | null {
        return this._edgeWeightColumnName;
    }

    set edgeWeightColumnName(name: string | null) {
        this._edgeWeightColumnName = name;
    }

    get nodeNameColumnName(): string | null {
        return this._nodeNameColumnName;
    }

    set nodeNameColumnName(name: string | null) {
        this._nodeNameColumnName = name;
    }

    get ignoredColumns(): string[] {
        return [...this._ignoredColumns];
    }

    /**
     * Leave a node or edge column out of subsequent writes. This applies to
     * the name, weight, confidence, color and phylogeny-level columns too.
     */
    ignoreColumn(name: string): void {
        this._ignoredColumns.add(name);
    }

    getDefaultFileExtension(): string {
        return "xml";
    }

    /**
     * Current configuration, one "Key: value" per line
     */
    describe(): string {
        return [
            `EdgeWeightColumnName: ${this._edgeWeightColumnName ?? "(none)"}`,
            `NodeNameColumnName: ${this._nodeNameColumnName ?? "(none)"}`,
        ].join("\n");
    }

    /**
     * Look up the configured columns. Names that match no column resolve to null.
     */
    resolveColumns(tree: TreeReader): CladeColumns {
        const edgeWeight = this._edgeWeightColumnName === null
            ? undefined
            : tree.edgeData.getColumn(this._edgeWeightColumnName);
        const nodeName = this._nodeNameColumnName === null
            ? undefined
            : tree.nodeData.getColumn(this._nodeNameColumnName);
        return { edgeWeight: edgeWeight ?? null, nodeName: nodeName ?? null };
    }

    /**
     * Build the <phylogeny> element for a tree
     */
    buildDocument(tree: TreeReader): PhyloXmlDocument {
        const root = tree.getRoot();
        if (root === null) {
            throw new PhyloXmlError("Cannot write an empty tree", "buildDocument");
        }

        const ledger = new EmissionLedger(this._ignoredColumns);
        const columns = this.resolveColumns(tree);

        const phylogeny = new XmlElement("phylogeny");
        phylogeny.setAttribute("rooted", "true");

        writeTreeLevelElements(tree, phylogeny, ledger);
        writeClades(tree, root, phylogeny, columns, ledger);

        return { phylogeny, emitted: ledger.names() };
    }

    /**
     * Serialize a tree to a complete PhyloXML document
     */
    writeToString(tree: TreeReader): string {
        const { phylogeny } = this.buildDocument(tree);
        return PHYLOXML_OPEN + phylogeny.toXml() + PHYLOXML_CLOSE;
    }

    /**
     * Write a tree to a stream. Each chunk is awaited; the first failure
     * rejects with a PhyloXmlWriteError carrying the system error code.
     * The stream is left open. After a failure the writer's error listener
     * stays attached, since the stream emits "error" once it is destroyed.
     */
    async write(tree: TreeReader, stream: Writable): Promise<void> {
        const { phylogeny } = this.buildDocument(tree);

        const failures: Error[] = [];
        const onError = (error: Error): void => {
            failures.push(error);
        };
        stream.on("error", onError);

        try {
            for (const chunk of [PHYLOXML_OPEN, phylogeny.toXml(), PHYLOXML_CLOSE]) {
                await writeChunk(stream, chunk);
                if (failures.length > 0) throw failures[0];
            }
        } catch (error) {
            handleWriterError("write", error);
            throw toWriteError("write", error);
        }

        stream.off("error", onError);
    }

    /**
     * Write a tree to a file, replacing any existing content
     */
    async writeToFile(tree: TreeReader, path: string): Promise<void> {
        let handle: FileHandle;
        try {
            handle = await open(path, "w");
        } catch (error) {
            handleWriterError("writeToFile", error, { path });
            throw toWriteError("writeToFile", error, { path });
        }

        const stream = handle.createWriteStream();
        try {
            await this.write(tree, stream);
        } catch (error) {
            stream.destroy();
            throw error;
        }

        try {
            await closeStream(stream);
        } catch (error) {
            handleWriterError("writeToFile", error, { path });
            throw toWriteError("writeToFile", error, { path });
        }
    }
}
