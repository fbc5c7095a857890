/**
 * PhyloTree - rooted tree with per-node and per-edge attribute columns
 */

import { ColumnSet } from "./ColumnSet.js";
import { PhyloTreeError } from "./errors.js";
import type { AddedChild, TreeReader } from "./types.js";

interface Edge {
    parent: number;
    child: number;
}

/**
 * PhyloTree provides:
 * - Structure building (root first, then children in order)
 * - O(1) parent, children and edge lookups
 * - Node-scope and edge-scope column sets
 *
 * The structure must be complete before columns are attached, since every
 * column needs exactly one row per node (or edge).
 */
export class PhyloTree implements TreeReader {
    readonly nodeData: ColumnSet;
    readonly edgeData: ColumnSet;

    private readonly parents: (number | null)[] = [];
    private readonly childLists: number[][] = [];
    private readonly edges: Edge[] = [];
    // incoming edge per node, -1 for the root
    private readonly incomingEdge: number[] = [];

    constructor() {
        this.nodeData = new ColumnSet("node", () => this.parents.length);
        this.edgeData = new ColumnSet("edge", () => this.edges.length);
    }

    /**
     * Build a tree from a parent list. Entry 0 must be null (the root); every
     * other entry names an earlier node. Edge i-1 leads into node i.
     */
    static fromParentList(parents: readonly (number | null)[]): PhyloTree {
        const tree = new PhyloTree();
        parents.forEach((parent, node) => {
            if (node === 0) {
                if (parent !== null) {
                    throw new PhyloTreeError("Node 0 must be the root", "fromParentList", { parent });
                }
                tree.addRoot();
                return;
            }
            if (parent === null || parent >= node) {
                throw new PhyloTreeError(
                    `Node ${node} must have an earlier node as its parent`,
                    "fromParentList",
                    { node, parent }
                );
            }
            tree.addChild(parent);
        });
        return tree;
    }

    private assertStructureOpen(operation: string): void {
        if (this.nodeData.size > 0 || this.edgeData.size > 0) {
            throw new PhyloTreeError("Cannot change structure after columns are attached", operation);
        }
    }

    private assertNode(node: number, operation: string): void {
        if (!this.hasNode(node)) {
            throw new PhyloTreeError(`Unknown node ${node}`, operation, { node });
        }
    }

    /**
     * Create the root node. Returns its id (always 0).
     */
    addRoot(): number {
        this.assertStructureOpen("addRoot");
        if (this.parents.length > 0) {
            throw new PhyloTreeError("Tree already has a root", "addRoot");
        }
        this.parents.push(null);
        this.childLists.push([]);
        this.incomingEdge.push(-1);
        return 0;
    }

    /**
     * Append a child to a node. Returns the new node and the edge leading to it.
     */
    addChild(parent: number): AddedChild {
        this.assertStructureOpen("addChild");
        this.assertNode(parent, "addChild");

        const node = this.parents.length;
        const edge = this.edges.length;
        this.parents.push(parent);
        this.childLists.push([]);
        this.incomingEdge.push(edge);
        this.edges.push({ parent, child: node });
        this.childLists[parent].push(node);
        return { node, edge };
    }

    hasNode(node: number): boolean {
        return Number.isInteger(node) && node >= 0 && node < this.parents.length;
    }

    getRoot(): number | null {
        return this.parents.length > 0 ? 0 : null;
    }

    getNumberOfNodes(): number {
        return this.parents.length;
    }

    getNumberOfEdges(): number {
        return this.edges.length;
    }

    /**
     * Children in the order they were added.
     * Returns empty array if the node doesn't exist.
     */
    getChildren(node: number): readonly number[] {
        return this.hasNode(node) ? this.childLists[node] : [];
    }

    getNumberOfChildren(node: number): number {
        return this.getChildren(node).length;
    }

    /**
     * Returns null if node is root or doesn't exist.
     */
    getParent(node: number): number | null {
        return this.hasNode(node) ? this.parents[node] : null;
    }

    getEdgeId(parent: number, child: number): number | null {
        if (!this.hasNode(child)) return null;
        const edge = this.incomingEdge[child];
        if (edge < 0 || this.edges[edge].parent !== parent) return null;
        return edge;
    }

    /**
     * Walk the tree depth-first (pre-order), yielding each node with its depth.
     */
    *walkDepthFirst(): Generator<{ node: number; depth: number }> {
        const root = this.getRoot();
        if (root === null) return;

        const stack: { node: number; depth: number }[] = [{ node: root, depth: 0 }];
        while (stack.length > 0) {
            const entry = stack.pop();
            if (!entry) break;
            yield entry;
            const children = this.childLists[entry.node];
            for (let i = children.length - 1; i >= 0; i--) {
                stack.push({ node: children[i], depth: entry.depth + 1 });
            }
        }
    }
}
