import { beforeEach, describe, expect, it } from "vitest";
import { AttributeColumn } from "./AttributeColumn.js";
import { PhyloTreeError } from "./errors.js";
import { PhyloTree } from "./PhyloTree.js";

describe("PhyloTree", () => {
    let tree: PhyloTree;

    beforeEach(() => {
        // 0 -> (1 -> 3), 2
        tree = PhyloTree.fromParentList([null, 0, 0, 1]);
    });

    describe("structure", () => {
        it("should create an empty tree", () => {
            const empty = new PhyloTree();
            expect(empty.getRoot()).toBeNull();
            expect(empty.getNumberOfNodes()).toBe(0);
        });

        it("should report nodes, edges and children in order", () => {
            expect(tree.getRoot()).toBe(0);
            expect(tree.getNumberOfNodes()).toBe(4);
            expect(tree.getNumberOfEdges()).toBe(3);
            expect(tree.getChildren(0)).toEqual([1, 2]);
            expect(tree.getChildren(1)).toEqual([3]);
            expect(tree.getNumberOfChildren(2)).toBe(0);
        });

        it("should look up parents", () => {
            expect(tree.getParent(0)).toBeNull();
            expect(tree.getParent(3)).toBe(1);
            expect(tree.getParent(42)).toBeNull();
        });

        it("should look up edges by endpoints", () => {
            expect(tree.getEdgeId(0, 1)).toBe(0);
            expect(tree.getEdgeId(0, 2)).toBe(1);
            expect(tree.getEdgeId(1, 3)).toBe(2);
            expect(tree.getEdgeId(0, 3)).toBeNull();
            expect(tree.getEdgeId(0, 0)).toBeNull();
        });

        it("should return the new node and edge from addChild", () => {
            const built = new PhyloTree();
            const root = built.addRoot();
            expect(built.addChild(root)).toEqual({ node: 1, edge: 0 });
            expect(built.addChild(1)).toEqual({ node: 2, edge: 1 });
        });

        it("should walk depth-first in pre-order", () => {
            const visited = [...tree.walkDepthFirst()];
            expect(visited).toEqual([
                { node: 0, depth: 0 },
                { node: 1, depth: 1 },
                { node: 3, depth: 2 },
                { node: 2, depth: 1 },
            ]);
        });
    });

    describe("invalid structure", () => {
        it("should reject a second root", () => {
            expect(() => tree.addRoot()).toThrow(PhyloTreeError);
        });

        it("should reject unknown parents", () => {
            expect(() => tree.addChild(9)).toThrow(PhyloTreeError);
        });

        it("should reject parent lists that do not start at the root", () => {
            expect(() => PhyloTree.fromParentList([0, null])).toThrow(PhyloTreeError);
            expect(() => PhyloTree.fromParentList([null, 2, 0])).toThrow(PhyloTreeError);
            expect(() => PhyloTree.fromParentList([null, null])).toThrow(PhyloTreeError);
        });

        it("should reject structure changes once columns are attached", () => {
            tree.nodeData.addColumn(AttributeColumn.fromValues("label", "string", ["a", "b", "c", "d"]));
            expect(() => tree.addChild(0)).toThrow(PhyloTreeError);
        });
    });

    describe("columns", () => {
        it("should reject columns whose length does not match the scope", () => {
            expect(() =>
                tree.nodeData.addColumn(AttributeColumn.fromValues("label", "string", ["a", "b"]))
            ).toThrow(PhyloTreeError);
            expect(() =>
                tree.edgeData.addColumn(AttributeColumn.fromValues("weight", "float64", [1, 2, 3, 4]))
            ).toThrow(PhyloTreeError);
        });

        it("should keep insertion order and replace columns in place", () => {
            tree.nodeData.addColumn(AttributeColumn.fromValues("b", "int32", [1, 2, 3, 4]));
            tree.nodeData.addColumn(AttributeColumn.fromValues("a", "int32", [1, 2, 3, 4]));
            tree.nodeData.addColumn(AttributeColumn.fromValues("b", "string", ["w", "x", "y", "z"]));

            expect(tree.nodeData.columns().map(c => c.name)).toEqual(["b", "a"]);
            expect(tree.nodeData.getColumn("b")?.kind).toBe("string");
            expect(tree.nodeData.size).toBe(2);
        });

        it("should remove columns", () => {
            tree.edgeData.addColumn(AttributeColumn.fromValues("weight", "float64", [1, 2, 3]));
            expect(tree.edgeData.removeColumn("weight")).toBe(true);
            expect(tree.edgeData.hasColumn("weight")).toBe(false);
            expect(tree.edgeData.getColumn("weight")).toBeUndefined();
        });
    });
});

describe("AttributeColumn", () => {
    it("should read single values", () => {
        const column = AttributeColumn.fromValues("weight", "float64", [1.5, 2.25]);
        expect(column.length).toBe(2);
        expect(column.numberOfComponents).toBe(1);
        expect(column.getValue(1)).toEqual({ kind: "float64", value: 2.25 });
    });

    it("should read tuples and their first component", () => {
        const column = AttributeColumn.fromTuples("color", "uint8", [[255, 0, 0], [0, 128, 0]]);
        expect(column.numberOfComponents).toBe(3);
        expect(column.getTuple(1).map(v => v.value)).toEqual([0, 128, 0]);
        expect(column.getValue(0)).toEqual({ kind: "uint8", value: 255 });
    });

    it("should reject ragged tuples", () => {
        expect(() => AttributeColumn.fromTuples("color", "uint8", [[1, 2, 3], [1, 2]])).toThrow(PhyloTreeError);
    });

    it("should reject rows out of range", () => {
        const column = AttributeColumn.fromValues("label", "string", ["a"]);
        expect(() => column.getValue(1)).toThrow(PhyloTreeError);
        expect(() => column.getValue(-1)).toThrow(PhyloTreeError);
    });

    it("should expose metadata", () => {
        const column = AttributeColumn.fromValues("confidence", "float64", [0.9], {
            metadata: { type: "bootstrap" },
        });
        column.setMetadata("unit", "%");

        expect(column.getMetadata("type")).toBe("bootstrap");
        expect(column.getMetadata("authority")).toBeUndefined();
        expect(column.metadataKeys()).toEqual(["type", "unit"]);
    });
});
