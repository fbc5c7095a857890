import { LoroDoc } from "loro-crdt";
import { describe, expect, it } from "vitest";
import { PhyloTreeError } from "./errors.js";
import { inferKind, loroDocToTree } from "./loroHelpers.js";

/** root -> leafA (1.5), leafB (2.25) */
function createDoc(): LoroDoc {
    const doc = new LoroDoc();
    const loroTree = doc.getTree("tree");

    const root = loroTree.createNode();
    root.data.set("node name", "root");

    const leafA = root.createNode();
    leafA.data.set("node name", "leafA");
    leafA.data.set("edge.weight", 1.5);
    leafA.data.set("confidence", 90);

    const leafB = root.createNode();
    leafB.data.set("node name", "leafB");
    leafB.data.set("edge.weight", 2.25);

    doc.getMap("metadata").set("confidence", { type: "bootstrap" });
    doc.commit();
    return doc;
}

describe("loroDocToTree", () => {
    it("should copy the tree structure in pre-order", () => {
        const tree = loroDocToTree(createDoc());

        expect(tree.getNumberOfNodes()).toBe(3);
        expect(tree.getRoot()).toBe(0);
        expect(tree.getChildren(0)).toEqual([1, 2]);
        expect(tree.getParent(2)).toBe(0);
    });

    it("should number nested nodes in pre-order", () => {
        const doc = new LoroDoc();
        const root = doc.getTree("tree").createNode();
        const inner = root.createNode();
        inner.createNode().data.set("node name", "deep");
        root.createNode().data.set("node name", "sibling");
        doc.commit();

        const tree = loroDocToTree(doc);
        const names = tree.nodeData.getColumn("node name");

        expect(tree.getChildren(0)).toEqual([1, 3]);
        expect(tree.getChildren(1)).toEqual([2]);
        expect(names?.getValue(2)).toEqual({ kind: "string", value: "deep" });
        expect(names?.getValue(3)).toEqual({ kind: "string", value: "sibling" });
    });

    it("should import a chain deeper than the call stack allows", () => {
        const depth = 20000;
        const doc = new LoroDoc();
        let node = doc.getTree("tree").createNode();
        for (let i = 1; i < depth; i++) {
            node = node.createNode();
        }
        doc.commit();

        const tree = loroDocToTree(doc);

        expect(tree.getNumberOfNodes()).toBe(depth);
        expect(tree.getParent(depth - 1)).toBe(depth - 2);
    }, 60000);

    it("should turn node data keys into node columns", () => {
        const tree = loroDocToTree(createDoc());

        expect(tree.nodeData.columns().map(c => c.name)).toEqual(["node name", "confidence"]);

        const names = tree.nodeData.getColumn("node name");
        expect(names?.kind).toBe("string");
        expect(names?.getValue(1)).toEqual({ kind: "string", value: "leafA" });
    });

    it("should fill missing rows with the kind's empty value", () => {
        const tree = loroDocToTree(createDoc());
        const confidence = tree.nodeData.getColumn("confidence");

        expect(confidence?.kind).toBe("int32");
        expect([0, 1, 2].map(row => confidence?.getValue(row).value)).toEqual([0, 90, 0]);
    });

    it("should turn edge-prefixed keys into edge columns", () => {
        const tree = loroDocToTree(createDoc());
        const weight = tree.edgeData.getColumn("weight");

        expect(tree.edgeData.columns().map(c => c.name)).toEqual(["weight"]);
        expect(weight?.kind).toBe("float64");
        expect(weight?.getValue(tree.getEdgeId(0, 2) ?? -1)).toEqual({ kind: "float64", value: 2.25 });
    });

    it("should attach column metadata", () => {
        const tree = loroDocToTree(createDoc());
        expect(tree.nodeData.getColumn("confidence")?.getMetadata("type")).toBe("bootstrap");
    });

    it("should reject a document without a tree", () => {
        expect(() => loroDocToTree(new LoroDoc())).toThrow(PhyloTreeError);
    });
});

describe("inferKind", () => {
    it("should infer kinds from present values", () => {
        expect(inferKind([true, undefined, false])).toBe("boolean");
        expect(inferKind(["a", null])).toBe("string");
        expect(inferKind([1, 2, -3])).toBe("int32");
        expect(inferKind([1, 2.5])).toBe("float64");
        expect(inferKind([2 ** 40])).toBe("float64");
        expect(inferKind([1n])).toBe("int64");
    });

    it("should fall back to opaque", () => {
        expect(inferKind([1, "a"])).toBe("opaque");
        expect(inferKind([{ a: 1 }])).toBe("opaque");
        expect(inferKind([undefined])).toBe("opaque");
    });
});
