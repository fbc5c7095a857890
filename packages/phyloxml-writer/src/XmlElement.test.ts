import { describe, expect, it } from "vitest";
import { escapeXml, XmlElement } from "./XmlElement.js";

describe("XmlElement", () => {
    it("should self-close elements without text or children", () => {
        const clade = new XmlElement("clade").setNumberAttribute("branch_length", 0.5);
        expect(clade.toXml()).toBe("<clade branch_length=\"0.5\"/>\n");
    });

    it("should write text-only elements on one line", () => {
        expect(new XmlElement("name", "leafA").toXml(1)).toBe("  <name>leafA</name>\n");
    });

    it("should treat empty text as no text", () => {
        expect(new XmlElement("name", "").toXml()).toBe("<name/>\n");
    });

    it("should indent nested elements two spaces per level", () => {
        const color = new XmlElement("color")
            .appendChild(new XmlElement("red", "1"))
            .appendChild(new XmlElement("green", "2"));
        const clade = new XmlElement("clade").appendChild(color);

        expect(clade.toXml()).toBe(
            "<clade>\n" +
            "  <color>\n" +
            "    <red>1</red>\n" +
            "    <green>2</green>\n" +
            "  </color>\n" +
            "</clade>\n"
        );
    });

    it("should write text before nested elements", () => {
        const element = new XmlElement("note", "hello").appendChild(new XmlElement("b"));
        expect(element.toXml()).toBe("<note>\n  hello\n  <b/>\n</note>\n");
    });

    it("should keep attribute order when an attribute is re-set", () => {
        const element = new XmlElement("property")
            .setAttribute("datatype", "xsd:string")
            .setAttribute("ref", "VTK:a")
            .setAttribute("datatype", "xsd:integer");

        expect(element.attributeEntries()).toEqual([["datatype", "xsd:integer"], ["ref", "VTK:a"]]);
        expect(element.getAttribute("datatype")).toBe("xsd:integer");
        expect(element.hasAttribute("unit")).toBe(false);
    });

    it("should escape text and attribute values", () => {
        const element = new XmlElement("name", "A & <B>").setAttribute("title", "\"q\" 'r'");
        expect(element.toXml()).toBe(
            "<name title=\"&quot;q&quot; &apos;r&apos;\">A &amp; &lt;B&gt;</name>\n"
        );
    });

    it("should find children by name", () => {
        const clade = new XmlElement("clade")
            .appendChild(new XmlElement("name", "x"))
            .appendChild(new XmlElement("clade"))
            .appendChild(new XmlElement("clade"));

        expect(clade.findChildren("clade")).toHaveLength(2);
        expect(clade.children.map(c => c.name)).toEqual(["name", "clade", "clade"]);
        expect(clade.findChildren("name")[0].getText()).toBe("x");
    });
});

describe("escapeXml", () => {
    it("should leave plain text unchanged", () => {
        expect(escapeXml("Homo sapiens")).toBe("Homo sapiens");
    });

    it("should drop control characters and lone surrogates", () => {
        expect(escapeXml("a\u0001b\u001Fc")).toBe("abc");
        expect(escapeXml("x\uD800y\uFFFEz")).toBe("xyz");
    });

    it("should keep tabs, newlines and astral characters", () => {
        expect(escapeXml("a\tb\nc\rd \u{1F333}")).toBe("a\tb\nc\rd \u{1F333}");
    });

    it("should drop control characters from rendered text and attributes", () => {
        const name = new XmlElement("name", "a\u0001b").setAttribute("note", "x\u0007y");
        expect(name.toXml()).toBe("<name note=\"xy\">ab</name>\n");
    });
});
