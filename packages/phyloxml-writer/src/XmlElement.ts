/**
 * XmlElement - nested element builder with indented serialization
 */

const ESCAPES: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    "\"": "&quot;",
    "'": "&apos;",
};

// Anything outside the XML 1.0 Char production, lone surrogates included
const INVALID_XML_CHARS = /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu;

/**
 * Escape markup characters and drop characters XML 1.0 cannot carry
 */
export function escapeXml(text: string): string {
    return text
        .replace(INVALID_XML_CHARS, "")
        .replace(/[&<>"']/g, ch => ESCAPES[ch] ?? ch);
}

const INDENT = "  ";

/**
 * A named element with ordered attributes, optional text and nested elements.
 */
export class XmlElement {
    readonly name: string;
    private readonly attributes = new Map<string, string>();
    private readonly nested: XmlElement[] = [];
    private text: string | null = null;

    constructor(name: string, text?: string) {
        this.name = name;
        if (text !== undefined) this.text = text;
    }

    /**
     * Set an attribute. Re-setting keeps the attribute's original position.
     */
    setAttribute(name: string, value: string): this {
        this.attributes.set(name, value);
        return this;
    }

    setNumberAttribute(name: string, value: number): this {
        return this.setAttribute(name, String(value));
    }

    getAttribute(name: string): string | undefined {
        return this.attributes.get(name);
    }

    hasAttribute(name: string): boolean {
        return this.attributes.has(name);
    }

    attributeEntries(): [string, string][] {
        return [...this.attributes.entries()];
    }

    setText(text: string): this {
        this.text = text;
        return this;
    }

    getText(): string | null {
        return this.text;
    }

    appendChild(child: XmlElement): this {
        this.nested.push(child);
        return this;
    }

    get children(): readonly XmlElement[] {
        return this.nested;
    }

    findChildren(name: string): XmlElement[] {
        return this.nested.filter(child => child.name === name);
    }

    private openTag(): string {
        const attrs = this.attributeEntries()
            .map(([k, v]) => ` ${k}="${escapeXml(v)}"`)
            .join("");
        return `<${this.name}${attrs}`;
    }

    /**
     * Render this element and its descendants, one element per line,
     * indented two spaces per level. Every line ends with a newline.
     */
    toXml(depth = 0): string {
        const lines: string[] = [];
        const stack: { element: XmlElement; depth: number; closing: boolean }[] = [
            { element: this, depth, closing: false },
        ];

        while (stack.length > 0) {
            const entry = stack.pop();
            if (!entry) break;
            const { element } = entry;
            const indent = INDENT.repeat(entry.depth);

            if (entry.closing) {
                lines.push(`${indent}</${element.name}>\n`);
                continue;
            }

            const text = element.text ?? "";
            if (element.nested.length === 0) {
                lines.push(text === ""
                    ? `${indent}${element.openTag()}/>\n`
                    : `${indent}${element.openTag()}>${escapeXml(text)}</${element.name}>\n`);
                continue;
            }

            lines.push(`${indent}${element.openTag()}>\n`);
            if (text !== "") lines.push(`${indent}${INDENT}${escapeXml(text)}\n`);
            stack.push({ element, depth: entry.depth, closing: true });
            for (let i = element.nested.length - 1; i >= 0; i--) {
                stack.push({ element: element.nested[i], depth: entry.depth + 1, closing: false });
            }
        }

        return lines.join("");
    }
}
