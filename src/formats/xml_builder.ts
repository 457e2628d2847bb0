// src/formats/xml_builder.ts

/**
 * Minimal XML element tree and pretty printer.
 *
 * Output layout: `<?xml version="1.0" ?>` prolog, one element per line,
 * two-space indentation, childless elements self-closed, attributes in
 * insertion order, trailing newline.
 */

import { EncodingError } from '../structured_error';

export interface XmlElement {
    name: string;
    attributes: [string, string][];
    children: XmlElement[];
}

export function element(name: string, attributes: Record<string, string> = {}): XmlElement {
    return { name, attributes: Object.entries(attributes), children: [] };
}

/** Appends a new child and returns it. */
export function subElement(parent: XmlElement, name: string, attributes: Record<string, string> = {}): XmlElement {
    const child = element(name, attributes);
    parent.children.push(child);
    return child;
}

const CHARACTER_REFERENCES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    '\t': '&#9;',
    '\n': '&#10;',
    '\r': '&#13;',
};

/** XML 1.0 has no representation for the remaining C0 controls. */
export function escapeAttribute(value: string): string {
    return value.replace(/[&<>"\u0000-\u001f]/g, (ch, offset: number) => {
        const ref = CHARACTER_REFERENCES[ch];
        if (ref !== undefined) return ref;
        throw new EncodingError(
            `Control character U+${ch.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')} at offset ${offset} cannot appear in XML`,
            'UNENCODABLE_CHARACTER',
            undefined,
            { offset, char_code: ch.charCodeAt(0) }
        );
    });
}

function writeElement(el: XmlElement, depth: number, indent: string, out: string[]): void {
    const pad = indent.repeat(depth);
    const attrs = el.attributes.map(([k, v]) => ` ${k}="${escapeAttribute(v)}"`).join('');
    if (el.children.length === 0) {
        out.push(`${pad}<${el.name}${attrs}/>`);
        return;
    }
    out.push(`${pad}<${el.name}${attrs}>`);
    for (const child of el.children) writeElement(child, depth + 1, indent, out);
    out.push(`${pad}</${el.name}>`);
}

export function toPrettyXml(root: XmlElement, indent = '  '): string {
    const out = ['<?xml version="1.0" ?>'];
    writeElement(root, 0, indent, out);
    return out.join('\n') + '\n';
}
