// src/output_writer/text_encoding.ts

import { EncodingError } from "../structured_error";

export type TextEncoding = "utf-8" | "cp1252";

// Windows-1252 code points in 0x80-0x9F that differ from Latin-1
const CP1252_HIGH: ReadonlyMap<number, number> = new Map([
    [0x20ac, 0x80], [0x201a, 0x82], [0x0192, 0x83], [0x201e, 0x84],
    [0x2026, 0x85], [0x2020, 0x86], [0x2021, 0x87], [0x02c6, 0x88],
    [0x2030, 0x89], [0x0160, 0x8a], [0x2039, 0x8b], [0x0152, 0x8c],
    [0x017d, 0x8e], [0x2018, 0x91], [0x2019, 0x92], [0x201c, 0x93],
    [0x201d, 0x94], [0x2022, 0x95], [0x2013, 0x96], [0x2014, 0x97],
    [0x02dc, 0x98], [0x2122, 0x99], [0x0161, 0x9a], [0x203a, 0x9b],
    [0x0153, 0x9c], [0x017e, 0x9e], [0x0178, 0x9f],
]);

function cp1252Byte(codePoint: number): number | undefined {
    if (codePoint < 0x80 || (codePoint >= 0xa0 && codePoint <= 0xff)) return codePoint;
    return CP1252_HIGH.get(codePoint);
}

/** Offset and character of the first code point cp1252 cannot represent. */
export function findUnencodable(text: string): { offset: number; char: string } | undefined {
    let offset = 0;
    for (const char of text) {
        const cp = char.codePointAt(0) ?? 0;
        if (cp1252Byte(cp) === undefined) return { offset, char };
        offset += char.length;
    }
    return undefined;
}

export function encodeCp1252(text: string): Buffer {
    const bytes: number[] = [];
    let offset = 0;
    for (const char of text) {
        const cp = char.codePointAt(0) ?? 0;
        const byte = cp1252Byte(cp);
        if (byte === undefined) {
            const hex = cp.toString(16).toUpperCase().padStart(4, "0");
            throw new EncodingError(
                `Character '${char}' (U+${hex}) at offset ${offset} cannot be encoded as cp1252`,
                "UNENCODABLE_CHARACTER",
                undefined,
                { char, code_point: `U+${hex}`, offset }
            );
        }
        bytes.push(byte);
        offset += char.length;
    }
    return Buffer.from(bytes);
}

export function encodeText(text: string, encoding: TextEncoding): Buffer {
    return encoding === "cp1252" ? encodeCp1252(text) : Buffer.from(text, "utf8");
}
