import type { HexRecord, SourceLanguage } from "../detection/types";

// Source cleaning
// Comments and layout are stripped and everything is lowercased so that
// cosmetic edits (spacing, casing, comments) do not affect the scores.

/**
 * Clean 8051 assembly.
 *  1. Remove `;` comments
 *  2. Collapse whitespace
 *  3. Lowercase
 */
export function cleanAssembly(code: string): string {
    return code
        .replace(/;.*$/gm, "")
        .replace(/\s+/g, " ")
        .toLowerCase()
        .trim();
}

/**
 * Clean C source.
 *  1. Remove preprocessor lines (#include, #define, ...)
 *  2. Remove multi-line comments   (/* … *​/)
 *  3. Remove single-line comments  (// …)
 *  4. Collapse whitespace and lowercase
 */
export function cleanC(code: string): string {
    return code
        .replace(/^\s*#.*$/gm, "")
        .replace(/\/\*[\s\S]*?\*\//g, "")
        .replace(/\/\/.*$/gm, "")
        .replace(/\s+/g, " ")
        .toLowerCase()
        .trim();
}

export function cleanSource(code: string, language: SourceLanguage): string {
    return language === "asm" ? cleanAssembly(code) : cleanC(code);
}

export function tokenize(cleaned: string): string[] {
    return cleaned.split(/\s+/).filter(Boolean);
}

/** Map a file extension (with dot, any case) to a source language. */
export function languageForExtension(ext: string): SourceLanguage | null {
    switch (ext.toLowerCase()) {
        case ".a51":
        case ".asm":
            return "asm";
        case ".c":
            return "c";
        default:
            return null;
    }
}

// Intel HEX
// :LLAAAATT[DD...]CC  (byte count, address, record type, data, checksum)

const HEX_LINE = /^:([0-9a-f]{2})([0-9a-f]{4})([0-9a-f]{2})((?:[0-9a-f]{2})*)$/i;

export const HEX_RECORD_DATA = 0x00;
export const HEX_RECORD_EOF = 0x01;

function parseHexLine(raw: string, line: number): HexRecord {
    const match = raw.match(HEX_LINE);
    if (!match) {
        return { line, address: 0, type: -1, data: [], valid: false, error: `line ${line}: not a valid record` };
    }

    const byteCount = parseInt(match[1], 16);
    const address = parseInt(match[2], 16);
    const type = parseInt(match[3], 16);
    const rest = match[4];

    const bytes: number[] = [];
    for (let i = 0; i < rest.length; i += 2) {
        bytes.push(parseInt(rest.slice(i, i + 2), 16));
    }

    // rest = data + checksum
    if (bytes.length !== byteCount + 1) {
        return {
            line, address, type, data: bytes.slice(0, byteCount), valid: false,
            error: `line ${line}: declared ${byteCount} data bytes, found ${Math.max(bytes.length - 1, 0)}`,
        };
    }

    const data = bytes.slice(0, byteCount);
    const checksum = bytes[byteCount];
    let sum = byteCount + (address >> 8) + (address & 0xff) + type;
    for (const b of data) sum += b;
    const expected = (0x100 - (sum & 0xff)) & 0xff;

    if (checksum !== expected) {
        return {
            line, address, type, data, valid: false,
            error: `line ${line}: checksum ${checksum.toString(16).padStart(2, "0")} != ${expected.toString(16).padStart(2, "0")}`,
        };
    }

    return { line, address, type, data, valid: true };
}

/**
 * Parse Intel HEX text.  Lines not starting with `:` are ignored; malformed
 * records are kept with `valid: false` so the anomaly detector can report them.
 */
export function parseIntelHex(content: string): HexRecord[] {
    const records: HexRecord[] = [];
    const lines = content.split(/\r?\n/);

    lines.forEach((rawLine, index) => {
        const line = rawLine.trim();
        if (!line.startsWith(":")) return;
        records.push(parseHexLine(line, index + 1));
    });

    return records;
}

/** Concatenate the payload of every valid data record. */
export function hexDataBytes(records: HexRecord[]): number[] {
    const bytes: number[] = [];
    for (const record of records) {
        if (record.valid && record.type === HEX_RECORD_DATA) bytes.push(...record.data);
    }
    return bytes;
}
