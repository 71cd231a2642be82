import { describe, it, expect } from 'vitest';
import {
    cleanAssembly,
    cleanC,
    cleanSource,
    hexDataBytes,
    languageForExtension,
    parseIntelHex,
    tokenize,
} from './preprocessor';

describe('Preprocessor — source cleaning', () => {
    it('should strip assembly comments, collapse whitespace and lowercase', () => {
        expect(cleanAssembly('MOV A,#55H ; load\n  SJMP $')).toBe('mov a,#55h sjmp $');
    });

    it('should strip C preprocessor lines and both comment styles', () => {
        const code = '#include <reg51.h>\n/* header */\nvoid main() { // entry\n  P1 = 0x55;\n}';
        expect(cleanC(code)).toBe('void main() { p1 = 0x55; }');
    });

    it('should pick the cleaner by language', () => {
        expect(cleanSource('MOV A,#1 // not a comment in asm', 'asm')).toBe('mov a,#1 // not a comment in asm');
        expect(cleanSource('x = 1; // note', 'c')).toBe('x = 1;');
    });

    it('should return an empty string for comment-only source', () => {
        expect(cleanAssembly('; nothing here\n; at all')).toBe('');
        expect(tokenize('')).toEqual([]);
    });

    it('should split cleaned text on whitespace', () => {
        expect(tokenize('mov a,#55h sjmp $')).toEqual(['mov', 'a,#55h', 'sjmp', '$']);
    });

    it('should map extensions to languages', () => {
        expect(languageForExtension('.A51')).toBe('asm');
        expect(languageForExtension('.asm')).toBe('asm');
        expect(languageForExtension('.C')).toBe('c');
        expect(languageForExtension('.hex')).toBeNull();
    });
});

describe('Preprocessor — Intel HEX', () => {
    it('should parse data and end-of-file records', () => {
        const records = parseIntelHex(':04000000745580FEB5\n:00000001FF\n');
        expect(records).toEqual([
            { line: 1, address: 0, type: 0, data: [0x74, 0x55, 0x80, 0xfe], valid: true },
            { line: 2, address: 0, type: 1, data: [], valid: true },
        ]);
    });

    it('should accept lowercase digits and CRLF line endings', () => {
        const records = parseIntelHex(':03001000010203e7\r\n:00000001ff\r\n');
        expect(records[0]).toEqual({ line: 1, address: 0x10, type: 0, data: [1, 2, 3], valid: true });
        expect(records[1].valid).toBe(true);
    });

    it('should ignore lines that do not start with a colon', () => {
        const records = parseIntelHex('garbage\n\n:00000001FF');
        expect(records).toHaveLength(1);
        expect(records[0].line).toBe(3);
    });

    it('should flag a bad checksum', () => {
        const [record] = parseIntelHex(':04000000745580FEB6');
        expect(record.valid).toBe(false);
        expect(record.error).toBe('line 1: checksum b6 != b5');
    });

    it('should flag a byte count that does not match the data', () => {
        const [record] = parseIntelHex(':050000007455');
        expect(record.valid).toBe(false);
        expect(record.error).toBe('line 1: declared 5 data bytes, found 1');
    });

    it('should flag records that are not hex at all', () => {
        const [record] = parseIntelHex(':zz');
        expect(record).toEqual({ line: 1, address: 0, type: -1, data: [], valid: false, error: 'line 1: not a valid record' });
    });

    it('should concatenate only valid data records', () => {
        const records = parseIntelHex([
            ':04000000745580FEB5',
            ':04000000745580FEB6', // bad checksum
            ':03001000010203E7',
            ':00000001FF',
        ].join('\n'));
        expect(hexDataBytes(records)).toEqual([0x74, 0x55, 0x80, 0xfe, 1, 2, 3]);
    });
});
