import { describe, it, expect } from 'vitest';
import { annotateSubmissions, assemblyKeyword, DEFAULT_ANOMALY_OPTIONS, detectAnomalies } from './anomaly';
import type { HexRecord, SourceFile, Submission } from './types';

const EOF_RECORD: HexRecord = { line: 2, address: 0, type: 1, data: [], valid: true };
const SIXTEEN_BYTES = Array.from({ length: 16 }, (_, i) => i);

const BLINKY = [
    'ORG 0000H',
    'MAIN: MOV A,#55H',
    '      MOV P1,A',
    '      SJMP MAIN',
    'END',
].join('\n');

function makeSubmission(overrides: Partial<Submission> = {}): Submission {
    return {
        studentId: 's1',
        sourceFiles: [{ name: 'main.a51', language: 'asm', text: BLINKY }],
        sourceTokens: ['org', '0000h'],
        hexRecords: [{ line: 1, address: 0, type: 0, data: SIXTEEN_BYTES, valid: true }, EOF_RECORD],
        hexBytes: SIXTEEN_BYTES,
        valid: true,
        anomalies: [],
        ...overrides,
    };
}

function asm(text: string): SourceFile[] {
    return [{ name: 'main.a51', language: 'asm', text }];
}

describe('Anomaly — assemblyKeyword', () => {
    it('should skip labels and trailing comments', () => {
        expect(assemblyKeyword('loop: DJNZ R7, loop ; wait')).toBe('djnz');
    });

    it('should return null for blank and comment-only lines', () => {
        expect(assemblyKeyword('')).toBeNull();
        expect(assemblyKeyword('   ; only a comment')).toBeNull();
        expect(assemblyKeyword('start:')).toBeNull();
    });

    it('should report the directive of a symbol definition', () => {
        expect(assemblyKeyword('LED EQU P1.0')).toBe('equ');
        expect(assemblyKeyword('COUNT DATA 30H')).toBe('data');
    });
});

describe('Anomaly — hex checks', () => {
    it('should report nothing for a well-formed submission', () => {
        expect(detectAnomalies(makeSubmission())).toEqual([]);
    });

    it('should report every failing hex check for an empty hex file', () => {
        const tags = detectAnomalies(makeSubmission({ hexRecords: [], hexBytes: [] }));
        expect(tags).toEqual([
            { kind: 'missing-eof-marker', detail: 'no end-of-file record (:00000001FF)' },
            { kind: 'length-outlier', detail: '0 data bytes, expected 16-65536' },
            { kind: 'insufficient-data', detail: 'only 0 data bytes (minimum 5)' },
        ]);
    });

    it('should summarise malformed records in one tag', () => {
        const bad: HexRecord[] = [
            { line: 3, address: 0, type: 0, data: [], valid: false, error: 'line 3: checksum 00 != 01' },
            { line: 4, address: 0, type: -1, data: [], valid: false, error: 'line 4: not a valid record' },
        ];
        const sub = makeSubmission();
        const tags = detectAnomalies({ ...sub, hexRecords: [...sub.hexRecords, ...bad] });
        expect(tags).toEqual([
            { kind: 'malformed-hex-record', detail: '2 malformed records, first at line 3: checksum 00 != 01' },
        ]);
    });

    it('should flag a program larger than the configured maximum', () => {
        const tags = detectAnomalies(makeSubmission(), { ...DEFAULT_ANOMALY_OPTIONS, minHexBytes: 4, maxHexBytes: 8 });
        expect(tags).toEqual([{ kind: 'length-outlier', detail: '16 data bytes, expected 4-8' }]);
    });

    it('should flag a short program without calling it insufficient', () => {
        const bytes = [1, 2, 3, 4, 5, 6];
        const tags = detectAnomalies(makeSubmission({
            hexRecords: [{ line: 1, address: 0, type: 0, data: bytes, valid: true }, EOF_RECORD],
            hexBytes: bytes,
        }));
        expect(tags).toEqual([{ kind: 'length-outlier', detail: '6 data bytes, expected 16-65536' }]);
    });
});

describe('Anomaly — source checks', () => {
    it('should flag missing directives and too few instructions', () => {
        const tags = detectAnomalies(makeSubmission({ sourceFiles: asm('LED EQU P1.0\n CPL LED') }));
        expect(tags).toEqual([
            { kind: 'too-few-instructions', detail: '1 instructions/statements (minimum 3)' },
            { kind: 'missing-org-directive', detail: 'no ORG directive' },
            { kind: 'missing-end-directive', detail: 'no END directive' },
        ]);
    });

    it('should flag assembly that uses none of the key instructions', () => {
        const tags = detectAnomalies(makeSubmission({ sourceFiles: asm('ORG 0\n NOP\n NOP\n NOP\nEND') }));
        expect(tags).toEqual([{
            kind: 'missing-key-instruction',
            detail: 'none of mov, setb, clr, cpl, acall, lcall, sjmp, ljmp, ajmp, djnz used',
        }]);
    });

    it('should flag a file that is mostly comments', () => {
        const comments = Array.from({ length: 8 }, (_, i) => `; note ${i}`);
        const text = [...comments, 'ORG 0', 'MOV A,#1', 'MOV A,#2', 'SJMP $', 'END'].join('\n');
        const tags = detectAnomalies(makeSubmission({ sourceFiles: asm(text) }));
        expect(tags).toEqual([
            { kind: 'excessive-comment-ratio', detail: '62% of lines are comments or blank (limit 60%)' },
        ]);
    });

    it('should count C statements and skip assembly-only checks', () => {
        const text = 'void main() {\n  P1 = 0x55;\n  while (1) { }\n}';
        const tags = detectAnomalies(makeSubmission({ sourceFiles: [{ name: 'main.c', language: 'c', text }] }));
        expect(tags).toEqual([{ kind: 'too-few-instructions', detail: '1 instructions/statements (minimum 3)' }]);
    });

    it('should not count semicolons inside C comments', () => {
        const text = '/* a; b; c; */\nvoid main() {\n  P1 = 1; // x; y;\n  P1 = 2;\n  P1 = 3;\n}';
        const tags = detectAnomalies(makeSubmission({ sourceFiles: [{ name: 'main.c', language: 'c', text }] }));
        expect(tags).toEqual([]);
    });
});

describe('Anomaly — annotateSubmissions', () => {
    it('should attach tags without mutating the input', () => {
        const original = makeSubmission({ hexRecords: [], hexBytes: [] });
        const [annotated] = annotateSubmissions([original]);
        expect(original.anomalies).toEqual([]);
        expect(annotated.anomalies.map((t) => t.kind)).toEqual(['missing-eof-marker', 'length-outlier', 'insufficient-data']);
    });

    it('should replace previous tags when run twice', () => {
        const once = annotateSubmissions([makeSubmission({ hexRecords: [], hexBytes: [] })]);
        const twice = annotateSubmissions(once);
        expect(twice[0].anomalies).toEqual(once[0].anomalies);
    });
});
