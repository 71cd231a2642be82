import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock node-fetch before any imports
const fetchMock = vi.hoisted(() => vi.fn());
vi.mock('node-fetch', () => ({ default: fetchMock }));

import {
    buildJudgePrompt,
    createJudge,
    GEMINI_ENDPOINT,
    GeminiJudge,
    parseJudgmentText,
    UnavailableJudge,
} from './judge';

function geminiReply(text: string) {
    return {
        ok: true,
        status: 200,
        json: async () => ({ candidates: [{ content: { parts: [{ text }] } }] }),
    };
}

describe('Judge — parseJudgmentText', () => {
    it('should read a fenced JSON block', () => {
        const text = '```json\n{"reasoning": "same loop", "is_plagiarized": true}\n```';
        expect(parseJudgmentText(text)).toEqual({ isPlagiarized: true, reasoning: 'same loop' });
    });

    it('should find the JSON object inside prose', () => {
        const text = 'Both programs toggle P1.\n{"reasoning": "different delays", "is_plagiarized": false}\nDone.';
        expect(parseJudgmentText(text)).toEqual({ isPlagiarized: false, reasoning: 'different delays' });
    });

    it('should return null when no valid judgment is present', () => {
        expect(parseJudgmentText('I cannot decide')).toBeNull();
        expect(parseJudgmentText('{"reasoning": "missing flag"}')).toBeNull();
        expect(parseJudgmentText('{"is_plagiarized": "yes", "reasoning": "x"}')).toBeNull();
    });
});

describe('Judge — GeminiJudge', () => {
    const judge = new GeminiJudge({ apiKey: 'test-secret', model: 'gemini-2.5-flash-lite' });

    beforeEach(() => {
        fetchMock.mockReset();
    });

    it('should post the prompt and return the parsed judgment', async () => {
        fetchMock.mockResolvedValue(geminiReply('{"reasoning": "identical structure", "is_plagiarized": true}'));

        const outcome = await judge.judge('MOV A,#1', 'MOV A,#2');
        expect(outcome).toEqual({ status: 'ok', isPlagiarized: true, reasoning: 'identical structure' });

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe(`${GEMINI_ENDPOINT}/models/gemini-2.5-flash-lite:generateContent`);
        expect(init.method).toBe('POST');
        expect(init.headers['x-goog-api-key']).toBe('test-secret');

        const body = JSON.parse(init.body);
        expect(body.generationConfig).toEqual({ temperature: 0 });
        expect(body.contents[0].parts[0].text).toBe(buildJudgePrompt('MOV A,#1', 'MOV A,#2'));
    });

    it('should pass the abort signal through', async () => {
        fetchMock.mockResolvedValue(geminiReply('{"reasoning": "x", "is_plagiarized": false}'));
        const controller = new AbortController();

        await judge.judge('a', 'b', controller.signal);
        expect(fetchMock.mock.calls[0][1].signal).toBe(controller.signal);
    });

    it('should report an HTTP error as unavailable', async () => {
        fetchMock.mockResolvedValue({ ok: false, status: 503, json: async () => ({}) });
        expect(await judge.judge('a', 'b')).toEqual({ status: 'unavailable', reason: 'judgment service HTTP 503' });
    });

    it('should report an unexpected response body as unavailable', async () => {
        fetchMock.mockResolvedValue({ ok: true, status: 200, json: async () => ({ candidates: [] }) });
        expect(await judge.judge('a', 'b')).toEqual({
            status: 'unavailable',
            reason: 'unexpected judgment service response shape',
        });
    });

    it('should report model text without a judgment as unavailable', async () => {
        fetchMock.mockResolvedValue(geminiReply('I think so'));
        expect(await judge.judge('a', 'b')).toEqual({ status: 'unavailable', reason: 'unparseable judgment: I think so' });
    });

    it('should report a network failure as unavailable', async () => {
        fetchMock.mockRejectedValue(new Error('network down'));
        expect(await judge.judge('a', 'b')).toEqual({
            status: 'unavailable',
            reason: 'judgment service error: network down',
        });
    });
});

describe('Judge — createJudge', () => {
    it('should fall back to the unavailable judge without an API key', async () => {
        const judge = createJudge({ geminiModel: 'gemini-2.5-flash-lite' });
        expect(judge).toBeInstanceOf(UnavailableJudge);
        expect(judge.available).toBe(false);
        expect(await judge.judge('a', 'b')).toEqual({ status: 'unavailable', reason: 'no judgment service configured' });
    });

    it('should build a Gemini judge when a key is set', () => {
        const judge = createJudge({ geminiApiKey: 'test-secret', geminiModel: 'gemini-2.5-flash-lite' });
        expect(judge).toBeInstanceOf(GeminiJudge);
        expect(judge.available).toBe(true);
    });
});
