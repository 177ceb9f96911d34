import { describe, it, expect, vi } from 'vitest';
import { createExtractor, ExtractionChain, summarizeAttempts } from '../src/engine/extraction/extraction_chain';
import type { Env } from '../src/config/env';
import type { ExtractionResult, Extractor, ExtractorKind } from '../src/types/extraction_types';
import type { DocumentType } from '../src/types/verification_types';
import { ProviderUnavailableError } from '../src/utils/errors';
import { candidate } from './fixtures';

function fakeExtractor(
    name: string,
    behaviour: () => Promise<ExtractionResult>,
    kind: ExtractorKind = 'PRIMARY_OCR'
) {
    const extract = vi.fn((_bytes: Buffer, _type: DocumentType) => behaviour());
    const extractor: Extractor = { name, kind, extract };
    return { extractor, extract };
}

const bytes = Buffer.from('%PDF-1.4 test');
const found: ExtractionResult = { rawText: 'Name: Ravi Kumar', fieldCandidates: [candidate('NAME', 'Ravi Kumar', 0.9, 'second')] };

describe('ExtractionChain', () => {
    it('moves to the next provider when one is unavailable', async () => {
        const first = fakeExtractor('first', () => Promise.reject(new ProviderUnavailableError('first', 'HTTP 503')));
        const second = fakeExtractor('second', () => Promise.resolve(found), 'SECONDARY_OCR');
        const third = fakeExtractor('third', () => Promise.resolve(found), 'LLM');

        const chain = new ExtractionChain([first.extractor, second.extractor, third.extractor], { timeoutMs: 1000 });
        const result = await chain.extract(bytes, 'GOVERNMENT_ID');

        expect(result.provider).toBe('second');
        expect(result.fieldCandidates).toEqual(found.fieldCandidates);
        expect(result.attempts.map(a => [a.provider, a.outcome])).toEqual([['first', 'UNAVAILABLE'], ['second', 'SUCCESS']]);
        expect(first.extract).toHaveBeenCalledTimes(1);
        expect(second.extract).toHaveBeenCalledWith(bytes, 'GOVERNMENT_ID');
        expect(third.extract).not.toHaveBeenCalled();
    });

    it('bounds each provider with the timeout', async () => {
        const hanging = fakeExtractor('hanging', () => new Promise<ExtractionResult>(() => undefined));
        const backup = fakeExtractor('backup', () => Promise.resolve(found));

        const chain = new ExtractionChain([hanging.extractor, backup.extractor], { timeoutMs: 20 });
        const result = await chain.extract(bytes, 'BANK_STATEMENT');

        expect(result.provider).toBe('backup');
        expect(result.attempts[0]).toMatchObject({
            provider: 'hanging',
            outcome: 'TIMEOUT',
            message: 'hanging did not respond within 20ms',
        });
    });

    it('treats an empty result as a miss but keeps its text', async () => {
        const empty = fakeExtractor('empty', () => Promise.resolve({ rawText: 'blurry scan', fieldCandidates: [] }));
        const broken = fakeExtractor('broken', () => Promise.reject(new Error('socket hang up')));

        const chain = new ExtractionChain([empty.extractor, broken.extractor], { timeoutMs: 1000 });
        const result = await chain.extract(bytes, 'EMPLOYMENT_LETTER');

        expect(result.provider).toBeNull();
        expect(result.rawText).toBe('blurry scan');
        expect(result.fieldCandidates).toEqual([]);
        expect(result.attempts.map(a => a.outcome)).toEqual(['EMPTY', 'ERROR']);
        expect(empty.extract).toHaveBeenCalledTimes(1);
        expect(broken.extract).toHaveBeenCalledTimes(1);
    });

    it('lists providers in order', () => {
        const a = fakeExtractor('a', () => Promise.resolve(found));
        const b = fakeExtractor('b', () => Promise.resolve(found));

        expect(new ExtractionChain([a.extractor, b.extractor], { timeoutMs: 10 }).providers).toEqual(['a', 'b']);
    });
});

describe('summarizeAttempts', () => {
    it('describes every attempt', () => {
        expect(summarizeAttempts([
            { provider: 'mistral-ocr', outcome: 'UNAVAILABLE', durationMs: 3, message: 'MISTRAL_API_KEY is not configured' },
            { provider: 'pdf-text', outcome: 'EMPTY', durationMs: 1, message: 'no field candidates' },
        ])).toBe('mistral-ocr: UNAVAILABLE (MISTRAL_API_KEY is not configured); pdf-text: EMPTY (no field candidates)');
    });

    it('explains an empty chain', () => {
        expect(summarizeAttempts([])).toBe('no extraction providers configured');
    });
});

describe('createExtractor', () => {
    const config: Env = {
        PORT: '3001',
        NODE_ENV: 'test',
        CORS_ORIGIN: '*',
        HOME_COUNTRY_CODE: '91',
        MIN_PHONE_DIGITS: 10,
        FUZZY_MATCH_THRESHOLD: 0.85,
        MIN_WORKING_AGE: 18,
        ADDRESS_CONFIDENCE_PENALTY: 0.1,
        WORKER_CONCURRENCY: 2,
        EXTRACTION_TIMEOUT_MS: 1000,
        RULE_CATALOGUE: 'canonical',
        EXTRACTOR_CHAIN: 'pdf,llm',
        OPENAI_MODEL: 'gpt-4o-mini',
        MISTRAL_API_URL: 'http://localhost:1',
        REPORT_DIR: 'reports',
    };

    it('builds the named providers', () => {
        expect(createExtractor('mistral', config).name).toBe('mistral-ocr');
        expect(createExtractor('pdf', config).kind).toBe('SECONDARY_OCR');
        expect(createExtractor('llm', config).kind).toBe('LLM');
    });

    it('rejects unknown provider names', () => {
        expect(() => createExtractor('tesseract', config)).toThrow('Unknown extractor "tesseract" in EXTRACTOR_CHAIN');
    });
});
