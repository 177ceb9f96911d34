import { describe, it, expect } from 'vitest';
import { extractFieldsFromText } from '../src/engine/extraction/field_extractors';
import { parseLlmFields } from '../src/engine/extraction/llm_extractor';
import { MistralOcrExtractor, pagesToText } from '../src/engine/extraction/mistral_ocr_extractor';
import { PdfTextExtractor } from '../src/engine/extraction/pdf_text_extractor';
import { detectMimeType, toDataUri } from '../src/engine/extraction/document_bytes';
import { ProviderUnavailableError } from '../src/utils/errors';

const ID_CARD_TEXT = [
    'GOVERNMENT OF INDIA',
    'Name: Ravi Kumar',
    "Father's Name: Suresh Kumar",
    'DOB: 12/03/1990',
    'Aadhaar No: 2341 2341 2346',
    'Address: 12 MG Road, Bengaluru, Karnataka 560001',
].join('\n');

describe('extractFieldsFromText', () => {
    it('reads labelled lines of an identity card in line order', () => {
        const candidates = extractFieldsFromText(ID_CARD_TEXT, 'mistral-ocr');

        expect(candidates.map(c => [c.fieldName, c.rawValue, c.confidence])).toEqual([
            ['NAME', 'Ravi Kumar', 0.9],
            ['GUARDIAN_NAME', 'Suresh Kumar', 0.9],
            ['DATE_OF_BIRTH', '12/03/1990', 0.9],
            ['NATIONAL_ID', '2341 2341 2346', 0.9],
            ['ADDRESS', '12 MG Road, Bengaluru, Karnataka 560001', 0.9],
        ]);
        expect(candidates.every(c => c.sourceProvider === 'mistral-ocr')).toBe(true);
    });

    it('falls back to bare patterns at lower confidence', () => {
        const candidates = extractFieldsFromText('Contact ravi.kumar@example.com for queries\nABCPE1234F', 'pdf-text');

        expect(candidates.map(c => [c.fieldName, c.rawValue, c.confidence])).toEqual([
            ['TAX_ID', 'ABCPE1234F', 0.6],
            ['EMAIL', 'ravi.kumar@example.com', 0.6],
        ]);
    });

    it('reads employment letter fields', () => {
        const candidates = extractFieldsFromText('Employee ID: EMP-1042\nDate of Joining: 1st July 2015', 'pdf-text');

        expect(candidates.map(c => [c.fieldName, c.rawValue])).toEqual([
            ['EMPLOYEE_ID', 'EMP-1042'],
            ['EMPLOYMENT_START_DATE', '1st July 2015'],
        ]);
    });

    it('strips markdown, cuts names at the first comma and drops repeats', () => {
        const text = '**Account Holder:** Ravi Kumar, Savings\n| Name: RAVI KUMAR |\nName: Ravi Kumar';

        const candidates = extractFieldsFromText(text, 'mistral-ocr');

        expect(candidates.map(c => c.rawValue)).toEqual(['Ravi Kumar']);
    });

    it('reads dates written with two-digit years', () => {
        const candidates = extractFieldsFromText('DOB: 12.03.90\nValid until: 31-Dec-30', 'mistral-ocr');

        expect(candidates.map(c => [c.fieldName, c.rawValue])).toEqual([
            ['DATE_OF_BIRTH', '12.03.90'],
            ['EXPIRY_DATE', '31-Dec-30'],
        ]);
    });

    it('returns nothing for text without recognisable fields', () => {
        expect(extractFieldsFromText('Thank you for banking with us.', 'pdf-text')).toEqual([]);
    });
});

describe('parseLlmFields', () => {
    it('keeps known fields and applies the default confidence', () => {
        const content = JSON.stringify({
            rawText: 'SALARY ACCOUNT',
            fields: {
                name: { value: ' Ravi Kumar ', confidence: 0.8 },
                PHONE: { value: '98765 43210' },
                FAVOURITE_COLOUR: { value: 'blue' },
                EMAIL: { value: null },
            },
        });

        expect(parseLlmFields(content, 'openai-llm')).toEqual({
            rawText: 'SALARY ACCOUNT',
            fieldCandidates: [
                { fieldName: 'NAME', rawValue: 'Ravi Kumar', sourceProvider: 'openai-llm', confidence: 0.8 },
                { fieldName: 'PHONE', rawValue: '98765 43210', sourceProvider: 'openai-llm', confidence: 0.75 },
            ],
        });
    });

    it('treats malformed output as an unavailable provider', () => {
        expect(() => parseLlmFields('not json', 'openai-llm')).toThrow(ProviderUnavailableError);
        expect(() => parseLlmFields('{"fields": {"NAME": {"confidence": 3}}}', 'openai-llm'))
            .toThrow('Model response did not match the extraction schema');
    });
});

describe('provider adapters', () => {
    it('joins OCR pages and skips blank ones', () => {
        const text = pagesToText({ pages: [{ index: 0, markdown: ' # Page one ' }, { markdown: '  ' }, { markdown: 'Page three' }] });
        expect(text).toBe('# Page one\n\nPage three');
    });

    it('refuses to call the OCR service without an API key', async () => {
        const extractor = new MistralOcrExtractor({ apiUrl: 'http://localhost:1' });

        await expect(extractor.extract(Buffer.from('%PDF-1.4'), 'BANK_STATEMENT'))
            .rejects.toThrow('MISTRAL_API_KEY is not configured');
    });

    it('rejects non-PDF input in the text layer reader', async () => {
        const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a]);

        await expect(new PdfTextExtractor().extract(png, 'GOVERNMENT_ID')).rejects.toThrow(ProviderUnavailableError);
    });

    it('sniffs container formats from magic bytes', () => {
        expect(detectMimeType(Buffer.from('%PDF-1.7'))).toBe('application/pdf');
        expect(detectMimeType(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('image/jpeg');
        expect(detectMimeType(Buffer.from('plain text'))).toBe('application/octet-stream');
        expect(toDataUri(Buffer.from('hi'), 'image/png')).toBe('data:image/png;base64,aGk=');
    });
});
