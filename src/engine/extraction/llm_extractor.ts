import OpenAI from 'openai';
import { z } from 'zod';
import type { ExtractionResult, Extractor } from '../../types/extraction_types';
import { FIELD_NAMES, type DocumentType, type FieldCandidate, type FieldName } from '../../types/verification_types';
import { errorMessage, ProviderUnavailableError } from '../../utils/errors';
import { detectMimeType, isImage, toDataUri } from './document_bytes';

const DEFAULT_CONFIDENCE = 0.75;

const llmFieldSchema = z.object({
    value: z.string().nullable().optional(),
    confidence: z.number().min(0).max(1).optional(),
});

const llmResponseSchema = z.object({
    rawText: z.string().default(''),
    fields: z.record(z.string(), llmFieldSchema).default({}),
});

function isFieldName(key: string): key is FieldName {
    return FIELD_NAMES.some(name => name === key);
}

const SYSTEM_PROMPT = `You are an expert at extracting structured information from scanned identity, bank and employment documents.
Return ONLY a JSON object of the form:
{"rawText": "<all text on the document>", "fields": {"<FIELD>": {"value": "<text exactly as printed>", "confidence": <0..1>}}}
Allowed FIELD keys: ${FIELD_NAMES.join(', ')}.
GUARDIAN_NAME is the father's or guardian's name. Omit fields that are not on the document. Do not reformat dates or numbers.`;

/**
 * Turns the model's JSON answer into field candidates. Unknown keys and
 * empty values are dropped.
 */
export function parseLlmFields(content: string, sourceProvider: string): ExtractionResult {
    let json: unknown;
    try {
        json = JSON.parse(content);
    } catch (err) {
        throw new ProviderUnavailableError(sourceProvider, `Model returned invalid JSON: ${errorMessage(err)}`);
    }

    const parsed = llmResponseSchema.safeParse(json);
    if (!parsed.success) {
        throw new ProviderUnavailableError(sourceProvider, 'Model response did not match the extraction schema');
    }

    const fieldCandidates: FieldCandidate[] = [];
    for (const [key, field] of Object.entries(parsed.data.fields)) {
        const fieldName = key.toUpperCase();
        const value = field.value?.trim();
        if (!isFieldName(fieldName) || !value) continue;
        fieldCandidates.push({
            fieldName,
            rawValue: value,
            sourceProvider,
            confidence: field.confidence ?? DEFAULT_CONFIDENCE,
        });
    }
    return { rawText: parsed.data.rawText, fieldCandidates };
}

export interface LlmExtractorOptions {
    apiKey?: string;
    model: string;
}

export class LlmExtractor implements Extractor {
    readonly name = 'openai-llm';
    readonly kind = 'LLM' as const;
    private client: OpenAI | null = null;

    constructor(private readonly options: LlmExtractorOptions) { }

    private getClient(): OpenAI {
        if (!this.options.apiKey) {
            throw new ProviderUnavailableError(this.name, 'OPENAI_API_KEY is not configured');
        }
        if (!this.client) {
            this.client = new OpenAI({ apiKey: this.options.apiKey });
        }
        return this.client;
    }

    async extract(documentBytes: Buffer, documentType: DocumentType): Promise<ExtractionResult> {
        const mimeType = detectMimeType(documentBytes);
        if (!isImage(mimeType)) {
            throw new ProviderUnavailableError(this.name, `Vision extraction needs an image, got ${mimeType}`);
        }
        const client = this.getClient();

        let content: string;
        try {
            const completion = await client.chat.completions.create({
                model: this.options.model,
                messages: [
                    { role: 'system', content: SYSTEM_PROMPT },
                    {
                        role: 'user',
                        content: [
                            { type: 'text', text: `DOCUMENT TYPE: ${documentType}` },
                            { type: 'image_url', image_url: { url: toDataUri(documentBytes, mimeType) } },
                        ],
                    },
                ],
                response_format: { type: 'json_object' },
            });
            content = completion.choices[0]?.message.content ?? '{}';
        } catch (error) {
            console.error('[LLMExtractor] Extraction Error:', errorMessage(error));
            throw new ProviderUnavailableError(this.name, errorMessage(error));
        }

        return parseLlmFields(content, this.name);
    }
}
