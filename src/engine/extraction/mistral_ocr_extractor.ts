import axios from 'axios';
import { z } from 'zod';
import type { ExtractionResult, Extractor } from '../../types/extraction_types';
import type { DocumentType } from '../../types/verification_types';
import { ProviderUnavailableError } from '../../utils/errors';
import { detectMimeType, isImage, toDataUri } from './document_bytes';
import { extractFieldsFromText } from './field_extractors';

const ocrResponseSchema = z.object({
    pages: z.array(z.object({
        index: z.number().optional(),
        markdown: z.string().default(''),
    })).default([]),
});

export type OcrResponse = z.infer<typeof ocrResponseSchema>;

export function pagesToText(response: OcrResponse): string {
    return response.pages
        .map(page => page.markdown.trim())
        .filter(text => text.length > 0)
        .join('\n\n');
}

export interface MistralOcrOptions {
    apiKey?: string;
    apiUrl: string;
    model?: string;
}

export class MistralOcrExtractor implements Extractor {
    readonly name = 'mistral-ocr';
    readonly kind = 'PRIMARY_OCR' as const;

    constructor(private readonly options: MistralOcrOptions) { }

    async extract(documentBytes: Buffer, documentType: DocumentType): Promise<ExtractionResult> {
        if (!this.options.apiKey) {
            throw new ProviderUnavailableError(this.name, 'MISTRAL_API_KEY is not configured');
        }

        const mimeType = detectMimeType(documentBytes);
        const document = isImage(mimeType)
            ? { type: 'image_url', image_url: toDataUri(documentBytes, mimeType) }
            : { type: 'document_url', document_url: toDataUri(documentBytes, 'application/pdf') };

        console.log(`[MistralOCR] Sending ${documentType} (${mimeType}, ${documentBytes.length} bytes)...`);

        let data: unknown;
        try {
            const response = await axios.post(
                `${this.options.apiUrl.replace(/\/$/, '')}/v1/ocr`,
                { model: this.options.model ?? 'mistral-ocr-latest', document },
                { headers: { Authorization: `Bearer ${this.options.apiKey}` } }
            );
            data = response.data;
        } catch (error) {
            const detail = axios.isAxiosError(error)
                ? `${error.response?.status ?? error.code ?? 'network error'}: ${error.message}`
                : String(error);
            throw new ProviderUnavailableError(this.name, `OCR request failed (${detail})`);
        }

        const parsed = ocrResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new ProviderUnavailableError(this.name, 'OCR response did not contain pages');
        }

        const rawText = pagesToText(parsed.data);
        return { rawText, fieldCandidates: extractFieldsFromText(rawText, this.name) };
    }
}
