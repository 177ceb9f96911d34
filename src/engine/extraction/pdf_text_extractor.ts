import type { ExtractionResult, Extractor } from '../../types/extraction_types';
import type { DocumentType } from '../../types/verification_types';
import { ProviderUnavailableError } from '../../utils/errors';
import { detectMimeType } from './document_bytes';
import { extractFieldsFromText } from './field_extractors';

/**
 * Reads the embedded text layer of digital PDFs. Scans without one yield
 * no text, and the chain moves on.
 */
export class PdfTextExtractor implements Extractor {
    readonly name = 'pdf-text';
    readonly kind = 'SECONDARY_OCR' as const;

    async extract(documentBytes: Buffer, documentType: DocumentType): Promise<ExtractionResult> {
        if (detectMimeType(documentBytes) !== 'application/pdf') {
            throw new ProviderUnavailableError(this.name, `${documentType} is not a PDF`);
        }

        const { default: pdfParse } = await import('pdf-parse');
        const data = await pdfParse(documentBytes);
        console.log(`[PdfText] Parsed ${data.numpages} page(s) of ${documentType}, ${data.text.length} chars.`);

        return { rawText: data.text, fieldCandidates: extractFieldsFromText(data.text, this.name) };
    }
}
