import type { DocumentType, FieldCandidate } from './verification_types';

export type ExtractorKind = 'PRIMARY_OCR' | 'SECONDARY_OCR' | 'LLM';

export interface ExtractionResult {
    rawText: string;
    fieldCandidates: FieldCandidate[];
}

export interface Extractor {
    readonly name: string;
    readonly kind: ExtractorKind;
    extract(documentBytes: Buffer, documentType: DocumentType): Promise<ExtractionResult>;
}

export interface ExtractionAttempt {
    provider: string;
    outcome: 'SUCCESS' | 'EMPTY' | 'UNAVAILABLE' | 'TIMEOUT' | 'ERROR';
    durationMs: number;
    message?: string;
}

export interface ChainExtractionResult extends ExtractionResult {
    provider: string | null;
    attempts: ExtractionAttempt[];
}

export interface DocumentUpload {
    documentId: string;
    documentType: DocumentType;
    fileName: string;
    bytes: Buffer;
}

export interface PersonUpload {
    personId: string;
    documents: DocumentUpload[];
}
