import type { VerificationConfig } from '../config/env';
import { verificationEmitter } from '../events/verification_events';
import type { ChainExtractionResult, DocumentUpload, PersonUpload } from '../types/extraction_types';
import type {
    DocumentType,
    OverallStatus,
    PersonVerificationReport,
    RuleCatalogue,
    VerificationDocument,
} from '../types/verification_types';
import { errorMessage } from '../utils/errors';
import { summarizeAttempts } from './extraction/extraction_chain';
import { verifyPerson } from './verification_engine';

/** Anything that can turn document bytes into candidates; normally an ExtractionChain. */
export interface DocumentExtractor {
    extract(documentBytes: Buffer, documentType: DocumentType): Promise<ChainExtractionResult>;
}

export interface BatchOptions {
    concurrency: number;
    now?: Date;
    catalogue?: RuleCatalogue;
    config?: Partial<VerificationConfig>;
}

/**
 * Runs one document through the extractor. Always settles: a provider
 * failure marks the document FAILED instead of rejecting.
 */
export async function extractDocument(
    personId: string,
    upload: DocumentUpload,
    extractor: DocumentExtractor
): Promise<VerificationDocument> {
    const base = { documentId: upload.documentId, personId, documentType: upload.documentType };

    let result: ChainExtractionResult;
    try {
        result = await extractor.extract(upload.bytes, upload.documentType);
    } catch (err) {
        result = {
            provider: null,
            rawText: '',
            fieldCandidates: [],
            attempts: [{ provider: 'chain', outcome: 'ERROR', durationMs: 0, message: errorMessage(err) }],
        };
    }

    if (result.provider === null) {
        const reason = summarizeAttempts(result.attempts);
        console.warn(`[Pipeline] ${personId}/${upload.documentId} FAILED: ${reason}`);
        verificationEmitter.emitEvent('document.failed', {
            personId,
            documentId: upload.documentId,
            documentType: upload.documentType,
            reason,
            attempts: result.attempts,
        });
        return {
            ...base,
            rawText: result.rawText,
            fieldCandidates: [],
            processingStatus: 'FAILED',
            failureReason: reason,
        };
    }

    return {
        ...base,
        rawText: result.rawText,
        fieldCandidates: result.fieldCandidates,
        processingStatus: 'EXTRACTED',
    };
}

/**
 * Extracts every document of one person concurrently, waits for all of them
 * to settle, then verifies the person.
 */
export async function processPerson(
    person: PersonUpload,
    extractor: DocumentExtractor,
    options: Omit<BatchOptions, 'concurrency'> = {}
): Promise<PersonVerificationReport> {
    console.log(`[Pipeline] ${person.personId}: extracting ${person.documents.length} document(s)...`);
    const documents = await Promise.all(person.documents.map(doc => extractDocument(person.personId, doc, extractor)));
    return verifyPerson(person.personId, documents, options);
}

/**
 * Worker pool over persons. Results come back in input order regardless of
 * completion order.
 */
export async function processBatch(
    persons: readonly PersonUpload[],
    extractor: DocumentExtractor,
    options: BatchOptions
): Promise<PersonVerificationReport[]> {
    const started = Date.now();
    const now = options.now ?? new Date();
    const reports: PersonVerificationReport[] = new Array(persons.length);
    let next = 0;

    const worker = async () => {
        while (next < persons.length) {
            const index = next++;
            reports[index] = await processPerson(persons[index], extractor, { ...options, now });
        }
    };

    const workerCount = Math.max(1, Math.min(options.concurrency, persons.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const statusCounts: Record<OverallStatus, number> = { VERIFIED: 0, REJECTED: 0, INCOMPLETE: 0 };
    for (const report of reports) statusCounts[report.overallStatus]++;

    const durationMs = Date.now() - started;
    console.log(`[Pipeline] Batch of ${persons.length} done in ${durationMs}ms: ${JSON.stringify(statusCounts)}`);
    verificationEmitter.emitEvent('batch.completed', { persons: persons.length, durationMs, statusCounts });

    return reports;
}
