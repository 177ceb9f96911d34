import type { Env } from '../../config/env';
import type { ChainExtractionResult, ExtractionAttempt, Extractor } from '../../types/extraction_types';
import type { DocumentType } from '../../types/verification_types';
import { errorMessage, ProviderTimeoutError, ProviderUnavailableError } from '../../utils/errors';
import { LlmExtractor } from './llm_extractor';
import { MistralOcrExtractor } from './mistral_ocr_extractor';
import { PdfTextExtractor } from './pdf_text_extractor';

export interface ExtractionChainOptions {
    timeoutMs: number;
}

function withTimeout<T>(provider: string, task: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new ProviderTimeoutError(provider, timeoutMs)), timeoutMs);
    });
    return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}

function classify(error: unknown): ExtractionAttempt['outcome'] {
    if (error instanceof ProviderTimeoutError) return 'TIMEOUT';
    if (error instanceof ProviderUnavailableError) return 'UNAVAILABLE';
    return 'ERROR';
}

/**
 * Tries each provider once, in order, until one returns field candidates.
 * Every call is bounded by the timeout and recorded as an attempt.
 */
export class ExtractionChain {
    constructor(
        private readonly extractors: readonly Extractor[],
        private readonly options: ExtractionChainOptions
    ) { }

    get providers(): string[] {
        return this.extractors.map(e => e.name);
    }

    async extract(documentBytes: Buffer, documentType: DocumentType): Promise<ChainExtractionResult> {
        const attempts: ExtractionAttempt[] = [];
        let fallbackText = '';

        for (const extractor of this.extractors) {
            const started = Date.now();
            try {
                const result = await withTimeout(
                    extractor.name,
                    extractor.extract(documentBytes, documentType),
                    this.options.timeoutMs
                );
                const durationMs = Date.now() - started;

                if (result.fieldCandidates.length === 0) {
                    attempts.push({ provider: extractor.name, outcome: 'EMPTY', durationMs, message: 'no field candidates' });
                    if (!fallbackText) fallbackText = result.rawText;
                    console.log(`[ExtractionChain] ${extractor.name} found no fields in ${documentType}, trying next provider.`);
                    continue;
                }

                attempts.push({ provider: extractor.name, outcome: 'SUCCESS', durationMs });
                return { provider: extractor.name, rawText: result.rawText, fieldCandidates: result.fieldCandidates, attempts };
            } catch (error) {
                const outcome = classify(error);
                attempts.push({ provider: extractor.name, outcome, durationMs: Date.now() - started, message: errorMessage(error) });
                console.warn(`[ExtractionChain] ${extractor.name} ${outcome} on ${documentType}: ${errorMessage(error)}`);
            }
        }

        return { provider: null, rawText: fallbackText, fieldCandidates: [], attempts };
    }
}

export function summarizeAttempts(attempts: readonly ExtractionAttempt[]): string {
    if (attempts.length === 0) return 'no extraction providers configured';
    return attempts
        .map(a => `${a.provider}: ${a.outcome}${a.message ? ` (${a.message})` : ''}`)
        .join('; ');
}

export function createExtractor(name: string, config: Env): Extractor {
    switch (name) {
        case 'mistral':
            return new MistralOcrExtractor({ apiKey: config.MISTRAL_API_KEY, apiUrl: config.MISTRAL_API_URL });
        case 'pdf':
            return new PdfTextExtractor();
        case 'llm':
            return new LlmExtractor({ apiKey: config.OPENAI_API_KEY, model: config.OPENAI_MODEL });
        default:
            throw new Error(`Unknown extractor "${name}" in EXTRACTOR_CHAIN`);
    }
}

/** Builds the chain named by EXTRACTOR_CHAIN, in the listed order. */
export function createExtractionChain(config: Env): ExtractionChain {
    const names = config.EXTRACTOR_CHAIN.split(',').map(n => n.trim().toLowerCase()).filter(n => n.length > 0);
    const chain = new ExtractionChain(names.map(name => createExtractor(name, config)), {
        timeoutMs: config.EXTRACTION_TIMEOUT_MS,
    });
    console.log(`[ExtractionChain] Providers: ${chain.providers.join(' -> ')}`);
    return chain;
}
