import type { VerificationConfig } from '../src/config/env';
import { createRuleCatalogue } from '../src/engine/rule_engine';
import { CANONICAL_RULES } from '../src/rules';
import {
    FIELD_NAMES,
    type DocumentType,
    type FieldCandidate,
    type FieldName,
    type VerificationDocument,
} from '../src/types/verification_types';

export const NOW = new Date('2024-06-01T12:00:00Z');
export const TODAY = '2024-06-01';

export const TEST_CONFIG: VerificationConfig = {
    homeCountryCode: '91',
    minPhoneDigits: 10,
    fuzzyMatchThreshold: 0.85,
    minWorkingAge: 18,
    addressConfidencePenalty: 0.1,
};

export const canonicalCatalogue = createRuleCatalogue(CANONICAL_RULES);

export function candidate(fieldName: FieldName, rawValue: string, confidence = 0.9, sourceProvider = 'test-ocr'): FieldCandidate {
    return { fieldName, rawValue, sourceProvider, confidence };
}

export function doc(
    documentId: string,
    documentType: DocumentType,
    fieldCandidates: FieldCandidate[],
    personId = 'P1'
): VerificationDocument {
    return {
        documentId,
        personId,
        documentType,
        rawText: '',
        fieldCandidates,
        processingStatus: 'EXTRACTED',
    };
}

export function governmentId(overrides: Partial<Record<FieldName, string>> = {}, personId = 'P1'): VerificationDocument {
    const values: Partial<Record<FieldName, string>> = {
        NAME: 'RAVI KUMAR',
        DATE_OF_BIRTH: '12/03/1990',
        ADDRESS: '12 MG Road, Bengaluru, Karnataka 560001',
        NATIONAL_ID: '2341 2341 2346',
        EXPIRY_DATE: '31/12/2030',
        ...overrides,
    };
    return doc(`${personId}-id`, 'GOVERNMENT_ID', toCandidates(values, 0.9), personId);
}

export function bankStatement(overrides: Partial<Record<FieldName, string>> = {}, personId = 'P1'): VerificationDocument {
    const values: Partial<Record<FieldName, string>> = {
        NAME: 'Ravi Kumar',
        ADDRESS: '12, MG Road, Bengaluru, Karnataka - 560001',
        ...overrides,
    };
    return doc(`${personId}-bank`, 'BANK_STATEMENT', toCandidates(values, 0.8), personId);
}

export function employmentLetter(overrides: Partial<Record<FieldName, string>> = {}, personId = 'P1'): VerificationDocument {
    const values: Partial<Record<FieldName, string>> = {
        NAME: 'Ravi  Kumar',
        EMPLOYMENT_START_DATE: '1 July 2015',
        DATE_OF_BIRTH: '1990-03-12',
        ...overrides,
    };
    return doc(`${personId}-emp`, 'EMPLOYMENT_LETTER', toCandidates(values, 0.85), personId);
}

// An override of '' drops the field from the document
function toCandidates(values: Partial<Record<FieldName, string>>, confidence: number): FieldCandidate[] {
    const candidates: FieldCandidate[] = [];
    for (const [fieldName, rawValue] of Object.entries(values)) {
        if (rawValue === undefined || rawValue === '') continue;
        const name = FIELD_NAMES.find(n => n === fieldName);
        if (name) candidates.push(candidate(name, rawValue, confidence));
    }
    return candidates;
}

