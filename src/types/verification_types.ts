export const DOCUMENT_TYPES = ['GOVERNMENT_ID', 'BANK_STATEMENT', 'EMPLOYMENT_LETTER'] as const;
export type DocumentType = typeof DOCUMENT_TYPES[number];

export const PROCESSING_STATUSES = ['PENDING', 'EXTRACTED', 'FAILED'] as const;
export type ProcessingStatus = typeof PROCESSING_STATUSES[number];

export const FIELD_NAMES = [
    'NAME',
    'DATE_OF_BIRTH',
    'ADDRESS',
    'PHONE',
    'EMAIL',
    'NATIONAL_ID',
    'TAX_ID',
    'EXPIRY_DATE',
    'EMPLOYMENT_START_DATE',
    'EMPLOYEE_ID',
    'GUARDIAN_NAME',
] as const;
export type FieldName = typeof FIELD_NAMES[number];

export type ConfidenceScore = number; // 0.0 - 1.0

export interface FieldCandidate {
    fieldName: FieldName;
    rawValue: string;
    sourceProvider: string; // e.g. "mistral-ocr", "openai-llm"
    confidence: ConfidenceScore;
}

export interface VerificationDocument {
    documentId: string;
    personId: string;
    documentType: DocumentType;
    rawText: string;
    fieldCandidates: FieldCandidate[];
    processingStatus: ProcessingStatus;
    failureReason?: string;
}

export interface CanonicalAddress {
    street: string | null;
    city: string | null;
    region: string | null;
    postalCode: string | null;
}

// ISO dates, E.164 phones, emails, identifiers and names are all strings
export type CanonicalValue = string | CanonicalAddress;

export interface NormalizedField {
    readonly fieldName: FieldName;
    readonly canonicalValue: CanonicalValue;
    readonly originalValue: string;
    readonly confidence: ConfidenceScore;
    readonly sourceDocumentId: string;
    readonly sourceProvider: string;
}

export type NormalizationErrorKind =
    | 'EMPTY_VALUE'
    | 'INVALID_DATE'
    | 'INVALID_PHONE'
    | 'INVALID_EMAIL'
    | 'INVALID_IDENTIFIER_FORMAT'
    | 'CHECKSUM_MISMATCH';

export interface DiscardedCandidate {
    fieldName: FieldName;
    rawValue: string;
    sourceDocumentId: string;
    sourceProvider: string;
    errorKind: NormalizationErrorKind;
    message: string;
}

export interface ReconciledField {
    field: NormalizedField;
    conflicted: boolean;
    supportingCount: number;
    candidateCount: number;
    /** Every candidate that survived normalization, in ingestion order. */
    candidates: NormalizedField[];
    /** Group representatives, authoritative group first. */
    groups: CanonicalValue[];
}

export type ReconciledFields = Partial<Record<FieldName, ReconciledField>>;

export interface PersonRecord {
    personId: string;
    documents: VerificationDocument[];
    reconciledFields: ReconciledFields;
    discarded: DiscardedCandidate[];
}

export type RuleStatus = 'PASS' | 'FAIL' | 'WARN';
export type OverallStatus = 'VERIFIED' | 'REJECTED' | 'INCOMPLETE';

export type EvidenceValue = string | number | boolean | null | EvidenceValue[] | { [key: string]: EvidenceValue };
export type Evidence = { [key: string]: EvidenceValue };

export interface RuleEvaluation {
    status: RuleStatus;
    message: string;
    evidence: Evidence;
}

export interface RuleOutcome extends RuleEvaluation {
    ruleId: string;
}

export interface RuleContext {
    /** ISO date (yyyy-MM-dd) of "today" for expiry and age checks. */
    today: string;
    fuzzyMatchThreshold: number;
    minWorkingAge: number;
}

export interface VerificationRule {
    ruleId: string;
    description: string;
    applicableDocumentTypes: readonly DocumentType[];
    requiredFields: readonly FieldName[];
    predicate: (record: PersonRecord, context: RuleContext) => RuleEvaluation;
}

export type RuleCatalogue = readonly VerificationRule[];

export interface ExtractedFieldSnapshot {
    value: CanonicalValue;
    confidence: ConfidenceScore;
    sourceDocumentId: string;
    sourceProvider: string;
    conflicted: boolean;
    supportingCount: number;
    candidateCount: number;
}

export interface DocumentSummary {
    documentId: string;
    documentType: DocumentType;
    processingStatus: ProcessingStatus;
    failureReason: string | null;
}

export interface PersonVerificationReport {
    readonly personId: string;
    readonly evaluatedAt: string;
    readonly outcomes: readonly RuleOutcome[];
    readonly overallStatus: OverallStatus;
    readonly extractedData: Readonly<Partial<Record<FieldName, ExtractedFieldSnapshot>>>;
    readonly conflicts: readonly FieldName[];
    readonly discarded: readonly DiscardedCandidate[];
    readonly documents: readonly DocumentSummary[];
}
