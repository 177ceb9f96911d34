import { env, verificationConfig, type VerificationConfig } from '../config/env';
import { verificationEmitter } from '../events/verification_events';
import { rulesFor } from '../rules';
import {
    FIELD_NAMES,
    type ExtractedFieldSnapshot,
    type FieldName,
    type PersonRecord,
    type PersonVerificationReport,
    type RuleCatalogue,
    type VerificationDocument,
} from '../types/verification_types';
import type { ReconciliationConflict } from '../utils/errors';
import { reconcilePerson } from './entity_resolution';
import { createRuleCatalogue, evaluateRules } from './rule_engine';
import { aggregateStatus } from './status_aggregation';

export interface VerifyOptions {
    /** Fixes "today" for expiry and age checks. Defaults to the wall clock. */
    now?: Date;
    catalogue?: RuleCatalogue;
    config?: Partial<VerificationConfig>;
}

let defaultCatalogue: RuleCatalogue | null = null;

/** Catalogue selected by RULE_CATALOGUE, validated on first use. */
export function getDefaultCatalogue(): RuleCatalogue {
    if (!defaultCatalogue) {
        defaultCatalogue = createRuleCatalogue(rulesFor(env.RULE_CATALOGUE));
    }
    return defaultCatalogue;
}

export function resolveConfig(overrides?: Partial<VerificationConfig>): VerificationConfig {
    return { ...verificationConfig, ...overrides };
}

/**
 * Keeps one document per documentId (first wins) and drops documents that
 * belong to someone else.
 */
export function selectDocuments(personId: string, documents: readonly VerificationDocument[]): VerificationDocument[] {
    const seen = new Set<string>();
    const selected: VerificationDocument[] = [];

    for (const doc of documents) {
        if (doc.personId !== personId) {
            console.warn(`[Verification] Ignoring document ${doc.documentId}: belongs to ${doc.personId}, not ${personId}`);
            continue;
        }
        if (seen.has(doc.documentId)) {
            console.warn(`[Verification] Ignoring duplicate document ${doc.documentId} for ${personId}`);
            continue;
        }
        seen.add(doc.documentId);
        selected.push(doc);
    }
    return selected;
}

export function buildPersonRecord(
    personId: string,
    documents: readonly VerificationDocument[],
    config: VerificationConfig,
    today: string
): { record: PersonRecord; conflicts: ReconciliationConflict[] } {
    const selected = selectDocuments(personId, documents);
    const { reconciledFields, discarded, conflicts } = reconcilePerson(personId, selected, { ...config, today });
    return {
        record: { personId, documents: selected, reconciledFields, discarded },
        conflicts,
    };
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object') {
        for (const child of Object.values(value)) deepFreeze(child);
        Object.freeze(value);
    }
    return value;
}

function snapshotFields(record: PersonRecord): Partial<Record<FieldName, ExtractedFieldSnapshot>> {
    const snapshot: Partial<Record<FieldName, ExtractedFieldSnapshot>> = {};
    for (const fieldName of FIELD_NAMES) {
        const reconciled = record.reconciledFields[fieldName];
        if (!reconciled) continue;
        const value = reconciled.field.canonicalValue;
        snapshot[fieldName] = {
            value: typeof value === 'string' ? value : { ...value },
            confidence: reconciled.field.confidence,
            sourceDocumentId: reconciled.field.sourceDocumentId,
            sourceProvider: reconciled.field.sourceProvider,
            conflicted: reconciled.conflicted,
            supportingCount: reconciled.supportingCount,
            candidateCount: reconciled.candidateCount,
        };
    }
    return snapshot;
}

/**
 * Normalizes, reconciles and cross-checks one person's documents.
 * For the same documents and `now` the report serializes identically.
 */
export function verifyPerson(
    personId: string,
    documents: readonly VerificationDocument[],
    options: VerifyOptions = {}
): PersonVerificationReport {
    const now = options.now ?? new Date();
    // Calendar day in UTC, like evaluatedAt, so the verdict does not depend on the host time zone
    const today = now.toISOString().slice(0, 10);
    const config = resolveConfig(options.config);
    const catalogue = options.catalogue ?? getDefaultCatalogue();

    const { record, conflicts } = buildPersonRecord(personId, documents, config, today);
    const outcomes = evaluateRules(record, catalogue, {
        today,
        fuzzyMatchThreshold: config.fuzzyMatchThreshold,
        minWorkingAge: config.minWorkingAge,
    });

    const report: PersonVerificationReport = deepFreeze({
        personId,
        evaluatedAt: now.toISOString(),
        outcomes: outcomes.map(o => ({ ...o })),
        overallStatus: aggregateStatus(outcomes),
        extractedData: snapshotFields(record),
        conflicts: conflicts.map(c => c.fieldName),
        discarded: record.discarded.map(d => ({ ...d })),
        documents: record.documents.map(d => ({
            documentId: d.documentId,
            documentType: d.documentType,
            processingStatus: d.processingStatus,
            failureReason: d.failureReason ?? null,
        })),
    });

    console.log(`[Verification] ${personId}: ${report.overallStatus} (${outcomes.map(o => `${o.ruleId}=${o.status}`).join(', ')})`);

    for (const conflict of conflicts) {
        verificationEmitter.emitEvent('field.conflicted', conflict);
    }
    verificationEmitter.emitEvent('report.created', report);

    return report;
}
