import {
    DOCUMENT_TYPES,
    FIELD_NAMES,
    type CanonicalValue,
    type DocumentType,
    type EvidenceValue,
    type FieldName,
    type NormalizedField,
    type PersonRecord,
    type RuleCatalogue,
    type RuleContext,
    type RuleOutcome,
    type VerificationRule,
} from '../types/verification_types';
import { errorMessage, InvalidRuleDefinitionError } from '../utils/errors';
import { isAddress } from '../utils/similarity';

/**
 * Validates an ordered rule list once at startup. A malformed catalogue is
 * fatal: it throws instead of skipping the bad rule at runtime.
 */
export function createRuleCatalogue(rules: readonly VerificationRule[]): RuleCatalogue {
    const seen = new Set<string>();

    for (const rule of rules) {
        const id = typeof rule.ruleId === 'string' ? rule.ruleId.trim() : '';
        if (!id) throw new InvalidRuleDefinitionError(String(rule.ruleId), 'ruleId must be a non-empty string');
        if (seen.has(id)) throw new InvalidRuleDefinitionError(id, 'duplicate ruleId');
        seen.add(id);

        if (!Array.isArray(rule.applicableDocumentTypes) || rule.applicableDocumentTypes.length === 0) {
            throw new InvalidRuleDefinitionError(id, 'applicableDocumentTypes must name at least one document type');
        }
        const unknownType = rule.applicableDocumentTypes.find(t => !DOCUMENT_TYPES.includes(t));
        if (unknownType) throw new InvalidRuleDefinitionError(id, `unknown document type "${unknownType}"`);

        if (!Array.isArray(rule.requiredFields)) {
            throw new InvalidRuleDefinitionError(id, 'requiredFields must be an array');
        }
        const unknownField = rule.requiredFields.find(f => !FIELD_NAMES.includes(f));
        if (unknownField) throw new InvalidRuleDefinitionError(id, `unknown field "${unknownField}"`);

        if (typeof rule.predicate !== 'function') {
            throw new InvalidRuleDefinitionError(id, 'predicate must be a function');
        }
    }

    console.log(`[RuleEngine] Registered ${rules.length} rule(s): ${rules.map(r => r.ruleId).join(', ')}`);
    return Object.freeze(rules.map(rule => Object.freeze({ ...rule })));
}

/**
 * Evaluates a single rule. Missing documents or fields produce WARN before
 * the predicate is ever called; a throwing predicate also produces WARN.
 */
export function evaluateRule(rule: VerificationRule, record: PersonRecord, context: RuleContext): RuleOutcome {
    // A document whose extraction failed cannot supply input, so it does not count as present
    const present = new Set<DocumentType>(
        record.documents.filter(d => d.processingStatus !== 'FAILED').map(d => d.documentType)
    );
    const missingTypes = rule.applicableDocumentTypes.filter(t => !present.has(t));
    if (missingTypes.length > 0) {
        const failedDocuments = record.documents
            .filter(d => d.processingStatus === 'FAILED' && missingTypes.includes(d.documentType))
            .map(d => d.documentId);
        return {
            ruleId: rule.ruleId,
            status: 'WARN',
            message: 'required document missing',
            evidence: { missingDocumentTypes: missingTypes, failedDocuments },
        };
    }

    for (const fieldName of rule.requiredFields) {
        if (record.reconciledFields[fieldName]) continue;

        const failures = record.discarded.filter(d => d.fieldName === fieldName);
        if (failures.length > 0) {
            return {
                ruleId: rule.ruleId,
                status: 'WARN',
                message: `required field ${fieldName} failed normalization`,
                evidence: {
                    field: fieldName,
                    failures: failures.map(f => ({ documentId: f.sourceDocumentId, errorKind: f.errorKind, rawValue: f.rawValue })),
                },
            };
        }
        return {
            ruleId: rule.ruleId,
            status: 'WARN',
            message: `required field ${fieldName} was not extracted`,
            evidence: { field: fieldName },
        };
    }

    try {
        return { ruleId: rule.ruleId, ...rule.predicate(record, context) };
    } catch (err) {
        console.error(`[RuleEngine] Rule ${rule.ruleId} threw for ${record.personId}:`, err);
        return {
            ruleId: rule.ruleId,
            status: 'WARN',
            message: `rule evaluation error: ${errorMessage(err)}`,
            evidence: {},
        };
    }
}

/**
 * Rules are independent, so order of evaluation never matters; outcomes are
 * always returned in catalogue order.
 */
export function evaluateRules(record: PersonRecord, catalogue: RuleCatalogue, context: RuleContext): RuleOutcome[] {
    return catalogue.map(rule => evaluateRule(rule, record, context));
}

// ── Helpers shared by rule predicates ─────────────────────────────────────────

export interface DocumentValue {
    documentId: string;
    documentType: DocumentType;
    field: NormalizedField;
}

/**
 * Best surviving candidate of `fieldName` for each document (optionally of one
 * type), in document order. Documents without a surviving value are skipped.
 */
export function valuesByDocument(record: PersonRecord, fieldName: FieldName, documentType?: DocumentType): DocumentValue[] {
    const reconciled = record.reconciledFields[fieldName];
    if (!reconciled) return [];

    const values: DocumentValue[] = [];
    for (const doc of record.documents) {
        if (documentType && doc.documentType !== documentType) continue;

        let best: NormalizedField | undefined;
        for (const candidate of reconciled.candidates) {
            if (candidate.sourceDocumentId !== doc.documentId) continue;
            if (!best || candidate.confidence > best.confidence) best = candidate;
        }
        if (best) values.push({ documentId: doc.documentId, documentType: doc.documentType, field: best });
    }
    return values;
}

/** Documents of the listed types that carry no surviving value for `fieldName`. */
export function documentsMissingField(record: PersonRecord, fieldName: FieldName, documentTypes: readonly DocumentType[]): string[] {
    const covered = new Set(valuesByDocument(record, fieldName).map(v => v.documentId));
    return record.documents
        .filter(d => documentTypes.includes(d.documentType) && !covered.has(d.documentId))
        .map(d => d.documentId);
}

export function valueEvidence(value: CanonicalValue): EvidenceValue {
    if (!isAddress(value)) return value;
    return {
        street: value.street,
        city: value.city,
        region: value.region,
        postalCode: value.postalCode,
    };
}

export function documentEvidence(entry: DocumentValue): EvidenceValue {
    return {
        documentId: entry.documentId,
        documentType: entry.documentType,
        value: valueEvidence(entry.field.canonicalValue),
    };
}
