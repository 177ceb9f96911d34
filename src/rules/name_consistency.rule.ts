import type { VerificationRule } from '../types/verification_types';
import { documentEvidence, documentsMissingField, valuesByDocument } from '../engine/rule_engine';
import { canonicalKey, valueSimilarity } from '../utils/similarity';

export const nameConsistencyRule: VerificationRule = {
    ruleId: 'NAME_CONSISTENCY',
    description: 'The holder name on every document matches the reconciled name.',
    applicableDocumentTypes: ['GOVERNMENT_ID', 'BANK_STATEMENT', 'EMPLOYMENT_LETTER'],
    requiredFields: ['NAME'],
    predicate: (record, context) => {
        const reconciled = record.reconciledFields.NAME;
        if (!reconciled) {
            return { status: 'WARN', message: 'No reconciled name', evidence: {} };
        }

        const reference = canonicalKey(reconciled.field.canonicalValue);
        const names = valuesByDocument(record, 'NAME');
        const mismatched = names.filter(n => valueSimilarity(n.field.canonicalValue, reference) < context.fuzzyMatchThreshold);
        const missing = documentsMissingField(record, 'NAME', nameConsistencyRule.applicableDocumentTypes);

        const evidence = {
            reconciledName: reference,
            conflicted: reconciled.conflicted,
            documents: names.map(documentEvidence),
            mismatchedDocuments: mismatched.map(n => n.documentId),
            documentsWithoutName: missing,
        };

        if (mismatched.length > 0) {
            return {
                status: 'FAIL',
                message: `Name on ${mismatched.map(n => n.documentId).join(', ')} does not match "${reference}"`,
                evidence,
            };
        }
        if (missing.length > 0) {
            return {
                status: 'WARN',
                message: `No name extracted from ${missing.join(', ')}`,
                evidence,
            };
        }
        return { status: 'PASS', message: `Name "${reference}" is consistent across ${names.length} document(s)`, evidence };
    }
};
