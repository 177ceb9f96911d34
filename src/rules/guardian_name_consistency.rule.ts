import type { VerificationRule } from '../types/verification_types';
import { documentEvidence, valuesByDocument } from '../engine/rule_engine';
import { canonicalKey, valueSimilarity } from '../utils/similarity';

export const guardianNameConsistencyRule: VerificationRule = {
    ruleId: 'GUARDIAN_NAME_CONSISTENCY',
    description: "The guardian (father's) name agrees wherever it appears.",
    applicableDocumentTypes: ['GOVERNMENT_ID'],
    requiredFields: ['GUARDIAN_NAME'],
    predicate: (record, context) => {
        const reconciled = record.reconciledFields.GUARDIAN_NAME;
        if (!reconciled) {
            return { status: 'WARN', message: 'No reconciled guardian name', evidence: {} };
        }

        const reference = canonicalKey(reconciled.field.canonicalValue);
        const names = valuesByDocument(record, 'GUARDIAN_NAME');
        const mismatched = names.filter(n => valueSimilarity(n.field.canonicalValue, reference) < context.fuzzyMatchThreshold);
        const evidence = {
            reconciledGuardianName: reference,
            documents: names.map(documentEvidence),
        };

        if (mismatched.length > 0) {
            return {
                status: 'FAIL',
                message: `Guardian name on ${mismatched.map(n => n.documentId).join(', ')} does not match "${reference}"`,
                evidence,
            };
        }
        return { status: 'PASS', message: `Guardian name "${reference}" is consistent`, evidence };
    }
};
