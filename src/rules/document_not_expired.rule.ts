import type { RuleEvaluation, VerificationRule } from '../types/verification_types';
import { canonicalKey } from '../utils/similarity';

export const documentNotExpiredRule: VerificationRule = {
    ruleId: 'DOCUMENT_NOT_EXPIRED',
    description: 'The government ID, if it states an expiry date, has not expired.',
    applicableDocumentTypes: ['GOVERNMENT_ID'],
    // Expiry is optional: many IDs carry none
    requiredFields: [],
    predicate: (record, context): RuleEvaluation => {
        const reconciled = record.reconciledFields.EXPIRY_DATE;

        if (!reconciled) {
            const failures = record.discarded.filter(d => d.fieldName === 'EXPIRY_DATE');
            if (failures.length > 0) {
                return {
                    status: 'WARN',
                    message: 'Expiry date was present but could not be read',
                    evidence: { expiryDate: null, unreadable: failures.map(f => f.rawValue) },
                };
            }
            return {
                status: 'PASS',
                message: 'Document states no expiry date',
                evidence: { expiryDate: null, today: context.today },
            };
        }

        const expiry = canonicalKey(reconciled.field.canonicalValue);
        const evidence = {
            expiryDate: expiry,
            today: context.today,
            sourceDocumentId: reconciled.field.sourceDocumentId,
        };

        // ISO dates compare lexicographically
        if (expiry < context.today) {
            return { status: 'FAIL', message: `Document expired on ${expiry}`, evidence };
        }
        return { status: 'PASS', message: `Document valid until ${expiry}`, evidence };
    }
};
