import type { VerificationRule } from '../types/verification_types';
import { documentEvidence, valuesByDocument } from '../engine/rule_engine';
import { canonicalKey } from '../utils/similarity';

export const phoneConsistencyRule: VerificationRule = {
    ruleId: 'PHONE_CONSISTENCY',
    description: 'The phone number registered with the bank matches the one on the ID.',
    applicableDocumentTypes: ['GOVERNMENT_ID', 'BANK_STATEMENT'],
    requiredFields: ['PHONE'],
    predicate: (record) => {
        const idPhones = valuesByDocument(record, 'PHONE', 'GOVERNMENT_ID');
        const bankPhones = valuesByDocument(record, 'PHONE', 'BANK_STATEMENT');
        const evidence = {
            idPhones: idPhones.map(documentEvidence),
            bankPhones: bankPhones.map(documentEvidence),
        };

        if (idPhones.length === 0 || bankPhones.length === 0) {
            return { status: 'WARN', message: 'Phone number not present on both ID and bank statement', evidence };
        }

        const idPhone = canonicalKey(idPhones[0].field.canonicalValue);
        const mismatched = bankPhones.filter(p => canonicalKey(p.field.canonicalValue) !== idPhone);
        if (mismatched.length > 0) {
            return {
                status: 'FAIL',
                message: `Phone on ${mismatched.map(p => p.documentId).join(', ')} differs from ID (${idPhone})`,
                evidence,
            };
        }
        return { status: 'PASS', message: `Phone ${idPhone} matches`, evidence };
    }
};
