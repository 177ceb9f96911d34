import type { VerificationRule } from '../types/verification_types';
import { documentEvidence, valuesByDocument } from '../engine/rule_engine';
import { canonicalKey } from '../utils/similarity';

export const dobConsistencyRule: VerificationRule = {
    ruleId: 'DOB_CONSISTENCY',
    description: 'Every date of birth found outside the government ID equals the one on the ID.',
    applicableDocumentTypes: ['GOVERNMENT_ID'],
    requiredFields: ['DATE_OF_BIRTH'],
    predicate: (record) => {
        const onId = valuesByDocument(record, 'DATE_OF_BIRTH', 'GOVERNMENT_ID');
        if (onId.length === 0) {
            return {
                status: 'WARN',
                message: 'Government ID carries no date of birth',
                evidence: { idDateOfBirth: null },
            };
        }

        // Several ID documents may each carry a DOB; they must agree among themselves too
        const idDob = canonicalKey(onId[0].field.canonicalValue);
        const others = valuesByDocument(record, 'DATE_OF_BIRTH').filter(v => v.documentId !== onId[0].documentId);
        const mismatched = others.filter(v => canonicalKey(v.field.canonicalValue) !== idDob);

        const evidence = {
            idDocumentId: onId[0].documentId,
            idDateOfBirth: idDob,
            comparedDocuments: others.map(documentEvidence),
        };

        if (mismatched.length > 0) {
            return {
                status: 'FAIL',
                message: `Date of birth on ${mismatched.map(v => v.documentId).join(', ')} differs from ID (${idDob})`,
                evidence,
            };
        }
        if (others.length === 0) {
            return { status: 'PASS', message: 'No other document carries a date of birth', evidence };
        }
        return { status: 'PASS', message: `Date of birth ${idDob} matches on ${others.length} other document(s)`, evidence };
    }
};
