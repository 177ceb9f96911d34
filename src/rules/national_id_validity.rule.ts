import type { VerificationRule } from '../types/verification_types';
import { valueEvidence } from '../engine/rule_engine';
import { canonicalKey } from '../utils/similarity';
import { verhoeffIsValid } from '../utils/normalization';

export const nationalIdValidityRule: VerificationRule = {
    ruleId: 'NATIONAL_ID_VALIDITY',
    description: 'The national identifier has a valid layout and check digit, and all sources agree on it.',
    applicableDocumentTypes: ['GOVERNMENT_ID'],
    requiredFields: ['NATIONAL_ID'],
    predicate: (record) => {
        const reconciled = record.reconciledFields.NATIONAL_ID;
        if (!reconciled) {
            return { status: 'WARN', message: 'No reconciled national ID', evidence: {} };
        }

        const id = canonicalKey(reconciled.field.canonicalValue);
        const formatValid = /^[2-9]\d{11}$/.test(id);
        const checksumValid = formatValid && verhoeffIsValid(id);
        const evidence = {
            nationalId: id,
            formatValid,
            checksumValid,
            conflicted: reconciled.conflicted,
            distinctValues: reconciled.groups.map(valueEvidence),
        };

        if (!formatValid || !checksumValid) {
            return { status: 'FAIL', message: `National ID ${id} failed validation`, evidence };
        }
        if (reconciled.conflicted) {
            return {
                status: 'FAIL',
                message: `Documents disagree on the national ID (${reconciled.groups.length} distinct values)`,
                evidence,
            };
        }
        return { status: 'PASS', message: `National ID ${id} is valid`, evidence };
    }
};
