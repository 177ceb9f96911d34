import type { VerificationRule } from '../types/verification_types';
import { valueEvidence } from '../engine/rule_engine';
import { canonicalKey } from '../utils/similarity';

const TAX_ID_PATTERN = /^[A-Z]{3}[ABCFGHJLPT][A-Z]\d{4}[A-Z]$/;

export const taxIdFormatRule: VerificationRule = {
    ruleId: 'TAX_ID_FORMAT',
    description: 'The tax identifier has a valid layout and all sources agree on it.',
    applicableDocumentTypes: ['GOVERNMENT_ID'],
    requiredFields: ['TAX_ID'],
    predicate: (record) => {
        const reconciled = record.reconciledFields.TAX_ID;
        if (!reconciled) {
            return { status: 'WARN', message: 'No reconciled tax ID', evidence: {} };
        }

        const taxId = canonicalKey(reconciled.field.canonicalValue);
        const evidence = {
            taxId,
            formatValid: TAX_ID_PATTERN.test(taxId),
            conflicted: reconciled.conflicted,
            distinctValues: reconciled.groups.map(valueEvidence),
        };

        if (!evidence.formatValid) {
            return { status: 'FAIL', message: `Tax ID ${taxId} has an invalid layout`, evidence };
        }
        if (reconciled.conflicted) {
            return { status: 'FAIL', message: 'Documents disagree on the tax ID', evidence };
        }
        return { status: 'PASS', message: `Tax ID ${taxId} is valid`, evidence };
    }
};
