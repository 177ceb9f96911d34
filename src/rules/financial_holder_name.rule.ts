import type { VerificationRule } from '../types/verification_types';
import { documentEvidence, valuesByDocument } from '../engine/rule_engine';
import { valueSimilarity } from '../utils/similarity';

export const financialHolderNameRule: VerificationRule = {
    ruleId: 'FINANCIAL_HOLDER_NAME_MATCH',
    description: 'The account holder on the bank statement is the person named on the ID.',
    applicableDocumentTypes: ['GOVERNMENT_ID', 'BANK_STATEMENT'],
    requiredFields: ['NAME'],
    predicate: (record, context) => {
        const idNames = valuesByDocument(record, 'NAME', 'GOVERNMENT_ID');
        const holderNames = valuesByDocument(record, 'NAME', 'BANK_STATEMENT');

        if (idNames.length === 0 || holderNames.length === 0) {
            return {
                status: 'WARN',
                message: idNames.length === 0 ? 'Government ID carries no name' : 'Bank statement carries no holder name',
                evidence: {
                    idNames: idNames.map(documentEvidence),
                    holderNames: holderNames.map(documentEvidence),
                },
            };
        }

        const idName = idNames[0];
        const scored = holderNames.map(holder => ({
            holder,
            similarity: Math.round(valueSimilarity(idName.field.canonicalValue, holder.field.canonicalValue) * 10000) / 10000,
        }));
        const evidence = {
            idName: documentEvidence(idName),
            holderNames: scored.map(s => ({ name: documentEvidence(s.holder), similarity: s.similarity })),
            threshold: context.fuzzyMatchThreshold,
        };

        const mismatched = scored.filter(s => s.similarity < context.fuzzyMatchThreshold);
        if (mismatched.length > 0) {
            return {
                status: 'FAIL',
                message: `Account holder on ${mismatched.map(s => s.holder.documentId).join(', ')} does not match the ID holder`,
                evidence,
            };
        }
        return { status: 'PASS', message: 'Account holder matches the ID holder', evidence };
    }
};
