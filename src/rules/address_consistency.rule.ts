import type { CanonicalValue, VerificationRule } from '../types/verification_types';
import { documentEvidence, valuesByDocument } from '../engine/rule_engine';
import { isAddress, valueSimilarity } from '../utils/similarity';

function sameLocality(a: CanonicalValue, b: CanonicalValue): boolean {
    if (!isAddress(a) || !isAddress(b)) return false;
    if (a.postalCode === null || a.city === null) return false;
    return a.postalCode === b.postalCode && a.city.toLowerCase() === (b.city ?? '').toLowerCase();
}

export const addressConsistencyRule: VerificationRule = {
    ruleId: 'ADDRESS_CONSISTENCY',
    description: 'The bank statement address agrees with the government ID address.',
    applicableDocumentTypes: ['GOVERNMENT_ID', 'BANK_STATEMENT'],
    requiredFields: ['ADDRESS'],
    predicate: (record, context) => {
        const idAddresses = valuesByDocument(record, 'ADDRESS', 'GOVERNMENT_ID');
        const bankAddresses = valuesByDocument(record, 'ADDRESS', 'BANK_STATEMENT');

        if (idAddresses.length === 0 || bankAddresses.length === 0) {
            return {
                status: 'WARN',
                message: idAddresses.length === 0 ? 'Government ID carries no address' : 'Bank statement carries no address',
                evidence: {
                    idAddresses: idAddresses.map(documentEvidence),
                    bankAddresses: bankAddresses.map(documentEvidence),
                },
            };
        }

        const idAddress = idAddresses[0].field.canonicalValue;
        const comparisons = bankAddresses.map(bank => {
            const similarity = valueSimilarity(idAddress, bank.field.canonicalValue);
            const localityMatch = sameLocality(idAddress, bank.field.canonicalValue);
            return {
                entry: bank,
                similarity: Math.round(similarity * 10000) / 10000,
                localityMatch,
                agrees: localityMatch || similarity >= context.fuzzyMatchThreshold,
            };
        });

        const evidence = {
            idAddress: documentEvidence(idAddresses[0]),
            bankAddresses: comparisons.map(c => ({
                address: documentEvidence(c.entry),
                similarity: c.similarity,
                postalCodeAndCityMatch: c.localityMatch,
            })),
        };

        const disagreeing = comparisons.filter(c => !c.agrees);
        if (disagreeing.length > 0) {
            return {
                status: 'FAIL',
                message: `Address on ${disagreeing.map(c => c.entry.documentId).join(', ')} does not match the ID address`,
                evidence,
            };
        }
        return { status: 'PASS', message: 'Bank statement address matches the ID address', evidence };
    }
};
