import type { VerificationRule } from '../types/verification_types';
import { nameConsistencyRule } from './name_consistency.rule';
import { dobConsistencyRule } from './dob_consistency.rule';
import { addressConsistencyRule } from './address_consistency.rule';
import { nationalIdValidityRule } from './national_id_validity.rule';
import { documentNotExpiredRule } from './document_not_expired.rule';
import { employmentAgePlausibilityRule } from './employment_age_plausibility.rule';
import { financialHolderNameRule } from './financial_holder_name.rule';
import { phoneConsistencyRule } from './phone_consistency.rule';
import { guardianNameConsistencyRule } from './guardian_name_consistency.rule';
import { taxIdFormatRule } from './tax_id_format.rule';

export const CANONICAL_RULES: readonly VerificationRule[] = [
    nameConsistencyRule,
    dobConsistencyRule,
    addressConsistencyRule,
    nationalIdValidityRule,
    documentNotExpiredRule,
    employmentAgePlausibilityRule,
    financialHolderNameRule,
];

export const EXTENDED_RULES: readonly VerificationRule[] = [
    ...CANONICAL_RULES,
    phoneConsistencyRule,
    guardianNameConsistencyRule,
    taxIdFormatRule,
];

export type CatalogueName = 'canonical' | 'extended';

export function rulesFor(name: CatalogueName): readonly VerificationRule[] {
    return name === 'extended' ? EXTENDED_RULES : CANONICAL_RULES;
}
