import { differenceInYears, parseISO } from 'date-fns';
import type { VerificationRule } from '../types/verification_types';
import { canonicalKey } from '../utils/similarity';

export const employmentAgePlausibilityRule: VerificationRule = {
    ruleId: 'EMPLOYMENT_AGE_PLAUSIBILITY',
    description: 'The holder was at least the minimum working age when employment started.',
    applicableDocumentTypes: ['GOVERNMENT_ID', 'EMPLOYMENT_LETTER'],
    requiredFields: ['DATE_OF_BIRTH'],
    predicate: (record, context) => {
        const dobField = record.reconciledFields.DATE_OF_BIRTH;
        if (!dobField) {
            return { status: 'WARN', message: 'No reconciled date of birth', evidence: {} };
        }

        const dob = canonicalKey(dobField.field.canonicalValue);
        const startField = record.reconciledFields.EMPLOYMENT_START_DATE;
        const start = startField ? canonicalKey(startField.field.canonicalValue) : context.today;
        const ageAtStart = differenceInYears(parseISO(start), parseISO(dob));

        const evidence = {
            dateOfBirth: dob,
            employmentStartDate: startField ? start : null,
            comparedAgainst: start,
            ageAtStart,
            minimumAge: context.minWorkingAge,
        };

        if (ageAtStart < context.minWorkingAge) {
            return {
                status: 'FAIL',
                message: `Holder was ${ageAtStart} at ${start}, below the minimum working age of ${context.minWorkingAge}`,
                evidence,
            };
        }
        return { status: 'PASS', message: `Holder was ${ageAtStart} at ${start}`, evidence };
    }
};
