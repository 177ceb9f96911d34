import { describe, it, expect } from 'vitest';
import {
    normalizeAddress,
    normalizeCandidate,
    normalizeDate,
    normalizeEmail,
    normalizeEmployeeId,
    normalizeName,
    normalizeNationalId,
    normalizePhone,
    normalizeTaxId,
    verhoeffCheckDigit,
    verhoeffIsValid,
    type NormalizationContext,
} from '../src/utils/normalization';
import { NormalizationError } from '../src/utils/errors';
import { candidate, TEST_CONFIG, TODAY } from './fixtures';

const ctx: NormalizationContext = { ...TEST_CONFIG, today: TODAY };

function errorKindOf(fn: () => unknown): string | null {
    try {
        fn();
        return null;
    } catch (err) {
        return err instanceof NormalizationError ? err.kind : 'OTHER';
    }
}

describe('normalizeDate', () => {
    it('maps day-first and month-name layouts to the same ISO date', () => {
        expect(normalizeDate('05/03/2020')).toBe('2020-03-05');
        expect(normalizeDate('March 5, 2020')).toBe('2020-03-05');
        expect(normalizeDate('5th March 2020')).toBe('2020-03-05');
        expect(normalizeDate('05-Mar-2020')).toBe('2020-03-05');
        expect(normalizeDate('2020-03-05')).toBe('2020-03-05');
    });

    it('reads two-digit years within fifty years of 2000', () => {
        expect(normalizeDate('12.03.90')).toBe('1990-03-12');
        expect(normalizeDate('31/12/30')).toBe('2030-12-31');
        expect(normalizeDate('05/03/20')).toBe('2020-03-05');
        expect(normalizeDate('05-Mar-49')).toBe('2049-03-05');
        expect(normalizeDate('05-Mar-50')).toBe('1950-03-05');
    });

    it('rejects impossible calendar dates and unknown layouts', () => {
        expect(normalizeDate('31/02/2020')).toBeNull();
        expect(normalizeDate('2020-13-01')).toBeNull();
        expect(normalizeDate('yesterday')).toBeNull();
        expect(normalizeDate('   ')).toBeNull();
    });
});

describe('normalizePhone', () => {
    it('prefixes national numbers with the home country code', () => {
        expect(normalizePhone('98765 43210', ctx)).toBe('+919876543210');
        expect(normalizePhone('09876543210', ctx)).toBe('+919876543210');
    });

    it('keeps numbers that already carry a country code', () => {
        expect(normalizePhone('+91 98765-43210', ctx)).toBe('+919876543210');
        expect(normalizePhone('0091 9876543210', ctx)).toBe('+919876543210');
        expect(normalizePhone('+44 20 7946 0958', ctx)).toBe('+442079460958');
    });

    it('corrects letters OCR confuses with digits', () => {
        expect(normalizePhone('98765 4321O', ctx)).toBe('+919876543210');
    });

    it('rejects too few or too many digits', () => {
        expect(errorKindOf(() => normalizePhone('12345', ctx))).toBe('INVALID_PHONE');
        expect(errorKindOf(() => normalizePhone('+1234567890123456', ctx))).toBe('INVALID_PHONE');
    });
});

describe('normalizeEmail', () => {
    it('lower-cases and trims', () => {
        expect(normalizeEmail('  Ravi.Kumar@Example.COM ')).toBe('ravi.kumar@example.com');
    });

    it('rejects malformed addresses', () => {
        expect(errorKindOf(() => normalizeEmail('ravi.kumar@'))).toBe('INVALID_EMAIL');
    });
});

describe('national identifier', () => {
    it('accepts valid Verhoeff check digits', () => {
        for (const id of ['234123412346', '498765432102', '567812345678', '314159265352']) {
            expect(verhoeffIsValid(id)).toBe(true);
        }
    });

    it('computes the check digit for a payload', () => {
        expect(verhoeffCheckDigit('23412341234')).toBe(6);
        expect(verhoeffCheckDigit('49876543210')).toBe(2);
    });

    it('strips separators', () => {
        expect(normalizeNationalId('2341 2341 2346')).toBe('234123412346');
        expect(normalizeNationalId('4987-6543-2102')).toBe('498765432102');
    });

    it('reports a corrupted check digit as a checksum mismatch', () => {
        expect(errorKindOf(() => normalizeNationalId('2341 2341 2340'))).toBe('CHECKSUM_MISMATCH');
        expect(errorKindOf(() => normalizeNationalId('567812345670'))).toBe('CHECKSUM_MISMATCH');
    });

    it('reports layout problems as a format error', () => {
        expect(errorKindOf(() => normalizeNationalId('123412341234'))).toBe('INVALID_IDENTIFIER_FORMAT');
        expect(errorKindOf(() => normalizeNationalId('23412341234'))).toBe('INVALID_IDENTIFIER_FORMAT');
    });
});

describe('normalizeTaxId', () => {
    it('upper-cases and repairs confusable characters by position', () => {
        expect(normalizeTaxId('abcpe1234f')).toBe('ABCPE1234F');
        expect(normalizeTaxId('ABCPE I234F')).toBe('ABCPE1234F');
    });

    it('requires a valid holder-type letter', () => {
        expect(errorKindOf(() => normalizeTaxId('ABCDE1234F'))).toBe('INVALID_IDENTIFIER_FORMAT');
    });
});

describe('names and identifiers', () => {
    it('title-cases names and collapses whitespace', () => {
        expect(normalizeName('  rAVI   kumar ')).toBe('Ravi Kumar');
    });

    it('drops employee id prefixes', () => {
        expect(normalizeEmployeeId('EMP-1042')).toBe('1042');
        expect(normalizeEmployeeId('staff id: ab-77')).toBe('AB-77');
    });
});

describe('normalizeAddress', () => {
    it('segments comma separated parts right to left', () => {
        const { address, confidenceFactor } = normalizeAddress('12 MG Road, Bengaluru, Karnataka 560001', 0.1);
        expect(address).toEqual({
            street: '12 Mg Road',
            city: 'Bengaluru',
            region: 'Karnataka',
            postalCode: '560001',
        });
        expect(confidenceFactor).toBeCloseTo(0.9, 10);
    });

    it('penalizes addresses without a city twice', () => {
        const { address, confidenceFactor } = normalizeAddress('Flat 4B Sunrise Apartments 400001', 0.1);
        expect(address.city).toBeNull();
        expect(address.street).toBe('Flat 4b Sunrise Apartments');
        expect(confidenceFactor).toBeCloseTo(0.81, 10);
    });
});

describe('normalizeCandidate', () => {
    it('returns a frozen field and leaves the candidate untouched', () => {
        const raw = candidate('DATE_OF_BIRTH', 'March 5, 2020', 0.8);
        const before = { ...raw };
        const result = normalizeCandidate(raw, 'doc-1', ctx);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.field).toEqual({
            fieldName: 'DATE_OF_BIRTH',
            canonicalValue: '2020-03-05',
            originalValue: 'March 5, 2020',
            confidence: 0.8,
            sourceDocumentId: 'doc-1',
            sourceProvider: 'test-ocr',
        });
        expect(Object.isFrozen(result.field)).toBe(true);
        expect(raw).toEqual(before);
    });

    it('applies the address penalty to confidence', () => {
        const result = normalizeCandidate(candidate('ADDRESS', 'Flat 4B Sunrise Apartments 400001', 0.9), 'doc-1', ctx);
        expect(result.ok && result.field.confidence).toBe(0.729);
    });

    it('rejects a date of birth after today', () => {
        const result = normalizeCandidate(candidate('DATE_OF_BIRTH', '01/01/2030'), 'doc-1', ctx);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('INVALID_DATE');
    });

    it('reports blank values as empty', () => {
        const result = normalizeCandidate(candidate('NAME', '   '), 'doc-1', ctx);
        expect(!result.ok && result.error.kind).toBe('EMPTY_VALUE');
    });

    it('returns typed failures instead of throwing', () => {
        const result = normalizeCandidate(candidate('NATIONAL_ID', '2341 2341 2340'), 'doc-1', ctx);
        expect(!result.ok && result.error.kind).toBe('CHECKSUM_MISMATCH');
    });
});
