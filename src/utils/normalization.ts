import { parse, format, isValid } from 'date-fns';
import { z } from 'zod';
import verhoeff from '../data/verhoeff.json';
import type { VerificationConfig } from '../config/env';
import type {
    CanonicalAddress,
    CanonicalValue,
    FieldCandidate,
    FieldName,
    NormalizedField,
} from '../types/verification_types';
import { NormalizationError } from './errors';
import { applyConfusionCorrections, cleanWhitespace, stripOrdinals, titleCase } from './cleaners';

export interface NormalizationContext
    extends Pick<VerificationConfig, 'homeCountryCode' | 'minPhoneDigits' | 'addressConfidencePenalty'> {
    /** yyyy-MM-dd; dates of birth after this day are rejected. */
    today: string;
}

export type NormalizationResult =
    | { ok: true; field: NormalizedField }
    | { ok: false; error: NormalizationError };

// Day-first numeric layouts, ISO layouts, then month-name layouts
const DATE_FORMATS = [
    'd/M/yyyy',
    'd-M-yyyy',
    'd.M.yyyy',
    'yyyy-M-d',
    'yyyy/M/d',
    'MMMM d, yyyy',
    'MMMM d yyyy',
    'MMM d, yyyy',
    'MMM d yyyy',
    'd MMMM yyyy',
    'd MMMM, yyyy',
    'd MMM yyyy',
    'd-MMM-yyyy',
    // Two-digit years, tried last so four-digit layouts win
    'd/M/yy',
    'd-M-yy',
    'd.M.yy',
    'd-MMM-yy',
];

// Two-digit years resolve within 50 years of this date: 50-99 -> 19xx, 00-49 -> 20xx
const REFERENCE_DATE = new Date(2000, 0, 1);
const MIN_YEAR = 1000;
const MAX_E164_DIGITS = 15;

const DATE_FIELDS: ReadonlySet<FieldName> = new Set<FieldName>(['DATE_OF_BIRTH', 'EXPIRY_DATE', 'EMPLOYMENT_START_DATE']);

const emailSchema = z.string().email();

/**
 * Normalizes a date string in any accepted layout to ISO 8601 (yyyy-MM-dd).
 * Returns null when no layout matches or the calendar date does not exist.
 */
export function normalizeDate(dateStr: string): string | null {
    const cleaned = stripOrdinals(cleanWhitespace(dateStr));
    if (!cleaned) return null;

    for (const f of DATE_FORMATS) {
        const parsedDate = parse(cleaned, f, REFERENCE_DATE);
        if (isValid(parsedDate) && parsedDate.getFullYear() >= MIN_YEAR) {
            return format(parsedDate, 'yyyy-MM-dd');
        }
    }
    return null;
}

/**
 * Normalizes a phone number to E.164. Numbers without an explicit `+` / `00`
 * prefix are read as national numbers of the home country.
 */
export function normalizePhone(raw: string, ctx: Pick<NormalizationContext, 'homeCountryCode' | 'minPhoneDigits'>): string {
    const corrected = applyConfusionCorrections(cleanWhitespace(raw), 'numeric');
    let digits = corrected.replace(/\D/g, '');
    const international = corrected.startsWith('+') || corrected.startsWith('00');
    if (corrected.startsWith('00')) digits = digits.slice(2);

    const cc = ctx.homeCountryCode;
    const n = ctx.minPhoneDigits;

    if (digits.length < n) {
        throw new NormalizationError('INVALID_PHONE', 'PHONE', raw, `Only ${digits.length} significant digits (need ${n})`);
    }
    if (digits.length > MAX_E164_DIGITS) {
        throw new NormalizationError('INVALID_PHONE', 'PHONE', raw, `${digits.length} digits exceeds the E.164 maximum`);
    }

    if (international) return `+${digits}`;
    if (digits.length === n) return `+${cc}${digits}`;
    if (digits.length === n + 1 && digits.startsWith('0')) return `+${cc}${digits.slice(1)}`;
    return `+${digits}`;
}

export function normalizeEmail(raw: string): string {
    const cleaned = raw.trim().toLowerCase();
    if (!emailSchema.safeParse(cleaned).success) {
        throw new NormalizationError('INVALID_EMAIL', 'EMAIL', raw, `"${cleaned}" is not a valid email address`);
    }
    return cleaned;
}

export function verhoeffIsValid(digits: string): boolean {
    let c = 0;
    const reversed = digits.split('').reverse();
    for (let i = 0; i < reversed.length; i++) {
        c = verhoeff.multiplication[c][verhoeff.permutation[i % 8][Number(reversed[i])]];
    }
    return c === 0;
}

export function verhoeffCheckDigit(digits: string): number {
    let c = 0;
    const reversed = digits.split('').reverse();
    for (let i = 0; i < reversed.length; i++) {
        c = verhoeff.multiplication[c][verhoeff.permutation[(i + 1) % 8][Number(reversed[i])]];
    }
    return verhoeff.inverse[c];
}

/**
 * 12-digit national identifier: first digit 2-9, last digit a Verhoeff check digit.
 */
export function normalizeNationalId(raw: string): string {
    const compact = applyConfusionCorrections(raw.replace(/[\s\-.\/]/g, ''), 'numeric');
    if (!/^[2-9]\d{11}$/.test(compact)) {
        throw new NormalizationError('INVALID_IDENTIFIER_FORMAT', 'NATIONAL_ID', raw, 'National ID must be 12 digits starting with 2-9');
    }
    if (!verhoeffIsValid(compact)) {
        throw new NormalizationError('CHECKSUM_MISMATCH', 'NATIONAL_ID', raw, 'National ID check digit does not match');
    }
    return compact;
}

/**
 * 10-character tax identifier: five letters (the fourth is the holder type),
 * four digits, one letter. The format defines no check digit.
 */
export function normalizeTaxId(raw: string): string {
    let compact = raw.toUpperCase().replace(/[^A-Z0-9]/g, '');
    if (compact.length === 10) {
        compact = applyConfusionCorrections(compact.slice(0, 5), 'alpha')
            + applyConfusionCorrections(compact.slice(5, 9), 'numeric')
            + applyConfusionCorrections(compact.slice(9), 'alpha');
    }
    if (!/^[A-Z]{3}[ABCFGHJLPT][A-Z]\d{4}[A-Z]$/.test(compact)) {
        throw new NormalizationError('INVALID_IDENTIFIER_FORMAT', 'TAX_ID', raw, `"${compact}" does not match the tax ID layout`);
    }
    return compact;
}

export function normalizeEmployeeId(raw: string): string {
    const cleaned = cleanWhitespace(raw.toUpperCase())
        .replace(/^(?:(?:EMPLOYEE|EMP|STAFF|ID)\b[\s\-_:#]*)+/, '')
        .replace(/[^A-Z0-9-]/g, '');
    if (cleaned.length < 2) {
        throw new NormalizationError('INVALID_IDENTIFIER_FORMAT', 'EMPLOYEE_ID', raw, 'Employee ID is too short');
    }
    return cleaned;
}

export function normalizeName(raw: string): string {
    return titleCase(raw.replace(/[^\p{L}\p{M}\s.'-]/gu, ' '));
}

/**
 * Best-effort segmentation. Comma-separated parts read right to left as
 * region, city, then street; the postal code is lifted out first.
 * Returns a confidence multiplier alongside the address.
 */
export function normalizeAddress(raw: string, penalty: number): { address: CanonicalAddress; confidenceFactor: number } {
    const cleaned = cleanWhitespace(raw);
    const postal = cleaned.match(/\b[1-9]\d{5}\b/) ?? cleaned.match(/\b\d{5}(?:-\d{4})?\b/);
    const postalCode = postal ? postal[0] : null;
    const remainder = postal ? cleaned.replace(postal[0], ' ') : cleaned;

    const parts = remainder
        .split(',')
        .map(part => cleanWhitespace(part).replace(/^[-\s]+|[-\s]+$/g, ''))
        .filter(part => part.length > 0);

    let street: string | null = null;
    let city: string | null = null;
    let region: string | null = null;

    if (parts.length >= 3) {
        street = parts.slice(0, -2).join(', ');
        city = parts[parts.length - 2];
        region = parts[parts.length - 1];
    } else if (parts.length === 2) {
        street = parts[0];
        city = parts[1];
    } else if (parts.length === 1) {
        street = parts[0];
    }

    const address: CanonicalAddress = {
        street: street === null ? null : titleCase(street),
        city: city === null ? null : titleCase(city),
        region: region === null ? null : titleCase(region),
        postalCode,
    };

    const confidenceFactor = (1 - penalty) * (address.city === null ? 1 - penalty : 1);
    return { address, confidenceFactor };
}

function roundConfidence(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.round(Math.min(1, Math.max(0, value)) * 10000) / 10000;
}

function canonicalize(candidate: FieldCandidate, ctx: NormalizationContext): { value: CanonicalValue; confidenceFactor: number } {
    const raw = candidate.rawValue;

    if (DATE_FIELDS.has(candidate.fieldName)) {
        const iso = normalizeDate(raw);
        if (!iso) {
            throw new NormalizationError('INVALID_DATE', candidate.fieldName, raw, `"${raw}" is not a recognised calendar date`);
        }
        if (candidate.fieldName === 'DATE_OF_BIRTH' && iso > ctx.today) {
            throw new NormalizationError('INVALID_DATE', candidate.fieldName, raw, `Date of birth ${iso} is in the future`);
        }
        return { value: iso, confidenceFactor: 1 };
    }

    switch (candidate.fieldName) {
        case 'PHONE':
            return { value: normalizePhone(raw, ctx), confidenceFactor: 1 };
        case 'EMAIL':
            return { value: normalizeEmail(raw), confidenceFactor: 1 };
        case 'NATIONAL_ID':
            return { value: normalizeNationalId(raw), confidenceFactor: 1 };
        case 'TAX_ID':
            return { value: normalizeTaxId(raw), confidenceFactor: 1 };
        case 'EMPLOYEE_ID':
            return { value: normalizeEmployeeId(raw), confidenceFactor: 1 };
        case 'ADDRESS': {
            const { address, confidenceFactor } = normalizeAddress(raw, ctx.addressConfidencePenalty);
            return { value: address, confidenceFactor };
        }
        default: {
            const name = normalizeName(raw);
            if (!name) {
                throw new NormalizationError('EMPTY_VALUE', candidate.fieldName, raw, 'Name is empty after cleaning');
            }
            return { value: name, confidenceFactor: 1 };
        }
    }
}

/**
 * Maps one raw candidate to a frozen NormalizedField, or a typed failure.
 * The candidate itself is never modified.
 */
export function normalizeCandidate(
    candidate: FieldCandidate,
    sourceDocumentId: string,
    ctx: NormalizationContext
): NormalizationResult {
    if (!candidate.rawValue || !candidate.rawValue.trim()) {
        return {
            ok: false,
            error: new NormalizationError('EMPTY_VALUE', candidate.fieldName, candidate.rawValue ?? '', 'Raw value is empty'),
        };
    }

    try {
        const { value, confidenceFactor } = canonicalize(candidate, ctx);
        const field: NormalizedField = Object.freeze({
            fieldName: candidate.fieldName,
            canonicalValue: typeof value === 'string' ? value : Object.freeze({ ...value }),
            originalValue: candidate.rawValue,
            confidence: roundConfidence(candidate.confidence * confidenceFactor),
            sourceDocumentId,
            sourceProvider: candidate.sourceProvider,
        });
        return { ok: true, field };
    } catch (err) {
        if (err instanceof NormalizationError) return { ok: false, error: err };
        throw err;
    }
}
