import type { FieldCandidate, FieldName } from '../../types/verification_types';
import { cleanWhitespace } from '../../utils/cleaners';

export const LABELLED_CONFIDENCE = 0.9;
export const UNLABELLED_CONFIDENCE = 0.6;

// dd/mm/yyyy, dd.mm.yy, yyyy-mm-dd, "5th March 2020", "March 5, 2020", "05-Mar-2020"
const DATE = String.raw`(\d{1,2}[\/.\-]\d{1,2}[\/.\-](?:\d{4}|\d{2})\b|\d{4}[\/\-]\d{1,2}[\/\-]\d{1,2}|\d{1,2}(?:st|nd|rd|th)?\s+[A-Za-z]{3,9},?\s+\d{4}|[A-Za-z]{3,9}\s+\d{1,2}(?:st|nd|rd|th)?,?\s+\d{4}|\d{1,2}-[A-Za-z]{3}-(?:\d{4}|\d{2})\b)`;

interface FieldPattern {
    fieldName: FieldName;
    labelled: RegExp[];
    unlabelled?: RegExp;
    /** Names stop at the first comma; OCR often runs the address on. */
    cutAtComma?: boolean;
}

// Order matters: the first pattern that matches a line claims it
const FIELD_PATTERNS: FieldPattern[] = [
    {
        fieldName: 'GUARDIAN_NAME',
        labelled: [
            /\b(?:father['’]?s?|guardian['’]?s?|father\/guardian)\s*name\s*[:\-]\s*(.+)$/i,
            /\b[SD]\/O\s*[:\-]?\s*(.+)$/i,
        ],
        cutAtComma: true,
    },
    {
        fieldName: 'EMPLOYEE_ID',
        labelled: [/\b(?:employee|emp|staff)\s*(?:id|code|no\.?|number)\s*[:\-#]?\s*([A-Z0-9][A-Z0-9\-\/]*)/i],
    },
    {
        fieldName: 'NAME',
        labelled: [
            /^(?:full|customer|employee|holder|candidate)?\s*name\s*[:\-]\s*(.+)$/i,
            /^account\s*holder(?:\s*name)?\s*[:\-]\s*(.+)$/i,
        ],
        cutAtComma: true,
    },
    {
        fieldName: 'EMPLOYMENT_START_DATE',
        labelled: [new RegExp(String.raw`\b(?:date\s*of\s*joining|joining\s*date|employed\s*since|start\s*date|doj|date\s*of\s*appointment)\s*[:\-]?\s*${DATE}`, 'i')],
    },
    {
        fieldName: 'EXPIRY_DATE',
        labelled: [new RegExp(String.raw`\b(?:valid\s*(?:until|till|upto|up\s*to|thru)|date\s*of\s*expiry|expiry(?:\s*date)?|expires(?:\s*on)?)\s*[:\-]?\s*${DATE}`, 'i')],
    },
    {
        fieldName: 'DATE_OF_BIRTH',
        labelled: [new RegExp(String.raw`\b(?:dob|d\.o\.b\.?|date\s*of\s*birth|birth\s*date|born(?:\s*on)?)\s*[:\-]?\s*${DATE}`, 'i')],
    },
    {
        fieldName: 'NATIONAL_ID',
        labelled: [/\b(?:aadhaar|aadhar|uid|national\s*id)(?:\s*(?:no\.?|number))?\s*[:\-]?\s*([\dOoIlSBZ][\dOoIlSBZ\s\-]{10,16}[\dOoIlSBZ])/i],
        unlabelled: /\b[2-9]\d{3}\s\d{4}\s\d{4}\b/,
    },
    {
        fieldName: 'TAX_ID',
        labelled: [/\b(?:pan|permanent\s*account\s*number|tax\s*id)(?:\s*(?:no\.?|number|card))?\s*[:\-]?\s*([A-Z0-9]{5}\s?[A-Z0-9]{4}\s?[A-Z0-9])\b/i],
        unlabelled: /\b[A-Z]{5}\d{4}[A-Z]\b/,
    },
    {
        fieldName: 'PHONE',
        labelled: [/\b(?:phone|mobile|mob|contact|tel)(?:\s*(?:no\.?|number))?\s*[:\-]\s*(\+?[\d\s()\-]{8,20}\d)/i],
        unlabelled: /(?:\+\d{1,3}[\s\-]?)?\b[6-9]\d{4}\s?\d{5}\b/,
    },
    {
        fieldName: 'EMAIL',
        labelled: [/\be-?mail(?:\s*id)?\s*[:\-]\s*(\S+@\S+)/i],
        unlabelled: /[\w.+\-]+@[\w\-]+(?:\.[\w\-]+)+/,
    },
    {
        fieldName: 'ADDRESS',
        labelled: [/^(?:permanent|residential|correspondence|communication)?\s*address\s*[:\-]\s*(.+)$/i],
    },
];

function cleanLine(line: string): string {
    // Markdown emphasis, headings and table pipes from OCR output
    return cleanWhitespace(line.replace(/[*#|>`]/g, ' '));
}

function tidyValue(value: string, cutAtComma: boolean): string {
    const cut = cutAtComma ? value.split(',')[0] : value;
    return cleanWhitespace(cut).replace(/[.;,]+$/, '');
}

/**
 * Pulls field candidates out of raw OCR text. Labelled lines
 * ("DOB: 12/03/1990") score higher than bare pattern matches, which are
 * only used for a field when no labelled line was found.
 */
export function extractFieldsFromText(text: string, sourceProvider: string): FieldCandidate[] {
    const lines = text.split(/\r?\n/).map(cleanLine).filter(line => line.length > 0);
    const candidates: FieldCandidate[] = [];
    const seen = new Set<string>();

    const add = (fieldName: FieldName, rawValue: string, confidence: number) => {
        const key = `${fieldName}:${rawValue.toLowerCase()}`;
        if (!rawValue || seen.has(key)) return;
        seen.add(key);
        candidates.push({ fieldName, rawValue, sourceProvider, confidence });
    };

    for (const line of lines) {
        for (const pattern of FIELD_PATTERNS) {
            const match = pattern.labelled.map(re => line.match(re)).find(m => m !== null);
            if (match) {
                add(pattern.fieldName, tidyValue(match[1], pattern.cutAtComma ?? false), LABELLED_CONFIDENCE);
                break;
            }
        }
    }

    const labelledFields = new Set(candidates.map(c => c.fieldName));
    const flat = lines.join('\n');
    for (const pattern of FIELD_PATTERNS) {
        if (!pattern.unlabelled || labelledFields.has(pattern.fieldName)) continue;
        const match = flat.match(pattern.unlabelled);
        if (match) add(pattern.fieldName, cleanWhitespace(match[0]), UNLABELLED_CONFIDENCE);
    }

    return candidates;
}
