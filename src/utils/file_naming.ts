import path from 'path';
import { DOCUMENT_TYPES, type DocumentType } from '../types/verification_types';

const SLUG_TO_TYPE: Record<string, DocumentType> = Object.fromEntries(
    DOCUMENT_TYPES.map((type): [string, DocumentType] => [type.toLowerCase(), type])
);

const SLUG_PATTERN = DOCUMENT_TYPES.map(t => t.toLowerCase()).join('|');
const STEM_SUFFIX = new RegExp(`(?:^|[_\\-\\s])(${SLUG_PATTERN})$`, 'i');
const UPLOAD_NAME = new RegExp(`^(.+?)_(${SLUG_PATTERN})$`, 'i');

export function fileStem(fileName: string): string {
    return path.basename(fileName, path.extname(fileName));
}

/** "scan_bank_statement.png" -> BANK_STATEMENT; null when no slug ends the stem. */
export function documentTypeFromFileName(fileName: string): DocumentType | null {
    const match = fileStem(fileName).match(STEM_SUFFIX);
    return match ? SLUG_TO_TYPE[match[1].toLowerCase()] ?? null : null;
}

/** "P001_government_id.jpg" -> { personId: "P001", documentType: GOVERNMENT_ID }. */
export function parseUploadName(fileName: string): { personId: string; documentType: DocumentType } | null {
    const match = fileStem(fileName).match(UPLOAD_NAME);
    if (!match) return null;
    const documentType = SLUG_TO_TYPE[match[2].toLowerCase()];
    return documentType ? { personId: match[1], documentType } : null;
}
