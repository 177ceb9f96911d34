import { describe, it, expect } from 'vitest';
import { documentTypeFromFileName, fileStem, parseUploadName } from '../src/utils/file_naming';
import { groupUploads, toVerificationDocuments, verifyRequestSchema } from '../src/routes/verification';

describe('file naming', () => {
    it('strips directory and extension', () => {
        expect(fileStem('/uploads/P001/government_id.JPG')).toBe('government_id');
    });

    it('reads the document type from the end of the stem', () => {
        expect(documentTypeFromFileName('scan_bank_statement.png')).toBe('BANK_STATEMENT');
        expect(documentTypeFromFileName('Employment_Letter.pdf')).toBe('EMPLOYMENT_LETTER');
        expect(documentTypeFromFileName('passport.pdf')).toBeNull();
    });

    it('splits upload names into person and document type', () => {
        expect(parseUploadName('P001_government_id.jpg')).toEqual({ personId: 'P001', documentType: 'GOVERNMENT_ID' });
        expect(parseUploadName('P_01_bank_statement.PDF')).toEqual({ personId: 'P_01', documentType: 'BANK_STATEMENT' });
        expect(parseUploadName('government_id.jpg')).toBeNull();
    });
});

describe('groupUploads', () => {
    it('groups files by person and reports names it cannot place', () => {
        const bytes = Buffer.from('%PDF-1.4');
        const { persons, rejected, duplicates } = groupUploads([
            { originalname: 'P1_government_id.pdf', buffer: bytes },
            { originalname: 'P2_bank_statement.pdf', buffer: bytes },
            { originalname: 'P1_employment_letter.pdf', buffer: bytes },
            { originalname: 'selfie.jpg', buffer: bytes },
        ]);

        expect(persons.map(p => [p.personId, p.documents.map(d => d.documentId)])).toEqual([
            ['P1', ['P1_government_id.pdf', 'P1_employment_letter.pdf']],
            ['P2', ['P2_bank_statement.pdf']],
        ]);
        expect(rejected).toEqual(['selfie.jpg']);
        expect(duplicates).toEqual([]);
    });

    it('keeps same-stem files with different extensions apart', () => {
        const { persons } = groupUploads([
            { originalname: 'P1_government_id.jpg', buffer: Buffer.from('front') },
            { originalname: 'P1_government_id.pdf', buffer: Buffer.from('%PDF-1.4') },
        ]);

        expect(persons).toHaveLength(1);
        expect(persons[0].documents.map(d => d.documentId)).toEqual(['P1_government_id.jpg', 'P1_government_id.pdf']);
    });

    it('reports a file name sent twice', () => {
        const { persons, duplicates } = groupUploads([
            { originalname: 'P1_government_id.jpg', buffer: Buffer.from('a') },
            { originalname: 'P1_government_id.jpg', buffer: Buffer.from('b') },
        ]);

        expect(persons[0].documents).toHaveLength(1);
        expect(duplicates).toEqual(['P1_government_id.jpg']);
    });
});

describe('verify request', () => {
    it('applies defaults and assigns unowned documents to the person', () => {
        const request = verifyRequestSchema.parse({
            personId: 'P1',
            documents: [
                {
                    documentId: 'P1-id',
                    documentType: 'GOVERNMENT_ID',
                    fieldCandidates: [{ fieldName: 'NAME', rawValue: 'Ravi Kumar', confidence: 0.9 }],
                },
                { documentId: 'P2-bank', personId: 'P2', documentType: 'BANK_STATEMENT' },
            ],
        });

        expect(toVerificationDocuments(request)).toEqual([
            {
                documentId: 'P1-id',
                personId: 'P1',
                documentType: 'GOVERNMENT_ID',
                rawText: '',
                fieldCandidates: [{ fieldName: 'NAME', rawValue: 'Ravi Kumar', sourceProvider: 'client', confidence: 0.9 }],
                processingStatus: 'EXTRACTED',
                failureReason: undefined,
            },
            {
                documentId: 'P2-bank',
                personId: 'P2',
                documentType: 'BANK_STATEMENT',
                rawText: '',
                fieldCandidates: [],
                processingStatus: 'EXTRACTED',
                failureReason: undefined,
            },
        ]);
    });

    it('rejects unknown document types and field names', () => {
        const result = verifyRequestSchema.safeParse({
            personId: 'P1',
            documents: [{
                documentId: 'x',
                documentType: 'PASSPORT',
                fieldCandidates: [{ fieldName: 'SHOE_SIZE', rawValue: '9', confidence: 0.5 }],
            }],
        });

        expect(result.success).toBe(false);
    });
});
