import express from 'express';
import multer from 'multer';
import { z } from 'zod';
import { env } from '../config/env';
import { processBatch, type DocumentExtractor } from '../engine/ingestion_pipeline';
import { verifyPerson } from '../engine/verification_engine';
import { requireAuth } from '../middleware/auth_middleware';
import { jobService } from '../services/job_service';
import type { PersonUpload } from '../types/extraction_types';
import {
    DOCUMENT_TYPES,
    FIELD_NAMES,
    PROCESSING_STATUSES,
    type VerificationDocument,
} from '../types/verification_types';
import { errorMessage } from '../utils/errors';
import { parseUploadName } from '../utils/file_naming';

const MAX_FILES = 30;
const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 20 * 1024 * 1024, files: MAX_FILES } });

const candidateSchema = z.object({
    fieldName: z.enum(FIELD_NAMES),
    rawValue: z.string(),
    sourceProvider: z.string().min(1).default('client'),
    confidence: z.number().min(0).max(1),
});

const documentSchema = z.object({
    documentId: z.string().min(1),
    personId: z.string().min(1).optional(),
    documentType: z.enum(DOCUMENT_TYPES),
    rawText: z.string().default(''),
    fieldCandidates: z.array(candidateSchema).default([]),
    processingStatus: z.enum(PROCESSING_STATUSES).default('EXTRACTED'),
    failureReason: z.string().optional(),
});

export const verifyRequestSchema = z.object({
    personId: z.string().min(1),
    documents: z.array(documentSchema).min(1),
    now: z.string().datetime().optional(),
});

export type VerifyRequest = z.infer<typeof verifyRequestSchema>;

/** Documents without an explicit owner belong to the person being verified. */
export function toVerificationDocuments(request: VerifyRequest): VerificationDocument[] {
    return request.documents.map(doc => ({
        documentId: doc.documentId,
        personId: doc.personId ?? request.personId,
        documentType: doc.documentType,
        rawText: doc.rawText,
        fieldCandidates: doc.fieldCandidates,
        processingStatus: doc.processingStatus,
        failureReason: doc.failureReason,
    }));
}

/**
 * Groups uploaded files by the person prefix of their names. Files that do
 * not follow `<personId>_<document_type>.<ext>` are returned as rejected;
 * a file name sent twice is returned as a duplicate. The full file name,
 * extension included, is the document id.
 */
export function groupUploads(files: readonly { originalname: string; buffer: Buffer }[]): {
    persons: PersonUpload[];
    rejected: string[];
    duplicates: string[];
} {
    const byPerson = new Map<string, PersonUpload>();
    const seen = new Set<string>();
    const rejected: string[] = [];
    const duplicates: string[] = [];

    for (const file of files) {
        const parsed = parseUploadName(file.originalname);
        if (!parsed) {
            rejected.push(file.originalname);
            continue;
        }
        if (seen.has(file.originalname)) {
            duplicates.push(file.originalname);
            continue;
        }
        seen.add(file.originalname);

        const person = byPerson.get(parsed.personId) ?? { personId: parsed.personId, documents: [] };
        person.documents.push({
            documentId: file.originalname,
            documentType: parsed.documentType,
            fileName: file.originalname,
            bytes: file.buffer,
        });
        byPerson.set(parsed.personId, person);
    }

    return { persons: Array.from(byPerson.values()), rejected, duplicates };
}

export function createVerificationRouter(extractor: DocumentExtractor) {
    const router = express.Router();

    // Verifies pre-extracted candidates synchronously
    router.post('/verify', requireAuth, (req, res) => {
        const parsed = verifyRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: 'Invalid verification request', issues: parsed.error.issues });
        }

        try {
            const now = parsed.data.now ? new Date(parsed.data.now) : undefined;
            const report = verifyPerson(parsed.data.personId, toVerificationDocuments(parsed.data), { now });
            return res.json(report);
        } catch (error) {
            console.error('[Verification] Verify Error:', error);
            return res.status(500).json({ error: errorMessage(error) });
        }
    });

    // Scanned documents run through the extraction chain in the background
    router.post('/upload', requireAuth, upload.array('files', MAX_FILES), (req, res) => {
        const files = Array.isArray(req.files) ? req.files : [];
        if (files.length === 0) {
            return res.status(400).json({ error: "No documents uploaded in 'files' field." });
        }

        const { persons, rejected, duplicates } = groupUploads(files);
        if (rejected.length > 0) {
            return res.status(400).json({
                error: 'File names must look like <personId>_<government_id|bank_statement|employment_letter>.<ext>',
                rejected,
            });
        }

        if (duplicates.length > 0) {
            return res.status(400).json({ error: 'Each file name may only be uploaded once per request.', duplicates });
        }

        console.log(`[Verification] Received ${files.length} file(s) for ${persons.length} person(s).`);
        const job = jobService.createJob('VERIFICATION_BATCH', {
            persons: persons.map(p => p.personId),
            files: files.map(f => f.originalname),
        });

        jobService.runJob(job.id, async () => {
            const reports = await processBatch(persons, extractor, { concurrency: env.WORKER_CONCURRENCY });
            return reports.map(r => ({ personId: r.personId, overallStatus: r.overallStatus }));
        }).catch(err => {
            console.error(`[Verification] Background batch failed for job ${job.id}:`, err);
        });

        return res.status(202).json({ jobId: job.id });
    });

    return router;
}
