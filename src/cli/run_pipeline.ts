#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { env } from '../config/env';
import { createExtractionChain } from '../engine/extraction/extraction_chain';
import { processBatch } from '../engine/ingestion_pipeline';
import { getDefaultCatalogue } from '../engine/verification_engine';
import type { PersonUpload } from '../types/extraction_types';
import { errorMessage } from '../utils/errors';
import { documentTypeFromFileName } from '../utils/file_naming';

/**
 * Each sub-folder of `inputDir` is one person; files whose stem ends with a
 * document type slug ("..._bank_statement.png") are that person's documents.
 */
export function collectPersons(inputDir: string): PersonUpload[] {
    const persons: PersonUpload[] = [];

    const entries = fs.readdirSync(inputDir, { withFileTypes: true })
        .filter(entry => entry.isDirectory())
        .sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
        const personDir = path.join(inputDir, entry.name);
        const person: PersonUpload = { personId: entry.name, documents: [] };

        for (const fileName of fs.readdirSync(personDir).sort()) {
            const filePath = path.join(personDir, fileName);
            const documentType = documentTypeFromFileName(fileName);
            if (!documentType || !fs.statSync(filePath).isFile()) continue;
            person.documents.push({
                documentId: `${entry.name}-${fileName}`,
                documentType,
                fileName,
                bytes: fs.readFileSync(filePath),
            });
        }

        if (person.documents.length === 0) {
            console.warn(`[Pipeline] No recognizable documents for ${entry.name}, skipping.`);
            continue;
        }
        persons.push(person);
    }
    return persons;
}

async function runPipeline() {
    const { values } = parseArgs({
        options: {
            input: { type: 'string', short: 'i' },
            output: { type: 'string', short: 'o' },
        },
    });

    if (!values.input || !values.output) {
        console.error('Usage: run_pipeline --input <folder> --output <reports.json>');
        process.exitCode = 1;
        return;
    }

    const catalogue = getDefaultCatalogue();
    const persons = collectPersons(path.resolve(values.input));
    console.log(`[Pipeline] Found ${persons.length} person(s) in ${values.input}`);

    const reports = await processBatch(persons, createExtractionChain(env), {
        concurrency: env.WORKER_CONCURRENCY,
        catalogue,
    });

    const outputPath = path.resolve(values.output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, JSON.stringify(reports, null, 2));

    const count = (status: string) => reports.filter(r => r.overallStatus === status).length;
    console.log("\n--- Pipeline Results ---");
    console.log(`Verified: ${count('VERIFIED')}  Rejected: ${count('REJECTED')}  Incomplete: ${count('INCOMPLETE')}`);
    console.log(`Reports saved to: ${outputPath}`);
}

if (require.main === module) {
    runPipeline().catch(err => {
        console.error('[Pipeline] Failed:', errorMessage(err));
        process.exitCode = 1;
    });
}
