import type { SupabaseClient } from '@supabase/supabase-js';
import fs from 'fs';
import path from 'path';
import { env } from '../config/env';
import { verificationEmitter } from '../events/verification_events';
import type { PersonVerificationReport } from '../types/verification_types';
import { errorMessage } from '../utils/errors';
import { supabase } from './supabase';

export interface ReportStorageAdapter {
    save(report: PersonVerificationReport): Promise<void>;
    load(personId: string): Promise<PersonVerificationReport | null>;
    list(): Promise<string[]>;
}

const REPORT_TABLE = 'verification_reports';

// Reports are stored exactly as serialized; readers get the JSON back
function isReport(value: unknown): value is PersonVerificationReport {
    return typeof value === 'object' && value !== null
        && 'personId' in value && typeof value.personId === 'string'
        && 'overallStatus' in value && typeof value.overallStatus === 'string'
        && 'outcomes' in value && Array.isArray(value.outcomes);
}

// 1. Supabase Adapter (Production)
export class SupabaseReportAdapter implements ReportStorageAdapter {
    constructor(private readonly client: SupabaseClient) { }

    async save(report: PersonVerificationReport): Promise<void> {
        const { error } = await this.client
            .from(REPORT_TABLE)
            .upsert({
                person_id: report.personId,
                overall_status: report.overallStatus,
                evaluated_at: report.evaluatedAt,
                report,
            }, { onConflict: 'person_id' });

        if (error) throw new Error(error.message);
    }

    async load(personId: string): Promise<PersonVerificationReport | null> {
        const { data, error } = await this.client
            .from(REPORT_TABLE)
            .select('report')
            .eq('person_id', personId)
            .maybeSingle();

        if (error) throw new Error(error.message);
        const report: unknown = data?.report;
        return isReport(report) ? report : null;
    }

    async list(): Promise<string[]> {
        const { data, error } = await this.client
            .from(REPORT_TABLE)
            .select('person_id')
            .order('person_id');

        if (error) throw new Error(error.message);
        return (data ?? []).map(row => String(row.person_id));
    }
}

// 2. Local Adapter (Fallback/Dev)
export class LocalReportAdapter implements ReportStorageAdapter {
    constructor(private readonly basePath: string) { }

    private fileFor(personId: string): string {
        // personIds come from file names and request bodies; keep them inside basePath
        return path.join(this.basePath, `${encodeURIComponent(personId)}.json`);
    }

    async save(report: PersonVerificationReport): Promise<void> {
        await fs.promises.mkdir(this.basePath, { recursive: true });
        await fs.promises.writeFile(this.fileFor(report.personId), JSON.stringify(report, null, 2));
    }

    async load(personId: string): Promise<PersonVerificationReport | null> {
        const filePath = this.fileFor(personId);
        if (!fs.existsSync(filePath)) return null;
        const parsed: unknown = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
        return isReport(parsed) ? parsed : null;
    }

    async list(): Promise<string[]> {
        if (!fs.existsSync(this.basePath)) return [];
        const files = await fs.promises.readdir(this.basePath);
        return files
            .filter(f => f.endsWith('.json'))
            .map(f => decodeURIComponent(f.slice(0, -'.json'.length)))
            .sort();
    }
}

export class ReportStore {
    constructor(private readonly adapter: ReportStorageAdapter) { }

    async save(report: PersonVerificationReport): Promise<void> {
        await this.adapter.save(report);
        console.log(`[ReportStore] Stored report for ${report.personId} (${report.overallStatus})`);
    }

    async get(personId: string): Promise<PersonVerificationReport | null> {
        return this.adapter.load(personId);
    }

    async list(): Promise<string[]> {
        return this.adapter.list();
    }

    /**
     * Write-through: persists every report as it is created. Failures are
     * logged and never reach the verification path. Returns the unsubscribe.
     */
    attach(): () => void {
        return verificationEmitter.subscribe('report.created', report => {
            this.save(report).catch(err => {
                console.error(`[ReportStore] Failed to store report for ${report.personId}: ${errorMessage(err)}`);
            });
        });
    }
}

export function createReportStore(): ReportStore {
    if (supabase) {
        console.log("[ReportStore] Using Supabase table " + REPORT_TABLE);
        return new ReportStore(new SupabaseReportAdapter(supabase));
    }
    const basePath = path.resolve(process.cwd(), env.REPORT_DIR);
    console.log(`[ReportStore] Using local directory ${basePath}`);
    return new ReportStore(new LocalReportAdapter(basePath));
}
