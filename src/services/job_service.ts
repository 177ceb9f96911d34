import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../utils/errors';

export type JobStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface Job {
    id: string;
    type: string;
    status: JobStatus;
    payload: Record<string, unknown>;
    result?: unknown;
    error?: string;
    createdAt: string;
    updatedAt: string;
}

export class JobService {
    private jobs: Map<string, Job> = new Map();

    public createJob(type: string, payload: Record<string, unknown>): Job {
        const job: Job = {
            id: uuidv4(),
            type,
            status: 'PENDING',
            payload,
            createdAt: new Date().toISOString(),
            updatedAt: new Date().toISOString()
        };
        this.jobs.set(job.id, job);
        console.log(`[Jobs] Created ${type} job ${job.id}`);
        return job;
    }

    /** Never rejects: a failing task leaves the job FAILED with its message. */
    public async runJob(jobId: string, task: () => Promise<unknown>): Promise<void> {
        const job = this.jobs.get(jobId);
        if (!job) return;

        job.status = 'RUNNING';
        job.updatedAt = new Date().toISOString();

        try {
            const result = await task();
            job.status = 'COMPLETED';
            job.result = result;
        } catch (err) {
            job.status = 'FAILED';
            job.error = errorMessage(err) || 'Unknown error';
            console.error(`[Jobs] Job ${jobId} failed:`, job.error);
        } finally {
            job.updatedAt = new Date().toISOString();
        }
    }

    public getJob(jobId: string): Job | undefined {
        return this.jobs.get(jobId);
    }

    public listJobs(): Job[] {
        return Array.from(this.jobs.values());
    }
}

export const jobService = new JobService();
