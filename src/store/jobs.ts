import type { JobResult, JobStatus } from "../types";
import type { LogChannel } from "../jobs/channel";

export interface JobRecord {
    id: string;
    fileName: string;
    status: JobStatus;
    channel: LogChannel;
    createdAt: Date;
    finishedAt: Date | null;
    result: JobResult | null;
    error: string | null;
    /** Resolves once the job is done or failed */
    settled: Promise<void>;
}

export interface JobRegistryOptions {
    /** Maximum number of jobs kept; finished jobs are evicted first */
    capacity: number;
    /** How long a finished job stays available, in milliseconds */
    ttlMs: number;
    /** Interval of the background expiry sweep, in milliseconds */
    sweepIntervalMs?: number;
}

const isFinished = (job: JobRecord): boolean => job.status === 'done' || job.status === 'failed';

/**
 * In-memory job registry with bounded size
 *
 * Features:
 * - Insert-once per id, read-many
 * - Finished jobs expire ttlMs after completion (checked on access and by a periodic sweep)
 * - Over capacity, the oldest finished jobs are evicted; running jobs are never evicted
 *
 * Note: state is lost on restart. Results are not durable.
 */
export class JobRegistry {
    private jobs: Map<string, JobRecord> = new Map();
    private readonly capacity: number;
    private readonly ttlMs: number;

    constructor(options: JobRegistryOptions) {
        this.capacity = options.capacity;
        this.ttlMs = options.ttlMs;

        setInterval(() => this.sweep(), options.sweepIntervalMs ?? 60000).unref(); // don't hold process open
    }

    get size(): number {
        return this.jobs.size;
    }

    /**
     * Register a new job
     *
     * @throws {Error} when the id is already taken
     */
    insert(job: JobRecord) {
        if (this.jobs.has(job.id)) {
            throw new Error(`Job ${job.id} already registered`);
        }
        this.jobs.set(job.id, job);
        this.evictOverflow();
    }

    /**
     * Get a job by id
     *
     * @returns the job, or undefined when unknown or expired
     */
    get(id: string): JobRecord | undefined {
        const job = this.jobs.get(id);
        if (!job) return undefined;

        if (this.isExpired(job, Date.now())) {
            this.jobs.delete(id);
            return undefined;
        }
        return job;
    }

    /**
     * Remove every expired job
     *
     * @returns number of jobs removed
     */
    sweep(now: number = Date.now()): number {
        let removed = 0;
        for (const [id, job] of this.jobs.entries()) {
            if (this.isExpired(job, now)) {
                this.jobs.delete(id);
                removed++;
            }
        }
        return removed;
    }

    private isExpired(job: JobRecord, now: number): boolean {
        return job.finishedAt !== null && job.finishedAt.getTime() + this.ttlMs <= now;
    }

    private evictOverflow() {
        if (this.jobs.size <= this.capacity) return;

        // Map iteration follows insertion order, oldest first
        for (const [id, job] of this.jobs.entries()) {
            if (this.jobs.size <= this.capacity) break;
            if (isFinished(job)) this.jobs.delete(id);
        }
    }
}
