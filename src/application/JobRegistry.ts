import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
    ART_STYLES,
    COMIC_JOB_STATUSES,
    ComicJob,
    ComicJobError,
    ComicJobInput,
    ComicJobPatch,
    ComicJobResult,
    ComicJobStatus,
    ComicJobSummary,
    ComicMetadata,
    OUTPUT_FORMATS,
    TARGET_AUDIENCES,
    applyJobPatch,
    completeJob,
    createComicJob,
    failJob,
    startJob,
    toJobSummary,
} from '../domain/entities/ComicJob';
import { STAGE_NAMES } from '../domain/entities/StageResult';
import { PIPELINE_ERROR_KINDS } from '../domain/errors/PipelineErrors';

export interface JobRegistryOptions {
    /** JSON file the registry mirrors to; in-memory only when omitted */
    persistencePath?: string;
}

const ArtifactSnapshot = z.object({
    format: z.enum(OUTPUT_FORMATS),
    fileName: z.string(),
    mimeType: z.string(),
    path: z.string(),
    sizeBytes: z.number(),
});

const JobSnapshot = z.object({
    id: z.string(),
    status: z.enum(COMIC_JOB_STATUSES),
    progress: z.number().min(0).max(1),
    currentStage: z.string(),
    message: z.string(),
    input: z.object({
        text: z.string().optional(),
        document: z
            .object({
                originalName: z.string(),
                mimeType: z.string(),
                path: z.string(),
                sizeBytes: z.number(),
            })
            .optional(),
        title: z.string(),
        artStyle: z.enum(ART_STYLES),
        targetPages: z.number().int().positive(),
        targetAudience: z.enum(TARGET_AUDIENCES),
        targetLanguage: z.string(),
        outputFormats: z.array(z.enum(OUTPUT_FORMATS)).min(1),
        includeVideo: z.boolean(),
    }),
    result: z
        .object({
            pdf: ArtifactSnapshot.optional(),
            cbz: ArtifactSnapshot.optional(),
            web: ArtifactSnapshot.optional(),
            video: ArtifactSnapshot.optional(),
        })
        .optional(),
    metadata: z
        .object({
            title: z.string(),
            pageCount: z.number(),
            panelCount: z.number(),
            clipCount: z.number(),
        })
        .optional(),
    error: z
        .object({
            stage: z.enum(STAGE_NAMES),
            kind: z.enum(PIPELINE_ERROR_KINDS),
            message: z.string(),
        })
        .optional(),
    createdAt: z.coerce.date(),
    updatedAt: z.coerce.date(),
    completedAt: z.coerce.date().optional(),
});

/**
 * JobRegistry owns every ComicJob.
 * Jobs are immutable values; each change replaces the stored object in one step,
 * so readers see either the old or the new job, never a mix.
 */
export class JobRegistry {
    private jobs: Map<string, ComicJob> = new Map();
    private readonly persistencePath?: string;

    constructor(options: JobRegistryOptions = {}) {
        this.persistencePath = options.persistencePath ? path.resolve(options.persistencePath) : undefined;
        if (this.persistencePath) {
            this.ensureDataDir(this.persistencePath);
            this.loadFromDisk(this.persistencePath);
        }
    }

    /**
     * Creates a new queued job.
     */
    create(input: ComicJobInput): ComicJob {
        const id = this.nextId();
        const job = createComicJob(id, input);
        this.jobs.set(id, job);
        this.saveToDisk();
        return job;
    }

    /**
     * Gets a job by ID.
     */
    get(id: string): ComicJob | null {
        return this.jobs.get(id) ?? null;
    }

    /**
     * Applies a patch through the lifecycle rules.
     * Returns null if the job no longer exists; throws JobStateError on an illegal change.
     */
    update(id: string, patch: ComicJobPatch): ComicJob | null {
        return this.replace(id, (job) => applyJobPatch(job, patch));
    }

    /**
     * Claims a queued job for processing.
     */
    start(id: string): ComicJob | null {
        return this.replace(id, startJob);
    }

    complete(id: string, result: ComicJobResult, metadata: ComicMetadata): ComicJob | null {
        return this.replace(id, (job) => completeJob(job, result, metadata));
    }

    fail(id: string, error: ComicJobError): ComicJob | null {
        return this.replace(id, (job) => failJob(job, error));
    }

    /**
     * Lists job summaries, newest first.
     */
    list(): ComicJobSummary[] {
        return Array.from(this.jobs.values())
            .reverse()
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .map(toJobSummary);
    }

    /**
     * Gets jobs by status, oldest first.
     */
    listByStatus(status: ComicJobStatus): ComicJob[] {
        return Array.from(this.jobs.values()).filter((job) => job.status === status);
    }

    /**
     * Removes a job. Returns false if it did not exist.
     */
    delete(id: string): boolean {
        const existed = this.jobs.delete(id);
        if (existed) {
            this.saveToDisk();
        }
        return existed;
    }

    get size(): number {
        return this.jobs.size;
    }

    private replace(id: string, change: (job: ComicJob) => ComicJob): ComicJob | null {
        const job = this.jobs.get(id);
        if (!job) {
            return null;
        }
        const updated = change(job);
        this.jobs.set(id, updated);
        this.saveToDisk();
        return updated;
    }

    private nextId(): string {
        let id = `job_${uuidv4().substring(0, 8)}`;
        while (this.jobs.has(id)) {
            id = `job_${uuidv4().substring(0, 8)}`;
        }
        return id;
    }

    private ensureDataDir(filePath: string): void {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    private loadFromDisk(filePath: string): void {
        if (!fs.existsSync(filePath)) {
            return;
        }

        try {
            const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
            const entries = z.record(z.unknown()).parse(parsed);
            for (const [id, raw] of Object.entries(entries)) {
                const snapshot = JobSnapshot.safeParse(raw);
                if (!snapshot.success) {
                    console.warn(`[JobRegistry] Skipping unreadable job ${id}: ${snapshot.error.issues[0]?.message}`);
                    continue;
                }
                this.jobs.set(snapshot.data.id, snapshot.data);
            }
            console.log(`[JobRegistry] Loaded ${this.jobs.size} jobs from disk`);
        } catch (error) {
            console.error('[JobRegistry] Failed to load jobs from disk:', error);
        }
    }

    private saveToDisk(): void {
        if (!this.persistencePath) {
            return;
        }
        try {
            const data = Object.fromEntries(this.jobs);
            fs.writeFileSync(this.persistencePath, JSON.stringify(data, null, 2));
        } catch (error) {
            console.error('[JobRegistry] Failed to save jobs to disk:', error);
        }
    }
}
