import { PipelineErrorKind } from '../errors/PipelineErrors';
import { StageName } from './StageResult';

/**
 * Possible statuses for a ComicJob.
 */
export const COMIC_JOB_STATUSES = ['queued', 'processing', 'completed', 'failed'] as const;
export type ComicJobStatus = (typeof COMIC_JOB_STATUSES)[number];

export const ART_STYLES = ['cartoon', 'manga', 'realistic', 'noir', 'watercolor', 'superhero'] as const;
export type ArtStyle = (typeof ART_STYLES)[number];

export const TARGET_AUDIENCES = ['children', 'teen', 'general', 'adult'] as const;
export type TargetAudience = (typeof TARGET_AUDIENCES)[number];

export const OUTPUT_FORMATS = ['pdf', 'cbz', 'web', 'video'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Reference to an uploaded source document.
 */
export interface SourceDocument {
    originalName: string;
    mimeType: string;
    /** Where the upload was written on disk */
    path: string;
    sizeBytes: number;
}

/**
 * Input parameters for creating a new comic job.
 */
export interface ComicJobInput {
    /** Raw source text - optional if a document is provided */
    text?: string;
    /** Uploaded document - optional if text is provided */
    document?: SourceDocument;
    title: string;
    artStyle: ArtStyle;
    targetPages: number;
    targetAudience: TargetAudience;
    /** ISO language code for the generated comic */
    targetLanguage: string;
    outputFormats: OutputFormat[];
    /** Derived from outputFormats: true when 'video' was requested */
    includeVideo: boolean;
}

/**
 * A produced file for one output format.
 */
export interface ComicArtifact {
    format: OutputFormat;
    fileName: string;
    mimeType: string;
    /** Storage location, resolved through the artifact store */
    path: string;
    sizeBytes: number;
}

export type ComicJobResult = Partial<Record<OutputFormat, ComicArtifact>>;

export interface ComicMetadata {
    title: string;
    pageCount: number;
    panelCount: number;
    clipCount: number;
}

export interface ComicJobError {
    stage: StageName;
    kind: PipelineErrorKind;
    message: string;
}

/**
 * ComicJob represents the full state of one comic generation request.
 * Instances are never mutated; every change produces a new object.
 */
export interface ComicJob {
    readonly id: string;
    readonly status: ComicJobStatus;
    /** Fraction in [0, 1], exactly 1 only when completed */
    readonly progress: number;
    readonly currentStage: string;
    readonly message: string;
    readonly input: ComicJobInput;
    readonly result?: ComicJobResult;
    readonly metadata?: ComicMetadata;
    readonly error?: ComicJobError;
    readonly createdAt: Date;
    readonly updatedAt: Date;
    readonly completedAt?: Date;
}

/**
 * Fields a registry update may change. Identity, input and creation time are fixed.
 */
export type ComicJobPatch = Partial<
    Pick<ComicJob, 'status' | 'progress' | 'currentStage' | 'message' | 'result' | 'metadata' | 'error'>
>;

/**
 * Listing view of a job.
 */
export interface ComicJobSummary {
    id: string;
    status: ComicJobStatus;
    progress: number;
    currentStage: string;
    title: string;
    outputFormats: OutputFormat[];
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Raised when an update would break the job lifecycle.
 */
export class JobStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'JobStateError';
    }
}

const ALLOWED_TRANSITIONS: Record<ComicJobStatus, readonly ComicJobStatus[]> = {
    queued: ['queued', 'processing'],
    processing: ['processing', 'completed', 'failed'],
    completed: [],
    failed: [],
};

/**
 * Creates a new ComicJob in the queued state.
 */
export function createComicJob(id: string, input: ComicJobInput): ComicJob {
    if (!id.trim()) {
        throw new Error('ComicJob id cannot be empty');
    }

    const hasText = input.text !== undefined && input.text.trim().length > 0;
    if (!hasText && !input.document) {
        throw new Error('ComicJob requires either text or a document');
    }
    if (!Number.isInteger(input.targetPages) || input.targetPages < 1) {
        throw new Error('targetPages must be a positive integer');
    }
    if (input.outputFormats.length === 0) {
        throw new Error('At least one output format is required');
    }

    const now = new Date();
    return {
        id: id.trim(),
        status: 'queued',
        progress: 0,
        currentStage: 'Queued',
        message: 'Comic generation queued',
        input: {
            ...input,
            outputFormats: [...new Set(input.outputFormats)],
            includeVideo: input.outputFormats.includes('video'),
        },
        createdAt: now,
        updatedAt: now,
    };
}

/**
 * Checks if a job is in a terminal state.
 */
export function isJobTerminal(job: ComicJob): boolean {
    return isTerminalStatus(job.status);
}

/**
 * Applies a patch, returning a new job. Throws JobStateError if the patch breaks the lifecycle.
 */
export function applyJobPatch(job: ComicJob, patch: ComicJobPatch): ComicJob {
    if (isJobTerminal(job)) {
        throw new JobStateError(`Job ${job.id} is ${job.status} and can no longer change`);
    }

    const status = patch.status ?? job.status;
    if (!ALLOWED_TRANSITIONS[job.status].includes(status)) {
        throw new JobStateError(`Job ${job.id} cannot move from ${job.status} to ${status}`);
    }

    const progress = patch.progress ?? job.progress;
    if (progress < job.progress) {
        throw new JobStateError(`Job ${job.id} progress cannot decrease (${job.progress} -> ${progress})`);
    }
    if (progress < 0 || progress > 1) {
        throw new JobStateError(`Job ${job.id} progress must be within [0, 1]`);
    }
    if ((progress === 1) !== (status === 'completed')) {
        throw new JobStateError(`Job ${job.id} progress reaches 1 exactly when it completes`);
    }

    const result = patch.result ?? job.result;
    const error = patch.error ?? job.error;
    if (status === 'completed' && (!result || error)) {
        throw new JobStateError(`Job ${job.id} must carry a result and no error to complete`);
    }
    if (status === 'failed' && (!error || result)) {
        throw new JobStateError(`Job ${job.id} must carry an error and no result to fail`);
    }
    if (status !== 'completed' && result) {
        throw new JobStateError(`Job ${job.id} may only expose a result once completed`);
    }
    if (status !== 'failed' && error) {
        throw new JobStateError(`Job ${job.id} may only carry an error once failed`);
    }

    const now = new Date();
    return {
        ...job,
        ...patch,
        status,
        progress,
        updatedAt: now,
        completedAt: isTerminalStatus(status) ? now : job.completedAt,
    };
}

/**
 * Marks a queued job as processing.
 */
export function startJob(job: ComicJob): ComicJob {
    if (job.status !== 'queued') {
        throw new JobStateError(`Job ${job.id} must be queued to start, was ${job.status}`);
    }
    return applyJobPatch(job, {
        status: 'processing',
        message: 'Comic generation started',
    });
}

/**
 * Marks a job as completed with its artifacts.
 */
export function completeJob(job: ComicJob, result: ComicJobResult, metadata: ComicMetadata): ComicJob {
    return applyJobPatch(job, {
        status: 'completed',
        progress: 1,
        currentStage: 'Complete',
        message: `Comic ready: ${metadata.pageCount} page(s), ${metadata.panelCount} panel(s)`,
        result,
        metadata,
    });
}

/**
 * Marks a job as failed with a classified error.
 */
export function failJob(job: ComicJob, error: ComicJobError): ComicJob {
    return applyJobPatch(job, {
        status: 'failed',
        currentStage: 'Failed',
        message: `${error.stage} stage failed: ${error.message}`,
        error,
    });
}

export function toJobSummary(job: ComicJob): ComicJobSummary {
    return {
        id: job.id,
        status: job.status,
        progress: job.progress,
        currentStage: job.currentStage,
        title: job.input.title,
        outputFormats: job.input.outputFormats,
        createdAt: job.createdAt,
        updatedAt: job.updatedAt,
    };
}

function isTerminalStatus(status: ComicJobStatus): boolean {
    return status === 'completed' || status === 'failed';
}
