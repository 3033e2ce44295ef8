/**
 * Pipeline infrastructure shared by the comic stages.
 * Each step has a single responsibility and returns one typed StageResult.
 */

import { ComicJobInput } from '../../domain/entities/ComicJob';
import { StageName, StageResult } from '../../domain/entities/StageResult';
import { GenerationError, PipelineError } from '../../domain/errors/PipelineErrors';

/**
 * Stage results keyed by the stage that produced them.
 */
export type StageResultMap = { [R in StageResult as R['stage']]: R };
export type StageResults = { [K in StageName]?: StageResultMap[K] };

/**
 * StageContext carries the job input and every result produced so far.
 * Immutable pattern: the orchestrator builds a new context after each stage.
 */
export interface StageContext {
    readonly jobId: string;
    readonly input: ComicJobInput;
    readonly results: Readonly<StageResults>;
}

/**
 * Lets a running stage publish detail and intermediate progress.
 */
export interface StageReporter {
    /** Replaces the job's message without moving progress */
    message(text: string): void;
    /** Moves progress within the stage's span; `done` of `total` units finished */
    progress(done: number, total: number, text?: string): void;
    /** True once the job has been deleted underneath the run */
    readonly cancelled: boolean;
}

/**
 * Pipeline step interface.
 * Each step has exactly one responsibility.
 */
export interface PipelineStep {
    readonly name: StageName;
    /** Human label shown as the job's current stage */
    readonly label: string;
    execute(context: StageContext, reporter: StageReporter): Promise<StageResult>;
    shouldSkip?(context: StageContext): boolean;
}

/**
 * Thrown inside a stage when the job was deleted while the stage was running.
 */
export class JobCancelledError extends Error {
    constructor(jobId: string) {
        super(`Job ${jobId} was deleted`);
        this.name = 'JobCancelledError';
    }
}

/**
 * Throws JobCancelledError if the job is gone.
 */
export function throwIfCancelled(context: StageContext, reporter: StageReporter): void {
    if (reporter.cancelled) {
        throw new JobCancelledError(context.jobId);
    }
}

/**
 * Creates the initial context for a job.
 */
export function createStageContext(jobId: string, input: ComicJobInput): StageContext {
    return { jobId, input, results: {} };
}

/**
 * Returns a new context with the result recorded under its stage.
 */
export function withResult(context: StageContext, result: StageResult): StageContext {
    return { ...context, results: { ...context.results, ...keyedResult(result) } };
}

/**
 * Reads an earlier stage's result, failing the current stage if it is absent.
 */
export function requireStageResult<K extends StageName>(
    context: StageContext,
    stage: K,
    ErrorType: new (message: string) => PipelineError = GenerationError
): StageResultMap[K] {
    const result = context.results[stage];
    if (!result) {
        throw new ErrorType(`The ${stage} stage result is missing`);
    }
    return result;
}

/**
 * A reporter that ignores everything. Used by callers outside a job run.
 */
export const silentReporter: StageReporter = {
    message: () => { },
    progress: () => { },
    cancelled: false,
};

function keyedResult(result: StageResult): StageResults {
    switch (result.stage) {
        case 'ingest':
            return { ingest: result };
        case 'story':
            return { story: result };
        case 'script':
            return { script: result };
        case 'text':
            return { text: result };
        case 'visual':
            return { visual: result };
        case 'video':
            return { video: result };
        case 'assembly':
            return { assembly: result };
    }
}
