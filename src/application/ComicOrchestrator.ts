import { ComicJobResult, ComicMetadata } from '../domain/entities/ComicJob';
import { AssemblyResult, StageName } from '../domain/entities/StageResult';
import { AssemblyError, classifyError } from '../domain/errors/PipelineErrors';
import { IArtifactStore } from '../domain/ports/IArtifactStore';
import { JobRegistry } from './JobRegistry';
import {
    JobCancelledError,
    PipelineStep,
    StageContext,
    createStageContext,
    withResult,
} from './pipelines/PipelineInfrastructure';
import { progressMilestone, progressSpan } from './pipelines/ProgressWeights';
import { JobProgressReporter } from './pipelines/JobProgressReporter';

export interface OrchestratorDependencies {
    registry: JobRegistry;
    artifactStore: IArtifactStore;
    steps: PipelineStep[];
}

type RunOutcome = 'completed' | 'failed' | 'abandoned';

/**
 * ComicOrchestrator runs the stage sequence for one job at a time.
 * All of its effects are registry updates; a stage failure ends the job without retries.
 */
export class ComicOrchestrator {
    constructor(private readonly deps: OrchestratorDependencies) { }

    /**
     * Runs a queued job to completion or failure. Never rejects.
     */
    async run(jobId: string): Promise<void> {
        const { registry } = this.deps;
        const job = registry.get(jobId);
        if (!job) {
            console.warn(`[Orchestrator] Job ${jobId} not found, nothing to run`);
            return;
        }
        if (job.status !== 'queued') {
            console.warn(`[Orchestrator] Job ${jobId} is ${job.status}, only queued jobs can run`);
            return;
        }

        registry.start(jobId);
        const startedAt = Date.now();
        console.log(`[${jobId}] Starting comic pipeline (${job.input.outputFormats.join(', ')})`);

        const outcome = await this.runStages(jobId, createStageContext(jobId, job.input));
        console.log(`[${jobId}] Pipeline ${outcome} after ${((Date.now() - startedAt) / 1000).toFixed(1)}s`);
    }

    private async runStages(jobId: string, initial: StageContext): Promise<RunOutcome> {
        const { registry } = this.deps;
        const includeVideo = initial.input.includeVideo;
        let context = initial;
        let currentStage: StageName = 'ingest';

        try {
            for (const step of this.deps.steps) {
                if (step.shouldSkip?.(context)) {
                    console.log(`[Pipeline] Skipping ${step.name}`);
                    continue;
                }

                currentStage = step.name;
                if (!registry.update(jobId, { currentStage: step.label, message: `${step.label}...` })) {
                    return this.abandon(jobId);
                }

                console.log(`[Pipeline] Executing ${step.name}...`);
                const reporter = new JobProgressReporter(registry, jobId, progressSpan(step.name, includeVideo));
                const result = await step.execute(context, reporter);
                context = withResult(context, result);

                if (reporter.cancelled) {
                    return this.abandon(jobId);
                }
                if (result.stage === 'assembly') {
                    break;
                }
                if (!registry.update(jobId, { progress: progressMilestone(step.name, includeVideo) })) {
                    return this.abandon(jobId);
                }
            }

            const assembly = context.results.assembly;
            if (!assembly) {
                throw new AssemblyError('The pipeline finished without assembling the comic');
            }

            if (!registry.complete(jobId, toJobResult(assembly), toMetadata(assembly))) {
                return this.abandon(jobId);
            }
            return 'completed';
        } catch (error) {
            if (error instanceof JobCancelledError || !registry.get(jobId)) {
                return this.abandon(jobId);
            }
            return this.failJob(jobId, currentStage, error);
        }
    }

    private failJob(jobId: string, stage: StageName, error: unknown): RunOutcome {
        const { kind, message } = classifyError(error);
        console.error(`[${jobId}] ${stage} stage failed (${kind}): ${message}`);

        try {
            if (!this.deps.registry.fail(jobId, { stage, kind, message })) {
                return 'abandoned';
            }
        } catch (updateError) {
            console.error(`[${jobId}] Could not record failure:`, updateError);
        }
        return 'failed';
    }

    /**
     * The job was deleted mid-run: stop and remove anything written for it.
     */
    private async abandon(jobId: string): Promise<RunOutcome> {
        console.warn(`[${jobId}] Job was deleted during processing, stopping`);
        try {
            await this.deps.artifactStore.removeJob(jobId);
        } catch (error) {
            console.warn(`[${jobId}] Could not remove artifacts of deleted job:`, error);
        }
        return 'abandoned';
    }
}

function toJobResult(assembly: AssemblyResult): ComicJobResult {
    const result: ComicJobResult = {};
    for (const artifact of assembly.artifacts) {
        result[artifact.format] = artifact;
    }
    return result;
}

function toMetadata(assembly: AssemblyResult): ComicMetadata {
    const panels = assembly.comic.pages.flatMap((page) => page.panels);
    return {
        title: assembly.comic.title,
        pageCount: assembly.comic.pages.length,
        panelCount: panels.length,
        clipCount: panels.filter((panel) => panel.clip !== undefined).length,
    };
}
