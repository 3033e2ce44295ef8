import { PipelineStep } from './PipelineInfrastructure';
import { IngestStep } from './steps/IngestStep';
import { StoryStep } from './steps/StoryStep';
import { ScriptStep } from './steps/ScriptStep';
import { TextStep } from './steps/TextStep';
import { VisualStep } from './steps/VisualStep';
import { VideoStep } from './steps/VideoStep';
import { AssemblyStep } from './steps/AssemblyStep';
import { ILlmClient } from '../../domain/ports/ILlmClient';
import { IImageClient } from '../../domain/ports/IImageClient';
import { IVideoClient } from '../../domain/ports/IVideoClient';
import { IDocumentExtractor } from '../../domain/ports/IDocumentExtractor';
import { IComicExporter } from '../../domain/ports/IComicExporter';
import { IArtifactStore } from '../../domain/ports/IArtifactStore';

export interface PipelineLimits {
    panelsPerPage: number;
    textBatchSize: number;
    captionMaxWords: number;
    maxParallelPanels: number;
    videoPollIntervalMs: number;
    videoClipTimeoutMs: number;
}

// Dependencies needed for pipeline creation
export interface PipelineDependencies {
    llmClient: ILlmClient;
    imageClient: IImageClient;
    videoClient: IVideoClient;
    documentExtractor: IDocumentExtractor;
    exporters: IComicExporter[];
    artifactStore: IArtifactStore;
    limits: PipelineLimits;
}

/**
 * Builds the fixed stage sequence: ingest, story, script, text, visual, video, assembly.
 */
export function createComicPipeline(deps: PipelineDependencies): PipelineStep[] {
    const { limits } = deps;

    return [
        new IngestStep(deps.documentExtractor),
        new StoryStep(deps.llmClient),
        new ScriptStep(deps.llmClient, limits.panelsPerPage),
        new TextStep(deps.llmClient, {
            batchSize: limits.textBatchSize,
            captionMaxWords: limits.captionMaxWords,
            maxParallelBatches: limits.maxParallelPanels,
        }),
        new VisualStep(deps.imageClient, limits.maxParallelPanels),
        new VideoStep(deps.videoClient, {
            pollIntervalMs: limits.videoPollIntervalMs,
            clipTimeoutMs: limits.videoClipTimeoutMs,
            maxParallelClips: limits.maxParallelPanels,
        }),
        new AssemblyStep(deps.exporters, deps.artifactStore),
    ];
}
