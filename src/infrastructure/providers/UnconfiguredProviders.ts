import { ILlmClient } from '../../domain/ports/ILlmClient';
import { IImageClient, ImageGenerationResult } from '../../domain/ports/IImageClient';
import { IVideoClient, VideoPollResult, VideoSubmission } from '../../domain/ports/IVideoClient';
import { GenerationError } from '../../domain/errors/PipelineErrors';

/**
 * Stand-ins used when a provider key is missing. Every call fails with a GenerationError.
 */
export class UnconfiguredLlmClient implements ILlmClient {
    async generateText(): Promise<string> {
        throw new GenerationError('Text generation is not configured (set OPENROUTER_API_KEY)');
    }
}

export class UnconfiguredImageClient implements IImageClient {
    async generateImage(): Promise<ImageGenerationResult> {
        throw new GenerationError('Image generation is not configured (set MODELSLAB_API_KEY)');
    }
}

export class UnconfiguredVideoClient implements IVideoClient {
    async submitVideo(): Promise<VideoSubmission> {
        throw new GenerationError('Video generation is not configured (set MODELSLAB_API_KEY)');
    }

    async pollVideo(): Promise<VideoPollResult> {
        throw new GenerationError('Video generation is not configured (set MODELSLAB_API_KEY)');
    }
}
