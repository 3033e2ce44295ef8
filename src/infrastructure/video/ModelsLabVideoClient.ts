import axios from 'axios';
import {
    IVideoClient,
    VideoGenerationRequest,
    VideoPollResult,
    VideoSubmission,
} from '../../domain/ports/IVideoClient';
import { GenerationError, summarizeMessage } from '../../domain/errors/PipelineErrors';
import { withRetry, isRetryableHttpError } from '../resilience/RetryUtils';
import { toProviderError } from '../resilience/ProviderErrors';
import { parseModelsLabResponse } from '../images/ModelsLabResponse';

export interface ModelsLabVideoOptions {
    apiKey: string;
    baseUrl?: string;
    model?: string;
    width?: number;
    height?: number;
    frames?: number;
    steps?: number;
    fps?: number;
    maxAttempts?: number;
    retryBackoffMs?: number;
    timeoutMs?: number;
}

const DEFAULT_NEGATIVE_PROMPT = 'low quality, blurry, static, choppy';

/**
 * ModelsLab image-to-video client.
 * Submission and fetch are separate calls; the video stage owns the polling loop.
 */
export class ModelsLabVideoClient implements IVideoClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly width: number;
    private readonly height: number;
    private readonly frames: number;
    private readonly steps: number;
    private readonly fps: number;
    private readonly maxAttempts: number;
    private readonly retryBackoffMs: number;
    private readonly timeoutMs: number;

    constructor(options: ModelsLabVideoOptions) {
        if (!options.apiKey) {
            throw new Error('ModelsLab API key is required');
        }
        this.apiKey = options.apiKey;
        this.baseUrl = (options.baseUrl ?? 'https://modelslab.com/api/v6').replace(/\/$/, '');
        this.model = options.model ?? 'svd';
        this.width = options.width ?? 512;
        this.height = options.height ?? 512;
        this.frames = options.frames ?? 25;
        this.steps = options.steps ?? 20;
        this.fps = options.fps ?? 8;
        this.maxAttempts = options.maxAttempts ?? 3;
        this.retryBackoffMs = options.retryBackoffMs ?? 1000;
        this.timeoutMs = options.timeoutMs ?? 120000;
    }

    async submitVideo(request: VideoGenerationRequest): Promise<VideoSubmission> {
        try {
            const body = await this.post('/video/img2video', {
                model_id: this.model,
                init_image: request.imageUrl,
                prompt: request.prompt,
                negative_prompt: DEFAULT_NEGATIVE_PROMPT,
                width: this.width,
                height: this.height,
                num_frames: this.frames,
                num_inference_steps: this.steps,
                fps: this.fps,
                output_type: 'mp4',
            });

            const outcome = parseModelsLabResponse(body);
            switch (outcome.state) {
                case 'success':
                    return { status: 'ready', videoUrl: outcome.outputUrl, durationSeconds: this.clipDuration() };
                case 'processing':
                    console.log(`[ModelsLab] Video ${outcome.requestId} queued (eta ${outcome.etaSeconds ?? '?'}s)`);
                    return { status: 'pending', requestId: outcome.requestId, etaSeconds: outcome.etaSeconds };
                case 'error':
                    throw new GenerationError(`ModelsLab video submission failed: ${summarizeMessage(outcome.reason)}`);
            }
        } catch (error) {
            const failure = toProviderError('ModelsLab', 'video submission', error);
            console.error(`[ModelsLab] ${failure.message}`);
            throw failure;
        }
    }

    async pollVideo(requestId: string): Promise<VideoPollResult> {
        try {
            const outcome = parseModelsLabResponse(await this.post(`/video/fetch/${requestId}`, {}));
            switch (outcome.state) {
                case 'success':
                    return { status: 'ready', videoUrl: outcome.outputUrl, durationSeconds: this.clipDuration() };
                case 'processing':
                    return { status: 'pending', requestId, etaSeconds: outcome.etaSeconds };
                case 'error':
                    return { status: 'failed', reason: summarizeMessage(outcome.reason) };
            }
        } catch (error) {
            const failure = toProviderError('ModelsLab', 'video status check', error);
            console.error(`[ModelsLab] ${failure.message}`);
            throw failure;
        }
    }

    private clipDuration(): number {
        return Math.round((this.frames / this.fps) * 10) / 10;
    }

    private post(path: string, payload: Record<string, unknown>): Promise<unknown> {
        return withRetry<unknown>(
            async () => {
                const response = await axios.post(
                    `${this.baseUrl}${path}`,
                    { key: this.apiKey, ...payload },
                    {
                        headers: { 'Content-Type': 'application/json' },
                        timeout: this.timeoutMs,
                    }
                );
                return response.data;
            },
            {
                maxAttempts: this.maxAttempts,
                initialBackoffMs: this.retryBackoffMs,
                isRetryable: isRetryableHttpError,
                onRetry: (attempt, _error, delay) => {
                    console.warn(`[ModelsLab] Transient error on ${path} (attempt ${attempt}), retrying in ${Math.round(delay)}ms...`);
                },
            }
        );
    }
}
