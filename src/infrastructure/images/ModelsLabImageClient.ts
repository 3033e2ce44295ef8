import axios from 'axios';
import { IImageClient, ImageGenerationRequest, ImageGenerationResult } from '../../domain/ports/IImageClient';
import { GenerationError, ProviderTimeoutError, summarizeMessage } from '../../domain/errors/PipelineErrors';
import { withRetry, isRetryableHttpError, sleep } from '../resilience/RetryUtils';
import { toProviderError } from '../resilience/ProviderErrors';
import { parseModelsLabResponse } from './ModelsLabResponse';

export interface ModelsLabImageOptions {
    apiKey: string;
    baseUrl?: string;
    model?: string;
    width?: number;
    height?: number;
    steps?: number;
    guidanceScale?: number;
    maxAttempts?: number;
    retryBackoffMs?: number;
    timeoutMs?: number;
    /** Delay between fetches of a queued image */
    pollIntervalMs?: number;
    maxPollAttempts?: number;
}

const DEFAULT_NEGATIVE_PROMPT = 'blurry, low quality, distorted, deformed, ugly, text, watermark';

/**
 * ModelsLab text-to-image client.
 * Queued generations are fetched until they finish or the poll budget runs out.
 */
export class ModelsLabImageClient implements IImageClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly width: number;
    private readonly height: number;
    private readonly steps: number;
    private readonly guidanceScale: number;
    private readonly maxAttempts: number;
    private readonly retryBackoffMs: number;
    private readonly timeoutMs: number;
    private readonly pollIntervalMs: number;
    private readonly maxPollAttempts: number;

    constructor(options: ModelsLabImageOptions) {
        if (!options.apiKey) {
            throw new Error('ModelsLab API key is required');
        }
        this.apiKey = options.apiKey;
        this.baseUrl = (options.baseUrl ?? 'https://modelslab.com/api/v6').replace(/\/$/, '');
        this.model = options.model ?? 'flux';
        this.width = options.width ?? 1024;
        this.height = options.height ?? 1024;
        this.steps = options.steps ?? 30;
        this.guidanceScale = options.guidanceScale ?? 7.5;
        this.maxAttempts = options.maxAttempts ?? 3;
        this.retryBackoffMs = options.retryBackoffMs ?? 1000;
        this.timeoutMs = options.timeoutMs ?? 120000;
        this.pollIntervalMs = options.pollIntervalMs ?? 5000;
        this.maxPollAttempts = options.maxPollAttempts ?? 60;
    }

    async generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
        try {
            const body = await this.post('/images/text2img', {
                model_id: this.model,
                prompt: request.prompt,
                negative_prompt: request.negativePrompt ?? DEFAULT_NEGATIVE_PROMPT,
                width: String(request.width ?? this.width),
                height: String(request.height ?? this.height),
                samples: '1',
                num_inference_steps: String(this.steps),
                guidance_scale: this.guidanceScale,
            });

            const outcome = parseModelsLabResponse(body);
            if (outcome.state === 'success') {
                return { imageUrl: outcome.outputUrl };
            }
            if (outcome.state === 'error') {
                throw new GenerationError(`ModelsLab image generation failed: ${summarizeMessage(outcome.reason)}`);
            }

            console.log(`[ModelsLab] Image ${outcome.requestId} queued (eta ${outcome.etaSeconds ?? '?'}s), polling...`);
            return { imageUrl: await this.pollForImage(outcome.requestId) };
        } catch (error) {
            const failure = toProviderError('ModelsLab', 'image generation', error);
            console.error(`[ModelsLab] ${failure.message}`);
            throw failure;
        }
    }

    private async pollForImage(requestId: string): Promise<string> {
        for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
            await sleep(this.pollIntervalMs);

            const outcome = parseModelsLabResponse(await this.post(`/images/fetch/${requestId}`, {}));
            if (outcome.state === 'success') {
                return outcome.outputUrl;
            }
            if (outcome.state === 'error') {
                throw new GenerationError(`ModelsLab image ${requestId} failed: ${summarizeMessage(outcome.reason)}`);
            }
            if (attempt % 5 === 0) {
                console.log(`[ModelsLab] Image ${requestId} still processing (attempt ${attempt}/${this.maxPollAttempts})`);
            }
        }

        throw new ProviderTimeoutError(
            `ModelsLab image ${requestId} did not finish after ${this.maxPollAttempts} polls`
        );
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
