import axios from 'axios';
import { z } from 'zod';
import { ILlmClient, TextGenerationRequest } from '../../domain/ports/ILlmClient';
import { GenerationError } from '../../domain/errors/PipelineErrors';
import { withRetry, isRetryableHttpError } from '../resilience/RetryUtils';
import { toProviderError } from '../resilience/ProviderErrors';

export interface OpenRouterLlmOptions {
    apiKey: string;
    model?: string;
    baseUrl?: string;
    temperature?: number;
    maxTokens?: number;
    /** Total attempts per request, including the first */
    maxAttempts?: number;
    retryBackoffMs?: number;
    timeoutMs?: number;
}

const ChatCompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable().optional(),
                }),
            })
        )
        .min(1),
});

/**
 * OpenRouter chat-completions client for story, script and panel text.
 */
export class OpenRouterLlmClient implements ILlmClient {
    private readonly apiKey: string;
    private readonly model: string;
    private readonly baseUrl: string;
    private readonly temperature: number;
    private readonly maxTokens: number;
    private readonly maxAttempts: number;
    private readonly retryBackoffMs: number;
    private readonly timeoutMs: number;

    constructor(options: OpenRouterLlmOptions) {
        if (!options.apiKey) {
            throw new Error('OpenRouter API key is required');
        }
        this.apiKey = options.apiKey;
        this.model = options.model ?? 'openai/gpt-4o-mini';
        this.baseUrl = (options.baseUrl ?? 'https://openrouter.ai/api/v1').replace(/\/$/, '');
        this.temperature = options.temperature ?? 0.8;
        this.maxTokens = options.maxTokens ?? 8000;
        this.maxAttempts = options.maxAttempts ?? 3;
        this.retryBackoffMs = options.retryBackoffMs ?? 1000;
        this.timeoutMs = options.timeoutMs ?? 120000;
    }

    async generateText(request: TextGenerationRequest): Promise<string> {
        try {
            const data = await withRetry(() => this.executeRequest(request), {
                maxAttempts: this.maxAttempts,
                initialBackoffMs: this.retryBackoffMs,
                isRetryable: isRetryableHttpError,
                onRetry: (attempt, _error, delay) => {
                    console.warn(`[OpenRouter] Transient error on attempt ${attempt}, retrying in ${Math.round(delay)}ms...`);
                },
            });

            const parsed = ChatCompletionSchema.safeParse(data);
            if (!parsed.success) {
                throw new GenerationError('OpenRouter returned an unexpected response shape');
            }

            const content = parsed.data.choices[0].message.content?.trim();
            if (!content) {
                throw new GenerationError('OpenRouter returned an empty completion');
            }
            return content;
        } catch (error) {
            const failure = toProviderError('OpenRouter', 'text generation', error);
            console.error(`[OpenRouter] ${failure.message}`);
            throw failure;
        }
    }

    private async executeRequest(request: TextGenerationRequest): Promise<unknown> {
        const response = await axios.post(
            `${this.baseUrl}/chat/completions`,
            {
                model: this.model,
                messages: [
                    { role: 'system', content: request.system },
                    { role: 'user', content: request.prompt },
                ],
                temperature: request.temperature ?? this.temperature,
                max_tokens: this.maxTokens,
                ...(request.jsonMode && { response_format: { type: 'json_object' } }),
            },
            {
                headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
                    'X-Title': 'Comic Forge',
                },
                timeout: this.timeoutMs,
            }
        );
        return response.data;
    }
}
