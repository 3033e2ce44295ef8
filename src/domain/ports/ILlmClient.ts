/**
 * A single text generation request.
 */
export interface TextGenerationRequest {
    /** Instructions that frame the model's role */
    system: string;
    prompt: string;
    temperature?: number;
    /** Ask the provider for a JSON object response */
    jsonMode?: boolean;
}

/**
 * ILlmClient - Port for text generation providers.
 * Implementations: OpenRouterLlmClient
 */
export interface ILlmClient {
    /**
     * Generates text for the request.
     * Rejects with a GenerationError when the provider fails or returns nothing.
     */
    generateText(request: TextGenerationRequest): Promise<string>;
}
