/**
 * ImageGenerationRequest for one panel image.
 */
export interface ImageGenerationRequest {
    prompt: string;
    negativePrompt?: string;
    /** Defaults to the configured image width */
    width?: number;
    /** Defaults to the configured image height */
    height?: number;
}

/**
 * ImageGenerationResult from an image generation request.
 */
export interface ImageGenerationResult {
    /** URL to the generated image */
    imageUrl: string;
}

/**
 * IImageClient - Port for image generation services.
 * Implementations: ModelsLabImageClient
 */
export interface IImageClient {
    /**
     * Generates an image from a text prompt, waiting for the provider if it queues the request.
     */
    generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult>;
}
