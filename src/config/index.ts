import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    allowedOrigins: string[];

    // OpenRouter (text generation)
    openrouterApiKey: string;
    openrouterBaseUrl: string;
    openrouterModel: string;
    llmTemperature: number;
    llmMaxTokens: number;

    // ModelsLab (images and video)
    modelslabApiKey: string;
    modelslabBaseUrl: string;
    imageModel: string;
    imageWidth: number;
    imageHeight: number;
    imageSteps: number;
    imageGuidanceScale: number;
    videoModel: string;
    videoWidth: number;
    videoHeight: number;
    videoFrames: number;
    videoSteps: number;
    videoPollIntervalMs: number;
    videoClipTimeoutMs: number;

    // Provider resilience
    providerMaxRetries: number;
    providerRetryBackoffMs: number;
    providerTimeoutMs: number;

    // Pipeline limits
    maxConcurrentJobs: number;
    maxParallelPanels: number;
    textBatchSize: number;
    panelsPerPage: number;
    captionMaxWords: number;
    minTargetPages: number;
    maxTargetPages: number;

    // Storage
    outputDir: string;
    jobsPersistencePath?: string;
    maxUploadBytes: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value.trim().toLowerCase() === 'true';
}

function getEnvVarList(key: string, defaultValue: string[] = []): string[] {
    const value = process.env[key];
    if (value === undefined || value.trim() === '') {
        return defaultValue;
    }
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const persistJobs = getEnvVarBoolean('PERSIST_JOBS', true);

    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),
        allowedOrigins: getEnvVarList('ALLOWED_ORIGINS', ['*']),

        // OpenRouter
        openrouterApiKey: getEnvVar('OPENROUTER_API_KEY', ''),
        openrouterBaseUrl: getEnvVar('OPENROUTER_BASE_URL', 'https://openrouter.ai/api/v1'),
        openrouterModel: getEnvVar('OPENROUTER_MODEL', 'openai/gpt-4o-mini'),
        llmTemperature: getEnvVarNumber('LLM_TEMPERATURE', 0.8),
        llmMaxTokens: getEnvVarNumber('LLM_MAX_TOKENS', 8000),

        // ModelsLab
        modelslabApiKey: getEnvVar('MODELSLAB_API_KEY', ''),
        modelslabBaseUrl: getEnvVar('MODELSLAB_BASE_URL', 'https://modelslab.com/api/v6'),
        imageModel: getEnvVar('IMAGE_MODEL', 'flux'),
        imageWidth: getEnvVarNumber('IMAGE_WIDTH', 1024),
        imageHeight: getEnvVarNumber('IMAGE_HEIGHT', 1024),
        imageSteps: getEnvVarNumber('IMAGE_STEPS', 30),
        imageGuidanceScale: getEnvVarNumber('IMAGE_GUIDANCE_SCALE', 7.5),
        videoModel: getEnvVar('VIDEO_MODEL', 'svd'),
        videoWidth: getEnvVarNumber('VIDEO_WIDTH', 512),
        videoHeight: getEnvVarNumber('VIDEO_HEIGHT', 512),
        videoFrames: getEnvVarNumber('VIDEO_FRAMES', 25),
        videoSteps: getEnvVarNumber('VIDEO_STEPS', 20),
        videoPollIntervalMs: getEnvVarNumber('VIDEO_POLL_INTERVAL_MS', 5000),
        videoClipTimeoutMs: getEnvVarNumber('VIDEO_CLIP_TIMEOUT_MS', 600000),

        // Provider resilience
        providerMaxRetries: getEnvVarNumber('PROVIDER_MAX_RETRIES', 3),
        providerRetryBackoffMs: getEnvVarNumber('PROVIDER_RETRY_BACKOFF_MS', 1000),
        providerTimeoutMs: getEnvVarNumber('PROVIDER_TIMEOUT_MS', 120000),

        // Pipeline limits
        maxConcurrentJobs: getEnvVarNumber('MAX_CONCURRENT_JOBS', 2),
        maxParallelPanels: getEnvVarNumber('MAX_PARALLEL_PANELS', 5),
        textBatchSize: getEnvVarNumber('TEXT_BATCH_SIZE', 8),
        panelsPerPage: getEnvVarNumber('PANELS_PER_PAGE', 4),
        captionMaxWords: getEnvVarNumber('CAPTION_MAX_WORDS', 25),
        minTargetPages: getEnvVarNumber('MIN_TARGET_PAGES', 1),
        maxTargetPages: getEnvVarNumber('MAX_TARGET_PAGES', 50),

        // Storage
        outputDir: getEnvVar('OUTPUT_DIR', './outputs'),
        jobsPersistencePath: persistJobs ? getEnvVar('JOBS_PERSISTENCE_PATH', './data/jobs.json') : undefined,
        maxUploadBytes: getEnvVarNumber('MAX_UPLOAD_BYTES', 50 * 1024 * 1024),
    };
}

/**
 * Validates limits and ranges. Missing provider keys only disable the matching health entry.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    const positiveIntegers: Array<[string, number]> = [
        ['MAX_CONCURRENT_JOBS', config.maxConcurrentJobs],
        ['MAX_PARALLEL_PANELS', config.maxParallelPanels],
        ['TEXT_BATCH_SIZE', config.textBatchSize],
        ['PANELS_PER_PAGE', config.panelsPerPage],
        ['CAPTION_MAX_WORDS', config.captionMaxWords],
        ['MIN_TARGET_PAGES', config.minTargetPages],
        ['MAX_TARGET_PAGES', config.maxTargetPages],
    ];
    for (const [key, value] of positiveIntegers) {
        if (!Number.isInteger(value) || value < 1) {
            errors.push(`${key} must be a positive integer`);
        }
    }

    if (config.minTargetPages > config.maxTargetPages) {
        errors.push('MIN_TARGET_PAGES cannot be greater than MAX_TARGET_PAGES');
    }
    if (!Number.isInteger(config.providerMaxRetries) || config.providerMaxRetries < 0) {
        errors.push('PROVIDER_MAX_RETRIES must be zero or a positive integer');
    }
    if (config.videoPollIntervalMs <= 0) {
        errors.push('VIDEO_POLL_INTERVAL_MS must be positive');
    }
    if (config.videoClipTimeoutMs < config.videoPollIntervalMs) {
        errors.push('VIDEO_CLIP_TIMEOUT_MS must be at least VIDEO_POLL_INTERVAL_MS');
    }
    if (config.maxUploadBytes <= 0) {
        errors.push('MAX_UPLOAD_BYTES must be positive');
    }

    return errors;
}
