import path from 'path';
import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { JobRegistry } from '../application/JobRegistry';
import { JobScheduler } from '../application/JobScheduler';
import { ComicOrchestrator } from '../application/ComicOrchestrator';
import { ResumeService } from '../application/ResumeService';
import { ComicWritingService } from '../application/services/ComicWritingService';
import { createComicPipeline } from '../application/pipelines/ComicPipeline';
import { ILlmClient } from '../domain/ports/ILlmClient';
import { IImageClient } from '../domain/ports/IImageClient';
import { IVideoClient } from '../domain/ports/IVideoClient';
import { IAssetFetcher } from '../domain/ports/IAssetFetcher';
import { IArtifactStore } from '../domain/ports/IArtifactStore';
import { IDocumentExtractor } from '../domain/ports/IDocumentExtractor';

// Infrastructure imports
import { OpenRouterLlmClient } from '../infrastructure/llm/OpenRouterLlmClient';
import { ModelsLabImageClient } from '../infrastructure/images/ModelsLabImageClient';
import { ModelsLabVideoClient } from '../infrastructure/video/ModelsLabVideoClient';
import {
    UnconfiguredImageClient,
    UnconfiguredLlmClient,
    UnconfiguredVideoClient,
} from '../infrastructure/providers/UnconfiguredProviders';
import { PlainTextExtractor } from '../infrastructure/documents/PlainTextExtractor';
import { PdfTextExtractor } from '../infrastructure/documents/PdfTextExtractor';
import { MultiFormatDocumentExtractor } from '../infrastructure/documents/MultiFormatDocumentExtractor';
import { LocalArtifactStore } from '../infrastructure/storage/LocalArtifactStore';
import { HttpAssetFetcher } from '../infrastructure/export/HttpAssetFetcher';
import { PdfComicExporter } from '../infrastructure/export/PdfComicExporter';
import { CbzComicExporter } from '../infrastructure/export/CbzComicExporter';
import { WebComicExporter } from '../infrastructure/export/WebComicExporter';
import { VideoPlaylistExporter } from '../infrastructure/export/VideoPlaylistExporter';

// Route imports
import { createGenerateRoutes } from './routes/generateRoutes';
import { createJobRoutes } from './routes/jobRoutes';
import { createWritingRoutes } from './routes/writingRoutes';
import { errorHandler } from './middleware/errorHandler';

const SERVICE_NAME = 'Comic Forge';
const SERVICE_VERSION = '1.0.0';

type ProviderStatus = 'configured' | 'not_configured';

export interface AppDependencies {
    registry: JobRegistry;
    scheduler: JobScheduler;
    orchestrator: ComicOrchestrator;
    artifactStore: IArtifactStore;
    documentExtractor: IDocumentExtractor;
    writingService: ComicWritingService;
    services: { text: ProviderStatus; image: ProviderStatus; video: ProviderStatus };
}

/**
 * Replacement adapters, mainly for tests.
 */
export interface DependencyOverrides {
    llmClient?: ILlmClient;
    imageClient?: IImageClient;
    videoClient?: IVideoClient;
    assetFetcher?: IAssetFetcher;
    artifactStore?: IArtifactStore;
    registry?: JobRegistry;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors({
        origin: config.allowedOrigins.includes('*') ? '*' : config.allowedOrigins,
    }));
    app.use(express.json({ limit: '10mb' }));
    app.use(express.urlencoded({ extended: true, limit: '10mb' }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            version: SERVICE_VERSION,
            timestamp: new Date().toISOString(),
            services: deps.services,
        });
    });

    // Configured generation models
    app.get('/api/v1/agents/status', (req: Request, res: Response) => {
        res.json({
            text: { provider: 'openrouter', model: config.openrouterModel, status: deps.services.text },
            image: { provider: 'modelslab', model: config.imageModel, status: deps.services.image },
            video: { provider: 'modelslab', model: config.videoModel, status: deps.services.video },
        });
    });

    app.get('/', (req: Request, res: Response) => {
        res.json({
            name: SERVICE_NAME,
            version: SERVICE_VERSION,
            status: 'running',
            jobs: deps.registry.size,
            scheduler: deps.scheduler.stats,
        });
    });

    // Pick up work persisted by a previous run
    new ResumeService(deps.registry, deps.scheduler).resumeAll();

    // Routes
    app.use(createGenerateRoutes({
        registry: deps.registry,
        scheduler: deps.scheduler,
        documentExtractor: deps.documentExtractor,
        options: {
            minTargetPages: config.minTargetPages,
            maxTargetPages: config.maxTargetPages,
            uploadDir: path.join(config.outputDir, 'uploads'),
            maxUploadBytes: config.maxUploadBytes,
        },
    }));
    app.use(createJobRoutes({ registry: deps.registry, artifactStore: deps.artifactStore }));
    app.use(createWritingRoutes(deps.writingService));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config, overrides: DependencyOverrides = {}): AppDependencies {
    const llmClient = overrides.llmClient ?? createLlmClient(config);
    const imageClient = overrides.imageClient ?? createImageClient(config);
    const videoClient = overrides.videoClient ?? createVideoClient(config);
    const assetFetcher = overrides.assetFetcher ?? new HttpAssetFetcher(config.providerTimeoutMs, config.providerMaxRetries + 1);
    const artifactStore = overrides.artifactStore ?? new LocalArtifactStore(path.join(config.outputDir, 'comics'));
    const registry = overrides.registry ?? new JobRegistry({ persistencePath: config.jobsPersistencePath });
    const documentExtractor = new MultiFormatDocumentExtractor([new PdfTextExtractor(), new PlainTextExtractor()]);

    const steps = createComicPipeline({
        llmClient,
        imageClient,
        videoClient,
        documentExtractor,
        exporters: [
            new PdfComicExporter(assetFetcher),
            new CbzComicExporter(assetFetcher),
            new WebComicExporter(),
            new VideoPlaylistExporter(),
        ],
        artifactStore,
        limits: {
            panelsPerPage: config.panelsPerPage,
            textBatchSize: config.textBatchSize,
            captionMaxWords: config.captionMaxWords,
            maxParallelPanels: config.maxParallelPanels,
            videoPollIntervalMs: config.videoPollIntervalMs,
            videoClipTimeoutMs: config.videoClipTimeoutMs,
        },
    });

    const orchestrator = new ComicOrchestrator({ registry, artifactStore, steps });
    const scheduler = new JobScheduler(orchestrator, config.maxConcurrentJobs);

    return {
        registry,
        scheduler,
        orchestrator,
        artifactStore,
        documentExtractor,
        writingService: new ComicWritingService(llmClient),
        services: {
            text: llmClient instanceof UnconfiguredLlmClient ? 'not_configured' : 'configured',
            image: imageClient instanceof UnconfiguredImageClient ? 'not_configured' : 'configured',
            video: videoClient instanceof UnconfiguredVideoClient ? 'not_configured' : 'configured',
        },
    };
}

// --- Helper Functions ---

function createLlmClient(config: Config): ILlmClient {
    if (!config.openrouterApiKey) {
        console.log('⚠️  Text generation not configured (OPENROUTER_API_KEY missing)');
        return new UnconfiguredLlmClient();
    }
    console.log(`✅ Text generation: OpenRouter (${config.openrouterModel})`);
    return new OpenRouterLlmClient({
        apiKey: config.openrouterApiKey,
        model: config.openrouterModel,
        baseUrl: config.openrouterBaseUrl,
        temperature: config.llmTemperature,
        maxTokens: config.llmMaxTokens,
        maxAttempts: config.providerMaxRetries + 1,
        retryBackoffMs: config.providerRetryBackoffMs,
        timeoutMs: config.providerTimeoutMs,
    });
}

function createImageClient(config: Config): IImageClient {
    if (!config.modelslabApiKey) {
        console.log('⚠️  Image generation not configured (MODELSLAB_API_KEY missing)');
        return new UnconfiguredImageClient();
    }
    console.log(`✅ Image generation: ModelsLab (${config.imageModel})`);
    return new ModelsLabImageClient({
        apiKey: config.modelslabApiKey,
        baseUrl: config.modelslabBaseUrl,
        model: config.imageModel,
        width: config.imageWidth,
        height: config.imageHeight,
        steps: config.imageSteps,
        guidanceScale: config.imageGuidanceScale,
        maxAttempts: config.providerMaxRetries + 1,
        retryBackoffMs: config.providerRetryBackoffMs,
        timeoutMs: config.providerTimeoutMs,
    });
}

function createVideoClient(config: Config): IVideoClient {
    if (!config.modelslabApiKey) {
        console.log('⚠️  Video generation not configured (MODELSLAB_API_KEY missing)');
        return new UnconfiguredVideoClient();
    }
    console.log(`✅ Video generation: ModelsLab (${config.videoModel})`);
    return new ModelsLabVideoClient({
        apiKey: config.modelslabApiKey,
        baseUrl: config.modelslabBaseUrl,
        model: config.videoModel,
        width: config.videoWidth,
        height: config.videoHeight,
        frames: config.videoFrames,
        steps: config.videoSteps,
        maxAttempts: config.providerMaxRetries + 1,
        retryBackoffMs: config.providerRetryBackoffMs,
        timeoutMs: config.providerTimeoutMs,
    });
}
