import { ComicJobInput } from '../../src/domain/entities/ComicJob';
import { AssembledComic } from '../../src/domain/entities/StageResult';
import { ILlmClient, TextGenerationRequest } from '../../src/domain/ports/ILlmClient';
import { IImageClient, ImageGenerationRequest, ImageGenerationResult } from '../../src/domain/ports/IImageClient';
import {
    IVideoClient,
    VideoPollResult,
    VideoSubmission,
} from '../../src/domain/ports/IVideoClient';
import { IArtifactStore, StoredArtifact } from '../../src/domain/ports/IArtifactStore';
import { IComicExporter } from '../../src/domain/ports/IComicExporter';
import { IAssetFetcher } from '../../src/domain/ports/IAssetFetcher';
import { GenerationError } from '../../src/domain/errors/PipelineErrors';

export const PNG_BASE64 = 'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==';
export const PNG_DATA_URL = `data:image/png;base64,${PNG_BASE64}`;

export function buildInput(overrides: Partial<ComicJobInput> = {}): ComicJobInput {
    return {
        text: 'Mira finds a lost robot in the rain and helps it get home.',
        title: 'Rainy Day Robot',
        artStyle: 'cartoon',
        targetPages: 1,
        targetAudience: 'general',
        targetLanguage: 'en',
        outputFormats: ['pdf'],
        includeVideo: false,
        ...overrides,
    };
}

export const STORY_JSON = JSON.stringify({
    title: 'Rainy Day Robot',
    summary: 'Mira helps a lost robot find its way home.',
    genre: 'adventure',
    themes: ['friendship'],
    characters: [
        { name: 'Mira', description: 'a curious girl in a yellow raincoat', role: 'protagonist' },
        { name: 'Bolt', description: 'a small rusty robot', role: 'supporting' },
    ],
    scenes: [
        { sceneNumber: 1, setting: 'a rainy street', summary: 'Mira spots Bolt under a bench.' },
        { sceneNumber: 2, setting: 'the workshop', summary: 'Bolt is home again.' },
    ],
});

export function scriptJson(panelCount: number): string {
    return JSON.stringify({
        title: 'Rainy Day Robot',
        colorPalette: ['slate blue', 'yellow'],
        panels: Array.from({ length: panelCount }, (_, index) => ({
            panelNumber: index + 1,
            description: `Panel ${index + 1} scene`,
            mood: 'hopeful',
            cameraAngle: 'wide shot',
            characters: ['Mira'],
        })),
    });
}

export function panelTextJson(panelNumbers: number[]): string {
    return JSON.stringify({
        panels: panelNumbers.map((panelNumber) => ({
            panelNumber,
            caption: `Caption ${panelNumber}`,
            dialogue: [{ character: 'Mira', text: `Line ${panelNumber}` }],
            soundEffects: ['drip'],
        })),
    });
}

/**
 * Answers each stage prompt with well-formed JSON sized to the request.
 */
export function answerPrompt(prompt: string): string {
    if (prompt.startsWith('Adapt the source material')) {
        return STORY_JSON;
    }
    const script = /^Break this comic story into exactly (\d+) panels/.exec(prompt);
    if (script) {
        return scriptJson(Number(script[1]));
    }
    if (prompt.startsWith('Write the lettering')) {
        const numbers = Array.from(prompt.matchAll(/^(\d+)\. \[/gm), (match) => Number(match[1]));
        return panelTextJson(numbers);
    }
    throw new GenerationError(`Unexpected prompt: ${prompt.substring(0, 40)}`);
}

export class ScriptedLlmClient implements ILlmClient {
    readonly requests: TextGenerationRequest[] = [];

    async generateText(request: TextGenerationRequest): Promise<string> {
        this.requests.push(request);
        return answerPrompt(request.prompt);
    }
}

/**
 * Returns an inline PNG per panel. Prompts matching `failWhen` reject.
 */
export class FakeImageClient implements IImageClient {
    readonly prompts: string[] = [];

    constructor(private readonly failWhen?: (prompt: string) => boolean) { }

    async generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
        this.prompts.push(request.prompt);
        if (this.failWhen?.(request.prompt)) {
            throw new GenerationError('ModelsLab image generation failed with HTTP 500');
        }
        return { imageUrl: PNG_DATA_URL };
    }
}

/**
 * Holds requests until `batchSize` are in flight, then answers them newest first.
 * Each image URL names the panel parsed from the prompt.
 */
export class ReversedImageClient implements IImageClient {
    readonly completionOrder: number[] = [];
    private waiting: Array<{ panelNumber: number; resolve: (result: ImageGenerationResult) => void }> = [];

    constructor(private readonly batchSize: number) { }

    generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
        const panelNumber = Number(/Panel (\d+) scene/.exec(request.prompt)?.[1] ?? 0);
        return new Promise((resolve) => {
            this.waiting.push({ panelNumber, resolve });
            if (this.waiting.length < this.batchSize) {
                return;
            }
            const batch = this.waiting.reverse();
            this.waiting = [];
            for (const entry of batch) {
                this.completionOrder.push(entry.panelNumber);
                entry.resolve({ imageUrl: `https://cdn.example.com/panel-${entry.panelNumber}.png` });
            }
        });
    }
}

/**
 * `ready` answers at once; `pending` never resolves.
 */
export class FakeVideoClient implements IVideoClient {
    submissions = 0;
    polls = 0;

    constructor(private readonly mode: 'ready' | 'pending' = 'ready') { }

    async submitVideo(): Promise<VideoSubmission> {
        this.submissions++;
        if (this.mode === 'pending') {
            return { status: 'pending', requestId: `req-${this.submissions}` };
        }
        return {
            status: 'ready',
            videoUrl: `https://cdn.example.com/clip-${this.submissions}.mp4`,
            durationSeconds: 3.1,
        };
    }

    async pollVideo(requestId: string): Promise<VideoPollResult> {
        this.polls++;
        return { status: 'pending', requestId };
    }
}

export class InMemoryArtifactStore implements IArtifactStore {
    readonly files = new Map<string, Buffer>();
    readonly removedJobs: string[] = [];

    async save(jobId: string, fileName: string, data: Buffer): Promise<StoredArtifact> {
        const path = `${jobId}/${fileName}`;
        this.files.set(path, data);
        return { path, sizeBytes: data.length };
    }

    async read(path: string): Promise<Buffer> {
        const data = this.files.get(path);
        if (!data) {
            throw new Error(`ENOENT: ${path}`);
        }
        return data;
    }

    async removeFile(path: string): Promise<void> {
        this.files.delete(path);
    }

    async removeJob(jobId: string): Promise<void> {
        this.removedJobs.push(jobId);
        for (const path of Array.from(this.files.keys())) {
            if (path.startsWith(`${jobId}/`)) {
                this.files.delete(path);
            }
        }
    }
}

/**
 * Exporter that writes a short text body naming the comic.
 */
export class StubExporter implements IComicExporter {
    readonly fileExtension: string;
    readonly mimeType: string;
    exports = 0;

    constructor(readonly format: IComicExporter['format'], private readonly fail = false) {
        this.fileExtension = format === 'web' ? 'html' : format === 'video' ? 'json' : format;
        this.mimeType = `test/${format}`;
    }

    async export(comic: AssembledComic): Promise<Buffer> {
        this.exports++;
        if (this.fail) {
            throw new Error('renderer crashed');
        }
        return Buffer.from(`${this.format}:${comic.title}`);
    }
}

export class FakeAssetFetcher implements IAssetFetcher {
    readonly urls: string[] = [];

    async fetch(url: string): Promise<Buffer> {
        this.urls.push(url);
        return Buffer.from(PNG_BASE64, 'base64');
    }
}

export function buildComic(overrides: Partial<AssembledComic> = {}): AssembledComic {
    return {
        title: 'Rainy Day Robot',
        summary: 'Mira helps a lost robot.',
        artStyle: 'cartoon',
        language: 'en',
        pages: [
            {
                pageNumber: 1,
                panels: [
                    {
                        panelNumber: 1,
                        description: 'Mira under an umbrella',
                        imageUrl: PNG_DATA_URL,
                        caption: 'It rained all day.',
                        dialogue: [{ character: 'Mira', text: 'Hello?' }],
                        soundEffects: ['drip'],
                    },
                    {
                        panelNumber: 2,
                        description: 'Bolt blinks',
                        imageUrl: PNG_DATA_URL,
                        dialogue: [],
                        soundEffects: [],
                    },
                ],
            },
            {
                pageNumber: 2,
                panels: [
                    {
                        panelNumber: 3,
                        description: 'The workshop door opens',
                        imageUrl: PNG_DATA_URL,
                        caption: 'Home at last.',
                        dialogue: [],
                        soundEffects: ['creak'],
                    },
                ],
            },
        ],
        ...overrides,
    };
}
