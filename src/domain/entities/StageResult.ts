import { ComicArtifact } from './ComicJob';

/**
 * Stage names in execution order.
 */
export const STAGE_NAMES = ['ingest', 'story', 'script', 'text', 'visual', 'video', 'assembly'] as const;
export type StageName = (typeof STAGE_NAMES)[number];

/**
 * Labels shown as a job's current stage while each stage runs.
 */
export const STAGE_LABELS: Readonly<Record<StageName, string>> = {
    ingest: 'Ingesting source',
    story: 'Writing story',
    script: 'Writing script',
    text: 'Writing captions and dialogue',
    visual: 'Drawing artwork',
    video: 'Animating panels',
    assembly: 'Assembling comic',
};

/**
 * Maps a current-stage label back to its stage; labels outside a stage map to ingest.
 */
export function stageFromLabel(label: string): StageName {
    const match = STAGE_NAMES.find((stage) => STAGE_LABELS[stage] === label);
    return match ?? 'ingest';
}

export interface StoryCharacter {
    name: string;
    description: string;
    role: string;
}

export interface StoryScene {
    sceneNumber: number;
    setting: string;
    summary: string;
}

export interface ComicStory {
    title: string;
    summary: string;
    genre: string;
    themes: string[];
    characters: StoryCharacter[];
    scenes: StoryScene[];
}

export interface ScriptPanel {
    /** Contiguous from 1 across the whole comic */
    panelNumber: number;
    pageNumber: number;
    description: string;
    mood: string;
    cameraAngle: string;
    characters: string[];
}

export interface ComicScript {
    title: string;
    pageCount: number;
    panels: ScriptPanel[];
    colorPalette: string[];
}

export interface DialogueLine {
    character: string;
    text: string;
}

export interface PanelText {
    panelNumber: number;
    caption?: string;
    dialogue: DialogueLine[];
    soundEffects: string[];
}

export interface PanelArtwork {
    panelNumber: number;
    pageNumber: number;
    prompt: string;
    imageUrl: string;
}

export interface VideoClip {
    panelNumber: number;
    prompt: string;
    videoUrl: string;
    durationSeconds: number;
}

export interface AssembledPanel {
    panelNumber: number;
    description: string;
    imageUrl: string;
    caption?: string;
    dialogue: DialogueLine[];
    soundEffects: string[];
    clip?: VideoClip;
}

export interface AssembledPage {
    pageNumber: number;
    panels: AssembledPanel[];
}

/**
 * The finished comic, ready for export.
 */
export interface AssembledComic {
    title: string;
    summary: string;
    artStyle: string;
    language: string;
    pages: AssembledPage[];
}

export interface IngestResult {
    readonly stage: 'ingest';
    readonly title: string;
    readonly content: string;
    readonly wordCount: number;
    readonly sourceType: 'text' | 'document';
    readonly language: string;
}

export interface StoryResult {
    readonly stage: 'story';
    readonly story: ComicStory;
}

export interface ScriptResult {
    readonly stage: 'script';
    readonly script: ComicScript;
}

export interface TextResult {
    readonly stage: 'text';
    readonly panels: PanelText[];
}

export interface VisualResult {
    readonly stage: 'visual';
    readonly artwork: PanelArtwork[];
}

export interface VideoResult {
    readonly stage: 'video';
    readonly clips: VideoClip[];
}

export interface AssemblyResult {
    readonly stage: 'assembly';
    readonly comic: AssembledComic;
    readonly artifacts: ComicArtifact[];
}

/**
 * Typed payload produced by one stage and read by the later ones.
 */
export type StageResult =
    | IngestResult
    | StoryResult
    | ScriptResult
    | TextResult
    | VisualResult
    | VideoResult
    | AssemblyResult;

/**
 * Deep-freezes a stage result so later stages cannot alter it.
 */
export function freezeResult<T extends StageResult>(result: T): T {
    deepFreeze(result);
    return result;
}

function deepFreeze(value: unknown): void {
    if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
        return;
    }
    Object.freeze(value);
    for (const child of Object.values(value)) {
        deepFreeze(child);
    }
}
