import { z } from 'zod';
import { ILlmClient } from '../../domain/ports/ILlmClient';
import { DialogueLine } from '../../domain/entities/StageResult';
import { parseStageOutput } from '../pipelines/StageOutputParser';
import { truncateWords } from '../pipelines/steps/TextStep';
import {
    CAPTION_PROMPT,
    COMIC_WRITER_SYSTEM_PROMPT,
    DIALOGUE_PROMPT,
    STORY_DRAFT_PROMPT,
    fillTemplate,
} from '../prompts/ComicPrompts';

export interface StoryDraftRequest {
    prompt: string;
    genre: string;
    themes: string[];
    chapterCount: number;
}

export interface StoryDraft {
    title: string;
    story: string;
    chapters: Array<{ number: number; title: string; content: string }>;
    wordCount: number;
}

export interface CaptionRequest {
    panelDescription: string;
    context: string;
    maxWords: number;
}

export interface DialogueRequest {
    characters: string[];
    sceneDescription: string;
    context: string;
    exchanges: number;
}

const StoryDraftSchema = z.object({
    title: z.string().trim().min(1),
    chapters: z
        .array(
            z.object({
                title: z.string().trim().default(''),
                content: z.string().trim().min(1),
            })
        )
        .min(1),
});

const CaptionSchema = z.object({ caption: z.string().trim().min(1) });

const DialogueSchema = z.object({
    dialogue: z
        .array(z.object({ character: z.string().trim().min(1), text: z.string().trim().min(1) }))
        .min(1),
});

/**
 * One-off writing helpers that answer synchronously, outside the job pipeline.
 */
export class ComicWritingService {
    constructor(private readonly llmClient: ILlmClient) { }

    async draftStory(request: StoryDraftRequest): Promise<StoryDraft> {
        const raw = await this.llmClient.generateText({
            system: COMIC_WRITER_SYSTEM_PROMPT,
            prompt: fillTemplate(STORY_DRAFT_PROMPT, {
                genre: request.genre,
                prompt: request.prompt,
                themes: request.themes.join(', ') || 'any',
                chapterCount: request.chapterCount,
            }),
            jsonMode: true,
        });

        const draft = parseStageOutput(raw, StoryDraftSchema, 'story draft');
        const chapters = draft.chapters.map((chapter, index) => ({
            number: index + 1,
            title: chapter.title || `Chapter ${index + 1}`,
            content: chapter.content,
        }));
        const story = chapters.map((chapter) => chapter.content).join('\n\n');

        return {
            title: draft.title,
            story,
            chapters,
            wordCount: story.split(/\s+/).filter(Boolean).length,
        };
    }

    async writeCaption(request: CaptionRequest): Promise<string> {
        const raw = await this.llmClient.generateText({
            system: COMIC_WRITER_SYSTEM_PROMPT,
            prompt: fillTemplate(CAPTION_PROMPT, {
                maxWords: request.maxWords,
                description: request.panelDescription,
                context: request.context || 'none',
            }),
            jsonMode: true,
        });

        const { caption } = parseStageOutput(raw, CaptionSchema, 'caption');
        return truncateWords(caption, request.maxWords);
    }

    async writeDialogue(request: DialogueRequest): Promise<DialogueLine[]> {
        const raw = await this.llmClient.generateText({
            system: COMIC_WRITER_SYSTEM_PROMPT,
            prompt: fillTemplate(DIALOGUE_PROMPT, {
                exchanges: request.exchanges,
                characters: request.characters.join(', '),
                description: request.sceneDescription,
                context: request.context || 'none',
            }),
            jsonMode: true,
        });

        const { dialogue } = parseStageOutput(raw, DialogueSchema, 'dialogue');
        return dialogue.slice(0, request.exchanges * Math.max(2, request.characters.length));
    }
}
