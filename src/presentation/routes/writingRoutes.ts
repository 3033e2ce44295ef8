import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ComicWritingService } from '../../application/services/ComicWritingService';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';
import {
    CaptionRequestSchema,
    DialogueRequestSchema,
    StoryRequestSchema,
    formatValidationError,
} from '../validation/requestSchemas';

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
        throw new BadRequestError(formatValidationError(parsed.error));
    }
    return parsed.data;
}

/**
 * Synchronous writing helpers: story drafts, panel captions and dialogue.
 */
export function createWritingRoutes(writingService: ComicWritingService): Router {
    const router = Router();

    /**
     * POST /api/v1/story/generate
     */
    router.post(
        '/api/v1/story/generate',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(StoryRequestSchema, req.body);
            const draft = await writingService.draftStory({
                prompt: body.prompt,
                genre: body.genre,
                themes: body.themes,
                chapterCount: body.num_chapters,
            });

            res.json({
                title: draft.title,
                story: draft.story,
                chapters: draft.chapters,
                word_count: draft.wordCount,
            });
        })
    );

    /**
     * POST /api/v1/caption/generate
     */
    router.post(
        '/api/v1/caption/generate',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(CaptionRequestSchema, req.body);
            const caption = await writingService.writeCaption({
                panelDescription: body.panel_description,
                context: body.context,
                maxWords: body.max_words,
            });

            res.json({ caption });
        })
    );

    /**
     * POST /api/v1/dialogue/generate
     */
    router.post(
        '/api/v1/dialogue/generate',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(DialogueRequestSchema, req.body);
            const dialogue = await writingService.writeDialogue({
                characters: body.characters,
                sceneDescription: body.scene_description,
                context: body.context,
                exchanges: body.num_exchanges,
            });

            res.json({ dialogue });
        })
    );

    return router;
}
