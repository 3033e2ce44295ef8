/**
 * Story step - structures the source into characters and scenes.
 */

import { PipelineStep, StageContext, StageReporter, requireStageResult, throwIfCancelled } from '../PipelineInfrastructure';
import { ILlmClient } from '../../../domain/ports/ILlmClient';
import { StoryResult, freezeResult, STAGE_LABELS } from '../../../domain/entities/StageResult';
import { parseStageOutput } from '../StageOutputParser';
import { StorySchema } from '../StageSchemas';
import { COMIC_WRITER_SYSTEM_PROMPT, STORY_PROMPT, audienceNote, fillTemplate } from '../../prompts/ComicPrompts';

export class StoryStep implements PipelineStep {
    readonly name = 'story';
    readonly label = STAGE_LABELS.story;

    constructor(private readonly llmClient: ILlmClient) { }

    async execute(context: StageContext, reporter: StageReporter): Promise<StoryResult> {
        const ingest = requireStageResult(context, 'ingest');
        const { input } = context;

        throwIfCancelled(context, reporter);
        reporter.message(`Structuring ${ingest.wordCount} words into a story`);

        const raw = await this.llmClient.generateText({
            system: COMIC_WRITER_SYSTEM_PROMPT,
            prompt: fillTemplate(STORY_PROMPT, {
                title: input.title,
                targetPages: input.targetPages,
                language: input.targetLanguage,
                audienceNote: audienceNote(input.targetAudience),
                content: ingest.content,
            }),
            jsonMode: true,
        });

        const story = parseStageOutput(raw, StorySchema, 'story');
        console.log(`[${context.jobId}] Story "${story.title}": ${story.scenes.length} scenes, ${story.characters.length} characters`);

        return freezeResult({
            stage: 'story',
            story: {
                title: story.title,
                summary: story.summary,
                genre: story.genre,
                themes: story.themes,
                characters: story.characters,
                scenes: story.scenes.map((scene, index) => ({
                    sceneNumber: scene.sceneNumber ?? index + 1,
                    setting: scene.setting,
                    summary: scene.summary,
                })),
            },
        });
    }
}
