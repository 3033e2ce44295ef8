/**
 * Script step - decomposes the story into numbered panels laid out on pages.
 */

import { PipelineStep, StageContext, StageReporter, requireStageResult, throwIfCancelled } from '../PipelineInfrastructure';
import { ILlmClient } from '../../../domain/ports/ILlmClient';
import { ScriptPanel, ScriptResult, freezeResult, STAGE_LABELS } from '../../../domain/entities/StageResult';
import { GenerationError } from '../../../domain/errors/PipelineErrors';
import { assignPages, resolvePageCount } from '../../../domain/services/PanelLayout';
import { parseStageOutput } from '../StageOutputParser';
import { ParsedScript, ScriptSchema } from '../StageSchemas';
import { COMIC_WRITER_SYSTEM_PROMPT, SCRIPT_PROMPT, audienceNote, fillTemplate } from '../../prompts/ComicPrompts';

export class ScriptStep implements PipelineStep {
    readonly name = 'script';
    readonly label = STAGE_LABELS.script;

    constructor(
        private readonly llmClient: ILlmClient,
        private readonly panelsPerPage: number
    ) { }

    async execute(context: StageContext, reporter: StageReporter): Promise<ScriptResult> {
        const { story } = requireStageResult(context, 'story');
        const { input } = context;
        const requestedPanels = input.targetPages * this.panelsPerPage;

        throwIfCancelled(context, reporter);
        reporter.message(`Planning ${requestedPanels} panels`);

        const raw = await this.llmClient.generateText({
            system: COMIC_WRITER_SYSTEM_PROMPT,
            prompt: fillTemplate(SCRIPT_PROMPT, {
                panelCount: requestedPanels,
                targetPages: input.targetPages,
                story: JSON.stringify(story, null, 2),
                artStyle: input.artStyle,
                audienceNote: audienceNote(input.targetAudience),
            }),
            jsonMode: true,
        });

        const script = parseStageOutput(raw, ScriptSchema, 'script');
        const ordered = orderPanels(script.panels);
        if (ordered.length !== requestedPanels) {
            console.warn(`[${context.jobId}] Script has ${ordered.length} panels, ${requestedPanels} were requested`);
        }

        const pages = assignPages(ordered.length, input.targetPages);
        const panels: ScriptPanel[] = ordered.map((panel, index) => ({
            panelNumber: index + 1,
            pageNumber: pages[index],
            description: panel.description,
            mood: panel.mood,
            cameraAngle: panel.cameraAngle,
            characters: panel.characters,
        }));

        return freezeResult({
            stage: 'script',
            script: {
                title: script.title || story.title,
                pageCount: resolvePageCount(panels.length, input.targetPages),
                panels,
                colorPalette: script.colorPalette,
            },
        });
    }
}

type ParsedPanel = ParsedScript['panels'][number];

/**
 * Puts panels in reading order. Numbers must be a permutation of 1..n,
 * or absent on every panel, in which case the response order is used.
 */
export function orderPanels(panels: ParsedPanel[]): ParsedPanel[] {
    const numbered = panels.filter((panel) => panel.panelNumber !== undefined);
    if (numbered.length === 0) {
        return panels;
    }
    if (numbered.length !== panels.length) {
        throw new GenerationError('Script numbers some panels but not others');
    }

    const sorted = [...panels].sort((a, b) => (a.panelNumber ?? 0) - (b.panelNumber ?? 0));
    sorted.forEach((panel, index) => {
        if (panel.panelNumber !== index + 1) {
            throw new GenerationError(`Script panel numbers must run from 1 to ${panels.length} without gaps or repeats`);
        }
    });
    return sorted;
}
