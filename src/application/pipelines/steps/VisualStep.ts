/**
 * Visual step - draws one artwork image per panel.
 * All-or-nothing: the first failed panel fails the stage and no further panels start.
 */

import { PipelineStep, StageContext, StageReporter, requireStageResult, throwIfCancelled } from '../PipelineInfrastructure';
import { IImageClient } from '../../../domain/ports/IImageClient';
import { PanelArtwork, VisualResult, freezeResult, STAGE_LABELS } from '../../../domain/entities/StageResult';
import { GenerationError, ProviderTimeoutError, classifyError } from '../../../domain/errors/PipelineErrors';
import { mapWithConcurrency } from '../Concurrency';
import { buildPanelImagePrompt } from '../../prompts/ComicPrompts';

export class VisualStep implements PipelineStep {
    readonly name = 'visual';
    readonly label = STAGE_LABELS.visual;

    constructor(
        private readonly imageClient: IImageClient,
        private readonly maxParallelPanels: number
    ) { }

    async execute(context: StageContext, reporter: StageReporter): Promise<VisualResult> {
        const { script } = requireStageResult(context, 'script');
        const { story } = requireStageResult(context, 'story');
        const total = script.panels.length;
        let finished = 0;

        console.log(`[${context.jobId}] Drawing ${total} panels (max ${this.maxParallelPanels} in parallel)`);

        const artwork = await mapWithConcurrency(script.panels, this.maxParallelPanels, async (panel): Promise<PanelArtwork> => {
            throwIfCancelled(context, reporter);
            reporter.message(`Creating panel ${panel.panelNumber} of ${total}`);

            const prompt = buildPanelImagePrompt(panel, context.input.artStyle, story.characters, script.colorPalette);
            let imageUrl: string;
            try {
                ({ imageUrl } = await this.imageClient.generateImage({ prompt }));
            } catch (error) {
                const { message } = classifyError(error);
                console.error(`[${context.jobId}] Panel ${panel.panelNumber} artwork failed: ${message}`);
                if (error instanceof ProviderTimeoutError) {
                    throw new ProviderTimeoutError(`Artwork for panel ${panel.panelNumber} timed out: ${message}`);
                }
                throw new GenerationError(`Artwork for panel ${panel.panelNumber} failed: ${message}`);
            }

            finished++;
            reporter.progress(finished, total, `Created ${finished} of ${total} panels`);
            return { panelNumber: panel.panelNumber, pageNumber: panel.pageNumber, prompt, imageUrl };
        });

        return freezeResult({
            stage: 'visual',
            artwork: [...artwork].sort((a, b) => a.panelNumber - b.panelNumber),
        });
    }
}
