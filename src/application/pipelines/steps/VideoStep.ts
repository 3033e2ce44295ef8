/**
 * Video step - animates each panel's artwork.
 * Pending clips are polled until ready, failed, or past the per-clip timeout.
 */

import { PipelineStep, StageContext, StageReporter, requireStageResult, throwIfCancelled } from '../PipelineInfrastructure';
import { IVideoClient } from '../../../domain/ports/IVideoClient';
import { ScriptPanel, VideoClip, VideoResult, freezeResult, STAGE_LABELS } from '../../../domain/entities/StageResult';
import { GenerationError, ProviderTimeoutError, classifyError } from '../../../domain/errors/PipelineErrors';
import { delay, mapWithConcurrency } from '../Concurrency';
import { buildPanelMotionPrompt } from '../../prompts/ComicPrompts';

export interface VideoStepOptions {
    pollIntervalMs: number;
    clipTimeoutMs: number;
    maxParallelClips: number;
    /** Used when the provider does not report a clip length */
    defaultClipSeconds?: number;
}

export class VideoStep implements PipelineStep {
    readonly name = 'video';
    readonly label = STAGE_LABELS.video;

    constructor(
        private readonly videoClient: IVideoClient,
        private readonly options: VideoStepOptions
    ) { }

    shouldSkip(context: StageContext): boolean {
        return !context.input.includeVideo;
    }

    async execute(context: StageContext, reporter: StageReporter): Promise<VideoResult> {
        const { script } = requireStageResult(context, 'script');
        const { artwork } = requireStageResult(context, 'visual');
        const panelsByNumber = new Map(script.panels.map((panel) => [panel.panelNumber, panel]));
        const total = artwork.length;
        let finished = 0;

        const clips = await mapWithConcurrency(artwork, this.options.maxParallelClips, async (art): Promise<VideoClip> => {
            const panel = panelsByNumber.get(art.panelNumber);
            if (!panel) {
                throw new GenerationError(`No script panel for artwork ${art.panelNumber}`);
            }

            throwIfCancelled(context, reporter);
            reporter.message(`Animating panel ${art.panelNumber} of ${total}`);

            const clip = await this.animatePanel(context, reporter, panel, art.imageUrl);
            finished++;
            reporter.progress(finished, total, `Animated ${finished} of ${total} panels`);
            return clip;
        });

        return freezeResult({
            stage: 'video',
            clips: [...clips].sort((a, b) => a.panelNumber - b.panelNumber),
        });
    }

    private async animatePanel(
        context: StageContext,
        reporter: StageReporter,
        panel: ScriptPanel,
        imageUrl: string
    ): Promise<VideoClip> {
        const prompt = buildPanelMotionPrompt(panel);
        const label = `Video clip for panel ${panel.panelNumber}`;

        const submission = await this.callProvider(label, () => this.videoClient.submitVideo({ imageUrl, prompt }));
        if (submission.status === 'ready') {
            return this.toClip(panel, prompt, submission.videoUrl, submission.durationSeconds);
        }

        const { requestId } = submission;
        const deadline = Date.now() + this.options.clipTimeoutMs;
        while (Date.now() < deadline) {
            await delay(Math.min(this.options.pollIntervalMs, Math.max(0, deadline - Date.now())));
            throwIfCancelled(context, reporter);

            const poll = await this.callProvider(label, () => this.videoClient.pollVideo(requestId));
            if (poll.status === 'ready') {
                return this.toClip(panel, prompt, poll.videoUrl, poll.durationSeconds);
            }
            if (poll.status === 'failed') {
                throw new GenerationError(`${label} failed: ${poll.reason}`);
            }
        }

        console.error(`[${context.jobId}] ${label} (request ${requestId}) timed out`);
        throw new ProviderTimeoutError(`${label} did not resolve within ${formatWait(this.options.clipTimeoutMs)}`);
    }

    private async callProvider<T>(label: string, call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (error) {
            const { message } = classifyError(error);
            throw error instanceof ProviderTimeoutError
                ? new ProviderTimeoutError(`${label} timed out: ${message}`)
                : new GenerationError(`${label} failed: ${message}`);
        }
    }

    private toClip(panel: ScriptPanel, prompt: string, videoUrl: string, durationSeconds?: number): VideoClip {
        return {
            panelNumber: panel.panelNumber,
            prompt,
            videoUrl,
            durationSeconds: durationSeconds ?? this.options.defaultClipSeconds ?? 3,
        };
    }
}

function formatWait(ms: number): string {
    return ms < 1000 ? `${ms}ms` : `${Math.round(ms / 1000)}s`;
}
