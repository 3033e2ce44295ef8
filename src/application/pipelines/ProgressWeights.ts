import { StageName } from '../../domain/entities/StageResult';

/**
 * Progress milestone reached when each stage finishes.
 * Tunable constants; assembly always ends at 1.0.
 */
export const PROGRESS_WITH_VIDEO: Readonly<Record<StageName, number>> = {
    ingest: 0.1,
    story: 0.3,
    script: 0.5,
    text: 0.6,
    visual: 0.85,
    video: 0.95,
    assembly: 1.0,
};

export const PROGRESS_WITHOUT_VIDEO: Readonly<Record<Exclude<StageName, 'video'>, number>> = {
    ingest: 0.1,
    story: 0.3,
    script: 0.5,
    text: 0.6,
    visual: 0.9,
    assembly: 1.0,
};

export interface ProgressSpan {
    start: number;
    end: number;
}

/**
 * Milestone for a finished stage, using the reduced table when video is off.
 */
export function progressMilestone(stage: StageName, includeVideo: boolean): number {
    if (includeVideo) {
        return PROGRESS_WITH_VIDEO[stage];
    }
    if (stage === 'video') {
        throw new Error('The video stage has no progress weight when video is not requested');
    }
    return PROGRESS_WITHOUT_VIDEO[stage];
}

/**
 * Progress range a stage moves through while it runs.
 */
export function progressSpan(stage: StageName, includeVideo: boolean): ProgressSpan {
    const order: StageName[] = includeVideo
        ? ['ingest', 'story', 'script', 'text', 'visual', 'video', 'assembly']
        : ['ingest', 'story', 'script', 'text', 'visual', 'assembly'];
    const index = order.indexOf(stage);
    const start = index > 0 ? progressMilestone(order[index - 1], includeVideo) : 0;
    return { start, end: progressMilestone(stage, includeVideo) };
}
