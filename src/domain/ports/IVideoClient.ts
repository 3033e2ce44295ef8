/**
 * Request to animate one panel image.
 */
export interface VideoGenerationRequest {
    /** Source artwork used as the first frame */
    imageUrl: string;
    prompt: string;
}

export interface VideoReady {
    status: 'ready';
    videoUrl: string;
    durationSeconds?: number;
}

export interface VideoPending {
    status: 'pending';
    requestId: string;
    /** Provider's estimate, when it gives one */
    etaSeconds?: number;
}

export interface VideoFailed {
    status: 'failed';
    reason: string;
}

export type VideoSubmission = VideoReady | VideoPending;
export type VideoPollResult = VideoReady | VideoPending | VideoFailed;

/**
 * IVideoClient - Port for image-to-video providers.
 * Providers may answer immediately or hand back a request id to poll.
 * Implementations: ModelsLabVideoClient
 */
export interface IVideoClient {
    submitVideo(request: VideoGenerationRequest): Promise<VideoSubmission>;
    pollVideo(requestId: string): Promise<VideoPollResult>;
}
