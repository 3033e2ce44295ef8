import axios from 'axios';
import { ModelsLabVideoClient } from '../../../src/infrastructure/video/ModelsLabVideoClient';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('ModelsLabVideoClient', () => {
    const options = { apiKey: 'test-secret', baseUrl: 'https://video.example.com/api/v6', retryBackoffMs: 1 };

    beforeEach(() => {
        jest.clearAllMocks();
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('submitVideo', () => {
        test('should return a ready clip with its duration from frames and fps', async () => {
            const client = new ModelsLabVideoClient({ ...options, frames: 24, fps: 8 });
            mockedAxios.post.mockResolvedValueOnce({
                data: { status: 'success', output: ['https://cdn.example.com/clip.mp4'] },
            });

            const submission = await client.submitVideo({ imageUrl: 'https://cdn.example.com/p.png', prompt: 'slow pan' });

            expect(submission).toEqual({ status: 'ready', videoUrl: 'https://cdn.example.com/clip.mp4', durationSeconds: 3 });
            expect(mockedAxios.post).toHaveBeenCalledWith(
                'https://video.example.com/api/v6/video/img2video',
                expect.objectContaining({ key: 'test-secret', init_image: 'https://cdn.example.com/p.png', num_frames: 24, fps: 8 }),
                expect.anything()
            );
        });

        test('should return a pending submission with its request id', async () => {
            const client = new ModelsLabVideoClient(options);
            mockedAxios.post.mockResolvedValueOnce({ data: { status: 'processing', id: 123, eta: 30 } });

            const submission = await client.submitVideo({ imageUrl: 'u', prompt: 'p' });

            expect(submission).toEqual({ status: 'pending', requestId: '123', etaSeconds: 30 });
        });

        test('should throw when the provider rejects the submission', async () => {
            const client = new ModelsLabVideoClient(options);
            mockedAxios.post.mockResolvedValueOnce({ data: { status: 'failed', message: 'Image too small' } });

            await expect(client.submitVideo({ imageUrl: 'u', prompt: 'p' })).rejects.toThrow(
                'ModelsLab video submission failed: Image too small'
            );
        });
    });

    describe('pollVideo', () => {
        test('should map fetch responses onto poll results', async () => {
            const client = new ModelsLabVideoClient(options);
            mockedAxios.post
                .mockResolvedValueOnce({ data: { status: 'processing', id: 123 } })
                .mockResolvedValueOnce({ data: { status: 'success', output: ['https://cdn.example.com/done.mp4'] } })
                .mockResolvedValueOnce({ data: { status: 'error' } });

            await expect(client.pollVideo('123')).resolves.toEqual({ status: 'pending', requestId: '123', etaSeconds: undefined });
            await expect(client.pollVideo('123')).resolves.toEqual({
                status: 'ready',
                videoUrl: 'https://cdn.example.com/done.mp4',
                durationSeconds: 3.1,
            });
            await expect(client.pollVideo('123')).resolves.toEqual({ status: 'failed', reason: 'provider reported an error' });
            expect(mockedAxios.post).toHaveBeenCalledWith(
                'https://video.example.com/api/v6/video/fetch/123',
                { key: 'test-secret' },
                expect.anything()
            );
        });

        test('should retry rate limits before giving up', async () => {
            const client = new ModelsLabVideoClient({ ...options, maxAttempts: 2 });
            mockedAxios.post.mockRejectedValue({ isAxiosError: true, response: { status: 429 } });

            await expect(client.pollVideo('123')).rejects.toThrow('ModelsLab video status check failed with HTTP 429');
            expect(mockedAxios.post).toHaveBeenCalledTimes(2);
        });
    });
});
