import axios from 'axios';
import { ModelsLabImageClient } from '../../../src/infrastructure/images/ModelsLabImageClient';
import { GenerationError, ProviderTimeoutError } from '../../../src/domain/errors/PipelineErrors';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('ModelsLabImageClient', () => {
    const options = {
        apiKey: 'test-secret',
        baseUrl: 'https://images.example.com/api/v6',
        retryBackoffMs: 1,
        pollIntervalMs: 1,
        maxPollAttempts: 3,
    };

    beforeEach(() => {
        jest.clearAllMocks();
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('should require an API key', () => {
        expect(() => new ModelsLabImageClient({ apiKey: '' })).toThrow('ModelsLab API key is required');
    });

    test('should return the first output URL of a finished generation', async () => {
        const client = new ModelsLabImageClient(options);
        mockedAxios.post.mockResolvedValueOnce({
            data: { status: 'success', output: ['https://cdn.example.com/panel.png'] },
        });

        const result = await client.generateImage({ prompt: 'a robot in the rain', width: 768 });

        expect(result).toEqual({ imageUrl: 'https://cdn.example.com/panel.png' });
        expect(mockedAxios.post).toHaveBeenCalledWith(
            'https://images.example.com/api/v6/images/text2img',
            expect.objectContaining({ key: 'test-secret', prompt: 'a robot in the rain', width: '768', height: '1024', samples: '1' }),
            expect.objectContaining({ timeout: 120000 })
        );
    });

    test('should fetch a queued generation until it finishes', async () => {
        const client = new ModelsLabImageClient(options);
        mockedAxios.post
            .mockResolvedValueOnce({ data: { status: 'processing', id: 77, eta: 4 } })
            .mockResolvedValueOnce({ data: { status: 'processing', id: 77 } })
            .mockResolvedValueOnce({ data: { status: 'success', output: ['https://cdn.example.com/late.png'] } });

        const result = await client.generateImage({ prompt: 'p' });

        expect(result.imageUrl).toBe('https://cdn.example.com/late.png');
        expect(mockedAxios.post).toHaveBeenNthCalledWith(
            2,
            'https://images.example.com/api/v6/images/fetch/77',
            { key: 'test-secret' },
            expect.anything()
        );
    });

    test('should time out when the poll budget runs out', async () => {
        const client = new ModelsLabImageClient(options);
        mockedAxios.post.mockResolvedValue({ data: { status: 'processing', id: 'abc' } });

        await expect(client.generateImage({ prompt: 'p' })).rejects.toThrow(
            new ProviderTimeoutError('ModelsLab image abc did not finish after 3 polls')
        );
        expect(mockedAxios.post).toHaveBeenCalledTimes(4);
    });

    test('should surface a provider error message', async () => {
        const client = new ModelsLabImageClient(options);
        mockedAxios.post.mockResolvedValueOnce({ data: { status: 'error', message: 'Invalid prompt' } });

        await expect(client.generateImage({ prompt: 'p' })).rejects.toThrow(
            new GenerationError('ModelsLab image generation failed: Invalid prompt')
        );
    });

    test('should report HTTP failures by status only', async () => {
        const client = new ModelsLabImageClient({ ...options, maxAttempts: 1 });
        mockedAxios.post.mockRejectedValueOnce({ isAxiosError: true, response: { status: 500, data: 'stack trace' } });

        await expect(client.generateImage({ prompt: 'p' })).rejects.toThrow(
            'ModelsLab image generation failed with HTTP 500'
        );
    });
});
