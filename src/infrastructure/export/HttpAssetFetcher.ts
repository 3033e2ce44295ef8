import axios from 'axios';
import { IAssetFetcher } from '../../domain/ports/IAssetFetcher';
import { AssemblyError } from '../../domain/errors/PipelineErrors';
import { withRetry, isRetryableHttpError, getHttpStatus } from '../resilience/RetryUtils';

const DATA_URL_PATTERN = /^data:[^;,]+(;base64)?,(.*)$/s;

/**
 * Downloads generated media for embedding into exports.
 * Accepts http(s) URLs and inline data URLs.
 */
export class HttpAssetFetcher implements IAssetFetcher {
    constructor(
        private readonly timeoutMs: number = 60000,
        private readonly maxAttempts: number = 3
    ) { }

    async fetch(url: string): Promise<Buffer> {
        const inline = DATA_URL_PATTERN.exec(url);
        if (inline) {
            return inline[1]
                ? Buffer.from(inline[2], 'base64')
                : Buffer.from(decodeURIComponent(inline[2]), 'utf-8');
        }

        try {
            const response = await withRetry(
                () => axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', timeout: this.timeoutMs }),
                { maxAttempts: this.maxAttempts, isRetryable: isRetryableHttpError }
            );
            return Buffer.from(response.data);
        } catch (error) {
            const status = getHttpStatus(error);
            const detail = status !== undefined ? `HTTP ${status}` : 'network error';
            throw new AssemblyError(`Could not download asset ${shortenUrl(url)} (${detail})`);
        }
    }
}

function shortenUrl(url: string): string {
    return url.length > 80 ? `${url.substring(0, 77)}...` : url;
}
