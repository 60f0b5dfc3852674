import axios from 'axios';
import { classifyHttpStatus, ProviderError } from '../../errors';
import { ProviderId } from './AiProvider';

const TRANSIENT_CODES = new Set([
    'ECONNABORTED',
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'EAI_AGAIN',
    'ERR_CANCELED',
    'ERR_NETWORK',
]);

/**
 * Translate an axios (or unknown) failure into a ProviderError
 */
export function toProviderError(provider: ProviderId, label: string, error: unknown): ProviderError {
    if (error instanceof ProviderError) {
        return error;
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const data: unknown = error.response?.data;
        const vendorMessage = extractVendorMessage(data) || error.message;

        if (status === undefined && error.code && !TRANSIENT_CODES.has(error.code)) {
            return new ProviderError(provider, 'unknown', `${label} API error: ${vendorMessage}`);
        }

        return new ProviderError(
            provider,
            classifyHttpStatus(status),
            `${label} API error: ${vendorMessage}`,
            status
        );
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ProviderError(provider, 'unknown', `${label} API error: ${message}`);
}

/**
 * Both Gemini and Anthropic wrap failures as `{ error: { message } }`
 */
function extractVendorMessage(data: unknown): string | undefined {
    if (typeof data !== 'object' || data === null || !('error' in data)) {
        return undefined;
    }
    const inner = data.error;
    if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
        return inner.message;
    }
    return undefined;
}
