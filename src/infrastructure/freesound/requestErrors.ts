import axios from 'axios';
import { ApiError, NetworkError, SessionError } from '../../domain/errors';

/**
 * Extracts a human-readable detail from a Freesound error body.
 */
function errorDetail(data: unknown): string | undefined {
    if (typeof data === 'object' && data !== null && 'detail' in data) {
        return typeof data.detail === 'string' ? data.detail : undefined;
    }
    return undefined;
}

/**
 * Maps a failed axios request onto the session error taxonomy:
 * an HTTP status becomes ApiError, anything else NetworkError.
 */
export function toRequestError(error: unknown, context: string): SessionError {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            const detail = errorDetail(error.response.data) ?? error.message;
            return new ApiError(`${context}: ${detail}`, error.response.status);
        }
        return new NetworkError(`${context}: ${error.message}`);
    }
    if (error instanceof SessionError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new NetworkError(`${context}: ${message}`);
}
