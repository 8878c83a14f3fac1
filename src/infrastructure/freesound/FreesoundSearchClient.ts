import axios from 'axios';
import Ajv from 'ajv';
import { ISoundSearchClient } from '../../domain/ports/ISoundSearchClient';
import { ResultPage, calculateTotalPages, createResultPage } from '../../domain/entities/ResultPage';
import { SoundSummary, createSoundSummary } from '../../domain/entities/Sound';
import { ApiError } from '../../domain/errors';
import {
    FreesoundSearchResponse,
    FreesoundSound,
    PREVIEW_KEY,
    SEARCH_FIELDS,
    SEARCH_RESPONSE_SCHEMA,
} from './schemas';
import { toRequestError } from './requestErrors';

const ajv = new Ajv({ allErrors: true });
const validateSearchResponse = ajv.compile<FreesoundSearchResponse>(SEARCH_RESPONSE_SCHEMA);

/**
 * Freesound text search (`GET /search/text/`).
 */
export class FreesoundSearchClient implements ISoundSearchClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly pageSize: number;
    private readonly timeoutMs: number;

    constructor(
        apiKey: string,
        baseUrl: string = 'https://freesound.org/apiv2',
        pageSize: number = 30,
        timeoutMs: number = 10000
    ) {
        if (!apiKey) {
            throw new Error('Freesound API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.pageSize = pageSize;
        this.timeoutMs = timeoutMs;
    }

    async search(query: string, page: number): Promise<ResultPage> {
        let data: unknown;
        try {
            const response = await axios.get<unknown>(`${this.baseUrl}/search/text/`, {
                params: {
                    query,
                    token: this.apiKey,
                    page_size: this.pageSize,
                    page,
                    fields: SEARCH_FIELDS,
                },
                timeout: this.timeoutMs,
            });
            data = response.data;
        } catch (error) {
            throw toRequestError(error, 'Error searching Freesound');
        }

        if (!validateSearchResponse(data)) {
            const reason = ajv.errorsText(validateSearchResponse.errors);
            throw new ApiError(`Error decoding search response from Freesound: ${reason}`);
        }

        return createResultPage({
            query,
            sounds: data.results.flatMap((raw) => {
                const sound = toSoundSummary(raw);
                return sound ? [sound] : [];
            }),
            pageNumber: page,
            totalPages: data.count !== undefined ? calculateTotalPages(data.count, this.pageSize) : null,
            totalResults: data.count ?? null,
        });
    }
}

/**
 * Maps one API result; results without an HQ MP3 preview cannot be played or
 * downloaded and are left out.
 */
export function toSoundSummary(raw: FreesoundSound): SoundSummary | null {
    const previewUrl = raw.previews?.[PREVIEW_KEY];
    if (!previewUrl) {
        console.warn(`[FreesoundSearch] Skipping sound ${raw.id} ('${raw.name}'): no ${PREVIEW_KEY} preview`);
        return null;
    }

    return createSoundSummary({
        id: String(raw.id),
        title: raw.name,
        durationSeconds: raw.duration,
        previewUrl,
        author: raw.username,
        tags: raw.tags,
        createdAt: raw.created,
        description: raw.description,
        license: raw.license,
        fileType: raw.type,
        downloads: raw.num_downloads,
        averageRating: raw.avg_rating,
    });
}
