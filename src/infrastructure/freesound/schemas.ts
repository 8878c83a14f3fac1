/**
 * Shape of a Freesound sound as requested through SEARCH_FIELDS.
 */
export interface FreesoundSound {
    id: number;
    name: string;
    username: string;
    duration: number;
    tags?: string[];
    created?: string;
    description?: string;
    license?: string;
    type?: string;
    num_downloads?: number;
    avg_rating?: number;
    previews?: Record<string, string>;
}

export interface FreesoundSearchResponse {
    count?: number;
    results: FreesoundSound[];
}

/** Preview used for playback and download */
export const PREVIEW_KEY = 'preview-hq-mp3';

export const SEARCH_FIELDS = [
    'id', 'username', 'created', 'name', 'tags', 'description', 'license',
    'type', 'duration', 'num_downloads', 'avg_rating', 'previews',
].join(',');

export const SOUND_SCHEMA = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        name: { type: 'string' },
        username: { type: 'string' },
        duration: { type: 'number', minimum: 0 },
        tags: { type: 'array', items: { type: 'string' } },
        created: { type: 'string' },
        description: { type: 'string' },
        license: { type: 'string' },
        type: { type: 'string' },
        num_downloads: { type: 'integer', minimum: 0 },
        avg_rating: { type: 'number' },
        previews: { type: 'object', additionalProperties: { type: 'string' } },
    },
    required: ['id', 'name', 'username', 'duration'],
};

export const SEARCH_RESPONSE_SCHEMA = {
    type: 'object',
    properties: {
        count: { type: 'integer', minimum: 0 },
        results: { type: 'array', items: SOUND_SCHEMA },
    },
    required: ['results'],
};
