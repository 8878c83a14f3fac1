/**
 * SoundSummary - One search result from the sound library.
 */
export interface SoundSummary {
    /** Library identifier (kept as a string, the API returns numbers) */
    readonly id: string;
    readonly title: string;
    /** Clip length in seconds */
    readonly durationSeconds: number;
    /** Streamable compressed preview (HQ MP3) */
    readonly previewUrl: string;
    /** Uploader's username */
    readonly author: string;
    readonly tags: readonly string[];
    /** ISO-8601 upload timestamp */
    readonly createdAt?: string;
    readonly description?: string;
    readonly license?: string;
    /** Original file type, e.g. "wav" */
    readonly fileType?: string;
    readonly downloads?: number;
    readonly averageRating?: number;
}

export interface SoundSummaryParams {
    id: string;
    title: string;
    durationSeconds: number;
    previewUrl: string;
    author: string;
    tags?: string[];
    createdAt?: string;
    description?: string;
    license?: string;
    fileType?: string;
    downloads?: number;
    averageRating?: number;
}

/**
 * Creates a validated, frozen SoundSummary.
 */
export function createSoundSummary(params: SoundSummaryParams): SoundSummary {
    const id = params.id.trim();
    if (!id) {
        throw new Error('Sound id cannot be empty');
    }
    if (!Number.isFinite(params.durationSeconds) || params.durationSeconds < 0) {
        throw new Error(`Sound ${id} has an invalid duration: ${params.durationSeconds}`);
    }
    const previewUrl = params.previewUrl.trim();
    if (!previewUrl) {
        throw new Error(`Sound ${id} has no preview URL`);
    }

    return Object.freeze({
        id,
        title: params.title.trim() || 'Untitled',
        durationSeconds: params.durationSeconds,
        previewUrl,
        author: params.author.trim(),
        tags: Object.freeze((params.tags ?? []).map((tag) => tag.trim()).filter((tag) => tag.length > 0)),
        createdAt: params.createdAt,
        description: params.description,
        license: params.license,
        fileType: params.fileType,
        downloads: params.downloads,
        averageRating: params.averageRating,
    });
}
