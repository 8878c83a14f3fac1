import { SoundSummary } from './Sound';

/**
 * ResultPage - Immutable snapshot of one fetched page of search results.
 * Sounds are addressed by the user with 1-based indices.
 */
export interface ResultPage {
    readonly query: string;
    readonly sounds: readonly SoundSummary[];
    /** 1-based page number */
    readonly pageNumber: number;
    /** Total number of pages, null when the API did not report a count */
    readonly totalPages: number | null;
    readonly totalResults: number | null;
}

export function createResultPage(params: {
    query: string;
    sounds: SoundSummary[];
    pageNumber: number;
    totalPages: number | null;
    totalResults?: number | null;
}): ResultPage {
    if (!Number.isInteger(params.pageNumber) || params.pageNumber < 1) {
        throw new Error(`Page number must be a positive integer, got: ${params.pageNumber}`);
    }
    if (params.totalPages !== null && (!Number.isInteger(params.totalPages) || params.totalPages < 1)) {
        throw new Error(`Total pages must be a positive integer, got: ${params.totalPages}`);
    }

    return Object.freeze({
        query: params.query,
        sounds: Object.freeze([...params.sounds]),
        pageNumber: params.pageNumber,
        totalPages: params.totalPages,
        totalResults: params.totalResults ?? null,
    });
}

/**
 * Number of pages needed for a result count. An empty result set is one (empty) page.
 */
export function calculateTotalPages(totalResults: number, pageSize: number): number {
    if (pageSize < 1) {
        throw new Error('Page size must be at least 1');
    }
    if (totalResults <= 0) {
        return 1;
    }
    return Math.ceil(totalResults / pageSize);
}

/**
 * Whether the page is the last one, as far as the page count is known.
 */
export function isLastPage(page: ResultPage): boolean {
    return page.totalPages !== null && page.pageNumber >= page.totalPages;
}

/**
 * Returns the sound at a 1-based index, or null when out of range.
 */
export function soundAt(page: ResultPage, index: number): SoundSummary | null {
    if (!Number.isInteger(index) || index < 1 || index > page.sounds.length) {
        return null;
    }
    return page.sounds[index - 1];
}
