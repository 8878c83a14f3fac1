import { ResultPage } from '../entities/ResultPage';

/**
 * ISoundSearchClient - Port for the remote sound library search.
 * Implementations: FreesoundSearchClient
 */
export interface ISoundSearchClient {
    /**
     * Fetches one page of results for a query.
     * Rejects with NetworkError or ApiError.
     */
    search(query: string, page: number): Promise<ResultPage>;
}
