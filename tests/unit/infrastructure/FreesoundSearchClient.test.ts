import nock from 'nock';
import { FreesoundSearchClient, toSoundSummary } from '../../../src/infrastructure/freesound/FreesoundSearchClient';
import { SEARCH_FIELDS } from '../../../src/infrastructure/freesound/schemas';
import { ApiError, NetworkError } from '../../../src/domain/errors';

describe('FreesoundSearchClient', () => {
    const apiKey = 'test-api-key';
    const baseUrl = 'https://freesound.test/apiv2';

    const rawSound = (id: number, name: string) => ({
        id,
        name,
        username: 'field_recorder',
        duration: 12.5,
        tags: ['rain', 'roof', 'storm', 'water'],
        created: '2014-04-16T20:07:11.145',
        description: 'Rain recorded under a tin roof.',
        license: 'http://creativecommons.org/publicdomain/zero/1.0/',
        type: 'wav',
        num_downloads: 320,
        avg_rating: 4.2,
        previews: {
            'preview-hq-mp3': `https://cdn.freesound.test/previews/${id}-hq.mp3`,
            'preview-lq-mp3': `https://cdn.freesound.test/previews/${id}-lq.mp3`,
        },
    });

    function expectSearch(page: number) {
        return nock(baseUrl)
            .get('/search/text/')
            .query({
                query: 'rain',
                token: apiKey,
                page_size: '3',
                page: String(page),
                fields: SEARCH_FIELDS,
            });
    }

    beforeEach(() => {
        nock.cleanAll();
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
        nock.enableNetConnect();
    });

    describe('Constructor validation', () => {
        it('should throw error when API key is missing', () => {
            expect(() => new FreesoundSearchClient('')).toThrow('Freesound API key is required');
        });
    });

    describe('search()', () => {
        it('should map a page of results', async () => {
            const client = new FreesoundSearchClient(apiKey, `${baseUrl}/`, 3);
            expectSearch(2).reply(200, {
                count: 7,
                results: [rawSound(1001, 'Rain on roof'), rawSound(1002, 'Rain on window')],
            });

            const page = await client.search('rain', 2);

            expect(page.query).toBe('rain');
            expect(page.pageNumber).toBe(2);
            expect(page.totalPages).toBe(3);
            expect(page.totalResults).toBe(7);
            expect(page.sounds).toHaveLength(2);
            expect(page.sounds[0]).toEqual({
                id: '1001',
                title: 'Rain on roof',
                durationSeconds: 12.5,
                previewUrl: 'https://cdn.freesound.test/previews/1001-hq.mp3',
                author: 'field_recorder',
                tags: ['rain', 'roof', 'storm', 'water'],
                createdAt: '2014-04-16T20:07:11.145',
                description: 'Rain recorded under a tin roof.',
                license: 'http://creativecommons.org/publicdomain/zero/1.0/',
                fileType: 'wav',
                downloads: 320,
                averageRating: 4.2,
            });
        });

        it('should leave the page count unknown when the API omits it', async () => {
            const client = new FreesoundSearchClient(apiKey, baseUrl, 3);
            expectSearch(1).reply(200, { results: [rawSound(1001, 'Rain on roof')] });

            const page = await client.search('rain', 1);

            expect(page.totalPages).toBeNull();
            expect(page.totalResults).toBeNull();
        });

        it('should report an empty result set as one page', async () => {
            const client = new FreesoundSearchClient(apiKey, baseUrl, 3);
            expectSearch(1).reply(200, { count: 0, results: [] });

            const page = await client.search('rain', 1);

            expect(page.sounds).toEqual([]);
            expect(page.totalPages).toBe(1);
        });

        it('should skip results without an HQ preview', async () => {
            const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
            const client = new FreesoundSearchClient(apiKey, baseUrl, 3);
            const noPreview = { ...rawSound(1003, 'Silent'), previews: { 'preview-lq-mp3': 'https://cdn.freesound.test/x.mp3' } };
            expectSearch(1).reply(200, { count: 2, results: [rawSound(1001, 'Rain on roof'), noPreview] });

            const page = await client.search('rain', 1);

            expect(page.sounds.map((sound) => sound.id)).toEqual(['1001']);
            expect(warnSpy).toHaveBeenCalledWith(
                "[FreesoundSearch] Skipping sound 1003 ('Silent'): no preview-hq-mp3 preview"
            );
            warnSpy.mockRestore();
        });

        it('should turn an error status into an ApiError with the API detail', async () => {
            const client = new FreesoundSearchClient(apiKey, baseUrl, 3);
            expectSearch(1).reply(401, { detail: 'Invalid token.' });

            const error = await client.search('rain', 1).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ApiError);
            expect(error).toMatchObject({
                code: 'API_ERROR',
                status: 401,
                message: 'Error searching Freesound: Invalid token.',
            });
        });

        it('should turn a connection failure into a NetworkError', async () => {
            const client = new FreesoundSearchClient(apiKey, baseUrl, 3);
            expectSearch(1).replyWithError('socket hang up');

            const error = await client.search('rain', 1).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(NetworkError);
            expect(error).toMatchObject({ message: 'Error searching Freesound: socket hang up' });
        });

        it('should reject a body that does not match the search schema', async () => {
            const client = new FreesoundSearchClient(apiKey, baseUrl, 3);
            expectSearch(1).reply(200, { count: 1, results: 'not-a-list' });

            await expect(client.search('rain', 1)).rejects.toThrow(
                'Error decoding search response from Freesound: data/results must be array'
            );
        });
    });

    describe('toSoundSummary()', () => {
        it('should fill missing optional fields with defaults', () => {
            const sound = toSoundSummary({
                id: 7,
                name: '',
                username: 'someone',
                duration: 1,
                previews: { 'preview-hq-mp3': 'https://cdn.freesound.test/7.mp3' },
            });

            expect(sound).toMatchObject({ id: '7', title: 'Untitled', tags: [] });
            expect(sound?.license).toBeUndefined();
        });
    });
});
