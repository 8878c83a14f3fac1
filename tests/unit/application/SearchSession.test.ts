import { SearchSession } from '../../../src/application/SearchSession';
import { ISoundSearchClient } from '../../../src/domain/ports/ISoundSearchClient';
import { ResultPage, createResultPage } from '../../../src/domain/entities/ResultPage';
import {
    InvalidInputError,
    NetworkError,
    NotFoundError,
    StateConflictError,
} from '../../../src/domain/errors';
import { InMemorySearchClient, makeSound } from '../../helpers/fakes';

function sounds(count: number) {
    return Array.from({ length: count }, (_, i) => makeSound(String(i + 1)));
}

describe('SearchSession', () => {
    describe('search', () => {
        it('should fetch page 1 and clear the selection', async () => {
            const client = new InMemorySearchClient(sounds(7), 3);
            const session = new SearchSession(client);

            const page = await session.search('  rain  ');

            expect(client.calls).toEqual([{ query: 'rain', page: 1 }]);
            expect(page.pageNumber).toBe(1);
            expect(page.totalPages).toBe(3);
            expect(session.snapshot()).toEqual({ query: 'rain', page, selectedIndex: null });
        });

        it('should reject a blank query without calling the API', async () => {
            const client = new InMemorySearchClient(sounds(3));
            const session = new SearchSession(client);

            await expect(session.search('   ')).rejects.toThrow(InvalidInputError);
            await expect(session.search('')).rejects.toThrow('Search query cannot be empty');
            expect(client.calls).toHaveLength(0);
        });

        it('should commit an empty page as page 1 of 1', async () => {
            const session = new SearchSession(new InMemorySearchClient([]));

            const page = await session.search('zzzz');

            expect(page.sounds).toHaveLength(0);
            expect(page.totalPages).toBe(1);
            expect(session.currentQuery).toBe('zzzz');
        });

        it('should leave the session untouched when the request fails', async () => {
            const client = new InMemorySearchClient(sounds(7), 3);
            const session = new SearchSession(client);
            await session.search('rain');
            session.select(2);
            const before = session.snapshot();

            client.failWith = new NetworkError('Error searching Freesound: socket hang up');

            await expect(session.search('wind')).rejects.toThrow('socket hang up');
            expect(session.snapshot()).toEqual(before);
        });
    });

    describe('paging', () => {
        let client: InMemorySearchClient;
        let session: SearchSession;

        beforeEach(async () => {
            client = new InMemorySearchClient(sounds(7), 3);
            session = new SearchSession(client);
            await session.search('rain');
        });

        it('should move forward and back, re-fetching every page', async () => {
            const second = await session.pageForward();
            expect(second.pageNumber).toBe(2);
            expect(second.sounds.map((s) => s.id)).toEqual(['4', '5', '6']);

            const first = await session.pageBackward();
            expect(first.pageNumber).toBe(1);

            expect(client.calls).toEqual([
                { query: 'rain', page: 1 },
                { query: 'rain', page: 2 },
                { query: 'rain', page: 1 },
            ]);
        });

        it('should fail with AtFirstPage on page 1', async () => {
            await expect(session.pageBackward()).rejects.toMatchObject({
                reason: 'AtFirstPage',
                message: 'Already on the first page.',
            });
            expect(client.calls).toHaveLength(1);
        });

        it('should fail with AtLastPage on the last page', async () => {
            await session.gotoPage(3);

            await expect(session.pageForward()).rejects.toMatchObject({
                reason: 'AtLastPage',
                message: 'Already on the last page.',
            });
            expect(session.currentPage?.pageNumber).toBe(3);
        });

        it('should reject page numbers outside the known range', async () => {
            await expect(session.gotoPage(4)).rejects.toThrow(
                'Page number out of range. Please enter a page between 1 and 3.'
            );
            await expect(session.gotoPage(0)).rejects.toMatchObject({ reason: 'InvalidPageIndex' });
            expect(session.currentPage?.pageNumber).toBe(1);
        });

        it('should clear the selection after moving', async () => {
            session.select(1);
            await session.pageForward();
            expect(session.selection).toBeNull();
        });

        it('should keep the current page when a page fetch fails', async () => {
            client.failWith = new NetworkError('offline');

            await expect(session.pageForward()).rejects.toThrow(NetworkError);
            expect(session.currentPage?.pageNumber).toBe(1);
        });
    });

    describe('single page of results', () => {
        it('should fail with AtLastPage after goto_page(1)', async () => {
            const session = new SearchSession(new InMemorySearchClient(sounds(2), 3));
            await session.search('rain');

            await session.gotoPage(1);

            await expect(session.pageForward()).rejects.toMatchObject({ reason: 'AtLastPage' });
        });
    });

    describe('unknown page count', () => {
        it('should allow paging forward and refuse a random page', async () => {
            const client = new InMemorySearchClient(sounds(7), 3);
            client.reportCount = false;
            const session = new SearchSession(client);
            await session.search('rain');

            const next = await session.pageForward();
            expect(next.pageNumber).toBe(2);

            await expect(session.gotoRandomPage()).rejects.toMatchObject({
                reason: 'UnknownPageCount',
                message: 'No pages available to go to a random page.',
            });
        });
    });

    describe('random navigation', () => {
        it('should map the random draw onto a page number', async () => {
            const client = new InMemorySearchClient(sounds(7), 3);
            const session = new SearchSession(client, () => 0.99);
            await session.search('rain');

            const page = await session.gotoRandomPage();

            expect(page.pageNumber).toBe(3);
        });

        it('should pick indices within the page for any draw', async () => {
            const draws = [0, 0.34, 0.67, 0.999999];
            let next = 0;
            const session = new SearchSession(new InMemorySearchClient(sounds(3), 3), () => draws[next++]);
            await session.search('rain');

            const picked = draws.map(() => session.selectRandom().index);

            expect(picked).toEqual([1, 2, 3, 3]);
            expect(session.selection).toBe(3);
        });

        it.each([0, 1, 2, 3, 4])('should keep random picks on a page of %i sounds', async (length) => {
            const draws = [0, 0.2, 0.25, 0.5, 0.75, 0.999999];
            let next = 0;
            const session = new SearchSession(new InMemorySearchClient(sounds(length), 4), () => draws[next++]);
            await session.search('rain');

            if (length === 0) {
                expect(() => session.selectRandom()).toThrow('No sounds available on this page.');
                expect(session.selection).toBeNull();
                return;
            }
            for (let i = 0; i < draws.length; i++) {
                const { index, sound } = session.selectRandom();
                expect(index).toBe(Math.floor(draws[i] * length) + 1);
                expect(sound.id).toBe(String(index));
                expect(session.selection).toBe(index);
            }
        });

        it('should fail with EmptyPage when the page has no sounds', async () => {
            const session = new SearchSession(new InMemorySearchClient([]));
            await session.search('zzzz');

            expect(() => session.selectRandom()).toThrow(NotFoundError);
            expect(() => session.selectRandom()).toThrow('No sounds available on this page.');
        });
    });

    describe('select', () => {
        it('should record a valid index', async () => {
            const session = new SearchSession(new InMemorySearchClient(sounds(3)));
            await session.search('rain');

            const sound = session.select(2);

            expect(sound.id).toBe('2');
            expect(session.selection).toBe(2);
        });

        it('should reject indices outside the page and keep the old selection', async () => {
            const session = new SearchSession(new InMemorySearchClient(sounds(3)));
            await session.search('rain');
            session.select(1);

            expect(() => session.select(4)).toThrow('Invalid sound number. Please choose between 1 and 3.');
            expect(() => session.select(0)).toThrow(NotFoundError);
            expect(session.selection).toBe(1);
        });

        it.each([0, 1, 2, 3, 4])('should accept exactly the indices 1..n on a page of %i sounds', async (length) => {
            const session = new SearchSession(new InMemorySearchClient(sounds(length), 4));
            await session.search('rain');

            for (let index = 1; index <= length; index++) {
                expect(session.select(index).id).toBe(String(index));
                expect(session.selection).toBe(index);
            }

            const lastValid = length > 0 ? length : null;
            for (const index of [0, -1, -length, length + 1, length + 2, 0.5, 1.5, length - 0.5, NaN]) {
                expect(() => session.select(index)).toThrow(NotFoundError);
                expect(session.selection).toBe(lastValid);
            }
        });

        it('should explain when the page is empty', async () => {
            const session = new SearchSession(new InMemorySearchClient([]));
            await session.search('zzzz');

            expect(() => session.select(1)).toThrow('No sounds available on this page.');
        });
    });

    describe('without an active search', () => {
        it('should refuse navigation', async () => {
            const session = new SearchSession(new InMemorySearchClient(sounds(3)));

            await expect(session.pageForward()).rejects.toThrow(StateConflictError);
            await expect(session.gotoPage(1)).rejects.toThrow('No active search. Enter a query first.');
        });
    });

    describe('reset', () => {
        it('should forget the query, page and selection', async () => {
            const session = new SearchSession(new InMemorySearchClient(sounds(3)));
            await session.search('rain');
            session.select(1);

            session.reset();

            expect(session.snapshot()).toEqual({ query: null, page: null, selectedIndex: null });
        });

        it('should discard a fetch that finishes after the reset', async () => {
            let release: (page: ResultPage) => void = () => undefined;
            const client: ISoundSearchClient = {
                search: () => new Promise<ResultPage>((resolve) => {
                    release = resolve;
                }),
            };
            const session = new SearchSession(client);

            const pending = session.search('rain');
            session.reset();
            release(createResultPage({ query: 'rain', sounds: sounds(1), pageNumber: 1, totalPages: 1 }));
            await pending;

            expect(session.currentQuery).toBeNull();
            expect(session.currentPage).toBeNull();
        });
    });
});
