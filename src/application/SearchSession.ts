import { ISoundSearchClient } from '../domain/ports/ISoundSearchClient';
import { ResultPage, isLastPage, soundAt } from '../domain/entities/ResultPage';
import { SoundSummary } from '../domain/entities/Sound';
import { InvalidInputError, NotFoundError, StateConflictError } from '../domain/errors';

/**
 * Point-in-time copy of the session, used for rendering and rollback.
 */
export interface SearchSnapshot {
    readonly query: string | null;
    readonly page: ResultPage | null;
    readonly selectedIndex: number | null;
}

export interface Selection {
    index: number;
    sound: SoundSummary;
}

/**
 * Cursor over the pages of one search. Pages are never cached: moving to a page
 * always re-fetches it. Every operation either commits fully or leaves the
 * session untouched.
 */
export class SearchSession {
    private query: string | null = null;
    private page: ResultPage | null = null;
    private selectedIndex: number | null = null;
    // Bumped by every navigation and reset; stale fetches are discarded
    private navigationSeq: number = 0;

    constructor(
        private readonly client: ISoundSearchClient,
        private readonly random: () => number = Math.random
    ) {}

    snapshot(): SearchSnapshot {
        return {
            query: this.query,
            page: this.page,
            selectedIndex: this.selectedIndex,
        };
    }

    restore(snapshot: SearchSnapshot): void {
        this.query = snapshot.query;
        this.page = snapshot.page;
        this.selectedIndex = snapshot.selectedIndex;
    }

    get currentPage(): ResultPage | null {
        return this.page;
    }

    get currentQuery(): string | null {
        return this.query;
    }

    get selection(): number | null {
        return this.selectedIndex;
    }

    async search(query: string): Promise<ResultPage> {
        const trimmed = query.trim();
        if (!trimmed) {
            throw new InvalidInputError('EmptyQuery', 'Search query cannot be empty');
        }
        return this.fetchAndCommit(trimmed, 1);
    }

    async pageForward(): Promise<ResultPage> {
        const { query, page } = this.requireActive();
        if (isLastPage(page)) {
            throw new NotFoundError('AtLastPage', 'Already on the last page.');
        }
        return this.fetchAndCommit(query, page.pageNumber + 1);
    }

    async pageBackward(): Promise<ResultPage> {
        const { query, page } = this.requireActive();
        if (page.pageNumber <= 1) {
            throw new NotFoundError('AtFirstPage', 'Already on the first page.');
        }
        return this.fetchAndCommit(query, page.pageNumber - 1);
    }

    async gotoPage(pageNumber: number): Promise<ResultPage> {
        const { query, page } = this.requireActive();
        const outOfRange = !Number.isInteger(pageNumber)
            || pageNumber < 1
            || (page.totalPages !== null && pageNumber > page.totalPages);
        if (outOfRange) {
            const range = page.totalPages !== null ? `between 1 and ${page.totalPages}` : 'of at least 1';
            throw new NotFoundError('InvalidPageIndex', `Page number out of range. Please enter a page ${range}.`);
        }
        return this.fetchAndCommit(query, pageNumber);
    }

    async gotoRandomPage(): Promise<ResultPage> {
        const { page } = this.requireActive();
        if (page.totalPages === null) {
            throw new NotFoundError('UnknownPageCount', 'No pages available to go to a random page.');
        }
        return this.gotoPage(this.pick(page.totalPages));
    }

    select(index: number): SoundSummary {
        const sound = this.page ? soundAt(this.page, index) : null;
        if (!sound) {
            const count = this.page?.sounds.length ?? 0;
            const message = count > 0
                ? `Invalid sound number. Please choose between 1 and ${count}.`
                : 'No sounds available on this page.';
            throw new NotFoundError('IndexOutOfRange', message);
        }
        this.selectedIndex = index;
        return sound;
    }

    selectRandom(): Selection {
        const count = this.page?.sounds.length ?? 0;
        if (count === 0) {
            throw new NotFoundError('EmptyPage', 'No sounds available on this page.');
        }
        const index = this.pick(count);
        return { index, sound: this.select(index) };
    }

    /**
     * Forgets the query, page and selection so a new search can start.
     */
    reset(): void {
        this.navigationSeq++;
        this.query = null;
        this.page = null;
        this.selectedIndex = null;
    }

    private requireActive(): { query: string; page: ResultPage } {
        if (this.query === null || this.page === null) {
            throw new StateConflictError('NoActiveSearch', 'No active search. Enter a query first.');
        }
        return { query: this.query, page: this.page };
    }

    private async fetchAndCommit(query: string, pageNumber: number): Promise<ResultPage> {
        const seq = ++this.navigationSeq;
        const page = await this.client.search(query, pageNumber);
        if (seq !== this.navigationSeq) {
            // Overtaken by a later navigation or reset; keep whatever it committed
            return page;
        }
        this.query = query;
        this.page = page;
        this.selectedIndex = null;
        return page;
    }

    /**
     * Uniform integer in [1, upper].
     */
    private pick(upper: number): number {
        const value = Math.floor(this.random() * upper) + 1;
        return Math.min(Math.max(value, 1), upper);
    }
}
