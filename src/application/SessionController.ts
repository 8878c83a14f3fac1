import { Command, IndexTarget } from '../domain/entities/Command';
import { PlaybackState, isAudible, soundIdOf } from '../domain/entities/PlaybackState';
import { ResultPage } from '../domain/entities/ResultPage';
import { SoundSummary } from '../domain/entities/Sound';
import { DetailView, ISoundInspector } from '../domain/ports/ISoundInspector';
import { DownloadResult, ISoundDownloader } from '../domain/ports/ISoundDownloader';
import { IScreen } from '../domain/ports/IScreen';
import {
    InternalAudioError,
    NetworkError,
    SessionError,
    StateConflictError,
    asSessionError,
} from '../domain/errors';
import { PlaybackEngine } from './PlaybackEngine';
import { SearchSession, Selection } from './SearchSession';

/**
 * Everything a renderer needs after a command.
 */
export interface SessionSnapshot {
    readonly query: string | null;
    readonly page: ResultPage | null;
    readonly selectedIndex: number | null;
    readonly playback: PlaybackState;
    readonly terminated: boolean;
}

/**
 * Side results of a command beyond the state change itself.
 */
export type CommandEffect =
    | { type: 'searched'; page: ResultPage }
    | { type: 'pageChanged'; page: ResultPage }
    | { type: 'inspected'; index: number; detail: DetailView }
    | { type: 'downloaded'; index: number; sound: SoundSummary; result: DownloadResult }
    | { type: 'playbackStarted'; index: number; sound: SoundSummary }
    | { type: 'restarted' }
    | { type: 'screenCleared' }
    | { type: 'terminated' };

export type DispatchResult =
    | { ok: true; snapshot: SessionSnapshot; effect?: CommandEffect }
    | { ok: false; error: SessionError };

export interface SessionControllerDeps {
    search: SearchSession;
    playback: PlaybackEngine;
    inspector: ISoundInspector;
    downloader: ISoundDownloader;
    screen: IScreen;
}

/**
 * Top-level state machine. Consumes one Command at a time and drives the
 * search session and the playback engine. Browsing and listening are
 * independent: page changes never stop the clip that is playing.
 */
export class SessionController {
    private readonly search: SearchSession;
    private readonly playback: PlaybackEngine;
    private readonly inspector: ISoundInspector;
    private readonly downloader: ISoundDownloader;
    private readonly screen: IScreen;
    private terminated: boolean = false;

    constructor(deps: SessionControllerDeps) {
        this.search = deps.search;
        this.playback = deps.playback;
        this.inspector = deps.inspector;
        this.downloader = deps.downloader;
        this.screen = deps.screen;
    }

    snapshot(): SessionSnapshot {
        const search = this.search.snapshot();
        return {
            query: search.query,
            page: search.page,
            selectedIndex: search.selectedIndex,
            playback: this.playback.currentState(),
            terminated: this.terminated,
        };
    }

    get isTerminated(): boolean {
        return this.terminated;
    }

    async dispatch(command: Command): Promise<DispatchResult> {
        if (this.terminated) {
            return this.failure(new StateConflictError('Terminated', 'Session has ended.'));
        }

        try {
            const effect = await this.execute(command);
            return { ok: true, snapshot: this.snapshot(), effect };
        } catch (error) {
            return this.failure(asSessionError(error, (message) =>
                isPlaybackCommand(command) ? new InternalAudioError(message) : new NetworkError(message)
            ));
        }
    }

    private async execute(command: Command): Promise<CommandEffect | undefined> {
        switch (command.type) {
            case 'search':
                return { type: 'searched', page: await this.search.search(command.query) };

            case 'pageForward':
                return { type: 'pageChanged', page: await this.search.pageForward() };

            case 'pageBackward':
                return { type: 'pageChanged', page: await this.search.pageBackward() };

            case 'goToPage': {
                const page = command.target === 'random'
                    ? await this.search.gotoRandomPage()
                    : await this.search.gotoPage(command.target);
                return { type: 'pageChanged', page };
            }

            case 'restart':
                this.search.reset();
                return { type: 'restarted' };

            case 'play':
                return this.withSelection(command.target, async ({ index, sound }) => {
                    const state = await this.playback.play(sound);
                    // A stop or another play may have overtaken this load
                    if (!isAudible(state) || soundIdOf(state) !== sound.id) {
                        return undefined;
                    }
                    return { type: 'playbackStarted', index, sound };
                });

            case 'inspect':
                return this.withSelection(command.target, async ({ index, sound }) => ({
                    type: 'inspected',
                    index,
                    detail: this.inspector.inspect(sound),
                }));

            case 'download':
                return this.withSelection(command.target, async ({ index, sound }) => ({
                    type: 'downloaded',
                    index,
                    sound,
                    result: await this.downloader.download(sound),
                }));

            case 'seekRelative':
                this.playback.seek(command.deltaSeconds);
                return undefined;

            case 'seekToFraction':
                this.playback.seekToFraction(command.fraction);
                return undefined;

            case 'togglePause':
                this.playback.togglePause();
                return undefined;

            case 'stop':
                this.playback.stop();
                return undefined;

            case 'clearScreen':
                this.screen.clear();
                return { type: 'screenCleared' };

            case 'quit':
                if (this.playback.isActive()) {
                    this.playback.stop();
                }
                this.terminated = true;
                return { type: 'terminated' };

            default:
                return assertNever(command);
        }
    }

    /**
     * Resolves a target against the current page and runs `action` on it.
     * The previous selection is restored when the action fails, unless a later
     * command changed the page or selection in the meantime.
     */
    private async withSelection(
        target: IndexTarget,
        action: (selection: Selection) => Promise<CommandEffect | undefined>
    ): Promise<CommandEffect | undefined> {
        const before = this.search.snapshot();
        const selection = target === 'random'
            ? this.search.selectRandom()
            : { index: target, sound: this.search.select(target) };

        try {
            return await action(selection);
        } catch (error) {
            // Commands issued while the action was pending keep their effect
            const current = this.search.snapshot();
            if (current.page === before.page && current.selectedIndex === selection.index) {
                this.search.restore(before);
            }
            throw error;
        }
    }

    private failure(error: SessionError): DispatchResult {
        return { ok: false, error };
    }
}

function isPlaybackCommand(command: Command): boolean {
    switch (command.type) {
        case 'play':
        case 'seekRelative':
        case 'seekToFraction':
        case 'togglePause':
        case 'stop':
        case 'quit':
            return true;
        default:
            return false;
    }
}

function assertNever(value: never): never {
    throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}
