import { Interface, createInterface } from 'readline/promises';
import { Command } from '../../domain/entities/Command';
import { PlaybackEngine, PlaybackEvent } from '../../application/PlaybackEngine';
import {
    CommandEffect,
    DispatchResult,
    SessionController,
    SessionSnapshot,
} from '../../application/SessionController';
import {
    COMMAND_HELP,
    ParserOptions,
    parseCommand,
    parseTarget,
    targetCommand,
    targetPrompt,
} from './CommandParser';
import { TerminalRenderer } from './TerminalRenderer';

export interface InteractiveShellDeps {
    controller: SessionController;
    playback: PlaybackEngine;
    renderer: TerminalRenderer;
    parser: ParserOptions;
    defaultQuery: string;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

type BrowseOutcome = 'newSearch' | 'quit';

/**
 * Foreground command loop. Waits for one line at a time and hands the parsed
 * Command to the controller; playback keeps running between prompts.
 */
export class InteractiveShell {
    private readonly controller: SessionController;
    private readonly playback: PlaybackEngine;
    private readonly renderer: TerminalRenderer;
    private readonly parser: ParserOptions;
    private readonly defaultQuery: string;
    private readonly rl: Interface;
    private closed: boolean = false;
    private readonly pendingPlays = new Set<Promise<void>>();

    constructor(deps: InteractiveShellDeps) {
        this.controller = deps.controller;
        this.playback = deps.playback;
        this.renderer = deps.renderer;
        this.parser = deps.parser;
        this.defaultQuery = deps.defaultQuery;
        this.rl = createInterface({
            input: deps.input ?? process.stdin,
            output: deps.output ?? process.stdout,
        });
        this.rl.on('close', () => {
            this.closed = true;
        });
    }

    async run(): Promise<void> {
        const unsubscribe = this.playback.subscribe((event) => this.onPlaybackEvent(event));
        this.rl.on('SIGINT', () => {
            this.interrupt().catch((error: unknown) => {
                console.error('[Shell] Interrupt handling failed:', error);
            });
        });

        try {
            while (!this.controller.isTerminated) {
                const searched = await this.searchLoop();
                if (!searched) {
                    break;
                }
                const outcome = await this.browseLoop();
                if (outcome === 'quit') {
                    break;
                }
            }
        } finally {
            if (!this.controller.isTerminated) {
                await this.controller.dispatch({ type: 'quit' });
            }
            await Promise.all(this.pendingPlays);
            unsubscribe();
            this.rl.close();
        }
    }

    /**
     * Prompts for queries until one returns results. Returns false when the user leaves.
     */
    private async searchLoop(): Promise<boolean> {
        while (!this.controller.isTerminated) {
            const answer = await this.ask(`Enter query [${this.defaultQuery}]`);
            if (answer === null) {
                return false;
            }
            const query = answer.trim() || this.defaultQuery;
            this.renderer.success(`Searching for '${query}'...`);

            const result = await this.controller.dispatch({ type: 'search', query });
            if (!result.ok) {
                this.renderer.error(result.error);
                this.renderer.error('An error occurred while searching. Please check your connection or API key.');
                const retry = await this.ask('Try searching again? (y/n) [y]');
                if (retry === null || (retry.trim().toLowerCase() || 'y') !== 'y') {
                    this.renderer.success('Exiting due to search error. Goodbye!');
                    return false;
                }
                continue;
            }

            const page = result.snapshot.page;
            if (!page || page.sounds.length === 0) {
                this.renderer.error(`No results found for '${query}'. Try a different search term.`);
                continue;
            }
            this.renderer.page(page);
            return true;
        }
        return false;
    }

    private async browseLoop(): Promise<BrowseOutcome> {
        while (!this.controller.isTerminated) {
            this.renderer.info(COMMAND_HELP);
            const line = await this.ask('Enter command');
            if (line === null) {
                return 'quit';
            }

            const command = await this.readCommand(line);
            if (!command) {
                continue;
            }
            if (command.type === 'play') {
                this.startPlay(command);
                continue;
            }

            const result = await this.controller.dispatch(command);
            const outcome = this.render(result);
            if (outcome) {
                return outcome;
            }
        }
        return 'quit';
    }

    private async readCommand(line: string): Promise<Command | null> {
        const parsed = parseCommand(line, this.parser);
        switch (parsed.kind) {
            case 'empty':
                return null;
            case 'invalid':
                this.renderer.error(parsed.message);
                return null;
            case 'command':
                return parsed.command;
            case 'needsTarget': {
                const pageLength = this.controller.snapshot().page?.sounds.length ?? 0;
                const answer = await this.ask(targetPrompt(parsed.verb, pageLength));
                if (answer === null) {
                    return null;
                }
                const target = parseTarget(answer);
                if (target === null) {
                    this.renderer.error("Please enter a valid number or 'r'");
                    return null;
                }
                return targetCommand(parsed.verb, target);
            }
        }
    }

    /**
     * Loads a clip without holding the prompt, so stop, seek and switch stay
     * available while the preview downloads. A play overtaken by another
     * command settles without an effect and prints nothing.
     */
    private startPlay(command: Command): void {
        const settled = this.controller
            .dispatch(command)
            .then((result) => {
                if (!result.ok) {
                    this.renderer.error(result.error);
                } else if (result.effect) {
                    this.renderEffect(result.effect, result.snapshot);
                }
            })
            .catch((error: unknown) => {
                console.error('[Shell] Rendering playback result failed:', error);
            })
            .finally(() => {
                this.pendingPlays.delete(settled);
            });
        this.pendingPlays.add(settled);

        const state = this.playback.currentState();
        if (state.status === 'loading') {
            this.renderer.playback(state);
        }
    }

    private render(result: DispatchResult): BrowseOutcome | null {
        if (!result.ok) {
            this.renderer.error(result.error);
            return null;
        }
        if (!result.effect) {
            this.renderer.playback(result.snapshot.playback);
            return null;
        }
        return this.renderEffect(result.effect, result.snapshot);
    }

    private renderEffect(effect: CommandEffect, snapshot: SessionSnapshot): BrowseOutcome | null {
        switch (effect.type) {
            case 'searched':
            case 'pageChanged':
                this.renderer.page(effect.page);
                return null;
            case 'inspected':
                this.renderer.detail(effect.detail);
                return null;
            case 'downloaded':
                this.renderer.success(`Downloaded '${effect.result.filePath}'`);
                return null;
            case 'playbackStarted':
                this.renderer.success(
                    `Playing #${effect.index}: ${effect.sound.title} (${effect.sound.durationSeconds.toFixed(2)}s)`
                );
                return null;
            case 'screenCleared':
                if (snapshot.page) {
                    this.renderer.page(snapshot.page);
                }
                return null;
            case 'restarted':
                this.renderer.success('Restarting search...');
                return 'newSearch';
            case 'terminated':
                this.renderer.success('Exiting. Goodbye!');
                return 'quit';
        }
    }

    private onPlaybackEvent(event: PlaybackEvent): void {
        if (event.type === 'finished') {
            this.renderer.success('Playback finished.');
        } else {
            this.renderer.error(event.error);
        }
    }

    /**
     * Ctrl+C stops the clip that is playing; with nothing playing it quits.
     */
    private async interrupt(): Promise<void> {
        if (this.playback.isActive()) {
            const result = await this.controller.dispatch({ type: 'stop' });
            if (result.ok) {
                this.renderer.info('Playback interrupted by user (Ctrl+C).');
            }
            return;
        }
        await this.controller.dispatch({ type: 'quit' });
        this.rl.close();
    }

    /**
     * Resolves with null once input is closed (Ctrl+D or a quit from Ctrl+C).
     */
    private async ask(prompt: string): Promise<string | null> {
        if (this.closed) {
            return null;
        }
        return new Promise((resolve, reject) => {
            const onClose = (): void => resolve(null);
            this.rl.once('close', onClose);
            this.rl.question(`${prompt}: `).then(
                (answer) => {
                    this.rl.off('close', onClose);
                    resolve(answer);
                },
                (error: unknown) => {
                    this.rl.off('close', onClose);
                    if (this.closed) {
                        resolve(null);
                    } else {
                        reject(error);
                    }
                }
            );
        });
    }
}
