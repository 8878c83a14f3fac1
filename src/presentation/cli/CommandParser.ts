import { Command, IndexTarget } from '../../domain/entities/Command';

/** Commands that take a sound number or page number */
export type TargetVerb = 'play' | 'inspect' | 'download' | 'goToPage';

export type ParseResult =
    | { kind: 'command'; command: Command }
    | { kind: 'needsTarget'; verb: TargetVerb }
    | { kind: 'invalid'; message: string }
    | { kind: 'empty' };

export interface ParserOptions {
    /** Seconds moved by the `ff` and `rw` shortcuts */
    seekStepSeconds: number;
}

export const COMMAND_HELP =
    'Commands: play #/r, inspect #, download #, prev, next, go #/r, restart, quit, clear (r for random) | ' +
    'playback: pause, stop, 0-9 seek to 0-90%, +N/-N or ff/rw seek seconds';

const TARGET_VERBS = new Map<string, TargetVerb>([
    ['p', 'play'],
    ['play', 'play'],
    ['i', 'inspect'],
    ['inspect', 'inspect'],
    ['d', 'download'],
    ['download', 'download'],
    ['g', 'goToPage'],
    ['go', 'goToPage'],
]);

const SIMPLE_COMMANDS = new Map<string, Command>([
    ['q', { type: 'quit' }],
    ['quit', { type: 'quit' }],
    ['exit', { type: 'quit' }],
    ['r', { type: 'restart' }],
    ['restart', { type: 'restart' }],
    ['prev', { type: 'pageBackward' }],
    ['<', { type: 'pageBackward' }],
    ['next', { type: 'pageForward' }],
    ['>', { type: 'pageForward' }],
    ['c', { type: 'clearScreen' }],
    ['clear', { type: 'clearScreen' }],
    ['s', { type: 'stop' }],
    ['stop', { type: 'stop' }],
    ['pause', { type: 'togglePause' }],
    ['resume', { type: 'togglePause' }],
]);

const SIGNED_NUMBER = /^[+-]\d+(\.\d+)?$/;

/**
 * Parses `r`/`random` or a positive whole number.
 */
export function parseTarget(arg: string): IndexTarget | null {
    const value = arg.trim().toLowerCase();
    if (value === 'r' || value === 'random') {
        return 'random';
    }
    if (/^\d+$/.test(value)) {
        return parseInt(value, 10);
    }
    return null;
}

export function targetCommand(verb: TargetVerb, target: IndexTarget): Command {
    return { type: verb, target };
}

/**
 * Prompt used when a target verb was typed without its argument.
 */
export function targetPrompt(verb: TargetVerb, pageLength: number): string {
    if (verb === 'goToPage') {
        return "Enter page number or 'r' for random";
    }
    return `Enter sound number (1-${pageLength}) or 'r' for random`;
}

/**
 * Decodes one line of user input into a Command.
 */
export function parseCommand(input: string, options: ParserOptions): ParseResult {
    const line = input.trim();
    if (!line) {
        return { kind: 'empty' };
    }
    const lowered = line.toLowerCase();

    const simple = SIMPLE_COMMANDS.get(lowered);
    if (simple) {
        return { kind: 'command', command: simple };
    }

    if (/^\d$/.test(lowered)) {
        return { kind: 'command', command: { type: 'seekToFraction', fraction: parseInt(lowered, 10) / 10 } };
    }
    if (SIGNED_NUMBER.test(lowered)) {
        return { kind: 'command', command: { type: 'seekRelative', deltaSeconds: parseFloat(lowered) } };
    }
    if (lowered === 'ff') {
        return { kind: 'command', command: { type: 'seekRelative', deltaSeconds: options.seekStepSeconds } };
    }
    if (lowered === 'rw') {
        return { kind: 'command', command: { type: 'seekRelative', deltaSeconds: -options.seekStepSeconds } };
    }

    const [verb, ...args] = line.split(/\s+/);
    const keyword = verb.toLowerCase();

    if (keyword === 'search' || keyword === 'find') {
        const query = line.substring(verb.length).trim();
        if (!query) {
            return { kind: 'invalid', message: 'Please enter a search term after "search"' };
        }
        return { kind: 'command', command: { type: 'search', query } };
    }

    if (keyword === 'seek') {
        if (args.length !== 1 || !/^[+-]?\d+(\.\d+)?$/.test(args[0])) {
            return { kind: 'invalid', message: 'Usage: seek +N or seek -N (seconds)' };
        }
        return { kind: 'command', command: { type: 'seekRelative', deltaSeconds: parseFloat(args[0]) } };
    }

    const targetVerb = TARGET_VERBS.get(keyword);
    if (targetVerb) {
        if (args.length === 0) {
            return { kind: 'needsTarget', verb: targetVerb };
        }
        const target = parseTarget(args[0]);
        if (target === null) {
            return { kind: 'invalid', message: "Please enter a valid number or 'r'" };
        }
        return { kind: 'command', command: targetCommand(targetVerb, target) };
    }

    return { kind: 'invalid', message: 'Invalid command' };
}
