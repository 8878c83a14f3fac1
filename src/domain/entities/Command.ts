/**
 * A 1-based result index or page number, or a uniformly random pick.
 */
export type IndexTarget = number | 'random';

/**
 * Command - parsed user intent. Raw input is decoded once at the terminal
 * boundary; the session engine only ever sees these values.
 */
export type Command =
    | { type: 'search'; query: string }
    | { type: 'play'; target: IndexTarget }
    | { type: 'inspect'; target: IndexTarget }
    | { type: 'download'; target: IndexTarget }
    | { type: 'pageForward' }
    | { type: 'pageBackward' }
    | { type: 'goToPage'; target: IndexTarget }
    | { type: 'restart' }
    | { type: 'quit' }
    | { type: 'clearScreen' }
    | { type: 'seekRelative'; deltaSeconds: number }
    /** Fraction of the clip in [0, 1] */
    | { type: 'seekToFraction'; fraction: number }
    | { type: 'togglePause' }
    | { type: 'stop' };
