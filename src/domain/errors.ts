/**
 * Error codes surfaced to the terminal layer.
 */
export type SessionErrorCode =
    | 'NETWORK_ERROR'
    | 'API_ERROR'
    | 'NOT_FOUND'
    | 'UNSUPPORTED_FORMAT'
    | 'SOURCE_UNAVAILABLE'
    | 'STATE_CONFLICT'
    | 'INTERNAL_AUDIO_ERROR'
    | 'INVALID_INPUT'
    | 'IO_ERROR';

/**
 * Base class for every failure the session engine reports.
 */
export abstract class SessionError extends Error {
    abstract readonly code: SessionErrorCode;

    constructor(message: string) {
        super(message);
        this.name = 'SessionError';
    }
}

/**
 * The remote service could not be reached.
 */
export class NetworkError extends SessionError {
    readonly code = 'NETWORK_ERROR';

    constructor(message: string = 'Network request failed') {
        super(message);
        this.name = 'NetworkError';
    }
}

/**
 * The remote service answered with an error status or an unusable body.
 */
export class ApiError extends SessionError {
    readonly code = 'API_ERROR';

    constructor(
        message: string = 'Unexpected API response',
        public readonly status?: number
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

export type NotFoundReason =
    | 'IndexOutOfRange'
    | 'AtFirstPage'
    | 'AtLastPage'
    | 'InvalidPageIndex'
    | 'UnknownPageCount'
    | 'EmptyPage'
    | 'SeekOutOfRange';

/**
 * An index, page or position outside what the session holds.
 */
export class NotFoundError extends SessionError {
    readonly code = 'NOT_FOUND';

    constructor(
        public readonly reason: NotFoundReason,
        message: string
    ) {
        super(message);
        this.name = 'NotFoundError';
    }
}

export class UnsupportedFormatError extends SessionError {
    readonly code = 'UNSUPPORTED_FORMAT';

    constructor(message: string = 'Audio format is not supported') {
        super(message);
        this.name = 'UnsupportedFormatError';
    }
}

export class SourceUnavailableError extends SessionError {
    readonly code = 'SOURCE_UNAVAILABLE';

    constructor(message: string = 'Audio source is unavailable') {
        super(message);
        this.name = 'SourceUnavailableError';
    }
}

export type StateConflictReason = 'NotPlaying' | 'NoActiveSearch' | 'Terminated';

/**
 * The command is not valid in the current state (e.g. pausing while idle).
 */
export class StateConflictError extends SessionError {
    readonly code = 'STATE_CONFLICT';

    constructor(
        public readonly reason: StateConflictReason,
        message: string
    ) {
        super(message);
        this.name = 'StateConflictError';
    }
}

/**
 * Device-level failure (player process missing or crashed).
 */
export class InternalAudioError extends SessionError {
    readonly code = 'INTERNAL_AUDIO_ERROR';

    constructor(message: string = 'Audio device failure') {
        super(message);
        this.name = 'InternalAudioError';
    }
}

export type InvalidInputReason = 'EmptyQuery';

export class InvalidInputError extends SessionError {
    readonly code = 'INVALID_INPUT';

    constructor(
        public readonly reason: InvalidInputReason,
        message: string
    ) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

/**
 * Local file system failure while saving a download.
 */
export class IOError extends SessionError {
    readonly code = 'IO_ERROR';

    constructor(message: string = 'File system error') {
        super(message);
        this.name = 'IOError';
    }
}

/**
 * Returns the error unchanged when it is already a SessionError,
 * otherwise wraps its message with the given constructor.
 */
export function asSessionError(
    error: unknown,
    wrap: (message: string) => SessionError
): SessionError {
    if (error instanceof SessionError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return wrap(message);
}
