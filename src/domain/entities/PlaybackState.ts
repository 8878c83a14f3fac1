import { SessionError } from '../errors';

export interface IdleState {
    readonly status: 'idle';
}

export interface LoadingState {
    readonly status: 'loading';
    readonly soundId: string;
}

export interface PlayingState {
    readonly status: 'playing';
    readonly soundId: string;
    readonly positionSeconds: number;
    readonly durationSeconds: number;
}

export interface PausedState {
    readonly status: 'paused';
    readonly soundId: string;
    readonly positionSeconds: number;
    readonly durationSeconds: number;
}

export interface ErrorState {
    readonly status: 'error';
    readonly soundId: string;
    readonly cause: SessionError;
}

/**
 * PlaybackState - the engine's single live state.
 */
export type PlaybackState = IdleState | LoadingState | PlayingState | PausedState | ErrorState;

const IDLE: IdleState = Object.freeze({ status: 'idle' });

export function idleState(): IdleState {
    return IDLE;
}

export function loadingState(soundId: string): LoadingState {
    return Object.freeze({ status: 'loading', soundId });
}

export function playingState(soundId: string, positionSeconds: number, durationSeconds: number): PlayingState {
    return Object.freeze({ status: 'playing', soundId, positionSeconds, durationSeconds });
}

export function pausedState(soundId: string, positionSeconds: number, durationSeconds: number): PausedState {
    return Object.freeze({ status: 'paused', soundId, positionSeconds, durationSeconds });
}

export function errorState(soundId: string, cause: SessionError): ErrorState {
    return Object.freeze({ status: 'error', soundId, cause });
}

/**
 * True while a clip is loading, playing or paused.
 */
export function isActive(state: PlaybackState): state is LoadingState | PlayingState | PausedState {
    return state.status === 'loading' || state.status === 'playing' || state.status === 'paused';
}

/**
 * True while the engine holds an open device stream.
 */
export function isAudible(state: PlaybackState): state is PlayingState | PausedState {
    return state.status === 'playing' || state.status === 'paused';
}

export function soundIdOf(state: PlaybackState): string | null {
    return state.status === 'idle' ? null : state.soundId;
}
