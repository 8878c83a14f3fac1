import { AudioSource, IAudioSourceFactory } from '../domain/ports/IAudioSource';
import { DeviceStream, IAudioDevice } from '../domain/ports/IAudioDevice';
import { SoundSummary } from '../domain/entities/Sound';
import {
    PlaybackState,
    errorState,
    idleState,
    isActive,
    loadingState,
    pausedState,
    playingState,
} from '../domain/entities/PlaybackState';
import { bytesPerFrame, framesToSeconds, secondsToFrames, silence } from '../domain/entities/PcmFormat';
import {
    InternalAudioError,
    NotFoundError,
    SessionError,
    SourceUnavailableError,
    StateConflictError,
    asSessionError,
} from '../domain/errors';
import { ControlSlot } from './ControlSlot';

export type PlaybackEvent =
    | { type: 'finished'; soundId: string }
    | { type: 'failed'; soundId: string; error: SessionError };

export type PlaybackListener = (event: PlaybackEvent) => void;

export interface PlaybackEngineOptions {
    /** Clamp seek targets into the clip instead of rejecting them (default true) */
    clampSeeks?: boolean;
    verbose?: boolean;
}

/**
 * The clip currently owned by the engine. `stream` is null while loading.
 */
interface ActiveClip {
    sound: SoundSummary;
    source: AudioSource;
    stream: DeviceStream | null;
    paused: boolean;
}

/**
 * Owns the single audio source and device stream.
 *
 * Two flows touch the engine: the command flow calls the public methods, and
 * the device clock calls `pull` once per buffer period. The device clock is the
 * only writer of the consumed-frames counter; the command flow only posts
 * control changes (pause flag, seek slot, teardown). Every load and every
 * device callback is tagged with a generation number so that work started for
 * a clip that has since been replaced or stopped becomes a no-op.
 */
export class PlaybackEngine {
    private clip: ActiveClip | null = null;
    private failure: { soundId: string; cause: SessionError } | null = null;
    private framesConsumed: number = 0;
    private generation: number = 0;
    private pendingLoad: Promise<PlaybackState> | null = null;
    private readonly seekRequests = new ControlSlot<number>();
    private readonly listeners = new Set<PlaybackListener>();
    private readonly clampSeeks: boolean;
    private readonly verbose: boolean;

    constructor(
        private readonly sources: IAudioSourceFactory,
        private readonly device: IAudioDevice,
        options: PlaybackEngineOptions = {}
    ) {
        this.clampSeeks = options.clampSeeks ?? true;
        this.verbose = options.verbose ?? false;
    }

    currentState(): PlaybackState {
        const clip = this.clip;
        if (!clip) {
            return this.failure ? errorState(this.failure.soundId, this.failure.cause) : idleState();
        }
        if (!clip.stream) {
            return loadingState(clip.sound.id);
        }

        const duration = clip.source.durationSeconds;
        const frames = this.seekRequests.peek() ?? this.framesConsumed;
        const position = Math.min(framesToSeconds(clip.source.format, frames), duration);
        return clip.paused
            ? pausedState(clip.sound.id, position, duration)
            : playingState(clip.sound.id, position, duration);
    }

    isActive(): boolean {
        return isActive(this.currentState());
    }

    subscribe(listener: PlaybackListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Starts a clip. Replaying the clip that is already open restarts it from
     * the beginning without re-fetching.
     */
    async play(sound: SoundSummary): Promise<PlaybackState> {
        const existing = this.clip;
        if (existing && existing.sound.id === sound.id) {
            if (existing.stream) {
                this.seekRequests.put(0);
                existing.paused = false;
                return this.currentState();
            }
            if (this.pendingLoad) {
                return this.pendingLoad;
            }
        }

        this.teardown();
        this.failure = null;
        const generation = this.generation;

        let source: AudioSource;
        try {
            source = this.sources.open(sound);
        } catch (error) {
            throw this.fail(sound.id, asSessionError(error, (message) => new SourceUnavailableError(message)));
        }

        const clip: ActiveClip = { sound, source, stream: null, paused: false };
        this.clip = clip;
        this.debug(`Loading ${sound.id} (${sound.previewUrl})`);

        const load = this.load(generation, clip);
        this.pendingLoad = load;
        try {
            return await load;
        } finally {
            if (this.pendingLoad === load) {
                this.pendingLoad = null;
            }
        }
    }

    togglePause(): PlaybackState {
        const clip = this.requireAudible();
        clip.paused = !clip.paused;
        this.debug(`${clip.paused ? 'Paused' : 'Resumed'} ${clip.sound.id}`);
        return this.currentState();
    }

    /**
     * Moves the cursor by `deltaSeconds` from the current (or pending) position.
     * The new position is applied by the delivery flow before its next pull.
     */
    seek(deltaSeconds: number): PlaybackState {
        const clip = this.requireAudible();
        const { format, durationSeconds } = clip.source;
        const base = framesToSeconds(format, this.seekRequests.peek() ?? this.framesConsumed);
        let target = base + deltaSeconds;

        if (target < 0 || target > durationSeconds) {
            if (!this.clampSeeks) {
                throw new NotFoundError(
                    'SeekOutOfRange',
                    `Seek target ${target.toFixed(2)}s is outside 0-${durationSeconds.toFixed(2)}s`
                );
            }
            target = Math.min(Math.max(target, 0), durationSeconds);
        }

        this.seekRequests.put(secondsToFrames(format, target));
        return this.currentState();
    }

    /**
     * Jumps to a fraction of the clip; 0.3 means 30% in.
     */
    seekToFraction(fraction: number): PlaybackState {
        const clip = this.requireAudible();
        const { format, durationSeconds } = clip.source;
        const clamped = Math.min(Math.max(fraction, 0), 1);
        this.seekRequests.put(secondsToFrames(format, durationSeconds * clamped));
        return this.currentState();
    }

    /**
     * Halts output and releases the source. Safe from any state and from
     * inside a device callback.
     */
    stop(): PlaybackState {
        if (this.clip) {
            this.debug(`Stopping ${this.clip.sound.id}`);
        }
        this.teardown();
        this.failure = null;
        return this.currentState();
    }

    /**
     * Acknowledges an error state.
     */
    reset(): PlaybackState {
        return this.stop();
    }

    private async load(generation: number, clip: ActiveClip): Promise<PlaybackState> {
        const { sound, source } = clip;

        try {
            await source.ready();
        } catch (error) {
            if (generation !== this.generation) {
                return this.currentState();
            }
            throw this.fail(sound.id, asSessionError(error, (message) => new SourceUnavailableError(message)));
        }

        if (generation !== this.generation) {
            return this.currentState();
        }

        try {
            clip.stream = this.device.open(source.format, {
                pull: (frameCount) => this.pull(generation, frameCount),
                onError: (error) => this.handleStreamError(generation, error),
            });
        } catch (error) {
            throw this.fail(sound.id, asSessionError(error, (message) => new InternalAudioError(message)));
        }

        this.debug(`Playing ${sound.id} (${source.durationSeconds.toFixed(2)}s)`);
        return this.currentState();
    }

    /**
     * Device clock callback: returns exactly `frameCount` frames, or null once
     * this generation's stream is gone.
     */
    private pull(generation: number, frameCount: number): Buffer | null {
        const clip = this.clip;
        if (!clip || generation !== this.generation) {
            return null;
        }

        const { source } = clip;
        const seekTarget = this.seekRequests.take();
        if (seekTarget !== undefined) {
            source.seek(seekTarget);
            this.framesConsumed = source.cursorFrames;
        }

        if (clip.paused) {
            return silence(source.format, frameCount);
        }

        const chunk = source.read(frameCount);
        const delivered = chunk.length / bytesPerFrame(source.format);
        this.framesConsumed += delivered;

        if (delivered === 0) {
            if (source.error) {
                this.failMidStream(clip.sound.id, source.error);
                return null;
            }
            if (source.ended) {
                this.finish(clip.sound.id);
                return null;
            }
        }

        if (delivered < frameCount) {
            // Decoder is behind the cursor
            return Buffer.concat([chunk, silence(source.format, frameCount - delivered)]);
        }
        return chunk;
    }

    private handleStreamError(generation: number, error: InternalAudioError): void {
        const clip = this.clip;
        if (!clip || generation !== this.generation) {
            return;
        }
        this.failMidStream(clip.sound.id, error);
    }

    private finish(soundId: string): void {
        this.debug(`Finished ${soundId}`);
        this.teardown();
        this.emit({ type: 'finished', soundId });
    }

    private failMidStream(soundId: string, error: SessionError): void {
        console.error(`[PlaybackEngine] Playback of ${soundId} failed: ${error.message}`);
        this.fail(soundId, error);
        this.emit({ type: 'failed', soundId, error });
    }

    private fail(soundId: string, cause: SessionError): SessionError {
        this.teardown();
        this.failure = { soundId, cause };
        return cause;
    }

    /**
     * Closes the device stream before the source so no frame is pulled from a
     * released source. Invalidates every callback of the current generation.
     */
    private teardown(): void {
        this.generation++;
        const clip = this.clip;
        this.clip = null;
        this.seekRequests.clear();
        this.framesConsumed = 0;
        if (clip) {
            clip.stream?.close();
            clip.source.close();
        }
    }

    private requireAudible(): ActiveClip {
        const clip = this.clip;
        if (!clip || !clip.stream) {
            throw new StateConflictError('NotPlaying', 'Nothing is playing.');
        }
        return clip;
    }

    private emit(event: PlaybackEvent): void {
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (error) {
                console.error('[PlaybackEngine] Listener failed:', error);
            }
        }
    }

    private debug(message: string): void {
        if (this.verbose) {
            console.log(`[PlaybackEngine] ${message}`);
        }
    }
}
