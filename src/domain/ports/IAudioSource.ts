import { PcmFormat } from '../entities/PcmFormat';
import { SoundSummary } from '../entities/Sound';
import { SessionError } from '../errors';

/**
 * AudioSource - A seekable reader over the decoded PCM of one sound.
 * Decoding happens in the background; reads only return frames already decoded.
 */
export interface AudioSource {
    readonly soundId: string;
    readonly format: PcmFormat;
    /** Best known clip length: the catalogue duration until decoding completes */
    readonly durationSeconds: number;
    /** True once decoding finished and the cursor has reached the end */
    readonly ended: boolean;
    /** Set when decoding failed */
    readonly error: SessionError | null;
    /** Current decode cursor in frames */
    readonly cursorFrames: number;

    /**
     * Resolves once the first frames are decoded.
     * Rejects with SourceUnavailableError or UnsupportedFormatError.
     */
    ready(): Promise<void>;

    /**
     * Copies up to `frameCount` frames from the cursor and advances it.
     * Returns fewer frames (possibly none) when decoding is behind.
     */
    read(frameCount: number): Buffer;

    /** Moves the cursor to an absolute frame. */
    seek(frame: number): void;

    /** Releases the network stream and decoder. Idempotent. */
    close(): void;
}

/**
 * IAudioSourceFactory - Opens sources for sounds. Opening starts the fetch.
 */
export interface IAudioSourceFactory {
    open(sound: SoundSummary): AudioSource;
}
