import { AudioSource } from '../../domain/ports/IAudioSource';
import { PcmFormat, bytesPerFrame, framesToSeconds, secondsToFrames } from '../../domain/entities/PcmFormat';
import { SessionError, SourceUnavailableError, UnsupportedFormatError } from '../../domain/errors';

interface ReadyWaiter {
    resolve: () => void;
    reject: (error: SessionError) => void;
}

const MIN_CAPACITY_BYTES = 64 * 1024;
// Upper bound on the up-front reservation; longer clips grow as they decode
const PREALLOCATE_SECONDS = 10;

/**
 * AudioSource over an in-memory PCM buffer that is filled while reads happen.
 * A producer (decoder) calls `append`, then `complete` or `fail`.
 */
export class PcmBufferSource implements AudioSource {
    private data: Buffer;
    private byteLength: number = 0;
    private cursor: number = 0;
    private decodeDone: boolean = false;
    private failure: SessionError | null = null;
    private closed: boolean = false;
    private waiters: ReadyWaiter[] = [];
    private readonly frameBytes: number;

    constructor(
        readonly soundId: string,
        readonly format: PcmFormat,
        private readonly expectedDurationSeconds: number = 0
    ) {
        this.frameBytes = bytesPerFrame(format);
        const hintSeconds = Math.min(Math.max(expectedDurationSeconds, 0), PREALLOCATE_SECONDS);
        this.data = Buffer.alloc(Math.max(MIN_CAPACITY_BYTES, secondsToFrames(format, hintSeconds) * this.frameBytes));
    }

    get decodedFrames(): number {
        return Math.floor(this.byteLength / this.frameBytes);
    }

    get durationSeconds(): number {
        const decoded = framesToSeconds(this.format, this.decodedFrames);
        return this.decodeDone ? decoded : Math.max(this.expectedDurationSeconds, decoded);
    }

    get ended(): boolean {
        return this.decodeDone && this.cursor >= this.decodedFrames;
    }

    get error(): SessionError | null {
        return this.failure;
    }

    get cursorFrames(): number {
        return this.cursor;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    ready(): Promise<void> {
        if (this.decodedFrames > 0) {
            return Promise.resolve();
        }
        const blocker = this.readyBlocker();
        if (blocker) {
            return Promise.reject(blocker);
        }
        return new Promise((resolve, reject) => {
            this.waiters.push({ resolve, reject });
        });
    }

    read(frameCount: number): Buffer {
        if (this.closed || frameCount <= 0) {
            return Buffer.alloc(0);
        }
        const available = Math.max(0, this.decodedFrames - this.cursor);
        const frames = Math.min(Math.floor(frameCount), available);
        const start = this.cursor * this.frameBytes;
        const chunk = Buffer.from(this.data.subarray(start, start + frames * this.frameBytes));
        this.cursor += frames;
        return chunk;
    }

    seek(frame: number): void {
        let target = Math.max(0, Math.round(frame));
        if (this.decodeDone) {
            target = Math.min(target, this.decodedFrames);
        }
        this.cursor = target;
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.data = Buffer.alloc(0);
        this.byteLength = 0;
        this.settle(new SourceUnavailableError('Audio source was closed before audio arrived'));
        this.onClose();
    }

    /**
     * Appends decoded PCM bytes. Partial frames are kept until completed by the next chunk.
     */
    append(chunk: Buffer): void {
        if (this.closed || this.decodeDone || chunk.length === 0) {
            return;
        }
        this.ensureCapacity(this.byteLength + chunk.length);
        chunk.copy(this.data, this.byteLength);
        this.byteLength += chunk.length;
        if (this.decodedFrames > 0) {
            this.settle(null);
        }
    }

    /**
     * Marks decoding as finished.
     */
    complete(): void {
        if (this.closed || this.decodeDone) {
            return;
        }
        this.decodeDone = true;
        // Drop a trailing partial frame
        this.byteLength = this.decodedFrames * this.frameBytes;
        this.settle(this.readyBlocker());
    }

    fail(error: SessionError): void {
        if (this.closed || this.decodeDone || this.failure) {
            return;
        }
        this.failure = error;
        this.settle(error);
    }

    /**
     * Hook for subclasses that own a producer (network stream, decoder process).
     */
    protected onClose(): void {}

    private readyBlocker(): SessionError | null {
        if (this.failure) {
            return this.failure;
        }
        if (this.closed) {
            return new SourceUnavailableError('Audio source was closed before audio arrived');
        }
        if (this.decodeDone && this.decodedFrames === 0) {
            return new UnsupportedFormatError('Audio file is empty or could not be decoded');
        }
        return null;
    }

    private settle(error: SessionError | null): void {
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            if (error) {
                waiter.reject(error);
            } else {
                waiter.resolve();
            }
        }
    }

    private ensureCapacity(required: number): void {
        if (required <= this.data.length) {
            return;
        }
        let capacity = Math.max(this.data.length, MIN_CAPACITY_BYTES);
        while (capacity < required) {
            capacity *= 2;
        }
        const grown = Buffer.alloc(capacity);
        this.data.copy(grown, 0, 0, this.byteLength);
        this.data = grown;
    }
}
