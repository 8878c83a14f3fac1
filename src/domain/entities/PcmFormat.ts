/**
 * Interleaved signed 16-bit little-endian PCM.
 */
export interface PcmFormat {
    readonly sampleRate: number;
    readonly channels: number;
}

export const BYTES_PER_SAMPLE = 2;

export function createPcmFormat(sampleRate: number, channels: number): PcmFormat {
    if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
        throw new Error(`Sample rate must be a positive integer, got: ${sampleRate}`);
    }
    if (!Number.isInteger(channels) || channels <= 0) {
        throw new Error(`Channel count must be a positive integer, got: ${channels}`);
    }
    return Object.freeze({ sampleRate, channels });
}

export function bytesPerFrame(format: PcmFormat): number {
    return format.channels * BYTES_PER_SAMPLE;
}

export function framesToSeconds(format: PcmFormat, frames: number): number {
    return frames / format.sampleRate;
}

export function secondsToFrames(format: PcmFormat, seconds: number): number {
    return Math.round(seconds * format.sampleRate);
}

/**
 * Number of frames in one device buffer period.
 */
export function framesPerPeriod(format: PcmFormat, periodMs: number): number {
    return Math.max(1, Math.round((format.sampleRate * periodMs) / 1000));
}

export function silence(format: PcmFormat, frames: number): Buffer {
    return Buffer.alloc(frames * bytesPerFrame(format));
}
