import { PcmFormat } from '../entities/PcmFormat';
import { InternalAudioError } from '../errors';

export interface DeviceStreamHandlers {
    /**
     * Called on the device clock, once per buffer period.
     * Returns exactly `frameCount` frames to play, or null when the stream was closed.
     */
    pull(frameCount: number): Buffer | null;
    /** Called when the device fails after the stream was opened. */
    onError(error: InternalAudioError): void;
}

/**
 * DeviceStream - A live connection to the output device.
 */
export interface DeviceStream {
    readonly format: PcmFormat;
    /** Halts output synchronously; no pull is served afterwards. Idempotent. */
    close(): void;
}

/**
 * IAudioDevice - Port for the PCM output device.
 */
export interface IAudioDevice {
    /** Checks that the device can be opened at all. Rejects with InternalAudioError. */
    probe(): Promise<void>;
    /** Opens a stream. Throws InternalAudioError when the device cannot start. */
    open(format: PcmFormat, handlers: DeviceStreamHandlers): DeviceStream;
}
