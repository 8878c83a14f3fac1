import ffmpeg from 'fluent-ffmpeg';
import axios from 'axios';
import { PassThrough, Readable } from 'stream';
import { IAudioSourceFactory } from '../../domain/ports/IAudioSource';
import { PcmFormat } from '../../domain/entities/PcmFormat';
import { SoundSummary } from '../../domain/entities/Sound';
import { SessionError, SourceUnavailableError, UnsupportedFormatError } from '../../domain/errors';
import { PcmBufferSource } from './PcmBufferSource';

export interface FFmpegAudioSourceOptions {
    format: PcmFormat;
    /** Sent as `Authorization: Token <key>` when fetching previews */
    apiKey?: string;
    timeoutMs?: number;
    ffmpegPath?: string;
    verbose?: boolean;
}

const DECODE_FAILURE_PATTERNS = [
    /invalid data found/i,
    /could not find codec/i,
    /failed to find .*codec/i,
    /does not contain any stream/i,
    /invalid argument/i,
];

/**
 * Streams a compressed preview over HTTP into an ffmpeg child process and
 * collects the decoded PCM. The network read and decoding run in the
 * background; the playback engine only ever reads decoded frames.
 */
export class FFmpegAudioSource extends PcmBufferSource {
    private command: ffmpeg.FfmpegCommand | null = null;
    private response: Readable | null = null;
    private readonly abortController = new AbortController();

    constructor(
        private readonly sound: SoundSummary,
        private readonly options: FFmpegAudioSourceOptions
    ) {
        super(sound.id, options.format, sound.durationSeconds);
    }

    /**
     * Starts fetching and decoding. Failures are recorded on the source.
     */
    start(): void {
        this.fetchAndDecode().catch((error: unknown) => {
            this.fail(error instanceof SessionError
                ? error
                : new SourceUnavailableError(`Error fetching preview for playback: ${String(error)}`));
        });
    }

    protected onClose(): void {
        this.abortController.abort();
        if (this.command) {
            this.command.kill('SIGKILL');
            this.command = null;
        }
        if (this.response) {
            this.response.destroy();
            this.response = null;
        }
    }

    private async fetchAndDecode(): Promise<void> {
        const headers: Record<string, string> = {};
        if (this.options.apiKey) {
            headers.Authorization = `Token ${this.options.apiKey}`;
        }

        let body: Readable;
        try {
            const response = await axios.get<Readable>(this.sound.previewUrl, {
                responseType: 'stream',
                headers,
                timeout: this.options.timeoutMs ?? 10000,
                signal: this.abortController.signal,
            });
            body = response.data;
        } catch (error) {
            if (this.isClosed) {
                return;
            }
            throw toFetchError(error);
        }

        if (this.isClosed) {
            body.destroy();
            return;
        }
        this.response = body;
        body.on('error', (error: Error) => {
            if (!this.isClosed) {
                this.fail(new SourceUnavailableError(`Preview stream interrupted: ${error.message}`));
            }
        });

        const { sampleRate, channels } = this.options.format;
        const pcm = new PassThrough();
        pcm.on('data', (chunk: Buffer) => this.append(chunk));

        const command = ffmpeg(body)
            .noVideo()
            .audioCodec('pcm_s16le')
            .audioChannels(channels)
            .audioFrequency(sampleRate)
            .format('s16le')
            .on('start', (commandLine: string) => {
                if (this.options.verbose) {
                    console.log(`[FFmpeg] ${commandLine}`);
                }
            })
            .on('error', (error: Error) => {
                if (this.isClosed) {
                    return;
                }
                this.fail(classifyDecodeError(error, this.decodedFrames > 0));
            })
            .on('end', () => {
                if (!this.isClosed) {
                    this.complete();
                }
            });

        if (this.options.ffmpegPath) {
            command.setFfmpegPath(this.options.ffmpegPath);
        }

        this.command = command;
        command.pipe(pcm, { end: true });
    }
}

/**
 * Opens FFmpeg-decoded sources; each open starts its own fetch.
 */
export class FFmpegAudioSourceFactory implements IAudioSourceFactory {
    constructor(private readonly options: FFmpegAudioSourceOptions) {}

    open(sound: SoundSummary): FFmpegAudioSource {
        const source = new FFmpegAudioSource(sound, this.options);
        source.start();
        return source;
    }
}

function toFetchError(error: unknown): SessionError {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            return new SourceUnavailableError(
                `Error fetching preview for playback: HTTP ${error.response.status}`
            );
        }
        return new SourceUnavailableError(`Error fetching preview for playback: ${error.message}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new SourceUnavailableError(`Error fetching preview for playback: ${message}`);
}

/**
 * Decode errors before the first frame mean the payload is not audio we can
 * read; after that, the stream broke.
 */
export function classifyDecodeError(error: Error, hadFrames: boolean): SessionError {
    if (!hadFrames && DECODE_FAILURE_PATTERNS.some((pattern) => pattern.test(error.message))) {
        return new UnsupportedFormatError(
            `Error reading sound file: ${error.message}. It might be corrupted or an unsupported format.`
        );
    }
    return new SourceUnavailableError(`Audio decoding failed: ${error.message}`);
}
