import { spawn, ChildProcess } from 'child_process';
import { AudioPlayerKind } from '../../config';
import { DeviceStream, DeviceStreamHandlers, IAudioDevice } from '../../domain/ports/IAudioDevice';
import { PcmFormat, framesPerPeriod } from '../../domain/entities/PcmFormat';
import { InternalAudioError } from '../../domain/errors';

export interface ProcessAudioDeviceOptions {
    player: AudioPlayerKind;
    /** Device buffer period; one pull per period */
    bufferMs: number;
    verbose?: boolean;
}

/**
 * Command line that makes the player read raw s16le PCM from stdin.
 */
export function playerCommand(player: AudioPlayerKind, format: PcmFormat): { command: string; args: string[] } {
    const rate = String(format.sampleRate);
    if (player === 'aplay') {
        return {
            command: 'aplay',
            args: ['-q', '-t', 'raw', '-f', 'S16_LE', '-r', rate, '-c', String(format.channels), '-'],
        };
    }
    return {
        command: 'ffplay',
        args: [
            '-nodisp', '-autoexit', '-loglevel', 'error',
            '-f', 's16le', '-ar', rate, '-ch_layout', format.channels === 1 ? 'mono' : 'stereo',
            '-i', 'pipe:0',
        ],
    };
}

/**
 * Output device backed by an external player process fed through stdin.
 * A timer acts as the device clock: each period it pulls one period of
 * frames from the engine and writes them to the player.
 */
export class ProcessAudioDevice implements IAudioDevice {
    constructor(private readonly options: ProcessAudioDeviceOptions) {}

    probe(): Promise<void> {
        const command = this.options.player;
        const args = command === 'aplay' ? ['--version'] : ['-version'];

        return new Promise((resolve, reject) => {
            const child = spawn(command, args, { stdio: 'ignore' });
            child.on('error', (error: Error) => {
                reject(new InternalAudioError(
                    `Audio player "${command}" could not be started: ${error.message}. Is a sound output device available?`
                ));
            });
            child.on('close', (code: number | null) => {
                if (code === 0) {
                    resolve();
                } else {
                    reject(new InternalAudioError(`Audio player "${command}" exited with code ${code}`));
                }
            });
        });
    }

    open(format: PcmFormat, handlers: DeviceStreamHandlers): DeviceStream {
        const { command, args } = playerCommand(this.options.player, format);
        if (this.options.verbose) {
            console.log(`[AudioDevice] ${command} ${args.join(' ')}`);
        }
        return new ProcessDeviceStream(format, handlers, command, args, this.options.bufferMs);
    }
}

class ProcessDeviceStream implements DeviceStream {
    private readonly child: ChildProcess;
    private readonly timer: NodeJS.Timeout;
    private readonly periodFrames: number;
    private closed: boolean = false;

    constructor(
        readonly format: PcmFormat,
        private readonly handlers: DeviceStreamHandlers,
        command: string,
        args: string[],
        periodMs: number
    ) {
        this.periodFrames = framesPerPeriod(format, periodMs);

        try {
            this.child = spawn(command, args, { stdio: ['pipe', 'ignore', 'ignore'] });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new InternalAudioError(`Audio player "${command}" could not be started: ${message}`);
        }

        this.child.on('error', (error: Error) => {
            this.handleFailure(`Audio player "${command}" failed: ${error.message}`);
        });
        this.child.on('exit', (code: number | null) => {
            this.handleFailure(`Audio player "${command}" exited unexpectedly with code ${code}`);
        });
        this.child.stdin?.on('error', (error: Error) => {
            this.handleFailure(`Audio player "${command}" stopped accepting audio: ${error.message}`);
        });

        this.timer = setInterval(() => this.tick(), periodMs);
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        clearInterval(this.timer);
        this.child.stdin?.destroy();
        this.child.kill('SIGKILL');
    }

    private tick(): void {
        if (this.closed) {
            return;
        }
        // Player is behind; hold the clock instead of queueing more audio
        if (this.child.stdin?.writableNeedDrain) {
            return;
        }
        const frames = this.handlers.pull(this.periodFrames);
        // The pull may have closed this stream (end of clip, stop from a callback)
        if (this.closed || !frames) {
            return;
        }
        this.child.stdin?.write(frames);
    }

    private handleFailure(message: string): void {
        if (this.closed) {
            return;
        }
        this.close();
        this.handlers.onError(new InternalAudioError(message));
    }
}
