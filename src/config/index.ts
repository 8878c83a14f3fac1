import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type AudioPlayerKind = 'ffplay' | 'aplay';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Freesound API
    freesoundApiKey: string;
    freesoundBaseUrl: string;
    pageSize: number;
    requestTimeoutMs: number;

    // Downloads
    downloadTimeoutMs: number;
    downloadDir: string;

    // Shell
    defaultQuery: string;
    verbose: boolean;

    // Audio output
    audio: {
        sampleRate: number;
        channels: number;
        bufferMs: number;
        player: AudioPlayerKind;
        ffmpegPath?: string;
    };

    // Seeking
    seekStepSeconds: number;
    clampSeeks: boolean;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

function getAudioPlayer(key: string, defaultValue: AudioPlayerKind): AudioPlayerKind {
    const value = getEnvVar(key, defaultValue).toLowerCase();
    if (value === 'ffplay' || value === 'aplay') {
        return value;
    }
    throw new Error(`Environment variable ${key} must be "ffplay" or "aplay", got: ${value}`);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Freesound API
        freesoundApiKey: getEnvVar('FREESOUND_API_KEY', ''),
        freesoundBaseUrl: getEnvVar('FREESOUND_BASE_URL', 'https://freesound.org/apiv2'),
        pageSize: getEnvVarNumber('FREESOUND_PAGE_SIZE', 30),
        requestTimeoutMs: getEnvVarNumber('REQUEST_TIMEOUT_MS', 10000),

        // Downloads
        downloadTimeoutMs: getEnvVarNumber('DOWNLOAD_TIMEOUT_MS', 30000),
        downloadDir: getEnvVar('DOWNLOAD_DIR', '.'),

        // Shell
        defaultQuery: getEnvVar('DEFAULT_QUERY', 'birdsong'),
        verbose: getEnvVarBoolean('VERBOSE', false),

        // Audio output
        audio: {
            sampleRate: getEnvVarNumber('AUDIO_SAMPLE_RATE', 44100),
            channels: getEnvVarNumber('AUDIO_CHANNELS', 2),
            bufferMs: getEnvVarNumber('AUDIO_BUFFER_MS', 100),
            player: getAudioPlayer('AUDIO_PLAYER', 'ffplay'),
            ffmpegPath: process.env.FFMPEG_PATH ? getEnvVar('FFMPEG_PATH') : undefined,
        },

        // Seeking
        seekStepSeconds: getEnvVarNumber('SEEK_STEP_SECONDS', 5),
        clampSeeks: getEnvVarBoolean('CLAMP_SEEKS', true),
    };
}

/**
 * Validates that the values needed by the interactive session are usable.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.freesoundApiKey) {
        errors.push('FREESOUND_API_KEY is required for search, preview and download');
    }
    if (!Number.isInteger(config.pageSize) || config.pageSize < 1 || config.pageSize > 150) {
        errors.push('FREESOUND_PAGE_SIZE must be an integer between 1 and 150');
    }
    if (!Number.isInteger(config.audio.sampleRate) || config.audio.sampleRate < 8000) {
        errors.push('AUDIO_SAMPLE_RATE must be an integer of at least 8000');
    }
    if (config.audio.channels !== 1 && config.audio.channels !== 2) {
        errors.push('AUDIO_CHANNELS must be 1 or 2');
    }
    if (config.audio.bufferMs < 10 || config.audio.bufferMs > 1000) {
        errors.push('AUDIO_BUFFER_MS must be between 10 and 1000');
    }
    if (config.seekStepSeconds <= 0) {
        errors.push('SEEK_STEP_SECONDS must be positive');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
