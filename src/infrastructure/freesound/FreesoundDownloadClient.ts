import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { DownloadResult, ISoundDownloader } from '../../domain/ports/ISoundDownloader';
import { SoundSummary } from '../../domain/entities/Sound';
import { IOError, NetworkError } from '../../domain/errors';
import { toRequestError } from './requestErrors';

const MAX_FILENAME_LENGTH = 200;

/**
 * File name for a downloaded preview: path separators replaced, long names
 * cut at 200 characters and marked with "...".
 */
export function buildDownloadFilename(title: string): string {
    let base = title.replace(/[/\\]/g, '_');
    if (base.length > MAX_FILENAME_LENGTH) {
        base = `${base.substring(0, MAX_FILENAME_LENGTH)}...`;
    }
    return `${base}.mp3`;
}

/**
 * Saves the HQ MP3 preview of a sound into the download directory.
 */
export class FreesoundDownloadClient implements ISoundDownloader {
    private readonly apiKey: string;
    private readonly downloadDir: string;
    private readonly timeoutMs: number;

    constructor(apiKey: string, downloadDir: string = '.', timeoutMs: number = 30000) {
        if (!apiKey) {
            throw new Error('Freesound API key is required');
        }
        this.apiKey = apiKey;
        this.downloadDir = downloadDir;
        this.timeoutMs = timeoutMs;
    }

    async download(sound: SoundSummary): Promise<DownloadResult> {
        const filename = buildDownloadFilename(sound.title);
        const filePath = path.resolve(this.downloadDir, filename);

        let body: Readable;
        try {
            const response = await axios.get<Readable>(sound.previewUrl, {
                responseType: 'stream',
                headers: { Authorization: `Token ${this.apiKey}` },
                timeout: this.timeoutMs,
            });
            body = response.data;
        } catch (error) {
            throw toRequestError(error, 'Error downloading sound');
        }

        let networkFailure: Error | null = null;
        body.on('error', (error: Error) => {
            networkFailure = error;
        });

        try {
            await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
            await pipeline(body, fs.createWriteStream(filePath));
        } catch (error) {
            body.destroy();
            await this.removePartialFile(filePath);
            const message = error instanceof Error ? error.message : String(error);
            if (networkFailure) {
                throw new NetworkError(`Error downloading sound: ${message}`);
            }
            throw new IOError(`Error writing file '${filename}': ${message}`);
        }

        const stats = await fs.promises.stat(filePath);
        return { filePath, bytesWritten: stats.size };
    }

    private async removePartialFile(filePath: string): Promise<void> {
        try {
            await fs.promises.rm(filePath, { force: true });
        } catch (error) {
            console.warn(`[FreesoundDownload] Could not delete partial file ${filePath}:`, error);
        }
    }
}
