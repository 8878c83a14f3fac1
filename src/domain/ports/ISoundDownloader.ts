import { SoundSummary } from '../entities/Sound';

export interface DownloadResult {
    filePath: string;
    bytesWritten: number;
}

/**
 * ISoundDownloader - Port for saving a sound to disk.
 * Rejects with NetworkError, ApiError or IOError.
 */
export interface ISoundDownloader {
    download(sound: SoundSummary): Promise<DownloadResult>;
}
