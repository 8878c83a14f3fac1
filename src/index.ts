#!/usr/bin/env node
import { getConfig, validateConfig } from './config';
import { createPcmFormat } from './domain/entities/PcmFormat';
import { PlaybackEngine } from './application/PlaybackEngine';
import { SearchSession } from './application/SearchSession';
import { SessionController } from './application/SessionController';
import { FreesoundSearchClient } from './infrastructure/freesound/FreesoundSearchClient';
import { FreesoundDownloadClient } from './infrastructure/freesound/FreesoundDownloadClient';
import { FFmpegAudioSourceFactory } from './infrastructure/audio/FFmpegAudioSource';
import { ProcessAudioDevice } from './infrastructure/audio/ProcessAudioDevice';
import { SoundDetailFormatter } from './presentation/cli/SoundDetailFormatter';
import { TerminalRenderer } from './presentation/cli/TerminalRenderer';
import { InteractiveShell } from './presentation/cli/InteractiveShell';

async function main(): Promise<void> {
    console.log('🔊 Freesound Preview - interactive search and playback');

    // 1. Load and validate configuration
    const config = getConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exit(1);
    }

    // 2. Make sure there is something to play through before taking commands
    const format = createPcmFormat(config.audio.sampleRate, config.audio.channels);
    const device = new ProcessAudioDevice({
        player: config.audio.player,
        bufferMs: config.audio.bufferMs,
        verbose: config.verbose,
    });
    try {
        await device.probe();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`❌ Could not initialize audio output: ${message}`);
        process.exit(1);
    }

    // 3. Wire the session
    const searchClient = new FreesoundSearchClient(
        config.freesoundApiKey,
        config.freesoundBaseUrl,
        config.pageSize,
        config.requestTimeoutMs
    );
    const downloader = new FreesoundDownloadClient(
        config.freesoundApiKey,
        config.downloadDir,
        config.downloadTimeoutMs
    );
    const sources = new FFmpegAudioSourceFactory({
        format,
        apiKey: config.freesoundApiKey,
        timeoutMs: config.requestTimeoutMs,
        ffmpegPath: config.audio.ffmpegPath,
        verbose: config.verbose,
    });
    const playback = new PlaybackEngine(sources, device, {
        clampSeeks: config.clampSeeks,
        verbose: config.verbose,
    });
    const renderer = new TerminalRenderer();
    const controller = new SessionController({
        search: new SearchSession(searchClient),
        playback,
        inspector: new SoundDetailFormatter(),
        downloader,
        screen: renderer,
    });

    const shell = new InteractiveShell({
        controller,
        playback,
        renderer,
        parser: { seekStepSeconds: config.seekStepSeconds },
        defaultQuery: config.defaultQuery,
    });
    await shell.run();
}

main().catch((error) => {
    console.error('💥 Fatal error:', error);
    process.exit(1);
});
