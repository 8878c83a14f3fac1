import { clearScreenDown, cursorTo } from 'readline';
import { IScreen } from '../../domain/ports/IScreen';
import { DetailView } from '../../domain/ports/ISoundInspector';
import { PlaybackState } from '../../domain/entities/PlaybackState';
import { ResultPage } from '../../domain/entities/ResultPage';
import { SessionError } from '../../domain/errors';
import { formatTags, formatUploadMonth } from './SoundDetailFormatter';

interface Column {
    header: string;
    maxWidth?: number;
    align: 'left' | 'right';
}

const RESULT_COLUMNS: Column[] = [
    { header: '#', align: 'right' },
    { header: 'ID', align: 'right' },
    { header: 'Name', maxWidth: 40, align: 'left' },
    { header: 'Dur.', align: 'right' },
    { header: 'Upload Date', align: 'left' },
    { header: 'User', align: 'left' },
    { header: 'Tags', maxWidth: 30, align: 'left' },
];

const TABLE_TAG_LIMIT = 3;

export function formatResultTable(page: ResultPage): string {
    const title = `Freesound Search Results - Page ${page.pageNumber}/${page.totalPages ?? '?'}`;
    const rows = page.sounds.map((sound, i) => [
        String(i + 1),
        sound.id,
        sound.title,
        `${sound.durationSeconds.toFixed(1)}s`,
        formatUploadMonth(sound.createdAt),
        sound.author,
        formatTags(sound.tags, TABLE_TAG_LIMIT),
    ].map((cell, column) => clip(cell, RESULT_COLUMNS[column].maxWidth)));

    const widths = RESULT_COLUMNS.map((column, index) =>
        Math.max(column.header.length, ...rows.map((row) => row[index].length))
    );
    const renderRow = (cells: string[]): string => cells
        .map((cell, index) => RESULT_COLUMNS[index].align === 'right'
            ? cell.padStart(widths[index])
            : cell.padEnd(widths[index]))
        .join('  ')
        .trimEnd();
    const ruleLength = widths.reduce((sum, width) => sum + width, 0) + 2 * (widths.length - 1);

    return [
        title,
        renderRow(RESULT_COLUMNS.map((column) => column.header)),
        '-'.repeat(ruleLength),
        ...rows.map(renderRow),
    ].join('\n');
}

export function formatDetail(detail: DetailView): string {
    const labelWidth = Math.max(...detail.fields.map((field) => field.label.length)) + 1;
    return [
        `== ${detail.heading} ==`,
        ...detail.fields.map((field) => `${`${field.label}:`.padEnd(labelWidth)} ${field.value}`),
    ].join('\n');
}

export function formatPlaybackState(state: PlaybackState): string {
    switch (state.status) {
        case 'idle':
            return 'Playback stopped.';
        case 'loading':
            return `Loading sound ${state.soundId}...`;
        case 'playing':
            return `Playing sound ${state.soundId} at ${state.positionSeconds.toFixed(1)}s / ${state.durationSeconds.toFixed(1)}s`;
        case 'paused':
            return `Paused sound ${state.soundId} at ${state.positionSeconds.toFixed(1)}s / ${state.durationSeconds.toFixed(1)}s`;
        case 'error':
            return `Playback error for sound ${state.soundId}: ${state.cause.message}`;
    }
}

function clip(text: string, maxWidth: number | undefined): string {
    return maxWidth !== undefined && text.length > maxWidth ? text.substring(0, maxWidth) : text;
}

/**
 * Writes session output to the terminal and owns screen clearing.
 */
export class TerminalRenderer implements IScreen {
    constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

    clear(): void {
        cursorTo(this.out, 0, 0);
        clearScreenDown(this.out);
    }

    page(page: ResultPage): void {
        this.line(formatResultTable(page));
    }

    detail(detail: DetailView): void {
        this.line(formatDetail(detail));
        this.line('');
    }

    playback(state: PlaybackState): void {
        this.line(formatPlaybackState(state));
    }

    success(message: string): void {
        this.line(`✅ ${message}`);
    }

    info(message: string): void {
        this.line(message);
    }

    error(error: SessionError | string): void {
        this.line(`❌ ${typeof error === 'string' ? error : error.message}`);
    }

    private line(text: string): void {
        this.out.write(`${text}\n`);
    }
}
