import { DetailView, ISoundInspector } from '../../domain/ports/ISoundInspector';
import { SoundSummary } from '../../domain/entities/Sound';

const DESCRIPTION_LIMIT = 100;
const DETAIL_TAG_LIMIT = 5;

const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})/;

/**
 * "2014-04-16T20:07:11.145" -> "2014-04-16 20:07:11". The API sends local
 * timestamps without a zone, so the text is reformatted rather than parsed.
 */
export function formatTimestamp(value: string | undefined): string {
    if (!value) {
        return 'Unknown';
    }
    const match = ISO_DATE_TIME.exec(value);
    return match ? `${match[1]} ${match[2]}` : value;
}

/**
 * "2014-04-16T20:07:11.145" -> "2014-04".
 */
export function formatUploadMonth(value: string | undefined): string {
    if (!value) {
        return '-';
    }
    const match = /^(\d{4}-\d{2})/.exec(value);
    return match ? match[1] : value;
}

export function formatTags(tags: readonly string[], limit: number): string {
    return tags.length > 0 ? tags.slice(0, limit).join(', ') : 'No tags';
}

/**
 * Builds the detail panel shown by `inspect #`.
 */
export class SoundDetailFormatter implements ISoundInspector {
    inspect(sound: SoundSummary): DetailView {
        const description = sound.description
            ? truncate(sound.description, DESCRIPTION_LIMIT)
            : 'No description';

        return {
            heading: `${sound.author}'s Sound`,
            fields: [
                { label: 'ID', value: sound.id },
                { label: 'Name', value: sound.title },
                { label: 'Created', value: formatTimestamp(sound.createdAt) },
                { label: 'Type', value: sound.fileType ?? 'Unknown' },
                { label: 'Duration', value: `${sound.durationSeconds.toFixed(2)}s` },
                { label: 'Tags', value: formatTags(sound.tags, DETAIL_TAG_LIMIT) },
                { label: 'Preview', value: 'Available - type p # to play' },
                { label: 'Description', value: description },
                { label: 'License', value: sound.license ?? 'Unknown' },
            ],
        };
    }
}

function truncate(text: string, limit: number): string {
    return text.length > limit ? `${text.substring(0, limit)}...` : text;
}
