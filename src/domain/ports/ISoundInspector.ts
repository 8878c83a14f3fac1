import { SoundSummary } from '../entities/Sound';

export interface DetailField {
    label: string;
    value: string;
}

/**
 * DetailView - Formatted, render-ready description of one sound.
 */
export interface DetailView {
    heading: string;
    fields: DetailField[];
}

/**
 * ISoundInspector - Port for building the detail panel of a sound.
 */
export interface ISoundInspector {
    inspect(sound: SoundSummary): DetailView;
}
