import {
    errorState,
    idleState,
    isActive,
    isAudible,
    loadingState,
    pausedState,
    playingState,
    soundIdOf,
} from '../../../src/domain/entities/PlaybackState';
import {
    bytesPerFrame,
    createPcmFormat,
    framesPerPeriod,
    framesToSeconds,
    secondsToFrames,
    silence,
} from '../../../src/domain/entities/PcmFormat';
import { SourceUnavailableError } from '../../../src/domain/errors';

describe('PlaybackState', () => {
    const failure = new SourceUnavailableError('offline');

    it('should treat loading, playing and paused as active', () => {
        expect(isActive(loadingState('1'))).toBe(true);
        expect(isActive(playingState('1', 0, 10))).toBe(true);
        expect(isActive(pausedState('1', 0, 10))).toBe(true);
        expect(isActive(idleState())).toBe(false);
        expect(isActive(errorState('1', failure))).toBe(false);
    });

    it('should only treat playing and paused as audible', () => {
        expect(isAudible(playingState('1', 0, 10))).toBe(true);
        expect(isAudible(pausedState('1', 0, 10))).toBe(true);
        expect(isAudible(loadingState('1'))).toBe(false);
    });

    it('should expose the sound id of every non-idle state', () => {
        expect(soundIdOf(idleState())).toBeNull();
        expect(soundIdOf(loadingState('7'))).toBe('7');
        expect(soundIdOf(errorState('8', failure))).toBe('8');
    });

    it('should keep the cause on error states', () => {
        const state = errorState('8', failure);
        expect(state.cause).toBe(failure);
        expect(state.cause.code).toBe('SOURCE_UNAVAILABLE');
    });
});

describe('PcmFormat', () => {
    const stereo = createPcmFormat(44100, 2);

    it('should compute frame sizes for s16le', () => {
        expect(bytesPerFrame(stereo)).toBe(4);
        expect(bytesPerFrame(createPcmFormat(8000, 1))).toBe(2);
    });

    it('should convert between frames and seconds', () => {
        expect(framesToSeconds(stereo, 44100)).toBe(1);
        expect(secondsToFrames(stereo, 2.5)).toBe(110250);
    });

    it('should size one device period', () => {
        expect(framesPerPeriod(stereo, 100)).toBe(4410);
        expect(framesPerPeriod(createPcmFormat(10, 1), 1)).toBe(1);
    });

    it('should produce zeroed silence', () => {
        const buffer = silence(stereo, 3);
        expect(buffer.length).toBe(12);
        expect(buffer.every((byte) => byte === 0)).toBe(true);
    });

    it('should reject invalid formats', () => {
        expect(() => createPcmFormat(0, 2)).toThrow('Sample rate must be a positive integer, got: 0');
        expect(() => createPcmFormat(44100, 0)).toThrow('Channel count must be a positive integer, got: 0');
    });
});
