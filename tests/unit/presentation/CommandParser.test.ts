import {
    parseCommand,
    parseTarget,
    targetPrompt,
} from '../../../src/presentation/cli/CommandParser';

describe('CommandParser', () => {
    const options = { seekStepSeconds: 5 };

    describe('parseTarget', () => {
        it('should accept r and random', () => {
            expect(parseTarget('r')).toBe('random');
            expect(parseTarget(' Random ')).toBe('random');
        });

        it('should accept whole numbers', () => {
            expect(parseTarget('12')).toBe(12);
            expect(parseTarget(' 3 ')).toBe(3);
        });

        it('should reject anything else', () => {
            expect(parseTarget('two')).toBeNull();
            expect(parseTarget('-1')).toBeNull();
            expect(parseTarget('1.5')).toBeNull();
            expect(parseTarget('')).toBeNull();
        });
    });

    describe('parseCommand', () => {
        it('should report blank input as empty', () => {
            expect(parseCommand('   ', options)).toEqual({ kind: 'empty' });
        });

        it.each([
            ['q', 'quit'],
            ['EXIT', 'quit'],
            ['r', 'restart'],
            ['next', 'pageForward'],
            ['>', 'pageForward'],
            ['prev', 'pageBackward'],
            ['<', 'pageBackward'],
            ['c', 'clearScreen'],
            ['s', 'stop'],
            ['pause', 'togglePause'],
            ['resume', 'togglePause'],
        ])('should map "%s" to %s', (input, type) => {
            expect(parseCommand(input, options)).toEqual({ kind: 'command', command: { type } });
        });

        it('should parse target verbs with an argument', () => {
            expect(parseCommand('p 3', options)).toEqual({
                kind: 'command',
                command: { type: 'play', target: 3 },
            });
            expect(parseCommand('inspect r', options)).toEqual({
                kind: 'command',
                command: { type: 'inspect', target: 'random' },
            });
            expect(parseCommand('D 2', options)).toEqual({
                kind: 'command',
                command: { type: 'download', target: 2 },
            });
            expect(parseCommand('go 4', options)).toEqual({
                kind: 'command',
                command: { type: 'goToPage', target: 4 },
            });
        });

        it('should ask for a target when a verb has none', () => {
            expect(parseCommand('play', options)).toEqual({ kind: 'needsTarget', verb: 'play' });
            expect(parseCommand('g', options)).toEqual({ kind: 'needsTarget', verb: 'goToPage' });
        });

        it('should reject a bad target', () => {
            expect(parseCommand('p x', options)).toEqual({
                kind: 'invalid',
                message: "Please enter a valid number or 'r'",
            });
        });

        it('should map single digits to a fraction of the clip', () => {
            expect(parseCommand('0', options)).toEqual({
                kind: 'command',
                command: { type: 'seekToFraction', fraction: 0 },
            });
            expect(parseCommand('7', options)).toEqual({
                kind: 'command',
                command: { type: 'seekToFraction', fraction: 0.7 },
            });
        });

        it('should parse signed relative seeks', () => {
            expect(parseCommand('+10', options)).toEqual({
                kind: 'command',
                command: { type: 'seekRelative', deltaSeconds: 10 },
            });
            expect(parseCommand('-2.5', options)).toEqual({
                kind: 'command',
                command: { type: 'seekRelative', deltaSeconds: -2.5 },
            });
            expect(parseCommand('seek -3', options)).toEqual({
                kind: 'command',
                command: { type: 'seekRelative', deltaSeconds: -3 },
            });
        });

        it('should seek by the configured step for ff and rw', () => {
            expect(parseCommand('ff', { seekStepSeconds: 15 })).toEqual({
                kind: 'command',
                command: { type: 'seekRelative', deltaSeconds: 15 },
            });
            expect(parseCommand('rw', options)).toEqual({
                kind: 'command',
                command: { type: 'seekRelative', deltaSeconds: -5 },
            });
        });

        it('should reject seek without a number', () => {
            expect(parseCommand('seek', options)).toEqual({
                kind: 'invalid',
                message: 'Usage: seek +N or seek -N (seconds)',
            });
        });

        it('should keep the case and spacing of a search query', () => {
            expect(parseCommand('search Heavy  Rain', options)).toEqual({
                kind: 'command',
                command: { type: 'search', query: 'Heavy  Rain' },
            });
        });

        it('should require a term after search', () => {
            expect(parseCommand('find', options)).toEqual({
                kind: 'invalid',
                message: 'Please enter a search term after "search"',
            });
        });

        it('should reject unknown commands', () => {
            expect(parseCommand('dance', options)).toEqual({ kind: 'invalid', message: 'Invalid command' });
            expect(parseCommand('12', options)).toEqual({ kind: 'invalid', message: 'Invalid command' });
        });

        it.each(['constructor', '__proto__', 'toString', 'hasOwnProperty', 'constructor 2', '__proto__ r'])(
            'should not treat the object member name "%s" as a command',
            (input) => {
                expect(parseCommand(input, options)).toEqual({ kind: 'invalid', message: 'Invalid command' });
            }
        );
    });

    describe('targetPrompt', () => {
        it('should show the page range for sound verbs', () => {
            expect(targetPrompt('play', 15)).toBe("Enter sound number (1-15) or 'r' for random");
        });

        it('should ask for a page number for go', () => {
            expect(targetPrompt('goToPage', 15)).toBe("Enter page number or 'r' for random");
        });
    });
});
