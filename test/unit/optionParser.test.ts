import { describe, it, expect, vi } from 'vitest';
import { Location, Position, Range } from 'vscode-languageserver/node';
import { ErrorReporter } from '../../src/options/diagnostics';
import { OptionParser, normalizeOptionName } from '../../src/options/optionParser';
import { cliTokens } from '../helpers/doc';

function createParser() {
    const reporter = new ErrorReporter();
    const parser = new OptionParser(reporter);
    return { reporter, parser };
}

function messages(reporter: ErrorReporter): string[] {
    return reporter.all().map(r => r.diagnostic.message);
}

describe('normalizeOptionName', () => {
    it('folds a double dash to a single one', () => {
        expect(normalizeOptionName('--stats')).toBe('-stats');
        expect(normalizeOptionName('-stats')).toBe('-stats');
        expect(normalizeOptionName('+incdir+a')).toBe('+incdir+a');
    });
});

describe('flag and toggle options', () => {
    it('sets a boolean slot', () => {
        const { parser } = createParser();
        const slot = vi.fn();
        parser.flag('-build', { slot }).finalize();

        expect(parser.parse(0, cliTokens('-build'), '.')).toBe(1);
        expect(parser.parse(0, cliTokens('--build'), '.')).toBe(1);
        expect(slot.mock.calls).toEqual([[true], [true]]);
    });

    it('accepts the negated spelling of a toggle', () => {
        const { parser } = createParser();
        const stats = vi.fn();
        const dedup = vi.fn();
        parser.toggle('-stats', { slot: stats }).toggle('-fdedup', { slot: dedup }, '-fno-dedup').finalize();

        parser.parse(0, cliTokens('-stats'), '.');
        parser.parse(0, cliTokens('-no-stats'), '.');
        parser.parse(0, cliTokens('--fno-dedup'), '.');
        expect(stats.mock.calls).toEqual([[true], [false]]);
        expect(dedup.mock.calls).toEqual([[false]]);
        expect(parser.parse(0, cliTokens('-no-fdedup'), '.')).toBe(0);
    });

    it('passes the token location and option directory to callbacks', () => {
        const { parser } = createParser();
        const action = vi.fn();
        parser.flag('-x', action).finalize();
        const location = Location.create('file:///work/args.f', Range.create(Position.create(3, 0), Position.create(3, 2)));

        parser.parse(0, [{ text: '-x', location }], 'work');
        expect(action).toHaveBeenCalledWith({ location, optionDir: 'work' });
    });
});

describe('value options', () => {
    it('consumes the following token', () => {
        const { parser } = createParser();
        const slot = vi.fn();
        parser.value('-o', { type: 'string', slot }).finalize();

        expect(parser.parse(1, cliTokens('top.v', '-o', 'sim'), '.')).toBe(2);
        expect(slot).toHaveBeenCalledWith('sim');
    });

    it('reports a missing value and consumes only the option', () => {
        const { parser, reporter } = createParser();
        const slot = vi.fn();
        parser.value('-o', { type: 'string', slot }).finalize();

        expect(parser.parse(0, cliTokens('-o'), '.')).toBe(1);
        expect(slot).not.toHaveBeenCalled();
        expect(messages(reporter)).toEqual(["Option '-o' requires an argument"]);
    });

    it('parses and clamps integer values', () => {
        const { parser, reporter } = createParser();
        const slot = vi.fn();
        parser.value('-pins-bv', { type: 'int', slot, min: 1, max: 65 }).finalize();

        parser.parse(0, cliTokens('-pins-bv', '0x20'), '.');
        parser.parse(0, cliTokens('-pins-bv', '70'), '.');
        parser.parse(0, cliTokens('-pins-bv', '0'), '.');
        parser.parse(0, cliTokens('-pins-bv', 'wide'), '.');

        expect(slot.mock.calls).toEqual([[32], [65], [1]]);
        expect(messages(reporter)).toEqual([
            '-pins-bv maximum is 65: 70',
            '-pins-bv must be >= 1: 0',
            "-pins-bv requires an integer, but 'wide' was passed"
        ]);
    });
});

describe('prefix options', () => {
    it('passes the rest of the token', () => {
        const { parser } = createParser();
        const action = vi.fn();
        parser.prefix('+incdir+', action).finalize();

        expect(parser.parse(0, cliTokens('+incdir+a+b'), 'dir')).toBe(1);
        expect(action.mock.calls[0][0]).toBe('a+b');
    });

    it('prefers the longest matching prefix', () => {
        const { parser } = createParser();
        const short = vi.fn();
        const long = vi.fn();
        parser.prefix('-W', short).prefix('-Wno-', long).finalize();

        parser.parse(0, cliTokens('-Wno-WIDTH'), '.');
        parser.parse(0, cliTokens('-Wall'), '.');
        expect(long.mock.calls.map(c => c[0])).toEqual(['WIDTH']);
        expect(short.mock.calls.map(c => c[0])).toEqual(['all']);
    });

    it('prefers an exact match over any prefix', () => {
        const { parser } = createParser();
        const prefix = vi.fn();
        const exact = vi.fn();
        parser.prefix('-Wno-', prefix).flag('-Wno-fatal', exact).finalize();

        parser.parse(0, cliTokens('-Wno-fatal'), '.');
        expect(exact).toHaveBeenCalledTimes(1);
        expect(prefix).not.toHaveBeenCalled();
    });

    it('consumes a value after a prefix option', () => {
        const { parser, reporter } = createParser();
        const action = vi.fn();
        parser.prefixValue('-debugi-', action).finalize();

        expect(parser.parse(0, cliTokens('-debugi-tree', '4'), '.')).toBe(2);
        expect(action.mock.calls[0].slice(0, 2)).toEqual(['tree', '4']);
        expect(parser.parse(0, cliTokens('-debugi-tree'), '.')).toBe(1);
        expect(messages(reporter)).toEqual(["Option '-debugi-tree' requires an argument"]);
    });

    it('returns 0 when nothing matches', () => {
        const { parser } = createParser();
        parser.flag('-build', () => {}).finalize();
        expect(parser.parse(0, cliTokens('-unknown'), '.')).toBe(0);
    });
});

describe('table declaration', () => {
    it('rejects a spelling declared twice', () => {
        const { parser } = createParser();
        parser.flag('-stats', () => {});
        expect(() => parser.toggle('-stats', () => {})).toThrow("Option '-stats' declared twice");
        expect(() => parser.flag('-no-stats', () => {})).not.toThrow();
        expect(() => parser.toggle('-x', () => {}, '-no-stats')).toThrow("Option '-no-stats' declared twice");
    });

    it('rejects declarations after finalize', () => {
        const { parser } = createParser();
        parser.finalize();
        expect(() => parser.flag('-late', () => {})).toThrow(
            "Option '-late' declared after the option table was finalized"
        );
    });
});

describe('suggestions', () => {
    it('offers the closest declared spellings', () => {
        const { parser } = createParser();
        parser.flag('-bogus-flop', () => {}).flag('-bogus-fleg', () => {}).flag('-stats', () => {}).finalize();

        expect(parser.suggestions('-bogus-flag')).toEqual(['-bogus-fleg', '-bogus-flop']);
        expect(parser.getSuggestion('--bogus-flag')).toBe(
            "\n... Suggested alternatives: '-bogus-fleg', '-bogus-flop'"
        );
    });

    it('includes prefixes and extra candidates', () => {
        const { parser } = createParser();
        parser.prefix('-Wno-', () => {}).finalize();
        parser.addSuggestionCandidate('-jobs');

        expect(parser.suggestions('-Wno')).toEqual(['-Wno-']);
        expect(parser.suggestions('-job')).toEqual(['-jobs']);
        expect(parser.getSuggestion('-completely-different')).toBe('');
    });
});
