import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { FatalError } from '../../src/options';
import { createCommandLine, messages } from '../helpers/options';

const FIXTURES = path.resolve(__dirname, '../fixtures/args');

function fixture(name: string): string {
    return path.join(FIXTURES, name);
}

function fileUri(name: string): string {
    return pathToFileURL(fixture(name)).toString();
}

describe('nested argument files', () => {
    it('resolves paths against the right directory', () => {
        const { commandLine, options, reporter } = createCommandLine();
        commandLine.parseOpts(['-f', fixture('top.f')]);

        expect(messages(reporter)).toEqual([]);
        expect(options.vFiles.map(f => f.filename)).toEqual([
            `${FIXTURES}/sub/core.v`,
            `${FIXTURES}/sub/with space.v`,
            `${FIXTURES}/flat.v`,
            `${FIXTURES}/top.v`
        ]);
        expect(options.searchPath.userDirs).toEqual([`${FIXTURES}/rtl`, `${FIXTURES}/sub/lib`]);
        expect([...options.defines]).toEqual([['WIDTH', '8']]);
    });

    it('keeps the command line and the expanded arguments apart', () => {
        const { commandLine, options } = createCommandLine();
        commandLine.parseOpts(['-f', fixture('top.f')]);

        expect(options.lineArgs).toEqual(['-f', fixture('top.f')]);
        expect(options.allArgsString()).toContain('-Irtl -f sub/sub.f -F sub/flat.f');
    });
});

describe('argument file errors', () => {
    it('reports a missing file and continues', () => {
        const { commandLine, options, reporter } = createCommandLine();
        commandLine.parseOpts(['-f', fixture('missing.f'), 'top.v']);

        expect(messages(reporter)).toEqual([`Cannot open -f command file: ${fixture('missing.f')}`]);
        expect(reporter.all()[0].uri).toBe('command-line');
        expect(options.vFiles.map(f => f.filename)).toEqual(['top.v']);
    });

    it('stops a cycle of inclusions', () => {
        const { commandLine, options, reporter } = createCommandLine();
        commandLine.parseOpts(['-f', fixture('cycle_a.f')]);

        const a = fixture('cycle_a.f');
        const b = fixture('cycle_b.f');
        expect(messages(reporter)).toEqual([`Recursive argument file inclusion: ${a} -> ${b} -> ${a}`]);
        expect(reporter.all()[0].uri).toBe(fileUri('cycle_b.f'));
        expect(reporter.all()[0].diagnostic.range.start).toEqual({ line: 0, character: 0 });
        expect(options.vFiles.map(f => f.filename)).toEqual([`${FIXTURES}/b.v`, `${FIXTURES}/a.v`]);
    });

    it('reports lexer errors at their place in the file', () => {
        const { commandLine, options, reporter } = createCommandLine();
        commandLine.parseOpts(['-f', fixture('bad_comment.f')]);

        expect(reporter.format()).toEqual([
            `${fixture('bad_comment.f')}:1:5: error: Unterminated /* comment inside argument file`
        ]);
        expect(options.vFiles.map(f => f.filename)).toEqual([`${FIXTURES}/x.v`]);
    });

    it('reports an unknown option inside a file at its token', () => {
        const { commandLine } = createCommandLine();
        let caught: unknown;
        try {
            commandLine.parseOpts(['-f', fixture('bad_option.f')]);
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(FatalError);
        if (caught instanceof FatalError) {
            expect(caught.uri).toBe(fileUri('bad_option.f'));
            expect(caught.diagnostic.range.start).toEqual({ line: 1, character: 0 });
            expect(caught.message.split('\n')[0]).toBe('Invalid option: -bogus-flag');
        }
    });
});
