import { describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { DirectoryCache } from '../../src/options/dirCache';
import { ErrorReporter } from '../../src/options/diagnostics';
import { DirectoryList, SearchPath, SearchPathSettings } from '../../src/options/searchPath';

const FIXTURES = path.resolve(__dirname, '../fixtures/search');
const DIR_A = path.join(FIXTURES, 'a');
const DIR_B = path.join(FIXTURES, 'b');
const DIR_C = path.join(FIXTURES, 'c');

function searchPath(exts: string[] = ['', '.v', '.sv'], settings: SearchPathSettings = {}) {
    const reporter = new ErrorReporter();
    const sp = new SearchPath(reporter, settings);
    for (const ext of exts) sp.addLibExt(ext);
    return { sp, reporter };
}

describe('DirectoryList', () => {
    it('keeps first-seen order without duplicates', () => {
        const list = new DirectoryList();
        expect(list.add('b')).toBe(true);
        expect(list.add('a')).toBe(true);
        expect(list.add('b')).toBe(false);
        expect(list.items).toEqual(['b', 'a']);
        expect(list.remove('b')).toBe(true);
        expect(list.remove('b')).toBe(false);
        expect(list.items).toEqual(['a']);
        expect(list.size).toBe(1);
    });
});

describe('directory registration', () => {
    it('moves a fallback directory to the user list', () => {
        const { sp } = searchPath();
        sp.addIncDirFallback('x');
        sp.addIncDirFallback('z');
        sp.addIncDirUser('x');
        sp.addIncDirFallback('x');
        sp.addIncDirUser('y/');
        sp.addIncDirUser('y');
        expect(sp.userDirs).toEqual(['x', 'y']);
        expect(sp.fallbackDirs).toEqual(['z']);
    });

    it('deduplicates library extensions by first occurrence', () => {
        const { sp } = searchPath(['', '.v', '.sv', '.v']);
        expect(sp.libraryExtensions).toEqual(['', '.v', '.sv']);
    });
});

describe('resolve', () => {
    it('tries extensions in registration order', () => {
        const cache = new DirectoryCache();
        const has = vi.spyOn(cache, 'has');
        const { sp } = searchPath(['', '.v', '.sv'], { cache });
        sp.addIncDirUser(DIR_A);

        expect(sp.resolve('foo', '')).toBe(path.join(DIR_A, 'foo.sv'));
        expect(has.mock.calls).toEqual([
            [DIR_A, 'foo'],
            [DIR_A, 'foo.v'],
            [DIR_A, 'foo.sv']
        ]);
    });

    it('searches user directories before fallbacks', () => {
        const { sp } = searchPath();
        sp.addIncDirFallback(DIR_A);
        sp.addIncDirUser(DIR_B);
        expect(sp.resolve('foo', '')).toBe(path.join(DIR_B, 'foo.v'));
    });

    it('rejects a directory with a matching name', () => {
        const { sp } = searchPath();
        sp.addIncDirUser(DIR_C);
        expect(sp.resolve('foo', '')).toBe(path.join(DIR_C, 'foo.v'));
    });

    it('accepts an absolute module path', () => {
        const { sp } = searchPath(['', '.sv']);
        expect(sp.resolve(path.join(DIR_A, 'foo'), '')).toBe(path.join(DIR_A, 'foo.sv'));
    });

    it('lists each directory at most once', () => {
        const readDir = vi.fn((dir: string) => fs.readdirSync(dir));
        const cache = new DirectoryCache(readDir);
        const { sp } = searchPath(['', '.v', '.sv'], { cache });
        sp.addIncDirUser(DIR_A);

        sp.resolve('foo', '');
        sp.resolve('foo', '');
        sp.resolve('bar', '');
        expect(readDir).toHaveBeenCalledTimes(1);
        expect(cache.listingCount).toBe(1);
    });

    it('searches the referencing directory last with relative includes', () => {
        let relative = false;
        const { sp } = searchPath(['', '.v'], { relativeIncludes: () => relative });
        expect(sp.resolve('foo', DIR_B)).toBeNull();
        relative = true;
        expect(sp.resolve('foo', DIR_B)).toBe(fs.realpathSync(path.join(DIR_B, 'foo.v')));
    });

    it('misses silently without an error prefix', () => {
        const { sp, reporter } = searchPath();
        sp.addIncDirUser(DIR_A);
        expect(sp.resolve('nothere', '')).toBeNull();
        expect(reporter.all()).toEqual([]);
    });
});

describe('not-found reporting', () => {
    it('lists every candidate and hints about -I once', () => {
        const { sp, reporter } = searchPath(['', '.v']);
        sp.addIncDirFallback(DIR_A);

        expect(sp.resolve('missing', '', 'Cannot find file containing module: ')).toBeNull();
        expect(sp.resolve('missing', '', 'Cannot find file containing module: ')).toBeNull();

        const [first, second] = reporter.all().map(r => r.diagnostic.message);
        expect(first).toBe(
            "Cannot find file containing module: 'missing'"
            + "\n... This may be because there's no search path specified with -I<dir>."
            + '\n... Looked in:'
            + `\n...      ${DIR_A}/missing`
            + `\n...      ${DIR_A}/missing.v`
        );
        expect(second).toBe(
            "Cannot find file containing module: 'missing'"
            + '\n... Looked in:'
            + `\n...      ${DIR_A}/missing`
            + `\n...      ${DIR_A}/missing.v`
        );
        expect(reporter.all()[0].uri).toBe('command-line');
    });

    it('explains lookup failures for very long names', () => {
        const { sp, reporter } = searchPath(['', '.v'], { maxModuleNameLength: 8 });
        sp.addIncDirUser(DIR_A);
        sp.resolve('averyverylongname', '', 'Cannot find: ');
        expect(reporter.all().map(r => r.diagnostic.message)).toEqual([
            "Cannot find: 'averyverylongname'"
            + '\n... Note: Name is longer than 8 characters; automatic file lookup may have failed due to OS filename length limits.'
            + '\n... Suggest putting filename with this module/package onto command line instead.'
        ]);
    });
});
