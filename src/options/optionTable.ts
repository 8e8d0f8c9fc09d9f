import { Location } from 'vscode-languageserver/node';

import { parseBlockDescriptor } from './blockDescriptor';
import { LANG_CODES, LANG_EXT_OPTIONS } from './constants';
import { OptionParser } from './optionParser';
import { Options } from './options';
import {
    BoolSlot,
    DispatchContext,
    IntSlot,
    KeysOfType,
    OptionValues,
    StringSlot,
    WarningOverride,
    XAssign,
    XInitial
} from './types';
import {
    isIdentifier,
    parseFileArg,
    parseIntegerArg,
    rankSuggestions,
    splitPlusList,
    suggestionMessage
} from './utils';

// Implemented by the command-line processor; -f and -F recurse through it
export interface ArgumentFileLoader {
    parseOptsFile(location: Location, filename: string, relative: boolean, callerDir: string): void;
}

const X_ASSIGN_VALUES: readonly XAssign[] = ['0', '1', 'fast', 'unique'];
const X_INITIAL_VALUES: readonly XInitial[] = ['0', 'fast', 'unique'];

// "'a', 'b', or 'c'"
function listChoices(values: readonly string[]): string {
    const quoted = values.map(v => `'${v}'`);
    return `${quoted.slice(0, -1).join(', ')}, or ${quoted[quoted.length - 1]}`;
}

/**
 * Declare every supported option on parser, with actions writing into options.
 */
export function declareOptions(parser: OptionParser, options: Options, loader: ArgumentFileLoader): void {
    const reporter = options.reporter;

    const bool = (key: KeysOfType<OptionValues, boolean>): BoolSlot => ({
        slot: value => options.set(key, value)
    });
    const str = (key: KeysOfType<OptionValues, string>): StringSlot => ({
        type: 'string',
        slot: value => options.set(key, value)
    });
    const int = (key: KeysOfType<OptionValues, number>, min?: number, max?: number): IntSlot => ({
        type: 'int',
        slot: value => options.set(key, value),
        min,
        max
    });

    const identifier = (option: string, key: 'prefix' | 'modPrefix' | 'libCreate') =>
        (value: string, ctx: DispatchContext) => {
            if (!isIdentifier(value)) {
                reporter.error(ctx.location, `${option} must be a legal identifier: '${value}'`);
                return;
            }
            options.set(key, value);
        };

    const jobs = (option: string, key: 'buildJobs' | 'verilateJobs') =>
        (value: string, ctx: DispatchContext) => {
            let count = parseIntegerArg(value);
            if (count === null || count < 0) {
                reporter.error(ctx.location, `${option} requires a non-negative integer, but '${value}' was passed`);
                count = 1;
            } else if (count === 0) {
                count = options.settings.hardwareConcurrency;
            }
            options.set(key, count);
        };

    const language = (value: string, ctx: DispatchContext) => {
        const code = LANG_CODES.find(c => c === value);
        if (code) {
            options.set('defaultLanguage', code);
            return;
        }
        reporter.error(ctx.location, `Unknown language specified: ${value}${suggestionMessage(rankSuggestions(value, LANG_CODES))}`);
    };

    const setDebugMode = (level: number) => {
        options.set('debugLevel', level);
        if (!options.hasDumpLevel('tree')) options.setDumpLevel('tree', 3);
        options.set('debugCheck', true);
        options.set('stats', true);
    };

    const levelArg = (option: string, value: string, ctx: DispatchContext): number | null => {
        const level = parseIntegerArg(value);
        if (level === null || level < 0) {
            reporter.error(ctx.location, `${option} requires a non-negative integer, but '${value}' was passed`);
            return null;
        }
        return level;
    };

    const warning = (override: WarningOverride) => (code: string, ctx: DispatchContext) => {
        if (code === '') {
            reporter.error(ctx.location, 'Warning option requires a warning code');
            return;
        }
        options.setWarning(code, override);
    };

    // Plus options

    parser
        .prefix('+define+', rest => options.addDefine(rest, true))
        .prefix('+incdir+', (rest, ctx) => {
            for (const dir of splitPlusList(rest)) {
                if (dir !== '') options.addIncDirUser(parseFileArg(ctx.optionDir, dir));
            }
        })
        .prefix('+libext+', rest => {
            for (const ext of splitPlusList(rest)) {
                if (ext !== '') options.addLibExt(ext);
            }
        })
        .flag('+librescan', () => {})
        .flag('+notimingchecks', () => {});

    for (const [name, lang] of Object.entries(LANG_EXT_OPTIONS)) {
        parser.prefix(name, rest => {
            for (const ext of splitPlusList(rest)) {
                if (ext !== '') options.addLangExt(ext, lang);
            }
        });
    }

    // Inputs and search path

    parser
        .prefix('-I', (rest, ctx) => options.addIncDirUser(parseFileArg(ctx.optionDir, rest)))
        .value('-y', (value, ctx) => options.addIncDirUser(parseFileArg(ctx.optionDir, value)))
        .value('-v', (value, ctx) => options.addLibraryFile(parseFileArg(ctx.optionDir, value)))
        .value('-f', (value, ctx) =>
            loader.parseOptsFile(ctx.location, parseFileArg(ctx.optionDir, value), true, ctx.optionDir))
        .value('-F', (value, ctx) =>
            loader.parseOptsFile(ctx.location, parseFileArg(ctx.optionDir, value), false, ctx.optionDir))
        .value('-FI', (value, ctx) => options.addForceInc(parseFileArg(ctx.optionDir, value)))
        .value('-Mdir', value => {
            options.set('makeDir', value);
            options.addIncDirFallback(value);
        })
        .value('-work', str('work'))
        .value('-CFLAGS', value => options.addCFlags(value))
        .value('-LDFLAGS', value => options.addLdLibs(value))
        .prefix('-D', rest => options.addDefine(rest, false))
        .prefix('-U', rest => options.undefine(rest))
        .prefix('-G', rest => options.addParameter(rest, false))
        .prefix('-pvalue+', rest => options.addParameter(rest, true));

    // Naming

    parser
        .value('-top', str('topModule'))
        .value('-top-module', str('topModule'))
        .value('-prefix', identifier('--prefix', 'prefix'))
        .value('-mod-prefix', identifier('--mod-prefix', 'modPrefix'))
        .value('-lib-create', identifier('--lib-create', 'libCreate'))
        .value('-o', str('exeName'))
        .value('-language', language)
        .value('-default-language', language);

    // Jobs and limits

    parser
        .value('-build-jobs', jobs('--build-jobs', 'buildJobs'))
        .value('-verilate-jobs', jobs('--verilate-jobs', 'verilateJobs'))
        .value('-output-groups', int('outputGroups', -1))
        .value('-threads', (value, ctx) => {
            const threads = parseIntegerArg(value);
            if (threads === null || threads < 0) {
                reporter.error(ctx.location, `--threads must be >= 0: ${value}`);
                options.set('threads', 1);
            } else if (threads === 0) {
                reporter.warn(ctx.location, '--threads 0 is deprecated, using --threads 1');
                options.set('threads', 1);
            } else {
                options.set('threads', threads);
            }
        })
        .value('-trace-depth', int('traceDepth', 0))
        .value('-error-limit', int('errorLimit', 0))
        .value('-reloop-limit', int('reloopLimit', 2))
        .value('-pins-bv', int('pinsBv', undefined, 65));
    parser.addSuggestionCandidate('-j');

    // Modes

    parser
        .flag('-build', bool('build'))
        .toggle('-relative-includes', bool('relativeIncludes'))
        .toggle('-quiet', on => {
            options.set('quietExit', on);
            options.set('quietStats', on);
        })
        .toggle('-quiet-exit', bool('quietExit'))
        .toggle('-quiet-stats', bool('quietStats'))
        .toggle('-stats', bool('stats'))
        .toggle('-timing', bool('timing'))
        .toggle('-trace', bool('trace'))
        .toggle('-lint-only', bool('lintOnly'))
        .flag('-E', bool('preprocOnly'))
        .toggle('-fdedup', bool('fDedupe'), '-fno-dedup')
        .toggle('-fgate', bool('fGate'), '-fno-gate')
        .toggle('-finline', bool('fInline'), '-fno-inline');

    // Hierarchical runs

    parser
        .toggle('-hierarchical', bool('hierarchical'))
        .flag('-hierarchical-child', bool('hierChild'))
        .value('-hierarchical-block', (value, ctx) =>
            options.addHierBlock(parseBlockDescriptor(value, reporter, ctx.location)));

    // Future options and warnings

    parser
        .value('-future0', value => options.addFuture0(value))
        .value('-future1', value => options.addFuture1(value))
        .prefix('-Wfuture-', rest => options.addFuture(rest))
        .prefix('-Wno-', warning('off'))
        .prefix('-Wwarn-', warning('warn'))
        .prefix('-Werror-', warning('error'))
        .flag('-Wno-fatal', () => options.set('warnFatal', false))
        .flag('-Wall', () => {
            options.setWarning('lint', 'warn');
            options.setWarning('style', 'warn');
        });

    // Debugging

    parser
        .flag('-debug', () => setDebugMode(3))
        .value('-debugi', (value, ctx) => {
            const level = levelArg('--debugi', value, ctx);
            if (level !== null) setDebugMode(level);
        })
        .prefixValue('-debugi-', (tag, value, ctx) => {
            const level = levelArg(`--debugi-${tag}`, value, ctx);
            if (level !== null) options.setDebugLevel(tag, level);
        })
        .prefix('-dump-', tag => options.setDumpLevel(tag, 3))
        .prefix('-no-dump-', tag => options.setDumpLevel(tag, 0))
        .prefixValue('-dumpi-', (tag, value, ctx) => {
            const level = levelArg(`--dumpi-${tag}`, value, ctx);
            if (level !== null) options.setDumpLevel(tag, level);
        });

    // Protection and version

    parser
        .value('-protect-key', str('protectKey'))
        .toggle('-protect-ids', bool('protectIds'))
        .flag('-generate-key', bool('generateKey'))
        .flag('-version', bool('showVersion'))
        .flag('-V', bool('showVersion'));

    // X handling

    parser
        .value('-x-assign', (value, ctx) => {
            const setting = X_ASSIGN_VALUES.find(v => v === value);
            if (setting) {
                options.set('xAssign', setting);
                return;
            }
            reporter.error(ctx.location,
                `Unknown setting for --x-assign: '${value}'\n... Suggest ${listChoices(X_ASSIGN_VALUES)}`);
        })
        .value('-x-initial', (value, ctx) => {
            const setting = X_INITIAL_VALUES.find(v => v === value);
            if (setting) {
                options.set('xInitial', setting);
                return;
            }
            reporter.error(ctx.location,
                `Unknown setting for --x-initial: '${value}'\n... Suggest ${listChoices(X_INITIAL_VALUES)}`);
        });
}
