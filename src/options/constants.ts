import { createHash, randomBytes } from 'crypto';
import * as os from 'os';

import { InputFileKind, LangCode, LogFunction, OptionKind, OptionValues } from './types';

export const VERSION = '0.4.0';

// Diagnostics that are not tied to a file point here
export const COMMAND_LINE_URI = 'command-line';

export const DIAGNOSTIC_SOURCE = 'hdl-options';

// Number of tokens each option kind consumes, the option itself included
export const OPTION_ARITY: Record<OptionKind, 1 | 2> = {
    flag: 1,
    toggle: 1,
    value: 2,
    prefix: 1,
    prefixValue: 2
};

// Ordered oldest to newest; the last one is the default language
export const LANG_CODES: readonly LangCode[] = [
    '1364-1995',
    '1364-2001',
    '1364-2005',
    '1800-2005',
    '1800-2009',
    '1800-2012',
    '1800-2017',
    '1800-2023'
];

export const MOST_RECENT_LANG: LangCode = '1800-2023';

// Plus options that register a file extension for one language
export const LANG_EXT_OPTIONS: Record<string, LangCode> = {
    '+systemverilogext+': '1800-2017',
    '+verilog1995ext+': '1364-1995',
    '+verilog2001ext+': '1364-2001',
    '+1364-1995ext+': '1364-1995',
    '+1364-2001ext+': '1364-2001',
    '+1364-2005ext+': '1364-2005',
    '+1800-2005ext+': '1800-2005',
    '+1800-2009ext+': '1800-2009',
    '+1800-2012ext+': '1800-2012',
    '+1800-2017ext+': '1800-2017',
    '+1800-2023ext+': '1800-2023'
};

// Bare command-line files are bucketed by suffix; anything unlisted is HDL source
export const INPUT_FILE_SUFFIXES: ReadonlyArray<[string, InputFileKind]> = [
    ['.cpp', 'compiled-source'],
    ['.cxx', 'compiled-source'],
    ['.cc', 'compiled-source'],
    ['.c', 'compiled-source'],
    ['.sp', 'compiled-source'],
    ['.a', 'linker-artifact'],
    ['.o', 'linker-artifact'],
    ['.so', 'linker-artifact'],
    ['.vlt', 'design-unit']
];

export const DEFAULT_LIB_EXTS: readonly string[] = ['', '.v', '.sv'];

export const DEFAULT_INCDIR_FALLBACK = '.';

// How many tokens an option removes when forwarding arguments to a child run
export const CHILD_RUN_STRIP_WITH_ARG = new Set([
    'Mdir', 'clk', 'lib-create', 'f', 'F', 'v', 'l2-name', 'mod-prefix', 'prefix',
    'protect-lib', 'protect-key', 'threads', 'top-module'
]);
export const CHILD_RUN_STRIP_ALONE = new Set(['build', 'hierarchical']);
export const CHILD_RUN_STRIP_UNLESS_TOP = new Set(['cc', 'exe', 'sc']);

export const DEFAULT_VALUES: OptionValues = {
    build: false,
    buildJobs: -1,
    verilateJobs: -1,
    outputGroups: -1,
    threads: 1,
    traceDepth: 0,
    errorLimit: 50,
    reloopLimit: 40,
    pinsBv: 65,
    debugLevel: 0,
    relativeIncludes: false,
    quietExit: false,
    quietStats: false,
    stats: false,
    debugCheck: false,
    timing: false,
    trace: false,
    lintOnly: false,
    preprocOnly: false,
    hierarchical: false,
    hierChild: false,
    protectIds: false,
    generateKey: false,
    showVersion: false,
    warnFatal: true,
    fDedupe: true,
    fGate: true,
    fInline: true,
    topModule: '',
    prefix: '',
    modPrefix: '',
    libCreate: '',
    makeDir: 'obj_dir',
    exeName: '',
    work: 'work',
    protectKey: '',
    defaultLanguage: MOST_RECENT_LANG,
    xAssign: 'fast',
    xInitial: 'unique'
};

export interface FrontendSettings {
    // Substituted for a job count of 0
    hardwareConcurrency: number;
    // Module names longer than this are unlikely to be found by file lookup
    maxModuleNameLength: number;
    // Produces the secret behind --protect-ids when no --protect-key was given
    generateSecret: () => Promise<string>;
    log?: LogFunction;
}

function generateRandomSecret(): Promise<string> {
    return new Promise((resolve, reject) => {
        randomBytes(32, (err, bytes) => {
            if (err) {
                reject(err);
                return;
            }
            // Symbol-safe digest: base64url with '-' folded to '_'
            const digest = createHash('sha256').update(bytes).digest('base64url').replace(/-/g, '_');
            resolve(`HDL-KEY-${digest}`);
        });
    });
}

export const DEFAULT_SETTINGS: FrontendSettings = {
    hardwareConcurrency: os.availableParallelism(),
    maxModuleNameLength: 127,
    generateSecret: generateRandomSecret
};
