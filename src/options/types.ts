import { Location } from 'vscode-languageserver/node';

export type LogFunction = (message: string) => void;

// One word taken from the command line or from an argument file
export interface ArgToken {
    text: string;
    // Where the word came from; command-line words share one synthetic location
    location: Location;
}

// Passed to every option action so the table itself can stay immutable
export interface DispatchContext {
    // Location of the option token (not of its value)
    location: Location;
    // Directory relative file arguments are resolved against
    optionDir: string;
}

export interface BoolSlot {
    slot: (value: boolean) => void;
}

export interface StringSlot {
    type: 'string';
    slot: (value: string) => void;
}

export interface IntSlot {
    type: 'int';
    slot: (value: number) => void;
    min?: number;
    max?: number;
}

export type FlagAction = BoolSlot | ((ctx: DispatchContext) => void);
export type ToggleAction = BoolSlot | ((on: boolean, ctx: DispatchContext) => void);
export type ValueAction = StringSlot | IntSlot | ((value: string, ctx: DispatchContext) => void);
export type PrefixAction = (rest: string, ctx: DispatchContext) => void;
export type PrefixValueAction = (rest: string, value: string, ctx: DispatchContext) => void;

export type OptionDescriptor =
    // "-opt": sets a boolean or runs a callback
    | { kind: 'flag'; name: string; action: FlagAction }
    // "-opt" / "-no-opt"
    | { kind: 'toggle'; name: string; negation: string; action: ToggleAction }
    // "-opt value"
    | { kind: 'value'; name: string; action: ValueAction }
    // "-optREST"
    | { kind: 'prefix'; name: string; action: PrefixAction }
    // "-optREST value"
    | { kind: 'prefixValue'; name: string; action: PrefixValueAction };

export type OptionKind = OptionDescriptor['kind'];

// Language standards a source file may be compiled under
export type LangCode =
    | '1364-1995'
    | '1364-2001'
    | '1364-2005'
    | '1800-2005'
    | '1800-2009'
    | '1800-2012'
    | '1800-2017'
    | '1800-2023';

export type InputFileKind = 'compiled-source' | 'linker-artifact' | 'design-unit' | 'hdl-source';

export interface LibraryFile {
    filename: string;
    // Library the file was compiled into (from -work)
    libname: string;
}

export interface BlockDescriptor {
    origName: string;
    mangledName: string;
    // Parameter overrides in declaration order, quoted values keep their quotes
    parameters: Map<string, string>;
}

export type WarningOverride = 'off' | 'warn' | 'error';

export type XAssign = '0' | '1' | 'fast' | 'unique';
export type XInitial = '0' | 'fast' | 'unique';

// Scalar option values; collections live on Options itself
export interface OptionValues {
    build: boolean;
    buildJobs: number;
    verilateJobs: number;
    outputGroups: number;
    threads: number;
    traceDepth: number;
    errorLimit: number;
    reloopLimit: number;
    pinsBv: number;
    debugLevel: number;
    relativeIncludes: boolean;
    quietExit: boolean;
    quietStats: boolean;
    stats: boolean;
    debugCheck: boolean;
    timing: boolean;
    trace: boolean;
    lintOnly: boolean;
    preprocOnly: boolean;
    hierarchical: boolean;
    hierChild: boolean;
    protectIds: boolean;
    generateKey: boolean;
    showVersion: boolean;
    warnFatal: boolean;
    fDedupe: boolean;
    fGate: boolean;
    fInline: boolean;
    topModule: string;
    prefix: string;
    modPrefix: string;
    libCreate: string;
    makeDir: string;
    exeName: string;
    work: string;
    protectKey: string;
    defaultLanguage: LangCode;
    xAssign: XAssign;
    xInitial: XInitial;
}

// Keys whose value type is exactly V (so LangCode does not count as string)
export type KeysOfType<T, V> = {
    [K in keyof T]: [T[K]] extends [V] ? ([V] extends [T[K]] ? K : never) : never;
}[keyof T];
