import * as path from 'path';
import { Location } from 'vscode-languageserver/node';

import {
    CHILD_RUN_STRIP_ALONE,
    CHILD_RUN_STRIP_UNLESS_TOP,
    CHILD_RUN_STRIP_WITH_ARG,
    DEFAULT_INCDIR_FALLBACK,
    DEFAULT_LIB_EXTS,
    DEFAULT_SETTINGS,
    DEFAULT_VALUES,
    FrontendSettings
} from './constants';
import { ErrorReporter } from './diagnostics';
import { SearchPath } from './searchPath';
import {
    BlockDescriptor,
    LangCode,
    LibraryFile,
    OptionValues,
    WarningOverride
} from './types';
import { quoteAny, splitPlusList } from './utils';

/**
 * Resolved option state for one compiler invocation.
 *
 * Written only while the command line is processed; finalize() makes it
 * read-only, after which later stages may read it freely.
 */
export class Options {
    readonly settings: FrontendSettings;
    readonly reporter: ErrorReporter;
    readonly searchPath: SearchPath;

    private readonly state: OptionValues = { ...DEFAULT_VALUES };
    private finalized = false;
    private pendingKey: Promise<string> | null = null;

    private readonly langExts = new Map<string, LangCode>();
    private readonly defineMap = new Map<string, string>();
    private readonly parameterMap = new Map<string, string>();
    private readonly cppFileSet = new Set<string>();
    private readonly ldLibList: string[] = [];
    private readonly cFlagList: string[] = [];
    private readonly vFileList: LibraryFile[] = [];
    private readonly vltFileList: LibraryFile[] = [];
    private readonly libraryFileList: LibraryFile[] = [];
    private readonly forceIncList: string[] = [];
    private readonly futures = new Set<string>();
    private readonly future0s = new Set<string>();
    private readonly future1s = new Set<string>();
    private readonly warningMap = new Map<string, WarningOverride>();
    private readonly hierBlockMap = new Map<string, BlockDescriptor>();
    private readonly debugLevels = new Map<string, number>();
    private readonly dumpLevels = new Map<string, number>();
    private readonly lineArgList: string[] = [];
    private readonly allArgList: string[] = [];

    constructor(settings: Partial<FrontendSettings> = {}, reporter: ErrorReporter = new ErrorReporter()) {
        this.settings = { ...DEFAULT_SETTINGS, ...settings };
        this.reporter = reporter;
        this.searchPath = new SearchPath(reporter, {
            relativeIncludes: () => this.state.relativeIncludes,
            maxModuleNameLength: this.settings.maxModuleNameLength,
            log: this.settings.log
        });

        // "" first, so a name given with its extension is found as-is
        for (const ext of DEFAULT_LIB_EXTS) this.searchPath.addLibExt(ext);
        this.searchPath.addIncDirFallback(DEFAULT_INCDIR_FALLBACK);
    }

    // STATE

    get values(): Readonly<OptionValues> {
        return this.state;
    }

    get isFinalized(): boolean {
        return this.finalized;
    }

    set<K extends keyof OptionValues>(key: K, value: OptionValues[K]): void {
        this.assertMutable();
        this.state[key] = value;
    }

    finalize(): void {
        this.assertMutable();
        this.finalized = true;
    }

    private assertMutable(): void {
        if (this.finalized) {
            throw new Error('Options are finalized and can no longer be modified');
        }
    }

    // SEARCH PATH

    addIncDirUser(incdir: string): void {
        this.assertMutable();
        this.searchPath.addIncDirUser(incdir);
    }

    addIncDirFallback(incdir: string): void {
        this.assertMutable();
        this.searchPath.addIncDirFallback(incdir);
    }

    addLibExt(libext: string): void {
        this.assertMutable();
        this.searchPath.addLibExt(libext);
    }

    filePath(location: Location, moduleName: string, lastPath: string, errorPrefix = ''): string | null {
        return this.searchPath.resolve(moduleName, lastPath, errorPrefix, location);
    }

    // LANGUAGES

    // A later registration for the same extension replaces the earlier one
    addLangExt(langext: string, lang: LangCode): void {
        this.assertMutable();
        const ext = langext.startsWith('.') ? langext.substring(1) : langext;
        this.langExts.delete(ext);
        this.langExts.set(ext, lang);
    }

    get languageExtensions(): ReadonlyMap<string, LangCode> {
        return this.langExts;
    }

    fileLanguage(filename: string): LangCode {
        const base = path.basename(filename);
        const dot = base.lastIndexOf('.');
        if (dot >= 0) {
            const lang = this.langExts.get(base.substring(dot + 1));
            if (lang) return lang;
        }
        return this.state.defaultLanguage;
    }

    // DEFINES AND PARAMETERS

    // "name=value[+name=value...]"; the '+' form only for +define+
    addDefine(defline: string, allowPlus: boolean): void {
        this.assertMutable();
        for (const [name, value] of splitAssignments(defline, allowPlus)) {
            this.defineMap.set(name, value);
        }
    }

    undefine(name: string): void {
        this.assertMutable();
        this.defineMap.delete(name);
    }

    addParameter(paramline: string, allowPlus: boolean): void {
        this.assertMutable();
        for (const [name, value] of splitAssignments(paramline, allowPlus)) {
            this.parameterMap.delete(name);
            this.parameterMap.set(name, value);
        }
    }

    get defines(): ReadonlyMap<string, string> {
        return this.defineMap;
    }

    get parameters(): ReadonlyMap<string, string> {
        return this.parameterMap;
    }

    hasParameter(name: string): boolean {
        return this.parameterMap.has(name);
    }

    parameter(name: string): string | undefined {
        return this.parameterMap.get(name);
    }

    // INPUT FILES

    addCppFile(filename: string): void {
        this.assertMutable();
        this.cppFileSet.add(filename);
    }

    addLdLibs(filename: string): void {
        this.assertMutable();
        this.ldLibList.push(filename);
    }

    addCFlags(flag: string): void {
        this.assertMutable();
        this.cFlagList.push(flag);
    }

    // Order matters and repeats are legal for HDL sources
    addVFile(filename: string): void {
        this.assertMutable();
        this.vFileList.push({ filename, libname: this.state.work });
    }

    addVltFile(filename: string): void {
        this.assertMutable();
        if (!this.vltFileList.some(f => f.filename === filename && f.libname === this.state.work)) {
            this.vltFileList.push({ filename, libname: this.state.work });
        }
    }

    addLibraryFile(filename: string): void {
        this.assertMutable();
        this.libraryFileList.push({ filename, libname: this.state.work });
    }

    addForceInc(filename: string): void {
        this.assertMutable();
        this.forceIncList.push(filename);
    }

    get cppFiles(): readonly string[] {
        return [...this.cppFileSet];
    }

    get ldLibs(): readonly string[] {
        return this.ldLibList;
    }

    get cFlags(): readonly string[] {
        return this.cFlagList;
    }

    get vFiles(): readonly LibraryFile[] {
        return this.vFileList;
    }

    get vltFiles(): readonly LibraryFile[] {
        return this.vltFileList;
    }

    get libraryFiles(): readonly LibraryFile[] {
        return this.libraryFileList;
    }

    get forceIncs(): readonly string[] {
        return this.forceIncList;
    }

    // FUTURE OPTIONS AND WARNINGS

    addFuture(name: string): void {
        this.assertMutable();
        this.futures.add(name);
    }

    addFuture0(name: string): void {
        this.assertMutable();
        this.future0s.add(name);
    }

    addFuture1(name: string): void {
        this.assertMutable();
        this.future1s.add(name);
    }

    isFuture(name: string): boolean {
        return this.futures.has(name);
    }

    isFuture0(name: string): boolean {
        return this.future0s.has(name);
    }

    isFuture1(name: string): boolean {
        return this.future1s.has(name);
    }

    setWarning(code: string, override: WarningOverride): void {
        this.assertMutable();
        this.warningMap.set(code, override);
    }

    get warnings(): ReadonlyMap<string, WarningOverride> {
        return this.warningMap;
    }

    // HIERARCHICAL BLOCKS

    addHierBlock(block: BlockDescriptor): void {
        this.assertMutable();
        this.hierBlockMap.set(block.mangledName, block);
    }

    get hierBlocks(): ReadonlyMap<string, BlockDescriptor> {
        return this.hierBlockMap;
    }

    // DEBUG AND DUMP LEVELS

    setDebugLevel(tag: string, level: number): void {
        this.assertMutable();
        this.debugLevels.set(tag, level);
    }

    setDumpLevel(tag: string, level: number): void {
        this.assertMutable();
        this.dumpLevels.set(tag, level);
    }

    debugLevel(tag: string): number {
        return this.debugLevels.get(tag) ?? this.state.debugLevel;
    }

    dumpLevel(tag: string): number {
        return this.dumpLevels.get(tag) ?? 0;
    }

    hasDumpLevel(tag: string): boolean {
        return this.dumpLevels.has(tag);
    }

    // ARGUMENTS

    addLineArg(arg: string): void {
        this.assertMutable();
        this.lineArgList.push(arg);
    }

    addArg(arg: string): void {
        this.assertMutable();
        this.allArgList.push(arg);
    }

    get lineArgs(): readonly string[] {
        return this.lineArgList;
    }

    allArgsString(): string {
        return this.allArgList.join(' ');
    }

    // Command line for a child run of one hierarchical block: input files and
    // options that only make sense for the parent are dropped
    allArgsStringForHierBlock(forTop: boolean): string {
        const vFiles = new Set(this.vFileList.map(f => f.filename));
        const out: string[] = [];
        let stripArg = false;
        let stripArgIfNum = false;
        for (const arg of this.lineArgList) {
            if (stripArg) {
                stripArg = false;
                continue;
            }
            if (stripArgIfNum) {
                stripArgIfNum = false;
                if (/^\d/.test(arg)) continue;
            }
            const skip = arg.startsWith('--') ? 2 : arg.startsWith('-') ? 1 : 0;
            if (skip > 0) {
                const strip = childRunStrip(arg.substring(skip), forTop);
                if (strip === 'option') continue;
                if (strip === 'withArg') {
                    stripArg = true;
                    continue;
                }
                if (strip === 'withNumericArg') {
                    stripArgIfNum = true;
                    continue;
                }
            } else if (vFiles.has(arg) || this.cppFileSet.has(arg)) {
                continue;
            }
            out.push(`"${quoteAny(arg, '"', '\\')}"`);
        }
        return out.join(' ');
    }

    // SECRET

    /**
     * The key behind --protect-ids: the --protect-key value when given,
     * otherwise generated once on first request. Concurrent callers share
     * the single generation and all receive the same value.
     */
    protectKeyDefaulted(): Promise<string> {
        if (this.state.protectKey !== '') {
            return Promise.resolve(this.state.protectKey);
        }
        if (!this.pendingKey) {
            this.pendingKey = this.settings.generateSecret().catch((err: unknown) => {
                // Let a later caller retry instead of caching the failure
                this.pendingKey = null;
                throw err;
            });
        }
        return this.pendingKey;
    }

    // Plain snapshot of the resolved inputs, for tools
    summary(): Record<string, unknown> {
        return {
            topModule: this.state.topModule,
            prefix: this.state.prefix,
            modPrefix: this.state.modPrefix,
            defaultLanguage: this.state.defaultLanguage,
            vFiles: this.vFileList,
            vltFiles: this.vltFileList,
            libraryFiles: this.libraryFileList,
            cppFiles: this.cppFiles,
            ldLibs: this.ldLibList,
            incDirUsers: this.searchPath.userDirs,
            incDirFallbacks: this.searchPath.fallbackDirs,
            libExts: this.searchPath.libraryExtensions,
            langExts: Object.fromEntries(this.langExts),
            defines: Object.fromEntries(this.defineMap),
            parameters: Object.fromEntries(this.parameterMap),
            hierBlocks: [...this.hierBlockMap.values()].map(b => ({
                origName: b.origName,
                mangledName: b.mangledName,
                parameters: Object.fromEntries(b.parameters)
            })),
            buildJobs: this.state.buildJobs,
            verilateJobs: this.state.verilateJobs,
            outputGroups: this.state.outputGroups,
            threads: this.state.threads
        };
    }
}

type ChildRunStrip = 'keep' | 'option' | 'withArg' | 'withNumericArg';

function childRunStrip(opt: string, forTop: boolean): ChildRunStrip {
    if (opt === 'j') return 'withNumericArg';
    if (CHILD_RUN_STRIP_WITH_ARG.has(opt)) return 'withArg';
    if (CHILD_RUN_STRIP_ALONE.has(opt)
        || (!forTop && CHILD_RUN_STRIP_UNLESS_TOP.has(opt))
        || (opt.length > 2 && opt.startsWith('G='))) {
        return 'option';
    }
    return 'keep';
}

// "a=1+b=2" -> [["a", "1"], ["b", "2"]]; a missing value is ""
function splitAssignments(text: string, allowPlus: boolean): Array<[string, string]> {
    const parts = allowPlus ? splitPlusList(text) : [text];
    const result: Array<[string, string]> = [];
    for (const part of parts) {
        if (part === '') continue;
        const eq = part.indexOf('=');
        result.push(eq >= 0 ? [part.substring(0, eq), part.substring(eq + 1)] : [part, '']);
    }
    return result;
}
