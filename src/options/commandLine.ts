import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { Location } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';

import { INPUT_FILE_SUFFIXES } from './constants';
import { commandLineLocation } from './diagnostics';
import { lexArgumentFile } from './lexer';
import { OptionParser } from './optionParser';
import { ArgumentFileLoader, declareOptions } from './optionTable';
import { Options } from './options';
import { ArgToken, InputFileKind, LogFunction } from './types';
import {
    encodeName,
    filenameNonDirExt,
    isPurelyNumeric,
    parseFileArg,
    suffixed
} from './utils';

export const ARGUMENT_FILE_LANGUAGE = 'hdl-args';

export function classifyInputFile(filename: string): InputFileKind {
    for (const [suffix, kind] of INPUT_FILE_SUFFIXES) {
        if (suffixed(filename, suffix)) return kind;
    }
    return 'hdl-source';
}

/**
 * Turns a command line, and the argument files it includes, into option state.
 */
export class CommandLine implements ArgumentFileLoader {
    readonly parser: OptionParser;
    // Argument files currently being read, outermost first
    private readonly including: string[] = [];
    private readonly log?: LogFunction;

    constructor(private readonly options: Options, log?: LogFunction) {
        this.log = log ?? options.settings.log;
        this.parser = new OptionParser(options.reporter);
        declareOptions(this.parser, options, this);
        this.parser.finalize();
    }

    parseOpts(argv: readonly string[]): void {
        const location = commandLineLocation();
        for (const arg of argv) this.options.addLineArg(arg);
        this.parseOptsList(argv.map(text => ({ text, location })), '.');

        const values = this.options.values;
        // These report and exit without needing any input
        if (values.generateKey || values.showVersion) return;

        const vFiles = this.options.vFiles;
        if (vFiles.length === 0) {
            this.options.reporter.fatal(location, 'No input HDL file specified on command line');
        }

        if (values.prefix === '') {
            const base = values.topModule !== '' ? values.topModule : filenameNonDirExt(vFiles[0].filename);
            this.options.set('prefix', `V${encodeName(base)}`);
        }
        if (values.modPrefix === '') {
            this.options.set('modPrefix', this.options.values.prefix);
        }
        this.options.addIncDirFallback(values.makeDir);
    }

    parseOptsList(tokens: readonly ArgToken[], optionDir: string): void {
        const options = this.options;
        for (const token of tokens) options.addArg(token.text);

        let i = 0;
        while (i < tokens.length) {
            const token = tokens[i];
            const text = token.text;

            if (text === '-j' || text === '--j') {
                i++;
                let jobs = 0;
                if (i < tokens.length && isPurelyNumeric(tokens[i].text)) {
                    jobs = parseInt(tokens[i].text, 10);
                    i++;
                }
                if (jobs === 0) jobs = options.settings.hardwareConcurrency;
                // Only seed what was not given explicitly
                if (options.values.buildJobs === -1) options.set('buildJobs', jobs);
                if (options.values.verilateJobs === -1) options.set('verilateJobs', jobs);
                if (options.values.outputGroups === -1) options.set('outputGroups', jobs);
                continue;
            }

            if (text.startsWith('-') || text.startsWith('+')) {
                const consumed = this.parser.parse(i, tokens, optionDir);
                if (consumed > 0) {
                    i += consumed;
                    continue;
                }
                const bare = text.replace(/^--?/, '');
                if (options.isFuture0(bare)) {
                    i += 1;
                } else if (options.isFuture1(bare)) {
                    i += 2;
                } else {
                    options.reporter.fatal(token.location,
                        `Invalid option: ${text}${this.parser.getSuggestion(text)}`);
                }
                continue;
            }

            this.addInputFile(parseFileArg(optionDir, text));
            i++;
        }
    }

    /**
     * Read an argument file and process its words as if given in its place.
     * With relative set, paths inside it resolve against its own directory;
     * otherwise against callerDir.
     */
    parseOptsFile(location: Location, filename: string, relative: boolean, callerDir = '.'): void {
        const reporter = this.options.reporter;
        const resolved = path.resolve(filename);

        const active = this.including.indexOf(resolved);
        if (active >= 0) {
            const chain = [...this.including.slice(active), resolved];
            reporter.error(location, `Recursive argument file inclusion: ${chain.join(' -> ')}`);
            return;
        }

        let content: string;
        try {
            content = fs.readFileSync(filename, 'utf-8');
        } catch (e) {
            this.log?.(`Failed to read '${filename}': ${e}`);
            reporter.error(location, `Cannot open -f command file: ${filename}`);
            return;
        }

        const document = TextDocument.create(pathToFileURL(resolved).toString(), ARGUMENT_FILE_LANGUAGE, 1, content);
        const { tokens, diagnostics } = lexArgumentFile(document);
        for (const diagnostic of diagnostics) {
            reporter.error(Location.create(document.uri, diagnostic.range), diagnostic.message);
        }
        this.log?.(`Reading ${tokens.length} arguments from '${filename}'`);

        const optionDir = relative ? path.dirname(filename) : callerDir;
        this.including.push(resolved);
        try {
            this.parseOptsList(tokens, optionDir);
        } finally {
            this.including.pop();
        }
    }

    private addInputFile(filename: string): void {
        switch (classifyInputFile(filename)) {
            case 'compiled-source':
                this.options.addCppFile(filename);
                break;
            case 'linker-artifact':
                this.options.addLdLibs(filename);
                break;
            case 'design-unit':
                this.options.addVltFile(filename);
                break;
            case 'hdl-source':
                this.options.addVFile(filename);
                break;
        }
    }
}
