import { ErrorReporter } from './diagnostics';
import { OPTION_ARITY } from './constants';
import {
    ArgToken,
    DispatchContext,
    FlagAction,
    OptionDescriptor,
    PrefixAction,
    PrefixValueAction,
    ToggleAction,
    ValueAction
} from './types';
import { parseIntegerArg, rankSuggestions, suggestionMessage } from './utils';

type ExactEntry =
    | { descriptor: OptionDescriptor; negated: false }
    | { descriptor: Extract<OptionDescriptor, { kind: 'toggle' }>; negated: true };

type PrefixDescriptor = Extract<OptionDescriptor, { kind: 'prefix' | 'prefixValue' }>;

// "--opt" and "-opt" are the same option
export function normalizeOptionName(token: string): string {
    return token.startsWith('--') ? token.substring(1) : token;
}

/**
 * Matches command-line tokens against a table of declared options.
 *
 * An exact spelling always wins; otherwise the longest declared prefix that
 * the token starts with is used.
 */
export class OptionParser {
    private readonly exact = new Map<string, ExactEntry>();
    private prefixes: PrefixDescriptor[] = [];
    private readonly extraCandidates = new Set<string>();
    private finalized = false;

    constructor(private readonly reporter: ErrorReporter) {}

    add(descriptor: OptionDescriptor): this {
        if (this.finalized) {
            throw new Error(`Option '${descriptor.name}' declared after the option table was finalized`);
        }
        switch (descriptor.kind) {
            case 'prefix':
            case 'prefixValue':
                if (this.prefixes.some(p => p.name === descriptor.name)) {
                    throw new Error(`Option prefix '${descriptor.name}' declared twice`);
                }
                this.prefixes.push(descriptor);
                break;
            case 'toggle':
                this.addExact(descriptor.name, { descriptor, negated: false });
                this.addExact(descriptor.negation, { descriptor, negated: true });
                break;
            default:
                this.addExact(descriptor.name, { descriptor, negated: false });
                break;
        }
        return this;
    }

    flag(name: string, action: FlagAction): this {
        return this.add({ kind: 'flag', name, action });
    }

    toggle(name: string, action: ToggleAction, negation = `-no-${name.substring(1)}`): this {
        return this.add({ kind: 'toggle', name, negation, action });
    }

    value(name: string, action: ValueAction): this {
        return this.add({ kind: 'value', name, action });
    }

    prefix(name: string, action: PrefixAction): this {
        return this.add({ kind: 'prefix', name, action });
    }

    prefixValue(name: string, action: PrefixValueAction): this {
        return this.add({ kind: 'prefixValue', name, action });
    }

    // Spellings offered as suggestions without being declared options
    addSuggestionCandidate(name: string): void {
        this.extraCandidates.add(name);
    }

    // Freeze the table; longest prefixes are tried first
    finalize(): void {
        this.prefixes = [...this.prefixes].sort((a, b) => b.name.length - a.name.length);
        this.finalized = true;
    }

    /**
     * Try to match tokens[index]. Returns the number of tokens consumed,
     * 0 when no declared option matches.
     */
    parse(index: number, tokens: readonly ArgToken[], optionDir: string): number {
        const token = tokens[index];
        const name = normalizeOptionName(token.text);
        const ctx: DispatchContext = { location: token.location, optionDir };
        const next = index + 1 < tokens.length ? tokens[index + 1].text : undefined;

        const entry = this.exact.get(name);
        if (entry) {
            return this.dispatchExact(entry, token, next, ctx);
        }

        const descriptor = this.prefixes.find(p => name.startsWith(p.name));
        if (!descriptor) return 0;

        const rest = name.substring(descriptor.name.length);
        if (descriptor.kind === 'prefix') {
            descriptor.action(rest, ctx);
            return OPTION_ARITY.prefix;
        }
        if (next === undefined) {
            return this.missingArgument(token, ctx);
        }
        descriptor.action(rest, next, ctx);
        return OPTION_ARITY.prefixValue;
    }

    private dispatchExact(entry: ExactEntry, token: ArgToken, next: string | undefined, ctx: DispatchContext): number {
        if (entry.negated) {
            applyToggle(entry.descriptor.action, false, ctx);
            return OPTION_ARITY.toggle;
        }
        const descriptor = entry.descriptor;
        switch (descriptor.kind) {
            case 'flag':
                if (typeof descriptor.action === 'function') {
                    descriptor.action(ctx);
                } else {
                    descriptor.action.slot(true);
                }
                return OPTION_ARITY.flag;
            case 'toggle':
                applyToggle(descriptor.action, true, ctx);
                return OPTION_ARITY.toggle;
            case 'value':
                if (next === undefined) {
                    return this.missingArgument(token, ctx);
                }
                this.applyValue(descriptor.action, token.text, next, ctx);
                return OPTION_ARITY.value;
            default:
                // Prefix options never enter the exact table
                return 0;
        }
    }

    private applyValue(action: ValueAction, option: string, value: string, ctx: DispatchContext): void {
        if (typeof action === 'function') {
            action(value, ctx);
            return;
        }
        if (action.type === 'string') {
            action.slot(value);
            return;
        }
        const parsed = parseIntegerArg(value);
        if (parsed === null) {
            this.reporter.error(ctx.location, `${option} requires an integer, but '${value}' was passed`);
            return;
        }
        if (action.min !== undefined && parsed < action.min) {
            this.reporter.error(ctx.location, `${option} must be >= ${action.min}: ${value}`);
            action.slot(action.min);
            return;
        }
        if (action.max !== undefined && parsed > action.max) {
            this.reporter.error(ctx.location, `${option} maximum is ${action.max}: ${value}`);
            action.slot(action.max);
            return;
        }
        action.slot(parsed);
    }

    private missingArgument(token: ArgToken, ctx: DispatchContext): number {
        this.reporter.error(ctx.location, `Option '${token.text}' requires an argument`);
        return 1;
    }

    // Closest declared spellings to an unknown option
    suggestions(token: string): string[] {
        const candidates = [...this.exact.keys(), ...this.prefixes.map(p => p.name), ...this.extraCandidates];
        const name = normalizeOptionName(token);
        return rankSuggestions(name, candidates);
    }

    getSuggestion(token: string): string {
        return suggestionMessage(this.suggestions(token));
    }

    private addExact(name: string, entry: ExactEntry): void {
        if (this.exact.has(name)) {
            throw new Error(`Option '${name}' declared twice`);
        }
        this.exact.set(name, entry);
    }
}

function applyToggle(action: ToggleAction, on: boolean, ctx: DispatchContext): void {
    if (typeof action === 'function') {
        action(on, ctx);
    } else {
        action.slot(on);
    }
}
