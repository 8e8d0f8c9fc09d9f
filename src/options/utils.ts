import * as path from 'path';

// Parse an integer option argument (decimal, 0x hex or 0b binary, optional sign)
export function parseIntegerArg(value: string): number | null {
    const trimmed = value.trim();

    const hexMatch = trimmed.match(/^(-?)0x([0-9a-fA-F]+)$/i);
    if (hexMatch) {
        const num = parseInt(hexMatch[2], 16);
        return hexMatch[1] ? -num : num;
    }

    const binMatch = trimmed.match(/^(-?)0b([01]+)$/i);
    if (binMatch) {
        const num = parseInt(binMatch[2], 2);
        return binMatch[1] ? -num : num;
    }

    if (/^[-+]?\d+$/.test(trimmed)) {
        return parseInt(trimmed, 10);
    }

    return null;
}

// A token made of digits only, as accepted after -j
export function isPurelyNumeric(value: string): boolean {
    return /^\d+$/.test(value);
}

export function isIdentifier(value: string): boolean {
    return /^[A-Za-z_][A-Za-z0-9_]*$/.test(value);
}

// Normalize separators and drop "./" prefixes and trailing slashes
export function cleanupFilename(filename: string): string {
    if (filename === '') return filename;
    let cleaned = path.normalize(filename);
    while (cleaned.length > 1 && cleaned.endsWith(path.sep)) {
        cleaned = cleaned.slice(0, -1);
    }
    return cleaned;
}

// Join without producing "./name" for the current directory
export function filenameJoin(dir: string, name: string): string {
    if (dir === '' || dir === '.') return name;
    if (dir.endsWith('/') || dir.endsWith(path.sep)) return dir + name;
    return `${dir}/${name}`;
}

export function filenameIsRel(filename: string): boolean {
    return !path.isAbsolute(filename);
}

// Base name without its last extension: "rtl/top.sv" -> "top"
export function filenameNonDirExt(filename: string): string {
    const base = path.basename(filename);
    const dot = base.lastIndexOf('.');
    return dot > 0 ? base.substring(0, dot) : base;
}

// Relative file arguments inside an argument file are taken from its directory
export function parseFileArg(optionDir: string, relFilename: string): string {
    if (optionDir !== '.' && filenameIsRel(relFilename)) {
        return filenameJoin(optionDir, relFilename);
    }
    return relFilename;
}

// Make a name usable as an identifier: other characters become __0<hex>
export function encodeName(name: string): string {
    let out = '';
    for (const char of name) {
        if (/[A-Za-z0-9_]/.test(char)) {
            out += char;
        } else {
            out += '__0' + char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0');
        }
    }
    return out;
}

export function suffixed(filename: string, suffix: string): boolean {
    return filename.length >= suffix.length && filename.endsWith(suffix);
}

// Split "a+b+c" as used by the plus-style options; '+' cannot be quoted
export function splitPlusList(text: string): string[] {
    return text.split('+');
}

// Quote every occurrence of quote or escape with escape
export function quoteAny(text: string, quote: string, escape: string): string {
    let result = '';
    for (const char of text) {
        if (char === quote || char === escape) result += escape;
        result += char;
    }
    return result;
}

// Levenshtein distance between two spellings
export function editDistance(a: string, b: string): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = new Array<number>(b.length + 1);
    let current = new Array<number>(b.length + 1);
    for (let j = 0; j <= b.length; j++) previous[j] = j;

    for (let i = 1; i <= a.length; i++) {
        current[0] = i;
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + cost
            );
        }
        [previous, current] = [current, previous];
    }
    return previous[b.length];
}

const MAX_SUGGESTIONS = 5;

// Closest candidates by edit distance, nearest first, ties alphabetical
export function rankSuggestions(word: string, candidates: Iterable<string>): string[] {
    const limit = Math.max(2, Math.floor(word.length / 3));
    const scored: { candidate: string; distance: number }[] = [];
    const seen = new Set<string>();
    for (const candidate of candidates) {
        if (seen.has(candidate) || candidate === word) continue;
        seen.add(candidate);
        const distance = editDistance(word, candidate);
        if (distance <= limit) {
            scored.push({ candidate, distance });
        }
    }
    scored.sort((x, y) => x.distance - y.distance || (x.candidate < y.candidate ? -1 : x.candidate > y.candidate ? 1 : 0));
    return scored.slice(0, MAX_SUGGESTIONS).map(s => s.candidate);
}

// Render suggestions as a diagnostic continuation line, or '' when there are none
export function suggestionMessage(suggestions: readonly string[]): string {
    if (suggestions.length === 0) return '';
    const quoted = suggestions.map(s => `'${s}'`).join(', ');
    return suggestions.length === 1
        ? `\n... Suggested alternative: ${quoted}`
        : `\n... Suggested alternatives: ${quoted}`;
}
