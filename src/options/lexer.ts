import { Diagnostic, DiagnosticSeverity, Location, Range } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';

import { DIAGNOSTIC_SOURCE } from './constants';
import { ArgToken } from './types';

export interface StrippedText {
    // Comment-free text, lines joined by single spaces, terminated by '\n'
    text: string;
    // Offset in the original document of every character of text
    origins: number[];
    // Offset of a block comment still open at end of input, or -1
    unterminatedComment: number;
}

export interface ArgumentFileLex {
    tokens: ArgToken[];
    diagnostics: Diagnostic[];
}

type LexState = 'bare' | 'singleQuoted' | 'doubleQuoted' | 'escaped';

function isSpace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\v' || char === '\f';
}

// Remove //, # and /* */ comments. '//' only counts at line start or after
// whitespace (so "dir//file" survives), '#' only before any other text.
export function stripComments(source: string): StrippedText {
    const lines = source.split('\n');
    let text = '';
    const origins: number[] = [];
    let inComment = false;
    let commentStart = -1;
    let lineStart = 0;

    for (const line of lines) {
        let lastChar = ' ';
        let spaceBegin = true;
        for (let pos = 0; pos < line.length; lastChar = line[pos++]) {
            const char = line[pos];
            const next = line[pos + 1];
            if (inComment) {
                if (char === '*' && next === '/') {
                    inComment = false;
                    pos++;
                }
            } else if (char === '/' && next === '/' && (pos === 0 || isSpace(lastChar))) {
                break;
            } else if (char === '#' && spaceBegin) {
                break;
            } else if (char === '/' && next === '*') {
                inComment = true;
                commentStart = lineStart + pos;
                spaceBegin = false;
                pos++;
            } else {
                if (!isSpace(char)) spaceBegin = false;
                text += char;
                origins.push(lineStart + pos);
            }
        }
        text += ' ';
        origins.push(lineStart + line.length);
        lineStart += line.length + 1;
    }
    text += '\n';
    origins.push(source.length);

    return { text, origins, unterminatedComment: inComment ? commentStart : -1 };
}

interface RawWord {
    text: string;
    start: number;
    end: number;
}

// Split comment-free text into words. Backslash escapes one character outside
// quotes and inside "..."; '"...' runs to the next apostrophe with no escapes;
// an apostrophe not followed by '"' is literal (base specifiers such as 'h1F).
export function splitWords(stripped: StrippedText): { words: RawWord[]; unterminatedQuote: number } {
    const { text, origins } = stripped;
    const words: RawWord[] = [];
    let state: LexState = 'bare';
    let returnState: LexState = 'bare';
    let word = '';
    let start = -1;
    let end = -1;
    let quoteStart = -1;

    const mark = (pos: number) => {
        if (start < 0) start = origins[pos];
        end = origins[pos] + 1;
    };

    for (let pos = 0; pos < text.length; pos++) {
        let char = text[pos];
        switch (state) {
            case 'bare':
                if (isSpace(char)) {
                    if (word !== '') {
                        words.push({ text: word, start, end });
                    }
                    word = '';
                    start = -1;
                    break;
                }
                mark(pos);
                if (char === '\\') {
                    returnState = 'bare';
                    state = 'escaped';
                    break;
                }
                if (char === "'") {
                    // Look ahead to tell a quoted string from a base specifier
                    pos++;
                    if (pos < text.length) {
                        char = text[pos];
                        mark(pos);
                    }
                    if (char === '"') {
                        quoteStart = origins[pos - 1];
                        state = 'singleQuoted';
                    } else {
                        word += "'";
                    }
                    word += char;
                    break;
                }
                if (char === '"') {
                    quoteStart = origins[pos];
                    state = 'doubleQuoted';
                    break;
                }
                word += char;
                break;
            case 'singleQuoted':
                mark(pos);
                if (char !== "'") {
                    word += char;
                } else {
                    state = 'bare';
                }
                break;
            case 'doubleQuoted':
                mark(pos);
                if (char === '"') {
                    state = 'bare';
                } else if (char === '\\') {
                    returnState = 'doubleQuoted';
                    state = 'escaped';
                } else {
                    word += char;
                }
                break;
            case 'escaped':
                mark(pos);
                word += char;
                state = returnState;
                break;
        }
    }
    if (word !== '') {
        words.push({ text: word, start, end });
    }

    const inQuote = state === 'singleQuoted' || state === 'doubleQuoted'
        || (state === 'escaped' && returnState === 'doubleQuoted');
    return { words, unterminatedQuote: inQuote ? quoteStart : -1 };
}

function errorAt(document: TextDocument, offset: number, message: string): Diagnostic {
    const position = document.positionAt(offset);
    return {
        severity: DiagnosticSeverity.Error,
        range: Range.create(position, position),
        message,
        source: DIAGNOSTIC_SOURCE
    };
}

// Lex a whole argument file into tokens located inside that file
export function lexArgumentFile(document: TextDocument): ArgumentFileLex {
    const diagnostics: Diagnostic[] = [];
    const stripped = stripComments(document.getText());
    if (stripped.unterminatedComment >= 0) {
        diagnostics.push(errorAt(document, stripped.unterminatedComment,
            'Unterminated /* comment inside argument file'));
    }

    const { words, unterminatedQuote } = splitWords(stripped);
    if (unterminatedQuote >= 0) {
        diagnostics.push(errorAt(document, unterminatedQuote,
            'Unterminated quoted string inside argument file'));
    }

    const tokens: ArgToken[] = words.map(w => ({
        text: w.text,
        location: Location.create(
            document.uri,
            Range.create(document.positionAt(w.start), document.positionAt(w.end))
        )
    }));
    return { tokens, diagnostics };
}
