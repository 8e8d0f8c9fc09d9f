import { Location } from 'vscode-languageserver/node';

import { ErrorReporter, commandLineLocation } from './diagnostics';
import { BlockDescriptor } from './types';

const OPTION = '--hierarchical-block';

// Split on commas outside "..." fields. Inside a quoted field only \" and \\
// are escapes, and the quotes stay part of the value (it is a parameter literal).
function splitFields(text: string, fail: (message: string) => void): string[] {
    const fields: string[] = [];
    let current = '';
    let inString = false;
    let i = 0;

    // Called with i on the first character of a field
    const startField = (): boolean => {
        if (i >= text.length) {
            fail(`${OPTION} must not end with ','`);
            return false;
        }
        if (text[i] === '"') {
            inString = true;
            current = '"';
            i++;
        }
        return true;
    };

    if (text.length > 0 && !startField()) return fields;

    while (i < text.length) {
        const char = text[i];
        if (inString) {
            if (char === '\\') {
                i++;
                if (i >= text.length) {
                    fail(`${OPTION} must not end with \\`);
                    return fields;
                }
                const escaped = text[i];
                if (escaped !== '"' && escaped !== '\\') {
                    fail(`${OPTION} does not allow '${escaped}' after \\`);
                    return fields;
                }
                current += escaped;
                i++;
            } else if (char === '"') {
                fields.push(current + char);
                current = '';
                inString = false;
                i++;
                if (i < text.length) {
                    if (text[i] !== ',') {
                        fail(`${OPTION} expects ',', but '${text[i]}' is passed`);
                        return fields;
                    }
                    i++;
                    if (!startField()) return fields;
                }
            } else {
                current += char;
                i++;
            }
        } else if (char === '"') {
            fail(`${OPTION} does not allow '"' in the middle of literal`);
            return fields;
        } else if (char === ',') {
            fields.push(current);
            current = '';
            i++;
            if (!startField()) return fields;
        } else {
            current += char;
            i++;
        }
    }

    if (inString) {
        fail(`${OPTION} has an unterminated string literal`);
    }
    if (current !== '') fields.push(current);
    return fields;
}

/**
 * Parse "origName,mangledName,param,value,..." into a block descriptor.
 * Problems are reported against location and parsing keeps whatever it can.
 */
export function parseBlockDescriptor(
    text: string,
    reporter: ErrorReporter,
    location: Location = commandLineLocation()
): BlockDescriptor {
    const fail = (message: string) => reporter.error(location, message);
    const fields = splitFields(text, fail);

    const descriptor: BlockDescriptor = { origName: '', mangledName: '', parameters: new Map() };
    if (fields.length >= 2) {
        if (fields.length % 2) {
            fail(`${OPTION} requires the number of entries to be even`);
        }
        descriptor.origName = fields[0];
        descriptor.mangledName = fields[1];
    } else {
        fail(`${OPTION} requires at least two comma-separated values`);
    }

    for (let i = 2; i + 1 < fields.length; i += 2) {
        const key = fields[i];
        if (descriptor.parameters.has(key)) {
            fail(`Parameter name '${key}' is duplicated in ${OPTION}`);
            continue;
        }
        descriptor.parameters.set(key, fields[i + 1]);
    }
    return descriptor;
}
