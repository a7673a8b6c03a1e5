// src/cli/request_parser.ts

import { CONFIG } from '../config';
import type { ConversionRequest } from '../conversion/conversion_engine';

export type SessionCommand = 'exit' | 'help' | 'list';

export type ParsedLine =
    | { type: 'empty' }
    | { type: 'command'; command: SessionCommand }
    | { type: 'request'; request: ConversionRequest }
    | { type: 'invalid'; message: string };

export const REQUEST_FORMAT = 'Expected: <element> <starting unit> <ending unit> [value]';

function matchCommand(token: string): SessionCommand | undefined {
    const word = token.toLowerCase();
    if (CONFIG.EXIT_COMMANDS.includes(word)) return 'exit';
    if (CONFIG.HELP_COMMANDS.includes(word)) return 'help';
    if (CONFIG.LIST_COMMANDS.includes(word)) return 'list';
    return undefined;
}

/** Parses a numeric token, returning undefined for anything that is not a finite number. */
export function parseValue(token: string): number | undefined {
    if (token.trim() === '') return undefined;
    const value = Number(token);
    return Number.isFinite(value) ? value : undefined;
}

/**
 * Builds a request from the tokens `<identifier> <from> <to> [value]`.
 * Returns an error message instead when the tokens do not form one.
 */
export function requestFromTokens(tokens: readonly string[]): ConversionRequest | string {
    if (tokens.length !== 3 && tokens.length !== 4) {
        return REQUEST_FORMAT;
    }
    const [identifier, fromUnit, toUnit] = tokens;
    if (tokens.length === 3) {
        return { identifier, fromUnit, toUnit };
    }
    const valueToken = tokens[3];
    const value = parseValue(valueToken);
    if (value === undefined) {
        return `"${valueToken}" is not a number.`;
    }
    return { identifier, fromUnit, toUnit, value };
}

/** Interprets one prompt line: a session command, a conversion request, or neither. */
export function parseRequestLine(line: string): ParsedLine {
    const tokens = line.trim().split(/\s+/).filter(token => token.length > 0);
    if (tokens.length === 0) {
        return { type: 'empty' };
    }

    if (tokens.length === 1) {
        const command = matchCommand(tokens[0]);
        if (command) return { type: 'command', command };
    }

    const request = requestFromTokens(tokens);
    return typeof request === 'string'
        ? { type: 'invalid', message: request }
        : { type: 'request', request };
}
