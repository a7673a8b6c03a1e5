// src/cli/args.ts

import type { ConversionRequest } from '../conversion/conversion_engine';
import { QUANTITY_KINDS, type QuantityKind } from '../conversion/units';
import { LogLevel, parseLogLevel } from '../utils/logger';
import { requestFromTokens } from './request_parser';

export type CliCommand =
    | { name: 'interactive' }
    | { name: 'help' }
    | { name: 'list' }
    | { name: 'convert'; request: ConversionRequest }
    | { name: 'table'; kind: QuantityKind; reverse: boolean }
    | { name: 'thermo'; identifier: string; file: string };

export interface CliOptions {
    command: CliCommand;
    elementsPath?: string;
    logLevel?: LogLevel;
    logFile?: string;
}

export type ArgsParseResult =
    | { ok: true; options: CliOptions }
    | { ok: false; message: string };

export const USAGE = [
    'Usage: elemental-units [options] [command]',
    '',
    'Commands:',
    '  (none)                                   interactive prompt, one request per line',
    '  convert <element> <from> <to> [value]    convert a single value (default 1)',
    '  table <entropy|energy> [--reverse]       conversion factors for every element',
    '  thermo <element> <file>                  convert a JANAF-style table to kB/atom and meV/atom',
    '  list                                     list supported conversions',
    '',
    'Options:',
    '  --elements <path>     element table (JSON) to use instead of the bundled one',
    '  --log-level <level>   NONE, ERROR, WARN, INFO or DEBUG',
    '  --log-file <path>     write the session log to a file on exit',
    '  -h, --help            show this help',
];

const VALUE_OPTIONS = ['--elements', '--log-level', '--log-file'] as const;
type ValueOption = typeof VALUE_OPTIONS[number];

const VALUE_OPTION_SET: ReadonlySet<string> = new Set(VALUE_OPTIONS);
const QUANTITY_KIND_SET: ReadonlySet<string> = new Set(QUANTITY_KINDS);

const isValueOption = (token: string): token is ValueOption => VALUE_OPTION_SET.has(token);

const isQuantityKind = (token: string): token is QuantityKind => QUANTITY_KIND_SET.has(token);

function parseCommand(positional: readonly string[], reverse: boolean): CliCommand | string {
    const [name, ...rest] = positional;

    if (reverse && name !== 'table') {
        return '--reverse only applies to the table command.';
    }
    if (positional.length === 0) {
        return { name: 'interactive' };
    }

    switch (name) {
        case 'list':
            return rest.length === 0 ? { name: 'list' } : 'list takes no arguments.';
        case 'convert': {
            const request = requestFromTokens(rest);
            return typeof request === 'string' ? request : { name: 'convert', request };
        }
        case 'table': {
            const [kind] = rest;
            if (rest.length !== 1 || !isQuantityKind(kind)) {
                return `table expects one of: ${QUANTITY_KINDS.join(', ')}.`;
            }
            return { name: 'table', kind, reverse };
        }
        case 'thermo': {
            const [identifier, file] = rest;
            if (rest.length !== 2) {
                return 'thermo expects <element> <file>.';
            }
            return { name: 'thermo', identifier, file };
        }
        default:
            return `Unknown command "${name}".`;
    }
}

/** Parses process arguments (without the node and script entries). */
export function parseArgs(argv: readonly string[]): ArgsParseResult {
    const positional: string[] = [];
    const values: Partial<Record<ValueOption, string>> = {};
    let reverse = false;
    let help = false;

    for (let i = 0; i < argv.length; i += 1) {
        const token = argv[i];
        if (isValueOption(token)) {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { ok: false, message: `${token} requires a value.` };
            }
            values[token] = value;
            i += 1;
        } else if (token === '--reverse') {
            reverse = true;
        } else if (token === '--help' || token === '-h') {
            help = true;
        } else if (token.startsWith('--')) {
            return { ok: false, message: `Unknown option "${token}".` };
        } else {
            positional.push(token);
        }
    }

    let logLevel: LogLevel | undefined;
    const levelText = values['--log-level'];
    if (levelText !== undefined) {
        logLevel = parseLogLevel(levelText);
        if (logLevel === undefined) {
            return { ok: false, message: `Unknown log level "${levelText}".` };
        }
    }

    const command = help ? { name: 'help' as const } : parseCommand(positional, reverse);
    if (typeof command === 'string') {
        return { ok: false, message: command };
    }

    return {
        ok: true,
        options: {
            command,
            elementsPath: values['--elements'],
            logLevel,
            logFile: values['--log-file'],
        },
    };
}
