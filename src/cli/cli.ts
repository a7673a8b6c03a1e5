// src/cli/cli.ts

import { FACTOR_TABLE_PRESETS, buildFactorTable, formatFactorTable } from '../tables/factor_table';
import { convertThermoTable, formatThermoTable, parseThermoTable } from '../tables/thermo_table';
import { UnknownElementError, UnsupportedConversionError } from '../core/errors';
import { logger } from '../utils/logger';
import type { Converter } from '../index';
import { USAGE, type CliCommand } from './args';
import { ConversionSession } from './session';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
    readFile(path: string): string;
}

export type BatchCommand = Exclude<CliCommand, { name: 'interactive' }>;

/** Runs a non-interactive command and returns the process exit code. */
export function runCommand(command: BatchCommand, converter: Converter, io: CliIO): number {
    const { engine, registry, catalog } = converter;
    const session = new ConversionSession(engine, catalog);
    logger.debug(`[CLI] Running command "${command.name}"`);

    switch (command.name) {
        case 'help':
            USAGE.forEach(line => io.out(line));
            return EXIT_OK;

        case 'list':
            session.supportedConversions().forEach(line => io.out(line));
            return EXIT_OK;

        case 'convert': {
            const outcome = session.runRequest(command.request);
            if (outcome.status === 'error') {
                outcome.lines.forEach(line => io.err(line));
                return EXIT_FAILURE;
            }
            outcome.lines.forEach(line => io.out(line));
            return EXIT_OK;
        }

        case 'table': {
            const preset = command.reverse ? `${command.kind}-reverse` as const : command.kind;
            const table = buildFactorTable(engine, registry, FACTOR_TABLE_PRESETS[preset]);
            io.out(formatFactorTable(table));
            return EXIT_OK;
        }

        case 'thermo': {
            let text: string;
            try {
                text = io.readFile(command.file);
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                logger.error(`[CLI] Could not read thermo table "${command.file}": ${reason}`);
                io.err(`Could not read "${command.file}": ${reason}`);
                return EXIT_FAILURE;
            }
            try {
                const conversion = convertThermoTable(engine, command.identifier, parseThermoTable(text));
                io.out(formatThermoTable(conversion));
                return EXIT_OK;
            } catch (error) {
                if (error instanceof UnknownElementError || error instanceof UnsupportedConversionError) {
                    io.err(error.message);
                    return EXIT_FAILURE;
                }
                throw error;
            }
        }
    }
}
