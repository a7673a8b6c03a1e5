#!/usr/bin/env -S tsx
// src/main.ts

import { readFileSync } from 'node:fs';
import { createConverter, type Converter } from './index';
import { loadElementTable } from './elements/element_table';
import { logger } from './utils/logger';
import { parseArgs, USAGE, type CliOptions } from './cli/args';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCommand, type CliIO } from './cli/cli';
import { startPrompt } from './cli/prompt';
import { ConversionSession } from './cli/session';

const io: CliIO = {
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
    readFile: path => readFileSync(path, 'utf8'),
};

function buildConverter(options: CliOptions): Converter {
    return options.elementsPath ? createConverter(loadElementTable(options.elementsPath)) : createConverter();
}

async function main(options: CliOptions): Promise<number> {
    if (options.logLevel !== undefined) {
        logger.setLogLevel(options.logLevel);
    }

    let converter: Converter;
    try {
        converter = buildConverter(options);
    } catch (error) {
        logger.error('[main] Failed to load element table:', error instanceof Error ? error : String(error));
        io.err(`Failed to load element table: ${error instanceof Error ? error.message : String(error)}`);
        return EXIT_FAILURE;
    }

    if (options.command.name === 'interactive') {
        await startPrompt(new ConversionSession(converter.engine, converter.catalog), process.stdin, process.stdout);
        return EXIT_OK;
    }
    return runCommand(options.command, converter, io);
}

const parsed = parseArgs(process.argv.slice(2));
if (!parsed.ok) {
    io.err(parsed.message);
    USAGE.forEach(line => io.err(line));
    process.exitCode = EXIT_USAGE;
} else {
    const { options } = parsed;
    void main(options)
        .then(code => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            logger.error('[main] Unhandled failure:', error instanceof Error ? error : String(error));
            io.err(error instanceof Error ? error.message : String(error));
            process.exitCode = EXIT_FAILURE;
        })
        .finally(() => {
            if (options.logFile) {
                logger.writeLogFile(options.logFile);
            }
        });
}
