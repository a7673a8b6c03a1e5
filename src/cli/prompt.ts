// src/cli/prompt.ts

import { createInterface } from 'node:readline';
import { CONFIG } from '../config';
import { logger } from '../utils/logger';
import type { ConversionSession } from './session';

/**
 * Reads requests line by line until an exit command or the end of input.
 * Rejects if a line fails with anything other than a conversion error.
 */
export function startPrompt(
    session: ConversionSession,
    input: NodeJS.ReadableStream,
    output: NodeJS.WritableStream,
): Promise<void> {
    const rl = createInterface({ input, output, terminal: false, crlfDelay: Infinity });
    const write = (lines: readonly string[]): void => {
        lines.forEach(line => output.write(`${line}\n`));
    };

    write(session.banner());
    rl.setPrompt(CONFIG.PROMPT);
    rl.prompt();
    logger.info('[Prompt] Waiting for requests.');

    return new Promise<void>((resolve, reject) => {
        let finished = false;
        rl.on('line', (line) => {
            // lines already buffered may still arrive after close()
            if (finished) return;
            try {
                const outcome = session.handleLine(line);
                write(outcome.lines);
                if (outcome.status === 'exit') {
                    finished = true;
                    rl.close();
                    return;
                }
                rl.prompt();
            } catch (error) {
                finished = true;
                reject(error);
                rl.close();
            }
        });
        rl.on('close', () => {
            finished = true;
            logger.info('[Prompt] Input closed.');
            resolve();
        });
    });
}
