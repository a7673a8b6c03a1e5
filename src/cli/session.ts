// src/cli/session.ts

import { CONFIG } from '../config';
import { USAGE_EXAMPLES } from '../constants';
import type { ConversionCatalog } from '../conversion/conversion_catalog';
import type { ConversionEngine, ConversionRequest, ConversionResult } from '../conversion/conversion_engine';
import { QUANTITY_KINDS } from '../conversion/units';
import { UnknownElementError, UnsupportedConversionError } from '../core/errors';
import { formatScientific } from '../utils/format';
import { logger } from '../utils/logger';
import { parseRequestLine } from './request_parser';

export type SessionStatus = 'ok' | 'error' | 'idle' | 'exit';

export interface SessionOutcome {
    status: SessionStatus;
    lines: string[];
}

const capitalize = (text: string): string => text.charAt(0).toUpperCase() + text.slice(1);

/** `Carbon, erg/g -> eV/atom: 1.244852E-11`; a value other than 1 precedes the starting unit. */
export function formatConversionResult(result: ConversionResult): string {
    const from = result.value === CONFIG.DEFAULT_VALUE ? result.fromUnit : `${result.value} ${result.fromUnit}`;
    return `${result.element.name}, ${from} -> ${result.toUnit}: ${formatScientific(result.result, CONFIG.RESULT_DIGITS)}`;
}

/** Turns prompt lines into output lines. Holds no state between lines. */
export class ConversionSession {
    private readonly engine: ConversionEngine;
    private readonly catalog: ConversionCatalog;

    constructor(engine: ConversionEngine, catalog: ConversionCatalog) {
        this.engine = engine;
        this.catalog = catalog;
    }

    supportedConversions(): string[] {
        return QUANTITY_KINDS.flatMap(kind => [
            `${capitalize(kind)}:`,
            ...this.catalog.rules(kind).map(rule => `\t${rule.fromUnit} <-> ${rule.toUnit}`),
        ]);
    }

    banner(): string[] {
        return [
            CONFIG.LINE_BREAK,
            'Parameter Format:',
            '"Name/Atomic Number/Symbol" "Starting Unit" "Ending Unit" ["Value"]',
            CONFIG.LINE_BREAK,
            'Current Conversions Supported:',
            ...this.supportedConversions(),
            CONFIG.LINE_BREAK,
            'Examples:',
            ...USAGE_EXAMPLES,
            CONFIG.LINE_BREAK,
        ];
    }

    /**
     * Runs one conversion. Unknown elements and unsupported pairs become an error
     * outcome; any other failure is rethrown.
     */
    runRequest(request: ConversionRequest): SessionOutcome {
        try {
            const result = this.engine.evaluate(request);
            return { status: 'ok', lines: [formatConversionResult(result)] };
        } catch (error) {
            if (error instanceof UnknownElementError || error instanceof UnsupportedConversionError) {
                logger.warn(`[ConversionSession] ${error.name}: ${error.message}`);
                return { status: 'error', lines: [error.message] };
            }
            logger.error('[ConversionSession] Unexpected failure:', error instanceof Error ? error : String(error));
            throw error;
        }
    }

    handleLine(line: string): SessionOutcome {
        const parsed = parseRequestLine(line);
        switch (parsed.type) {
            case 'empty':
                return { status: 'idle', lines: [] };
            case 'invalid':
                logger.debug(`[ConversionSession] Rejected line "${line.trim()}": ${parsed.message}`);
                return { status: 'error', lines: [parsed.message] };
            case 'command':
                if (parsed.command === 'exit') return { status: 'exit', lines: ['Exiting...'] };
                if (parsed.command === 'help') return { status: 'idle', lines: this.banner() };
                return { status: 'idle', lines: this.supportedConversions() };
            case 'request':
                return this.runRequest(parsed.request);
        }
    }
}
