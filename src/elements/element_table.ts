// src/elements/element_table.ts

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CONFIG } from '../config';
import { logger } from '../utils/logger';
import type { Element } from './element';

export const elementSchema = z.object({
    atomicNumber: z.number().int().positive(),
    symbol: z.string().trim().min(1).max(3),
    name: z.string().trim().min(1),
    atomicMass: z.number().positive().finite(),
});

export const elementTableSchema = z.array(elementSchema).min(1);

/** Validates already-parsed reference data. Throws a ZodError describing every bad entry. */
export function parseElementTable(data: unknown): Element[] {
    return elementTableSchema.parse(data);
}

/** Reads and validates a JSON element table; defaults to the bundled one. */
export function loadElementTable(path: string = CONFIG.ELEMENT_TABLE_PATH): Element[] {
    logger.debug(`[ElementTable] Loading element table from "${path}"`);
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    const elements = parseElementTable(raw);
    logger.info(`[ElementTable] Loaded ${elements.length} elements from "${path}"`);
    return elements;
}
