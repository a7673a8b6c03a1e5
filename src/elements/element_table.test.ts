// src/elements/element_table.test.ts

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadElementTable, parseElementTable } from './element_table';

describe('parseElementTable', () => {
    it('should accept well-formed entries', () => {
        const elements = parseElementTable([
            { atomicNumber: 26, symbol: 'Fe', name: 'Iron', atomicMass: 55.845 },
        ]);
        expect(elements).toEqual([{ atomicNumber: 26, symbol: 'Fe', name: 'Iron', atomicMass: 55.845 }]);
    });

    it('should trim symbols and names', () => {
        const [iron] = parseElementTable([
            { atomicNumber: 26, symbol: ' Fe ', name: ' Iron', atomicMass: 55.845 },
        ]);
        expect(iron.symbol).toBe('Fe');
        expect(iron.name).toBe('Iron');
    });

    it('should reject a non-positive atomic mass', () => {
        expect(() => parseElementTable([
            { atomicNumber: 26, symbol: 'Fe', name: 'Iron', atomicMass: 0 },
        ])).toThrow(ZodError);
    });

    it('should reject a fractional atomic number', () => {
        expect(() => parseElementTable([
            { atomicNumber: 2.5, symbol: 'Fe', name: 'Iron', atomicMass: 55.845 },
        ])).toThrow(ZodError);
    });

    it('should reject missing fields and empty tables', () => {
        expect(() => parseElementTable([{ atomicNumber: 26, symbol: 'Fe' }])).toThrow(ZodError);
        expect(() => parseElementTable([])).toThrow(ZodError);
        expect(() => parseElementTable({ elements: [] })).toThrow(ZodError);
    });
});

describe('loadElementTable', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'elemental-units-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should load the bundled table by default', () => {
        const elements = loadElementTable();
        expect(elements).toHaveLength(118);
        expect(elements[5]).toEqual({ atomicNumber: 6, symbol: 'C', name: 'Carbon', atomicMass: 12.011 });
    });

    it('should load a table from a given path', () => {
        const path = join(dir, 'elements.json');
        writeFileSync(path, JSON.stringify([
            { atomicNumber: 6, symbol: 'C', name: 'Carbon', atomicMass: 12.0107 },
        ]));
        expect(loadElementTable(path)).toEqual([
            { atomicNumber: 6, symbol: 'C', name: 'Carbon', atomicMass: 12.0107 },
        ]);
    });

    it('should fail on malformed JSON', () => {
        const path = join(dir, 'broken.json');
        writeFileSync(path, '[{"atomicNumber": 6,');
        expect(() => loadElementTable(path)).toThrow(SyntaxError);
    });
});
