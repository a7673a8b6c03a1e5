// src/cli/session.test.ts

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConversionSession, formatConversionResult } from './session';
import { ConversionCatalog } from '../conversion/conversion_catalog';
import { ConversionEngine, type ConversionRequest, type ConversionResult } from '../conversion/conversion_engine';
import { ElementRegistry } from '../elements/element_registry';
import { REQUEST_FORMAT } from './request_parser';

const registry = new ElementRegistry([
    { atomicNumber: 6, symbol: 'C', name: 'Carbon', atomicMass: 12.011 },
    { atomicNumber: 26, symbol: 'Fe', name: 'Iron', atomicMass: 55.845 },
]);
const catalog = new ConversionCatalog();
const engine = new ConversionEngine(registry, catalog);

class FailingEngine extends ConversionEngine {
    override evaluate(_request: ConversionRequest): ConversionResult {
        throw new Error('disk on fire');
    }
}

describe('ConversionSession', () => {
    let session: ConversionSession;

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => { });
        vi.spyOn(console, 'error').mockImplementation(() => { });
        session = new ConversionSession(engine, catalog);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should format a conversion without a value', () => {
        expect(session.handleLine('Carbon erg/g eV/atom')).toEqual({
            status: 'ok',
            lines: ['Carbon, erg/g -> eV/atom: 1.244852E-11'],
        });
    });

    it('should put a value other than 1 before the starting unit', () => {
        expect(session.handleLine('fe kJ/mol meV/atom 12.5')).toEqual({
            status: 'ok',
            lines: ['Iron, 12.5 kJ/mol -> meV/atom: 1.295534E+02'],
        });
    });

    it('should resolve by atomic number', () => {
        expect(session.handleLine('6 erg/g eV/atom').lines).toEqual(['Carbon, erg/g -> eV/atom: 1.244852E-11']);
    });

    it('should report unknown elements and unsupported pairs and carry on', () => {
        expect(session.handleLine('Unobtainium J/g/K kB/atom')).toEqual({
            status: 'error',
            lines: ['No element matches "Unobtainium".'],
        });
        expect(session.handleLine('C kB/atom Ry/atom')).toEqual({
            status: 'error',
            lines: ['kB/atom -> Ry/atom is not a supported conversion.'],
        });
        expect(session.handleLine('C kB/atom kB/atom')).toEqual({
            status: 'error',
            lines: ['kB/atom -> kB/atom is not a supported entropy conversion.'],
        });
        expect(session.handleLine('C furlong kB/atom')).toEqual({
            status: 'error',
            lines: ['"furlong" is not a supported unit.'],
        });
        expect(session.handleLine('Carbon erg/g eV/atom').status).toBe('ok');
    });

    it('should reject malformed lines with the expected format', () => {
        expect(session.handleLine('Carbon erg/g')).toEqual({ status: 'error', lines: [REQUEST_FORMAT] });
    });

    it('should ignore blank lines', () => {
        expect(session.handleLine('   ')).toEqual({ status: 'idle', lines: [] });
    });

    it('should exit on exit or quit', () => {
        expect(session.handleLine('exit')).toEqual({ status: 'exit', lines: ['Exiting...'] });
        expect(session.handleLine('Quit').status).toBe('exit');
    });

    it('should list supported conversions grouped by kind', () => {
        expect(session.handleLine('list')).toEqual({
            status: 'idle',
            lines: [
                'Entropy:',
                '\tJ/mol/K <-> kB/atom',
                '\terg/g/K <-> kB/atom',
                '\tJ/g/K <-> kB/atom',
                '\tMbar-cc/g/K <-> kB/atom',
                '\tJ/mol/K <-> J/g/K',
                '\tJ/g/K <-> erg/g/K',
                '\tMbar-cc/g/K <-> J/g/K',
                'Energy:',
                '\tkJ/mol <-> meV/atom',
                '\teV/atom <-> erg/g',
                '\tJ/g <-> eV/atom',
                '\tRy/atom <-> eV/atom',
                '\tRy/atom <-> erg/g',
            ],
        });
    });

    it('should show the banner on help', () => {
        const { status, lines } = session.handleLine('help');
        expect(status).toBe('idle');
        expect(lines).toEqual(session.banner());
        expect(lines[1]).toBe('Parameter Format:');
        expect(lines).toContain('Current Conversions Supported:');
        expect(lines).toContain('Carbon erg/g eV/atom');
        expect(lines[lines.length - 1]).toBe('------------------------------');
    });

    it('should rethrow failures that are not conversion errors', () => {
        const failing = new ConversionSession(new FailingEngine(registry, catalog), catalog);
        expect(() => failing.handleLine('C erg/g eV/atom')).toThrow('disk on fire');
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] [ConversionSession] Unexpected failure: Error: disk on fire'));
    });
});

describe('formatConversionResult', () => {
    it('should render the result in scientific notation', () => {
        const element = registry.resolve('C');
        expect(formatConversionResult({
            element, kind: 'energy', fromUnit: 'eV/atom', toUnit: 'erg/g', direction: 'forward', value: 2, result: 1.5e12,
        })).toBe('Carbon, 2 eV/atom -> erg/g: 1.500000E+12');
    });
});
