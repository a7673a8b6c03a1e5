// src/cli/args.test.ts

import { describe, it, expect } from 'vitest';
import { parseArgs } from './args';
import { LogLevel } from '../utils/logger';

describe('parseArgs', () => {
    it('should default to the interactive prompt', () => {
        expect(parseArgs([])).toEqual({
            ok: true,
            options: { command: { name: 'interactive' }, elementsPath: undefined, logLevel: undefined, logFile: undefined },
        });
    });

    it('should parse a one-shot conversion with a value', () => {
        const parsed = parseArgs(['convert', 'Carbon', 'erg/g', 'eV/atom', '2']);
        expect(parsed.ok && parsed.options.command).toEqual({
            name: 'convert',
            request: { identifier: 'Carbon', fromUnit: 'erg/g', toUnit: 'eV/atom', value: 2 },
        });
    });

    it('should accept a negative value', () => {
        const parsed = parseArgs(['convert', 'Fe', 'kJ/mol', 'meV/atom', '-8.683']);
        expect(parsed.ok && parsed.options.command).toEqual({
            name: 'convert',
            request: { identifier: 'Fe', fromUnit: 'kJ/mol', toUnit: 'meV/atom', value: -8.683 },
        });
    });

    it('should parse table and thermo commands', () => {
        expect(parseArgs(['table', 'entropy', '--reverse'])).toMatchObject({
            ok: true, options: { command: { name: 'table', kind: 'entropy', reverse: true } },
        });
        expect(parseArgs(['table', 'energy'])).toMatchObject({
            ok: true, options: { command: { name: 'table', kind: 'energy', reverse: false } },
        });
        expect(parseArgs(['thermo', 'Fe', 'fe.txt'])).toMatchObject({
            ok: true, options: { command: { name: 'thermo', identifier: 'Fe', file: 'fe.txt' } },
        });
    });

    it('should parse options anywhere on the line', () => {
        expect(parseArgs(['--log-level', 'debug', 'list', '--elements', 'custom.json', '--log-file', 'out.log'])).toEqual({
            ok: true,
            options: { command: { name: 'list' }, elementsPath: 'custom.json', logLevel: LogLevel.DEBUG, logFile: 'out.log' },
        });
    });

    it('should let --help win over any command', () => {
        expect(parseArgs(['convert', '--help'])).toMatchObject({ ok: true, options: { command: { name: 'help' } } });
        expect(parseArgs(['-h'])).toMatchObject({ ok: true, options: { command: { name: 'help' } } });
    });

    it('should report usage errors', () => {
        expect(parseArgs(['--elements'])).toEqual({ ok: false, message: '--elements requires a value.' });
        expect(parseArgs(['--log-level', 'loud'])).toEqual({ ok: false, message: 'Unknown log level "loud".' });
        expect(parseArgs(['--colour'])).toEqual({ ok: false, message: 'Unknown option "--colour".' });
        expect(parseArgs(['frobnicate'])).toEqual({ ok: false, message: 'Unknown command "frobnicate".' });
        expect(parseArgs(['table', 'volume'])).toEqual({ ok: false, message: 'table expects one of: entropy, energy.' });
        expect(parseArgs(['thermo', 'Fe'])).toEqual({ ok: false, message: 'thermo expects <element> <file>.' });
        expect(parseArgs(['list', 'extra'])).toEqual({ ok: false, message: 'list takes no arguments.' });
        expect(parseArgs(['convert', 'C', 'erg/g'])).toEqual({
            ok: false, message: 'Expected: <element> <starting unit> <ending unit> [value]',
        });
        expect(parseArgs(['convert', 'C', 'erg/g', 'eV/atom', 'x'])).toEqual({ ok: false, message: '"x" is not a number.' });
        expect(parseArgs(['convert', 'C', 'erg/g', 'eV/atom', '--reverse'])).toEqual({
            ok: false, message: '--reverse only applies to the table command.',
        });
    });
});
