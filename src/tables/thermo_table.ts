// src/tables/thermo_table.ts
//
// Thermochemistry tables in the JANAF column layout:
//   T (K)   Cp (J/mol/K)   S (J/mol/K)   -(G-H298)/T (J/mol/K)   H-H298 (kJ/mol)

import type { ConversionEngine } from '../conversion/conversion_engine';
import type { Element } from '../elements/element';
import { logger } from '../utils/logger';

export interface ThermoRow {
    temperature: number;
    entropy: number;    // J/mol/K
    enthalpy: number;   // kJ/mol
    // Source columns as written, echoed unchanged in the output
    entropyText: string;
    enthalpyText: string;
}

export interface ConvertedThermoRow extends ThermoRow {
    entropyPerAtom: number;   // kB/atom
    enthalpyPerAtom: number;  // meV/atom
}

export interface ThermoConversion {
    element: Element;
    entropyFactor: number;   // kB/atom per J/mol/K
    enthalpyFactor: number;  // meV/atom per kJ/mol
    rows: ConvertedThermoRow[];
}

const COLUMN_COUNT = 5;

export function parseThermoTable(text: string): ThermoRow[] {
    const rows: ThermoRow[] = [];
    text.split(/\r?\n/).forEach((rawLine, index) => {
        const line = rawLine.trim();
        if (line === '' || line.startsWith('#')) return;

        const columns = line.split(/\s+/);
        if (columns.length < COLUMN_COUNT) {
            logger.warn(`[ThermoTable] Line ${index + 1}: expected ${COLUMN_COUNT} columns, found ${columns.length}. Skipping.`);
            return;
        }

        const temperature = Number(columns[0]);
        const entropy = Number(columns[2]);
        const enthalpy = Number(columns[4]);
        if (![temperature, entropy, enthalpy].every(Number.isFinite)) {
            logger.warn(`[ThermoTable] Line ${index + 1}: non-numeric temperature, entropy or enthalpy. Skipping.`);
            return;
        }
        rows.push({ temperature, entropy, enthalpy, entropyText: columns[2], enthalpyText: columns[4] });
    });
    logger.debug(`[ThermoTable] Parsed ${rows.length} rows.`);
    return rows;
}

/** Converts entropy to kB/atom and enthalpy to meV/atom for every row. */
export function convertThermoTable(
    engine: ConversionEngine,
    identifier: string | number,
    rows: readonly ThermoRow[],
): ThermoConversion {
    const entropy = engine.evaluate({ identifier, fromUnit: 'J/mol/K', toUnit: 'kB/atom' });
    const enthalpy = engine.evaluate({ identifier, fromUnit: 'kJ/mol', toUnit: 'meV/atom' });

    return {
        element: entropy.element,
        entropyFactor: entropy.result,
        enthalpyFactor: enthalpy.result,
        rows: rows.map(row => ({
            ...row,
            entropyPerAtom: engine.convert(identifier, 'J/mol/K', 'kB/atom', row.entropy),
            enthalpyPerAtom: engine.convert(identifier, 'kJ/mol', 'meV/atom', row.enthalpy),
        })),
    };
}

export function formatThermoTable(conversion: ThermoConversion): string {
    const { element, entropyFactor, enthalpyFactor } = conversion;
    const lines = [
        `# ${element.name} (${element.symbol})`,
        `# Atomic Number: ${element.atomicNumber}`,
        `# Atomic Mass: ${element.atomicMass}`,
        `# Unit Conversion Factors: 1 J/mol*K = ${entropyFactor.toFixed(4)} kB/atom   |   1 kJ/mol = ${enthalpyFactor.toFixed(4)} meV/atom`,
        '# Temperature (K)\tEntropy (kB/atom)\tEnthalpy (meV/atom)\tEntropy (J/mol*K)\tEnthalpy (kJ/mol)',
        ...conversion.rows.map(row => [
            row.temperature.toFixed(1),
            row.entropyPerAtom.toFixed(4),
            row.enthalpyPerAtom.toFixed(4),
            row.entropyText,
            row.enthalpyText,
        ].join('\t')),
    ];
    return lines.join('\n');
}
