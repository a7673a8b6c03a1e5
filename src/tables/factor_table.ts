// src/tables/factor_table.ts

import { CONFIG } from '../config';
import type { ConversionEngine } from '../conversion/conversion_engine';
import type { Unit } from '../conversion/units';
import type { Element } from '../elements/element';
import type { ElementRegistry } from '../elements/element_registry';
import { formatScientific } from '../utils/format';
import { logger } from '../utils/logger';

export interface FactorColumn {
    readonly fromUnit: Unit;
    readonly toUnit: Unit;
}

export interface FactorTableRow {
    element: Element;
    factors: number[];
}

export interface FactorTable {
    columns: readonly FactorColumn[];
    rows: FactorTableRow[];
}

export type FactorTablePreset = 'entropy' | 'entropy-reverse' | 'energy' | 'energy-reverse';

const swap = (columns: readonly FactorColumn[]): readonly FactorColumn[] =>
    columns.map(({ fromUnit, toUnit }) => ({ fromUnit: toUnit, toUnit: fromUnit }));

const ENTROPY_COLUMNS: readonly FactorColumn[] = [
    { fromUnit: 'erg/g/K', toUnit: 'kB/atom' },
    { fromUnit: 'Mbar-cc/g/K', toUnit: 'kB/atom' },
    { fromUnit: 'J/g/K', toUnit: 'kB/atom' },
    { fromUnit: 'J/mol/K', toUnit: 'J/g/K' },
];

const ENERGY_COLUMNS: readonly FactorColumn[] = [
    { fromUnit: 'erg/g', toUnit: 'eV/atom' },
    { fromUnit: 'J/g', toUnit: 'eV/atom' },
    { fromUnit: 'Ry/atom', toUnit: 'eV/atom' },
    { fromUnit: 'Ry/atom', toUnit: 'erg/g' },
];

export const FACTOR_TABLE_PRESETS: Readonly<Record<FactorTablePreset, readonly FactorColumn[]>> = {
    'entropy': ENTROPY_COLUMNS,
    'entropy-reverse': swap(ENTROPY_COLUMNS),
    'energy': ENERGY_COLUMNS,
    'energy-reverse': swap(ENERGY_COLUMNS),
};

/** Conversion factor (result for a value of 1) of every column, for every element in the registry. */
export function buildFactorTable(
    engine: ConversionEngine,
    registry: ElementRegistry,
    columns: readonly FactorColumn[],
): FactorTable {
    const rows = registry.all().map(element => ({
        element,
        factors: columns.map(column =>
            engine.convert(element.atomicNumber, column.fromUnit, column.toUnit, 1)),
    }));
    logger.debug(`[FactorTable] Built ${rows.length} rows x ${columns.length} columns.`);
    return { columns, rows };
}

/** Tab-separated rendering with "Starting Unit" and "Ending Unit" header rows. */
export function formatFactorTable(table: FactorTable): string {
    const lines = [
        ['Starting Unit', '', '', ...table.columns.map(column => column.fromUnit)].join('\t'),
        ['Ending Unit', '', '', ...table.columns.map(column => column.toUnit)].join('\t'),
        ['Element', 'Symbol', 'AMass'].join('\t'),
        ...table.rows.map(({ element, factors }) => [
            String(element.atomicNumber),
            element.symbol,
            element.atomicMass.toFixed(CONFIG.MASS_DIGITS),
            ...factors.map(factor => formatScientific(factor, CONFIG.RESULT_DIGITS)),
        ].join('\t')),
    ];
    return lines.join('\n');
}
