// src/conversion/units.ts

import { UnsupportedConversionError } from '../core/errors';

export type QuantityKind = 'entropy' | 'energy';

export const QUANTITY_KINDS: readonly QuantityKind[] = ['entropy', 'energy'];

// Labels are case-sensitive: "kB" and "J" carry meaning.
export const ENTROPY_UNITS = ['kB/atom', 'J/mol/K', 'erg/g/K', 'J/g/K', 'Mbar-cc/g/K'] as const;
export const ENERGY_UNITS = ['kJ/mol', 'meV/atom', 'eV/atom', 'erg/g', 'J/g', 'Ry/atom'] as const;

export type EntropyUnit = typeof ENTROPY_UNITS[number];
export type EnergyUnit = typeof ENERGY_UNITS[number];
export type Unit = EntropyUnit | EnergyUnit;

// Spellings seen in older notes and tables that name an existing unit.
const UNIT_ALIASES: Readonly<Record<string, Unit>> = {
    'J/mol/k': 'J/mol/K',
};

const UNIT_KINDS: ReadonlyMap<string, QuantityKind> = new Map<string, QuantityKind>([
    ...ENTROPY_UNITS.map((unit): [string, QuantityKind] => [unit, 'entropy']),
    ...ENERGY_UNITS.map((unit): [string, QuantityKind] => [unit, 'energy']),
]);

/** Trims the label and maps an alias to its canonical unit. Unknown labels pass through. */
export function normalizeUnit(label: string): string {
    const trimmed = label.trim();
    return UNIT_ALIASES[trimmed] ?? trimmed;
}

export function unitKind(label: string): QuantityKind | undefined {
    return UNIT_KINDS.get(label);
}

export function unitsOfKind(kind: QuantityKind): readonly Unit[] {
    return kind === 'entropy' ? ENTROPY_UNITS : ENERGY_UNITS;
}

/**
 * Derives the quantity kind from the label set. Both labels must be known units
 * of the same kind.
 */
export function inferQuantityKind(fromUnit: string, toUnit: string): QuantityKind {
    const fromKind = unitKind(fromUnit);
    const toKind = unitKind(toUnit);

    if (fromKind === undefined) {
        throw new UnsupportedConversionError(fromUnit, toUnit, toKind ?? null, `"${fromUnit}" is not a supported unit.`);
    }
    if (toKind === undefined) {
        throw new UnsupportedConversionError(fromUnit, toUnit, fromKind, `"${toUnit}" is not a supported unit.`);
    }
    if (fromKind !== toKind) {
        throw new UnsupportedConversionError(fromUnit, toUnit, null);
    }
    return fromKind;
}
