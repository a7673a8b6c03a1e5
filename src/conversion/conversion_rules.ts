// src/conversion/conversion_rules.ts

import {
    AVOGADRO_CONSTANT_NA,
    ERG_IN_JOULES,
    FARADAY_CONSTANT_F,
    GAS_CONSTANT_R,
    KILO,
    MBAR_CC_IN_JOULES,
    MILLI,
    RYDBERG_IN_ERG,
    RYDBERG_IN_EV,
} from '../constants';
import type { Element } from '../elements/element';
import type { EnergyUnit, EntropyUnit, QuantityKind, Unit } from './units';

/** Which element constant a rule's factor depends on. */
export type ReferenceConstant = 'none' | 'atomicMass' | 'molarMass';

/**
 * One invertible conversion. The forward direction multiplies by `factor(element)`,
 * the inverse divides by the same value.
 */
export interface ConversionRule {
    readonly kind: QuantityKind;
    readonly fromUnit: Unit;
    readonly toUnit: Unit;
    readonly reference: ReferenceConstant;
    factor(element: Element): number;
}

interface EntropyRule extends ConversionRule {
    readonly kind: 'entropy';
    readonly fromUnit: EntropyUnit;
    readonly toUnit: EntropyUnit;
}

interface EnergyRule extends ConversionRule {
    readonly kind: 'energy';
    readonly fromUnit: EnergyUnit;
    readonly toUnit: EnergyUnit;
}

// One eV per atom, expressed in erg per mole.
const EV_PER_ATOM_IN_ERG_PER_MOL = FARADAY_CONSTANT_F / ERG_IN_JOULES;

export const ENTROPY_RULES: readonly EntropyRule[] = [
    {
        kind: 'entropy', fromUnit: 'J/mol/K', toUnit: 'kB/atom', reference: 'none',
        factor: () => 1 / GAS_CONSTANT_R,
    },
    {
        kind: 'entropy', fromUnit: 'erg/g/K', toUnit: 'kB/atom', reference: 'atomicMass',
        factor: (element) => element.atomicMass * ERG_IN_JOULES / GAS_CONSTANT_R,
    },
    {
        kind: 'entropy', fromUnit: 'J/g/K', toUnit: 'kB/atom', reference: 'atomicMass',
        factor: (element) => element.atomicMass / GAS_CONSTANT_R,
    },
    {
        kind: 'entropy', fromUnit: 'Mbar-cc/g/K', toUnit: 'kB/atom', reference: 'atomicMass',
        factor: (element) => element.atomicMass * MBAR_CC_IN_JOULES / GAS_CONSTANT_R,
    },
    {
        kind: 'entropy', fromUnit: 'J/mol/K', toUnit: 'J/g/K', reference: 'molarMass',
        factor: (element) => 1 / element.atomicMass,
    },
    {
        kind: 'entropy', fromUnit: 'J/g/K', toUnit: 'erg/g/K', reference: 'none',
        factor: () => 1 / ERG_IN_JOULES,
    },
    {
        kind: 'entropy', fromUnit: 'Mbar-cc/g/K', toUnit: 'J/g/K', reference: 'none',
        factor: () => MBAR_CC_IN_JOULES,
    },
];

export const ENERGY_RULES: readonly EnergyRule[] = [
    {
        kind: 'energy', fromUnit: 'kJ/mol', toUnit: 'meV/atom', reference: 'none',
        factor: () => KILO / (FARADAY_CONSTANT_F * MILLI),
    },
    {
        kind: 'energy', fromUnit: 'eV/atom', toUnit: 'erg/g', reference: 'atomicMass',
        factor: (element) => EV_PER_ATOM_IN_ERG_PER_MOL / element.atomicMass,
    },
    {
        kind: 'energy', fromUnit: 'J/g', toUnit: 'eV/atom', reference: 'atomicMass',
        factor: (element) => element.atomicMass / FARADAY_CONSTANT_F,
    },
    {
        kind: 'energy', fromUnit: 'Ry/atom', toUnit: 'eV/atom', reference: 'none',
        factor: () => RYDBERG_IN_EV,
    },
    {
        kind: 'energy', fromUnit: 'Ry/atom', toUnit: 'erg/g', reference: 'atomicMass',
        factor: (element) => RYDBERG_IN_ERG * AVOGADRO_CONSTANT_NA / element.atomicMass,
    },
];

export const CONVERSION_RULES: readonly ConversionRule[] = [...ENTROPY_RULES, ...ENERGY_RULES];
