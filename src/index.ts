// src/index.ts

import { ConversionCatalog } from './conversion/conversion_catalog';
import { ConversionEngine } from './conversion/conversion_engine';
import type { Element } from './elements/element';
import { ElementRegistry } from './elements/element_registry';
import { loadElementTable } from './elements/element_table';

export interface Converter {
    registry: ElementRegistry;
    catalog: ConversionCatalog;
    engine: ConversionEngine;
}

/** Wires registry, catalog and engine; uses the bundled element table unless elements are given. */
export function createConverter(elements: readonly Element[] = loadElementTable()): Converter {
    const registry = new ElementRegistry(elements);
    const catalog = new ConversionCatalog();
    return { registry, catalog, engine: new ConversionEngine(registry, catalog) };
}

export type { Element } from './elements/element';
export { ElementRegistry } from './elements/element_registry';
export { loadElementTable, parseElementTable } from './elements/element_table';
export { ConversionCatalog } from './conversion/conversion_catalog';
export type { ConversionDirection, ResolvedConversion } from './conversion/conversion_catalog';
export { ConversionEngine } from './conversion/conversion_engine';
export type { ConversionRequest, ConversionResult } from './conversion/conversion_engine';
export { CONVERSION_RULES, ENERGY_RULES, ENTROPY_RULES } from './conversion/conversion_rules';
export type { ConversionRule, ReferenceConstant } from './conversion/conversion_rules';
export {
    ENERGY_UNITS, ENTROPY_UNITS, QUANTITY_KINDS, inferQuantityKind, normalizeUnit, unitKind,
} from './conversion/units';
export type { EnergyUnit, EntropyUnit, QuantityKind, Unit } from './conversion/units';
export { UnknownElementError, UnsupportedConversionError } from './core/errors';
export { buildFactorTable, formatFactorTable, FACTOR_TABLE_PRESETS } from './tables/factor_table';
export { convertThermoTable, formatThermoTable, parseThermoTable } from './tables/thermo_table';
