// src/conversion/conversion_engine.ts

import { CONFIG } from '../config';
import type { Element } from '../elements/element';
import type { ElementRegistry } from '../elements/element_registry';
import { logger } from '../utils/logger';
import type { ConversionCatalog, ConversionDirection } from './conversion_catalog';
import { inferQuantityKind, normalizeUnit, type QuantityKind } from './units';

export interface ConversionRequest {
    identifier: string | number;
    fromUnit: string;
    toUnit: string;
    /** Defaults to 1, which makes the result the conversion factor. */
    value?: number;
    /** Skips inference from the unit labels when given. */
    kind?: QuantityKind;
}

export interface ConversionResult {
    element: Element;
    kind: QuantityKind;
    fromUnit: string;
    toUnit: string;
    direction: ConversionDirection;
    value: number;
    result: number;
}

/**
 * Resolves the element and rule for a request and applies the rule.
 * Stateless; errors from the registry and catalog propagate unchanged.
 */
export class ConversionEngine {
    private readonly registry: ElementRegistry;
    private readonly catalog: ConversionCatalog;

    constructor(registry: ElementRegistry, catalog: ConversionCatalog) {
        this.registry = registry;
        this.catalog = catalog;
    }

    evaluate(request: ConversionRequest): ConversionResult {
        const element = this.registry.resolve(request.identifier);
        const fromUnit = normalizeUnit(request.fromUnit);
        const toUnit = normalizeUnit(request.toUnit);
        const kind = request.kind ?? inferQuantityKind(fromUnit, toUnit);
        const conversion = this.catalog.findRule(kind, fromUnit, toUnit);
        const value = request.value ?? CONFIG.DEFAULT_VALUE;
        const result = conversion.apply(value, element);

        logger.debug(`[ConversionEngine] ${element.symbol}: ${value} ${fromUnit} -> ${result} ${toUnit} (${conversion.direction})`);
        return {
            element,
            kind,
            fromUnit,
            toUnit,
            direction: conversion.direction,
            value,
            result,
        };
    }

    convert(identifier: string | number, fromUnit: string, toUnit: string, value: number = CONFIG.DEFAULT_VALUE): number {
        return this.evaluate({ identifier, fromUnit, toUnit, value }).result;
    }
}
