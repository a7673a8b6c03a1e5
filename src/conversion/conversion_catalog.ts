// src/conversion/conversion_catalog.ts

import { UnsupportedConversionError } from '../core/errors';
import type { Element } from '../elements/element';
import { logger } from '../utils/logger';
import { CONVERSION_RULES, type ConversionRule } from './conversion_rules';
import { unitsOfKind, type QuantityKind } from './units';

export type ConversionDirection = 'forward' | 'inverse';

/** A rule bound to the direction a request uses it in. */
export interface ResolvedConversion {
    readonly rule: ConversionRule;
    readonly direction: ConversionDirection;
    readonly fromUnit: string;
    readonly toUnit: string;
    apply(value: number, element: Element): number;
}

const pairKey = (kind: QuantityKind, fromUnit: string, toUnit: string): string =>
    `${kind}|${fromUnit}|${toUnit}`;

/** Enumerated set of supported conversions, looked up in either direction. */
export class ConversionCatalog {
    private readonly byPair: ReadonlyMap<string, ConversionRule>;
    private readonly declared: readonly ConversionRule[];

    constructor(rules: readonly ConversionRule[] = CONVERSION_RULES) {
        const byPair = new Map<string, ConversionRule>();
        for (const rule of rules) {
            if (rule.fromUnit === rule.toUnit) {
                throw new Error(`Conversion rule ${rule.fromUnit} -> ${rule.toUnit} maps a unit onto itself.`);
            }
            const units = unitsOfKind(rule.kind);
            if (!units.includes(rule.fromUnit) || !units.includes(rule.toUnit)) {
                throw new Error(`Conversion rule ${rule.fromUnit} -> ${rule.toUnit} declares units outside the ${rule.kind} kind.`);
            }
            const key = pairKey(rule.kind, rule.fromUnit, rule.toUnit);
            if (byPair.has(key)) {
                throw new Error(`Duplicate ${rule.kind} conversion rule ${rule.fromUnit} -> ${rule.toUnit}.`);
            }
            // The inverse is derived from the forward rule, never declared separately
            if (byPair.has(pairKey(rule.kind, rule.toUnit, rule.fromUnit))) {
                throw new Error(`Conversion rule ${rule.fromUnit} -> ${rule.toUnit} duplicates the inverse of an existing rule.`);
            }
            byPair.set(key, rule);
        }
        this.byPair = byPair;
        this.declared = Object.freeze([...rules]);
        logger.debug(`[ConversionCatalog] Initialized with ${this.declared.length} rules.`);
    }

    /** Declared rules, optionally limited to one quantity kind. */
    rules(kind?: QuantityKind): readonly ConversionRule[] {
        return kind ? this.declared.filter(rule => rule.kind === kind) : this.declared;
    }

    /**
     * Finds the rule for a case-sensitive unit pair, falling back to the inverse of the
     * reverse pair.
     * @throws UnsupportedConversionError when neither direction is declared for `kind`.
     */
    findRule(kind: QuantityKind, fromUnit: string, toUnit: string): ResolvedConversion {
        const forward = this.byPair.get(pairKey(kind, fromUnit, toUnit));
        if (forward) {
            return {
                rule: forward,
                direction: 'forward',
                fromUnit,
                toUnit,
                apply: (value, element) => value * forward.factor(element),
            };
        }

        const reverse = this.byPair.get(pairKey(kind, toUnit, fromUnit));
        if (reverse) {
            logger.debug(`[ConversionCatalog] Using inverse of ${reverse.fromUnit} -> ${reverse.toUnit}.`);
            return {
                rule: reverse,
                direction: 'inverse',
                fromUnit,
                toUnit,
                apply: (value, element) => value / reverse.factor(element),
            };
        }

        throw new UnsupportedConversionError(fromUnit, toUnit, kind);
    }
}
