// src/elements/element_registry.ts

import { UnknownElementError } from '../core/errors';
import { logger } from '../utils/logger';
import type { Element } from './element';

const UNSIGNED_INTEGER = /^\+?\d+$/;

const isPositiveInteger = (text: string): boolean =>
    UNSIGNED_INTEGER.test(text) && Number(text) > 0;

/**
 * Immutable lookup of elements by atomic number, name or symbol.
 * Names and symbols match case-insensitively.
 */
export class ElementRegistry {
    private readonly byNumber: ReadonlyMap<number, Element>;
    private readonly byName: ReadonlyMap<string, Element>;
    private readonly bySymbol: ReadonlyMap<string, Element>;
    private readonly ordered: readonly Element[];

    constructor(elements: readonly Element[]) {
        const byNumber = new Map<number, Element>();
        const byName = new Map<string, Element>();
        const bySymbol = new Map<string, Element>();

        for (const source of elements) {
            const element: Element = Object.freeze({ ...source });
            const nameKey = element.name.toLowerCase();
            const symbolKey = element.symbol.toLowerCase();

            if (byNumber.has(element.atomicNumber)) {
                throw new Error(`Duplicate atomic number ${element.atomicNumber} in element table.`);
            }
            if (byName.has(nameKey)) {
                throw new Error(`Duplicate element name "${element.name}" in element table.`);
            }
            if (bySymbol.has(symbolKey)) {
                throw new Error(`Duplicate element symbol "${element.symbol}" in element table.`);
            }

            byNumber.set(element.atomicNumber, element);
            byName.set(nameKey, element);
            bySymbol.set(symbolKey, element);
        }

        this.byNumber = byNumber;
        this.byName = byName;
        this.bySymbol = bySymbol;
        this.ordered = Object.freeze([...byNumber.values()].sort((a, b) => a.atomicNumber - b.atomicNumber));
        logger.debug(`[ElementRegistry] Initialized with ${this.ordered.length} elements.`);
    }

    get size(): number {
        return this.ordered.length;
    }

    /** All elements ordered by atomic number. */
    all(): readonly Element[] {
        return this.ordered;
    }

    /**
     * Resolves an atomic number, element name or chemical symbol, tried in that order.
     * @throws UnknownElementError when none of the three forms match.
     */
    resolve(identifier: string | number): Element {
        const text = String(identifier).trim();

        if (isPositiveInteger(text)) {
            const element = this.byNumber.get(Number(text));
            if (element) return element;
            logger.debug(`[ElementRegistry] No element with atomic number ${text}.`);
            throw new UnknownElementError(identifier);
        }

        const key = text.toLowerCase();
        const element = this.byName.get(key) ?? this.bySymbol.get(key);
        if (!element) {
            throw new UnknownElementError(identifier);
        }
        return element;
    }
}
