// src/core/errors.ts

import type { QuantityKind } from '../conversion/units';

/** The identifier matched no element by atomic number, name or symbol. */
export class UnknownElementError extends Error {
    readonly identifier: string;

    constructor(identifier: string | number) {
        super(`No element matches "${identifier}".`);
        this.name = 'UnknownElementError';
        this.identifier = String(identifier);
    }
}

/**
 * The unit pair is not in the catalog in either direction. `kind` is null when
 * no single quantity kind covers both labels.
 */
export class UnsupportedConversionError extends Error {
    readonly fromUnit: string;
    readonly toUnit: string;
    readonly kind: QuantityKind | null;

    constructor(fromUnit: string, toUnit: string, kind: QuantityKind | null, detail?: string) {
        const scope = kind ? `${kind} ` : '';
        super(detail ?? `${fromUnit} -> ${toUnit} is not a supported ${scope}conversion.`);
        this.name = 'UnsupportedConversionError';
        this.fromUnit = fromUnit;
        this.toUnit = toUnit;
        this.kind = kind;
    }
}
