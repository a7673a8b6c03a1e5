// src/elements/element.ts

/**
 * A chemical element and its reference constant. `atomicMass` is in g/mol, so it
 * doubles as the molar mass in per-mole to per-gram conversions.
 */
export interface Element {
    readonly atomicNumber: number;
    readonly symbol: string;
    readonly name: string;
    readonly atomicMass: number;
}
