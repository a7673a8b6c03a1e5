// src/utils/format.ts

/**
 * Scientific notation with an upper-case "E" and at least two exponent digits,
 * e.g. 1.244852E-11 or 8.314463E+00.
 */
export function formatScientific(value: number, digits: number = 6): string {
    if (!Number.isFinite(value)) return String(value);
    const [mantissa, exponent] = value.toExponential(digits).split('e');
    const sign = exponent.startsWith('-') ? '-' : '+';
    const magnitude = exponent.replace(/^[+-]/, '').padStart(2, '0');
    return `${mantissa}E${sign}${magnitude}`;
}

