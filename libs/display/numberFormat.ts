import { inspect } from 'node:util';
import { statsConfig } from '../config/statsConfig.js';
import { isNumericVector } from '../counters/model.js';
import type { NumericVector } from '../counters/model.js';

/**
 * Fixed-width renderers used by tabular output.
 * Widths match printf's %7d, %15.8e and %8s so columns line up across lines.
 */

export const INT_WIDTH = 7;
export const REAL_WIDTH = 15;
export const TEXT_WIDTH = 8;
export const REAL_DIGITS = 8;

export const EMPTY_SET = '∅';
export const ELLIPSIS = '⋯';

function nonFinite(x: number): string {
    if (Number.isNaN(x)) return 'NaN';
    return x > 0 ? 'Inf' : '-Inf';
}

/**
 * `x` in scientific notation with `digits` decimals and at least two exponent digits.
 */
export function formatScientific(x: number, digits: number = REAL_DIGITS): string {
    if (!Number.isFinite(x)) return nonFinite(x);

    const mantissa = x.toExponential(digits)
        .replace(/e([+-])(\d)$/, (_match, sign: string, exponent: string) => `e${sign}0${exponent}`);
    return Object.is(x, -0) ? `-${mantissa}` : mantissa;
}

export function formatInt(n: number): string {
    return String(n).padStart(INT_WIDTH);
}

export function formatReal(x: number): string {
    return formatScientific(x).padStart(REAL_WIDTH);
}

export function formatText(s: string): string {
    return s.padStart(TEXT_WIDTH);
}

/**
 * Shortest round-trip form of a vector element.
 */
export function formatElement(x: number): string {
    if (!Number.isFinite(x)) return nonFinite(x);
    return Object.is(x, -0) ? '-0' : String(x);
}

export interface VectorDisplayOptions {
    /** Longest vector shown in full; longer ones keep `maxShown - 1` leading elements and the last. */
    maxShown?: number;
}

export type VectorFormatter = (x: NumericVector) => string;

export function formatVector(x: NumericVector, options: VectorDisplayOptions = {}): string {
    const maxShown = options.maxShown ?? statsConfig.vectorMaxShown;
    const elements = Array.from(x, formatElement);

    if (elements.length === 0) return EMPTY_SET;
    if (elements.length <= maxShown) return `[${elements.join(' ')}]`;

    const head = elements.slice(0, maxShown - 1).join(' ');
    return `[${head} ${ELLIPSIS} ${elements[elements.length - 1]}]`;
}

/**
 * Free-form rendering for open-ended values such as solver-specific diagnostics.
 */
export function formatValue(value: unknown, showVector: VectorFormatter = formatVector): string {
    if (isNumericVector(value)) return showVector(value);
    if (typeof value === 'number') {
        return Number.isInteger(value) ? String(value) : formatScientific(value);
    }
    if (typeof value === 'string') return value;
    return inspect(value, { breakLength: Infinity });
}
