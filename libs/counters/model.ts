import { z } from 'zod';
import { InvalidCounterError } from '../errors/statsErrors.js';
import { CountSchema, isNlsCounters, zeroNlsCounters } from './counters.js';
import type { Counters, NlsCounters } from './counters.js';

export type NumericVector = readonly number[] | Float32Array | Float64Array;

export type Precision = 'float32' | 'float64';

/**
 * What a report needs from the model a solver worked on.
 */
export interface EvaluationModel {
    readonly meta: { readonly x0: NumericVector };
    readonly counters: Counters | NlsCounters;
    isUnconstrained(): boolean;
}

export interface LeastSquaresModel extends EvaluationModel {
    readonly counters: NlsCounters;
}

export function isLeastSquaresModel(model: EvaluationModel): model is LeastSquaresModel {
    return isNlsCounters(model.counters);
}

export const CountersSchema = z.object({
    neval_obj: CountSchema,
    neval_grad: CountSchema,
    neval_cons: CountSchema,
    neval_jcon: CountSchema,
    neval_jgrad: CountSchema,
    neval_jac: CountSchema,
    neval_jprod: CountSchema,
    neval_jtprod: CountSchema,
    neval_hess: CountSchema,
    neval_hprod: CountSchema,
    neval_jhprod: CountSchema,
});

export const NlsCountersSchema = z.object({
    counters: CountersSchema,
    neval_residual: CountSchema,
    neval_jac_residual: CountSchema,
    neval_jprod_residual: CountSchema,
    neval_jtprod_residual: CountSchema,
    neval_hess_residual: CountSchema,
    neval_jhess_residual: CountSchema,
    neval_hprod_residual: CountSchema,
});

function parseCounters<T>(schema: z.ZodType<T>, source: unknown): T {
    const result = schema.safeParse(source);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new InvalidCounterError(
            issue ? issue.path.join('.') : 'counters',
            issue ? issue.message : 'unreadable counters'
        );
    }
    return result.data;
}

/**
 * Copies the model's counters into a fresh, frozen set.
 * Residual counters are read only from least-squares models; they stay zero otherwise.
 */
export function snapshotCounters(model: EvaluationModel): NlsCounters {
    if (isLeastSquaresModel(model)) {
        const nls = parseCounters(NlsCountersSchema, model.counters);
        return Object.freeze({ ...nls, counters: Object.freeze(nls.counters) });
    }

    const base = parseCounters(CountersSchema, model.counters);
    return Object.freeze({ ...zeroNlsCounters(), counters: Object.freeze(base) });
}

export function isNumericVector(value: unknown): value is NumericVector {
    if (value instanceof Float32Array || value instanceof Float64Array) return true;
    return Array.isArray(value) && value.every(element => typeof element === 'number');
}

export function precisionOf(x0: NumericVector): Precision {
    return x0 instanceof Float32Array ? 'float32' : 'float64';
}

export function emptyVectorLike(x0: NumericVector): NumericVector {
    if (x0 instanceof Float32Array) return new Float32Array(0);
    if (x0 instanceof Float64Array) return new Float64Array(0);
    return [];
}
