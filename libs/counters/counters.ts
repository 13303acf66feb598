import { z } from 'zod';

/**
 * Evaluation counter tables.
 *
 * Base counters track how often a model's operators were evaluated.
 * Least-squares models add residual counters and nest the base set under `counters`.
 */

export const BASE_COUNTER_NAMES = [
    'neval_obj',
    'neval_grad',
    'neval_cons',
    'neval_jcon',
    'neval_jgrad',
    'neval_jac',
    'neval_jprod',
    'neval_jtprod',
    'neval_hess',
    'neval_hprod',
    'neval_jhprod',
] as const;

export const NLS_COUNTER_NAMES = [
    'neval_residual',
    'neval_jac_residual',
    'neval_jprod_residual',
    'neval_jtprod_residual',
    'neval_hess_residual',
    'neval_jhess_residual',
    'neval_hprod_residual',
] as const;

export type BaseCounterName = typeof BASE_COUNTER_NAMES[number];
export type NlsCounterName = typeof NLS_COUNTER_NAMES[number];
export type CounterName = BaseCounterName | NlsCounterName;

export const COUNTER_NAMES: readonly CounterName[] = [...BASE_COUNTER_NAMES, ...NLS_COUNTER_NAMES];

export type Counters = { readonly [K in BaseCounterName]: number };

export type NlsCounters = { readonly counters: Counters } & { readonly [K in NlsCounterName]: number };

export const CountSchema = z.number().int().nonnegative();

export function isBaseCounterName(name: string): name is BaseCounterName {
    return BASE_COUNTER_NAMES.some(counter => counter === name);
}

export function isNlsCounters(counters: Counters | NlsCounters): counters is NlsCounters {
    return 'counters' in counters;
}

export function zeroCounters(): Counters {
    return Object.freeze({
        neval_obj: 0,
        neval_grad: 0,
        neval_cons: 0,
        neval_jcon: 0,
        neval_jgrad: 0,
        neval_jac: 0,
        neval_jprod: 0,
        neval_jtprod: 0,
        neval_hess: 0,
        neval_hprod: 0,
        neval_jhprod: 0,
    });
}

export function zeroNlsCounters(): NlsCounters {
    return Object.freeze({
        counters: zeroCounters(),
        neval_residual: 0,
        neval_jac_residual: 0,
        neval_jprod_residual: 0,
        neval_jtprod_residual: 0,
        neval_hess_residual: 0,
        neval_jhess_residual: 0,
        neval_hprod_residual: 0,
    });
}

/**
 * Reads a single count, fetching base names from the nested set when needed.
 */
export function getCount(counters: Counters | NlsCounters, name: CounterName): number {
    if (isBaseCounterName(name)) {
        return isNlsCounters(counters) ? counters.counters[name] : counters[name];
    }
    return isNlsCounters(counters) ? counters[name] : 0;
}

/**
 * Counters that were evaluated at least once, base set first.
 */
export function nonZeroCounts(counters: Counters | NlsCounters): Array<[CounterName, number]> {
    return COUNTER_NAMES
        .map((name): [CounterName, number] => [name, getCount(counters, name)])
        .filter(([, count]) => count > 0);
}
